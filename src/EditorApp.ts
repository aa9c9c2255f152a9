import { type KeyOutcome, dispatchKey } from './dispatcher.js';
import type { Editor } from './Editor.js';
import { type KeyAction, setupKeypressHandler } from './input.js';
import type { Logger } from './Logger.js';
import { Terminal } from './terminal.js';

const RESIZE_DEBOUNCE_MS = 300;
const QUIT_SIGNALS = ['SIGTERM', 'SIGHUP'] as const;

export interface EditorAppOptions {
  logKeys?: boolean;
  term?: Terminal;
}

/**
 * Owns the terminal for the lifetime of one editing session: raw mode,
 * keypress wiring, resize handling and redraws. Everything acquired in
 * run() is released in its finally block.
 */
export class EditorApp {
  private readonly term: Terminal;
  private readonly logKeys: boolean;

  private cleanupKeypress: (() => void) | undefined;
  private resizeTimer: ReturnType<typeof setTimeout> | undefined;
  private stop: (() => void) | undefined;
  private readonly resizeCallback = () => this.onResize();
  private readonly signalCallback = () => this.stop?.();

  public constructor(
    private readonly editor: Editor,
    private readonly log: Logger,
    options: EditorAppOptions = {},
  ) {
    this.term = options.term ?? new Terminal();
    this.logKeys = options.logKeys ?? false;
  }

  /** Resolves when the user quits; rejects when handling a key throws. */
  public async run(): Promise<void> {
    try {
      await new Promise<void>((resolve, reject) => {
        this.stop = resolve;
        this.start(reject);
      });
    } finally {
      this.cleanup();
    }
  }

  public handleKey(key: KeyAction): KeyOutcome {
    if (this.logKeys) {
      this.log.log('key', key);
    }
    const outcome = dispatchKey(this.editor, key);
    if (outcome === 'continue') {
      this.redraw();
    }
    return outcome;
  }

  private start(fail: (err: unknown) => void): void {
    if (process.stdin.isTTY) {
      process.stdin.setRawMode(true);
    }
    process.stdin.resume();
    this.term.enter();

    this.editor.modes.on('changed', (mode) => {
      this.log.log(`mode: ${mode}`);
    });

    this.cleanupKeypress = setupKeypressHandler((key) => {
      try {
        if (this.handleKey(key) === 'quit') {
          this.log.log('quit');
          this.stop?.();
        }
      } catch (err) {
        fail(err);
      }
    });
    process.stdout.on('resize', this.resizeCallback);
    for (const signal of QUIT_SIGNALS) {
      process.on(signal, this.signalCallback);
    }

    const { columns, rows } = this.term.size;
    this.editor.resize(columns, rows);
    this.redraw();
  }

  private onResize(): void {
    this.term.paused = true;
    clearTimeout(this.resizeTimer);
    this.resizeTimer = setTimeout(() => {
      const { columns, rows } = this.term.size;
      this.log.log(`resize ${columns}x${rows}`);
      this.term.paused = false;
      this.editor.resize(columns, rows);
      this.redraw();
    }, RESIZE_DEBOUNCE_MS);
  }

  private redraw(): void {
    this.term.draw(this.editor.frame());
  }

  private cleanup(): void {
    clearTimeout(this.resizeTimer);
    this.cleanupKeypress?.();
    this.cleanupKeypress = undefined;
    process.stdout.removeListener('resize', this.resizeCallback);
    for (const signal of QUIT_SIGNALS) {
      process.removeListener(signal, this.signalCallback);
    }
    this.editor.modes.removeAllListeners('changed');
    this.term.leave();
    if (process.stdin.isTTY) {
      process.stdin.setRawMode(false);
    }
    process.stdin.pause();
  }
}
