/**
 * The editing session: one buffer, its cursor, the current mode and the
 * bookkeeping around them (dirty counter, messages, size on disk).
 * Key handling lives in dispatcher.ts; this class owns the state changes.
 */

import { parseCommand } from './commands.js';
import { CursorController } from './CursorController.js';
import { fileSize, writeLines } from './files.js';
import { DEFAULT_TAB_STOP, LineBuffer } from './LineBuffer.js';
import { Logger } from './Logger.js';
import { ModeState } from './ModeState.js';
import { type DrawOp, type Message, renderFrame } from './renderer.js';

/** Status bar and message line sit below the text area */
export const RESERVED_ROWS = 2;

export interface EditorOptions {
  columns: number;
  /** Full terminal height, including the status bar and message line */
  rows: number;
  tabStop?: number;
  banner?: string | null;
  log?: Logger;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class Editor {
  public readonly modes = new ModeState();
  public readonly cursor: CursorController;
  public dirty = 0;
  public diskBytes: number;
  public message: Message | null = null;
  public modeMessage: string | null = null;

  private readonly banner: string | null;
  private readonly log: Logger;

  public constructor(
    public readonly text: LineBuffer,
    options: EditorOptions,
  ) {
    this.cursor = new CursorController(text, Math.max(options.columns, 1), Math.max(options.rows - RESERVED_ROWS, 1), options.tabStop ?? DEFAULT_TAB_STOP);
    this.banner = options.banner ?? null;
    this.log = options.log ?? new Logger(null);
    this.diskBytes = fileSize(text.filename);
  }

  /** Load `filePath` (or start an empty buffer). Read errors other than a missing file are thrown. */
  public static open(filePath: string | null, options: EditorOptions): Editor {
    const text = LineBuffer.load(filePath, options.tabStop ?? DEFAULT_TAB_STOP);
    return new Editor(text, options);
  }

  public resize(columns: number, rows: number): void {
    this.cursor.resize(columns, rows - RESERVED_ROWS);
  }

  public info(text: string): void {
    this.message = { text, level: 'info' };
  }

  public danger(text: string): void {
    this.message = { text, level: 'danger' };
    this.log.log(`danger: ${text}`);
  }

  public insertChar(ch: string): void {
    const { cx, cy } = this.cursor;
    this.text.insertChar(cy, cx, ch);
    this.cursor.cx = cx + ch.length;
    this.dirty++;
  }

  public breakLine(): void {
    this.text.splitLine(this.cursor.cy, this.cursor.cx);
    this.cursor.cy++;
    this.cursor.cx = 0;
    this.dirty++;
  }

  /** Delete left of the cursor, joining onto the previous line at column 0. */
  public backspace(): void {
    const { cx, cy } = this.cursor;
    if (cx > 0) {
      this.text.deleteChar(cy, cx - 1);
      this.cursor.cx = cx - 1;
      this.dirty++;
      return;
    }
    if (cy > 0) {
      const joinAt = this.text.getRaw(cy - 1).length;
      this.text.joinWithPrevious(cy);
      this.cursor.cy = cy - 1;
      this.cursor.cx = joinAt;
      this.dirty++;
    }
  }

  public deleteCharUnderCursor(): void {
    const { cx, cy } = this.cursor;
    if (cx >= this.text.getRaw(cy).length) {
      return;
    }
    this.text.deleteChar(cy, cx);
    this.cursor.clamp(this.modes.kind);
    this.dirty++;
  }

  public deleteLine(): void {
    const changed = this.text.deleteLine(this.cursor.cy);
    this.cursor.clamp(this.modes.kind);
    if (changed) {
      this.dirty++;
    }
  }

  /** Open an empty line below (or above) the cursor and move onto it. */
  public openLine(below: boolean): void {
    const at = below ? this.cursor.cy + 1 : this.cursor.cy;
    this.text.insertLine(at, '');
    this.cursor.cy = at;
    this.cursor.cx = 0;
    this.dirty++;
  }

  /**
   * Write the buffer to its file. Failures become a danger message and leave
   * the dirty counter untouched.
   */
  public save(): boolean {
    const filename = this.text.filename;
    if (filename === null) {
      this.danger('no file name specified');
      return false;
    }
    try {
      const bytes = writeLines(filename, this.text.lines());
      this.dirty = 0;
      this.diskBytes = bytes;
      this.info(`"${filename}" ${bytes} bytes written`);
      this.log.log(`saved ${filename}`, { bytes });
      return true;
    } catch (err) {
      this.danger(`can't save: ${errorMessage(err)}`);
      return false;
    }
  }

  /** Run a command-line string. Returns true when the editor should quit. */
  public execute(commandText: string): boolean {
    const command = parseCommand(commandText);
    this.log.log('command', command);
    switch (command.kind) {
      case 'none':
        return false;
      case 'quit':
        if (!command.force && this.dirty > 0) {
          this.danger('unsaved changes, use q! to force');
          return false;
        }
        return true;
      case 'write':
        if (command.filename !== null) {
          this.text.setFilename(command.filename);
        }
        return this.save() && command.quit;
      case 'unknown':
        this.danger(`unknown command '${command.text}'`);
        return false;
    }
  }

  /** Settle scrolling for the current cursor, then project the frame. */
  public frame(): DrawOp[] {
    this.cursor.scroll(this.modes.kind);
    return renderFrame({
      text: this.text,
      view: this.cursor,
      mode: this.modes.mode,
      dirty: this.dirty,
      diskBytes: this.diskBytes,
      message: this.message,
      modeMessage: this.modeMessage,
      banner: this.banner,
    });
  }
}
