import { EventEmitter } from 'node:events';
import type { ModeKind } from './CursorController.js';

/** First key of a two-key normal-mode sequence (`gg`, `ge`, `dd`). */
export type PendingKey = 'g' | 'd';

export type Mode = { kind: 'normal'; pending: PendingKey | null } | { kind: 'insert' } | { kind: 'command'; text: string };

export interface ModeStateEvents {
  changed: [mode: ModeKind];
}

export class ModeState extends EventEmitter<ModeStateEvents> {
  private _mode: Mode = { kind: 'normal', pending: null };

  public get mode(): Mode {
    return this._mode;
  }

  public get kind(): ModeKind {
    return this._mode.kind;
  }

  public normal(): void {
    this.setMode({ kind: 'normal', pending: null });
  }

  public insert(): void {
    this.setMode({ kind: 'insert' });
  }

  /** Entering command mode always starts from an empty command line */
  public command(): void {
    this.setMode({ kind: 'command', text: '' });
  }

  /** Arm or clear the pending prefix; ignored outside normal mode */
  public setPending(pending: PendingKey | null): void {
    if (this._mode.kind === 'normal') {
      this._mode = { kind: 'normal', pending };
    }
  }

  /** Replace the command-line text; ignored outside command mode */
  public setCommandText(text: string): void {
    if (this._mode.kind === 'command') {
      this._mode = { kind: 'command', text };
    }
  }

  private setMode(mode: Mode): void {
    const previous = this._mode.kind;
    this._mode = mode;
    if (previous !== mode.kind) {
      this.emit('changed', mode.kind);
    }
  }
}
