/**
 * Cursor and viewport.
 * Buffer coordinates (cx, cy), render column (rx) and scroll offsets.
 * Motions are clamped to the buffer, never wrapped and never thrown.
 */

import { DEFAULT_TAB_STOP, type TextSource } from './LineBuffer.js';
import { nextWordEnd, nextWordStart, type Position, prevWord } from './motions.js';

export type ModeKind = 'normal' | 'insert' | 'command';

export type Direction = 'up' | 'down' | 'left' | 'right';

/** Highest column the cursor may take on a line of `length` characters. */
export function maxColumn(length: number, mode: ModeKind): number {
  return mode === 'normal' ? Math.max(length - 1, 0) : length;
}

export function renderColumn(raw: string, cx: number, tabStop: number): number {
  let rx = 0;
  for (let i = 0; i < cx && i < raw.length; i++) {
    if (raw[i] === '\t') {
      rx += tabStop - 1 - (rx % tabStop);
    }
    rx++;
  }
  return rx;
}

export class CursorController {
  public cx = 0;
  public cy = 0;
  public rx = 0;
  public cmdx = 1;
  public xOffset = 0;
  public yOffset = 0;

  public constructor(
    private readonly text: TextSource,
    public columns: number,
    public textRows: number,
    private readonly tabStop: number = DEFAULT_TAB_STOP,
  ) {}

  public get position(): Position {
    return { row: this.cy, col: this.cx };
  }

  public resize(columns: number, textRows: number): void {
    this.columns = Math.max(columns, 1);
    this.textRows = Math.max(textRows, 1);
  }

  public move(direction: Direction, mode: ModeKind): void {
    switch (direction) {
      case 'up':
        this.cy = Math.max(this.cy - 1, 0);
        this.clampColumn(mode);
        break;
      case 'down':
        this.cy = Math.min(this.cy + 1, this.text.lineCount - 1);
        this.clampColumn(mode);
        break;
      case 'left':
        this.cx = Math.max(this.cx - 1, 0);
        break;
      case 'right': {
        const raw = this.text.getRaw(this.cy);
        const step = raw[this.cx + 1] === '\t' ? 2 : 1;
        this.cx = Math.min(this.cx + step, maxColumn(raw.length, mode));
        break;
      }
    }
  }

  public gotoRow(row: number, mode: ModeKind): void {
    this.cy = Math.min(Math.max(row, 0), this.text.lineCount - 1);
    this.clampColumn(mode);
  }

  public gotoColumn(col: number, mode: ModeKind): void {
    this.cx = Math.min(Math.max(col, 0), maxColumn(this.text.getRaw(this.cy).length, mode));
  }

  public gotoLineStart(): void {
    const first = this.text.getRaw(this.cy).search(/\S/);
    this.cx = first === -1 ? 0 : first;
  }

  public gotoLineEnd(mode: ModeKind): void {
    this.cx = maxColumn(this.text.getRaw(this.cy).length, mode);
  }

  public nextWord(toEnd: boolean): void {
    this.moveTo(toEnd ? nextWordEnd(this.text, this.position) : nextWordStart(this.text, this.position));
  }

  public prevWord(toStart: boolean): void {
    this.moveTo(prevWord(this.text, this.position, toStart));
  }

  /** Re-clamp after the buffer changed underneath the cursor. */
  public clamp(mode: ModeKind): void {
    this.cy = Math.min(Math.max(this.cy, 0), this.text.lineCount - 1);
    this.clampColumn(mode);
  }

  public resetCommandCursor(): void {
    this.cmdx = 1;
  }

  public moveCommandCursor(delta: number, textLength: number): void {
    this.cmdx = Math.min(Math.max(this.cmdx + delta, 1), textLength + 1);
  }

  /** Recompute rx and bring the cursor into view with the smallest offsets. */
  public scroll(mode: ModeKind): void {
    const raw = this.text.getRaw(this.cy);
    if (mode === 'normal' && this.cx === 0 && raw[0] === '\t' && raw.length > 1) {
      this.cx = 1;
    }
    this.rx = renderColumn(raw, this.cx, this.tabStop);

    this.yOffset = Math.min(this.yOffset, this.cy);
    if (this.cy >= this.yOffset + this.textRows) {
      this.yOffset = this.cy - this.textRows + 1;
    }

    this.xOffset = Math.min(this.xOffset, this.rx);
    if (this.rx >= this.xOffset + this.columns) {
      this.xOffset = this.rx - this.columns + 1;
    }
  }

  private moveTo(pos: Position): void {
    this.cy = pos.row;
    this.cx = pos.col;
  }

  private clampColumn(mode: ModeKind): void {
    this.cx = Math.min(this.cx, maxColumn(this.text.getRaw(this.cy).length, mode));
  }
}
