import type { CursorShape, DrawOp, LineStyle } from './renderer.js';

const ESC = '\x1B[';
const cursorTo = (row: number, col: number) => `${ESC}${row + 1};${col + 1}H`;
const clearToEol = `${ESC}K`;
const clearScreen = `${ESC}2J`;
const showCursor = `${ESC}?25h`;
const hideCursorSeq = `${ESC}?25l`;
const resetStyle = `${ESC}0m`;
const inverseOn = `${ESC}7m`;
const dangerOn = `${ESC}1;37;41m`;
const altScreenOn = `${ESC}?1049h`;
const altScreenOff = `${ESC}?1049l`;
const blinkingBlock = `${ESC}1 q`;
const blinkingBar = `${ESC}5 q`;
const defaultShape = `${ESC}0 q`;

const STYLES: Record<LineStyle, string> = {
  plain: '',
  inverse: inverseOn,
  danger: dangerOn,
};

const SHAPES: Record<CursorShape, string> = {
  block: blinkingBlock,
  bar: blinkingBar,
};

/** Encode one frame of draw ops as a single ANSI string. */
export function encodeFrame(ops: readonly DrawOp[]): string {
  let output = '';
  for (const op of ops) {
    switch (op.type) {
      case 'hideCursor':
        output += hideCursorSeq;
        break;
      case 'showCursor':
        output += showCursor;
        break;
      case 'line': {
        const style = STYLES[op.style];
        output += cursorTo(op.row, 0);
        output += style ? `${style}${op.text}${resetStyle}` : op.text;
        output += clearToEol;
        break;
      }
      case 'cursorShape':
        output += SHAPES[op.shape];
        break;
      case 'moveTo':
        output += cursorTo(op.row, op.col);
        break;
    }
  }
  return output;
}

export interface TerminalSize {
  columns: number;
  rows: number;
}

/**
 * The output side of the terminal: alternate screen, cursor shape and frame
 * writes. Raw mode on stdin belongs to EditorApp.
 */
export class Terminal {
  private entered = false;
  public paused = false;

  public constructor(private readonly out: NodeJS.WriteStream = process.stdout) {}

  public get size(): TerminalSize {
    return { columns: this.out.columns || 80, rows: this.out.rows || 24 };
  }

  public enter(): void {
    if (this.entered) {
      return;
    }
    this.entered = true;
    this.out.write(`${altScreenOn}${blinkingBlock}${cursorTo(0, 0)}`);
  }

  public leave(): void {
    if (!this.entered) {
      return;
    }
    this.entered = false;
    this.out.write(`${resetStyle}${clearScreen}${defaultShape}${showCursor}${altScreenOff}`);
  }

  public draw(ops: readonly DrawOp[]): void {
    if (this.paused || !this.entered) {
      return;
    }
    this.out.write(encodeFrame(ops));
  }
}
