/**
 * Ordered lines of the document, each with its tab-expanded render.
 * The render of a line is recomputed whenever its raw text changes.
 */

import { readLines } from './files.js';

export const DEFAULT_TAB_STOP = 8;

export interface Line {
  raw: string;
  rendered: string;
}

/** Read-only view used by motions and the renderer. */
export interface TextSource {
  readonly lineCount: number;
  getRaw(row: number): string;
}

export function renderLine(raw: string, tabStop: number): string {
  let out = '';
  for (let i = 0; i < raw.length; i++) {
    out += raw[i] === '\t' ? ' '.repeat(tabStop - (out.length % tabStop)) : raw[i];
  }
  return out;
}

export class LineBuffer implements TextSource {
  private readonly rows: Line[];
  private _filename: string | null;

  public constructor(
    private readonly tabStop: number = DEFAULT_TAB_STOP,
    lines: readonly string[] = [''],
    filename: string | null = null,
  ) {
    this.rows = (lines.length > 0 ? lines : ['']).map((raw) => this.makeLine(raw));
    this._filename = filename;
  }

  /** A missing file gives an empty buffer still associated with the path. */
  public static load(filePath: string | null, tabStop: number = DEFAULT_TAB_STOP): LineBuffer {
    if (filePath === null) {
      return new LineBuffer(tabStop);
    }
    const lines = readLines(filePath);
    return new LineBuffer(tabStop, lines ?? [''], filePath);
  }

  public get filename(): string | null {
    return this._filename;
  }

  public get lineCount(): number {
    return this.rows.length;
  }

  public setFilename(name: string): void {
    this._filename = name;
  }

  public getRaw(row: number): string {
    return this.line(row).raw;
  }

  public getRendered(row: number): string {
    return this.line(row).rendered;
  }

  public lines(): string[] {
    return this.rows.map((l) => l.raw);
  }

  /** True when the buffer holds nothing but one empty line. */
  public get isBlank(): boolean {
    return this.rows.length === 1 && this.rows[0].raw === '';
  }

  public insertLine(at: number, content: string): void {
    if (at < 0 || at > this.rows.length) {
      throw new RangeError(`insertLine: row ${at} out of range 0..${this.rows.length}`);
    }
    this.rows.splice(at, 0, this.makeLine(content));
  }

  /** Returns false when the buffer was a lone empty line and nothing changed. */
  public deleteLine(row: number): boolean {
    const { raw } = this.line(row);
    if (this.rows.length === 1) {
      this.setRaw(0, '');
      return raw !== '';
    }
    this.rows.splice(row, 1);
    return true;
  }

  public joinWithPrevious(row: number): void {
    if (row === 0) {
      throw new RangeError('joinWithPrevious: row 0 has no previous line');
    }
    const current = this.getRaw(row);
    this.setRaw(row - 1, this.getRaw(row - 1) + current);
    this.rows.splice(row, 1);
  }

  /** Break a line at `col`; the tail becomes a new line directly below. */
  public splitLine(row: number, col: number): void {
    const raw = this.getRaw(row);
    this.setRaw(row, raw.slice(0, col));
    this.insertLine(row + 1, raw.slice(col));
  }

  public insertChar(row: number, col: number, ch: string): void {
    const raw = this.getRaw(row);
    const at = Math.min(Math.max(col, 0), raw.length);
    this.setRaw(row, raw.slice(0, at) + ch + raw.slice(at));
  }

  public deleteChar(row: number, col: number): void {
    const raw = this.getRaw(row);
    if (col < 0 || col >= raw.length) {
      return;
    }
    this.setRaw(row, raw.slice(0, col) + raw.slice(col + 1));
  }

  private setRaw(row: number, raw: string): void {
    this.rows[row] = this.makeLine(raw);
  }

  private makeLine(raw: string): Line {
    return { raw, rendered: renderLine(raw, this.tabStop) };
  }

  private line(row: number): Line {
    const line = this.rows[row];
    if (line === undefined) {
      throw new RangeError(`row ${row} out of range 0..${this.rows.length - 1}`);
    }
    return line;
  }
}
