/**
 * Vim-style word motions.
 * Pure functions over a TextSource: take a position, return the new one.
 */

import type { TextSource } from './LineBuffer.js';

export interface Position {
  row: number;
  col: number;
}

export type CharClass = 'word' | 'punct' | 'space';

export function charClass(ch: string | undefined): CharClass {
  if (ch === undefined || /\s/.test(ch)) {
    return 'space';
  }
  if (/[\p{L}\p{N}_]/u.test(ch)) {
    return 'word';
  }
  return 'punct';
}

function lastCol(line: string): number {
  return Math.max(line.length - 1, 0);
}

/** `w`: start of the next run. */
export function nextWordStart(text: TextSource, pos: Position): Position {
  const line = text.getRaw(pos.row);
  const hasNext = pos.row + 1 < text.lineCount;
  if (pos.col >= line.length - 1) {
    return hasNext ? { row: pos.row + 1, col: 0 } : pos;
  }

  let i = pos.col;
  const cls = charClass(line[i]);
  if (cls !== 'space') {
    while (i < line.length && charClass(line[i]) === cls) i++;
  }
  while (i < line.length && charClass(line[i]) === 'space') i++;

  if (i < line.length) {
    return { row: pos.row, col: i };
  }
  return hasNext ? { row: pos.row + 1, col: 0 } : { row: pos.row, col: lastCol(line) };
}

/** `e`: last character of the next run, crossing lines. */
export function nextWordEnd(text: TextSource, pos: Position): Position {
  let row = pos.row;
  let line = text.getRaw(row);
  let i = pos.col + 1;

  for (;;) {
    while (i < line.length && charClass(line[i]) === 'space') i++;
    if (i < line.length) {
      break;
    }
    if (row + 1 >= text.lineCount) {
      return pos;
    }
    row++;
    line = text.getRaw(row);
    i = 0;
  }

  const cls = charClass(line[i]);
  while (i + 1 < line.length && charClass(line[i + 1]) === cls) i++;
  return { row, col: i };
}

/**
 * `b` and `ge` (toStart): walk back past the current run and any whitespace.
 * `b` stops at the first boundary, the end of the previous run; `ge` continues
 * to that run's start.
 */
export function prevWord(text: TextSource, pos: Position, toStart: boolean): Position {
  if (pos.col === 0) {
    if (pos.row === 0) {
      return pos;
    }
    return { row: pos.row - 1, col: lastCol(text.getRaw(pos.row - 1)) };
  }

  const line = text.getRaw(pos.row);
  let i = Math.min(pos.col, line.length);

  if (toStart) {
    i--;
    while (i > 0 && charClass(line[i]) === 'space') i--;
    const cls = charClass(line[i]);
    while (i > 0 && charClass(line[i - 1]) === cls) i--;
    return { row: pos.row, col: i };
  }

  const cls = charClass(line[i]);
  if (cls !== 'space') {
    while (i > 0 && charClass(line[i - 1]) === cls) i--;
  }
  i--;
  while (i >= 0 && charClass(line[i]) === 'space') i--;
  if (i >= 0) {
    return { row: pos.row, col: i };
  }
  if (pos.row === 0) {
    return { row: 0, col: 0 };
  }
  return { row: pos.row - 1, col: lastCol(text.getRaw(pos.row - 1)) };
}
