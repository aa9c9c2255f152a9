/**
 * Frame projection.
 * Turns buffer, cursor and mode into a list of draw ops. Nothing here scrolls
 * or mutates: offsets must already be settled by CursorController.scroll().
 */

import { basename } from 'node:path';
import type { CursorController } from './CursorController.js';
import type { LineBuffer } from './LineBuffer.js';
import type { Mode } from './ModeState.js';
import { StatusLineBuilder } from './StatusLineBuilder.js';

export type MessageLevel = 'info' | 'danger';

export interface Message {
  text: string;
  level: MessageLevel;
}

export type LineStyle = 'plain' | 'inverse' | 'danger';

export type CursorShape = 'block' | 'bar';

export type DrawOp =
  | { type: 'hideCursor' }
  | { type: 'showCursor' }
  | { type: 'line'; row: number; text: string; style: LineStyle }
  | { type: 'cursorShape'; shape: CursorShape }
  | { type: 'moveTo'; row: number; col: number };

export type BufferView = Pick<LineBuffer, 'lineCount' | 'getRendered' | 'filename' | 'isBlank'>;

export type ViewportView = Pick<CursorController, 'cx' | 'cy' | 'rx' | 'cmdx' | 'xOffset' | 'yOffset' | 'columns' | 'textRows'>;

export interface FrameInput {
  text: BufferView;
  view: ViewportView;
  mode: Mode;
  dirty: number;
  diskBytes: number;
  /** Result of the last command; shown in preference to the mode message */
  message: Message | null;
  modeMessage: string | null;
  /** Welcome line for an empty buffer, null to disable */
  banner: string | null;
}

export function welcomeLine(banner: string, columns: number): string {
  const text = banner.slice(0, columns);
  const padding = Math.floor((columns - text.length) / 2);
  if (padding <= 0) {
    return text;
  }
  return `~${' '.repeat(padding - 1)}${text}`;
}

function textRow(input: FrameInput, screenRow: number): string {
  const { text, view, banner } = input;
  const fileRow = screenRow + view.yOffset;
  if (fileRow >= text.lineCount) {
    if (banner !== null && text.isBlank && screenRow === Math.floor(view.textRows / 2)) {
      return welcomeLine(banner, view.columns);
    }
    return '~';
  }
  return text.getRendered(fileRow).slice(view.xOffset, view.xOffset + view.columns);
}

export function statusBar(input: FrameInput): string {
  const { text, view, dirty, diskBytes } = input;
  const b = new StatusLineBuilder(view.columns);
  b.text(text.filename !== null ? `"${basename(text.filename)}"` : 'No name');
  if (dirty > 0) {
    b.text(' [+]');
  }
  b.text(` - ${text.lineCount} lines, ${diskBytes} bytes`);
  return b.fill(`${view.cy + 1}:${view.cx + 1}/${view.rx + 1}`);
}

function messageLine(input: FrameInput): { text: string; style: LineStyle } {
  const { mode, message, modeMessage, view } = input;
  if (mode.kind === 'command') {
    return { text: `:${mode.text}`.slice(0, view.columns), style: 'plain' };
  }
  if (message !== null) {
    return { text: message.text.slice(0, view.columns), style: message.level === 'danger' ? 'danger' : 'plain' };
  }
  return { text: (modeMessage ?? '').slice(0, view.columns), style: 'plain' };
}

export function renderFrame(input: FrameInput): DrawOp[] {
  const { view, mode } = input;
  const ops: DrawOp[] = [{ type: 'hideCursor' }];

  for (let row = 0; row < view.textRows; row++) {
    ops.push({ type: 'line', row, text: textRow(input, row), style: 'plain' });
  }
  ops.push({ type: 'line', row: view.textRows, text: statusBar(input), style: 'inverse' });
  const message = messageLine(input);
  ops.push({ type: 'line', row: view.textRows + 1, ...message });

  ops.push({ type: 'cursorShape', shape: mode.kind === 'normal' ? 'block' : 'bar' });
  if (mode.kind === 'command') {
    ops.push({ type: 'moveTo', row: view.textRows + 1, col: Math.min(view.cmdx, view.columns - 1) });
  } else {
    ops.push({ type: 'moveTo', row: view.cy - view.yOffset, col: view.rx - view.xOffset });
  }
  ops.push({ type: 'showCursor' });
  return ops;
}
