/**
 * Modal key dispatch.
 * Routes one KeyAction to the Editor according to the current mode. Two-key
 * normal-mode sequences (gg, ge, dd) go through the pending prefix carried by
 * the normal-mode variant of Mode.
 */

import type { Editor } from './Editor.js';
import type { KeyAction } from './input.js';
import type { PendingKey } from './ModeState.js';

export type KeyOutcome = 'continue' | 'quit';

export const INSERT_MESSAGE = '-- INSERT --';
export const QUIT_HINT = 'Type :q! or press Ctrl+Q to quit';

export function enterInsert(editor: Editor): void {
  editor.modes.insert();
  editor.message = null;
  editor.modeMessage = INSERT_MESSAGE;
}

export function enterNormal(editor: Editor): void {
  editor.modes.normal();
  editor.modeMessage = null;
  editor.cursor.clamp('normal');
}

export function enterCommand(editor: Editor): void {
  editor.modes.command();
  editor.cursor.resetCommandCursor();
  editor.message = null;
  editor.modeMessage = null;
}

function completeSequence(editor: Editor, pending: PendingKey, ch: string): boolean {
  switch (`${pending}${ch}`) {
    case 'gg':
      editor.cursor.gotoRow(0, 'normal');
      return true;
    case 'ge':
      editor.cursor.prevWord(true);
      return true;
    case 'dd':
      editor.deleteLine();
      return true;
    default:
      return false;
  }
}

function normalChar(editor: Editor, ch: string): void {
  const { cursor, modes } = editor;
  switch (ch) {
    case 'h':
      cursor.move('left', 'normal');
      break;
    case 'l':
      cursor.move('right', 'normal');
      break;
    case 'j':
      cursor.move('down', 'normal');
      break;
    case 'k':
      cursor.move('up', 'normal');
      break;
    case '0':
      cursor.gotoColumn(0, 'normal');
      break;
    case '^':
      cursor.gotoLineStart();
      break;
    case '$':
      cursor.gotoLineEnd('normal');
      break;
    case 'G':
      cursor.gotoRow(editor.text.lineCount - 1, 'normal');
      break;
    case 'g':
    case 'd':
      modes.setPending(ch);
      break;
    case 'w':
      cursor.nextWord(false);
      break;
    case 'e':
      cursor.nextWord(true);
      break;
    case 'b':
      cursor.prevWord(false);
      break;
    case 'x':
      editor.deleteCharUnderCursor();
      break;
    case 'i':
      enterInsert(editor);
      break;
    case 'a':
      enterInsert(editor);
      cursor.gotoColumn(cursor.cx + 1, 'insert');
      break;
    case 'I':
      enterInsert(editor);
      cursor.gotoLineStart();
      break;
    case 'A':
      enterInsert(editor);
      cursor.gotoLineEnd('insert');
      break;
    case 'o':
      editor.openLine(true);
      enterInsert(editor);
      break;
    case 'O':
      editor.openLine(false);
      enterInsert(editor);
      break;
    case ':':
      enterCommand(editor);
      break;
  }
}

function handleNormal(editor: Editor, key: KeyAction, pending: PendingKey | null): void {
  const { cursor } = editor;
  editor.modes.setPending(null);

  if (pending !== null && key.type === 'char' && completeSequence(editor, pending, key.value)) {
    return;
  }

  switch (key.type) {
    case 'char':
      normalChar(editor, key.value);
      break;
    case 'left':
    case 'right':
    case 'up':
    case 'down':
      cursor.move(key.type, 'normal');
      break;
    case 'backspace':
      cursor.move('left', 'normal');
      break;
    case 'enter':
      cursor.move('down', 'normal');
      break;
    case 'home':
      cursor.gotoColumn(0, 'normal');
      break;
    case 'end':
      cursor.gotoLineEnd('normal');
      break;
    case 'delete':
      editor.deleteCharUnderCursor();
      break;
    case 'tab':
    case 'escape':
    case 'ctrl':
    case 'unknown':
      break;
  }
}

function handleInsert(editor: Editor, key: KeyAction): void {
  const { cursor } = editor;
  switch (key.type) {
    case 'escape':
      cursor.move('left', 'insert');
      enterNormal(editor);
      break;
    case 'char':
      editor.insertChar(key.value);
      break;
    case 'tab':
      editor.insertChar('\t');
      break;
    case 'enter':
      editor.breakLine();
      break;
    case 'backspace':
      editor.backspace();
      break;
    case 'delete':
      editor.deleteCharUnderCursor();
      break;
    case 'left':
    case 'right':
    case 'up':
    case 'down':
      cursor.move(key.type, 'insert');
      break;
    case 'home':
      cursor.gotoColumn(0, 'insert');
      break;
    case 'end':
      cursor.gotoLineEnd('insert');
      break;
    case 'ctrl':
    case 'unknown':
      break;
  }
}

function handleCommand(editor: Editor, key: KeyAction, text: string): KeyOutcome {
  const { cursor, modes } = editor;
  const at = cursor.cmdx - 1;
  switch (key.type) {
    case 'escape':
      enterNormal(editor);
      break;
    case 'enter':
      if (editor.execute(text)) {
        return 'quit';
      }
      enterNormal(editor);
      break;
    case 'char': {
      const next = text.slice(0, at) + key.value + text.slice(at);
      modes.setCommandText(next);
      cursor.moveCommandCursor(key.value.length, next.length);
      break;
    }
    case 'backspace':
      if (at > 0) {
        const next = text.slice(0, at - 1) + text.slice(at);
        modes.setCommandText(next);
        cursor.moveCommandCursor(-1, next.length);
      }
      break;
    case 'left':
      cursor.moveCommandCursor(-1, text.length);
      break;
    case 'right':
      cursor.moveCommandCursor(1, text.length);
      break;
    case 'home':
      cursor.resetCommandCursor();
      break;
    case 'end':
      cursor.moveCommandCursor(text.length, text.length);
      break;
    case 'tab':
    case 'delete':
    case 'up':
    case 'down':
    case 'ctrl':
    case 'unknown':
      break;
  }
  return 'continue';
}

/** Process one key. Ctrl+Q quits from any mode. */
export function dispatchKey(editor: Editor, key: KeyAction): KeyOutcome {
  if (key.type === 'ctrl') {
    if (key.value === 'q') {
      return 'quit';
    }
    if (key.value === 'c') {
      editor.info(QUIT_HINT);
      return 'continue';
    }
  }

  const mode = editor.modes.mode;
  switch (mode.kind) {
    case 'normal':
      handleNormal(editor, key, mode.pending);
      return 'continue';
    case 'insert':
      handleInsert(editor, key);
      return 'continue';
    case 'command':
      return handleCommand(editor, key, mode.text);
  }
}
