/**
 * Keyboard input handler using Node's readline keypress parser.
 * Translates Node keypress events into named KeyAction types.
 *
 * readline.emitKeypressEvents() takes care of CSI/SS3 sequences, modifier
 * detection and buffering of partial escape sequences, so the editor core
 * only ever sees logical keys.
 */

import readline from 'node:readline';

export type KeyAction =
  | { type: 'char'; value: string }
  | { type: 'ctrl'; value: string }
  | { type: 'enter' }
  | { type: 'tab' }
  | { type: 'backspace' }
  | { type: 'delete' }
  | { type: 'left' }
  | { type: 'right' }
  | { type: 'up' }
  | { type: 'down' }
  | { type: 'home' }
  | { type: 'end' }
  | { type: 'escape' }
  | { type: 'unknown'; raw: string };

export interface NodeKey {
  sequence: string;
  name: string | undefined;
  ctrl: boolean;
  meta: boolean;
  shift: boolean;
}

/** readline key names the editor reacts to */
const NAMED_KEYS: ReadonlyMap<string, KeyAction> = new Map<string, KeyAction>([
  ['return', { type: 'enter' }],
  ['enter', { type: 'enter' }],
  ['tab', { type: 'tab' }],
  ['backspace', { type: 'backspace' }],
  ['delete', { type: 'delete' }],
  ['left', { type: 'left' }],
  ['right', { type: 'right' }],
  ['up', { type: 'up' }],
  ['down', { type: 'down' }],
  ['home', { type: 'home' }],
  ['end', { type: 'end' }],
  ['escape', { type: 'escape' }],
]);

/**
 * Translate a Node readline keypress event into our KeyAction type.
 */
export function translateKey(ch: string | undefined, key: NodeKey | undefined): KeyAction | null {
  const name = key?.name;
  const ctrl = key?.ctrl ?? false;
  const sequence = key?.sequence ?? ch ?? '';

  // Ctrl+letter, e.g. Ctrl+Q
  if (ctrl && name !== undefined && /^[a-z]$/.test(name)) {
    return { type: 'ctrl', value: name };
  }

  const named = name === undefined ? undefined : NAMED_KEYS.get(name);
  if (named !== undefined) {
    return named;
  }

  // Regular printable character (supports multi-byte Unicode like emoji)
  if (ch && [...ch].length === 1 && ch >= ' ' && ch !== '\x7f') {
    return { type: 'char', value: ch };
  }

  // Unknown - only if we got some input we couldn't translate
  if (sequence) {
    return { type: 'unknown', raw: JSON.stringify(sequence) };
  }

  return null;
}

/**
 * Set up readline keypress events on stdin and call the handler for each translated KeyAction.
 * Returns a cleanup function to remove the listener.
 */
export function setupKeypressHandler(handler: (key: KeyAction) => void): () => void {
  readline.emitKeypressEvents(process.stdin);

  const onKeypress = (ch: string | undefined, key: NodeKey | undefined): void => {
    const action = translateKey(ch, key);
    if (action) {
      handler(action);
    }
  };

  process.stdin.on('keypress', onKeypress);

  return () => {
    process.stdin.removeListener('keypress', onKeypress);
  };
}
