/**
 * Command-line parsing.
 * A command is a verb and at most one argument separated by a single space.
 */

export type Command =
  | { kind: 'none' }
  | { kind: 'quit'; force: boolean }
  | { kind: 'write'; filename: string | null; quit: boolean }
  | { kind: 'unknown'; text: string };

export function parseCommand(text: string): Command {
  if (text === '') {
    return { kind: 'none' };
  }
  const tokens = text.split(' ');
  if (tokens.length > 2) {
    return { kind: 'unknown', text };
  }
  const verb = tokens[0];
  const arg: string | undefined = tokens[1];

  switch (verb) {
    case 'q':
    case 'q!':
      return arg === undefined ? { kind: 'quit', force: verb === 'q!' } : { kind: 'unknown', text };
    case 'w':
    case 'wq':
      if (arg === '') {
        return { kind: 'unknown', text };
      }
      return { kind: 'write', filename: arg ?? null, quit: verb === 'wq' };
    default:
      return { kind: 'unknown', text };
  }
}
