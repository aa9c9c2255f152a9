import { existsSync, readFileSync, statSync, writeFileSync } from 'node:fs';

/**
 * Read a file as lines.
 * Returns null when the file does not exist, any other failure (permissions,
 * a directory) is thrown to the caller.
 */
export function readLines(filePath: string): string[] | null {
  if (!existsSync(filePath)) {
    return null;
  }
  const content = readFileSync(filePath, 'utf8');
  const lines = content.split('\n').map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line));
  // A final terminator ends the last line rather than starting a new one
  if (lines.length > 1 && content.endsWith('\n')) {
    lines.pop();
  }
  return lines;
}

/** Write lines joined by `\n`, creating or truncating the file. Returns the bytes written. */
export function writeLines(filePath: string, lines: readonly string[]): number {
  const data = Buffer.from(lines.join('\n'), 'utf8');
  writeFileSync(filePath, data);
  return data.byteLength;
}

export function fileSize(filePath: string | null): number {
  if (filePath === null || !existsSync(filePath)) {
    return 0;
  }
  return statSync(filePath).size;
}
