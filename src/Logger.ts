import { accessSync, appendFileSync, constants, writeFileSync } from 'node:fs';
import { inspect } from 'node:util';
import { DateTimeFormatter, LocalTime } from '@js-joda/core';

const TIME_FORMAT = DateTimeFormatter.ofPattern('HH:mm:ss.SSS');

export function formatLogLine(time: LocalTime, message: string, ...args: unknown[]): string {
  let line = `[${time.format(TIME_FORMAT)}] ${message}`;
  for (const a of args) {
    line += ' ';
    line += typeof a === 'string' ? a : inspect(a, { depth: null, colors: false, breakLength: Infinity, compact: true });
  }
  return line;
}

/**
 * Appends timestamped lines to a debug log.
 * The screen belongs to the editor, so nothing is ever written to stdout.
 * A null path turns every call into a no-op.
 */
export class Logger {
  public constructor(private readonly filePath: string | null) {}

  /** Create the file if needed and verify it is writable. Throws when it is not. */
  public open(): this {
    if (this.filePath === null) {
      return this;
    }
    try {
      accessSync(this.filePath, constants.W_OK);
    } catch {
      writeFileSync(this.filePath, '');
    }
    accessSync(this.filePath, constants.W_OK);
    return this;
  }

  public log(message: string, ...args: unknown[]): void {
    this.append(formatLogLine(LocalTime.now(), message, ...args));
  }

  public error(message: string, err?: unknown): void {
    if (err === undefined) {
      this.append(formatLogLine(LocalTime.now(), `ERROR ${message}`));
    } else {
      this.append(formatLogLine(LocalTime.now(), `ERROR ${message}`, err));
    }
  }

  private append(line: string): void {
    if (this.filePath === null) {
      return;
    }
    appendFileSync(this.filePath, `${line}\n`);
  }
}
