#!/usr/bin/env node
import { resolve } from 'node:path';
import { parseArgs } from 'node:util';
import { generateJsonSchema, initConfig, loadCliConfig } from './cli-config.js';
import { Editor, errorMessage } from './Editor.js';
import { EditorApp } from './EditorApp.js';
import { printUsage, printVersion, welcomeBanner } from './help.js';
import { Logger } from './Logger.js';

const { values, positionals } = parseArgs({
  options: {
    version: { type: 'boolean', short: 'v', default: false },
    help: { type: 'boolean', short: 'h', default: false },
    'init-config': { type: 'boolean', default: false },
    schema: { type: 'boolean', default: false },
  },
  allowPositionals: true,
  strict: false,
});

function fatal(message: string): never {
  // biome-ignore lint/suspicious/noConsole: startup failure before the editor owns the screen
  console.error(`FATAL: ${message}`);
  process.exit(1);
}

if (values.version) {
  // biome-ignore lint/suspicious/noConsole: CLI --version output before app starts
  printVersion(console.log);
  process.exit(0);
}

if (values.help || process.argv.includes('-?')) {
  // biome-ignore lint/suspicious/noConsole: CLI --help output before app starts
  printUsage(console.log);
  process.exit(0);
}

if (values['init-config']) {
  // biome-ignore lint/suspicious/noConsole: CLI --init-config output before app starts
  initConfig(console.log);
  process.exit(0);
}

if (values.schema) {
  process.stdout.write(`${JSON.stringify(generateJsonSchema(), null, 2)}\n`);
  process.exit(0);
}

if (!process.stdin.isTTY || !process.stdout.isTTY) {
  fatal('stdin and stdout must be a terminal');
}

const { config, warnings } = loadCliConfig();

const log = new Logger(config.logFile);
try {
  log.open();
} catch (err) {
  fatal(`Cannot write to log file ${config.logFile}: ${errorMessage(err)}`);
}

const arg = positionals[0];
const filePath = arg !== undefined ? resolve(arg) : null;

let editor: Editor;
try {
  editor = Editor.open(filePath, {
    columns: process.stdout.columns,
    rows: process.stdout.rows,
    tabStop: config.tabStop,
    banner: config.showWelcome ? welcomeBanner() : null,
    log,
  });
} catch (err) {
  fatal(`Cannot open ${filePath}: ${errorMessage(err)}`);
}

log.log(`started, file: ${filePath ?? '(none)'}`, { lines: editor.text.lineCount });
if (warnings.length > 0) {
  editor.danger(warnings.join('; '));
}

const app = new EditorApp(editor, log, { logKeys: config.logKeys });
try {
  await app.run();
} catch (err) {
  log.error('editor stopped', err);
  fatal(errorMessage(err));
}
log.log('exit');
process.exit(0);
