import { versionInfo } from './version.js';

type Log = (msg: string) => void;

export function welcomeBanner(): string {
  return `Stanza editor -- version ${versionInfo.version}`;
}

export function printVersion(log: Log): void {
  log(`${versionInfo.name} ${versionInfo.version}`);
}

export function printUsage(log: Log): void {
  log(`${versionInfo.name} ${versionInfo.version}`);
  log('');
  log(`Usage: ${versionInfo.name} [options] [file]`);
  log('');
  log('Options:');
  log('  -v, --version  Show version information');
  log('  -h, --help, -? Show this help message');
  log('  --init-config  Write the default config file');
  log('  --schema       Print the JSON schema of the config file');
  log('');
  printHelp(log);
}

export function printHelp(log: Log): void {
  log('Normal mode:');
  log('  h j k l, arrows       Move');
  log('  0 ^ $                 Line start, first non-blank, line end');
  log('  gg G                  First line, last line');
  log('  w e b ge              Word motions');
  log('  x dd                  Delete character, delete line');
  log('  i a I A o O           Enter insert mode');
  log('  :                     Command line');
  log('');
  log('Commands:');
  log('  :w [file]             Save');
  log('  :wq [file]            Save and quit');
  log('  :q                    Quit (refuses with unsaved changes)');
  log('  :q!                   Quit, discarding changes');
  log('');
  log('Controls:');
  log('  Escape                Back to normal mode');
  log('  Ctrl+Q                Quit (any mode)');
}
