export { runCli } from './cli';
export type { RunCliOptions } from './cli';
export { ConfigError, loadConfig } from './config';
export type { NotekeepConfig } from './config';
export { formatNote, formatNoteList } from './format';
export { consoleIo } from './io';
export type { CliIo } from './io';
export { NotesShell, runShell } from './shell';
export type { ShellOutcome } from './shell';
