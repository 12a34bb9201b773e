import readline from 'node:readline';

import { SnapshotView, type Note, type NotesSession } from '@notekeep/notes-store';
import { describeErrorForLog, describeFailure, type Logger } from '@notekeep/shared';

import { formatNoteList } from './format';
import type { CliIo } from './io';

export type ShellOutcome = 'continue' | 'exit';

const HELP_LINES = [
  'Commands:',
  '  add <title> | <body>        Add a note',
  '  edit <id> <title> | <body>  Replace the title and body of a note',
  '  rm <id>                     Delete a note',
  '  list                        Show all notes',
  '  find <text>                 Show notes containing text',
  '  help                        Show this help',
  '  quit                        Leave the shell',
];

const REFRESH_FAILED_MESSAGE =
  'Your change was saved, but the list could not be refreshed. Type "list" to try again.';

function splitTitleAndBody(args: string): { title: string; body: string } | null {
  const separator = args.indexOf('|');
  if (separator === -1) {
    return null;
  }
  return { title: args.slice(0, separator), body: args.slice(separator + 1) };
}

/**
 * Line-oriented front end over a `NotesSession`. The list is re-rendered
 * whenever the session version moves past the one last shown.
 */
export class NotesShell {
  private readonly session: NotesSession;
  private readonly io: CliIo;
  private readonly logger: Logger;
  private readonly view = new SnapshotView<Note>();

  constructor(session: NotesSession, io: CliIo, logger: Logger) {
    this.session = session;
    this.io = io;
    this.logger = logger;
  }

  start(): void {
    this.io.out('Type "help" for commands.');
    this.guard(() => this.render());
  }

  render(): void {
    const { items, refetched } = this.view.sync(this.session.version, () =>
      this.session.listAll(),
    );
    if (refetched) {
      this.print(formatNoteList(items));
    }
  }

  handleLine(line: string): ShellOutcome {
    const match = /^(\S+)\s*([\s\S]*)$/.exec(line.trim());
    if (!match) {
      return 'continue';
    }
    const command = (match[1] ?? '').toLowerCase();
    const args = match[2] ?? '';

    switch (command) {
      case 'quit':
      case 'exit':
        return 'exit';
      case 'help':
        this.print(HELP_LINES);
        return 'continue';
      case 'list':
        this.guard(() => {
          const { items } = this.view.sync(this.session.version, () => this.session.listAll());
          this.print(formatNoteList(items));
        });
        return 'continue';
      case 'find':
        this.guard(() => this.print(formatNoteList(this.session.listAll({ query: args }))));
        return 'continue';
      case 'add':
        this.add(args);
        return 'continue';
      case 'edit':
        this.edit(args);
        return 'continue';
      case 'rm':
        this.remove(args);
        return 'continue';
      default:
        this.io.err(`Unknown command "${command}". Type "help" for commands.`);
        return 'continue';
    }
  }

  private add(args: string): void {
    const fields = splitTitleAndBody(args);
    if (!fields) {
      this.io.err('Usage: add <title> | <body>');
      return;
    }
    const saved = this.guard(() => {
      const { result: id } = this.session.insert(fields.title, fields.body);
      this.io.out(`Added note #${id}`);
    });
    if (saved) {
      this.refresh();
    }
  }

  private edit(args: string): void {
    const match = /^(\d+)\s+([\s\S]*)$/.exec(args);
    const fields = match ? splitTitleAndBody(match[2] ?? '') : null;
    if (!match || !fields) {
      this.io.err('Usage: edit <id> <title> | <body>');
      return;
    }
    const id = Number(match[1]);
    const saved = this.guard(() => {
      this.session.update(id, fields.title, fields.body);
      this.io.out(`Updated note #${id}`);
    });
    if (saved) {
      this.refresh();
    }
  }

  private remove(args: string): void {
    if (!/^\d+$/.test(args)) {
      this.io.err('Usage: rm <id>');
      return;
    }
    const id = Number(args);
    const saved = this.guard(() => {
      this.session.delete(id);
      this.io.out(`Deleted note #${id}`);
    });
    if (saved) {
      this.refresh();
    }
  }

  private print(lines: readonly string[]): void {
    for (const line of lines) {
      this.io.out(line);
    }
  }

  // Failures are reported and the shell keeps running.
  private guard(action: () => void): boolean {
    try {
      action();
      return true;
    } catch (error) {
      this.io.err(describeFailure(error));
      this.logger.error(`[notekeep] ${describeErrorForLog(error)}`);
      return false;
    }
  }

  // The write already succeeded, so a failed re-read must not read as a failed save.
  private refresh(): void {
    try {
      this.render();
    } catch (error) {
      this.io.err(REFRESH_FAILED_MESSAGE);
      this.logger.error(`[notekeep] ${describeErrorForLog(error)}`);
    }
  }
}

export async function runShell(shell: NotesShell, input: NodeJS.ReadableStream): Promise<void> {
  const rl = readline.createInterface({ input, terminal: false });
  shell.start();
  try {
    for await (const line of rl) {
      if (shell.handleLine(line) === 'exit') {
        break;
      }
    }
  } finally {
    rl.close();
  }
}
