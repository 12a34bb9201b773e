import { loadTextDocument, saveTextDocument } from '@notekeep/durable-file';
import { NotesSession, NotesStore } from '@notekeep/notes-store';
import {
  createLevelLogger,
  describeErrorForLog,
  describeFailure,
  type Logger,
} from '@notekeep/shared';
import yargs from 'yargs';

import { loadConfig, type NotekeepConfig } from './config';
import { formatNoteList } from './format';
import { consoleIo, type CliIo } from './io';
import { NotesShell, runShell } from './shell';

export interface RunCliOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  io?: CliIo;
  logger?: Logger;
  /**
   * Line source for the `shell` command. Defaults to stdin.
   */
  input?: NodeJS.ReadableStream;
}

/**
 * Runs one notekeep command and resolves with the process exit code.
 * Failures are printed as user-facing messages, never thrown.
 */
export async function runCli(argv: string[], options: RunCliOptions = {}): Promise<number> {
  const io = options.io ?? consoleIo;

  let config: NotekeepConfig;
  try {
    config = loadConfig(options.cwd, options.env);
  } catch (err) {
    io.err(err instanceof Error ? err.message : String(err));
    return 1;
  }
  const logger = options.logger ?? createLevelLogger(config.logLevel);
  logger.debug?.(
    `[notekeep] dataDir=${config.dataDir} busyTimeoutMs=${config.busyTimeoutMs}` +
      (config.configPath ? ` config=${config.configPath}` : ''),
  );

  let exitCode = 0;

  const report = (error: unknown): void => {
    io.err(describeFailure(error));
    logger.error(`[notekeep] ${describeErrorForLog(error)}`);
    exitCode = 1;
  };

  const withStore = async (action: (store: NotesStore) => void | Promise<void>): Promise<void> => {
    let store: NotesStore | undefined;
    try {
      store = NotesStore.open(config.dataDir, { busyTimeoutMs: config.busyTimeoutMs, logger });
      await action(store);
    } catch (error) {
      report(error);
    } finally {
      store?.close();
    }
  };

  const parser = yargs(argv)
    .scriptName('notekeep')
    .usage('Usage: $0 <command> [options]')
    .command('init', 'Create the notes store if it does not exist.', {}, async () => {
      await withStore((store) => {
        io.out(`Notes store ready at ${store.filePath}`);
      });
    })
    .command(
      'add',
      'Add a note.',
      {
        title: { type: 'string', describe: 'Note title.', demandOption: true },
        body: { type: 'string', describe: 'Note text.', demandOption: true },
      },
      async (argv) => {
        await withStore((store) => {
          const id = store.insert(argv.title, argv.body);
          io.out(`Added note #${id}`);
        });
      },
    )
    .command(
      'edit',
      'Replace the title and body of a note.',
      {
        id: { type: 'number', describe: 'Note id.', demandOption: true },
        title: { type: 'string', describe: 'New title.', demandOption: true },
        body: { type: 'string', describe: 'New text.', demandOption: true },
      },
      async (argv) => {
        await withStore((store) => {
          const note = store.update(argv.id, argv.title, argv.body);
          io.out(`Updated note #${note.id}`);
        });
      },
    )
    .command(
      'rm',
      'Delete a note.',
      {
        id: { type: 'number', describe: 'Note id.', demandOption: true },
      },
      async (argv) => {
        await withStore((store) => {
          store.delete(argv.id);
          io.out(`Deleted note #${argv.id}`);
        });
      },
    )
    .command(
      'list',
      'List notes, newest first.',
      {
        query: { type: 'string', describe: 'Only show notes containing this text.' },
        json: { type: 'boolean', default: false, describe: 'Output JSON.' },
      },
      async (argv) => {
        await withStore((store) => {
          const notes = store.listAll(argv.query !== undefined ? { query: argv.query } : undefined);
          if (argv.json) {
            io.out(JSON.stringify(notes, null, 2));
            return;
          }
          for (const line of formatNoteList(notes)) {
            io.out(line);
          }
        });
      },
    )
    .command('scratch-get', 'Print the scratchpad text.', {}, async () => {
      try {
        const document = await loadTextDocument(config.scratchpadPath);
        io.out(document ? document.text : '(scratchpad is empty)');
      } catch (error) {
        report(error);
      }
    })
    .command(
      'scratch-set',
      'Replace the scratchpad text.',
      {
        text: { type: 'string', describe: 'New scratchpad text.', demandOption: true },
      },
      async (argv) => {
        try {
          const document = await saveTextDocument(config.scratchpadPath, argv.text);
          io.out(`Saved scratchpad at ${document.savedAt}`);
        } catch (error) {
          report(error);
        }
      },
    )
    .command('shell', 'Edit notes interactively.', {}, async () => {
      await withStore(async (store) => {
        const session = new NotesSession(store, { logger });
        await runShell(new NotesShell(session, io, logger), options.input ?? process.stdin);
      });
    })
    .demandCommand(1, 'You must specify a command')
    .strict()
    .help()
    .version(false)
    .exitProcess(false)
    .fail((message, error) => {
      if (error) {
        report(error);
        return;
      }
      io.err(message);
      exitCode = 1;
    });

  await parser.parseAsync();
  return exitCode;
}
