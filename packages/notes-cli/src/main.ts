import { hideBin } from 'yargs/helpers';

import { runCli } from './cli';

runCli(hideBin(process.argv)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error('Error:', err instanceof Error ? err.message : err);
    process.exitCode = 1;
  },
);
