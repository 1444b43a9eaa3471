import { config as loadEnv } from 'dotenv';

import { main } from './cli.js';

loadEnv();

main(process.argv.slice(2), process.env).then(
  code => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  }
);
