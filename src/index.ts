#!/usr/bin/env node
// Load environment variables first
import 'dotenv/config';

import { createLogger } from './utils/logger.js';
import { ReadlineConsoleAdapter } from './adapters/console/ReadlineConsoleAdapter.js';
import { startCli } from './cli/startCli.js';

const logger = createLogger({ component: 'index' });

async function main(): Promise<void> {
  const consoleAdapter = new ReadlineConsoleAdapter();

  // Ctrl-C closes the console; the prompt stops before the next city and exits.
  process.once('SIGINT', () => consoleAdapter.close());

  process.exitCode = await startCli({
    env: process.env,
    consolePort: consoleAdapter,
    errorOutput: process.stderr,
  });
}

main().catch((error) => {
  logger.fatal({ error }, 'Unhandled error');
  process.exit(1);
});
