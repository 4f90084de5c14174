#!/usr/bin/env node
import { cli } from './cli.js';
import { exitCodeFor } from './lib/errors.js';

cli.parseAsync(process.argv).catch((error: unknown) => {
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  process.exitCode = exitCodeFor(error);
});
