#!/usr/bin/env node

/**
 * CLI entry point: `doc2md <input> <output>`.
 */

import { runCli } from './program.js';
import { logger } from '../util/logger.js';

runCli(process.argv.slice(2))
  .then(code => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error('Unexpected failure', { error: error instanceof Error ? error.message : String(error) });
    process.exitCode = 1;
  });
