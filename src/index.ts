#!/usr/bin/env node
import { runCli } from './cli.js';
import { formatError } from './shared/errors.js';
import { logger } from './shared/logger.js';

runCli(process.argv)
  .then(code => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    logger.error({ err }, 'unexpected failure');
    console.error(formatError(err));
    process.exit(1);
  });
