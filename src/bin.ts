#!/usr/bin/env node
import { createCli } from './cli/index.js';
import { logger } from './utils/logger.js';
import { ExitCodes } from './utils/errors.js';

createCli()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    logger.error('Unexpected failure', error instanceof Error ? error : { error: String(error) });
    process.exit(ExitCodes.FAILURE);
  });
