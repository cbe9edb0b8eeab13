#!/usr/bin/env node

/**
 * CLI entry point for the site mapper
 */

import { buildProgram } from './cli';
import { errorMessage } from './utils/errors';
import { logger } from './utils/logger';

buildProgram()
  .parseAsync()
  .catch((error: unknown) => {
    logger.error({ error: errorMessage(error) }, 'Unexpected failure');
    process.exitCode = 1;
  });
