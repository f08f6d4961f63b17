#!/usr/bin/env node
/**
 * md-wiki-import - CLI entry point
 */

import { run } from './cli/index.js';
import { describeError } from './core/errors.js';
import { logger } from './util/logger.js';

run().then(
  () => process.exit(0),
  (error: unknown) => {
    logger.error(error instanceof Error ? error.message : String(error), describeError(error));
    process.exit(1);
  }
);
