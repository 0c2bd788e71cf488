#!/usr/bin/env node

/**
 * mbridge CLI
 *
 * Main entry point
 */

import signale from 'signale';
import { createProgram } from './program.js';

createProgram()
  .parseAsync()
  .catch((error: unknown) => {
    signale.error(error);
    process.exitCode = 1;
  });
