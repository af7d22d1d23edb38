#!/usr/bin/env node
import { createProgram } from './cli/program.js';
import { getErrorMessage } from './common/logger.js';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(`Error: ${getErrorMessage(error)}`);
    process.exitCode = 1;
  });
