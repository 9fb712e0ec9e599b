/**
 * @pagewright/cli
 *
 * CLI entry point for Pagewright commands.
 */

import chalk from 'chalk';
import { errorMessage } from '@pagewright/core';
import { createProgram } from './program.js';

createProgram()
  .parseAsync()
  .catch((error: unknown) => {
    console.error(chalk.red(`\n  Error: ${errorMessage(error)}\n`));
    process.exit(1);
  });
