/**
 * Command context
 * Store flags shared by every command and the wiring they open.
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import {
  createPagewright,
  errorMessage,
  loadConfig,
  parseStoreKind,
  SiteNotInitializedError,
  type Pagewright,
  type PagewrightConfig,
} from '@pagewright/core';
import { createCommandLogger, getLogPath, logFullError } from './logger.js';

export interface StoreOptions {
  store?: string;
  root?: string;
  bucket?: string;
  definitions?: string;
}

/**
 * Add the --store/--root/--bucket/--definitions flags to a command
 */
export function withStoreOptions(command: Command): Command {
  return command
    .option('--store <kind>', 'Object store backend: fs, gcs or memory')
    .option('--root <dir>', 'Site directory for the fs store')
    .option('--bucket <name>', 'Bucket for the gcs store')
    .option('--definitions <dir>', 'Directory with component, color scheme and template definitions');
}

/**
 * Environment configuration with command-line flags on top
 */
export function resolveConfig(options: StoreOptions, env: NodeJS.ProcessEnv = process.env): PagewrightConfig {
  const config = loadConfig(env);
  return {
    ...config,
    store: options.store ? parseStoreKind(options.store) : config.store,
    rootDir: options.root ?? config.rootDir,
    bucket: options.bucket ?? config.bucket,
    definitionsDir: options.definitions ?? config.definitionsDir,
  };
}

/**
 * Open the site selected by the flags, logging to the debug log
 */
export function openSite(options: StoreOptions, commandName: string): Pagewright {
  const logger = createCommandLogger(commandName);
  const config = resolveConfig(options);
  logger.command(commandName, { store: config.store, rootDir: config.rootDir, bucket: config.bucket });
  return createPagewright({ config, logger });
}

/**
 * Print a failed command's error and exit with status 1
 */
export function exitWithError(context: string, error: unknown): never {
  logFullError(context, error);
  console.log(chalk.red(`\n  Error: ${errorMessage(error)}\n`));
  if (error instanceof SiteNotInitializedError) {
    console.log(chalk.gray('  Run `pagewright init` to create the site.\n'));
  }
  console.log(chalk.gray(`  Details: ${getLogPath()}\n`));
  process.exit(1);
}
