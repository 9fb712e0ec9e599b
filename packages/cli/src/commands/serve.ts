/**
 * pagewright serve
 *
 * Start the API server with live previews.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { startServer } from '@pagewright/api';
import { createConsoleLogger, createPagewright } from '@pagewright/core';
import { exitWithError, resolveConfig, withStoreOptions, type StoreOptions } from '../context.js';

interface ServeOptions extends StoreOptions {
  port?: string;
  host?: string;
}

export const serveCommand = withStoreOptions(new Command('serve'))
  .description('Start the Pagewright API server')
  .option('-p, --port <port>', 'Port to listen on')
  .option('--host <host>', 'Host to bind to')
  .action(async (options: ServeOptions) => {
    console.log(chalk.bold('\n  Pagewright Server\n'));

    try {
      const config = resolveConfig(options);
      const port = options.port ? parseInt(options.port, 10) : config.port;
      if (!Number.isInteger(port) || port <= 0) {
        throw new Error(`Invalid port: ${options.port}`);
      }
      const host = options.host ?? config.host;

      console.log(chalk.gray(`  Store: ${config.store}${config.store === 'gcs' ? ` (${config.bucket})` : ` (${config.rootDir})`}`));
      console.log(chalk.gray(`  Starting API server on ${host}:${port}...\n`));

      const services = createPagewright({ config, logger: createConsoleLogger('[pagewright-api]') });
      await startServer({ port, host, services });
    } catch (error) {
      exitWithError('serve', error);
    }
  });
