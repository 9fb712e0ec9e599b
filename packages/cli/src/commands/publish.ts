/**
 * pagewright publish
 *
 * Render pages and write them to their public filenames.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { exitWithError, openSite, withStoreOptions, type StoreOptions } from '../context.js';
import { formatBytes } from '../output.js';

interface PublishOptions extends StoreOptions {
  json?: boolean;
}

export const publishCommand = withStoreOptions(new Command('publish'))
  .description('Publish one page, or every page when none is given')
  .argument('[page]', 'Page id')
  .option('--json', 'Output as JSON')
  .action(async (pageId: string | undefined, options: PublishOptions) => {
    const { lifecycle } = openSite(options, 'publish');

    if (pageId) {
      const spinner = options.json ? null : ora(`Publishing ${pageId}...`).start();
      try {
        const artifact = await lifecycle.publishPage(pageId);
        if (options.json) {
          console.log(JSON.stringify(artifact, null, 2));
        } else {
          spinner?.succeed(`Published ${chalk.green(artifact.key)} ${chalk.gray(`(${formatBytes(artifact.bytes)})`)}`);
        }
      } catch (error) {
        spinner?.fail(`Failed to publish ${pageId}`);
        exitWithError('publish', error);
      }
      return;
    }

    const spinner = options.json ? null : ora('Publishing site...').start();
    try {
      const result = await lifecycle.publishAll();

      if (options.json) {
        console.log(JSON.stringify(result, null, 2));
      } else if (result.failures.length === 0) {
        spinner?.succeed(`Published ${result.published.length} page(s)`);
      } else {
        spinner?.warn(`Published ${result.published.length} page(s), ${result.failures.length} failed`);
        for (const failure of result.failures) {
          console.log(chalk.red(`  ${failure.pageId}: ${failure.reason}`));
        }
      }

      if (result.failures.length > 0) {
        process.exit(1);
      }
    } catch (error) {
      spinner?.fail('Publish failed');
      exitWithError('publish', error);
    }
  });
