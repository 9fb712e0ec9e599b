/**
 * pagewright pages
 *
 * list | add | copy | delete | reconcile
 */

import { Command } from 'commander';
import chalk from 'chalk';
import inquirer from 'inquirer';
import { exitWithError, openSite, withStoreOptions, type StoreOptions } from '../context.js';
import { describeRemoval, formatTable, titleFromId } from '../output.js';

interface ListOptions extends StoreOptions {
  json?: boolean;
}

interface AddOptions extends StoreOptions {
  starter?: boolean;
}

interface DeleteOptions extends StoreOptions {
  yes?: boolean;
}

const listCommand = withStoreOptions(new Command('list'))
  .description('List the site pages')
  .option('--json', 'Output as JSON')
  .action(async (options: ListOptions) => {
    const { lifecycle } = openSite(options, 'pages list');

    try {
      const listing = await lifecycle.listPages();

      if (options.json) {
        console.log(JSON.stringify({ pages: listing.pages, orphans: listing.orphans, unlisted: listing.unlisted }, null, 2));
        return;
      }

      console.log(chalk.bold(`\n  ${listing.site.site_name}\n`));
      const [header, ...rows] = formatTable(
        ['ID', 'TITLE', 'UPDATED'],
        listing.pages.map((page) => [page.id, page.title, page.updated_at])
      );
      console.log(chalk.gray(`  ${header}`));
      for (const row of rows) {
        console.log(`  ${row}`);
      }

      if (listing.orphans.length > 0) {
        console.log(chalk.yellow(`\n  Listed but missing: ${listing.orphans.join(', ')}`));
        console.log(chalk.gray('  Run `pagewright pages reconcile` to drop them.'));
      }
      if (listing.unlisted.length > 0) {
        console.log(chalk.yellow(`\n  Stored but not in the site: ${listing.unlisted.join(', ')}`));
      }
      console.log('');
    } catch (error) {
      exitWithError('pages list', error);
    }
  });

const addCommand = withStoreOptions(new Command('add'))
  .description('Add a page')
  .argument('<id>', 'Page id, e.g. about-us')
  .argument('[title]', 'Page title (derived from the id when omitted)')
  .option('--starter', 'Start the page with a heading')
  .action(async (pageId: string, title: string | undefined, options: AddOptions) => {
    const { lifecycle } = openSite(options, 'pages add');

    try {
      const page = await lifecycle.addPage(pageId, title ?? titleFromId(pageId), { starter: options.starter });
      console.log(chalk.green(`\n  Added ${page.id} (${page.title})\n`));
    } catch (error) {
      exitWithError('pages add', error);
    }
  });

const copyCommand = withStoreOptions(new Command('copy'))
  .description('Copy a page under a new id')
  .argument('<source>', 'Page to copy')
  .argument('<id>', 'New page id')
  .argument('[title]', 'New page title (derived from the id when omitted)')
  .action(async (sourceId: string, newId: string, title: string | undefined, options: StoreOptions) => {
    const { lifecycle } = openSite(options, 'pages copy');

    try {
      const page = await lifecycle.copyPage(sourceId, newId, title ?? titleFromId(newId));
      console.log(chalk.green(`\n  Copied ${sourceId} to ${page.id}\n`));
    } catch (error) {
      exitWithError('pages copy', error);
    }
  });

const deleteCommand = withStoreOptions(new Command('delete'))
  .description('Delete a page and its published HTML')
  .argument('<id>', 'Page id')
  .option('-y, --yes', 'Skip confirmation')
  .action(async (pageId: string, options: DeleteOptions) => {
    const { lifecycle } = openSite(options, 'pages delete');

    try {
      if (!options.yes) {
        const { confirmed } = await inquirer.prompt<{ confirmed: boolean }>([
          {
            type: 'confirm',
            name: 'confirmed',
            message: `Delete page "${pageId}"?`,
            default: false,
          },
        ]);
        if (!confirmed) {
          console.log(chalk.gray('\n  Nothing deleted.\n'));
          return;
        }
      }

      const result = await lifecycle.deletePage(pageId);
      console.log(chalk.green(`\n  Removed ${pageId} from the site`));
      for (const outcome of [result.document, result.artifact]) {
        const line = `  ${describeRemoval(outcome)}`;
        console.log(outcome.status === 'failed' ? chalk.yellow(line) : chalk.gray(line));
      }
      console.log('');
    } catch (error) {
      exitWithError('pages delete', error);
    }
  });

const reconcileCommand = withStoreOptions(new Command('reconcile'))
  .description('Drop pages whose config is missing from the site')
  .action(async (options: StoreOptions) => {
    const { lifecycle } = openSite(options, 'pages reconcile');

    try {
      const result = await lifecycle.reconcileSite();
      if (!result.changed) {
        console.log(chalk.gray('\n  Site is consistent.\n'));
        return;
      }
      console.log(chalk.green(`\n  Removed: ${result.removed.join(', ')}\n`));
    } catch (error) {
      exitWithError('pages reconcile', error);
    }
  });

export const pagesCommand = new Command('pages')
  .description('Manage site pages')
  .addCommand(listCommand)
  .addCommand(addCommand)
  .addCommand(copyCommand)
  .addCommand(deleteCommand)
  .addCommand(reconcileCommand);
