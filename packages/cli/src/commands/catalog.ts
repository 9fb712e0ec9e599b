/**
 * pagewright catalog components | templates | schemes
 *
 * Browse the definition catalog.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { createPagewright } from '@pagewright/core';
import { exitWithError, resolveConfig, withStoreOptions, type StoreOptions } from '../context.js';
import { createCommandLogger } from '../logger.js';
import { formatTable } from '../output.js';

interface CatalogOptions extends StoreOptions {
  json?: boolean;
  category?: string;
}

function openCatalog(options: StoreOptions, commandName: string) {
  const logger = createCommandLogger(commandName);
  logger.command(commandName, { definitions: options.definitions });
  return createPagewright({ config: resolveConfig(options), logger }).catalog;
}

function printTable(headers: string[], rows: string[][]): void {
  const [header, ...lines] = formatTable(headers, rows);
  console.log('');
  console.log(chalk.gray(`  ${header}`));
  for (const line of lines) {
    console.log(`  ${line}`);
  }
  console.log('');
}

const componentsCommand = withStoreOptions(new Command('components'))
  .description('List component definitions')
  .option('--category <category>', 'Only show one category')
  .option('--json', 'Output as JSON')
  .action((options: CatalogOptions) => {
    try {
      const catalog = openCatalog(options, 'components');
      const components = catalog.getComponents(options.category);

      if (options.json) {
        console.log(JSON.stringify(components, null, 2));
        return;
      }
      printTable(
        ['ID', 'CATEGORY', 'NAME'],
        components.map((c) => [c.id, c.category, c.name])
      );
    } catch (error) {
      exitWithError('components', error);
    }
  });

const templatesCommand = withStoreOptions(new Command('templates'))
  .description('List templates')
  .option('--json', 'Output as JSON')
  .action((options: CatalogOptions) => {
    try {
      const templates = openCatalog(options, 'templates').getTemplates();

      if (options.json) {
        console.log(JSON.stringify(templates, null, 2));
        return;
      }
      printTable(
        ['ID', 'COLORS', 'SLOTS'],
        templates.map((t) => [t.id, t.default_color_scheme, t.slots.map((slot) => slot.id).join(', ')])
      );
    } catch (error) {
      exitWithError('templates', error);
    }
  });

const schemesCommand = withStoreOptions(new Command('schemes'))
  .description('List color schemes')
  .option('--json', 'Output as JSON')
  .action((options: CatalogOptions) => {
    try {
      const schemes = openCatalog(options, 'schemes').getColorSchemes();

      if (options.json) {
        console.log(JSON.stringify(schemes, null, 2));
        return;
      }
      printTable(
        ['ID', 'NAME', 'PRIMARY'],
        schemes.map((s) => [s.id, s.name, s.colors.primary ?? ''])
      );
    } catch (error) {
      exitWithError('schemes', error);
    }
  });

export const catalogCommand = new Command('catalog')
  .description('Browse components, templates and color schemes')
  .addCommand(componentsCommand)
  .addCommand(templatesCommand)
  .addCommand(schemesCommand);
