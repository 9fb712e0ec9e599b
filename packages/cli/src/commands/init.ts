/**
 * pagewright init
 *
 * Create the site config and its index page:
 * 1. Pick a template
 * 2. Pick a color scheme (the template's default is preselected)
 * 3. Name the site
 */

import { Command } from 'commander';
import chalk from 'chalk';
import inquirer from 'inquirer';
import ora from 'ora';
import type { DefinitionCatalog } from '@pagewright/core';
import { exitWithError, openSite, withStoreOptions, type StoreOptions } from '../context.js';

interface InitOptions extends StoreOptions {
  template?: string;
  colors?: string;
  name?: string;
  yes?: boolean;
  force?: boolean;
}

interface SiteChoices {
  templateId: string;
  colorSchemeId: string;
  siteName: string;
}

const DEFAULT_TEMPLATE = 'default';

/**
 * Fill in anything not given on the command line, prompting unless --yes
 */
async function chooseSite(catalog: DefinitionCatalog, options: InitOptions): Promise<SiteChoices> {
  let templateId = options.template;
  if (!templateId) {
    if (options.yes) {
      templateId = DEFAULT_TEMPLATE;
    } else {
      const { selected } = await inquirer.prompt<{ selected: string }>([
        {
          type: 'list',
          name: 'selected',
          message: 'Template:',
          choices: catalog.getTemplates().map((t) => ({
            name: t.description ? `${t.name} - ${t.description}` : t.name,
            value: t.id,
          })),
          default: DEFAULT_TEMPLATE,
        },
      ]);
      templateId = selected;
    }
  }

  const suggestedScheme = catalog.getTemplate(templateId)?.default_color_scheme ?? 'ocean-blue';
  let colorSchemeId = options.colors;
  if (!colorSchemeId) {
    if (options.yes) {
      colorSchemeId = suggestedScheme;
    } else {
      const { selected } = await inquirer.prompt<{ selected: string }>([
        {
          type: 'list',
          name: 'selected',
          message: 'Color scheme:',
          choices: catalog.getColorSchemes().map((s) => ({ name: s.name, value: s.id })),
          default: suggestedScheme,
        },
      ]);
      colorSchemeId = selected;
    }
  }

  let siteName = options.name;
  if (!siteName) {
    if (options.yes) {
      siteName = 'My Site';
    } else {
      const { name } = await inquirer.prompt<{ name: string }>([
        {
          type: 'input',
          name: 'name',
          message: 'Site name:',
          validate: (input: string) => (input.trim() ? true : 'Site name is required'),
        },
      ]);
      siteName = name.trim();
    }
  }

  return { templateId, colorSchemeId, siteName };
}

export const initCommand = withStoreOptions(new Command('init'))
  .description('Create a new site with its index page')
  .option('-t, --template <id>', 'Template id')
  .option('-c, --colors <id>', 'Color scheme id')
  .option('-n, --name <name>', 'Site name')
  .option('-y, --yes', 'Use defaults instead of prompting')
  .option('--force', 'Overwrite an existing site config and index page')
  .action(async (options: InitOptions) => {
    const { lifecycle, catalog } = openSite(options, 'init');

    try {
      const existing = await lifecycle.getSite();
      if (existing && !options.force) {
        if (options.yes) {
          console.log(chalk.yellow(`\n  Site "${existing.site_name}" already exists. Use --force to overwrite.\n`));
          process.exit(1);
        }
        const { overwrite } = await inquirer.prompt<{ overwrite: boolean }>([
          {
            type: 'confirm',
            name: 'overwrite',
            message: `Site "${existing.site_name}" already exists. Overwrite its config and index page?`,
            default: false,
          },
        ]);
        if (!overwrite) {
          console.log(chalk.gray('\n  Nothing changed.\n'));
          return;
        }
      }

      const choices = await chooseSite(catalog, options);

      const spinner = ora('Creating site...').start();
      const site = await lifecycle
        .initSite(choices.templateId, choices.colorSchemeId, choices.siteName)
        .catch((error: unknown) => {
          spinner.fail('Could not create site');
          throw error;
        });
      spinner.succeed(`Created ${chalk.green(site.site_name)}`);

      console.log(chalk.gray(`\n  Template:     ${chalk.white(site.template_id)}`));
      console.log(chalk.gray(`  Color scheme: ${chalk.white(site.color_scheme_id)}`));
      console.log(chalk.cyan('\n  Next steps:'));
      console.log(chalk.gray('    pagewright pages add about "About Us"'));
      console.log(chalk.gray('    pagewright publish\n'));
    } catch (error) {
      exitWithError('init', error);
    }
  });
