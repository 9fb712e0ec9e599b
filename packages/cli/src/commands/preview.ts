/**
 * pagewright preview
 *
 * Render a saved page with preview error detail, to stdout or a file.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { Command } from 'commander';
import chalk from 'chalk';
import { exitWithError, openSite, withStoreOptions, type StoreOptions } from '../context.js';
import { formatBytes } from '../output.js';

interface PreviewOptions extends StoreOptions {
  out?: string;
}

export const previewCommand = withStoreOptions(new Command('preview'))
  .description('Render a page without publishing it')
  .argument('<page>', 'Page id')
  .option('-o, --out <file>', 'Write the HTML to a file instead of stdout')
  .action(async (pageId: string, options: PreviewOptions) => {
    const { lifecycle } = openSite(options, 'preview');

    try {
      const html = await lifecycle.previewPage(pageId);

      if (!options.out) {
        process.stdout.write(html);
        return;
      }

      const outPath = path.resolve(options.out);
      await fs.mkdir(path.dirname(outPath), { recursive: true });
      await fs.writeFile(outPath, html, 'utf-8');
      console.log(chalk.green(`\n  Wrote ${outPath} ${chalk.gray(`(${formatBytes(Buffer.byteLength(html, 'utf-8'))})`)}\n`));
    } catch (error) {
      exitWithError('preview', error);
    }
  });
