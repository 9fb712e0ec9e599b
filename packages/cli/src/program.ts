/**
 * Command tree
 */

import { Command } from 'commander';
import {
  catalogCommand,
  initCommand,
  pagesCommand,
  previewCommand,
  publishCommand,
  serveCommand,
} from './commands/index.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('pagewright')
    .description('Build, preview and publish template-driven static sites')
    .version('0.1.0');

  // Site
  program.addCommand(initCommand);
  program.addCommand(pagesCommand);

  // Output
  program.addCommand(publishCommand);
  program.addCommand(previewCommand);
  program.addCommand(serveCommand);

  // Definitions
  program.addCommand(catalogCommand);

  return program;
}
