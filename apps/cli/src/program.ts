import { Command } from 'commander';

import { registerDocumentCommands } from './commands/document';
import { registerTabularCommands } from './commands/tabular';
import { CliContainer } from './container/cli-container';

export function createProgram(container: CliContainer = new CliContainer()) {
  const program = new Command();
  program
    .name('deep-research')
    .description('Research tools for tabular files and long documents')
    .version('0.1.0');

  registerTabularCommands(program, container);
  registerDocumentCommands(program, container);
  return program;
}
