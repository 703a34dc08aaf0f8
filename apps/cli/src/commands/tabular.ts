import type { Command } from 'commander';

import { CliContainer } from '../container/cli-container';
import { CliUsageError } from '../utils/errors';

interface TabularOptions {
  query?: string;
  objective?: string;
}

export function registerTabularCommands(
  program: Command,
  container: CliContainer,
) {
  program
    .command('tabular <fileId>')
    .description(
      'Answer a question over a tabular file with a direct SQL query or a planned analysis',
    )
    .option('-q, --query <sql>', 'SELECT statement against current_csv_table')
    .option('-o, --objective <text>', 'Natural-language question to plan for')
    .action(async (fileId: string, options: TabularOptions) => {
      if (!options.query && !options.objective) {
        throw new CliUsageError('Provide --query or --objective.');
      }
      const { tabular } = container.getServices();
      const output = await tabular.execute({
        fileId,
        query: options.query,
        objective: options.objective,
      });
      console.log(output);
    });
}
