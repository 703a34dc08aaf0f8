import type { Command } from 'commander';

import { CliContainer } from '../container/cli-container';

interface DocumentOptions {
  query?: string;
}

export function registerDocumentCommands(
  program: Command,
  container: CliContainer,
) {
  program
    .command('document <documentId>')
    .description('Read a document, reducing it when it exceeds the token limit')
    .option('-q, --query <text>', 'Topic to focus filtering and summaries on')
    .action(async (documentId: string, options: DocumentOptions) => {
      const { document } = container.getServices();
      console.log(await document.execute({ documentId, query: options.query }));
    });
}
