import { createProgram } from './program';
import { CliUsageError } from './utils/errors';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    if (error instanceof CliUsageError) {
      console.error(`Usage error: ${error.message}`);
      process.exitCode = 1;
      return;
    }
    console.error('[CLI] Unexpected error:', error);
    process.exitCode = 2;
  });
