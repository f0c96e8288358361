import chalk from 'chalk';
import { AgentError } from '../errors.js';

/**
 * Wrap a CLI command handler with centralized error handling.
 * Every failure that reaches here ends the process with exit code 1.
 */
export function withErrorHandler<T extends unknown[]>(
  fn: (...args: T) => Promise<void>,
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    try {
      await fn(...args);
    } catch (err) {
      if (err instanceof AgentError) {
        console.error(chalk.red(`✗ ${err.message}`));
        if (err.hint) {
          console.error(chalk.dim(`  ${err.hint}`));
        }
      } else if (err instanceof Error) {
        console.error(chalk.red(`✗ ${err.message}`));
      } else {
        console.error(chalk.red('✗ An unexpected error occurred'));
      }
      process.exit(1);
    }
  };
}
