import chalk from 'chalk';
import { ConfigurationError, TransportError } from '../errors.js';

/**
 * Centralized error handler for CLI command actions.
 */
export function handleCommandError(err: unknown): never {
  if (err instanceof ConfigurationError) {
    console.error(chalk.red(`Configuration error: ${err.message}`));
  } else if (err instanceof TransportError) {
    const status = err.status !== undefined ? ` (HTTP ${err.status})` : '';
    console.error(chalk.red(`Request failed${status}: ${err.message}`));
  } else {
    const msg = err instanceof Error ? err.message : String(err);
    console.error(chalk.red(`Error: ${msg}`));
  }
  process.exit(1);
}

/**
 * Wrap an async commander action handler with standardized error handling.
 */
export function withCommandHandler<T extends unknown[]>(
  fn: (...args: T) => Promise<void>,
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    try {
      await fn(...args);
    } catch (err: unknown) {
      handleCommandError(err);
    }
  };
}
