/**
 * Process-level error handling for the CLI entry point.
 */

import { displayErrorWithSuggestions } from '../errors.js';
import type { CliCommandResult, DisplayOptions } from '../types.js';

/**
 * Runs a command and exits the process with its exit code.
 *
 * Errors that reach this point are unexpected: they are printed with
 * suggestions inferred from the message and the process exits with 1.
 *
 * @param fn - The command to run.
 * @param options - Display options for error output.
 */
export function withErrorHandling(
  fn: () => Promise<CliCommandResult>,
  options: DisplayOptions = { colors: process.env.NO_COLOR === undefined }
): void {
  void (async () => {
    try {
      const result = await fn();
      process.exit(result.exitCode);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      displayErrorWithSuggestions(message, {}, options);
      process.exit(1);
    }
  })();
}
