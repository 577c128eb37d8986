/**
 * CLI types and interfaces for the annotation generator.
 */

import type { EnvRecord } from '../config/env.js';

/**
 * Terminal display settings.
 */
export interface DisplayOptions {
  /** Whether to use ANSI colors in output. */
  colors: boolean;
}

/**
 * CLI command context.
 */
export interface CliContext {
  /** Command-line arguments after the command name. */
  args: string[];
  /** Environment the run reads `ANNOTATIONS_*` overrides from. */
  env: EnvRecord;
  config: DisplayOptions;
}

/**
 * Result of a CLI command execution.
 */
export interface CliCommandResult {
  /** Exit code (0 for success, non-zero for error). */
  exitCode: number;
  /** Optional message to display. */
  message?: string;
}

/**
 * CLI command handler function.
 */
export type CliCommandHandler = (context: CliContext) => Promise<CliCommandResult>;
