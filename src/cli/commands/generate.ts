/**
 * Generate command handler for the annotation generator CLI.
 *
 * Loads the configuration, reads the module files and writes one
 * annotation file per namespace (or lists them with `--dry-run`).
 */

import { mergeConfig, type PartialConfig } from '../../config/index.js';
import { MemoryEmitter } from '../../generator/emitter.js';
import { generateAndWriteAnnotations } from '../../generator/pipeline.js';
import { GeneratorError } from '../../generator/types.js';
import { Logger } from '../../utils/logger.js';
import { loadAnnotationsConfig } from '../app.js';
import { displayErrorWithSuggestions, errorTypeForCode } from '../errors.js';
import type { CliCommandResult, CliContext } from '../types.js';

/** Version printed in headers when `--version` is not given. */
export const DEFAULT_API_VERSION = '0.0.0';

/**
 * Parsed `generate` arguments.
 */
export interface GenerateArgs {
  files: string[];
  configPath?: string;
  outDir?: string;
  version: string;
  strict: boolean;
  dryRun: boolean;
}

/**
 * Error thrown for malformed command-line arguments.
 */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

/**
 * Parses `generate` arguments.
 *
 * @param args - Arguments after the command name.
 * @returns The parsed arguments.
 * @throws CliUsageError for unknown options, missing values or no files.
 */
export function parseGenerateArgs(args: readonly string[]): GenerateArgs {
  const result: GenerateArgs = {
    files: [],
    version: DEFAULT_API_VERSION,
    strict: false,
    dryRun: false,
  };

  const takeValue = (index: number, option: string): string => {
    const value = args[index + 1];
    if (value === undefined || value.startsWith('-')) {
      throw new CliUsageError(`Option ${option} requires a value`);
    }
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';

    switch (arg) {
      case '--config':
      case '-c':
        result.configPath = takeValue(i, arg);
        i++;
        break;
      case '--out':
      case '-o':
        result.outDir = takeValue(i, arg);
        i++;
        break;
      case '--version':
        result.version = takeValue(i, arg);
        i++;
        break;
      case '--strict':
        result.strict = true;
        break;
      case '--dry-run':
        result.dryRun = true;
        break;
      default:
        if (arg.startsWith('-')) {
          throw new CliUsageError(`Unknown option: ${arg}`);
        }
        result.files.push(arg);
    }
  }

  if (result.files.length === 0) {
    throw new CliUsageError('No module files given');
  }

  return result;
}

/**
 * Handles the generate command.
 *
 * @param context - The CLI context.
 * @returns A promise resolving to the command result.
 */
export async function handleGenerateCommand(context: CliContext): Promise<CliCommandResult> {
  let args: GenerateArgs;
  try {
    args = parseGenerateArgs(context.args);
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(`Error: ${error.message}`);
      console.error('\nRun "annotate help generate" for usage information.');
      return { exitCode: 1, message: error.message };
    }
    throw error;
  }

  try {
    const overrides: PartialConfig = {};
    if (args.outDir !== undefined) {
      overrides.output = { folder: args.outDir };
    }
    if (args.strict) {
      overrides.generation = { strict: true };
    }

    const config = mergeConfig(
      loadAnnotationsConfig({
        env: context.env,
        ...(args.configPath !== undefined ? { path: args.configPath } : {}),
      }),
      overrides
    );
    const logger = new Logger({
      component: 'AnnotationGenerator',
      debugMode: config.generation.debug,
    });
    const emitter = args.dryRun ? new MemoryEmitter() : undefined;

    const units = await generateAndWriteAnnotations({
      files: args.files,
      config,
      version: args.version,
      logger,
      ...(emitter !== undefined ? { emitter } : {}),
    });

    if (args.dryRun) {
      console.log(`Would write ${String(units.length)} namespaces to ${config.output.folder}:`);
      for (const unit of units) {
        console.log(`  ${unit.namespace}${config.output.extension}`);
      }
    } else {
      console.log(`Generated ${String(units.length)} namespaces in ${config.output.folder}`);
    }

    return { exitCode: 0 };
  } catch (error) {
    if (error instanceof GeneratorError) {
      displayErrorWithSuggestions(
        error.message,
        { errorType: errorTypeForCode(error.code) },
        context.config
      );
      return { exitCode: 1, message: error.message };
    }
    if (error instanceof Error) {
      displayErrorWithSuggestions(error.message, {}, context.config);
      return { exitCode: 1, message: error.message };
    }
    throw error;
  }
}
