/**
 * CLI context creation and configuration loading.
 */

import { existsSync, readFileSync } from 'node:fs';
import {
  applyEnvOverrides,
  ConfigParseError,
  EnvCoercionError,
  getDefaultConfig,
  parseConfig,
  type Config,
  type EnvRecord,
} from '../config/index.js';
import { GeneratorError } from '../generator/types.js';
import type { CliContext, DisplayOptions } from './types.js';

/** Configuration file read when `--config` is not given. */
export const DEFAULT_CONFIG_FILE = 'annotations.toml';

/**
 * Creates the CLI context.
 *
 * @param config - Display overrides.
 * @param args - Command arguments.
 * @param env - Environment to read.
 * @returns The CLI context.
 */
export function createCliApp(
  config: Partial<DisplayOptions> = {},
  args: string[] = [],
  env: EnvRecord = process.env
): CliContext {
  return {
    args,
    env,
    config: {
      colors: config.colors ?? env.NO_COLOR === undefined,
    },
  };
}

/**
 * Options for loading the generator configuration.
 */
export interface LoadConfigOptions {
  /** Explicit configuration file; it must exist. */
  path?: string;
  env?: EnvRecord;
}

/**
 * Loads `annotations.toml` (or the given file) and applies environment
 * overrides. A missing default file means default settings.
 *
 * @param options - File and environment.
 * @returns The effective configuration.
 * @throws GeneratorError with code CONFIG_ERROR.
 */
export function loadAnnotationsConfig(options: LoadConfigOptions = {}): Config {
  const path = options.path ?? DEFAULT_CONFIG_FILE;
  let config: Config;

  if (existsSync(path)) {
    try {
      config = parseConfig(readFileSync(path, 'utf-8'));
    } catch (error) {
      if (error instanceof ConfigParseError) {
        throw new GeneratorError(`${path}: ${error.message}`, 'CONFIG_ERROR', error);
      }
      throw error;
    }
  } else if (options.path !== undefined) {
    throw new GeneratorError(`Config file not found: ${path}`, 'CONFIG_ERROR');
  } else {
    config = getDefaultConfig();
  }

  try {
    return applyEnvOverrides(config, options.env ?? process.env);
  } catch (error) {
    if (error instanceof EnvCoercionError) {
      throw new GeneratorError(error.message, 'CONFIG_ERROR', error);
    }
    throw error;
  }
}
