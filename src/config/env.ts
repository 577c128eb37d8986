/**
 * Environment variable overrides for configuration.
 *
 * ANNOTATIONS_* environment variables override configuration values at
 * runtime.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

import type { Config, PartialConfig } from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  /**
   * Creates a new EnvCoercionError.
   *
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Optional detailed error message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    const defaultMessage = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`;
    super(message ?? defaultMessage);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

/**
 * A single environment variable override target.
 */
type EnvMapping =
  | { section: 'output'; field: 'folder' | 'generator_url' | 'product'; type: 'string' }
  | { section: 'types'; field: 'unknown'; type: 'string' }
  | { section: 'generation'; field: 'strict' | 'debug'; type: 'boolean' };

/**
 * Mapping from environment variable names to config paths.
 */
const ENV_VAR_MAPPINGS: ReadonlyMap<string, EnvMapping> = new Map<string, EnvMapping>([
  ['ANNOTATIONS_STRICT', { section: 'generation', field: 'strict', type: 'boolean' }],
  ['ANNOTATIONS_DEBUG', { section: 'generation', field: 'debug', type: 'boolean' }],
  ['ANNOTATIONS_OUTPUT_FOLDER', { section: 'output', field: 'folder', type: 'string' }],
  ['ANNOTATIONS_GENERATOR_URL', { section: 'output', field: 'generator_url', type: 'string' }],
  ['ANNOTATIONS_PRODUCT', { section: 'output', field: 'product', type: 'string' }],
  ['ANNOTATIONS_UNKNOWN_TYPE', { section: 'types', field: 'unknown', type: 'string' }],
]);

/**
 * Coerces a string value to a boolean.
 *
 * Accepts 'true', '1', 'yes', 'on' and 'false', '0', 'no', 'off', case-insensitive.
 *
 * @param value - The string value to coerce.
 * @param envVar - The environment variable name for error reporting.
 * @returns The coerced boolean value.
 * @throws EnvCoercionError if the value cannot be converted to a boolean.
 */
function coerceToBoolean(value: string, envVar: string): boolean {
  const trimmed = value.trim().toLowerCase();

  const truthy = ['true', '1', 'yes', 'on'];
  const falsy = ['false', '0', 'no', 'off'];

  if (truthy.includes(trimmed)) {
    return true;
  }

  if (falsy.includes(trimmed)) {
    return false;
  }

  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...truthy, ...falsy].join(', ')}`
  );
}

/**
 * Writes one coerced value into the overrides object.
 *
 * @param overrides - The overrides being built.
 * @param mapping - Where the value goes.
 * @param value - The raw environment value.
 * @param envVar - The environment variable name for error reporting.
 */
function applyMapping(
  overrides: PartialConfig,
  mapping: EnvMapping,
  value: string,
  envVar: string
): void {
  switch (mapping.section) {
    case 'output': {
      const output = { ...overrides.output };
      output[mapping.field] = value;
      overrides.output = output;
      return;
    }
    case 'types': {
      const types = { ...overrides.types };
      types[mapping.field] = value;
      overrides.types = types;
      return;
    }
    case 'generation': {
      const generation = { ...overrides.generation };
      generation[mapping.field] = coerceToBoolean(value, envVar);
      overrides.generation = generation;
      return;
    }
  }
}

/**
 * Result of reading environment variable overrides.
 */
export interface EnvOverrideResult {
  /** Partial configuration with values from environment variables. */
  overrides: PartialConfig;
  /** List of environment variables that were applied. */
  appliedVars: string[];
  /** List of any coercion errors encountered. */
  errors: EnvCoercionError[];
}

/**
 * Reads environment variables and returns configuration overrides.
 *
 * @param env - The environment object to read from (defaults to process.env).
 * @param options - Set `collectErrors` to gather coercion errors instead of throwing.
 * @returns Result containing overrides and any errors.
 *
 * @example
 * ```typescript
 * const result = readEnvOverrides({ ANNOTATIONS_STRICT: 'yes' });
 * console.log(result.overrides.generation?.strict); // true
 * ```
 */
export function readEnvOverrides(
  env: EnvRecord = process.env,
  options: { collectErrors?: boolean } = {}
): EnvOverrideResult {
  const { collectErrors = false } = options;

  const overrides: PartialConfig = {};
  const appliedVars: string[] = [];
  const errors: EnvCoercionError[] = [];

  for (const [envVar, mapping] of ENV_VAR_MAPPINGS) {
    const value = env[envVar];

    if (value === undefined || value === '') {
      continue;
    }

    try {
      applyMapping(overrides, mapping, value, envVar);
      appliedVars.push(envVar);
    } catch (error) {
      if (error instanceof EnvCoercionError && collectErrors) {
        errors.push(error);
      } else {
        throw error;
      }
    }
  }

  return { overrides, appliedVars, errors };
}

/**
 * Merges a partial configuration into a full configuration.
 *
 * @param base - The base configuration.
 * @param partial - The partial configuration to merge.
 * @returns A new configuration with partial values merged in.
 */
export function mergeConfig(base: Config, partial: PartialConfig): Config {
  return {
    output: { ...base.output, ...partial.output },
    types: { ...base.types, ...partial.types },
    replacements: { ...base.replacements, ...partial.replacements },
    ignore: { ...base.ignore, ...partial.ignore },
    generation: { ...base.generation, ...partial.generation },
  };
}

/**
 * Applies environment variable overrides to a configuration.
 *
 * @param config - The base configuration to override.
 * @param env - The environment object to read from (defaults to process.env).
 * @returns The configuration with environment overrides applied.
 * @throws EnvCoercionError if an environment variable cannot be coerced.
 */
export function applyEnvOverrides(config: Config, env: EnvRecord = process.env): Config {
  const { overrides } = readEnvOverrides(env);

  return mergeConfig(config, overrides);
}

/**
 * Returns documentation lines for every supported environment variable.
 *
 * @returns Lines of the form `NAME  section.field (type)`.
 */
export function getEnvVarDocumentation(): string[] {
  return [...ENV_VAR_MAPPINGS].map(
    ([envVar, mapping]) => `${envVar}  ${mapping.section}.${mapping.field} (${mapping.type})`
  );
}
