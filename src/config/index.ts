/**
 * Configuration module for annotations.toml parsing and validation.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

export { ConfigParseError, getDefaultConfig, parseConfig } from './parser.js';
export type {
  Config,
  GenerationConfig,
  IgnoreConfig,
  OutputConfig,
  PartialConfig,
  ReplacementsConfig,
  TypesConfig,
} from './types.js';
export {
  DEFAULT_CONFIG,
  DEFAULT_GENERATION,
  DEFAULT_IGNORE,
  DEFAULT_OUTPUT,
  DEFAULT_REPLACEMENTS,
  DEFAULT_TYPES,
} from './defaults.js';
export { ConfigValidationError, validateConfig, assertConfigValid } from './validator.js';
export type { ValidationError, ValidationResult } from './validator.js';
export {
  EnvCoercionError,
  readEnvOverrides,
  applyEnvOverrides,
  mergeConfig,
  getEnvVarDocumentation,
} from './env.js';
export type { EnvOverrideResult, EnvRecord } from './env.js';
