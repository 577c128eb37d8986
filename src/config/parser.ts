/**
 * TOML configuration parser for annotations.toml.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import {
  DEFAULT_GENERATION,
  DEFAULT_IGNORE,
  DEFAULT_OUTPUT,
  DEFAULT_REPLACEMENTS,
  DEFAULT_TYPES,
} from './defaults.js';
import type {
  Config,
  GenerationConfig,
  IgnoreConfig,
  OutputConfig,
  ReplacementsConfig,
  TypesConfig,
} from './types.js';

/**
 * Error class for configuration parsing errors.
 */
export class ConfigParseError extends Error {
  /** The original error that caused the parse failure, if any. */
  public override readonly cause: Error | undefined;

  /**
   * Creates a new ConfigParseError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'ConfigParseError';
    this.cause = cause;
  }
}

/** Keys that are prohibited due to prototype pollution concerns. */
const PROHIBITED_KEYS = ['__proto__', 'constructor', 'prototype'];

/**
 * Narrows a value to a plain record.
 *
 * @param value - Value to check.
 * @returns True when the value is a non-null, non-array object.
 */
function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validates that a value is a table, returning undefined when absent.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated table, or undefined.
 * @throws ConfigParseError if value is present but not a table.
 */
function validateSection(value: unknown, fieldPath: string): Record<string, unknown> | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected table, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Validates that a value is a string.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated string.
 * @throws ConfigParseError if value is not a string.
 */
function validateString(value: unknown, fieldPath: string): string {
  if (typeof value !== 'string') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected string, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Validates that a value is a boolean.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated boolean.
 * @throws ConfigParseError if value is not a boolean.
 */
function validateBoolean(value: unknown, fieldPath: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected boolean, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Validates that a value is an array of strings.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated string array.
 * @throws ConfigParseError if value is not an array of strings.
 */
function validateStringArray(value: unknown, fieldPath: string): string[] {
  if (!Array.isArray(value)) {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected array, got ${typeof value}`
    );
  }
  return value.map((item: unknown, index) => {
    if (typeof item !== 'string') {
      throw new ConfigParseError(
        `Invalid type for '${fieldPath}[${String(index)}]': expected string, got ${typeof item}`
      );
    }
    return item;
  });
}

/**
 * Validates that a value is a table of strings.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns A prototype-free record with the validated entries.
 * @throws ConfigParseError if value is not a table of strings or uses a prohibited key.
 */
function validateStringRecord(value: unknown, fieldPath: string): Record<string, string> {
  if (!isRecord(value)) {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected table, got ${typeof value}`
    );
  }

  const result: Record<string, string> = Object.create(null) as Record<string, string>;
  for (const [key, entry] of Object.entries(value)) {
    if (PROHIBITED_KEYS.includes(key)) {
      throw new ConfigParseError(`Prohibited key '${key}' found at '${fieldPath}'`);
    }
    result[key] = validateString(entry, `${fieldPath}.${key}`);
  }
  return result;
}

/**
 * Validates a table of string tables (per-element replacement tables).
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated nested record.
 */
function validateNestedStringRecord(
  value: unknown,
  fieldPath: string
): Record<string, Record<string, string>> {
  if (!isRecord(value)) {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected table, got ${typeof value}`
    );
  }

  const result = Object.create(null) as Record<string, Record<string, string>>;
  for (const [key, entry] of Object.entries(value)) {
    if (PROHIBITED_KEYS.includes(key)) {
      throw new ConfigParseError(`Prohibited key '${key}' found at '${fieldPath}'`);
    }
    result[key] = validateStringRecord(entry, `${fieldPath}.${key}`);
  }
  return result;
}

/**
 * Parses output settings from raw TOML data.
 *
 * @param raw - Raw TOML object for the output section.
 * @returns Validated output settings merged with defaults.
 */
function parseOutput(raw: Record<string, unknown> | undefined): OutputConfig {
  const result: OutputConfig = {
    ...DEFAULT_OUTPUT,
    disabled_diagnostics: [...DEFAULT_OUTPUT.disabled_diagnostics],
  };

  if (raw === undefined) {
    return result;
  }

  if ('folder' in raw) {
    result.folder = validateString(raw.folder, 'output.folder');
  }
  if ('extension' in raw) {
    result.extension = validateString(raw.extension, 'output.extension');
  }
  if ('generator_url' in raw) {
    result.generator_url = validateString(raw.generator_url, 'output.generator_url');
  }
  if ('product' in raw) {
    result.product = validateString(raw.product, 'output.product');
  }
  if ('class_prefix' in raw) {
    result.class_prefix = validateString(raw.class_prefix, 'output.class_prefix');
  }
  if ('disabled_diagnostics' in raw) {
    result.disabled_diagnostics = validateStringArray(
      raw.disabled_diagnostics,
      'output.disabled_diagnostics'
    );
  }

  return result;
}

/**
 * Parses type tables from raw TOML data.
 *
 * @param raw - Raw TOML object for the types section.
 * @returns Validated type tables merged with defaults.
 */
function parseTypes(raw: Record<string, unknown> | undefined): TypesConfig {
  const result: TypesConfig = {
    ...DEFAULT_TYPES,
    known: [...DEFAULT_TYPES.known],
    classes: [...DEFAULT_TYPES.classes],
    aliases: [...DEFAULT_TYPES.aliases],
    generics: { ...DEFAULT_TYPES.generics },
  };

  if (raw === undefined) {
    return result;
  }

  if ('known' in raw) {
    result.known = validateStringArray(raw.known, 'types.known');
  }
  if ('extra_known' in raw) {
    result.known = [...result.known, ...validateStringArray(raw.extra_known, 'types.extra_known')];
  }
  if ('unknown' in raw) {
    result.unknown = validateString(raw.unknown, 'types.unknown');
  }
  if ('classes' in raw) {
    result.classes = validateStringArray(raw.classes, 'types.classes');
  }
  if ('aliases' in raw) {
    result.aliases = validateStringArray(raw.aliases, 'types.aliases');
  }
  if ('generics' in raw) {
    result.generics = validateStringRecord(raw.generics, 'types.generics');
  }

  return result;
}

/**
 * Parses replacement tables from raw TOML data.
 *
 * @param raw - Raw TOML object for the replacements section.
 * @returns Validated replacement tables merged with defaults.
 */
function parseReplacements(raw: Record<string, unknown> | undefined): ReplacementsConfig {
  const result: ReplacementsConfig = {
    types: { ...DEFAULT_REPLACEMENTS.types },
    names: { ...DEFAULT_REPLACEMENTS.names },
    local_types: { ...DEFAULT_REPLACEMENTS.local_types },
    local_names: { ...DEFAULT_REPLACEMENTS.local_names },
  };

  if (raw === undefined) {
    return result;
  }

  if ('types' in raw) {
    result.types = validateStringRecord(raw.types, 'replacements.types');
  }
  if ('names' in raw) {
    result.names = { ...result.names, ...validateStringRecord(raw.names, 'replacements.names') };
  }
  if ('local_types' in raw) {
    result.local_types = validateNestedStringRecord(raw.local_types, 'replacements.local_types');
  }
  if ('local_names' in raw) {
    result.local_names = validateNestedStringRecord(raw.local_names, 'replacements.local_names');
  }

  return result;
}

/**
 * Parses the ignore list from raw TOML data.
 *
 * @param raw - Raw TOML object for the ignore section.
 * @returns Validated ignore list merged with defaults.
 */
function parseIgnore(raw: Record<string, unknown> | undefined): IgnoreConfig {
  if (raw === undefined || !('functions' in raw)) {
    return { functions: [...DEFAULT_IGNORE.functions] };
  }

  return { functions: validateStringArray(raw.functions, 'ignore.functions') };
}

/**
 * Parses run behaviour from raw TOML data.
 *
 * @param raw - Raw TOML object for the generation section.
 * @returns Validated run behaviour merged with defaults.
 */
function parseGeneration(raw: Record<string, unknown> | undefined): GenerationConfig {
  const result: GenerationConfig = { ...DEFAULT_GENERATION };

  if (raw === undefined) {
    return result;
  }

  if ('strict' in raw) {
    result.strict = validateBoolean(raw.strict, 'generation.strict');
  }
  if ('debug' in raw) {
    result.debug = validateBoolean(raw.debug, 'generation.debug');
  }

  return result;
}

/**
 * Parses a TOML string into a validated Config object.
 *
 * @param tomlContent - Raw TOML content as a string.
 * @returns Validated configuration object with defaults applied for missing fields.
 * @throws ConfigParseError for invalid TOML syntax or invalid field values.
 *
 * @example
 * ```typescript
 * import { parseConfig } from './config/parser.js';
 *
 * const config = parseConfig(`
 * [types]
 * unknown = "unknown_type"
 *
 * [replacements.types]
 * "vmath\\.vector3" = "vector3"
 * `);
 * console.log(config.types.unknown); // "unknown_type"
 * ```
 */
export function parseConfig(tomlContent: string): Config {
  let parsed: Record<string, unknown>;

  try {
    parsed = TOML.parse(tomlContent);
  } catch (error) {
    const tomlError = error instanceof Error ? error : new Error(String(error));
    throw new ConfigParseError(`Invalid TOML syntax: ${tomlError.message}`, tomlError);
  }

  return {
    output: parseOutput(validateSection(parsed.output, 'output')),
    types: parseTypes(validateSection(parsed.types, 'types')),
    replacements: parseReplacements(validateSection(parsed.replacements, 'replacements')),
    ignore: parseIgnore(validateSection(parsed.ignore, 'ignore')),
    generation: parseGeneration(validateSection(parsed.generation, 'generation')),
  };
}

/**
 * Returns a fresh copy of the default configuration.
 *
 * @returns Default configuration object.
 */
export function getDefaultConfig(): Config {
  return parseConfig('');
}

