/**
 * Semantic validation for configuration values.
 *
 * Checks what type checking alone cannot:
 * - Replacement and ignore patterns compile as regular expressions
 * - The unknown-type sentinel and type table entries are non-empty
 * - The output folder is non-empty and the extension starts with a dot
 *
 * @packageDocumentation
 */

import type { Config } from './types.js';

/**
 * Error class for semantic validation errors.
 */
export class ConfigValidationError extends Error {
  /** Array of validation failure details. */
  public readonly errors: ValidationError[];

  /**
   * Creates a new ConfigValidationError.
   *
   * @param message - Summary error message.
   * @param errors - Array of specific validation errors.
   */
  constructor(message: string, errors: ValidationError[]) {
    super(message);
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

/**
 * Individual validation error details.
 */
export interface ValidationError {
  /** The field path that failed validation. */
  field: string;
  /** The invalid value that was provided. */
  value: unknown;
  /** Human-readable description of the validation failure. */
  message: string;
}

/**
 * Result of a validation operation.
 */
export interface ValidationResult {
  /** Whether validation passed. */
  valid: boolean;
  /** Array of validation errors (empty if valid). */
  errors: ValidationError[];
}

/**
 * Checks that a pattern compiles as a regular expression.
 *
 * @param pattern - The pattern to compile.
 * @param fieldPath - The field path for error reporting.
 * @param errors - Array to accumulate errors into.
 */
function validatePattern(pattern: string, fieldPath: string, errors: ValidationError[]): void {
  try {
    new RegExp(pattern);
  } catch (error) {
    errors.push({
      field: fieldPath,
      value: pattern,
      message: `Invalid pattern '${pattern}': ${error instanceof Error ? error.message : String(error)}`,
    });
  }
}

/**
 * Checks that every entry of a name list is non-empty.
 *
 * @param names - The names to check.
 * @param fieldPath - The field path for error reporting.
 * @param errors - Array to accumulate errors into.
 */
function validateNames(names: readonly string[], fieldPath: string, errors: ValidationError[]): void {
  names.forEach((name, index) => {
    if (name.trim() === '') {
      errors.push({
        field: `${fieldPath}[${String(index)}]`,
        value: name,
        message: `'${fieldPath}' entries must be non-empty`,
      });
    }
  });
}

/**
 * Validates a configuration semantically.
 *
 * @param config - The configuration to validate.
 * @returns Validation result with all errors found.
 */
export function validateConfig(config: Config): ValidationResult {
  const errors: ValidationError[] = [];

  if (config.types.unknown.trim() === '') {
    errors.push({
      field: 'types.unknown',
      value: config.types.unknown,
      message: "'types.unknown' must be a non-empty type name",
    });
  }

  if (config.output.folder.trim() === '') {
    errors.push({
      field: 'output.folder',
      value: config.output.folder,
      message: "'output.folder' must be a non-empty path",
    });
  }

  if (!config.output.extension.startsWith('.')) {
    errors.push({
      field: 'output.extension',
      value: config.output.extension,
      message: `'output.extension' must start with '.', got '${config.output.extension}'`,
    });
  }

  validateNames(config.types.known, 'types.known', errors);
  validateNames(config.types.classes, 'types.classes', errors);
  validateNames(config.types.aliases, 'types.aliases', errors);

  for (const pattern of Object.keys(config.replacements.types)) {
    validatePattern(pattern, `replacements.types.${pattern}`, errors);
  }

  config.ignore.functions.forEach((pattern, index) => {
    validatePattern(pattern, `ignore.functions[${String(index)}]`, errors);
  });

  return { valid: errors.length === 0, errors };
}

/**
 * Validates a configuration and throws when it is invalid.
 *
 * @param config - The configuration to validate.
 * @throws ConfigValidationError listing every problem found.
 */
export function assertConfigValid(config: Config): void {
  const result = validateConfig(config);

  if (!result.valid) {
    const summary = result.errors.map((error) => `  - ${error.field}: ${error.message}`).join('\n');
    throw new ConfigValidationError(
      `Configuration validation failed:\n${summary}`,
      result.errors
    );
  }
}
