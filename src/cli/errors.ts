/**
 * Error suggestion system for the annotation generator CLI.
 *
 * Provides contextual suggestions based on error types to help users
 * resolve issues quickly.
 *
 * @packageDocumentation
 */

import type { GeneratorErrorCode } from '../generator/types.js';
import type { DisplayOptions } from './types.js';

/**
 * Error types that can occur during a CLI run.
 */
export type ErrorType = 'config_error' | 'module_error' | 'unknown_type' | 'file_error' | 'unknown';

/**
 * Suggestion item for resolving an error.
 */
export interface Suggestion {
  /** Suggestion text. */
  text: string;
  /** Command or action to take (optional). */
  action?: string;
}

/**
 * Error context with details needed for generating suggestions.
 */
export interface ErrorContext {
  /** Type of error that occurred. */
  errorType: ErrorType;
  /** Additional error details (optional). */
  details?: {
    /** File the error refers to. */
    filePath?: string;
  };
}

/**
 * Error suggestion mappings.
 */
const ERROR_SUGGESTIONS: Readonly<Record<ErrorType, readonly Suggestion[]>> = {
  config_error: [
    {
      text: 'Check annotations.toml for syntax errors',
    },
    {
      text: 'Make sure replacement and ignore patterns are valid regular expressions',
    },
    {
      text: 'Choose an output folder that does not contain the working directory or a module file',
    },
    {
      text: 'Check the ANNOTATIONS_* environment variables',
      action: 'annotate help generate',
    },
  ],

  module_error: [
    {
      text: 'Check that the module file named in the message exists',
    },
    {
      text: 'Module files must use the .toml or .json extension',
    },
    {
      text: 'Every element needs a kind and a name',
    },
  ],

  unknown_type: [
    {
      text: 'Add the type to types.known, types.classes or types.aliases',
    },
    {
      text: 'Map the type with a replacements.types pattern',
    },
    {
      text: 'Run without --strict to substitute the unknown type sentinel',
      action: 'annotate generate <module files...>',
    },
  ],

  file_error: [
    {
      text: 'Check that module namespaces are valid file names',
    },
    {
      text: 'Check write permissions for the output folder',
      action: 'annotate generate <module files...> --out <dir>',
    },
  ],

  unknown: [
    {
      text: 'Run with debug logging for more detail',
      action: 'ANNOTATIONS_DEBUG=1 annotate generate <module files...>',
    },
    {
      text: 'Report the issue if it persists',
    },
  ],
};

/**
 * Maps a generator error code to an error type.
 *
 * @param code - The generator error code.
 * @returns The matching error type.
 */
export function errorTypeForCode(code: GeneratorErrorCode): ErrorType {
  switch (code) {
    case 'CONFIG_ERROR':
      return 'config_error';
    case 'MODULE_PARSE_ERROR':
      return 'module_error';
    case 'UNKNOWN_TYPE':
      return 'unknown_type';
    case 'FILE_WRITE_ERROR':
      return 'file_error';
    default: {
      const exhaustiveCheck: never = code;
      return exhaustiveCheck;
    }
  }
}

/**
 * Extracts error type from an error message.
 *
 * @param errorMessage - The error message to analyze.
 * @returns The identified error type.
 */
export function inferErrorType(errorMessage: string): ErrorType {
  const lowerMessage = errorMessage.toLowerCase();

  if (lowerMessage.includes('unknown type')) {
    return 'unknown_type';
  }

  if (
    lowerMessage.includes('config') ||
    lowerMessage.includes('annotations.toml') ||
    lowerMessage.includes('environment variable')
  ) {
    return 'config_error';
  }

  if (lowerMessage.includes('module') || lowerMessage.includes('element')) {
    return 'module_error';
  }

  if (
    lowerMessage.includes('enoent') ||
    lowerMessage.includes('eacces') ||
    lowerMessage.includes('no such file') ||
    lowerMessage.includes('permission denied') ||
    lowerMessage.includes('path')
  ) {
    return 'file_error';
  }

  return 'unknown';
}

/**
 * Formats a suggestion for display.
 *
 * @param suggestion - The suggestion to format.
 * @param index - The suggestion index (1-based).
 * @param options - Display options.
 * @returns Formatted suggestion string.
 */
function formatSuggestion(suggestion: Suggestion, index: number, options: DisplayOptions): string {
  const yellowCode = options.colors ? '\x1b[33m' : '';
  const resetCode = options.colors ? '\x1b[0m' : '';
  const dimCode = options.colors ? '\x1b[2m' : '';

  const prefix = `${yellowCode}${String(index)}.${resetCode}`;
  const actionText =
    suggestion.action !== undefined ? `\n    ${dimCode}${suggestion.action}${resetCode}` : '';

  return `  ${prefix} ${suggestion.text}${actionText}`;
}

/**
 * Formats error message with contextual suggestions.
 *
 * @param errorMessage - The error message.
 * @param context - Additional error context.
 * @param options - Display options.
 * @returns Formatted error with suggestions.
 */
export function formatErrorWithSuggestions(
  errorMessage: string,
  context: Partial<ErrorContext> = {},
  options: DisplayOptions = { colors: true }
): string {
  const errorType = context.errorType ?? inferErrorType(errorMessage);
  const suggestions = ERROR_SUGGESTIONS[errorType];

  const boldCode = options.colors ? '\x1b[1m' : '';
  const resetCode = options.colors ? '\x1b[0m' : '';
  const redCode = options.colors ? '\x1b[31m' : '';
  const yellowCode = options.colors ? '\x1b[33m' : '';

  let result = `${redCode}Error:${resetCode} ${errorMessage}`;

  if (context.details?.filePath !== undefined) {
    result += `\n  ${yellowCode}File:${resetCode} ${context.details.filePath}`;
  }

  result += `\n\n${boldCode}Suggestions:${resetCode}`;
  suggestions.forEach((suggestion, index) => {
    result += '\n' + formatSuggestion(suggestion, index + 1, options);
  });

  return result;
}

/**
 * Displays error message with suggestions to console.
 *
 * @param errorMessage - The error message.
 * @param context - Additional error context.
 * @param options - Display options.
 */
export function displayErrorWithSuggestions(
  errorMessage: string,
  context: Partial<ErrorContext> = {},
  options: DisplayOptions = { colors: true }
): void {
  console.error();
  console.error(formatErrorWithSuggestions(errorMessage, context, options));
  console.error();
}
