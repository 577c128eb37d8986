/**
 * Type definitions for the generation pipeline.
 *
 * @packageDocumentation
 */

import type { Config } from '../config/types.js';
import type { Logger } from '../utils/logger.js';

/**
 * One rendered annotation file.
 */
export interface RenderedNamespace {
  /** Namespace the unit declares; also its file name. */
  readonly namespace: string;
  /** Complete annotation text. */
  readonly content: string;
}

/**
 * Options for an in-memory generation run.
 */
export interface GenerateOptions {
  readonly config: Config;
  /** Version printed in every header, e.g. `1.9.0`. */
  readonly version: string;
  readonly logger?: Logger;
  /** Overrides `config.generation.strict`. */
  readonly strict?: boolean;
}

/**
 * Error codes for generator failures.
 */
export type GeneratorErrorCode =
  | 'MODULE_PARSE_ERROR'
  | 'CONFIG_ERROR'
  | 'FILE_WRITE_ERROR'
  | 'UNKNOWN_TYPE';

/**
 * Error class for a failed generation run.
 */
export class GeneratorError extends Error {
  /** The error code for programmatic handling. */
  public readonly code: GeneratorErrorCode;
  /** The underlying error. */
  public override readonly cause: Error | undefined;

  constructor(message: string, code: GeneratorErrorCode, cause?: Error) {
    super(message);
    this.name = 'GeneratorError';
    this.code = code;
    this.cause = cause;
  }
}
