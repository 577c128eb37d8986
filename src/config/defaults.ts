/**
 * Default configuration values for annotations.toml.
 *
 * @packageDocumentation
 */

import type {
  Config,
  GenerationConfig,
  IgnoreConfig,
  OutputConfig,
  ReplacementsConfig,
  TypesConfig,
} from './types.js';

/**
 * Default output settings.
 */
export const DEFAULT_OUTPUT: OutputConfig = {
  folder: 'api',
  extension: '.lua',
  generator_url: 'https://example.com/api-annotations',
  product: 'API',
  class_prefix: 'api',
  disabled_diagnostics: [
    'lowercase-global',
    'missing-return',
    'duplicate-doc-param',
    'duplicate-set-field',
    'args-after-dots',
  ],
};

/**
 * Default type tables.
 *
 * `constant` is known so that a placeholder which resolved to no alias still
 * renders as itself.
 */
export const DEFAULT_TYPES: TypesConfig = {
  known: [
    'nil',
    'boolean',
    'number',
    'integer',
    'string',
    'table',
    'function',
    'thread',
    'userdata',
    'lightuserdata',
    'any',
    'hash',
    'url',
    'node',
    'vector',
    'vector3',
    'vector4',
    'quaternion',
    'matrix4',
    'buffer',
    'constant',
  ],
  unknown: 'any',
  classes: [],
  aliases: [],
  generics: {},
};

/**
 * Default replacement tables. Lua keywords are renamed so that they can be
 * used as parameter names.
 */
export const DEFAULT_REPLACEMENTS: ReplacementsConfig = {
  types: {},
  names: {
    function: 'func',
    end: '_end',
    repeat: '_repeat',
  },
  local_types: {},
  local_names: {},
};

/**
 * Default ignore list (nothing ignored).
 */
export const DEFAULT_IGNORE: IgnoreConfig = {
  functions: [],
};

/**
 * Default run behaviour.
 */
export const DEFAULT_GENERATION: GenerationConfig = {
  strict: false,
  debug: false,
};

/**
 * Complete default configuration.
 */
export const DEFAULT_CONFIG: Config = {
  output: DEFAULT_OUTPUT,
  types: DEFAULT_TYPES,
  replacements: DEFAULT_REPLACEMENTS,
  ignore: DEFAULT_IGNORE,
  generation: DEFAULT_GENERATION,
};
