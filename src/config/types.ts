/**
 * Configuration types for annotations.toml parsing.
 *
 * @packageDocumentation
 */

/**
 * Output layout and header settings.
 */
export interface OutputConfig {
  /** Directory the annotation files are written to. */
  folder: string;
  /** Extension of every written file, including the dot. */
  extension: string;
  /** URL printed in every file header. */
  generator_url: string;
  /** Product name printed before the version in every file header. */
  product: string;
  /** Prefix of the `---@class` declared for each namespace. */
  class_prefix: string;
  /** Language server diagnostics disabled at the top of every file. */
  disabled_diagnostics: string[];
}

/**
 * Type tables used to validate declared type tokens.
 */
export interface TypesConfig {
  /** Primitive and built-in type names. */
  known: string[];
  /** Sentinel substituted for unknown type tokens. */
  unknown: string;
  /** Class names declared elsewhere. */
  classes: string[];
  /** Alias names declared elsewhere. */
  aliases: string[];
  /** Element full name to the type that becomes a generic `T` in its signature. */
  generics: Record<string, string>;
}

/**
 * Replacement tables applied to parameter names and type tokens.
 */
export interface ReplacementsConfig {
  /** Pattern (matched against the whole token) to replacement type. */
  types: Record<string, string>;
  /** Parameter name to replacement name. */
  names: Record<string, string>;
  /**
   * Element full name to a table keyed by `param_<type>_<name>` or
   * `return_<type>_<name>`.
   */
  local_types: Record<string, Record<string, string>>;
  /** Element full name to a table keyed by `param_<name>` or `return_<name>`. */
  local_names: Record<string, Record<string, string>>;
}

/**
 * Elements left out of the output.
 */
export interface IgnoreConfig {
  /** Function name patterns (matched against the whole name). */
  functions: string[];
}

/**
 * Run behaviour.
 */
export interface GenerationConfig {
  /** Abort on the first unknown type token instead of substituting the sentinel. */
  strict: boolean;
  /** Write debug log entries. */
  debug: boolean;
}

/**
 * Complete generator configuration.
 */
export interface Config {
  output: OutputConfig;
  types: TypesConfig;
  replacements: ReplacementsConfig;
  ignore: IgnoreConfig;
  generation: GenerationConfig;
}

/**
 * Configuration with every section and field optional, used for overrides.
 */
export type PartialConfig = {
  [K in keyof Config]?: Partial<Config[K]>;
};
