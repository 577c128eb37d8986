/**
 * Type definitions for the constant-alias engine.
 *
 * @packageDocumentation
 */

/**
 * Primitive a constant renders as. Constants start as `integer`; the
 * reference resolver may switch them to `string` or `hash` once.
 */
export type ConstantType = 'integer' | 'string' | 'hash';

/**
 * Rendered type of a constant nothing has resolved yet.
 */
export const DEFAULT_CONSTANT_TYPE: ConstantType = 'integer';

/**
 * Placeholder token standing for "one of this namespace's constants".
 */
export const CONSTANT_PLACEHOLDER = 'constant';

/**
 * Prefix marking a token as an explicit literal reference.
 */
export const LITERAL_MARKER = 'type:';

/**
 * A declared constant.
 */
export interface Constant {
  /** Full dotted name, e.g. `foo.bar.SETTING_A`. */
  readonly fullName: string;
  /** Everything before the last dot, e.g. `foo.bar`. */
  readonly namespace: string;
  /** Everything after the last dot, e.g. `SETTING_A`. */
  readonly shortName: string;
  readonly description: string;
  renderedType: ConstantType;
}

/**
 * A named union over constants of one namespace.
 */
export interface AliasGroup {
  readonly namespace: string;
  readonly aliasName: string;
  /** `namespace.aliasName`, the name used in type lists. */
  readonly qualifiedName: string;
  /** Member full names in registration order. */
  readonly members: readonly string[];
}

/**
 * Whether a type list belongs to a parameter or a return value.
 */
export type TypeRole = 'param' | 'return';

/**
 * Sink for the per-namespace declarations the engine produces.
 */
export interface DeclarationWriter {
  /**
   * Receives one alias with its members already sorted.
   *
   * @param name - Qualified alias name.
   * @param orderedMembers - Member full names in output order.
   */
  writeAlias(name: string, orderedMembers: readonly string[]): void;

  /**
   * Receives one constant field.
   *
   * @param name - Field name (the constant's short name).
   * @param type - Final rendered type.
   * @param description - Raw description, possibly empty.
   */
  writeField(name: string, type: ConstantType, description: string): void;
}
