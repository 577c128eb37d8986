/**
 * Type definitions for API module descriptors.
 *
 * A module descriptor describes one namespace of a scripting API: its
 * constants, functions, variables, classes and static aliases, with the
 * declared type tokens of every parameter and return value.
 *
 * @packageDocumentation
 */

/**
 * Element kinds understood by the generator.
 */
export const ELEMENT_KINDS = ['constant', 'function', 'variable', 'class', 'alias'] as const;

/**
 * A supported element kind.
 */
export type ElementKind = (typeof ELEMENT_KINDS)[number];

/**
 * Type guard for supported element kinds.
 *
 * @param value - The kind string to check.
 * @returns True if the kind is rendered by the generator.
 */
export function isElementKind(value: string): value is ElementKind {
  return ELEMENT_KINDS.includes(value as ElementKind);
}

/**
 * A function parameter or return value.
 */
export interface ApiParameter {
  /** Parameter name as declared. */
  readonly name: string;
  /** Free-text description, may contain inline HTML. */
  readonly doc?: string;
  /** Declared type tokens. */
  readonly types: readonly string[];
  /** Whether the parameter may be omitted. */
  readonly optional?: boolean;
}

/**
 * A named constant, e.g. `gui.PROP_POSITION`.
 */
export interface ConstantElement {
  readonly kind: 'constant';
  readonly name: string;
  readonly description?: string;
}

/**
 * A function with its parameters and return values.
 */
export interface FunctionElement {
  readonly kind: 'function';
  readonly name: string;
  readonly description?: string;
  readonly parameters: readonly ApiParameter[];
  readonly returns: readonly ApiParameter[];
}

/**
 * A global or namespaced variable.
 */
export interface VariableElement {
  readonly kind: 'variable';
  readonly name: string;
  readonly description?: string;
}

/**
 * Operator overload of a class, e.g. `add(vector3): vector3`.
 */
export interface ClassOperator {
  /** Operand type; absent for unary operators. */
  readonly param?: string;
  /** Result type. */
  readonly result: string;
}

/**
 * A class declaration with typed fields.
 */
export interface ClassElement {
  readonly kind: 'class';
  readonly name: string;
  readonly fields: Readonly<Record<string, string>>;
  /** Whether the class is also a global table. */
  readonly global: boolean;
  readonly operators: Readonly<Record<string, ClassOperator>>;
}

/**
 * A static alias declaration, e.g. `---@alias hash userdata`.
 */
export interface AliasElement {
  readonly kind: 'alias';
  readonly name: string;
  readonly definition: string;
}

/**
 * An element of a kind the generator does not render. Kept so that a module
 * made only of such elements can be reported as skipped.
 */
export interface UnsupportedElement {
  readonly kind: 'unsupported';
  readonly name: string;
  /** The kind string found in the descriptor. */
  readonly sourceKind: string;
}

/**
 * Any element of a module.
 */
export type ApiElement =
  | ConstantElement
  | FunctionElement
  | VariableElement
  | ClassElement
  | AliasElement
  | UnsupportedElement;

/**
 * Elements that produce output.
 */
export type RenderableElement = Exclude<ApiElement, UnsupportedElement>;

/**
 * One module descriptor.
 */
export interface ApiModule {
  /** Namespace, e.g. `gui` or `foo.bar`. May be empty. */
  readonly namespace: string;
  /** One-line title. */
  readonly brief: string;
  /** Longer description, may contain inline HTML. */
  readonly description: string;
  readonly elements: readonly ApiElement[];
}

/**
 * Descriptor document formats.
 */
export type ModuleFormat = 'toml' | 'json';

/**
 * Error thrown when a module descriptor document is malformed.
 */
export class ModuleParseError extends Error {
  /** The original error that caused the parse failure, if any. */
  public override readonly cause: Error | undefined;
  /** The source file, when the document was read from disk. */
  public readonly source: string | undefined;

  /**
   * Creates a new ModuleParseError.
   *
   * @param message - Descriptive error message.
   * @param options - The underlying error and source file, if known.
   */
  constructor(message: string, options?: { cause?: Error; source?: string }) {
    super(message);
    this.name = 'ModuleParseError';
    this.cause = options?.cause;
    this.source = options?.source;
  }
}
