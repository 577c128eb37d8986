/**
 * Type-signature rendering.
 *
 * Each declared type list goes through reference resolution, then every
 * token is replaced, validated and normalized before the list is joined
 * into a union.
 *
 * @packageDocumentation
 */

import type { Config } from '../config/types.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import type { GenerationContext } from './context.js';
import { stripLiteralMarker } from './names.js';
import { resolveConstantReferences } from './reference-resolver.js';
import type { TypeRole } from './types.js';

/**
 * Thrown in strict mode for the first token that is not a known type.
 */
export class UnknownTypeError extends Error {
  /** The offending token after replacement. */
  public readonly typeName: string;
  /** Full name of the element the token was declared on. */
  public readonly elementName: string;

  /**
   * Creates a new UnknownTypeError.
   *
   * @param typeName - The unknown token.
   * @param elementName - The element declaring it.
   */
  constructor(typeName: string, elementName: string) {
    super(`Unknown type '${typeName}' in '${elementName}'`);
    this.name = 'UnknownTypeError';
    this.typeName = typeName;
    this.elementName = elementName;
  }
}

/**
 * Configuration sections the renderer reads.
 */
export type TypeRenderConfig = Pick<Config, 'types' | 'replacements'>;

/**
 * Options for creating a renderer.
 */
export interface TypeRendererOptions {
  readonly config: TypeRenderConfig;
  /** Abort on the first unknown token instead of substituting the sentinel. */
  readonly strict?: boolean;
  readonly logger?: Logger;
}

/**
 * One parameter or return type list.
 */
export interface TypeListRequest {
  /** Full name of the declaring element, e.g. `gui.animate`. */
  readonly elementName: string;
  /** Rendered parameter name, used for per-element replacement keys. */
  readonly parameterName: string;
  readonly role: TypeRole;
  readonly types: readonly string[];
  readonly description?: string;
}

interface CompiledReplacement {
  readonly pattern: RegExp;
  readonly replacement: string;
}

const CALLABLE_PREFIX = 'function(';

/**
 * Renders declared type lists into annotation unions.
 */
export class TypeSignatureRenderer {
  private readonly context: GenerationContext;
  private readonly config: TypeRenderConfig;
  private readonly strict: boolean;
  private readonly logger: Logger;
  private readonly replacements: readonly CompiledReplacement[];
  private readonly knownTypes: ReadonlySet<string>;
  private readonly localReplacements: ReadonlyMap<string, ReadonlyMap<string, string>>;

  /**
   * Creates a renderer bound to one generation context.
   *
   * @param context - Generation context.
   * @param options - Configuration and behaviour.
   */
  constructor(context: GenerationContext, options: TypeRendererOptions) {
    this.context = context;
    this.config = options.config;
    this.strict = options.strict ?? false;
    this.logger = options.logger ?? defaultLogger;
    this.replacements = Object.entries(options.config.replacements.types).map(
      ([pattern, replacement]) => ({ pattern: new RegExp(`^(?:${pattern})$`), replacement })
    );
    this.localReplacements = new Map(
      Object.entries(options.config.replacements.local_types).map(
        ([element, table]): [string, ReadonlyMap<string, string>] => [
          element,
          new Map(Object.entries(table)),
        ]
      )
    );
    this.knownTypes = new Set([
      ...options.config.types.known,
      ...options.config.types.classes,
      ...options.config.types.aliases,
    ]);
  }

  /**
   * Renders one type list, resolving constant references first.
   *
   * @param request - The type list.
   * @returns Tokens joined with `|`, or the sentinel for an empty list.
   * @throws UnknownTypeError in strict mode.
   */
  renderTypeList(request: TypeListRequest): string {
    const resolved = resolveConstantReferences(this.context, {
      types: request.types,
      ...(request.description !== undefined ? { description: request.description } : {}),
    });

    const rendered: string[] = [];
    for (const token of resolved.types) {
      const type = this.renderToken(token, request);
      if (!rendered.includes(type)) {
        rendered.push(type);
      }
    }

    return rendered.length > 0 ? rendered.join('|') : this.config.types.unknown;
  }

  /**
   * Replaces, validates and normalizes one token.
   *
   * @param token - Token from a resolved list.
   * @param request - The list the token belongs to.
   * @returns The rendered token, or the sentinel when unknown.
   */
  renderToken(token: string, request: TypeListRequest): string {
    let type = stripLiteralMarker(token);
    const replacement = this.findReplacement(type, request);
    const replaced = replacement !== undefined;

    if (replacement !== undefined) {
      type = replacement;
    }

    if (!replaced && !this.isKnownType(type)) {
      this.logger.warn('unknown_type', {
        type,
        element: request.elementName,
        parameter: request.parameterName,
        replacement: this.config.types.unknown,
      });

      if (this.strict) {
        throw new UnknownTypeError(type, request.elementName);
      }
      return this.config.types.unknown;
    }

    type = type.replace(/function\(\)/g, 'function');
    if (type.startsWith(CALLABLE_PREFIX)) {
      type = `fun${type.slice(CALLABLE_PREFIX.length - 1)}`;
    }
    return type;
  }

  /**
   * Checks a token against the configured tables and the alias store.
   *
   * @param type - Token after replacement.
   * @returns True when the token is a known type.
   */
  isKnownType(type: string): boolean {
    return (
      this.knownTypes.has(type) ||
      this.context.aliases.hasQualified(type) ||
      type.startsWith(CALLABLE_PREFIX)
    );
  }

  private findReplacement(type: string, request: TypeListRequest): string | undefined {
    const localReplacement = this.localReplacements
      .get(request.elementName)
      ?.get(`${request.role}_${type}_${request.parameterName}`);

    if (localReplacement !== undefined) {
      return localReplacement;
    }

    return this.replacements.find(({ pattern }) => pattern.test(type))?.replacement;
  }
}
