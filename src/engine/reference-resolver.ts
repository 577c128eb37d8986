/**
 * Reactive alias resolution for one parameter or return type list.
 *
 * Constants a type list refers to, directly or through its description, are
 * folded into an alias that replaces them in the list, followed by a
 * fallback primitive.
 *
 * @packageDocumentation
 */

import type { GenerationContext } from './context.js';
import { qualify, splitQualifiedName, splitTokens, stripLiteralMarker } from './names.js';
import { CONSTANT_PLACEHOLDER, type ConstantType } from './types.js';

/**
 * Matches `namespace.NAME` and `namespace.PREFIX*`, where the namespace may
 * have several levels.
 */
const REFERENCE_PATTERN = /([A-Za-z_]\w*(?:\.[A-Za-z_]\w*)*)\.([\w*]+)/g;

/**
 * A type list to resolve.
 */
export interface ReferenceRequest {
  /** Declared type tokens. */
  readonly types: readonly string[];
  /** Raw description of the parameter, scanned for constant names. */
  readonly description?: string;
}

/**
 * Result of resolving one type list.
 */
export interface ResolvedTypeList {
  /** Rebuilt type tokens, still to be normalized. */
  readonly types: string[];
  /** Qualified aliases substituted, in production order. */
  readonly aliases: string[];
  /** Fallback appended, when an alias was produced. */
  readonly fallback: ConstantType | undefined;
}

/**
 * Constants recorded for one namespace, in first-seen order.
 */
interface RecordedNamespace {
  readonly shortNames: string[];
}

/**
 * Longest run of leading tokens shared by every name.
 *
 * @param shortNames - Names to compare.
 * @returns The run joined with `_`, or undefined when there is none.
 */
export function findCommonTokenRun(shortNames: readonly string[]): string | undefined {
  let common: string[] | undefined;

  for (const shortName of shortNames) {
    const tokens = splitTokens(shortName);

    if (common === undefined) {
      common = tokens;
    } else {
      const limit = Math.min(common.length, tokens.length);
      let length = 0;
      while (length < limit && common[length] === tokens[length]) {
        length++;
      }
      common = common.slice(0, length);
    }

    if (common.length === 0) {
      return undefined;
    }
  }

  return common === undefined || common.length === 0 ? undefined : common.join('_');
}

/**
 * Lists the constant full names a description mentions. A trailing `*`
 * expands to every registered constant of the namespace whose short name
 * starts with the text before it.
 *
 * @param context - Generation context.
 * @param description - Raw description text.
 * @returns Full names of registered constants in mention order.
 */
export function scanDescription(context: GenerationContext, description: string): string[] {
  const found: string[] = [];

  for (const match of description.matchAll(REFERENCE_PATTERN)) {
    const namespace = match[1];
    const rawName = match[2];
    if (namespace === undefined || rawName === undefined) {
      continue;
    }

    if (rawName.includes('*')) {
      const prefix = rawName.replace(/\*/g, '');
      for (const constant of context.catalog.constantsOf(namespace)) {
        if (constant.shortName.startsWith(prefix)) {
          found.push(constant.fullName);
        }
      }
    } else if (context.catalog.lookup(namespace, rawName) !== undefined) {
      found.push(qualify(namespace, rawName));
    }
  }

  return found;
}

/**
 * Picks the fallback primitive from the declared types.
 *
 * @param types - Declared tokens with markers stripped.
 * @returns `string` over `hash` over `integer`.
 */
function pickFallback(types: readonly string[]): ConstantType {
  if (types.includes('string')) {
    return 'string';
  }
  return types.includes('hash') ? 'hash' : 'integer';
}

/**
 * Resolves the constants one type list refers to into aliases.
 *
 * @param context - Generation context; aliases and rendered types are written here.
 * @param request - The type list and its description.
 * @returns The rebuilt type list.
 */
export function resolveConstantReferences(
  context: GenerationContext,
  request: ReferenceRequest
): ResolvedTypeList {
  const { catalog, aliases } = context;
  const declared = request.types.map(stripLiteralMarker);
  const recorded = new Map<string, RecordedNamespace>();

  const record = (fullName: string): void => {
    const parts = splitQualifiedName(fullName);
    if (parts === undefined || catalog.lookup(parts.namespace, parts.shortName) === undefined) {
      return;
    }

    let entry = recorded.get(parts.namespace);
    if (entry === undefined) {
      entry = { shortNames: [] };
      recorded.set(parts.namespace, entry);
    }
    if (!entry.shortNames.includes(parts.shortName)) {
      entry.shortNames.push(parts.shortName);
    }
  };

  for (const type of declared) {
    if (type !== CONSTANT_PLACEHOLDER) {
      record(type);
    }
  }

  if (declared.includes(CONSTANT_PLACEHOLDER) && request.description !== undefined) {
    for (const fullName of scanDescription(context, request.description)) {
      record(fullName);
    }
  }

  const substitutions = new Map<string, string>();
  const produced: string[] = [];

  const substitute = (fullName: string, alias: string): void => {
    substitutions.set(fullName, alias);
    if (!produced.includes(alias)) {
      produced.push(alias);
    }
  };

  for (const [namespace, { shortNames }] of recorded) {
    const run = shortNames.length >= 2 ? findCommonTokenRun(shortNames) : undefined;
    const fullNames = shortNames.map((name) => qualify(namespace, name));

    if (run !== undefined && aliases.register(namespace, run, fullNames)) {
      const alias = qualify(namespace, run);
      for (const fullName of fullNames) {
        substitute(fullName, alias);
      }
      continue;
    }

    for (const fullName of fullNames) {
      const existing = aliases.findByMember(namespace, fullName);
      if (existing !== undefined) {
        substitute(fullName, existing.qualifiedName);
      }
    }
  }

  if (produced.length === 0) {
    return { types: declared, aliases: [], fallback: undefined };
  }

  const types: string[] = [];
  for (const type of declared) {
    if (type === CONSTANT_PLACEHOLDER) {
      continue;
    }

    const alias = substitutions.get(type);
    if (alias === undefined) {
      types.push(type);
    } else if (!types.includes(alias)) {
      types.push(alias);
    }
  }

  for (const alias of produced) {
    if (!types.includes(alias)) {
      types.push(alias);
    }
  }

  const fallback = pickFallback(declared);
  types.push(fallback);

  for (const fullName of substitutions.keys()) {
    catalog.setRenderedType(fullName, fallback);
  }

  return { types, aliases: produced, fallback };
}
