/**
 * Proactive alias inference from shared name prefixes.
 *
 * Every namespace's constants are partitioned greedily into aliases named
 * after the longest underscore-token prefixes they share.
 *
 * @packageDocumentation
 */

import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import { MIN_ALIAS_MEMBERS } from './alias-store.js';
import type { GenerationContext } from './context.js';
import { compareStrings, qualify, splitTokens } from './names.js';
import type { AliasGroup } from './types.js';

/**
 * A prefix shared by at least two constants.
 */
export interface PrefixCandidate {
  readonly prefix: string;
  readonly tokenCount: number;
  /** Matching short names in input order. */
  readonly members: readonly string[];
}

/**
 * One group of the partition.
 */
export interface PrefixGroup {
  readonly prefix: string;
  readonly members: readonly string[];
}

/**
 * Collects every prefix shared by at least two names, most specific first.
 *
 * For a name of n tokens the prefixes of 1 to n-1 tokens are candidates; a
 * name matches a prefix only when it literally starts with the prefix
 * followed by `_`. Ties on token count are broken by prefix.
 *
 * @param shortNames - Constant short names in catalog order.
 * @returns Candidates sorted by token count descending, then prefix.
 */
export function collectPrefixCandidates(shortNames: readonly string[]): PrefixCandidate[] {
  const matches = new Map<string, { tokenCount: number; members: string[] }>();

  for (const shortName of shortNames) {
    const tokens = splitTokens(shortName);

    for (let length = 1; length < tokens.length; length++) {
      const prefix = tokens.slice(0, length).join('_');

      if (!shortName.startsWith(`${prefix}_`)) {
        continue;
      }

      let entry = matches.get(prefix);
      if (entry === undefined) {
        entry = { tokenCount: length, members: [] };
        matches.set(prefix, entry);
      }
      if (!entry.members.includes(shortName)) {
        entry.members.push(shortName);
      }
    }
  }

  return [...matches]
    .filter(([, entry]) => entry.members.length >= MIN_ALIAS_MEMBERS)
    .map(([prefix, entry]) => ({ prefix, tokenCount: entry.tokenCount, members: entry.members }))
    .sort((a, b) => b.tokenCount - a.tokenCount || compareStrings(a.prefix, b.prefix));
}

/**
 * Partitions names into non-overlapping prefix groups.
 *
 * Candidates are walked most specific first; each claims the names no
 * earlier group took, and becomes a group only when at least two remain.
 *
 * @param shortNames - Constant short names in catalog order.
 * @returns Groups in claim order.
 */
export function partitionByPrefix(shortNames: readonly string[]): PrefixGroup[] {
  const claimed = new Set<string>();
  const groups: PrefixGroup[] = [];

  for (const candidate of collectPrefixCandidates(shortNames)) {
    const available = candidate.members.filter((name) => !claimed.has(name));

    if (available.length < MIN_ALIAS_MEMBERS) {
      continue;
    }

    for (const name of available) {
      claimed.add(name);
    }
    groups.push({ prefix: candidate.prefix, members: available });
  }

  return groups;
}

/**
 * Registers prefix aliases for every namespace of the catalog.
 *
 * @param context - Generation context.
 * @param log - Logger for debug output.
 * @returns The aliases registered, in namespace order.
 */
export function inferConstantAliases(
  context: GenerationContext,
  log: Logger = defaultLogger
): AliasGroup[] {
  const registered: AliasGroup[] = [];
  const namespaces = context.catalog.namespaces().sort(compareStrings);

  for (const namespace of namespaces) {
    const shortNames = context.catalog.constantsOf(namespace).map((constant) => constant.shortName);

    for (const group of partitionByPrefix(shortNames)) {
      const members = group.members.map((name) => qualify(namespace, name));
      context.aliases.register(namespace, group.prefix, members);

      const alias = context.aliases.get(namespace, group.prefix);
      if (alias !== undefined) {
        registered.push(alias);
        log.debug('alias_inferred', {
          alias: alias.qualifiedName,
          members: members.length,
        });
      }
    }
  }

  return registered;
}
