/**
 * Registry of constant aliases with merge-by-identity.
 *
 * @packageDocumentation
 */

import { compareStrings, qualify, splitQualifiedName } from './names.js';
import type { AliasGroup } from './types.js';

/**
 * Minimum number of members a new alias needs.
 */
export const MIN_ALIAS_MEMBERS = 2;

/**
 * Aliases per namespace. Registering into an existing identity merges the
 * members; an alias is never replaced or removed.
 */
export class AliasStore {
  private readonly byNamespace = new Map<string, Map<string, Set<string>>>();

  /**
   * Registers an alias or merges members into an existing one.
   *
   * @param namespace - Owning namespace.
   * @param aliasName - Alias name within the namespace.
   * @param members - Member full names.
   * @returns True when the alias exists after the call.
   */
  register(namespace: string, aliasName: string, members: readonly string[]): boolean {
    let aliases = this.byNamespace.get(namespace);
    const existing = aliases?.get(aliasName);

    if (existing !== undefined) {
      for (const member of members) {
        existing.add(member);
      }
      return true;
    }

    const unique = new Set(members);
    if (unique.size < MIN_ALIAS_MEMBERS) {
      return false;
    }

    if (aliases === undefined) {
      aliases = new Map();
      this.byNamespace.set(namespace, aliases);
    }
    aliases.set(aliasName, unique);
    return true;
  }

  has(namespace: string, aliasName: string): boolean {
    return this.byNamespace.get(namespace)?.has(aliasName) ?? false;
  }

  /**
   * Checks whether a type token names a registered alias.
   *
   * @param typeName - e.g. `gui.PROP`.
   * @returns True when registered in any namespace.
   */
  hasQualified(typeName: string): boolean {
    const parts = splitQualifiedName(typeName);
    return parts !== undefined && this.has(parts.namespace, parts.shortName);
  }

  get(namespace: string, aliasName: string): AliasGroup | undefined {
    const members = this.byNamespace.get(namespace)?.get(aliasName);
    return members === undefined ? undefined : toGroup(namespace, aliasName, members);
  }

  /**
   * Aliases of one namespace sorted by name.
   *
   * @param namespace - Namespace to list.
   * @returns The aliases, empty for an unknown namespace.
   */
  aliasesOf(namespace: string): AliasGroup[] {
    const aliases = this.byNamespace.get(namespace);
    if (aliases === undefined) {
      return [];
    }

    return [...aliases.keys()]
      .sort(compareStrings)
      .map((aliasName) => toGroup(namespace, aliasName, aliases.get(aliasName) ?? new Set()));
  }

  /**
   * Finds the narrowest alias containing a constant. Ties go to the first
   * alias name.
   *
   * @param namespace - Namespace to search.
   * @param fullName - Member full name.
   * @returns The alias, if any.
   */
  findByMember(namespace: string, fullName: string): AliasGroup | undefined {
    let best: AliasGroup | undefined;
    for (const group of this.aliasesOf(namespace)) {
      if (!group.members.includes(fullName)) {
        continue;
      }
      if (best === undefined || group.members.length < best.members.length) {
        best = group;
      }
    }
    return best;
  }

  /**
   * Namespaces with at least one alias, sorted.
   */
  namespaces(): string[] {
    return [...this.byNamespace.keys()].sort(compareStrings);
  }

  /**
   * Every alias, namespaces and names sorted.
   */
  all(): AliasGroup[] {
    return this.namespaces().flatMap((namespace) => this.aliasesOf(namespace));
  }
}

function toGroup(namespace: string, aliasName: string, members: ReadonlySet<string>): AliasGroup {
  return {
    namespace,
    aliasName,
    qualifiedName: qualify(namespace, aliasName),
    members: [...members],
  };
}
