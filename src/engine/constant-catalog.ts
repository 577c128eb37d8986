/**
 * Per-namespace registry of declared constants.
 *
 * @packageDocumentation
 */

import { qualify, splitQualifiedName } from './names.js';
import { DEFAULT_CONSTANT_TYPE, type Constant, type ConstantType } from './types.js';

/**
 * Ordered set of constants per namespace, keyed by short name.
 *
 * The first registration of an identity wins. Iteration follows
 * registration order, both across namespaces and within one.
 */
export class ConstantCatalog implements Iterable<Constant> {
  private readonly byNamespace = new Map<string, Map<string, Constant>>();

  /**
   * Registers a constant under an explicit namespace and short name.
   *
   * @param namespace - Owning namespace.
   * @param shortName - Name within the namespace.
   * @param description - Raw description.
   * @returns The registered constant, or the existing one for a duplicate.
   */
  register(namespace: string, shortName: string, description = ''): Constant {
    let constants = this.byNamespace.get(namespace);
    if (constants === undefined) {
      constants = new Map();
      this.byNamespace.set(namespace, constants);
    }

    const existing = constants.get(shortName);
    if (existing !== undefined) {
      return existing;
    }

    const constant: Constant = {
      fullName: qualify(namespace, shortName),
      namespace,
      shortName,
      description,
      renderedType: DEFAULT_CONSTANT_TYPE,
    };
    constants.set(shortName, constant);
    return constant;
  }

  /**
   * Registers a constant from its full dotted name. Names without a
   * namespace separator are dropped.
   *
   * @param fullName - e.g. `gui.PROP_POSITION`.
   * @param description - Raw description.
   * @returns The registered constant, or undefined when the name was dropped.
   */
  registerElement(fullName: string, description = ''): Constant | undefined {
    const parts = splitQualifiedName(fullName);
    if (parts === undefined) {
      return undefined;
    }
    return this.register(parts.namespace, parts.shortName, description);
  }

  lookup(namespace: string, shortName: string): Constant | undefined {
    return this.byNamespace.get(namespace)?.get(shortName);
  }

  /**
   * Looks a constant up by its full dotted name.
   *
   * @param fullName - e.g. `gui.PROP_POSITION`.
   * @returns The constant, if registered.
   */
  lookupQualified(fullName: string): Constant | undefined {
    const parts = splitQualifiedName(fullName);
    return parts === undefined ? undefined : this.lookup(parts.namespace, parts.shortName);
  }

  /**
   * Records the primitive a constant renders as. A constant already moved
   * off the default keeps its type.
   *
   * @param fullName - Constant full name; unknown names are ignored.
   * @param type - The new rendered type.
   */
  setRenderedType(fullName: string, type: ConstantType): void {
    const constant = this.lookupQualified(fullName);

    if (constant === undefined || constant.renderedType !== DEFAULT_CONSTANT_TYPE) {
      return;
    }

    constant.renderedType = type;
  }

  /**
   * Namespaces in first-registration order.
   */
  namespaces(): string[] {
    return [...this.byNamespace.keys()];
  }

  /**
   * Constants of one namespace in registration order.
   *
   * @param namespace - Namespace to list.
   * @returns The constants, empty for an unknown namespace.
   */
  constantsOf(namespace: string): Constant[] {
    const constants = this.byNamespace.get(namespace);
    return constants === undefined ? [] : [...constants.values()];
  }

  get size(): number {
    let total = 0;
    for (const constants of this.byNamespace.values()) {
      total += constants.size;
    }
    return total;
  }

  *[Symbol.iterator](): Iterator<Constant> {
    for (const constants of this.byNamespace.values()) {
      yield* constants.values();
    }
  }
}
