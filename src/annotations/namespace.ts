/**
 * Namespace-level composition: fields, aliases, declaration body and the
 * namespace class wrapper.
 *
 * @packageDocumentation
 */

import type { RenderableElement } from '../api/types.js';
import { compareStrings } from '../engine/names.js';
import type { ConstantType, DeclarationWriter } from '../engine/types.js';
import { makeComment } from './text.js';

/**
 * Collects the fields and aliases of one namespace as annotation text.
 */
export class NamespaceDeclarations implements DeclarationWriter {
  private readonly fieldLines: string[] = [];
  private readonly aliasBlocks: string[] = [];

  writeAlias(name: string, orderedMembers: readonly string[]): void {
    this.aliasBlocks.push(
      [`---@alias ${name}`, ...orderedMembers.map((member) => `---| \`${member}\``)].join('\n')
    );
  }

  writeField(name: string, type: ConstantType, description: string): void {
    if (description !== '') {
      this.fieldLines.push(makeComment(description));
    }
    this.fieldLines.push(`---@field ${name} ${type}`);
  }

  /**
   * Field lines with a trailing newline, or an empty string.
   */
  get fields(): string {
    const text = this.fieldLines.join('\n');
    return text === '' ? '' : `${text}\n`;
  }

  /**
   * Alias declarations separated by blank lines.
   */
  get aliases(): string {
    return this.aliasBlocks.join('\n\n');
  }
}

/** Output order of element kinds. */
const KIND_RANK: Readonly<Record<RenderableElement['kind'], number>> = {
  variable: 0,
  function: 1,
  constant: 1,
  class: 2,
  alias: 3,
};

/**
 * Sorts elements by kind rank, then name.
 *
 * @param elements - Elements to sort.
 * @returns A sorted copy.
 */
export function sortElements<T extends RenderableElement>(elements: readonly T[]): T[] {
  return [...elements].sort(
    (a, b) => KIND_RANK[a.kind] - KIND_RANK[b.kind] || compareStrings(a.name, b.name)
  );
}

/**
 * A rendered declaration with the kind that produced it.
 */
export interface RenderedDeclaration {
  readonly kind: RenderableElement['kind'];
  readonly text: string;
}

/**
 * Joins the alias block and declarations into a namespace body. Static
 * aliases are followed by a single newline, everything else by a blank
 * line. Trailing whitespace is removed.
 *
 * @param aliases - Alias block, possibly empty.
 * @param declarations - Rendered declarations in output order.
 * @returns The body text.
 */
export function composeBody(aliases: string, declarations: readonly RenderedDeclaration[]): string {
  let body = '';

  declarations.forEach((declaration, index) => {
    body += declaration.text;
    if (index < declarations.length - 1) {
      body += declaration.kind === 'alias' ? '\n' : '\n\n';
    }
  });

  if (aliases !== '') {
    body = body === '' ? aliases : `${aliases}\n\n${body}`;
  }

  return body.replace(/\s+$/, '');
}

/**
 * Options for the namespace class wrapper.
 */
export interface NamespaceOptions {
  readonly classPrefix: string;
  readonly namespace: string;
  /** Field lines, see {@link NamespaceDeclarations.fields}. */
  readonly fields: string;
  readonly body: string;
}

/**
 * Wraps a body in the namespace class declaration.
 *
 * @param options - Wrapper values.
 * @returns The wrapped text.
 */
export function makeNamespace(options: NamespaceOptions): string {
  const { classPrefix, namespace, fields, body } = options;

  return (
    `---@class ${classPrefix}.${namespace}\n` +
    fields +
    `${namespace} = {}\n\n` +
    `${body}\n\n` +
    `return ${namespace}`
  );
}
