/**
 * Hands a namespace's resolved fields and aliases to a DeclarationWriter.
 *
 * @packageDocumentation
 */

import type { GenerationContext } from './context.js';
import { compareStrings } from './names.js';
import type { DeclarationWriter } from './types.js';

/**
 * Writes one field per constant of the namespace, in catalog order, with the
 * final rendered type.
 *
 * @param context - Generation context.
 * @param namespace - Namespace to write.
 * @param writer - Receiver of the fields.
 */
export function writeConstantFields(
  context: GenerationContext,
  namespace: string,
  writer: DeclarationWriter
): void {
  for (const constant of context.catalog.constantsOf(namespace)) {
    writer.writeField(constant.shortName, constant.renderedType, constant.description);
  }
}

/**
 * Writes every alias of the namespace, sorted by name, with members sorted.
 *
 * @param context - Generation context.
 * @param namespace - Namespace to write.
 * @param writer - Receiver of the aliases.
 */
export function writeAliasDeclarations(
  context: GenerationContext,
  namespace: string,
  writer: DeclarationWriter
): void {
  for (const alias of context.aliases.aliasesOf(namespace)) {
    writer.writeAlias(alias.qualifiedName, [...alias.members].sort(compareStrings));
  }
}
