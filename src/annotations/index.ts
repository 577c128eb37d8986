/**
 * Annotation text formatting.
 *
 * @packageDocumentation
 */

export { DeclarationRenderer, type DeclarationConfig } from './declarations.js';
export { makeDiagnostics, makeHeader, type HeaderOptions } from './header.js';
export {
  composeBody,
  makeNamespace,
  NamespaceDeclarations,
  sortElements,
  type NamespaceOptions,
  type RenderedDeclaration,
} from './namespace.js';
export { decodeText, makeComment, makeParamDescription } from './text.js';
