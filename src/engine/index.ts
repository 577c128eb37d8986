/**
 * Constant-alias inference and type-signature resolution.
 *
 * @packageDocumentation
 */

export { AliasStore, MIN_ALIAS_MEMBERS } from './alias-store.js';
export { ConstantCatalog } from './constant-catalog.js';
export { createGenerationContext, type GenerationContext } from './context.js';
export { writeAliasDeclarations, writeConstantFields } from './declarations.js';
export {
  compareStrings,
  qualify,
  splitQualifiedName,
  splitTokens,
  stripLiteralMarker,
  type QualifiedName,
} from './names.js';
export {
  collectPrefixCandidates,
  inferConstantAliases,
  partitionByPrefix,
  type PrefixCandidate,
  type PrefixGroup,
} from './prefix-inference.js';
export {
  findCommonTokenRun,
  resolveConstantReferences,
  scanDescription,
  type ReferenceRequest,
  type ResolvedTypeList,
} from './reference-resolver.js';
export {
  TypeSignatureRenderer,
  UnknownTypeError,
  type TypeListRequest,
  type TypeRenderConfig,
  type TypeRendererOptions,
} from './type-renderer.js';
export {
  CONSTANT_PLACEHOLDER,
  DEFAULT_CONSTANT_TYPE,
  LITERAL_MARKER,
  type AliasGroup,
  type Constant,
  type ConstantType,
  type DeclarationWriter,
  type TypeRole,
} from './types.js';
