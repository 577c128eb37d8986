/**
 * API annotation generator.
 *
 * Turns scripting API module descriptors into language server annotation
 * files, grouping related constants into named aliases and rewriting the
 * type signatures that refer to them.
 *
 * @packageDocumentation
 */

/**
 * Package version string.
 */
export const VERSION = '0.1.0';

export {
  FileEmitter,
  GeneratorError,
  generateAndWriteAnnotations,
  generateAnnotations,
  MemoryEmitter,
  mergeModules,
  type Emitter,
  type FileEmitterOptions,
  type GenerateOptions,
  type GeneratorErrorCode,
  type RenderedNamespace,
  type WriteOptions,
} from './generator/index.js';

export {
  AliasStore,
  ConstantCatalog,
  createGenerationContext,
  inferConstantAliases,
  resolveConstantReferences,
  TypeSignatureRenderer,
  UnknownTypeError,
  writeAliasDeclarations,
  writeConstantFields,
  type AliasGroup,
  type Constant,
  type ConstantType,
  type DeclarationWriter,
  type GenerationContext,
  type ResolvedTypeList,
  type TypeListRequest,
  type TypeRendererOptions,
} from './engine/index.js';

export {
  formatFromPath,
  loadApiModules,
  ModuleParseError,
  parseApiModules,
  type ApiElement,
  type ApiModule,
  type ApiParameter,
  type ModuleFormat,
} from './api/index.js';

export {
  applyEnvOverrides,
  assertConfigValid,
  ConfigParseError,
  ConfigValidationError,
  DEFAULT_CONFIG,
  getDefaultConfig,
  parseConfig,
  validateConfig,
  type Config,
  type PartialConfig,
} from './config/index.js';

export { decodeText, makeComment } from './annotations/index.js';

export { Logger, logger, type LogEntry, type LogLevel, type LoggerOptions } from './utils/logger.js';
