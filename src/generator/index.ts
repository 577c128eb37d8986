/**
 * Generation pipeline and emitters.
 *
 * @packageDocumentation
 */

export { FileEmitter, MemoryEmitter, type Emitter, type FileEmitterOptions } from './emitter.js';
export {
  generateAndWriteAnnotations,
  generateAnnotations,
  mergeModules,
  type WriteOptions,
} from './pipeline.js';
export {
  GeneratorError,
  type GenerateOptions,
  type GeneratorErrorCode,
  type RenderedNamespace,
} from './types.js';
