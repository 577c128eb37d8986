/**
 * API module descriptors: types and parsing.
 *
 * @packageDocumentation
 */

export {
  ELEMENT_KINDS,
  isElementKind,
  ModuleParseError,
  type AliasElement,
  type ApiElement,
  type ApiModule,
  type ApiParameter,
  type ClassElement,
  type ClassOperator,
  type ConstantElement,
  type ElementKind,
  type FunctionElement,
  type ModuleFormat,
  type RenderableElement,
  type UnsupportedElement,
  type VariableElement,
} from './types.js';
export { formatFromPath, loadApiModules, parseApiModules } from './parser.js';
