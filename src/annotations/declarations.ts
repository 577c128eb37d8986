/**
 * Annotation text for functions, variables, classes and static aliases.
 *
 * @packageDocumentation
 */

import type {
  AliasElement,
  ApiParameter,
  ClassElement,
  FunctionElement,
  RenderableElement,
  VariableElement,
} from '../api/types.js';
import type { Config } from '../config/types.js';
import { compareStrings } from '../engine/names.js';
import type { TypeSignatureRenderer } from '../engine/type-renderer.js';
import type { TypeRole } from '../engine/types.js';
import { makeComment, makeParamDescription } from './text.js';

/**
 * Configuration sections declarations read.
 */
export type DeclarationConfig = Pick<Config, 'types' | 'replacements' | 'ignore'>;

const VARARG = '...';

/**
 * Escapes a string for literal use inside a regular expression.
 *
 * @param text - Literal text.
 * @returns The escaped pattern.
 */
function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function sortedEntries<T>(record: Readonly<Record<string, T>>): [string, T][] {
  return Object.entries(record).sort(([a], [b]) => compareStrings(a, b));
}

function toMap(record: Readonly<Record<string, string>>): Map<string, string> {
  return new Map(Object.entries(record));
}

/**
 * Renders declarations of one generation run. Type lists go through the
 * shared TypeSignatureRenderer, so rendering a function may create or extend
 * constant aliases.
 */
export class DeclarationRenderer {
  private readonly types: TypeSignatureRenderer;
  private readonly names: ReadonlyMap<string, string>;
  private readonly localNames: ReadonlyMap<string, ReadonlyMap<string, string>>;
  private readonly generics: ReadonlyMap<string, string>;
  private readonly ignored: readonly RegExp[];

  /**
   * Creates a renderer.
   *
   * @param types - Type-list renderer bound to the run's context.
   * @param config - Rename, generics and ignore tables.
   */
  constructor(types: TypeSignatureRenderer, config: DeclarationConfig) {
    this.types = types;
    this.names = toMap(config.replacements.names);
    this.localNames = new Map(
      Object.entries(config.replacements.local_names).map(
        ([element, table]): [string, ReadonlyMap<string, string>] => [element, toMap(table)]
      )
    );
    this.generics = toMap(config.types.generics);
    this.ignored = config.ignore.functions.map((pattern) => new RegExp(`^(?:${pattern})$`));
  }

  /**
   * Renders any element. Constants produce nothing here; they become
   * namespace fields.
   *
   * @param element - The element.
   * @returns Annotation text, or undefined when the element renders nothing.
   */
  renderElement(element: RenderableElement): string | undefined {
    switch (element.kind) {
      case 'function':
        return this.renderFunction(element);
      case 'variable':
        return this.renderVariable(element);
      case 'class':
        return this.renderClass(element);
      case 'alias':
        return this.renderStaticAlias(element);
      case 'constant':
        return undefined;
    }
  }

  /**
   * Whether a function matches the ignore list.
   *
   * @param name - Function full name.
   */
  isIgnored(name: string): boolean {
    return this.ignored.some((pattern) => pattern.test(name));
  }

  /**
   * Renders the name a parameter or return value is annotated with.
   *
   * Global renames apply first, then the element's own
   * `param_<name>`/`return_<name>` table. A trailing `...` collapses to
   * `...`, and dashes become underscores.
   *
   * @param parameter - The parameter.
   * @param role - Parameter or return value.
   * @param elementName - Declaring function.
   * @returns The rendered name.
   */
  renderParamName(parameter: ApiParameter, role: TypeRole, elementName: string): string {
    let name = this.names.get(parameter.name) ?? parameter.name;
    name = this.localNames.get(elementName)?.get(`${role}_${name}`) ?? name;

    if (name.endsWith(VARARG)) {
      name = VARARG;
    }

    return name.replace(/-/g, '_');
  }

  /**
   * Renders a function with its parameter and return annotations.
   *
   * @param element - The function.
   * @returns Annotation text, or undefined for ignored functions.
   */
  renderFunction(element: FunctionElement): string | undefined {
    if (this.isIgnored(element.name)) {
      return undefined;
    }

    const generic = this.generics.get(element.name);
    let genericCount = 0;

    const applyGeneric = (line: string): string => {
      if (generic === undefined) {
        return line;
      }
      return line.replace(new RegExp(` ${escapeRegExp(generic)} `, 'g'), () => {
        genericCount++;
        return ' T ';
      });
    };

    const params = element.parameters.map((parameter) => {
      const name = this.renderParamName(parameter, 'param', element.name);
      const types = this.renderTypes(parameter, 'param', name, element.name);
      const marker = parameter.optional === true ? '? ' : ' ';
      const description = makeParamDescription(parameter.doc ?? '');
      return applyGeneric(`---@param ${name}${marker}${types} ${description}`);
    });

    const returns = element.returns.map((returnValue) => {
      const name = this.renderParamName(returnValue, 'return', element.name);
      const types = this.renderTypes(returnValue, 'return', name, element.name);
      const description = makeParamDescription(returnValue.doc ?? '');
      return applyGeneric(`---@return ${types} ${name} ${description}`);
    });

    const signature = element.parameters
      .map((parameter) => this.renderParamName(parameter, 'param', element.name))
      .join(', ');

    let result = `${makeComment(element.description ?? '')}\n`;
    if (generic !== undefined && genericCount >= 2) {
      result += `---@generic T: ${generic}\n`;
    }
    for (const line of [...params, ...returns]) {
      result += `${line}\n`;
    }

    return `${result}function ${element.name}(${signature}) end`;
  }

  renderVariable(element: VariableElement): string {
    return `${makeComment(element.description ?? '')}\n${element.name} = nil`;
  }

  /**
   * Renders a class with sorted fields and operators.
   *
   * @param element - The class.
   * @returns Annotation text.
   */
  renderClass(element: ClassElement): string {
    const lines = [`---@class ${element.name}`];

    for (const [field, type] of sortedEntries(element.fields)) {
      lines.push(`---@field ${field} ${type}`);
    }

    for (const [operator, signature] of sortedEntries(element.operators)) {
      lines.push(
        signature.param === undefined
          ? `---@operator ${operator}: ${signature.result}`
          : `---@operator ${operator}(${signature.param}): ${signature.result}`
      );
    }

    if (element.global) {
      lines.push(`${element.name} = {}`);
    }

    return lines.join('\n');
  }

  renderStaticAlias(element: AliasElement): string {
    return `---@alias ${element.name} ${element.definition}`;
  }

  private renderTypes(
    parameter: ApiParameter,
    role: TypeRole,
    parameterName: string,
    elementName: string
  ): string {
    return this.types.renderTypeList({
      elementName,
      parameterName,
      role,
      types: parameter.types,
      ...(parameter.doc !== undefined ? { description: parameter.doc } : {}),
    });
  }
}
