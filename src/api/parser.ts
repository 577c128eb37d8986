/**
 * Module descriptor parser.
 *
 * Reads API module descriptors from TOML (`[[modules]]` tables) or JSON
 * (`{ "modules": [...] }`) and validates them field by field.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import { extname } from 'node:path';
import { safeReadFile } from '../utils/safe-fs.js';
import {
  isElementKind,
  ModuleParseError,
  type ApiElement,
  type ApiModule,
  type ApiParameter,
  type ClassOperator,
  type ModuleFormat,
} from './types.js';

/** Keys that are prohibited due to prototype pollution concerns. */
const PROHIBITED_KEYS = new Set(['__proto__', 'constructor', 'prototype']);

/**
 * Narrows a value to a plain record.
 *
 * @param value - Value to check.
 * @returns True when the value is a non-null, non-array object.
 */
function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expectRecord(value: unknown, fieldPath: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new ModuleParseError(`Invalid type for '${fieldPath}': expected table, got ${describe(value)}`);
  }
  return value;
}

function expectArray(value: unknown, fieldPath: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new ModuleParseError(`Invalid type for '${fieldPath}': expected array, got ${describe(value)}`);
  }
  return value;
}

function expectString(value: unknown, fieldPath: string): string {
  if (typeof value !== 'string') {
    throw new ModuleParseError(`Invalid type for '${fieldPath}': expected string, got ${describe(value)}`);
  }
  return value;
}

function optionalString(value: unknown, fieldPath: string): string | undefined {
  return value === undefined ? undefined : expectString(value, fieldPath);
}

function optionalBoolean(value: unknown, fieldPath: string): boolean | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'boolean') {
    throw new ModuleParseError(`Invalid type for '${fieldPath}': expected boolean, got ${describe(value)}`);
  }
  return value;
}

function describe(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  return Array.isArray(value) ? 'array' : typeof value;
}

/**
 * Validates a table of strings into a prototype-free record.
 *
 * @param value - Value to validate.
 * @param fieldPath - Path to the field for error messages.
 * @returns The validated record.
 * @throws ModuleParseError on a non-string entry or a prohibited key.
 */
function parseStringRecord(value: unknown, fieldPath: string): Record<string, string> {
  const table = expectRecord(value, fieldPath);
  const result = Object.create(null) as Record<string, string>;

  for (const [key, entry] of Object.entries(table)) {
    if (PROHIBITED_KEYS.has(key)) {
      throw new ModuleParseError(`Prohibited key '${key}' found at '${fieldPath}'`);
    }
    result[key] = expectString(entry, `${fieldPath}.${key}`);
  }

  return result;
}

function parseOperators(value: unknown, fieldPath: string): Record<string, ClassOperator> {
  const table = expectRecord(value, fieldPath);
  const result = Object.create(null) as Record<string, ClassOperator>;

  for (const [key, entry] of Object.entries(table)) {
    if (PROHIBITED_KEYS.has(key)) {
      throw new ModuleParseError(`Prohibited key '${key}' found at '${fieldPath}'`);
    }
    const raw = expectRecord(entry, `${fieldPath}.${key}`);
    const param = optionalString(raw.param, `${fieldPath}.${key}.param`);
    const operator: ClassOperator = {
      result: expectString(raw.result, `${fieldPath}.${key}.result`),
      ...(param !== undefined ? { param } : {}),
    };
    result[key] = operator;
  }

  return result;
}

function parseParameter(value: unknown, fieldPath: string): ApiParameter {
  const raw = expectRecord(value, fieldPath);
  const doc = optionalString(raw.doc, `${fieldPath}.doc`);
  const optional = optionalBoolean(raw.optional, `${fieldPath}.optional`);

  return {
    name: expectString(raw.name, `${fieldPath}.name`),
    types: expectArray(raw.types ?? [], `${fieldPath}.types`).map((type, index) =>
      expectString(type, `${fieldPath}.types[${String(index)}]`)
    ),
    ...(doc !== undefined ? { doc } : {}),
    ...(optional !== undefined ? { optional } : {}),
  };
}

function parseParameters(value: unknown, fieldPath: string): ApiParameter[] {
  if (value === undefined) {
    return [];
  }
  return expectArray(value, fieldPath).map((entry, index) =>
    parseParameter(entry, `${fieldPath}[${String(index)}]`)
  );
}

/**
 * Parses one element. Kinds the generator does not render are kept as
 * `unsupported` elements.
 *
 * @param value - Raw element table.
 * @param fieldPath - Path to the element for error messages.
 * @returns The validated element.
 */
function parseElement(value: unknown, fieldPath: string): ApiElement {
  const raw = expectRecord(value, fieldPath);
  const kind = expectString(raw.kind, `${fieldPath}.kind`);
  const name = expectString(raw.name, `${fieldPath}.name`);

  if (!isElementKind(kind)) {
    return { kind: 'unsupported', name, sourceKind: kind };
  }

  const description = optionalString(raw.description, `${fieldPath}.description`);
  const described = description !== undefined ? { description } : {};

  switch (kind) {
    case 'constant':
      return { kind, name, ...described };
    case 'variable':
      return { kind, name, ...described };
    case 'function':
      return {
        kind,
        name,
        ...described,
        parameters: parseParameters(raw.parameters, `${fieldPath}.parameters`),
        returns: parseParameters(raw.returns, `${fieldPath}.returns`),
      };
    case 'class':
      return {
        kind,
        name,
        fields: raw.fields === undefined ? {} : parseStringRecord(raw.fields, `${fieldPath}.fields`),
        global: optionalBoolean(raw.global, `${fieldPath}.global`) ?? false,
        operators:
          raw.operators === undefined ? {} : parseOperators(raw.operators, `${fieldPath}.operators`),
      };
    case 'alias':
      return {
        kind,
        name,
        definition: expectString(raw.definition, `${fieldPath}.definition`),
      };
  }
}

function parseModule(value: unknown, fieldPath: string): ApiModule {
  const raw = expectRecord(value, fieldPath);
  const elements = raw.elements === undefined ? [] : expectArray(raw.elements, `${fieldPath}.elements`);

  return {
    namespace: optionalString(raw.namespace, `${fieldPath}.namespace`) ?? '',
    brief: optionalString(raw.brief, `${fieldPath}.brief`) ?? '',
    description: optionalString(raw.description, `${fieldPath}.description`) ?? '',
    elements: elements.map((element, index) =>
      parseElement(element, `${fieldPath}.elements[${String(index)}]`)
    ),
  };
}

/**
 * Parses a module descriptor document.
 *
 * @param content - Raw document text.
 * @param format - Document format.
 * @returns The modules in document order.
 * @throws ModuleParseError for invalid syntax or invalid field values.
 *
 * @example
 * ```typescript
 * const modules = parseApiModules(`
 * [[modules]]
 * namespace = "gui"
 * brief = "GUI API"
 *
 * [[modules.elements]]
 * kind = "constant"
 * name = "gui.PROP_POSITION"
 * `, 'toml');
 * console.log(modules[0]?.elements.length); // 1
 * ```
 */
export function parseApiModules(content: string, format: ModuleFormat): ApiModule[] {
  let document: unknown;

  try {
    document = format === 'toml' ? TOML.parse(content) : JSON.parse(content);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new ModuleParseError(
      `Invalid ${format.toUpperCase()} syntax: ${cause.message}`,
      { cause }
    );
  }

  const root = expectRecord(document, '<root>');
  if (root.modules === undefined) {
    return [];
  }

  return expectArray(root.modules, 'modules').map((module, index) =>
    parseModule(module, `modules[${String(index)}]`)
  );
}

/**
 * Picks the descriptor format from a file extension.
 *
 * @param path - File path.
 * @returns The format.
 * @throws ModuleParseError for an unrecognised extension.
 */
export function formatFromPath(path: string): ModuleFormat {
  const extension = extname(path).toLowerCase();

  if (extension === '.toml') {
    return 'toml';
  }
  if (extension === '.json') {
    return 'json';
  }

  throw new ModuleParseError(
    `Unsupported module file extension '${extension}': expected .toml or .json`,
    { source: path }
  );
}

/**
 * Reads and parses module descriptor files in order.
 *
 * @param paths - Files to read; the format follows each file's extension.
 * @returns All modules, file order then document order.
 * @throws ModuleParseError naming the file that failed to read or parse.
 */
export async function loadApiModules(paths: readonly string[]): Promise<ApiModule[]> {
  const modules: ApiModule[] = [];

  for (const path of paths) {
    const format = formatFromPath(path);

    let content: string;
    try {
      content = await safeReadFile(path);
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new ModuleParseError(`${path}: Cannot read module file: ${cause.message}`, {
        cause,
        source: path,
      });
    }

    try {
      modules.push(...parseApiModules(content, format));
    } catch (error) {
      if (error instanceof ModuleParseError) {
        throw new ModuleParseError(`${path}: ${error.message}`, {
          cause: error,
          source: path,
        });
      }
      throw error;
    }
  }

  return modules;
}
