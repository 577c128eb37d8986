/**
 * File header and diagnostics block.
 *
 * @packageDocumentation
 */

import { decodeText, makeComment } from './text.js';

/**
 * Values shown in a file header.
 */
export interface HeaderOptions {
  readonly generatorUrl: string;
  readonly product: string;
  readonly version: string;
  readonly title: string;
  readonly description: string;
}

/**
 * Builds the `--[[ ... --]]` block opening every file. The description is
 * included only when it differs from the title.
 *
 * @param options - Header values.
 * @returns The header block.
 */
export function makeHeader(options: HeaderOptions): string {
  let result = '--[[\n';
  result += `  Generated with ${options.generatorUrl}\n`;
  result += `  ${options.product} ${options.version}\n\n`;
  result += `  ${decodeText(options.title)}\n`;

  if (options.description !== '' && options.description !== options.title) {
    result += `\n${makeComment(options.description, '  ')}\n`;
  }

  return `${result}--]]`;
}

/**
 * Builds the `---@meta` line and one disable line per diagnostic.
 *
 * @param diagnostics - Diagnostic names.
 * @returns The diagnostics block.
 */
export function makeDiagnostics(diagnostics: readonly string[]): string {
  return ['---@meta', ...diagnostics.map((name) => `---@diagnostic disable: ${name}`)].join('\n');
}
