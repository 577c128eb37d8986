/**
 * Helpers for dotted names and underscore tokens.
 *
 * @packageDocumentation
 */

import { LITERAL_MARKER } from './types.js';

/**
 * A dotted name split at its last separator.
 */
export interface QualifiedName {
  readonly namespace: string;
  readonly shortName: string;
}

/**
 * Splits `foo.bar.SETTING_A` into `foo.bar` and `SETTING_A`.
 *
 * @param name - Dotted name.
 * @returns The parts, or undefined when either side would be empty.
 */
export function splitQualifiedName(name: string): QualifiedName | undefined {
  const index = name.lastIndexOf('.');

  if (index <= 0 || index === name.length - 1) {
    return undefined;
  }

  return { namespace: name.slice(0, index), shortName: name.slice(index + 1) };
}

/**
 * Joins a namespace and a short name.
 *
 * @param namespace - Namespace.
 * @param shortName - Short name.
 * @returns `namespace.shortName`.
 */
export function qualify(namespace: string, shortName: string): string {
  return `${namespace}.${shortName}`;
}

/**
 * Splits a short name into its underscore-delimited tokens, skipping empty
 * tokens.
 *
 * @param shortName - Constant short name.
 * @returns Tokens in order.
 */
export function splitTokens(shortName: string): string[] {
  return shortName.split('_').filter((token) => token !== '');
}

/**
 * Removes a leading `type:` marker.
 *
 * @param token - Declared type token.
 * @returns The token without the marker.
 */
export function stripLiteralMarker(token: string): string {
  return token.startsWith(LITERAL_MARKER) ? token.slice(LITERAL_MARKER.length) : token;
}

/**
 * Code-unit string comparator.
 */
export function compareStrings(a: string, b: string): number {
  if (a < b) {
    return -1;
  }
  return a > b ? 1 : 0;
}
