/**
 * Text decoding and comment formatting.
 *
 * Descriptions arrive as HTML fragments. Inline tags become markdown, other
 * tags are dropped and entities are decoded.
 *
 * @packageDocumentation
 */

import * as cheerio from 'cheerio';
import { Text } from 'domhandler';

/**
 * Markdown for one inline tag.
 */
interface InlineRule {
  readonly tag: string;
  readonly open: string;
  /** Written after the content; empty for prefix-only rules. */
  readonly close: string;
}

/** Applied in order, innermost markup kept. */
const INLINE_RULES: readonly InlineRule[] = [
  { tag: 'code', open: '`', close: '`' },
  { tag: 'strong', open: '**', close: '**' },
  { tag: 'b', open: '**', close: '**' },
  { tag: 'em', open: '*', close: '*' },
  { tag: 'i', open: '*', close: '*' },
  { tag: 'li', open: '- ', close: '' },
];

/**
 * Converts an HTML fragment to plain text with markdown for inline tags.
 *
 * @param text - HTML fragment.
 * @returns Decoded text.
 *
 * @example
 * ```typescript
 * decodeText('<li><code>gui.PROP_SCALE</code> &amp; more</li>');
 * // "- `gui.PROP_SCALE` & more"
 * ```
 */
export function decodeText(text: string): string {
  if (text === '') {
    return '';
  }

  const $ = cheerio.load(text, null, false);

  for (const rule of INLINE_RULES) {
    $(rule.tag).each((_, element) => {
      const node = $(element);
      node.prepend(new Text(rule.open));
      if (rule.close !== '') {
        node.append(new Text(rule.close));
      }
      node.replaceWith(node.contents());
    });
  }

  return $.root().text();
}

/**
 * Formats text as a comment, one prefixed line per line of decoded text.
 *
 * @param text - HTML fragment.
 * @param indent - Prefix of every line.
 * @returns The comment lines joined with newlines.
 */
export function makeComment(text: string, indent = '---'): string {
  const decoded = decodeText(text);
  const lines = decoded === '' ? [''] : decoded.split('\n');

  return lines.map((line) => `${indent}${line}`).join('\n');
}

/**
 * Formats a parameter description for the end of a `---@param` line.
 *
 * @param text - HTML fragment.
 * @returns Decoded text without leading whitespace, continued on comment lines.
 */
export function makeParamDescription(text: string): string {
  return decodeText(text).replace(/^\s+/, '').replace(/\n/g, '\n---');
}
