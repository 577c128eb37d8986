import { describe, it, expect } from 'vitest';
import { decodeText, makeComment, makeParamDescription } from './text.js';

describe('decodeText', () => {
  it('should turn inline tags into markdown', () => {
    expect(decodeText('<code>gui.PROP_SCALE</code>')).toBe('`gui.PROP_SCALE`');
    expect(decodeText('a <b>bold</b>, <strong>strong</strong>, <em>soft</em> and <i>slanted</i>')).toBe(
      'a **bold**, **strong**, *soft* and *slanted*'
    );
  });

  it('should prefix list items only', () => {
    expect(decodeText('<ul><li>one</li><li>two</li></ul>')).toBe('- one- two');
  });

  it('should keep nested markup', () => {
    expect(decodeText('<code><b>x</b></code>')).toBe('`**x**`');
    expect(decodeText('<li><code>gui.EASING_*</code></li>')).toBe('- `gui.EASING_*`');
  });

  it('should strip other tags and decode entities', () => {
    expect(decodeText('<a href="#">link</a> <span>x &lt; y &amp;&amp; z</span>')).toBe(
      'link x < y && z'
    );
  });

  it('should keep newlines', () => {
    expect(decodeText('line one\nline two')).toBe('line one\nline two');
  });

  it('should return an empty string for empty input', () => {
    expect(decodeText('')).toBe('');
  });
});

describe('makeComment', () => {
  it('should prefix every line', () => {
    expect(makeComment('first\nsecond')).toBe('---first\n---second');
  });

  it('should render empty text as a bare prefix', () => {
    expect(makeComment('')).toBe('---');
  });

  it('should use a custom indent', () => {
    expect(makeComment('<b>x</b>', '  ')).toBe('  **x**');
  });
});

describe('makeParamDescription', () => {
  it('should trim leading whitespace and continue lines as comments', () => {
    const doc = '  property to animate\n<ul>\n<li><code>gui.PROP_POSITION</code></li>\n</ul>';

    expect(makeParamDescription(doc)).toBe(
      'property to animate\n---\n---- `gui.PROP_POSITION`\n---'
    );
  });

  it('should return an empty string for no description', () => {
    expect(makeParamDescription('')).toBe('');
  });
});
