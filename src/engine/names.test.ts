import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import {
  compareStrings,
  qualify,
  splitQualifiedName,
  splitTokens,
  stripLiteralMarker,
} from './names.js';

describe('splitQualifiedName', () => {
  it('should split at the last dot', () => {
    expect(splitQualifiedName('foo.bar.SETTING_A')).toEqual({
      namespace: 'foo.bar',
      shortName: 'SETTING_A',
    });
  });

  it.each(['SETTING', '.SETTING', 'gui.', ''])('should reject %j', (name) => {
    expect(splitQualifiedName(name)).toBeUndefined();
  });

  it('should invert qualify for non-empty parts', () => {
    const part = fc.stringOf(fc.constantFrom('a', 'B', '_', '1'), { minLength: 1, maxLength: 8 });

    fc.assert(
      fc.property(fc.array(part, { minLength: 1, maxLength: 3 }), part, (segments, shortName) => {
        const namespace = segments.join('.');
        expect(splitQualifiedName(qualify(namespace, shortName))).toEqual({ namespace, shortName });
      })
    );
  });
});

describe('splitTokens', () => {
  it('should skip empty tokens', () => {
    expect(splitTokens('_VALUE__TYPE_')).toEqual(['VALUE', 'TYPE']);
  });

  it('should return no tokens for underscores only', () => {
    expect(splitTokens('___')).toEqual([]);
  });
});

describe('stripLiteralMarker', () => {
  it('should remove a leading marker only', () => {
    expect(stripLiteralMarker('type:graphics.BUFFER_TYPE_DEPTH_BIT')).toBe(
      'graphics.BUFFER_TYPE_DEPTH_BIT'
    );
    expect(stripLiteralMarker('node')).toBe('node');
    expect(stripLiteralMarker('x type:y')).toBe('x type:y');
  });
});

describe('compareStrings', () => {
  it('should order by code unit', () => {
    expect(['b', 'B', 'a', 'A_B', 'A'].sort(compareStrings)).toEqual(['A', 'A_B', 'B', 'a', 'b']);
  });
});
