import { describe, expect, it } from 'vitest';
import { isClassificationError } from '../errors';
import { sanitizeText, validateText } from '../validation';

const limits = { minTextLength: 10, maxTextLength: 40 };

const codeOf = (run: () => unknown): string => {
  try {
    run();
  } catch (error) {
    return isClassificationError(error) ? error.code : 'unexpected';
  }
  return 'none';
};

describe('sanitizeText', () => {
  it('drops NUL bytes and collapses whitespace', () => {
    expect(sanitizeText('  Rain\0fall \n\t expected  ')).toBe('Rainfall expected');
  });
});

describe('validateText', () => {
  it('returns the sanitized text within limits', () => {
    expect(validateText('  Markets   open higher  ', limits)).toBe('Markets open higher');
  });

  it('rejects non-string input as too short', () => {
    expect(() => validateText(42, limits)).toThrow('Text must be a non-empty string');
    expect(codeOf(() => validateText(undefined, limits))).toBe('TooShort');
  });

  it('measures length after sanitizing', () => {
    expect(codeOf(() => validateText('   tiny    ', limits))).toBe('TooShort');
    expect(() => validateText('x'.repeat(41), limits)).toThrow('Text must be at most 40 characters');
    expect(codeOf(() => validateText('x'.repeat(41), limits))).toBe('TooLong');
    expect(validateText('x'.repeat(40), limits)).toHaveLength(40);
  });

  it('requires some letters or digits', () => {
    expect(() => validateText('!!!! ???? ....', limits)).toThrow('Text must contain at least 5 letters or digits');
    expect(validateText('यह खबर सच है', limits)).toBe('यह खबर सच है');
  });
});
