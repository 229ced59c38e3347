import { describe, it, expect } from 'vitest';
import { wrapText } from './wrap.js';

describe('wrapText', () => {
  it('fills lines greedily', () => {
    expect(wrapText('alpha beta gamma', 10)).toEqual(['alpha beta', 'gamma']);
    expect(wrapText('alpha', 10)).toEqual(['alpha']);
  });

  it('returns no lines for empty or blank text', () => {
    expect(wrapText('', 10)).toEqual([]);
    expect(wrapText('   ', 10)).toEqual([]);
  });

  it('splits long words, filling the current line first', () => {
    expect(wrapText('ab cdefghij', 5)).toEqual(['ab cd', 'efghi', 'j']);
    expect(wrapText('abcdefghijklmnop', 5)).toEqual(['abcde', 'fghij', 'klmno', 'p']);
  });

  it('keeps runs of spaces inside a line', () => {
    expect(wrapText('Example CPU     X9 @ 2.70GHz', 70)).toEqual(['Example CPU     X9 @ 2.70GHz']);
  });

  it('drops whitespace at line breaks', () => {
    expect(wrapText('alpha     beta', 8)).toEqual(['alpha', 'beta']);
    expect(wrapText('  alpha', 10)).toEqual(['alpha']);
  });
});
