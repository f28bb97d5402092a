import { describe, it, expect } from 'vitest';
import { globToRegExp, hasWildcards, matchesGlob } from './glob.js';

describe('hasWildcards', () => {
  it('should detect star, question mark and bracket', () => {
    expect(hasWildcards('*.csv')).toBe(true);
    expect(hasWildcards('a?.txt')).toBe(true);
    expect(hasWildcards('[ab].txt')).toBe(true);
    expect(hasWildcards('plain.txt')).toBe(false);
  });
});

describe('matchesGlob', () => {
  it('should let star cross path separators', () => {
    expect(matchesGlob('/data/out/result.csv', '*.csv')).toBe(true);
    expect(matchesGlob('/data/out/result.csv', '*/out/*')).toBe(true);
  });

  it('should match the whole string', () => {
    expect(matchesGlob('/data/result.csv.bak', '*.csv')).toBe(false);
  });

  it('should match one character with question mark', () => {
    expect(matchesGlob('a1.txt', 'a?.txt')).toBe(true);
    expect(matchesGlob('a12.txt', 'a?.txt')).toBe(false);
  });

  it('should handle character classes and negation', () => {
    expect(matchesGlob('b.txt', '[abc].txt')).toBe(true);
    expect(matchesGlob('d.txt', '[abc].txt')).toBe(false);
    expect(matchesGlob('d.txt', '[!abc].txt')).toBe(true);
    expect(matchesGlob('5.txt', '[0-9].txt')).toBe(true);
  });

  it('should treat regex metacharacters literally', () => {
    expect(matchesGlob('a+b(1).txt', 'a+b(1).txt')).toBe(true);
    expect(matchesGlob('axb.txt', 'a.b.txt')).toBe(false);
  });

  it('should treat an unclosed bracket as a literal', () => {
    expect(globToRegExp('[abc').test('[abc')).toBe(true);
  });
});
