/** Shell-style wildcard matching for resource locators. `*` also crosses path separators. */

import { WILDCARD_CHARS } from './constants.js';

export function hasWildcards(pattern: string): boolean {
  return WILDCARD_CHARS.some((ch) => pattern.includes(ch));
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}

/** Translate a wildcard pattern into an anchored RegExp. */
export function globToRegExp(pattern: string): RegExp {
  let source = '';
  let i = 0;
  while (i < pattern.length) {
    const ch = pattern[i];
    i += 1;
    if (ch === '*') {
      source += '.*';
    } else if (ch === '?') {
      source += '.';
    } else if (ch === '[') {
      let j = i;
      if (j < pattern.length && pattern[j] === '!') j += 1;
      if (j < pattern.length && pattern[j] === ']') j += 1;
      while (j < pattern.length && pattern[j] !== ']') j += 1;
      if (j >= pattern.length) {
        // Unclosed bracket is a literal.
        source += '\\[';
        continue;
      }
      let body = pattern.slice(i, j);
      i = j + 1;
      const negate = body.startsWith('!');
      if (negate) body = body.slice(1);
      const escaped = body.replace(/\\/g, '\\\\').replace(/\]/g, '\\]').replace(/\^/g, '\\^');
      source += negate ? `[^${escaped}]` : `[${escaped}]`;
    } else {
      source += escapeRegExp(ch);
    }
  }
  return new RegExp(`^${source}$`, 's');
}

export function matchesGlob(text: string, pattern: string): boolean {
  return globToRegExp(pattern).test(text);
}
