import type { AutomaticMatch, NoMatch } from './types.js';

export const MAX_MISMATCHES = 2;

export const NO_MATCH: NoMatch = { kind: 'none' };

function findMismatchedIndices(a: string, b: string): number[] {
  const mismatched: number[] = [];

  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) {
      mismatched.push(i);
    }
  }

  return mismatched;
}

/**
 * Slide `needle` across `haystack` and return the leftmost window with at most
 * MAX_MISMATCHES substituted characters. A later window with fewer mismatches
 * is never considered.
 */
export function matchStrings(haystack: string, needle: string): AutomaticMatch | NoMatch {
  if (haystack.length === 0 || needle.length === 0) {
    throw new Error('Cannot match with an empty string');
  }

  if (needle.length > haystack.length) {
    return NO_MATCH;
  }

  for (let offset = 0; offset <= haystack.length - needle.length; offset++) {
    const window = haystack.slice(offset, offset + needle.length);
    const mismatched = findMismatchedIndices(window, needle);

    if (mismatched.length <= MAX_MISMATCHES) {
      return {
        kind: 'automatic',
        start: offset,
        length: needle.length,
        mismatches: mismatched.map((idx) => idx + offset),
      };
    }
  }

  return NO_MATCH;
}
