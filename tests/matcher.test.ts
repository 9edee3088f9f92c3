import { describe, it, expect } from 'vitest';
import { matchStrings, MAX_MISMATCHES } from '../src/matcher.js';

describe('matchStrings', () => {
  it('finds an exact substring with no mismatches', () => {
    expect(matchStrings('02lostatsea', 'lostatsea')).toEqual({
      kind: 'automatic',
      start: 2,
      length: 9,
      mismatches: [],
    });
  });

  it('matches a string against itself at offset 0', () => {
    expect(matchStrings('intro', 'intro')).toEqual({
      kind: 'automatic',
      start: 0,
      length: 5,
      mismatches: [],
    });
  });

  it('tolerates a substituted character and reports its haystack index', () => {
    expect(matchStrings('03lostatse4', 'lostatsea')).toEqual({
      kind: 'automatic',
      start: 2,
      length: 9,
      mismatches: [10],
    });
  });

  it('accepts up to the mismatch limit', () => {
    expect(MAX_MISMATCHES).toBe(2);
    expect(matchStrings('lostatsun', 'lostatsea')).toEqual({
      kind: 'automatic',
      start: 0,
      length: 9,
      mismatches: [7, 8],
    });
  });

  it('rejects windows over the mismatch limit', () => {
    expect(matchStrings('abcdef', 'xyzdef')).toEqual({ kind: 'none' });
  });

  it('returns the leftmost acceptable window, not the best one', () => {
    expect(matchStrings('axcabc', 'abc')).toEqual({
      kind: 'automatic',
      start: 0,
      length: 3,
      mismatches: [1],
    });
  });

  it('prefers the earlier of two exact windows', () => {
    const match = matchStrings('homehome', 'home');
    expect(match.kind === 'automatic' && match.start).toBe(0);
  });

  it('returns no match when the needle is longer than the haystack', () => {
    expect(matchStrings('home', 'homecoming')).toEqual({ kind: 'none' });
  });

  it('throws on empty input', () => {
    expect(() => matchStrings('', 'a')).toThrow('Cannot match with an empty string');
    expect(() => matchStrings('a', '')).toThrow('Cannot match with an empty string');
  });
});
