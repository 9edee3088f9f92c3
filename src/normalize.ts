import type { NormalizedString } from './types.js';

const SKIPPABLE_CHARS = new Set(['(', ')', '[', ']', '{', '}', '-', '_']);

export function isSkippableChar(ch: string): boolean {
  return /^\s$/u.test(ch) || SKIPPABLE_CHARS.has(ch);
}

/**
 * Lowercase `text` and drop skippable characters, keeping a map from each
 * position in the filtered text back to its position in `text`.
 */
export function normalize(text: string): NormalizedString {
  let filtered = '';
  const indexMap: number[] = [];
  let position = 0;

  for (const ch of text) {
    if (!isSkippableChar(ch)) {
      const lowered = ch.toLowerCase();

      for (let i = 0; i < lowered.length; i++) {
        indexMap.push(position + Math.min(i, ch.length - 1));
      }

      filtered += lowered;
    }

    position += ch.length;
  }

  return { text: filtered, indexMap };
}
