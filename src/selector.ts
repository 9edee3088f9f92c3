import { basename, extname } from 'node:path';
import type { AutomaticMatch, NoMatch, TrackCandidate } from './types.js';
import { normalize } from './normalize.js';
import { matchStrings, NO_MATCH } from './matcher.js';

export interface TitleGuess {
  title: string | null;
  match: AutomaticMatch | NoMatch;
}

function isBetterMatch(match: AutomaticMatch, best: AutomaticMatch | NoMatch): boolean {
  if (best.kind === 'none') {
    return true;
  }

  if (match.length > best.length && match.mismatches.length <= best.mismatches.length) {
    return true;
  }

  return match.mismatches.length < best.mismatches.length;
}

/**
 * Pick the title whose normalized form best matches the normalized filename
 * stem. Ties keep the earlier title.
 */
export function selectBestTitle(filename: string, tracklist: readonly string[]): TitleGuess {
  const stem = normalize(basename(filename, extname(filename))).text;
  let guess: TitleGuess = { title: null, match: NO_MATCH };

  if (stem.length === 0) {
    return guess;
  }

  for (const title of tracklist) {
    const pattern = normalize(title).text;

    if (pattern.length === 0) {
      continue;
    }

    const match = matchStrings(stem, pattern);

    if (match.kind === 'none') {
      continue;
    }

    if (isBetterMatch(match, guess.match)) {
      guess = { title, match };
    }
  }

  return guess;
}

export function identifyTracks(paths: readonly string[], tracklist: readonly string[]): TrackCandidate[] {
  return paths.map((path) => {
    const { title, match } = selectBestTitle(path, tracklist);

    if (title === null) {
      return { path, match: NO_MATCH, resolution: { kind: 'unmatched' } };
    }

    return { path, match, resolution: { kind: 'matched', title } };
  });
}
