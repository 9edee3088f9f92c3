import type { AutomaticMatch } from './types.js';
import { normalize } from './normalize.js';

export type SegmentKind = 'plain' | 'match' | 'mismatch';

export interface HighlightSegment {
  text: string;
  kind: SegmentKind;
}

export interface HighlightMarkers {
  start: string;
  mismatch: string;
  end: string;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

function codePointStart(text: string, idx: number): number {
  return idx > 0 && isLowSurrogate(text.charCodeAt(idx)) && isHighSurrogate(text.charCodeAt(idx - 1))
    ? idx - 1
    : idx;
}

function codePointEnd(text: string, idx: number): number {
  return isHighSurrogate(text.charCodeAt(idx)) && isLowSurrogate(text.charCodeAt(idx + 1))
    ? idx + 2
    : idx + 1;
}

/**
 * Split `original` into the text around the matched span, the span itself,
 * and each mismatched character inside it. `match` coordinates index the
 * normalized form of `original` (or of any prefix of it, such as the stem).
 */
export function highlightSegments(original: string, match: AutomaticMatch): HighlightSegment[] {
  const { indexMap } = normalize(original);
  const last = match.start + match.length - 1;

  if (match.length <= 0 || match.start < 0 || last >= indexMap.length) {
    throw new Error(`Match [${match.start}, ${last}] is outside "${original}"`);
  }

  const start = codePointStart(original, indexMap[match.start]);
  const end = codePointEnd(original, codePointStart(original, indexMap[last]));
  const mismatches = new Set(match.mismatches.map((idx) => codePointStart(original, indexMap[idx])));

  const segments: HighlightSegment[] = [];
  const push = (text: string, kind: SegmentKind): void => {
    if (text.length > 0) {
      segments.push({ text, kind });
    }
  };

  push(original.slice(0, start), 'plain');

  let runStart = start;

  for (let i = start; i < end; i++) {
    if (!mismatches.has(i)) {
      continue;
    }

    const next = codePointEnd(original, i);

    push(original.slice(runStart, i), 'match');
    push(original.slice(i, next), 'mismatch');
    runStart = next;
  }

  push(original.slice(runStart, end), 'match');
  push(original.slice(end), 'plain');

  return segments;
}

export function formatHighlighted(
  original: string,
  match: AutomaticMatch,
  markers: HighlightMarkers
): string {
  let output = '';
  let inSpan = false;

  for (const segment of highlightSegments(original, match)) {
    if (segment.kind === 'plain') {
      if (inSpan) {
        output += markers.end;
        inSpan = false;
      }

      output += segment.text;
      continue;
    }

    if (!inSpan) {
      output += markers.start;
      inSpan = true;
    }

    output += segment.kind === 'mismatch'
      ? markers.mismatch + segment.text + markers.start
      : segment.text;
  }

  if (inSpan) {
    output += markers.end;
  }

  return output;
}
