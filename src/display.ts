import { basename } from 'node:path';
import type { Span, TrackCandidate } from './types.js';
import { highlightSegments } from './highlight.js';

const span = (text: string, tone: Span['tone'] = 'plain'): Span => ({ text, tone });

export function describeCandidate(candidate: TrackCandidate): Span[] {
  const filename = basename(candidate.path);

  if (candidate.resolution.kind === 'unmatched') {
    return [span(`'${filename}' will remain unchanged`, 'warning')];
  }

  const { title } = candidate.resolution;

  if (candidate.match.kind !== 'automatic') {
    return [span(`${filename} -> ${title}`, 'manual')];
  }

  const highlighted = highlightSegments(filename, candidate.match).map((segment) =>
    span(segment.text, segment.kind)
  );

  return [...highlighted, span(' -> '), span(title, 'title')];
}

export function describeCandidateList(candidates: readonly TrackCandidate[]): Span[][] {
  return candidates.map((candidate, idx) => [span(`${idx + 1} - `), ...describeCandidate(candidate)]);
}

export function describeTracklist(tracklist: readonly string[]): Span[][] {
  return [
    [span('0 - <remove track title>')],
    ...tracklist.map((track, idx) => [span(`${idx + 1} - ${track}`)]),
  ];
}

export function plainText(spans: readonly Span[]): string {
  return spans.map((s) => s.text).join('');
}
