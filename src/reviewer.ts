import type { Span, TrackCandidate } from './types.js';
import type { Terminal } from './terminal.js';
import { describeCandidate, describeCandidateList, describeTracklist } from './display.js';

export type ReviewState =
  | { kind: 'listing' }
  | { kind: 'awaiting-selection' }
  | { kind: 'awaiting-title'; index: number };

export type PromptState = Exclude<ReviewState, { kind: 'listing' }>;

export type ReviewStep =
  | { kind: 'continue'; state: ReviewState; candidates: TrackCandidate[]; notice?: string; edited?: number }
  | { kind: 'cancelled'; candidates: TrackCandidate[] }
  | { kind: 'committed'; candidates: TrackCandidate[] }
  | { kind: 'aborted' };

export type ReviewOutcome =
  | { kind: 'committed'; candidates: TrackCandidate[] }
  | { kind: 'aborted' };

type Reply =
  | { kind: 'empty' }
  | { kind: 'quit' }
  | { kind: 'choice'; value: number }
  | { kind: 'out-of-range' }
  | { kind: 'invalid' };

export const OUT_OF_RANGE_NOTICE = 'Selection is outside the available range';
export const CANCEL_NOTICE = 'Cancelled new track selection';

const PROMPT_SELECT_TRACK_CHANGE = 'Enter number of any selection you want to change:';
const PROMPT_SELECT_NEW_TRACK = 'Select the new track number:';

const DONE_HINT = 'return finishes';
const CANCEL_HINT = 'return cancels';
const QUIT_HINT = "'q' quits";

const INTEGER_PATTERN = /^\s*[+-]?\d+\s*$/;

function interpretReply(response: string, lower: number, upper: number): Reply {
  if (response === '') {
    return { kind: 'empty' };
  }

  if (response.toLowerCase() === 'q') {
    return { kind: 'quit' };
  }

  if (!INTEGER_PATTERN.test(response)) {
    return { kind: 'invalid' };
  }

  const value = parseInt(response, 10);

  if (value < lower || value > upper) {
    return { kind: 'out-of-range' };
  }

  return { kind: 'choice', value };
}

export function promptFor(state: PromptState): string {
  if (state.kind === 'awaiting-selection') {
    return `${PROMPT_SELECT_TRACK_CHANGE} (${DONE_HINT}, ${QUIT_HINT})`;
  }

  return `${PROMPT_SELECT_NEW_TRACK} (${CANCEL_HINT}, ${QUIT_HINT})`;
}

function replaceCandidate(
  candidates: TrackCandidate[],
  index: number,
  title: string | null
): TrackCandidate[] {
  return candidates.map((candidate, idx) => {
    if (idx !== index) {
      return candidate;
    }

    return {
      ...candidate,
      match: { kind: 'manual' },
      resolution: title === null ? { kind: 'unmatched' } : { kind: 'matched', title },
    };
  });
}

function selectionTransition(candidates: TrackCandidate[], response: string): ReviewStep {
  const state: ReviewState = { kind: 'awaiting-selection' };
  const reply = interpretReply(response, 1, candidates.length);

  switch (reply.kind) {
    case 'empty':
      return { kind: 'committed', candidates };
    case 'quit':
      return { kind: 'aborted' };
    case 'choice':
      return { kind: 'continue', state: { kind: 'awaiting-title', index: reply.value - 1 }, candidates };
    case 'out-of-range':
      return { kind: 'continue', state, candidates, notice: OUT_OF_RANGE_NOTICE };
    case 'invalid':
      return { kind: 'continue', state, candidates };
  }
}

function titleTransition(
  index: number,
  candidates: TrackCandidate[],
  tracklist: readonly string[],
  response: string
): ReviewStep {
  const state: ReviewState = { kind: 'awaiting-title', index };
  const reply = interpretReply(response, 0, tracklist.length);

  switch (reply.kind) {
    case 'empty':
      return { kind: 'cancelled', candidates };
    case 'quit':
      return { kind: 'aborted' };
    case 'choice': {
      const title = reply.value === 0 ? null : tracklist[reply.value - 1];

      return {
        kind: 'continue',
        state: { kind: 'listing' },
        candidates: replaceCandidate(candidates, index, title),
        edited: index,
      };
    }
    case 'out-of-range':
      return { kind: 'continue', state, candidates, notice: OUT_OF_RANGE_NOTICE };
    case 'invalid':
      return { kind: 'continue', state, candidates };
  }
}

/**
 * Apply one operator response to the review. Never mutates `candidates`;
 * edits come back as a new array on the step.
 */
export function reviewTransition(
  state: PromptState,
  candidates: TrackCandidate[],
  tracklist: readonly string[],
  response: string
): ReviewStep {
  if (state.kind === 'awaiting-selection') {
    return selectionTransition(candidates, response);
  }

  return titleTransition(state.index, candidates, tracklist, response);
}

function printLines(terminal: Terminal, lines: Span[][]): void {
  for (const line of lines) {
    terminal.print(...line);
  }
}

/**
 * Let the operator correct the automatic matches until they finish (return)
 * or quit ('q'). Nothing is written here; the caller commits the outcome.
 */
export async function reviewCandidates(
  initial: readonly TrackCandidate[],
  tracklist: readonly string[],
  terminal: Terminal
): Promise<ReviewOutcome> {
  let candidates = [...initial];
  let state: ReviewState = { kind: 'listing' };

  while (true) {
    if (state.kind === 'listing') {
      terminal.print();
      printLines(terminal, describeCandidateList(candidates));
      terminal.print();
      state = { kind: 'awaiting-selection' };
      continue;
    }

    const response = await terminal.prompt(promptFor(state));
    const step = reviewTransition(state, candidates, tracklist, response);

    switch (step.kind) {
      case 'committed':
        return { kind: 'committed', candidates: step.candidates };

      case 'aborted':
        return { kind: 'aborted' };

      case 'cancelled':
        terminal.print({ text: CANCEL_NOTICE, tone: 'muted' });
        candidates = step.candidates;
        state = { kind: 'listing' };
        break;

      case 'continue':
        if (step.notice) {
          terminal.print({ text: step.notice, tone: 'error' });
        }

        if (step.edited !== undefined) {
          terminal.print(...describeCandidate(step.candidates[step.edited]));
        }

        if (step.state.kind === 'awaiting-title' && state.kind === 'awaiting-selection') {
          terminal.print(...describeCandidate(step.candidates[step.state.index]));
          printLines(terminal, describeTracklist(tracklist));
          terminal.print();
        }

        candidates = step.candidates;
        state = step.state;
        break;
    }
  }
}
