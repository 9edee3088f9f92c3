import { basename, dirname, resolve } from 'node:path';
import type {
  AlbumMetadata,
  CommitSummary,
  FileResult,
  StoredTags,
  TagName,
  TagOptions,
  TrackCandidate,
  WritePlan,
} from './types.js';
import { TAG_NAMES } from './types.js';
import { buildWritePlan, isEmptyPlan } from './tag-options.js';

export interface TagStore {
  read(path: string): Promise<StoredTags>;
  write(path: string, set: WritePlan['set'], remove: TagName[]): Promise<void>;
}

export interface CommitSettings {
  stopOnWriteError: boolean;
}

export function parentDirectoryName(path: string): string {
  return basename(dirname(resolve(path)));
}

/** Drop values that are already stored and removals of tags that are absent. */
export function diffWritePlan(plan: WritePlan, stored: StoredTags): WritePlan {
  const diff: WritePlan = { set: {}, remove: [] };

  for (const tag of TAG_NAMES) {
    const value = plan.set[tag];

    if (value !== undefined && stored[tag] !== value) {
      diff.set[tag] = value;
    }
  }

  diff.remove = plan.remove.filter((tag) => stored[tag] !== undefined);

  return diff;
}

export function changedTags(diff: WritePlan): TagName[] {
  return [...TAG_NAMES.filter((tag) => diff.set[tag] !== undefined), ...diff.remove];
}

/** Returns the tags that were written; empty when the file already matched. */
export async function writeIfChanged(store: TagStore, path: string, plan: WritePlan): Promise<TagName[]> {
  if (isEmptyPlan(plan)) {
    return [];
  }

  const stored = await store.read(path);
  const diff = diffWritePlan(plan, stored);

  if (isEmptyPlan(diff)) {
    return [];
  }

  await store.write(path, diff.set, diff.remove);
  return changedTags(diff);
}

export async function commitCandidates(
  candidates: readonly TrackCandidate[],
  album: AlbumMetadata,
  options: TagOptions,
  store: TagStore,
  settings: CommitSettings,
  onResult?: (result: FileResult) => void
): Promise<CommitSummary> {
  const summary: CommitSummary = { changed: 0, unchanged: 0, failed: 0, stopped: false, results: [] };

  for (const candidate of candidates) {
    let result: FileResult;

    try {
      const plan = buildWritePlan(candidate, album, options, parentDirectoryName(candidate.path));
      const written = await writeIfChanged(store, candidate.path, plan);

      result = {
        path: candidate.path,
        status: written.length > 0 ? 'changed' : 'unchanged',
        changedTags: written,
      };
    } catch (error) {
      result = {
        path: candidate.path,
        status: 'failed',
        changedTags: [],
        error: error instanceof Error ? error.message : String(error),
      };
    }

    summary[result.status]++;
    summary.results.push(result);
    onResult?.(result);

    if (result.status === 'failed' && settings.stopOnWriteError) {
      summary.stopped = true;
      break;
    }
  }

  return summary;
}
