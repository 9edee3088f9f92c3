import type {
  AlbumMetadata,
  FieldOption,
  OptionTag,
  TagOptions,
  TrackCandidate,
  WritePlan,
} from './types.js';
import { OPTION_TAGS } from './types.js';

export const UNSET: FieldOption = { kind: 'unset' };

export function emptyTagOptions(): TagOptions {
  return { artist: UNSET, albumartist: UNSET, album: UNSET };
}

function albumDefault(album: AlbumMetadata, tag: OptionTag): string {
  switch (tag) {
    case 'artist':
    case 'albumartist':
      return album.artist;
    case 'album':
      return album.album;
  }
}

/** Fill every unset option from the album file; explicit options win. */
export function resolveAlbumOptions(album: AlbumMetadata, options: TagOptions): TagOptions {
  const resolved = { ...options };

  for (const tag of OPTION_TAGS) {
    if (options[tag].kind === 'unset') {
      resolved[tag] = { kind: 'literal', value: albumDefault(album, tag) };
    }
  }

  return resolved;
}

export function buildWritePlan(
  candidate: TrackCandidate,
  album: AlbumMetadata,
  options: TagOptions,
  parentDirName: string
): WritePlan {
  const plan: WritePlan = { set: {}, remove: [] };

  if (candidate.resolution.kind === 'unmatched') {
    return plan;
  }

  const { title } = candidate.resolution;
  const index = album.tracklist.indexOf(title);

  if (index === -1) {
    throw new Error(`"${title}" is not on the tracklist of ${album.album}`);
  }

  plan.set.title = title;
  plan.set.tracknumber = String(index + 1);

  for (const tag of OPTION_TAGS) {
    const option = options[tag];

    switch (option.kind) {
      case 'literal':
        plan.set[tag] = option.value;
        break;
      case 'parent':
        plan.set[tag] = parentDirName;
        break;
      case 'remove':
        plan.remove.push(tag);
        delete plan.set[tag];
        break;
      case 'unset':
        break;
    }
  }

  return plan;
}

export function isEmptyPlan(plan: WritePlan): boolean {
  return Object.keys(plan.set).length === 0 && plan.remove.length === 0;
}
