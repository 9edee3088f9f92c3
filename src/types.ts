export interface AlbumMetadata {
  artist: string;
  album: string;
  tracklist: string[];
}

export interface NormalizedString {
  readonly text: string;
  readonly indexMap: readonly number[];
}

export interface AutomaticMatch {
  kind: 'automatic';
  start: number;
  length: number;
  mismatches: readonly number[];
}

export interface ManualMatch {
  kind: 'manual';
}

export interface NoMatch {
  kind: 'none';
}

export type Match = AutomaticMatch | ManualMatch | NoMatch;

export type TitleResolution =
  | { kind: 'matched'; title: string }
  | { kind: 'unmatched' };

export interface TrackCandidate {
  path: string;
  match: Match;
  resolution: TitleResolution;
}

export const OPTION_TAGS = ['artist', 'albumartist', 'album'] as const;

export type OptionTag = (typeof OPTION_TAGS)[number];

export const TAG_NAMES = ['title', 'tracknumber', ...OPTION_TAGS] as const;

export type TagName = (typeof TAG_NAMES)[number];

export type FieldOption =
  | { kind: 'unset' }
  | { kind: 'literal'; value: string }
  | { kind: 'parent' }
  | { kind: 'remove' };

export type TagOptions = Record<OptionTag, FieldOption>;

export type StoredTags = Partial<Record<TagName, string>>;

export interface WritePlan {
  set: Partial<Record<TagName, string>>;
  remove: TagName[];
}

export type FileStatus = 'changed' | 'unchanged' | 'failed';

export interface FileResult {
  path: string;
  status: FileStatus;
  changedTags: TagName[];
  error?: string;
}

export interface CommitSummary {
  changed: number;
  unchanged: number;
  failed: number;
  stopped: boolean;
  results: FileResult[];
}

export interface Config {
  extensions: string[];
  trackListFilename: string;
  recursive: boolean;
  stopOnWriteError: boolean;
  printFormat: string;
}

export type Tone =
  | 'plain'
  | 'match'
  | 'mismatch'
  | 'title'
  | 'manual'
  | 'warning'
  | 'error'
  | 'success'
  | 'muted';

export interface Span {
  text: string;
  tone: Tone;
}
