import { basename } from 'node:path';
import { parseFile } from 'music-metadata';

export const FORMAT_FIELDS = [
  'path',
  'filename',
  'title',
  'artist',
  'albumartist',
  'album',
  'tracknumber',
] as const;

export type FormatField = (typeof FORMAT_FIELDS)[number];

export type TrackFields = Record<FormatField, string>;

const PLACEHOLDER = /\{(\w+)\}/g;

function isFormatField(name: string): name is FormatField {
  return FORMAT_FIELDS.some((field) => field === name);
}

/** Turn the two-character `\n` and `\t` escapes of a shell argument into characters. */
export function unescapeFormat(format: string): string {
  return format.replace(/\\n/g, '\n').replace(/\\t/g, '\t');
}

export function validateFormat(format: string): void {
  const unknown = [...format.matchAll(PLACEHOLDER)]
    .map((match) => match[1])
    .filter((name) => !isFormatField(name));

  if (unknown.length > 0) {
    throw new Error(
      `Unknown format field(s): ${unknown.join(', ')} (available: ${FORMAT_FIELDS.join(', ')})`
    );
  }
}

export function formatTrackFields(format: string, fields: TrackFields): string {
  validateFormat(format);
  return format.replace(PLACEHOLDER, (_, name: string) => (isFormatField(name) ? fields[name] : ''));
}

export async function readTrackFields(filePath: string): Promise<TrackFields> {
  const { common } = await parseFile(filePath);

  return {
    path: filePath,
    filename: basename(filePath),
    title: common.title ?? '',
    artist: common.artist ?? common.artists?.[0] ?? '',
    albumartist: common.albumartist ?? '',
    album: common.album ?? '',
    tracknumber: common.track.no === null ? '' : String(common.track.no),
  };
}
