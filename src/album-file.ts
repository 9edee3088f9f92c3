import { readFile } from 'node:fs/promises';
import type { AlbumMetadata } from './types.js';

export class AlbumFileError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AlbumFileError';
  }
}

export const ARTIST_HEADER = 'artist';
export const ALBUM_HEADER = 'album';
export const TRACKLIST_HEADER = 'tracklist';

export type AlbumTable = Map<string, string[]>;

const BOM = '\uFEFF';

function parseHeader(entry: string): string | null {
  if (entry.startsWith('[') && entry.endsWith(']')) {
    return entry.slice(1, -1);
  }

  return null;
}

/**
 * Group the lines of a track-list file under their `[header]`. Lines before
 * the first header belong to the unnamed header `''`; a repeated header keeps
 * appending to its existing entries.
 */
export function parseAlbumTable(content: string): AlbumTable {
  let current: string[] = [];
  const table: AlbumTable = new Map([['', current]]);

  content.split('\n').forEach((line, idx) => {
    const raw = idx === 0 && line.startsWith(BOM) ? line.slice(BOM.length) : line;
    const entry = raw.trimEnd();

    if (entry.length === 0) {
      return;
    }

    const header = parseHeader(entry);

    if (header === null) {
      current.push(entry);
      return;
    }

    const existing = table.get(header);

    if (existing) {
      current = existing;
      return;
    }

    current = [];
    table.set(header, current);
  });

  return table;
}

export function parseAlbumMetadata(table: AlbumTable): AlbumMetadata {
  const entries = (header: string): string[] => {
    const values = table.get(header) ?? [];

    if (values.length === 0) {
      throw new AlbumFileError(`No ${header}`);
    }

    return values;
  };

  const [artist] = entries(ARTIST_HEADER);
  const [album] = entries(ALBUM_HEADER);
  const tracklist = entries(TRACKLIST_HEADER);

  return { artist, album, tracklist: [...tracklist] };
}

export async function readAlbumFile(path: string): Promise<AlbumMetadata> {
  let content: string;

  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new AlbumFileError(`Could not read ${path}: ${reason}`);
  }

  return parseAlbumMetadata(parseAlbumTable(content));
}
