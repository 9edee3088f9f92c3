import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  AlbumFileError,
  parseAlbumMetadata,
  parseAlbumTable,
  readAlbumFile,
} from '../src/album-file.js';

const ALBUM_FILE = [
  '\uFEFF[artist]',
  'The Tides',
  '',
  '[album]',
  'Low Water  ',
  '[tracklist]',
  'Intro',
  'Lost at Sea',
  '[notes]',
  'recorded live',
  '[tracklist]',
  'Home',
  '',
].join('\n');

describe('parseAlbumTable', () => {
  it('groups entries under their headers', () => {
    const table = parseAlbumTable(ALBUM_FILE);

    expect(table.get('artist')).toEqual(['The Tides']);
    expect(table.get('album')).toEqual(['Low Water']);
    expect(table.get('notes')).toEqual(['recorded live']);
  });

  it('resumes a repeated header instead of replacing it', () => {
    expect(parseAlbumTable(ALBUM_FILE).get('tracklist')).toEqual(['Intro', 'Lost at Sea', 'Home']);
  });

  it('keeps lines before the first header under the unnamed header', () => {
    expect(parseAlbumTable('stray\n[artist]\nThe Tides').get('')).toEqual(['stray']);
    expect(parseAlbumTable(ALBUM_FILE).get('')).toEqual([]);
  });

  it('strips a byte order mark on the first line only', () => {
    const table = parseAlbumTable('[artist]\nThe Tides\n[tracklist]\n\uFEFFIntro');

    expect(table.get('tracklist')).toEqual(['\uFEFFIntro']);
  });

  it('accepts CRLF line endings', () => {
    expect(parseAlbumTable('[artist]\r\nThe Tides\r\n').get('artist')).toEqual(['The Tides']);
  });
});

describe('parseAlbumMetadata', () => {
  it('builds album metadata from the table', () => {
    expect(parseAlbumMetadata(parseAlbumTable(ALBUM_FILE))).toEqual({
      artist: 'The Tides',
      album: 'Low Water',
      tracklist: ['Intro', 'Lost at Sea', 'Home'],
    });
  });

  it('uses the first entry of artist and album', () => {
    const table = parseAlbumTable('[artist]\nA\nB\n[album]\nC\nD\n[tracklist]\nE');

    expect(parseAlbumMetadata(table)).toEqual({ artist: 'A', album: 'C', tracklist: ['E'] });
  });

  it('rejects a file without a tracklist', () => {
    const table = parseAlbumTable('[artist]\nThe Tides\n[album]\nLow Water');

    expect(() => parseAlbumMetadata(table)).toThrow(AlbumFileError);
    expect(() => parseAlbumMetadata(table)).toThrow('No tracklist');
  });

  it('reports the artist first when several headers are missing', () => {
    expect(() => parseAlbumMetadata(parseAlbumTable('[tracklist]\n'))).toThrow('No artist');
  });
});

describe('readAlbumFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'album-file-test-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reads and parses a track-list file', async () => {
    const path = join(dir, 'album.txt');
    writeFileSync(path, ALBUM_FILE, 'utf-8');

    await expect(readAlbumFile(path)).resolves.toEqual({
      artist: 'The Tides',
      album: 'Low Water',
      tracklist: ['Intro', 'Lost at Sea', 'Home'],
    });
  });

  it('wraps a missing file in an AlbumFileError', async () => {
    await expect(readAlbumFile(join(dir, 'missing.txt'))).rejects.toBeInstanceOf(AlbumFileError);
  });
});
