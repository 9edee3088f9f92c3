import { extname } from 'node:path';
import NodeID3 from 'node-id3';
import type { StoredTags, TagName, WritePlan } from './types.js';
import { TAG_NAMES } from './types.js';
import type { TagStore } from './changes.js';

type Id3Key = 'title' | 'trackNumber' | 'artist' | 'performerInfo' | 'album';

const ID3_KEYS: Record<TagName, Id3Key> = {
  title: 'title',
  tracknumber: 'trackNumber',
  artist: 'artist',
  albumartist: 'performerInfo',
  album: 'album',
};

export function toId3Tags(set: WritePlan['set']): NodeID3.Tags {
  const tags: NodeID3.Tags = {};

  for (const tag of TAG_NAMES) {
    const value = set[tag];

    if (value !== undefined) {
      tags[ID3_KEYS[tag]] = value;
    }
  }

  return tags;
}

export function fromId3Tags(tags: NodeID3.Tags): StoredTags {
  const stored: StoredTags = {};

  for (const tag of TAG_NAMES) {
    const value = tags[ID3_KEYS[tag]];

    if (value !== undefined) {
      stored[tag] = value;
    }
  }

  return stored;
}

function assertMp3(filePath: string): void {
  if (extname(filePath).toLowerCase() !== '.mp3') {
    throw new Error(`Unsupported format for ID3 tags: ${filePath}`);
  }
}

/** Tag store for MP3 files backed by ID3v2 frames. Other formats are refused. */
export class Id3TagStore implements TagStore {
  async read(filePath: string): Promise<StoredTags> {
    assertMp3(filePath);
    return fromId3Tags(NodeID3.read(filePath, { noRaw: true }));
  }

  async write(filePath: string, set: WritePlan['set'], remove: TagName[]): Promise<void> {
    assertMp3(filePath);
    const updates = toId3Tags(set);

    if (remove.length === 0) {
      const result = NodeID3.update(updates, filePath);

      if (result !== true) {
        throw new Error(`Failed to write MP3 tags: ${result.message}`);
      }

      return;
    }

    // update() cannot drop frames, so rewrite the whole tag without them
    const tags: NodeID3.Tags = { ...NodeID3.read(filePath, { noRaw: true }), ...updates };

    for (const tag of remove) {
      delete tags[ID3_KEYS[tag]];
    }

    const result = NodeID3.write(tags, filePath);

    if (result !== true) {
      throw new Error(`Failed to write MP3 tags: ${result.message}`);
    }
  }
}
