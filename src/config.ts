import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import type { Config } from './types.js';

export const CONFIG_FILE = join(process.cwd(), 'config.json');

export const DEFAULT_PRINT_FORMAT =
  '{path}\nTitle: {title} (#{tracknumber})\nArtist: {artist}\nAlbum Artist: {albumartist}\nAlbum: {album}\n';

export const DEFAULT_CONFIG: Config = {
  extensions: ['mp3'],
  trackListFilename: 'album.txt',
  recursive: false,
  stopOnWriteError: false,
  printFormat: DEFAULT_PRINT_FORMAT,
};

const configSchema = z
  .object({
    extensions: z.array(z.string().min(1)).min(1),
    trackListFilename: z.string().min(1),
    recursive: z.boolean(),
    stopOnWriteError: z.boolean(),
    printFormat: z.string().min(1),
  })
  .partial()
  .strict();

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/** Read `config.json` over the defaults. A missing file means defaults. */
export async function loadConfig(path: string = CONFIG_FILE): Promise<Config> {
  let data: string;

  try {
    data = await readFile(path, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) {
      return { ...DEFAULT_CONFIG };
    }

    throw error;
  }

  let raw: unknown;

  try {
    raw = JSON.parse(data);
  } catch {
    throw new ConfigError(`${path} is not valid JSON`);
  }

  const parsed = configSchema.safeParse(raw);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigError(`Invalid config in ${path}:\n  ${issues.join('\n  ')}`);
  }

  return { ...DEFAULT_CONFIG, ...parsed.data };
}
