import { readdir } from 'node:fs/promises';
import { join, extname } from 'node:path';

export interface ScanOptions {
  extensions: readonly string[];
  recursive: boolean;
}

function normalizeExtension(ext: string): string {
  const lowered = ext.toLowerCase();
  return lowered.startsWith('.') ? lowered : `.${lowered}`;
}

export async function findAudioFiles(dir: string, options: ScanOptions): Promise<string[]> {
  const extensions = new Set(options.extensions.map(normalizeExtension));
  const audioFiles: string[] = [];
  const entries = await readdir(dir, { withFileTypes: true });

  for (const entry of entries) {
    const fullPath = join(dir, entry.name);

    if (entry.isDirectory()) {
      if (options.recursive) {
        const nestedFiles = await findAudioFiles(fullPath, options);
        audioFiles.push(...nestedFiles);
      }

      continue;
    }

    if (entry.isFile() && extensions.has(extname(entry.name).toLowerCase())) {
      audioFiles.push(fullPath);
    }
  }

  return audioFiles.sort();
}
