import type { Span, StoredTags, TagName, WritePlan } from '../src/types.js';
import type { Terminal } from '../src/terminal.js';
import type { TagStore } from '../src/changes.js';
import { plainText } from '../src/display.js';

export class ScriptedTerminal implements Terminal {
  readonly lines: string[] = [];
  readonly prompts: string[] = [];
  private readonly responses: string[];

  constructor(responses: string[]) {
    this.responses = [...responses];
  }

  async prompt(message: string): Promise<string> {
    this.prompts.push(message);
    const response = this.responses.shift();

    if (response === undefined) {
      throw new Error(`No scripted response left for "${message}"`);
    }

    return response;
  }

  print(...spans: Span[]): void {
    this.lines.push(plainText(spans));
  }
}

export interface RecordedWrite {
  path: string;
  set: WritePlan['set'];
  remove: TagName[];
}

export class MemoryTagStore implements TagStore {
  readonly files = new Map<string, StoredTags>();
  readonly writes: RecordedWrite[] = [];
  readonly failing = new Set<string>();
  reads = 0;

  async read(path: string): Promise<StoredTags> {
    this.reads++;
    return { ...(this.files.get(path) ?? {}) };
  }

  async write(path: string, set: WritePlan['set'], remove: TagName[]): Promise<void> {
    if (this.failing.has(path)) {
      throw new Error('disk full');
    }

    this.writes.push({ path, set, remove });

    const next: StoredTags = { ...(this.files.get(path) ?? {}), ...set };

    for (const tag of remove) {
      delete next[tag];
    }

    this.files.set(path, next);
  }
}
