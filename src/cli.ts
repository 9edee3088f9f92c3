import { Command, Option } from 'commander';
import type { FieldOption, OptionTag, TagOptions } from './types.js';
import { OPTION_TAGS } from './types.js';

export interface CliArguments {
  input: string;
  output: string | null;
  recursive: boolean | null;
  print: boolean;
  format: string | null;
  tagOptions: TagOptions;
}

interface RawFlags {
  output?: string;
  recursive?: boolean;
  print?: boolean;
  format?: string;
  [flag: string]: string | boolean | undefined;
}

const TAG_FLAGS: Record<OptionTag, string> = {
  artist: 'artist',
  albumartist: 'album-artist',
  album: 'album',
};

const TAG_LABELS: Record<OptionTag, string> = {
  artist: 'artist',
  albumartist: 'album artist',
  album: 'album title',
};

function camelCase(flag: string): string {
  return flag.replace(/-([a-z])/g, (_, ch: string) => ch.toUpperCase());
}

function flagNames(tag: OptionTag): { literal: string; parent: string; remove: string } {
  const flag = TAG_FLAGS[tag];

  return {
    literal: camelCase(flag),
    parent: camelCase(`${flag}-from-parent`),
    remove: camelCase(`remove-${flag}`),
  };
}

function addTagOptions(program: Command, tag: OptionTag): void {
  const names = flagNames(tag);
  const flag = TAG_FLAGS[tag];
  const label = TAG_LABELS[tag];

  program
    .addOption(
      new Option(`--${flag} <value>`, `set the ${label} of every matched file`)
        .conflicts([names.parent, names.remove])
    )
    .addOption(
      new Option(`--${flag}-from-parent`, `set the ${label} to the name of each file's directory`)
        .conflicts([names.literal, names.remove])
    )
    .addOption(
      new Option(`--remove-${flag}`, `remove the ${label} tag`)
        .conflicts([names.literal, names.parent])
    );
}

function tagOption(flags: RawFlags, tag: OptionTag): FieldOption {
  const names = flagNames(tag);
  const literal = flags[names.literal];

  if (typeof literal === 'string') {
    return { kind: 'literal', value: literal };
  }

  if (flags[names.parent] === true) {
    return { kind: 'parent' };
  }

  if (flags[names.remove] === true) {
    return { kind: 'remove' };
  }

  return { kind: 'unset' };
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('album-tagger')
    .description('Apply album metadata to audio files by matching filenames against a track list')
    .argument('<input>', 'track-list file, or a directory holding one (or audio files, with --print)')
    .option('-o, --output <dir>', 'directory of audio files to tag (default: current directory)')
    .option('-r, --recursive', 'include audio files in subdirectories')
    .option('-p, --print', 'print the current metadata of the audio files instead of tagging')
    .option('-f, --format <format>', 'format used by --print, e.g. "{tracknumber}. {title}"');

  for (const tag of OPTION_TAGS) {
    addTagOptions(program, tag);
  }

  return program;
}

/**
 * Parse user arguments (without the node and script entries). Commander
 * errors are thrown as CommanderError rather than exiting the process.
 */
export function parseArguments(argv: readonly string[], program: Command = createProgram()): CliArguments {
  program.exitOverride();
  program.parse([...argv], { from: 'user' });

  const flags = program.opts<RawFlags>();
  const tagOptions: TagOptions = {
    artist: tagOption(flags, 'artist'),
    albumartist: tagOption(flags, 'albumartist'),
    album: tagOption(flags, 'album'),
  };

  return {
    input: program.args[0],
    output: flags.output ?? null,
    recursive: flags.recursive ?? null,
    print: flags.print ?? false,
    format: flags.format ?? null,
    tagOptions,
  };
}
