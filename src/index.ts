#!/usr/bin/env node
import { stat } from 'node:fs/promises';
import { join } from 'node:path';
import { CommanderError } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import type { AlbumMetadata, CommitSummary, Config, FileResult } from './types.js';
import { parseArguments, type CliArguments } from './cli.js';
import { loadConfig } from './config.js';
import { AlbumFileError, readAlbumFile } from './album-file.js';
import { findAudioFiles } from './scanner.js';
import { identifyTracks } from './selector.js';
import { reviewCandidates } from './reviewer.js';
import { resolveAlbumOptions } from './tag-options.js';
import { commitCandidates } from './changes.js';
import { Id3TagStore } from './writer.js';
import { createConsoleTerminal } from './terminal.js';
import { formatTrackFields, readTrackFields, unescapeFormat, validateFormat } from './metadata.js';

const FAREWELLS = [
  'See you next time!',
  'Good-bye!',
  'Thanks for tagging!',
  'Until next time!',
  'See you soon!',
];

function farewell(): string {
  return FAREWELLS[Math.floor(Math.random() * FAREWELLS.length)];
}

function isPromptExit(error: unknown): boolean {
  return error instanceof Error && error.name === 'ExitPromptError';
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

async function runPrint(args: CliArguments, config: Config): Promise<void> {
  const format = args.format === null ? config.printFormat : unescapeFormat(args.format);
  validateFormat(format);

  const recursive = args.recursive ?? config.recursive;
  const paths = (await isDirectory(args.input))
    ? await findAudioFiles(args.input, { extensions: config.extensions, recursive })
    : [args.input];

  if (paths.length === 0) {
    console.log(chalk.yellow(`No audio files found in ${args.input}`));
    return;
  }

  for (const path of paths) {
    try {
      console.log(formatTrackFields(format, await readTrackFields(path)));
    } catch (error) {
      console.error(chalk.red(`Could not read metadata from ${path}: ${error instanceof Error ? error.message : String(error)}`));
      process.exitCode = 1;
    }
  }
}

function reportResult(result: FileResult): void {
  switch (result.status) {
    case 'changed':
      console.log(chalk.green(`✓ ${result.path}`) + chalk.gray(` (${result.changedTags.join(', ')})`));
      break;
    case 'unchanged':
      console.log(chalk.gray(`  ${result.path} unchanged`));
      break;
    case 'failed':
      console.log(chalk.red(`✗ ${result.path}: ${result.error}`));
      break;
  }
}

function reportSummary(summary: CommitSummary, total: number): void {
  console.log();

  if (summary.changed > 0) {
    console.log(chalk.green(`Changes saved to ${summary.changed} file(s)!`));
  } else {
    console.log(chalk.yellow('No changes were made to the files'));
  }

  console.log(chalk.gray(`  Unchanged: ${summary.unchanged}`));

  if (summary.failed > 0) {
    console.log(chalk.red(`  Failed: ${summary.failed}`));
  }

  if (summary.stopped) {
    const skipped = total - summary.results.length;
    console.log(chalk.red(`  Stopped after a failed write; ${skipped} file(s) were not attempted`));
  }
}

async function runTagging(args: CliArguments, config: Config): Promise<void> {
  const inputIsDirectory = await isDirectory(args.input);
  const albumFile = inputIsDirectory ? join(args.input, config.trackListFilename) : args.input;
  const audioDir = args.output ?? (inputIsDirectory ? args.input : process.cwd());
  const recursive = args.recursive ?? config.recursive;

  let album: AlbumMetadata;

  try {
    album = await readAlbumFile(albumFile);
    console.log(chalk.gray(`Read album metadata from ${albumFile}`));
  } catch (error) {
    if (error instanceof AlbumFileError) {
      console.error(chalk.red(`Error: ${error.message}`));
      console.error(chalk.gray('Fix error and run script again'));
      process.exitCode = 1;
      return;
    }

    throw error;
  }

  const spinner = ora(`Matching audio files in ${audioDir}...`).start();
  let paths: string[];

  try {
    paths = await findAudioFiles(audioDir, { extensions: config.extensions, recursive });
  } catch (error) {
    spinner.fail(`Failed to scan ${audioDir}`);
    throw error;
  }

  if (paths.length === 0) {
    spinner.warn(`No audio files found in ${audioDir}`);
    return;
  }

  const candidates = identifyTracks(paths, album.tracklist);
  const matched = candidates.filter((c) => c.resolution.kind === 'matched').length;
  spinner.succeed(`Matched ${matched} of ${paths.length} files to "${album.album}" by ${album.artist}`);

  const outcome = await reviewCandidates(candidates, album.tracklist, createConsoleTerminal());

  if (outcome.kind === 'aborted') {
    console.log(chalk.yellow('Quitting...'));
    console.log(chalk.yellow('No changes were made to the files.'));
    return;
  }

  const options = resolveAlbumOptions(album, args.tagOptions);
  const summary = await commitCandidates(
    outcome.candidates,
    album,
    options,
    new Id3TagStore(),
    { stopOnWriteError: config.stopOnWriteError },
    reportResult
  );

  reportSummary(summary, outcome.candidates.length);

  if (summary.failed > 0) {
    process.exitCode = 1;
  }

  console.log(chalk.cyan(farewell()));
}

async function main(argv: string[]): Promise<void> {
  let args: CliArguments;

  try {
    args = parseArguments(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      process.exitCode = error.exitCode;
      return;
    }

    throw error;
  }

  const config = await loadConfig();

  if (args.print) {
    await runPrint(args, config);
    return;
  }

  await runTagging(args, config);
}

main(process.argv.slice(2)).catch((error: unknown) => {
  if (isPromptExit(error)) {
    console.log(chalk.yellow('\nQuitting...'));
    console.log(chalk.yellow('No changes were made to the files.'));
    return;
  }

  console.error(chalk.red(error instanceof Error ? error.message : String(error)));

  process.exitCode = 1;
});
