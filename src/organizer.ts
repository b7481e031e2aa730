import { basename, join, resolve } from 'node:path';
import { confirm } from '@inquirer/prompts';
import chalk from 'chalk';
import ora from 'ora';
import cliProgress from 'cli-progress';
import type { FileOutcome, OrganizerConfig, RunSummary } from './types.js';
import { errorMessage } from './errors.js';
import { extractMetadata, type TagReader } from './metadata.js';
import { buildLibraryFilename, validateNamingPattern } from './naming.js';
import { resolveUniquePath } from './resolver.js';
import { moveFile } from './mover.js';
import { ensureMembership } from './playlists.js';
import { findMusicFiles } from './scanner.js';
import {
  AutoSelection,
  InteractiveSelection,
  type PlaylistSelectionStrategy,
} from './selection.js';

export interface OrganizeContext {
  config: OrganizerConfig;
  reader: TagReader;
  selection: PlaylistSelectionStrategy;
  dryRun: boolean;
  verbose: boolean;
}

export interface OrganizeOptions {
  reader: TagReader;
  interactive: boolean;
  sourceDirs?: string[];
  dryRun?: boolean;
  selection?: PlaylistSelectionStrategy;
}

function failed(source: string, destination: string | null, error: unknown): FileOutcome {
  return {
    status: 'failed',
    source,
    destination,
    error: errorMessage(error),
  };
}

/**
 * Runs one file through extract, name, resolve, move, select and record.
 * Filesystem failures are returned as a failed outcome; a bad naming pattern
 * is thrown.
 */
export async function organizeFile(filePath: string, context: OrganizeContext): Promise<FileOutcome> {
  const { config, dryRun, verbose } = context;
  const metadata = await extractMetadata(filePath, context.reader);
  const filename = buildLibraryFilename(metadata, config.namingPattern);

  let destination: string;

  try {
    destination = await resolveUniquePath(join(config.librarySongsDir, filename));
  } catch (error) {
    return failed(filePath, null, error);
  }

  if (!dryRun) {
    const moved = await moveFile(filePath, destination);

    if (!moved.success) {
      return failed(filePath, destination, moved.error);
    }
  }

  if (verbose) {
    const verb = dryRun ? 'Would move' : 'Moved';
    console.log(chalk.green(`✓ ${verb}: ${basename(filePath)} → ${basename(destination)}`));
  }

  const selection = await context.selection.select(metadata);
  const added: string[] = [];
  const alreadyPresent: string[] = [];

  for (const playlist of selection.playlists) {
    if (dryRun) {
      added.push(playlist);
      continue;
    }

    try {
      const result = await ensureMembership(playlist, destination);

      if (result === 'added') {
        added.push(playlist);
      } else {
        alreadyPresent.push(playlist);
      }
    } catch (error) {
      return failed(
        filePath,
        destination,
        `Moved to ${destination} but could not update ${basename(playlist)}: ${errorMessage(error)}`
      );
    }
  }

  if (verbose && added.length > 0) {
    const label = selection.source === 'auto' ? 'Automatically added to' : 'Added to';
    console.log(chalk.gray(`  ${label}: ${added.map((playlist) => basename(playlist)).join(', ')}`));
  }

  return {
    status: 'organized',
    source: filePath,
    destination,
    metadata,
    selection,
    added,
    alreadyPresent,
  };
}

function emptySummary(dryRun: boolean): RunSummary {
  return {
    total: 0,
    succeeded: 0,
    failed: 0,
    failures: [],
    playlistAdditions: 0,
    dryRun,
  };
}

export async function organizeAll(config: OrganizerConfig, options: OrganizeOptions): Promise<RunSummary> {
  const dryRun = options.dryRun ?? false;
  const summary = emptySummary(dryRun);

  validateNamingPattern(config.namingPattern);

  const sourceDirs =
    options.sourceDirs && options.sourceDirs.length > 0
      ? options.sourceDirs.map((dir) => resolve(dir))
      : config.sourceDirs;

  const spinner = ora('Discovering audio files...').start();
  const files = await findMusicFiles(sourceDirs, config.supportedFormats, {
    excludeDirs: [config.librarySongsDir],
  });

  if (files.length === 0) {
    spinner.warn('No music files found in source directories.');
    console.log(chalk.gray(`  Source directories: ${sourceDirs.join(', ')}`));
    console.log(chalk.gray(`  Supported formats: ${config.supportedFormats.join(', ')}`));
    return summary;
  }

  spinner.succeed(`Found ${files.length} music file(s) to organize`);

  if (options.interactive) {
    for (const filePath of files) {
      console.log(chalk.gray(`  - ${filePath}`));
    }

    const proceed = await confirm({
      message: 'Proceed with organization?',
      default: true,
    });

    if (!proceed) {
      return summary;
    }
  }

  const selection =
    options.selection ??
    (options.interactive
      ? new InteractiveSelection(config, { dryRun })
      : new AutoSelection(config));

  const context: OrganizeContext = {
    config,
    reader: options.reader,
    selection,
    dryRun,
    verbose: options.interactive,
  };

  const progressBar = options.interactive
    ? null
    : new cliProgress.SingleBar({
        format: 'Organizing |{bar}| {percentage}% | {value}/{total} files',
        barCompleteChar: '█',
        barIncompleteChar: '░',
      });

  progressBar?.start(files.length, 0);

  for (const filePath of files) {
    const outcome = await organizeFile(filePath, context);
    summary.total++;

    if (outcome.status === 'organized') {
      summary.succeeded++;
      summary.playlistAdditions += outcome.added.length;
    } else {
      summary.failed++;
      summary.failures.push({ path: outcome.source, error: outcome.error });

      if (options.interactive) {
        console.log(chalk.red(`✗ Error organizing ${outcome.source}: ${outcome.error}`));
      }
    }

    progressBar?.update(summary.total);
  }

  progressBar?.stop();

  return summary;
}
