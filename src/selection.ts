import { basename, join } from 'node:path';
import { confirm, input } from '@inquirer/prompts';
import chalk from 'chalk';
import type { OrganizerConfig, PlaylistSelection, TrackMetadata } from './types.js';
import { findMatchingPlaylists } from './rules.js';
import { createPlaylists, listPlaylists } from './playlists.js';

export interface PlaylistSelectionStrategy {
  select(track: TrackMetadata): Promise<PlaylistSelection>;
}

export type SelectionInput =
  | { kind: 'auto' }
  | { kind: 'none' }
  | { kind: 'indices'; indices: number[] }
  | { kind: 'invalid'; reason: string };

function noSelection(): PlaylistSelection {
  return { source: 'none', playlists: [] };
}

/**
 * Parses the answer to the playlist prompt. Indices are 1-based in the input
 * and 0-based in the result. Out-of-range and repeated numbers are dropped;
 * an empty or non-numeric entry makes the whole answer invalid.
 */
export function parseSelectionInput(raw: string, playlistCount: number): SelectionInput {
  const value = raw.trim().toLowerCase();

  if (value === '' || value === 'n' || value === 'none') {
    return { kind: 'none' };
  }

  if (value === 'a' || value === 'auto') {
    return { kind: 'auto' };
  }

  const indices: number[] = [];

  for (const part of value.split(',').map((entry) => entry.trim())) {
    if (part === '') {
      return { kind: 'invalid', reason: 'empty entry in the list' };
    }

    if (!/^[+-]?\d+$/.test(part)) {
      return { kind: 'invalid', reason: `"${part}" is not a playlist number` };
    }

    const index = parseInt(part, 10) - 1;

    if (index < 0 || index >= playlistCount || indices.includes(index)) {
      continue;
    }

    indices.push(index);
  }

  return { kind: 'indices', indices };
}

export class AutoSelection implements PlaylistSelectionStrategy {
  constructor(private readonly config: OrganizerConfig) {}

  async select(track: TrackMetadata): Promise<PlaylistSelection> {
    const names = findMatchingPlaylists(track, this.config.smartPlaylists, this.config.matchOptions);

    return {
      source: 'auto',
      playlists: names.map((name) => join(this.config.playlistsDir, name)),
    };
  }
}

export interface InteractiveSelectionOptions {
  /** Offer the configured playlists without creating their files. */
  dryRun?: boolean;
}

export class InteractiveSelection implements PlaylistSelectionStrategy {
  private readonly auto: AutoSelection;
  private readonly dryRun: boolean;

  constructor(
    private readonly config: OrganizerConfig,
    options: InteractiveSelectionOptions = {}
  ) {
    this.auto = new AutoSelection(config);
    this.dryRun = options.dryRun ?? false;
  }

  private async discoverPlaylists(): Promise<string[]> {
    const playlists = await listPlaylists(this.config.playlistsDir);

    if (playlists.length > 0) {
      return playlists;
    }

    console.log(chalk.yellow(`No playlists found in ${this.config.playlistsDir}.`));

    if (this.config.smartPlaylists.length === 0) {
      return [];
    }

    const create = await confirm({
      message: 'Create the configured smart playlists?',
      default: false,
    });

    if (!create) {
      return [];
    }

    const names = this.config.smartPlaylists.map((playlist) => playlist.name);

    if (this.dryRun) {
      console.log(chalk.gray('  Dry run: playlists would be created, nothing written'));
      return [...names].sort().map((name) => join(this.config.playlistsDir, name));
    }

    const created = await createPlaylists(this.config.playlistsDir, names);

    for (const name of created) {
      console.log(chalk.gray(`  Created: ${name}`));
    }

    return listPlaylists(this.config.playlistsDir);
  }

  async select(track: TrackMetadata): Promise<PlaylistSelection> {
    const playlists = await this.discoverPlaylists();

    if (playlists.length === 0) {
      return noSelection();
    }

    console.log(chalk.cyan(`\n🎵 ${track.artist} - ${track.title}`));
    console.log('Available playlists:');

    playlists.forEach((playlist, index) => {
      console.log(`  ${index + 1}. ${basename(playlist)}`);
    });

    console.log(chalk.gray('  a. Add to all matching smart playlists'));
    console.log(chalk.gray("  n. Don't add to any playlists"));

    const answer = await input({
      message: 'Select playlists (comma-separated numbers, "a" for auto, "n" for none):',
    });

    const parsed = parseSelectionInput(answer, playlists.length);

    switch (parsed.kind) {
      case 'auto':
        return this.auto.select(track);

      case 'none':
        return noSelection();

      case 'invalid':
        console.log(chalk.red(`Invalid input: ${parsed.reason}. Skipping playlist updates.`));
        return noSelection();

      case 'indices':
        return {
          source: 'manual',
          playlists: parsed.indices.map((index) => playlists[index]),
        };
    }
  }
}
