#!/usr/bin/env node
import { resolve } from 'node:path';
import chalk from 'chalk';
import { ConfigError, MetadataLibraryError, errorMessage } from './errors.js';
import { defaultConfigPath, expandPath, loadConfig } from './config.js';
import { loadTagReader } from './metadata.js';
import { organizeAll } from './organizer.js';
import { runSetupWizard } from './setup.js';
import { displayConfig, displayRunSummary } from './summary.js';
import { exportDirectoryPlaylist, prefixPlaylistEntries } from './playlist-tools.js';
import { parseCliArgs, UsageError, USAGE, type CliCommand, type OrganizeCommand } from './cli-args.js';

async function runOrganize(command: OrganizeCommand): Promise<void> {
  const reader = await loadTagReader();
  const { config, created } = await loadConfig(command.configFile ?? defaultConfigPath());

  if (created) {
    console.log(chalk.gray(`Created default configuration at ${config.configFile}`));
  } else {
    console.log(chalk.gray(`Loaded configuration from ${config.configFile}`));
  }

  if (command.gui) {
    console.log(chalk.yellow('No graphical front end is available. Using CLI mode.'));
  }

  console.log(chalk.cyan('\n🎵 Music Organizer\n'));

  const summary = await organizeAll(config, {
    reader,
    interactive: !command.auto,
    sourceDirs: command.sources.map(expandPath),
    dryRun: command.dryRun,
  });

  displayRunSummary(summary);
}

async function run(command: CliCommand): Promise<void> {
  switch (command.command) {
    case 'help':
      console.log(USAGE);
      return;

    case 'show-config': {
      const { config } = await loadConfig(command.configFile ?? defaultConfigPath());
      displayConfig(config);
      return;
    }

    case 'setup': {
      const configFile = command.configFile ?? defaultConfigPath();
      const { document } = await loadConfig(configFile);
      await runSetupWizard(configFile, document);
      return;
    }

    case 'export-playlist': {
      const dir = resolve(expandPath(command.dir));
      const count = await exportDirectoryPlaylist(dir, command.extension, command.output);
      console.log(chalk.green(`✓ Wrote ${count} entries to ${command.output} in ${dir}`));
      return;
    }

    case 'prefix-playlists': {
      const updated = await prefixPlaylistEntries(resolve(expandPath(command.dir)), command.prefix);
      console.log(chalk.green(`✓ Updated ${updated.length} playlist(s)`));
      return;
    }

    case 'organize':
      await runOrganize(command);
      return;
  }
}

async function main(): Promise<number> {
  let command: CliCommand;

  try {
    command = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(chalk.red(`Error: ${error.message}`));
      console.log(USAGE);
      return 1;
    }

    throw error;
  }

  try {
    await run(command);
    return 0;
  } catch (error) {
    if (error instanceof ConfigError || error instanceof MetadataLibraryError) {
      console.error(chalk.red(`Error: ${error.message}`));
      return 1;
    }

    throw error;
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error(chalk.red(`An unexpected error occurred: ${errorMessage(error)}`));
    process.exitCode = 1;
  });
