import { input, confirm } from '@inquirer/prompts';
import chalk from 'chalk';
import type { ConfigDocument } from './types.js';
import { errorMessage } from './errors.js';
import { validateNamingPattern } from './naming.js';
import { saveConfig } from './config.js';

function validatePattern(value: string): string | true {
  try {
    validateNamingPattern(value);
    return true;
  } catch (error) {
    return errorMessage(error);
  }
}

async function promptForSourceDirs(existing: string[]): Promise<string[]> {
  const sourceDirs = [...existing];

  console.log(chalk.gray(`\nCurrent source directories: ${sourceDirs.join(', ') || '(none)'}`));
  console.log(chalk.gray('Enter additional source directories, empty to finish.'));

  while (true) {
    const dir = (await input({ message: 'Source directory:' })).trim();

    if (!dir) {
      break;
    }

    if (!sourceDirs.includes(dir)) {
      sourceDirs.push(dir);
    }
  }

  return sourceDirs;
}

export async function runSetupWizard(
  configFile: string,
  current: ConfigDocument
): Promise<ConfigDocument> {
  console.log(chalk.cyan('\n🎵 Music Organizer Setup Wizard'));
  console.log(chalk.gray('═'.repeat(40)));

  const musicRoot = await input({
    message: 'Music root directory:',
    default: current.music_root,
  });

  const allSongsDir = await input({
    message: 'All songs directory (within music root):',
    default: current.all_songs_dir,
  });

  const playlistsDir = await input({
    message: 'Playlists directory (within music root):',
    default: current.playlists_dir,
  });

  const fileNaming = await input({
    message: 'File naming pattern ({artist}, {title}, {album}, {genre}, {track}):',
    default: current.file_naming,
    validate: validatePattern,
  });

  const sourceDirs = await promptForSourceDirs(current.source_dirs);

  const unknownTempoMatchesMax = await confirm({
    message: 'Let tracks without a BPM tag match max_tempo playlists?',
    default: current.unknown_tempo_matches_max,
  });

  const updated: ConfigDocument = {
    ...current,
    music_root: musicRoot.trim() || current.music_root,
    all_songs_dir: allSongsDir.trim() || current.all_songs_dir,
    playlists_dir: playlistsDir.trim() || current.playlists_dir,
    file_naming: fileNaming,
    source_dirs: sourceDirs,
    unknown_tempo_matches_max: unknownTempoMatchesMax,
  };

  await saveConfig(configFile, updated);

  console.log(chalk.green('\n✅ Setup complete! Configuration saved.'));
  console.log(chalk.gray(`  ${configFile}`));

  return updated;
}
