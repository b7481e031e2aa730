import chalk from 'chalk';
import type { OrganizerConfig, RunSummary } from './types.js';
import { describeRule } from './rules.js';

export function displayConfig(config: OrganizerConfig): void {
  console.log(chalk.cyan('\n⚙️  Current Configuration'));
  console.log(chalk.gray('─'.repeat(40)));
  console.log(`  Config file: ${config.configFile}`);
  console.log(`  Music root: ${config.musicRoot}`);
  console.log(`  All songs directory: ${config.librarySongsDir}`);
  console.log(`  Playlists directory: ${config.playlistsDir}`);
  console.log(`  Source directories: ${config.sourceDirs.join(', ') || '(none)'}`);
  console.log(`  Supported formats: ${config.supportedFormats.join(', ')}`);
  console.log(`  File naming: ${config.namingPattern}`);
  console.log(
    `  Unknown tempo matches max_tempo rules: ${config.matchOptions.unknownTempoMatchesMax ? 'yes' : 'no'}`
  );

  if (config.smartPlaylists.length === 0) {
    console.log('  Smart playlists: (none)');
    return;
  }

  console.log('  Smart playlists:');

  for (const playlist of config.smartPlaylists) {
    console.log(`    ${playlist.name}: ${chalk.gray(describeRule(playlist))}`);
  }
}

export function displayRunSummary(summary: RunSummary): void {
  if (summary.total === 0) {
    return;
  }

  const heading = summary.dryRun ? '\n🔍 Dry run complete!' : '\n🎉 Organization complete!';

  console.log(chalk.green(`${heading} ${summary.succeeded}/${summary.total} files processed.`));
  console.log(chalk.gray(`  Playlist entries ${summary.dryRun ? 'planned' : 'added'}: ${summary.playlistAdditions}`));

  if (summary.failed === 0) {
    return;
  }

  console.log(chalk.red(`  Failed: ${summary.failed}`));

  for (const failure of summary.failures) {
    console.log(chalk.red(`    - ${failure.path}: ${failure.error}`));
  }
}
