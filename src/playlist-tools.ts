import { readFile, readdir, writeFile } from 'node:fs/promises';
import { join, relative, sep } from 'node:path';
import type { Dirent } from 'node:fs';
import chalk from 'chalk';
import { normalizeExtension } from './scanner.js';
import { isPlaylistFile } from './playlists.js';

export const DEFAULT_EXPORT_NAME = 'music_playlist.m3u';

async function collectFiles(dir: string, extension: string): Promise<string[]> {
  const entries: Dirent[] = await readdir(dir, { withFileTypes: true });
  const files: string[] = [];

  for (const entry of entries) {
    const fullPath = join(dir, entry.name);

    if (entry.isDirectory()) {
      files.push(...(await collectFiles(fullPath, extension)));
    } else if (entry.isFile() && entry.name.toLowerCase().endsWith(extension)) {
      files.push(fullPath);
    }
  }

  return files;
}

/**
 * Writes `<musicDir>/<outputName>` listing every file with the extension
 * below `musicDir`, relative to it. Replaces an existing file of that name.
 */
export async function exportDirectoryPlaylist(
  musicDir: string,
  extension = '.flac',
  outputName = DEFAULT_EXPORT_NAME
): Promise<number> {
  const files = await collectFiles(musicDir, normalizeExtension(extension));
  const lines = files
    .map((file) => relative(musicDir, file).split(sep).join('/'))
    .sort();

  const body = lines.map((line) => `${line}\n`).join('');
  await writeFile(join(musicDir, outputName), body, 'utf-8');

  return lines.length;
}

/**
 * Prepends `prefix/` to every entry of every playlist in `playlistsDir`.
 * Blank lines are dropped.
 */
export async function prefixPlaylistEntries(playlistsDir: string, prefix: string): Promise<string[]> {
  const names = (await readdir(playlistsDir)).filter(isPlaylistFile).sort();
  const normalizedPrefix = prefix.replace(/[\\/]+$/, '');
  const updated: string[] = [];

  for (const name of names) {
    const playlistPath = join(playlistsDir, name);
    const text = await readFile(playlistPath, 'utf-8');

    const body = text
      .split('\n')
      .map((line) => line.trim())
      .filter(Boolean)
      .map((line) => `${normalizedPrefix}/${line}\n`)
      .join('');

    await writeFile(playlistPath, body, 'utf-8');
    console.log(chalk.gray(`Updated: ${playlistPath}`));
    updated.push(playlistPath);
  }

  return updated;
}
