import { appendFile, mkdir, readFile, readdir, writeFile } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';
import type { Dirent } from 'node:fs';
import type { MembershipResult } from './types.js';
import { errorCode } from './errors.js';
import { pathExists } from './resolver.js';

export const PLAYLIST_EXTENSION = '.m3u';

async function readPlaylistText(playlistPath: string): Promise<string> {
  try {
    return await readFile(playlistPath, 'utf-8');
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return '';
    }

    throw error;
  }
}

function parseEntries(text: string): string[] {
  return text
    .split('\n')
    .map((line) => line.trim())
    .filter(Boolean);
}

export async function readPlaylistEntries(playlistPath: string): Promise<string[]> {
  return parseEntries(await readPlaylistText(playlistPath));
}

/**
 * Appends `filePath` to the playlist unless an identical line is already
 * there. Existing lines are never rewritten or reordered.
 */
export async function ensureMembership(
  playlistPath: string,
  filePath: string
): Promise<MembershipResult> {
  const entry = resolve(filePath);
  const text = await readPlaylistText(playlistPath);
  const members = new Set(parseEntries(text));

  if (members.has(entry)) {
    return 'already_present';
  }

  await mkdir(dirname(playlistPath), { recursive: true });

  const separator = text !== '' && !text.endsWith('\n') ? '\n' : '';
  await appendFile(playlistPath, `${separator}${entry}\n`, 'utf-8');

  return 'added';
}

export function isPlaylistFile(name: string): boolean {
  return name.toLowerCase().endsWith(PLAYLIST_EXTENSION);
}

export async function listPlaylists(playlistsDir: string): Promise<string[]> {
  let entries: Dirent[];

  try {
    entries = await readdir(playlistsDir, { withFileTypes: true });
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return [];
    }

    throw error;
  }

  return entries
    .filter((entry) => entry.isFile() && isPlaylistFile(entry.name))
    .map((entry) => entry.name)
    .sort()
    .map((name) => join(playlistsDir, name));
}

export async function createPlaylists(playlistsDir: string, names: string[]): Promise<string[]> {
  await mkdir(playlistsDir, { recursive: true });

  const created: string[] = [];

  for (const name of names) {
    const playlistPath = join(playlistsDir, name);

    if (await pathExists(playlistPath)) {
      continue;
    }

    await writeFile(playlistPath, '', 'utf-8');
    created.push(name);
  }

  return created;
}
