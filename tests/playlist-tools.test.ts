import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { exportDirectoryPlaylist, prefixPlaylistEntries } from '../src/playlist-tools.js';
import { makeTempDir, removeTempDir, writeFixture } from './helpers/fixtures.js';

describe('exportDirectoryPlaylist', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  it('lists matching files relative to the directory', async () => {
    await writeFixture(join(root, 'Zappa', 'Peaches.flac'));
    await writeFixture(join(root, 'Bach', 'Cello Suite.FLAC'));
    await writeFixture(join(root, 'Bach', 'Cello Suite.mp3'));

    const count = await exportDirectoryPlaylist(root);

    expect(count).toBe(2);
    expect(await readFile(join(root, 'music_playlist.m3u'), 'utf-8')).toBe(
      'Bach/Cello Suite.FLAC\nZappa/Peaches.flac\n'
    );
  });

  it('takes another extension and output name', async () => {
    await writeFixture(join(root, 'one.mp3'));

    const count = await exportDirectoryPlaylist(root, 'mp3', 'mp3s.m3u');

    expect(count).toBe(1);
    expect(await readFile(join(root, 'mp3s.m3u'), 'utf-8')).toBe('one.mp3\n');
  });
});

describe('prefixPlaylistEntries', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeTempDir(root);
  });

  it('prepends the prefix to every entry and drops blank lines', async () => {
    await writeFixture(join(root, 'Rock.m3u'), 'a.flac\n\n  b.flac  \n');
    await writeFixture(join(root, 'readme.txt'), 'leave me');

    const updated = await prefixPlaylistEntries(root, 'All Songs/');

    expect(updated).toEqual([join(root, 'Rock.m3u')]);
    expect(await readFile(join(root, 'Rock.m3u'), 'utf-8')).toBe('All Songs/a.flac\nAll Songs/b.flac\n');
    expect(await readFile(join(root, 'readme.txt'), 'utf-8')).toBe('leave me');
  });
});
