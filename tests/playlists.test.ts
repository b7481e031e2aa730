import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import {
  createPlaylists,
  ensureMembership,
  listPlaylists,
  readPlaylistEntries,
} from '../src/playlists.js';
import { makeTempDir, removeTempDir, writeFixture } from './helpers/fixtures.js';

describe('ensureMembership', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  it('creates the playlist and its parent directories on first write', async () => {
    const playlist = join(root, 'Playlists', 'nested', 'Rock.m3u');

    const result = await ensureMembership(playlist, '/music/All Songs/A - B.mp3');

    expect(result).toBe('added');
    expect(await readFile(playlist, 'utf-8')).toBe('/music/All Songs/A - B.mp3\n');
  });

  it('is idempotent for the same path', async () => {
    const playlist = join(root, 'Rock.m3u');

    expect(await ensureMembership(playlist, '/music/a.mp3')).toBe('added');
    const afterFirst = await readFile(playlist, 'utf-8');

    expect(await ensureMembership(playlist, '/music/a.mp3')).toBe('already_present');
    const afterSecond = await readFile(playlist, 'utf-8');

    expect(afterSecond).toBe(afterFirst);
    expect(afterSecond).toBe('/music/a.mp3\n');
  });

  it('appends after existing entries without reordering them', async () => {
    const playlist = await writeFixture(join(root, 'Mix.m3u'), '/music/z.mp3\n/music/b.mp3\n');

    await ensureMembership(playlist, '/music/a.mp3');

    expect(await readFile(playlist, 'utf-8')).toBe('/music/z.mp3\n/music/b.mp3\n/music/a.mp3\n');
  });

  it('compares against trimmed lines', async () => {
    const playlist = await writeFixture(join(root, 'Mix.m3u'), '  /music/a.mp3  \r\n');

    expect(await ensureMembership(playlist, '/music/a.mp3')).toBe('already_present');
  });

  it('starts a new line when the file lacks a trailing newline', async () => {
    const playlist = await writeFixture(join(root, 'Mix.m3u'), '/music/a.mp3');

    await ensureMembership(playlist, '/music/b.mp3');

    expect(await readFile(playlist, 'utf-8')).toBe('/music/a.mp3\n/music/b.mp3\n');
  });
});

describe('readPlaylistEntries', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  it('returns an empty list for a missing playlist', async () => {
    expect(await readPlaylistEntries(join(root, 'missing.m3u'))).toEqual([]);
  });

  it('skips blank lines', async () => {
    const playlist = await writeFixture(join(root, 'a.m3u'), '/x.mp3\n\n  \n/y.mp3\n');

    expect(await readPlaylistEntries(playlist)).toEqual(['/x.mp3', '/y.mp3']);
  });
});

describe('listPlaylists and createPlaylists', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  it('lists only .m3u files, sorted by name', async () => {
    await writeFixture(join(root, 'Rock.m3u'), '');
    await writeFixture(join(root, 'Chill.M3U'), '');
    await writeFixture(join(root, 'notes.txt'), '');
    await writeFixture(join(root, 'All Songs', 'song.mp3'));

    expect(await listPlaylists(root)).toEqual([join(root, 'Chill.M3U'), join(root, 'Rock.m3u')]);
  });

  it('returns nothing for a missing directory', async () => {
    expect(await listPlaylists(join(root, 'nope'))).toEqual([]);
  });

  it('creates only the playlists that do not exist yet', async () => {
    await writeFile(join(root, 'Rock.m3u'), '/keep.mp3\n');

    const created = await createPlaylists(root, ['Rock.m3u', 'Jazz.m3u']);

    expect(created).toEqual(['Jazz.m3u']);
    expect(await readFile(join(root, 'Rock.m3u'), 'utf-8')).toBe('/keep.mp3\n');
    expect(await readFile(join(root, 'Jazz.m3u'), 'utf-8')).toBe('');
  });
});
