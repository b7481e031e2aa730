import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { join } from 'node:path';
import { findMusicFiles, normalizeExtension } from '../src/scanner.js';
import { makeTempDir, removeTempDir, writeFixture } from './helpers/fixtures.js';

describe('findMusicFiles', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeTempDir(root);
  });

  it('walks directories recursively and matches extensions case-insensitively', async () => {
    const downloads = join(root, 'Downloads');
    await writeFixture(join(downloads, 'a.mp3'));
    await writeFixture(join(downloads, 'album', 'b.FLAC'));
    await writeFixture(join(downloads, 'album', 'cover.jpg'));
    await writeFixture(join(downloads, 'notes.txt'));

    const files = await findMusicFiles([downloads], ['.mp3', 'flac']);

    expect(files).toEqual([join(downloads, 'a.mp3'), join(downloads, 'album', 'b.FLAC')]);
  });

  it('warns about missing source directories and keeps going', async () => {
    const desktop = join(root, 'Desktop');
    await writeFixture(join(desktop, 'c.wav'));

    const files = await findMusicFiles([join(root, 'missing'), desktop], ['.wav']);

    expect(files).toEqual([join(desktop, 'c.wav')]);
    expect(console.log).toHaveBeenCalledTimes(1);
  });

  it('skips excluded directories and repeated sources', async () => {
    const music = join(root, 'Music');
    await writeFixture(join(music, 'new.mp3'));
    await writeFixture(join(music, 'All Songs', 'old.mp3'));

    const files = await findMusicFiles([music, music], ['.mp3'], {
      excludeDirs: [join(music, 'All Songs')],
    });

    expect(files).toEqual([join(music, 'new.mp3')]);
  });

  it('skips a source that is an excluded directory or lies inside one', async () => {
    const library = join(root, 'Music', 'All Songs');
    const incoming = join(root, 'incoming');
    await writeFixture(join(library, 'old.mp3'));
    await writeFixture(join(library, 'sub', 'older.mp3'));
    await writeFixture(join(incoming, 'new.mp3'));

    const files = await findMusicFiles([library, join(library, 'sub'), incoming], ['.mp3'], {
      excludeDirs: [library],
    });

    expect(files).toEqual([join(incoming, 'new.mp3')]);
    expect(console.log).toHaveBeenCalledTimes(2);
  });

  it('still scans a source whose name only starts like an excluded one', async () => {
    const library = join(root, 'All Songs');
    await writeFixture(join(root, 'All Songs 2', 'a.mp3'));

    const files = await findMusicFiles([join(root, 'All Songs 2')], ['.mp3'], {
      excludeDirs: [library],
    });

    expect(files).toEqual([join(root, 'All Songs 2', 'a.mp3')]);
  });
});

describe('normalizeExtension', () => {
  it('lower-cases and adds a leading dot', () => {
    expect(normalizeExtension('MP3')).toBe('.mp3');
    expect(normalizeExtension('.Flac')).toBe('.flac');
  });
});
