import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import type { RawTags, TagReader } from '../../src/metadata.js';
import type { OrganizerConfig, TrackMetadata } from '../../src/types.js';
import { createDefaultDocument, resolveConfig } from '../../src/config.js';

export async function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'music-organizer-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export async function writeFixture(path: string, contents = 'not really audio'): Promise<string> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, contents);
  return path;
}

export function makeTrack(overrides: Partial<TrackMetadata> = {}): TrackMetadata {
  return {
    title: 'Song',
    artist: 'Artist',
    album: 'Album',
    genre: 'Unknown',
    tempo: 0,
    date: '',
    trackNumber: '',
    sourcePath: '/music/in/song.mp3',
    ...overrides,
  };
}

/**
 * Tag reader keyed by file basename. Files without an entry read as having no
 * tag container.
 */
export function fakeReader(tagsByName: Record<string, RawTags>): TagReader {
  return {
    async read(filePath: string): Promise<RawTags | null> {
      const name = filePath.split('/').pop() ?? '';
      return tagsByName[name] ?? null;
    },
  };
}

export function makeConfig(root: string, overrides: Partial<OrganizerConfig> = {}): OrganizerConfig {
  const document = createDefaultDocument();
  document.music_root = join(root, 'Music');
  document.source_dirs = [join(root, 'incoming')];

  return {
    ...resolveConfig(document, join(root, 'config.json')),
    ...overrides,
  };
}
