import { basename, extname } from 'node:path';
import type { TrackMetadata } from './types.js';
import { MetadataLibraryError, errorMessage } from './errors.js';

export const UNKNOWN_ARTIST = 'Unknown Artist';
export const UNKNOWN_ALBUM = 'Unknown Album';
export const UNKNOWN_GENRE = 'Unknown';

/**
 * Subset of tag fields the extractor understands. Shaped after the
 * `common` block of music-metadata so its result can be passed through as is.
 */
export interface RawTags {
  title?: string | string[];
  artist?: string | string[];
  artists?: string[];
  album?: string | string[];
  genre?: string | string[];
  bpm?: number | string | Array<number | string>;
  date?: string | string[];
  year?: number;
  track?: { no?: number | null };
}

export interface TagReader {
  read(filePath: string): Promise<RawTags | null>;
}

type MusicMetadataModule = typeof import('music-metadata');

async function importMusicMetadata(): Promise<MusicMetadataModule> {
  try {
    return await import('music-metadata');
  } catch (error) {
    throw new MetadataLibraryError(
      `The music-metadata library could not be loaded (${errorMessage(error)}). Run "npm install" first.`
    );
  }
}

export async function loadTagReader(): Promise<TagReader> {
  const { parseFile } = await importMusicMetadata();

  return {
    async read(filePath: string): Promise<RawTags | null> {
      const metadata = await parseFile(filePath, { duration: false, skipCovers: true });
      return metadata.common;
    },
  };
}

export function fallbackMetadata(filePath: string): TrackMetadata {
  return {
    title: basename(filePath, extname(filePath)),
    artist: UNKNOWN_ARTIST,
    album: UNKNOWN_ALBUM,
    genre: UNKNOWN_GENRE,
    tempo: 0,
    date: '',
    trackNumber: '',
    sourcePath: filePath,
  };
}

function firstValue(value: string | string[] | undefined): string | null {
  const first = Array.isArray(value) ? value[0] : value;

  if (first === undefined) {
    return null;
  }

  const trimmed = first.trim();
  return trimmed === '' ? null : trimmed;
}

export function parseTempo(value: RawTags['bpm']): number {
  const first = Array.isArray(value) ? value[0] : value;

  if (first === undefined) {
    return 0;
  }

  const parsed = typeof first === 'number' ? first : Number(first.trim());

  if (!Number.isFinite(parsed) || parsed <= 0) {
    return 0;
  }

  return Math.trunc(parsed);
}

export async function extractMetadata(filePath: string, reader: TagReader): Promise<TrackMetadata> {
  const fallback = fallbackMetadata(filePath);
  let tags: RawTags | null;

  try {
    tags = await reader.read(filePath);
  } catch {
    return fallback;
  }

  if (!tags) {
    return fallback;
  }

  const trackNo = tags.track?.no;

  return {
    title: firstValue(tags.title) ?? fallback.title,
    artist: firstValue(tags.artist) ?? firstValue(tags.artists) ?? fallback.artist,
    album: firstValue(tags.album) ?? fallback.album,
    genre: firstValue(tags.genre) ?? fallback.genre,
    tempo: parseTempo(tags.bpm),
    date: firstValue(tags.date) ?? (tags.year ? String(tags.year) : fallback.date),
    trackNumber: typeof trackNo === 'number' ? String(trackNo) : fallback.trackNumber,
    sourcePath: filePath,
  };
}
