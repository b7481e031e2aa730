import { extname } from 'node:path';
import type { TrackMetadata } from './types.js';
import { NamingPatternError } from './errors.js';

export const DEFAULT_NAMING_PATTERN = '{artist} - {title}';

const PLACEHOLDERS = ['artist', 'title', 'album', 'genre', 'track'] as const;

type Placeholder = (typeof PLACEHOLDERS)[number];

const PLACEHOLDER_PATTERN = /\{([^{}]*)\}/g;
const ILLEGAL_CHARACTERS = /[<>:"\/\\|?*]/g;
const PATH_BREAKING_CHARACTERS = /[\/\\\r\n]/g;

function isPlaceholder(name: string): name is Placeholder {
  return PLACEHOLDERS.some((placeholder) => placeholder === name);
}

export function cleanFilenameComponent(value: string): string {
  const cleaned = value
    .replace(ILLEGAL_CHARACTERS, '')
    .replace(/[\r\n]/g, ' ')
    .trim();

  return cleaned === '' ? 'Unknown' : cleaned;
}

/**
 * Genre and track number keep their punctuation, but never a path separator
 * or line break: the result must stay one file in the library directory and
 * one line in a playlist.
 */
export function stripPathSeparators(value: string): string {
  return value.replace(PATH_BREAKING_CHARACTERS, '');
}

export function validateNamingPattern(pattern: string): void {
  for (const match of pattern.matchAll(PLACEHOLDER_PATTERN)) {
    const name = match[1] ?? '';

    if (!isPlaceholder(name)) {
      throw new NamingPatternError(name, pattern);
    }
  }
}

export function synthesizeFilename(metadata: TrackMetadata, pattern: string): string {
  validateNamingPattern(pattern);

  const values: Record<Placeholder, string> = {
    artist: cleanFilenameComponent(metadata.artist),
    title: cleanFilenameComponent(metadata.title),
    album: cleanFilenameComponent(metadata.album),
    genre: stripPathSeparators(metadata.genre),
    track: stripPathSeparators(metadata.trackNumber),
  };

  return pattern.replace(PLACEHOLDER_PATTERN, (_match, name: string) =>
    isPlaceholder(name) ? values[name] : ''
  );
}

export function buildLibraryFilename(metadata: TrackMetadata, pattern: string): string {
  return `${synthesizeFilename(metadata, pattern)}${extname(metadata.sourcePath)}`;
}
