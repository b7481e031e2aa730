import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { join, dirname, resolve } from 'node:path';
import { homedir } from 'node:os';
import type { ConfigDocument, OrganizerConfig } from './types.js';
import { ConfigError, errorCode, errorMessage } from './errors.js';
import { compileRuleSet, readRuleSetSpec } from './rules.js';
import { normalizeExtension } from './scanner.js';
import { DEFAULT_NAMING_PATTERN } from './naming.js';

export const DEFAULT_CONFIG: ConfigDocument = {
  music_root: '~/Music',
  all_songs_dir: 'All Songs',
  playlists_dir: '.',
  source_dirs: ['~/Downloads', '~/Desktop'],
  supported_formats: ['.flac', '.mp3', '.wav', '.m4a', '.aac'],
  smart_playlists: {
    'High Energy.m3u': { min_tempo: 120 },
    'Chill.m3u': { max_tempo: 90 },
    'Rock.m3u': { genre: ['rock', 'alternative', 'indie'] },
    'Jazz.m3u': { genre: ['jazz', 'blues', 'swing'] },
    'Classical.m3u': { genre: ['classical', 'orchestral', 'symphony'] },
    'Electronic.m3u': { genre: ['electronic', 'edm', 'dubstep', 'house', 'techno'] },
    'Hip-Hop.m3u': { genre: ['hip-hop', 'rap', 'trap'] },
  },
  file_naming: DEFAULT_NAMING_PATTERN,
  auto_import: false,
  backup_playlists: true,
  unknown_tempo_matches_max: true,
};

export interface LoadedConfig {
  config: OrganizerConfig;
  document: ConfigDocument;
  created: boolean;
}

export function defaultConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const configHome = env.XDG_CONFIG_HOME || join(homedir(), '.config');
  return join(configHome, 'music-organizer', 'config.json');
}

export function createDefaultDocument(): ConfigDocument {
  return structuredClone(DEFAULT_CONFIG);
}

export function expandPath(path: string): string {
  if (path === '~' || path.startsWith('~/')) {
    return path.replace('~', homedir());
  }

  return path;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(raw: Record<string, unknown>, key: keyof ConfigDocument, fallback: string): string {
  const value = raw[key];

  if (value === undefined) {
    return fallback;
  }

  if (typeof value !== 'string') {
    throw new ConfigError(`${key} must be a string`);
  }

  return value;
}

function readStringList(raw: Record<string, unknown>, key: keyof ConfigDocument, fallback: string[]): string[] {
  const value = raw[key];

  if (value === undefined) {
    return [...fallback];
  }

  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new ConfigError(`${key} must be a list of strings`);
  }

  return value;
}

function readBoolean(raw: Record<string, unknown>, key: keyof ConfigDocument, fallback: boolean): boolean {
  const value = raw[key];

  if (value === undefined) {
    return fallback;
  }

  if (typeof value !== 'boolean') {
    throw new ConfigError(`${key} must be true or false`);
  }

  return value;
}

/**
 * Validates a parsed config.json and fills every missing key from the
 * defaults.
 */
export function normalizeDocument(raw: unknown): ConfigDocument {
  if (!isRecord(raw)) {
    throw new ConfigError('Configuration must be a JSON object');
  }

  const defaults = createDefaultDocument();

  return {
    music_root: readString(raw, 'music_root', defaults.music_root),
    all_songs_dir: readString(raw, 'all_songs_dir', defaults.all_songs_dir),
    playlists_dir: readString(raw, 'playlists_dir', defaults.playlists_dir),
    source_dirs: readStringList(raw, 'source_dirs', defaults.source_dirs),
    supported_formats: readStringList(raw, 'supported_formats', defaults.supported_formats),
    smart_playlists:
      raw.smart_playlists === undefined
        ? defaults.smart_playlists
        : readRuleSetSpec(raw.smart_playlists),
    file_naming: readString(raw, 'file_naming', defaults.file_naming),
    auto_import: readBoolean(raw, 'auto_import', defaults.auto_import),
    backup_playlists: readBoolean(raw, 'backup_playlists', defaults.backup_playlists),
    unknown_tempo_matches_max: readBoolean(
      raw,
      'unknown_tempo_matches_max',
      defaults.unknown_tempo_matches_max
    ),
  };
}

export function resolveConfig(document: ConfigDocument, configFile: string): OrganizerConfig {
  const musicRoot = resolve(expandPath(document.music_root));

  return {
    configFile,
    musicRoot,
    librarySongsDir: resolve(musicRoot, expandPath(document.all_songs_dir)),
    playlistsDir: resolve(musicRoot, expandPath(document.playlists_dir)),
    sourceDirs: document.source_dirs.map((dir) => resolve(expandPath(dir))),
    supportedFormats: [...new Set(document.supported_formats.map(normalizeExtension))],
    smartPlaylists: compileRuleSet(document.smart_playlists),
    namingPattern: document.file_naming,
    matchOptions: {
      unknownTempoMatchesMax: document.unknown_tempo_matches_max,
    },
  };
}

export async function saveConfig(configFile: string, document: ConfigDocument): Promise<void> {
  await mkdir(dirname(configFile), { recursive: true });
  await writeFile(configFile, JSON.stringify(document, null, 2) + '\n');
}

export async function loadConfig(configFile: string = defaultConfigPath()): Promise<LoadedConfig> {
  let data: string;

  try {
    data = await readFile(configFile, 'utf-8');
  } catch (error) {
    if (errorCode(error) !== 'ENOENT') {
      throw new ConfigError(`Could not read config file ${configFile}: ${errorMessage(error)}`);
    }

    const document = createDefaultDocument();
    await saveConfig(configFile, document);

    return { config: resolveConfig(document, configFile), document, created: true };
  }

  let parsed: unknown;

  try {
    parsed = JSON.parse(data);
  } catch (error) {
    throw new ConfigError(`Config file ${configFile} is not valid JSON: ${errorMessage(error)}`);
  }

  let document: ConfigDocument;

  try {
    document = normalizeDocument(parsed);
  } catch (error) {
    throw new ConfigError(`Invalid configuration in ${configFile}: ${errorMessage(error)}`);
  }

  return { config: resolveConfig(document, configFile), document, created: false };
}
