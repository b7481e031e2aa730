export interface TrackMetadata {
  title: string;
  artist: string;
  album: string;
  genre: string;
  tempo: number;
  date: string;
  trackNumber: string;
  sourcePath: string;
}

export type GenreRuleValue = string | string[];

export interface RuleSpec {
  min_tempo?: number;
  max_tempo?: number;
  genre?: GenreRuleValue;
  [key: string]: unknown;
}

export type RuleSetSpec = Record<string, RuleSpec>;

/**
 * Persisted configuration document, as stored in config.json.
 */
export interface ConfigDocument {
  music_root: string;
  all_songs_dir: string;
  playlists_dir: string;
  source_dirs: string[];
  supported_formats: string[];
  smart_playlists: RuleSetSpec;
  file_naming: string;
  auto_import: boolean;
  backup_playlists: boolean;
  unknown_tempo_matches_max: boolean;
}

export type RulePredicate =
  | { kind: 'tempo-min'; min: number }
  | { kind: 'tempo-max'; max: number }
  | { kind: 'genre-any'; terms: string[] };

export interface SmartPlaylist {
  name: string;
  predicates: RulePredicate[];
}

export interface MatchOptions {
  unknownTempoMatchesMax: boolean;
}

/**
 * Configuration with paths expanded and rules parsed. Passed explicitly to
 * every component that needs it.
 */
export interface OrganizerConfig {
  configFile: string;
  musicRoot: string;
  librarySongsDir: string;
  playlistsDir: string;
  sourceDirs: string[];
  supportedFormats: string[];
  smartPlaylists: SmartPlaylist[];
  namingPattern: string;
  matchOptions: MatchOptions;
}

export type MoveResult =
  | { success: true; source: string; destination: string; method: 'rename' | 'copy' }
  | { success: false; source: string; destination: string; error: string };

export type MembershipResult = 'added' | 'already_present';

export type SelectionSource = 'manual' | 'auto' | 'none';

export interface PlaylistSelection {
  source: SelectionSource;
  playlists: string[];
}

export type FileOutcome =
  | {
      status: 'organized';
      source: string;
      destination: string;
      metadata: TrackMetadata;
      selection: PlaylistSelection;
      added: string[];
      alreadyPresent: string[];
    }
  | {
      status: 'failed';
      source: string;
      destination: string | null;
      error: string;
    };

export interface RunFailure {
  path: string;
  error: string;
}

export interface RunSummary {
  total: number;
  succeeded: number;
  failed: number;
  failures: RunFailure[];
  playlistAdditions: number;
  dryRun: boolean;
}
