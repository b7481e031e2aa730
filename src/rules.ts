import type {
  GenreRuleValue,
  MatchOptions,
  RulePredicate,
  RuleSetSpec,
  RuleSpec,
  SmartPlaylist,
  TrackMetadata,
} from './types.js';
import { ConfigError } from './errors.js';

export const DEFAULT_MATCH_OPTIONS: MatchOptions = {
  unknownTempoMatchesMax: true,
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readTempoBound(playlist: string, key: string, value: unknown): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ConfigError(`Smart playlist "${playlist}": ${key} must be a number, got ${JSON.stringify(value)}`);
  }

  return value;
}

function readGenre(playlist: string, value: unknown): GenreRuleValue {
  if (typeof value === 'string') {
    return value;
  }

  if (Array.isArray(value)) {
    const terms: string[] = [];

    for (const term of value) {
      if (typeof term !== 'string') {
        throw new ConfigError(`Smart playlist "${playlist}": genre entries must be strings, got ${JSON.stringify(term)}`);
      }

      terms.push(term);
    }

    return terms;
  }

  throw new ConfigError(`Smart playlist "${playlist}": genre must be a string or a list of strings`);
}

/**
 * Validates the recognized keys of one configured rule. Other keys are kept
 * as they are so that saving the configuration does not drop them.
 */
export function readRuleSpec(name: string, raw: unknown): RuleSpec {
  if (!isRecord(raw)) {
    throw new ConfigError(`Smart playlist "${name}" must map to an object of rule keys`);
  }

  const spec: RuleSpec = {};

  for (const [key, value] of Object.entries(raw)) {
    switch (key) {
      case 'min_tempo':
      case 'max_tempo':
        spec[key] = readTempoBound(name, key, value);
        break;

      case 'genre':
        spec.genre = readGenre(name, value);
        break;

      default:
        spec[key] = value;
    }
  }

  return spec;
}

export function readRuleSetSpec(raw: unknown): RuleSetSpec {
  if (!isRecord(raw)) {
    throw new ConfigError('smart_playlists must be an object mapping playlist names to rules');
  }

  const ruleSet: RuleSetSpec = {};

  for (const [name, spec] of Object.entries(raw)) {
    ruleSet[name] = readRuleSpec(name, spec);
  }

  return ruleSet;
}

/**
 * Predicates for the recognized keys of `spec`, in key order. Unknown keys
 * contribute nothing.
 */
export function toPredicates(spec: RuleSpec): RulePredicate[] {
  const predicates: RulePredicate[] = [];

  for (const key of Object.keys(spec)) {
    if (key === 'min_tempo' && spec.min_tempo !== undefined) {
      predicates.push({ kind: 'tempo-min', min: spec.min_tempo });
    } else if (key === 'max_tempo' && spec.max_tempo !== undefined) {
      predicates.push({ kind: 'tempo-max', max: spec.max_tempo });
    } else if (key === 'genre' && spec.genre !== undefined) {
      const terms = Array.isArray(spec.genre) ? spec.genre : [spec.genre];
      predicates.push({ kind: 'genre-any', terms: terms.map((term) => term.toLowerCase()) });
    }
  }

  return predicates;
}

export function compileRuleSet(ruleSet: RuleSetSpec): SmartPlaylist[] {
  return Object.entries(ruleSet).map(([name, spec]) => ({
    name,
    predicates: toPredicates(spec),
  }));
}

export function parseRuleSet(raw: unknown): SmartPlaylist[] {
  return compileRuleSet(readRuleSetSpec(raw));
}

export function matchesPredicate(
  metadata: TrackMetadata,
  predicate: RulePredicate,
  options: MatchOptions = DEFAULT_MATCH_OPTIONS
): boolean {
  switch (predicate.kind) {
    case 'tempo-min':
      return metadata.tempo >= predicate.min;

    case 'tempo-max':
      if (metadata.tempo === 0 && !options.unknownTempoMatchesMax) {
        return false;
      }

      return metadata.tempo <= predicate.max;

    case 'genre-any': {
      const genre = metadata.genre.toLowerCase();
      return predicate.terms.some((term) => genre.includes(term));
    }
  }
}

export function matchesRule(
  metadata: TrackMetadata,
  predicates: RulePredicate[],
  options: MatchOptions = DEFAULT_MATCH_OPTIONS
): boolean {
  return predicates.every((predicate) => matchesPredicate(metadata, predicate, options));
}

export function findMatchingPlaylists(
  metadata: TrackMetadata,
  playlists: SmartPlaylist[],
  options: MatchOptions = DEFAULT_MATCH_OPTIONS
): string[] {
  return playlists
    .filter((playlist) => matchesRule(metadata, playlist.predicates, options))
    .map((playlist) => playlist.name);
}

export function describePredicate(predicate: RulePredicate): string {
  switch (predicate.kind) {
    case 'tempo-min':
      return `tempo >= ${predicate.min}`;

    case 'tempo-max':
      return `tempo <= ${predicate.max}`;

    case 'genre-any':
      return `genre contains ${predicate.terms.join(' | ')}`;
  }
}

export function describeRule(playlist: SmartPlaylist): string {
  if (playlist.predicates.length === 0) {
    return 'every track';
  }

  return playlist.predicates.map(describePredicate).join(' and ');
}
