import { describe, expect, it } from 'vitest';
import { parseCliArgs, UsageError } from '../src/cli-args.js';

describe('parseCliArgs', () => {
  it('defaults to interactive organization', () => {
    expect(parseCliArgs([])).toEqual({
      command: 'organize',
      auto: false,
      sources: [],
      dryRun: false,
      gui: false,
    });
  });

  it('collects repeated source directories', () => {
    expect(parseCliArgs(['--auto', '-s', '/a', '--source', '/b', '--dry-run'])).toEqual({
      command: 'organize',
      auto: true,
      sources: ['/a', '/b'],
      dryRun: true,
      gui: false,
    });
  });

  it('gives setup precedence over showing the configuration', () => {
    expect(parseCliArgs(['--config', '--setup', '--config-file', '/tmp/c.json'])).toEqual({
      command: 'setup',
      configFile: '/tmp/c.json',
    });
    expect(parseCliArgs(['--config'])).toEqual({ command: 'show-config' });
  });

  it('parses the playlist tool subcommands', () => {
    expect(parseCliArgs(['export-playlist', '/music', '--ext', 'mp3', '--output', 'all.m3u'])).toEqual({
      command: 'export-playlist',
      dir: '/music',
      extension: 'mp3',
      output: 'all.m3u',
    });
    expect(parseCliArgs(['export-playlist', '/music'])).toEqual({
      command: 'export-playlist',
      dir: '/music',
      extension: '.flac',
      output: 'music_playlist.m3u',
    });
    expect(parseCliArgs(['prefix-playlists', '/music/Playlists', 'All Songs'])).toEqual({
      command: 'prefix-playlists',
      dir: '/music/Playlists',
      prefix: 'All Songs',
    });
  });

  it('rejects unknown arguments and missing values', () => {
    expect(() => parseCliArgs(['--verbose'])).toThrow(new UsageError('Unknown argument: --verbose'));
    expect(() => parseCliArgs(['--source'])).toThrow('--source requires a value');
    expect(() => parseCliArgs(['-s', '--auto'])).toThrow('-s requires a value');
    expect(() => parseCliArgs(['prefix-playlists', '/only-dir'])).toThrow(UsageError);
  });

  it('returns help for -h', () => {
    expect(parseCliArgs(['--auto', '-h'])).toEqual({ command: 'help' });
  });
});
