import { DEFAULT_EXPORT_NAME } from './playlist-tools.js';

export interface OrganizeCommand {
  command: 'organize';
  auto: boolean;
  sources: string[];
  dryRun: boolean;
  gui: boolean;
  configFile?: string;
}

export type CliCommand =
  | OrganizeCommand
  | { command: 'show-config'; configFile?: string }
  | { command: 'setup'; configFile?: string }
  | { command: 'export-playlist'; dir: string; extension: string; output: string }
  | { command: 'prefix-playlists'; dir: string; prefix: string }
  | { command: 'help' };

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export const USAGE = `
Usage: music-organizer [options]
       music-organizer export-playlist <dir> [--ext .flac] [--output name.m3u]
       music-organizer prefix-playlists <dir> <prefix>

Options:
      --auto              Non-interactive mode (smart playlists only)
  -s, --source <dir>      Custom source directory (can be used multiple times)
      --dry-run           Show what would happen without moving files
      --config            Show current configuration
      --setup             Run the setup wizard
      --config-file <path> Use a different config file
      --gui               Graphical front end (not available, falls back to CLI)
  -h, --help              Show this help

Examples:
  music-organizer                        # Interactive organization
  music-organizer --auto                 # Non-interactive mode
  music-organizer --source ~/Music/New   # Custom source directory
  music-organizer export-playlist ~/Music --ext .flac
  music-organizer prefix-playlists ~/Music/Playlists "All Songs"
`;

function takeValue(args: string[], index: number, flag: string): string {
  const value = args[index + 1];

  if (value === undefined || value.startsWith('-')) {
    throw new UsageError(`${flag} requires a value`);
  }

  return value;
}

function parseExportPlaylist(args: string[]): CliCommand {
  let dir: string | undefined;
  let extension = '.flac';
  let output = DEFAULT_EXPORT_NAME;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--ext':
        extension = takeValue(args, i, arg);
        i++;
        break;

      case '--output':
        output = takeValue(args, i, arg);
        i++;
        break;

      default:
        if (arg.startsWith('-') || dir !== undefined) {
          throw new UsageError(`Unexpected argument for export-playlist: ${arg}`);
        }

        dir = arg;
    }
  }

  if (dir === undefined) {
    throw new UsageError('export-playlist requires a directory');
  }

  return { command: 'export-playlist', dir, extension, output };
}

function parsePrefixPlaylists(args: string[]): CliCommand {
  if (args.length !== 2) {
    throw new UsageError('prefix-playlists requires a playlists directory and a prefix');
  }

  const [dir, prefix] = args;
  return { command: 'prefix-playlists', dir, prefix };
}

export function parseCliArgs(argv: string[]): CliCommand {
  const [first, ...rest] = argv;

  if (first === 'export-playlist') {
    return parseExportPlaylist(rest);
  }

  if (first === 'prefix-playlists') {
    return parsePrefixPlaylists(rest);
  }

  const organize: OrganizeCommand = {
    command: 'organize',
    auto: false,
    sources: [],
    dryRun: false,
    gui: false,
  };

  let showConfig = false;
  let setup = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    switch (arg) {
      case '--auto':
        organize.auto = true;
        break;

      case '--source':
      case '-s':
        organize.sources.push(takeValue(argv, i, arg));
        i++;
        break;

      case '--dry-run':
        organize.dryRun = true;
        break;

      case '--config':
        showConfig = true;
        break;

      case '--config-file':
        organize.configFile = takeValue(argv, i, arg);
        i++;
        break;

      case '--setup':
        setup = true;
        break;

      case '--gui':
        organize.gui = true;
        break;

      case '--help':
      case '-h':
        return { command: 'help' };

      default:
        throw new UsageError(`Unknown argument: ${arg}`);
    }
  }

  if (setup) {
    return { command: 'setup', configFile: organize.configFile };
  }

  if (showConfig) {
    return { command: 'show-config', configFile: organize.configFile };
  }

  return organize;
}
