import { readdir } from 'node:fs/promises';
import { join, extname, isAbsolute, relative, resolve, sep } from 'node:path';
import type { Dirent } from 'node:fs';
import chalk from 'chalk';
import { errorMessage } from './errors.js';
import { pathExists } from './resolver.js';

export interface ScanOptions {
  excludeDirs?: string[];
}

export function normalizeExtension(extension: string): string {
  const lower = extension.trim().toLowerCase();
  return lower.startsWith('.') ? lower : `.${lower}`;
}

function isWithin(dir: string, parent: string): boolean {
  const path = relative(parent, dir);
  return path === '' || (path !== '..' && !path.startsWith(`..${sep}`) && !isAbsolute(path));
}

async function walkDirectory(
  dir: string,
  extensions: Set<string>,
  excluded: Set<string>
): Promise<string[]> {
  let entries: Dirent[];

  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (error) {
    console.log(chalk.yellow(`Warning: Could not read ${dir}: ${errorMessage(error)}`));
    return [];
  }

  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  const musicFiles: string[] = [];

  for (const entry of entries) {
    const fullPath = join(dir, entry.name);

    if (entry.isDirectory()) {
      if (excluded.has(fullPath)) {
        continue;
      }

      const nestedFiles = await walkDirectory(fullPath, extensions, excluded);
      musicFiles.push(...nestedFiles);
      continue;
    }

    if (!entry.isFile()) {
      continue;
    }

    if (extensions.has(extname(entry.name).toLowerCase())) {
      musicFiles.push(fullPath);
    }
  }

  return musicFiles;
}

/**
 * Recursively collects files whose extension (case-insensitive) is in
 * `formats`. Missing source directories, and sources that are or sit inside
 * an excluded directory, are reported and skipped.
 */
export async function findMusicFiles(
  sourceDirs: string[],
  formats: string[],
  options: ScanOptions = {}
): Promise<string[]> {
  const extensions = new Set(formats.map(normalizeExtension));
  const excluded = new Set((options.excludeDirs ?? []).map((dir) => resolve(dir)));
  const seen = new Set<string>();
  const musicFiles: string[] = [];

  for (const sourceDir of sourceDirs) {
    const root = resolve(sourceDir);

    if (!(await pathExists(root))) {
      console.log(chalk.yellow(`Warning: Source directory ${root} does not exist`));
      continue;
    }

    if ([...excluded].some((dir) => isWithin(root, dir))) {
      console.log(chalk.yellow(`Warning: Skipping ${root}, it is inside an excluded directory`));
      continue;
    }

    for (const filePath of await walkDirectory(root, extensions, excluded)) {
      if (seen.has(filePath)) {
        continue;
      }

      seen.add(filePath);
      musicFiles.push(filePath);
    }
  }

  return musicFiles;
}
