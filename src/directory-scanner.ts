/**
 * Walks the update source directory into a flat, hashed inventory
 */

import { join } from 'path';
import glob, { type Entry } from 'fast-glob';
import { hashFile } from './content-hash.js';
import { ReadError } from './errors.js';
import { Logger } from './logger.js';
import { compareLexically } from './match-resolver.js';
import type { InventoryEntry, TopLevelEntry, UpdateInventory } from './types.js';

const logger = new Logger({ context: 'directory-scanner' });

function ignorePatterns(ignoredNames: ReadonlySet<string>): string[] {
  return [...ignoredNames].flatMap(name => {
    const escaped = glob.escapePath(name);
    return [`**/${escaped}`, `**/${escaped}/**`];
  });
}

function isIgnored(relativePath: string, ignoredNames: ReadonlySet<string>): boolean {
  return relativePath.split('/').some(segment => ignoredNames.has(segment));
}

/**
 * Every entry under `root` (root itself excluded). An ignored base name hides
 * the entry and its whole subtree. Any read failure aborts the scan.
 */
export async function scanUpdateDirectory(
  root: string,
  ignoredNames: ReadonlySet<string> = new Set()
): Promise<UpdateInventory> {
  let found: Entry[];
  try {
    found = await glob('**', {
      cwd: root,
      dot: true,
      onlyFiles: false,
      objectMode: true,
      followSymbolicLinks: true,
      suppressErrors: false,
      ignore: ignorePatterns(ignoredNames),
    });
  } catch (error) {
    throw new ReadError(`Unable to read update directory '${root}'`, root, error);
  }

  const sorted = found
    .filter(entry => !isIgnored(entry.path, ignoredNames))
    .sort((a, b) => compareLexically(a.path, b.path));

  const entries = new Map<string, InventoryEntry>();
  const rootDirectoryNames = new Set<string>();
  const rootFileNames = new Set<string>();

  for (const item of sorted) {
    const isDir = item.dirent.isDirectory();
    const entry: InventoryEntry = {
      relativePath: item.path,
      name: item.name,
      isDir,
    };

    if (!isDir) {
      entry.hash = await hashFile(join(root, item.path));
    }

    if (!item.path.includes('/')) {
      (isDir ? rootDirectoryNames : rootFileNames).add(item.name);
    }

    entries.set(item.path, entry);
  }

  logger.debug('Update directory scanned', {
    root,
    entries: entries.size,
    directories: [...rootDirectoryNames],
    files: [...rootFileNames],
  });

  return { entries, rootDirectoryNames, rootFileNames };
}

/**
 * Top-level directories first, then top-level files, each in name order
 */
export function listTopLevelEntries(inventory: UpdateInventory): TopLevelEntry[] {
  return [
    ...[...inventory.rootDirectoryNames].sort(compareLexically).map(name => ({ name, isDir: true })),
    ...[...inventory.rootFileNames].sort(compareLexically).map(name => ({ name, isDir: false })),
  ];
}

/**
 * Files that a top-level entry stands for: itself for a file, every file
 * beneath it for a directory.
 */
export function filesUnder(inventory: UpdateInventory, entry: TopLevelEntry): InventoryEntry[] {
  if (!entry.isDir) {
    const file = inventory.entries.get(entry.name);
    return file && !file.isDir ? [file] : [];
  }

  const prefix = `${entry.name}/`;
  return [...inventory.entries.values()].filter(
    candidate => !candidate.isDir && candidate.relativePath.startsWith(prefix)
  );
}
