/**
 * Path Browser
 *
 * Directory listings for the file and directory pickers. The browser cannot
 * hand us absolute local paths, so pickers walk the server's filesystem.
 */

import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { NotFoundError } from '../../utils/errors.js';
import { log, type Logger } from '../../utils/logger.js';

export interface PathEntry {
  name: string;
  path: string;
  type: 'file' | 'directory';
}

export interface DirectoryListing {
  path: string;
  /** null at a filesystem root */
  parent: string | null;
  entries: PathEntry[];
}

export interface ListOptions {
  /** Lower-case extensions including the dot, e.g. ['.csv']. Empty keeps every file. */
  extensions?: string[];
  directoriesOnly?: boolean;
  homeDir?: string;
}

const browserLogger: Logger = log.child({ service: 'path-browser' });

function byName(a: PathEntry, b: PathEntry): number {
  return a.name.localeCompare(b.name, undefined, { sensitivity: 'base' });
}

export function normalizeExtensions(raw: string | string[] | undefined): string[] {
  const items = Array.isArray(raw) ? raw : (raw ?? '').split(',');
  return items
    .map((ext) => ext.trim().toLowerCase())
    .filter(Boolean)
    .map((ext) => (ext.startsWith('.') ? ext : `.${ext}`));
}

/**
 * List one directory: sub-directories first, then matching files, each sorted
 * by name. Hidden entries are left out.
 */
export async function listDirectory(dir: string, options: ListOptions = {}): Promise<DirectoryListing> {
  const target = path.resolve(dir.trim() || options.homeDir || os.homedir());
  const extensions = options.extensions ?? [];

  let dirents;
  try {
    dirents = await fs.readdir(target, { withFileTypes: true });
  } catch (error) {
    browserLogger.debug('Directory not readable', {
      path: target,
      error: error instanceof Error ? error.message : String(error),
    });
    throw new NotFoundError('Directory', target, { operation: 'listDirectory' });
  }

  const directories: PathEntry[] = [];
  const files: PathEntry[] = [];

  for (const dirent of dirents) {
    if (dirent.name.startsWith('.')) continue;
    const entryPath = path.join(target, dirent.name);

    let isDirectory = dirent.isDirectory();
    let isFile = dirent.isFile();
    if (dirent.isSymbolicLink()) {
      const stats = await fs.stat(entryPath).catch(() => null);
      if (!stats) continue;
      isDirectory = stats.isDirectory();
      isFile = stats.isFile();
    }

    if (isDirectory) {
      directories.push({ name: dirent.name, path: entryPath, type: 'directory' });
    } else if (isFile && !options.directoriesOnly) {
      const ext = path.extname(dirent.name).toLowerCase();
      if (extensions.length === 0 || extensions.includes(ext)) {
        files.push({ name: dirent.name, path: entryPath, type: 'file' });
      }
    }
  }

  const parent = path.dirname(target);
  return {
    path: target,
    parent: parent === target ? null : parent,
    entries: [...directories.sort(byName), ...files.sort(byName)],
  };
}
