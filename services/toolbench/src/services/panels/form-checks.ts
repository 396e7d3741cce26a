/**
 * Filesystem checks shared by the panel forms.
 */

import { mkdirSync, statSync } from 'fs';
import path from 'path';

/** Name of the directory created beside an input when no output is chosen */
export const DEFAULT_OUTPUT_DIRNAME = 'outputs';

export function isExistingFile(filePath: string): boolean {
  try {
    return statSync(filePath).isFile();
  } catch {
    return false;
  }
}

export function isExistingDirectory(dirPath: string): boolean {
  try {
    return statSync(dirPath).isDirectory();
  } catch {
    return false;
  }
}

/**
 * `<directory of file>/outputs`, absolute.
 */
export function defaultOutputDir(filePath: string): string {
  return path.join(path.dirname(path.resolve(filePath)), DEFAULT_OUTPUT_DIRNAME);
}

/**
 * Create a directory (and parents) if it does not exist yet.
 * Returns an error message instead of throwing.
 */
export function ensureDirectory(dirPath: string): string | null {
  try {
    mkdirSync(dirPath, { recursive: true });
    return null;
  } catch (error) {
    return `Could not create ${dirPath}: ${error instanceof Error ? error.message : String(error)}`;
  }
}
