/**
 * KiCad CLI Locator
 *
 * Finds the kicad-cli executable: first on the search path, then in the
 * usual per-OS install directories. Absence is a normal outcome.
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import { existsSync, readdirSync, statSync } from 'fs';
import os from 'os';
import path from 'path';
import { log } from '../../utils/logger.js';

const execFileAsync = promisify(execFile);

const locatorLogger = log.child({ service: 'cli-locator' });

/** Command names tried on the search path, in order */
export const KICAD_CLI_COMMANDS = ['kicad-cli', 'kicad.kicad-cli'] as const;

/** Drives scanned for per-user installs on Windows */
const WINDOWS_USER_DRIVES = ['C:', 'D:'];

const VERSION_PROBE_TIMEOUT_MS = 5000;

export type CliLocation =
  | { found: true; path: string; source: 'search-path' | 'install-dir' | 'configured' }
  | { found: false; searched: string[] };

/**
 * Everything the locator needs from the machine it runs on.
 */
export interface LocatorHost {
  platform: NodeJS.Platform;
  env: NodeJS.ProcessEnv;
  homeDir: string;
  isFile(filePath: string): boolean;
  listDirectories(dirPath: string): string[];
}

export interface LocateOptions {
  /** Versioned install directories to probe, e.g. ['9.0'] */
  versions?: string[];
}

export function nodeLocatorHost(): LocatorHost {
  return {
    platform: process.platform,
    env: process.env,
    homeDir: os.homedir(),
    isFile(filePath: string): boolean {
      try {
        return existsSync(filePath) && statSync(filePath).isFile();
      } catch {
        return false;
      }
    },
    listDirectories(dirPath: string): string[] {
      try {
        return readdirSync(dirPath, { withFileTypes: true })
          .filter((entry) => entry.isDirectory())
          .map((entry) => entry.name)
          .sort();
      } catch {
        return [];
      }
    },
  };
}

function pathApi(platform: NodeJS.Platform): path.PlatformPath {
  return platform === 'win32' ? path.win32 : path.posix;
}

function envValue(env: NodeJS.ProcessEnv, name: string, platform: NodeJS.Platform): string | undefined {
  if (env[name] !== undefined) return env[name];
  if (platform !== 'win32') return undefined;
  // Windows environment names are case-insensitive
  const key = Object.keys(env).find((k) => k.toUpperCase() === name.toUpperCase());
  return key ? env[key] : undefined;
}

/**
 * Files a bare command name could resolve to on the search path, in lookup order.
 */
export function searchPathCandidates(command: string, host: LocatorHost): string[] {
  const p = pathApi(host.platform);
  const searchPath = envValue(host.env, 'PATH', host.platform) || '';
  const dirs = searchPath.split(p.delimiter).map((d) => d.trim()).filter(Boolean);

  let extensions = [''];
  if (host.platform === 'win32') {
    const pathExt = envValue(host.env, 'PATHEXT', host.platform) || '.COM;.EXE;.BAT;.CMD';
    extensions = pathExt.split(';').map((e) => e.trim()).filter(Boolean);
  }

  const candidates: string[] = [];
  for (const dir of dirs) {
    for (const ext of extensions) {
      candidates.push(p.join(dir, `${command}${ext}`));
    }
  }
  return candidates;
}

/**
 * Fixed install locations for the host OS, in probe order.
 */
export function installDirCandidates(host: LocatorHost, versions: string[]): string[] {
  const p = pathApi(host.platform);
  const candidates: string[] = [];

  if (host.platform === 'win32') {
    const programFiles = envValue(host.env, 'ProgramFiles', host.platform) || 'C:\\Program Files';
    const localAppData = envValue(host.env, 'LOCALAPPDATA', host.platform);

    for (const version of versions) {
      const tail = ['KiCad', version, 'bin', 'kicad-cli.exe'];
      candidates.push(p.join(programFiles, ...tail));
      if (localAppData) {
        candidates.push(p.join(localAppData, 'Programs', ...tail));
      }
      for (const drive of WINDOWS_USER_DRIVES) {
        const usersDir = `${drive}\\Users`;
        for (const user of host.listDirectories(usersDir)) {
          candidates.push(p.join(usersDir, user, 'AppData', 'Local', 'Programs', ...tail));
        }
      }
    }
    return candidates;
  }

  if (host.platform === 'darwin') {
    const bundleTail = ['KiCad', 'KiCad.app', 'Contents', 'MacOS', 'kicad-cli'];
    candidates.push(p.join('/Applications', ...bundleTail));
    candidates.push(p.join(host.homeDir, 'Applications', ...bundleTail));
    return candidates;
  }

  candidates.push('/usr/bin/kicad-cli', '/usr/local/bin/kicad-cli', '/snap/bin/kicad.kicad-cli');
  return candidates;
}

/**
 * Locate kicad-cli. Never throws.
 */
export function locateKicadCli(
  host: LocatorHost = nodeLocatorHost(),
  options: LocateOptions = {}
): CliLocation {
  const versions = options.versions && options.versions.length > 0 ? options.versions : ['9.0'];
  const searched: string[] = [];

  const probe = (candidate: string): boolean => {
    searched.push(candidate);
    try {
      return host.isFile(candidate);
    } catch (error) {
      locatorLogger.debug('Probe failed', { candidate, error: String(error) });
      return false;
    }
  };

  // 1. Search path
  for (const command of KICAD_CLI_COMMANDS) {
    for (const candidate of searchPathCandidates(command, host)) {
      if (probe(candidate)) {
        locatorLogger.info('Found kicad-cli on search path', { path: candidate });
        return { found: true, path: candidate, source: 'search-path' };
      }
    }
  }

  // 2. Known install directories
  let installCandidates: string[] = [];
  try {
    installCandidates = installDirCandidates(host, versions);
  } catch (error) {
    locatorLogger.debug('Could not enumerate install directories', { error: String(error) });
  }

  for (const candidate of installCandidates) {
    if (probe(candidate)) {
      locatorLogger.info('Found kicad-cli in install directory', { path: candidate });
      return { found: true, path: candidate, source: 'install-dir' };
    }
  }

  locatorLogger.info('kicad-cli not found', { probed: searched.length });
  return { found: false, searched };
}

/**
 * Ask a kicad-cli binary for its version string. Returns null when it cannot
 * be run or answers with a non-zero exit.
 */
export async function probeCliVersion(
  cliPath: string,
  timeoutMs: number = VERSION_PROBE_TIMEOUT_MS
): Promise<string | null> {
  try {
    const { stdout } = await execFileAsync(cliPath, ['version'], {
      timeout: timeoutMs,
      windowsHide: true,
    });
    const version = stdout.trim();
    return version || null;
  } catch (error) {
    locatorLogger.debug('kicad-cli version probe failed', {
      cliPath,
      error: error instanceof Error ? error.message : String(error),
    });
    return null;
  }
}
