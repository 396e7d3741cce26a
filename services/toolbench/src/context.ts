/**
 * Application Context
 *
 * The services one server instance works with, built once at startup and
 * handed to the routes and the WebSocket manager.
 */

import type { Config } from './config.js';
import { resolveScriptPath } from './config.js';
import { log } from './utils/logger.js';
import {
  locateKicadCli,
  nodeLocatorHost,
  probeCliVersion,
  type CliLocation,
  type LocatorHost,
} from './services/cli-locator/index.js';
import { SpawnProcessRunner, type ProcessRunner } from './services/process-runner/index.js';
import { BackgroundTaskController, RunChannel } from './services/tasks/index.js';
import { BomPanel, KicadPanel } from './services/panels/index.js';

export interface ToolbenchContext {
  config: Config;
  channel: RunChannel;
  controller: BackgroundTaskController;
  bomPanel: BomPanel;
  kicadPanel: KicadPanel;
  /** Where pickers start when no path is given */
  homeDir?: string;
  detectCli(): CliLocation;
  probeCliVersion(cliPath: string): Promise<string | null>;
}

export interface ContextOverrides {
  runner?: ProcessRunner;
  locatorHost?: LocatorHost;
  probeCliVersion?: (cliPath: string) => Promise<string | null>;
  homeDir?: string;
}

export function createToolbenchContext(cfg: Config, overrides: ContextOverrides = {}): ToolbenchContext {
  const channel = new RunChannel();
  const controller = new BackgroundTaskController(overrides.runner ?? new SpawnProcessRunner(), channel, {
    historyLimit: cfg.runs.logHistoryLimit,
  });

  const detectCli = (): CliLocation =>
    locateKicadCli(overrides.locatorHost ?? nodeLocatorHost(), { versions: cfg.kicad.versions });

  let startupLocation: CliLocation;
  if (cfg.kicad.cliPath) {
    startupLocation = { found: true, path: cfg.kicad.cliPath, source: 'configured' };
  } else {
    startupLocation = detectCli();
    if (!startupLocation.found) {
      log.info('kicad-cli not detected at startup; the CLI path field starts blank', {
        probed: startupLocation.searched.length,
      });
    }
  }

  const pythonPath = cfg.python.path;

  return {
    config: cfg,
    channel,
    controller,
    bomPanel: new BomPanel({ pythonPath, scriptPath: resolveScriptPath(cfg, 'bomTransform') }),
    kicadPanel: new KicadPanel({ pythonPath, scriptPath: resolveScriptPath(cfg, 'kicadExport') }, startupLocation),
    homeDir: overrides.homeDir,
    detectCli,
    probeCliVersion: overrides.probeCliVersion ?? ((cliPath) => probeCliVersion(cliPath)),
  };
}
