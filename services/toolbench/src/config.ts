/**
 * PCB Toolbench - Configuration
 *
 * Centralized configuration management with environment variable support
 */

import path from 'path';
import { z } from 'zod';

const ConfigSchema = z.object({
  // Server Configuration
  port: z.number().int().min(0).max(65535).default(8765),
  host: z.string().default('127.0.0.1'),
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  version: z.string().default('1.0.0'),

  // Collaborator scripts
  python: z.object({
    path: z.string().min(1),
  }),
  scripts: z.object({
    dir: z.string(),
    bomTransform: z.string().default('bom_transform.py'),
    kicadExport: z.string().default('kicad_export.py'),
  }),

  // KiCad Configuration
  kicad: z.object({
    cliPath: z.string().optional(),
    versions: z.array(z.string().min(1)).min(1).default(['9.0']),
  }),

  // Run log retention
  runs: z.object({
    logHistoryLimit: z.number().int().positive().default(5000),
  }),

  // Front end
  ui: z.object({
    distDir: z.string(),
    /** Browser origins allowed to call the API and open the run socket */
    allowedOrigins: z.array(z.string().min(1)).min(1),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

function splitList(value: string | undefined): string[] | undefined {
  if (!value) return undefined;
  const items = value.split(',').map((item) => item.trim()).filter(Boolean);
  return items.length > 0 ? items : undefined;
}

/** Vite dev server, which proxies /api and /ws to this service */
export const DEV_UI_ORIGINS = ['http://localhost:5173', 'http://127.0.0.1:5173'];

function serverOrigins(host: string, port: number): string[] {
  return [`http://${host}:${port}`, `http://127.0.0.1:${port}`, `http://localhost:${port}`];
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
  platform: NodeJS.Platform = process.platform
): Config {
  const port = parseInt(env.PORT || '8765', 10);
  const host = env.HOST || '127.0.0.1';

  const rawConfig = {
    port,
    host,
    nodeEnv: env.NODE_ENV || 'development',
    logLevel: env.LOG_LEVEL || 'info',
    version: env.TOOLBENCH_VERSION || '1.0.0',

    python: {
      path: env.PYTHON_PATH || (platform === 'win32' ? 'python' : 'python3'),
    },

    scripts: {
      dir: path.resolve(cwd, env.SCRIPTS_DIR || 'scripts'),
      bomTransform: env.BOM_SCRIPT || 'bom_transform.py',
      kicadExport: env.KICAD_EXPORT_SCRIPT || 'kicad_export.py',
    },

    kicad: {
      cliPath: env.KICAD_CLI_PATH || undefined,
      versions: splitList(env.KICAD_VERSIONS) || ['9.0'],
    },

    runs: {
      logHistoryLimit: parseInt(env.RUN_LOG_HISTORY_LIMIT || '5000', 10),
    },

    ui: {
      distDir: path.resolve(cwd, env.UI_DIST_DIR || path.join('ui', 'dist')),
      allowedOrigins: [
        ...new Set([...serverOrigins(host, port), ...(splitList(env.ALLOWED_ORIGINS) || DEV_UI_ORIGINS)]),
      ],
    },
  };

  return ConfigSchema.parse(rawConfig);
}

/**
 * Absolute path of a collaborator script. Absolute settings are used as-is.
 */
export function resolveScriptPath(cfg: Config, script: 'bomTransform' | 'kicadExport'): string {
  const configured = cfg.scripts[script];
  return path.isAbsolute(configured) ? configured : path.join(cfg.scripts.dir, configured);
}

export const config = loadConfig();

export function getConfig(): Config {
  return config;
}
