import path from 'path';
import { describe, expect, it } from 'vitest';
import { loadConfig, resolveScriptPath } from './config.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const cfg = loadConfig({}, '/srv/toolbench', 'linux');

    expect(cfg.port).toBe(8765);
    expect(cfg.host).toBe('127.0.0.1');
    expect(cfg.nodeEnv).toBe('development');
    expect(cfg.python.path).toBe('python3');
    expect(cfg.scripts.dir).toBe(path.resolve('/srv/toolbench', 'scripts'));
    expect(cfg.kicad).toEqual({ cliPath: undefined, versions: ['9.0'] });
    expect(cfg.runs.logHistoryLimit).toBe(5000);
    expect(cfg.ui.allowedOrigins).toEqual([
      'http://127.0.0.1:8765',
      'http://localhost:8765',
      'http://localhost:5173',
      'http://127.0.0.1:5173',
    ]);
  });

  it('replaces the dev origins with ALLOWED_ORIGINS', () => {
    const cfg = loadConfig(
      { PORT: '9000', HOST: '0.0.0.0', ALLOWED_ORIGINS: 'http://bench.local:3000' },
      '/srv/toolbench',
      'linux'
    );
    expect(cfg.ui.allowedOrigins).toEqual([
      'http://0.0.0.0:9000',
      'http://127.0.0.1:9000',
      'http://localhost:9000',
      'http://bench.local:3000',
    ]);
  });

  it('uses the plain python launcher name on Windows', () => {
    expect(loadConfig({}, '/srv/toolbench', 'win32').python.path).toBe('python');
  });

  it('reads overrides from the environment', () => {
    const cfg = loadConfig(
      {
        PORT: '9000',
        LOG_LEVEL: 'debug',
        PYTHON_PATH: '/usr/local/bin/python3.12',
        KICAD_CLI_PATH: '/opt/kicad/bin/kicad-cli',
        KICAD_VERSIONS: '9.0, 8.0,,',
        RUN_LOG_HISTORY_LIMIT: '200',
      },
      '/srv/toolbench',
      'linux'
    );

    expect(cfg.port).toBe(9000);
    expect(cfg.logLevel).toBe('debug');
    expect(cfg.python.path).toBe('/usr/local/bin/python3.12');
    expect(cfg.kicad).toEqual({ cliPath: '/opt/kicad/bin/kicad-cli', versions: ['9.0', '8.0'] });
    expect(cfg.runs.logHistoryLimit).toBe(200);
  });

  it('rejects an invalid port', () => {
    expect(() => loadConfig({ PORT: 'eighty' }, '/srv/toolbench', 'linux')).toThrow();
  });
});

describe('resolveScriptPath', () => {
  it('joins relative script names onto the scripts directory', () => {
    const cfg = loadConfig({ SCRIPTS_DIR: '/opt/scripts' }, '/srv/toolbench', 'linux');
    expect(resolveScriptPath(cfg, 'bomTransform')).toBe(path.join('/opt/scripts', 'bom_transform.py'));
  });

  it('keeps absolute script paths', () => {
    const cfg = loadConfig({ KICAD_EXPORT_SCRIPT: '/tools/export.py' }, '/srv/toolbench', 'linux');
    expect(resolveScriptPath(cfg, 'kicadExport')).toBe('/tools/export.py');
  });
});
