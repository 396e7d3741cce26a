/**
 * PCB Toolbench - Main Entry Point
 *
 * Local front end for the BOM transform and KiCad export scripts.
 */

import 'dotenv/config';

import { getConfig } from './config.js';
import { log } from './utils/logger.js';
import { createToolbenchContext } from './context.js';
import { createToolbenchServer } from './app.js';

const SHUTDOWN_TIMEOUT_MS = 10000;

async function startServer(): Promise<void> {
  const config = getConfig();
  const ctx = createToolbenchContext(config);
  const { httpServer, io, wsManager } = createToolbenchServer(ctx);

  await new Promise<void>((resolve, reject) => {
    httpServer.once('error', reject);
    httpServer.listen(config.port, config.host, () => {
      httpServer.off('error', reject);
      resolve();
    });
  });

  log.info('PCB Toolbench started', {
    url: `http://${config.host}:${config.port}`,
    nodeEnv: config.nodeEnv,
    version: config.version,
    python: config.python.path,
    scriptsDir: config.scripts.dir,
    kicadCli: ctx.kicadPanel.defaultCliPath() || undefined,
  });

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    log.info(`Received ${signal}, shutting down gracefully...`);

    wsManager.close();
    io.close();

    httpServer.close(() => {
      log.info('HTTP server closed');
      process.exit(0);
    });

    // Force exit after timeout
    setTimeout(() => {
      log.error('Forced shutdown after timeout');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

startServer().catch((error: unknown) => {
  log.error('Failed to start server', error instanceof Error ? error : new Error(String(error)));
  process.exit(1);
});
