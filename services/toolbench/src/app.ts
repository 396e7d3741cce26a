/**
 * PCB Toolbench - HTTP and Socket.IO wiring
 */

import express, { type Express, type Request, type Response, type NextFunction } from 'express';
import cors, { type CorsOptions } from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import { Server as SocketIOServer } from 'socket.io';
import { createServer, type Server as HttpServer } from 'http';
import { existsSync } from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';

import type { ToolbenchContext } from './context.js';
import { createApiRoutes } from './api/routes.js';
import { RunWebSocketManager } from './api/run-ws-manager.js';
import { log } from './utils/logger.js';
import { OriginNotAllowedError, ValidationError, handleError } from './utils/errors.js';

export interface ToolbenchServer {
  app: Express;
  httpServer: HttpServer;
  io: SocketIOServer;
  wsManager: RunWebSocketManager;
}

function requestIdOf(req: Request): string {
  const header = req.headers['x-request-id'];
  return typeof header === 'string' && header ? header : uuidv4();
}

export function createToolbenchServer(ctx: ToolbenchContext): ToolbenchServer {
  const { config } = ctx;
  const app: Express = express();
  const httpServer = createServer(app);
  // Requests without an Origin header (same-origin GETs, command-line clients) pass
  const allowedOrigins: ReadonlySet<string> = new Set(config.ui.allowedOrigins);

  const corsOptions: CorsOptions = {
    origin: (origin, callback) => {
      if (origin === undefined || allowedOrigins.has(origin)) {
        callback(null, true);
        return;
      }
      callback(new OriginNotAllowedError(origin, { operation: 'cors' }));
    },
  };

  // Socket.IO for run output
  const io = new SocketIOServer(httpServer, {
    cors: {
      origin: config.ui.allowedOrigins,
      methods: ['GET', 'POST'],
    },
    allowRequest: (req, callback) => {
      const origin = req.headers.origin;
      const allowed = origin === undefined || allowedOrigins.has(origin);
      if (!allowed) {
        log.warn('Socket connection refused', { origin });
      }
      callback(null, allowed);
    },
    path: '/ws',
  });

  // Middleware
  app.use(helmet({
    contentSecurityPolicy: false,
  }));
  app.use(cors(corsOptions));
  app.use(compression());
  app.use(express.json({ limit: '1mb' }));

  // Request logging middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const startTime = Date.now();
    const requestId = requestIdOf(req);

    res.setHeader('X-Request-ID', requestId);

    res.on('finish', () => {
      const duration = Date.now() - startTime;
      log.info(`${req.method} ${req.path}`, {
        requestId,
        method: req.method,
        path: req.path,
        statusCode: res.statusCode,
        duration,
      });
    });

    next();
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      service: 'pcb-toolbench',
      version: config.version,
      timestamp: new Date().toISOString(),
    });
  });

  // API routes
  app.use('/api/v1', createApiRoutes(ctx));

  // Built front end
  const indexHtml = path.join(config.ui.distDir, 'index.html');
  if (existsSync(indexHtml)) {
    app.use(express.static(config.ui.distDir));
    app.get('*', (req: Request, res: Response, next: NextFunction) => {
      if (req.path.startsWith('/api/') || req.path.startsWith('/ws')) {
        next();
        return;
      }
      res.sendFile(indexHtml);
    });
  } else {
    log.warn('Front end not built; serving the API only', { distDir: config.ui.distDir });
  }

  const wsManager = new RunWebSocketManager(io, ctx.controller, ctx.channel);

  // Global error handler
  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    const error = handleError(err);
    const requestId = String(res.getHeader('X-Request-ID') ?? '');

    if (error.statusCode >= 500) {
      log.error('Request failed', err, {
        requestId,
        method: req.method,
        path: req.path,
        code: error.code,
      });
    } else {
      log.warn('Request rejected', {
        requestId,
        method: req.method,
        path: req.path,
        code: error.code,
        error: error.message,
      });
    }

    res.status(error.statusCode).json({
      success: false,
      error: {
        code: error.code,
        message: error.message,
        ...(error instanceof ValidationError && { fieldErrors: error.fieldErrors }),
        ...(config.nodeEnv === 'development' && {
          context: error.context,
          stack: error.stack,
        }),
      },
      metadata: {
        requestId,
        timestamp: new Date().toISOString(),
      },
    });
  });

  // 404 handler
  app.use((_req: Request, res: Response) => {
    res.status(404).json({
      success: false,
      error: {
        code: 'NOT_FOUND',
        message: 'Endpoint not found',
      },
    });
  });

  return { app, httpServer, io, wsManager };
}
