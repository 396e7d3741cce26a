/**
 * Toolbench API Routes
 *
 * Endpoints:
 * - GET  /api/v1/panels                  - Both panel views and the CLI default
 * - POST /api/v1/panels/bom/run          - Submit the BOM form
 * - POST /api/v1/panels/kicad/run        - Submit the KiCad form
 * - POST /api/v1/panels/:panel/log/clear - Clear an idle panel's log
 * - GET  /api/v1/kicad-cli               - Current CLI default
 * - POST /api/v1/kicad-cli/detect        - Re-run CLI detection
 * - GET  /api/v1/fs/list                 - Picker directory listing
 * - GET  /api/v1/paths/default-output    - Suggested output directory for an input
 */

import { Router, type Request, type Response, type NextFunction } from 'express';
import { z } from 'zod';
import type { ToolbenchContext } from '../context.js';
import { isPanelId, type PanelId } from '../types/run.js';
import { NotFoundError, RunInProgressError, ValidationError, type FieldErrors } from '../utils/errors.js';
import { log } from '../utils/logger.js';
import { BomFormSchema, KicadFormSchema, defaultOutputDir } from '../services/panels/index.js';
import { listDirectory, normalizeExtensions } from '../services/path-browser/index.js';
import type { RunDispatch } from '../services/tasks/index.js';

const routeLogger = log.child({ service: 'api' });

/**
 * Validation schemas
 */
const ListQuerySchema = z.object({
  path: z.string().optional().default(''),
  extensions: z.string().optional(),
  directoriesOnly: z.enum(['true', 'false']).optional(),
});

const DefaultOutputQuerySchema = z.object({
  for: z.string().trim().min(1, 'A file path is required'),
});

function fieldErrorsFrom(error: z.ZodError): FieldErrors {
  const fieldErrors: FieldErrors = {};
  for (const issue of error.issues) {
    const field = issue.path.join('.') || 'form';
    if (!(field in fieldErrors)) fieldErrors[field] = issue.message;
  }
  return fieldErrors;
}

function accepted(panel: PanelId, dispatch: RunDispatch, res: Response): void {
  if (!dispatch.accepted) {
    throw new RunInProgressError(panel, { operation: 'run', runId: dispatch.runId });
  }
  res.status(202).json({
    success: true,
    data: { runId: dispatch.runId, request: dispatch.request },
  });
}

export function createApiRoutes(ctx: ToolbenchContext): Router {
  const router = Router();

  const cliInfo = () => ({
    location: ctx.kicadPanel.cliStatus(),
    defaultPath: ctx.kicadPanel.defaultCliPath(),
  });

  /**
   * GET /api/v1/panels
   */
  router.get('/panels', (_req: Request, res: Response) => {
    res.json({
      success: true,
      data: {
        panels: ctx.controller.getViews(),
        kicadCli: cliInfo(),
      },
    });
  });

  /**
   * Submit the BOM form
   * POST /api/v1/panels/bom/run
   */
  router.post('/panels/bom/run', (req: Request, res: Response, next: NextFunction) => {
    try {
      const validation = BomFormSchema.safeParse(req.body ?? {});
      if (!validation.success) {
        throw new ValidationError(
          'Invalid BOM form',
          { operation: 'runBom', errors: validation.error.errors },
          fieldErrorsFrom(validation.error)
        );
      }
      const form = validation.data;

      accepted('bom', ctx.controller.run('bom', () => ctx.bomPanel.buildRequest(form)), res);
    } catch (error) {
      next(error);
    }
  });

  /**
   * Submit the KiCad form
   * POST /api/v1/panels/kicad/run
   */
  router.post('/panels/kicad/run', (req: Request, res: Response, next: NextFunction) => {
    try {
      const validation = KicadFormSchema.safeParse(req.body ?? {});
      if (!validation.success) {
        throw new ValidationError(
          'Invalid KiCad form',
          { operation: 'runKicad', errors: validation.error.errors },
          fieldErrorsFrom(validation.error)
        );
      }
      const form = validation.data;

      accepted('kicad', ctx.controller.run('kicad', () => ctx.kicadPanel.buildRequest(form)), res);
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/v1/panels/:panel/log/clear
   */
  router.post('/panels/:panel/log/clear', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { panel } = req.params;
      if (!isPanelId(panel)) {
        throw new NotFoundError('Panel', panel, { operation: 'clearLog' });
      }
      res.json({ success: true, data: ctx.controller.clearLog(panel) });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/v1/kicad-cli
   */
  router.get('/kicad-cli', (_req: Request, res: Response) => {
    res.json({ success: true, data: cliInfo() });
  });

  /**
   * Re-run detection and make the result the new default
   * POST /api/v1/kicad-cli/detect
   */
  router.post('/kicad-cli/detect', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const location = ctx.detectCli();
      ctx.kicadPanel.setDetectedCliPath(location);
      const version = location.found ? await ctx.probeCliVersion(location.path) : null;

      routeLogger.info('kicad-cli detection requested', {
        found: location.found,
        path: location.found ? location.path : undefined,
        version,
      });

      res.json({ success: true, data: { ...cliInfo(), version } });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/v1/fs/list?path=&extensions=&directoriesOnly=
   */
  router.get('/fs/list', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const validation = ListQuerySchema.safeParse(req.query);
      if (!validation.success) {
        throw new ValidationError(
          'Invalid listing query',
          { operation: 'listDirectory', errors: validation.error.errors },
          fieldErrorsFrom(validation.error)
        );
      }
      const { path: dir, extensions, directoriesOnly } = validation.data;

      const listing = await listDirectory(dir, {
        extensions: normalizeExtensions(extensions),
        directoriesOnly: directoriesOnly === 'true',
        homeDir: ctx.homeDir,
      });
      res.json({ success: true, data: listing });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/v1/paths/default-output?for=<file>
   */
  router.get('/paths/default-output', (req: Request, res: Response, next: NextFunction) => {
    try {
      const validation = DefaultOutputQuerySchema.safeParse(req.query);
      if (!validation.success) {
        throw new ValidationError(
          'A file path is required',
          { operation: 'defaultOutput', errors: validation.error.errors },
          fieldErrorsFrom(validation.error)
        );
      }
      res.json({ success: true, data: { outputDir: defaultOutputDir(validation.data.for) } });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
