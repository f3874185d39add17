/**
 * @fileoverview Print job route registrations (start, pause/resume, cancel).
 *
 * Pause and cancel run through the status engine so its transitional flags
 * stay in step with what the WebSocket clients see.
 */

import type { Request, Response, Router } from 'express';
import { PrintStartRequestSchema } from '../../schemas/web-api.schemas';
import type { StatusResponse } from '../../types/web-api.types';
import { logInfo } from '../../../utils/logging';
import { handleRouteError, parseRequest, resolveLocation, type RouteDependencies } from './route-helpers';

type JobControlExecutor = (deps: RouteDependencies) => Promise<void>;

interface JobControlRoute {
  readonly path: string;
  readonly executor: JobControlExecutor;
  readonly successMessage: string;
}

const JOB_CONTROL_ROUTES: readonly JobControlRoute[] = [
  {
    path: '/print/pause-resume',
    executor: (deps) => deps.statusProvider.pauseOrResume(),
    successMessage: 'Pause/resume requested',
  },
  {
    path: '/print/cancel',
    executor: (deps) => deps.statusProvider.cancel(),
    successMessage: 'Cancel requested',
  },
];

export function registerPrintControlRoutes(router: Router, deps: RouteDependencies): void {
  JOB_CONTROL_ROUTES.forEach((route) => {
    router.post(route.path, async (_req: Request, res: Response) => {
      try {
        await route.executor(deps);
        const response: StatusResponse = {
          success: true,
          message: route.successMessage,
          status: deps.statusProvider.getSnapshot(),
        };
        res.json(response);
      } catch (error) {
        handleRouteError(res, error, route.path);
      }
    });
  });

  router.post('/print/start', async (req: Request, res: Response) => {
    const body = parseRequest(PrintStartRequestSchema, req.body, res);
    if (!body) {
      return;
    }

    try {
      const location = await resolveLocation(deps, body.location);
      await deps.backend.startPrint(location, body.filePath);
      logInfo('WebUI', `Started ${body.filePath} from ${location}`);

      const cached = await deps.thumbnails.getThumbnail(location, '', body.filePath, { path: body.filePath }, 'Large');
      deps.statusProvider.resetStatus(cached.placeholder ? undefined : cached.bytes);

      const response: StatusResponse = {
        success: true,
        message: `Starting ${body.filePath}`,
        status: deps.statusProvider.getSnapshot(),
      };
      res.json(response);
    } catch (error) {
      handleRouteError(res, error, 'Print start');
    }
  });
}
