/**
 * @fileoverview Z axis and manual exposure route registrations.
 */

import type { Request, Response, Router } from 'express';
import type { z } from 'zod';
import { CureRequestSchema, MoveDeltaRequestSchema, MoveRequestSchema } from '../../schemas/web-api.schemas';
import type { ActionResponse, StandardAPIResponse } from '../../types/web-api.types';
import type { ActionResult } from '../../../types/backend-client';
import { handleRouteError, parseRequest, type RouteDependencies } from './route-helpers';

interface MotionRoute<T extends z.ZodTypeAny> {
  readonly path: string;
  readonly schema: T;
  readonly executor: (deps: RouteDependencies, body: z.infer<T>) => Promise<ActionResult>;
  readonly describe: (body: z.infer<T>) => string;
}

function registerMotionRoute<T extends z.ZodTypeAny>(router: Router, deps: RouteDependencies, route: MotionRoute<T>): void {
  router.post(route.path, async (req: Request, res: Response) => {
    const body = parseRequest(route.schema, req.body ?? {}, res);
    if (body === null) {
      return;
    }
    try {
      const result = await route.executor(deps, body);
      const response: ActionResponse = {
        success: true,
        message: route.describe(body),
        result,
      };
      res.json(response);
    } catch (error) {
      handleRouteError(res, error, route.path);
    }
  });
}

export function registerMotionRoutes(router: Router, deps: RouteDependencies): void {
  registerMotionRoute(router, deps, {
    path: '/motion/move',
    schema: MoveRequestSchema,
    executor: (d, body) => d.backend.move(body.height),
    describe: (body) => `Moving to ${body.height} mm`,
  });

  registerMotionRoute(router, deps, {
    path: '/motion/move-delta',
    schema: MoveDeltaRequestSchema,
    executor: (d, body) => d.backend.moveDelta(body.delta),
    describe: (body) => `Moving ${body.delta > 0 ? 'up' : 'down'} ${Math.abs(body.delta)} mm`,
  });

  registerMotionRoute(router, deps, {
    path: '/motion/cure',
    schema: CureRequestSchema,
    executor: (d, body) => d.backend.manualCure(body.cure),
    describe: (body) => (body.cure ? 'Exposure on' : 'Exposure off'),
  });

  router.post('/motion/home', async (_req: Request, res: Response) => {
    try {
      const result = await deps.backend.manualHome();
      const response: ActionResponse = { success: true, message: 'Homing', result };
      res.json(response);
    } catch (error) {
      handleRouteError(res, error, 'Home');
    }
  });

  router.get('/motion/top', async (_req: Request, res: Response) => {
    try {
      const available = await deps.backend.canMoveToTop();
      const response: ActionResponse = { success: true, result: { available } };
      res.json(response);
    } catch (error) {
      handleRouteError(res, error, 'Move-to-top check');
    }
  });

  router.post('/motion/top', async (_req: Request, res: Response) => {
    try {
      if (!(await deps.backend.canMoveToTop())) {
        const response: StandardAPIResponse = { success: false, error: 'Move to top is not supported by this backend' };
        res.status(501).json(response);
        return;
      }
      const result = await deps.backend.moveToTop();
      const response: ActionResponse = { success: true, message: 'Moving to top', result };
      res.json(response);
    } catch (error) {
      handleRouteError(res, error, 'Move to top');
    }
  });
}
