/**
 * @fileoverview Express router composition for the HTTP API.
 *
 * Each route module registers one concern against the shared dependencies,
 * which the caller builds once at startup.
 */

import { Router } from 'express';
import type { RouteDependencies } from './routes/route-helpers';
import { registerStatusRoutes } from './routes/status-routes';
import { registerPrintControlRoutes } from './routes/print-control-routes';
import { registerMotionRoutes } from './routes/motion-routes';
import { registerFileRoutes } from './routes/file-routes';
import { registerAnalyticsRoutes } from './routes/analytics-routes';

export function createAPIRoutes(deps: RouteDependencies): Router {
  const router = Router();

  registerStatusRoutes(router, deps);
  registerPrintControlRoutes(router, deps);
  registerMotionRoutes(router, deps);
  registerFileRoutes(router, deps);
  registerAnalyticsRoutes(router, deps);

  return router;
}
