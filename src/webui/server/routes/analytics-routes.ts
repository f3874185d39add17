/**
 * @fileoverview Analytics series routes. Backends without analytics answer 501.
 */

import type { Request, Response, Router } from 'express';
import { AnalyticsKeyParamsSchema } from '../../schemas/web-api.schemas';
import type { AnalyticsResponse, AnalyticsSeriesResponse } from '../../types/web-api.types';
import type { AnalyticsPoller } from '../../../services/AnalyticsPoller';
import { parseRequest, sendErrorResponse, type RouteDependencies } from './route-helpers';

function requireAnalytics(deps: RouteDependencies, res: Response): AnalyticsPoller | null {
  if (!deps.analytics) {
    sendErrorResponse(res, 501, `Analytics are not available for the ${deps.backend.name} backend`);
    return null;
  }
  return deps.analytics;
}

export function registerAnalyticsRoutes(router: Router, deps: RouteDependencies): void {
  router.get('/analytics', (_req: Request, res: Response) => {
    const analytics = requireAnalytics(deps, res);
    if (!analytics) {
      return;
    }
    const response: AnalyticsResponse = { success: true, series: analytics.snapshot() };
    res.json(response);
  });

  router.get('/analytics/:key', (req: Request, res: Response) => {
    const params = parseRequest(AnalyticsKeyParamsSchema, req.params, res);
    if (!params) {
      return;
    }
    const analytics = requireAnalytics(deps, res);
    if (!analytics) {
      return;
    }
    const response: AnalyticsSeriesResponse = {
      success: true,
      key: params.key,
      points: analytics.getSeries(params.key),
      latest: analytics.getLatest(params.key),
    };
    res.json(response);
  });
}
