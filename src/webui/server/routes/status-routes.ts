/**
 * @fileoverview Status engine routes: snapshot, refresh, reset and transport control.
 *
 * Every route answers with the engine snapshot after acting on it, so clients
 * that do not hold a WebSocket still see the result of their request.
 */

import type { Request, Response, Router } from 'express';
import { basename } from 'path';
import { StatusResetRequestSchema, StatusRefreshRequestSchema } from '../../schemas/web-api.schemas';
import type { StatusResponse } from '../../types/web-api.types';
import { logWarning } from '../../../utils/logging';
import { toAppError } from '../../../utils/error.utils';
import type { FileLocation } from '../../../types/backend-client';
import { handleRouteError, parseRequest, resolveLocation, sendErrorResponse, type RouteDependencies } from './route-helpers';

function sendSnapshot(res: Response, deps: RouteDependencies, message?: string): void {
  const response: StatusResponse = {
    success: true,
    message,
    status: deps.statusProvider.getSnapshot(),
  };
  res.json(response);
}

/**
 * Real thumbnail bytes for a file the client is about to print, or undefined
 * when only a placeholder is available.
 */
async function cachedThumbnailFor(
  deps: RouteDependencies,
  filePath: string,
  location: FileLocation | undefined
): Promise<Buffer | undefined> {
  try {
    const resolved = await resolveLocation(deps, location);
    const result = await deps.thumbnails.getThumbnail(resolved, '', basename(filePath), { path: filePath }, 'Large');
    return result.placeholder ? undefined : result.bytes;
  } catch (error) {
    logWarning('WebUI', `No cached thumbnail for ${filePath}:`, toAppError(error).message);
    return undefined;
  }
}

export function registerStatusRoutes(router: Router, deps: RouteDependencies): void {
  router.get('/status', (_req: Request, res: Response) => {
    sendSnapshot(res, deps);
  });

  router.get('/status/thumbnail', (_req: Request, res: Response) => {
    const bytes = deps.statusProvider.thumbnail;
    if (!bytes) {
      sendErrorResponse(res, 404, 'No thumbnail for the current job');
      return;
    }
    res.set('Content-Type', 'image/png');
    res.send(bytes);
  });

  router.post('/status/refresh', async (req: Request, res: Response) => {
    const body = parseRequest(StatusRefreshRequestSchema, req.body, res);
    if (!body) {
      return;
    }
    try {
      await deps.statusProvider.refresh(body.force);
      sendSnapshot(res, deps);
    } catch (error) {
      handleRouteError(res, error, 'Status refresh');
    }
  });

  router.post('/status/reset', async (req: Request, res: Response) => {
    const body = parseRequest(StatusResetRequestSchema, req.body, res);
    if (!body) {
      return;
    }
    const thumbnail = body.filePath ? await cachedThumbnailFor(deps, body.filePath, body.location) : undefined;
    deps.statusProvider.resetStatus(thumbnail);
    sendSnapshot(res, deps, 'Waiting for the next print');
  });

  router.post('/status/clear-error', (_req: Request, res: Response) => {
    deps.statusProvider.clearError();
    sendSnapshot(res, deps);
  });

  router.post('/status/pause-polling', (_req: Request, res: Response) => {
    deps.statusProvider.pausePolling();
    sendSnapshot(res, deps, 'Status updates paused');
  });

  router.post('/status/resume-polling', (_req: Request, res: Response) => {
    deps.statusProvider.resumePolling();
    sendSnapshot(res, deps, 'Status updates resumed');
  });
}
