/**
 * @fileoverview File browser route registrations: listing, metadata, thumbnails and deletion.
 *
 * Thumbnails go through the shared ThumbnailService so the file browser and
 * the status engine reuse the same cached bytes. The response is always a
 * PNG; `X-Thumbnail-Placeholder` tells the client whether it is the file's
 * own preview.
 */

import type { Request, Response, Router } from 'express';
import { FileListQuerySchema, FilePathQuerySchema, ThumbnailQuerySchema } from '../../schemas/web-api.schemas';
import type { ActionResponse, FileListResponse, FileMetadataResponse } from '../../types/web-api.types';
import { logInfo } from '../../../utils/logging';
import { handleRouteError, parseRequest, resolveLocation, type RouteDependencies } from './route-helpers';

/**
 * Split `dir/sub/file.ctb` into its directory and file name
 */
export function splitFilePath(filePath: string): { subdirectory: string; fileName: string } {
  const slash = filePath.lastIndexOf('/');
  if (slash < 0) {
    return { subdirectory: '', fileName: filePath };
  }
  return { subdirectory: filePath.slice(0, slash), fileName: filePath.slice(slash + 1) };
}

export function registerFileRoutes(router: Router, deps: RouteDependencies): void {
  router.get('/files', async (req: Request, res: Response) => {
    const query = parseRequest(FileListQuerySchema, req.query, res);
    if (!query) {
      return;
    }
    try {
      const location = await resolveLocation(deps, query.location);
      const listing = await deps.backend.listItems(location, query.pageSize, query.pageIndex, query.subdirectory);
      const response: FileListResponse = { success: true, location, listing };
      res.json(response);
    } catch (error) {
      handleRouteError(res, error, 'File listing');
    }
  });

  router.get('/files/metadata', async (req: Request, res: Response) => {
    const query = parseRequest(FilePathQuerySchema, req.query, res);
    if (!query) {
      return;
    }
    try {
      const location = await resolveLocation(deps, query.location);
      const metadata = await deps.backend.getFileMetadata(location, query.filePath);
      const response: FileMetadataResponse = { success: true, metadata };
      res.json(response);
    } catch (error) {
      handleRouteError(res, error, 'File metadata');
    }
  });

  router.get('/files/thumbnail', async (req: Request, res: Response) => {
    const query = parseRequest(ThumbnailQuerySchema, req.query, res);
    if (!query) {
      return;
    }
    try {
      const location = await resolveLocation(deps, query.location);
      const { subdirectory, fileName } = splitFilePath(query.filePath);
      const result = await deps.thumbnails.getThumbnail(
        location,
        subdirectory,
        fileName,
        { path: query.filePath, lastModified: query.lastModified },
        query.size
      );
      res.set('Content-Type', 'image/png');
      res.set('X-Thumbnail-Placeholder', String(result.placeholder));
      res.send(result.bytes);
    } catch (error) {
      handleRouteError(res, error, 'Thumbnail');
    }
  });

  router.delete('/files', async (req: Request, res: Response) => {
    const query = parseRequest(FilePathQuerySchema, req.query, res);
    if (!query) {
      return;
    }
    try {
      const location = await resolveLocation(deps, query.location);
      const result = await deps.backend.deleteFile(location, query.filePath);
      logInfo('WebUI', `Deleted ${query.filePath} from ${location}`);
      const response: ActionResponse = { success: true, message: `Deleted ${query.filePath}`, result };
      res.json(response);
    } catch (error) {
      handleRouteError(res, error, 'File delete');
    }
  });
}
