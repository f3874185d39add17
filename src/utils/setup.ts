/**
 * @fileoverview Data directory setup.
 *
 * The data directory holds config.json and its lock file. It defaults to
 * `<cwd>/data` and can be moved with the DATA_DIR environment variable.
 */

import * as fs from 'fs';
import * as path from 'path';
import { AppError, ErrorCode } from './error.utils';
import { logInfo } from './logging';

export function getDataPath(env: NodeJS.ProcessEnv = process.env): string {
  const customPath = env.DATA_DIR;
  if (customPath) {
    return path.resolve(customPath);
  }
  return path.join(process.cwd(), 'data');
}

export function isDirectoryWritable(dataPath: string): boolean {
  try {
    fs.accessSync(dataPath, fs.constants.W_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Create the data directory when missing and check it is writable
 *
 * @returns The data directory path
 */
export function initializeDataDirectory(dataPath: string = getDataPath()): string {
  if (!fs.existsSync(dataPath)) {
    logInfo('Setup', `Creating data directory: ${dataPath}`);
    fs.mkdirSync(dataPath, { recursive: true });
  }

  if (!isDirectoryWritable(dataPath)) {
    throw new AppError(`Data directory is not writable: ${dataPath}`, ErrorCode.CONFIG_SAVE_FAILED, { dataPath });
  }
  return dataPath;
}
