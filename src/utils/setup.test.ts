import { describe, it, expect, afterEach } from '@jest/globals';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { getDataPath, initializeDataDirectory, isDirectoryWritable } from './setup';

describe('setup', () => {
  const created: string[] = [];

  afterEach(() => {
    created.splice(0).forEach((dir) => fs.rmSync(dir, { recursive: true, force: true }));
  });

  it('resolves DATA_DIR or falls back to ./data', () => {
    expect(getDataPath({ DATA_DIR: '/srv/orion' })).toBe(path.resolve('/srv/orion'));
    expect(getDataPath({})).toBe(path.join(process.cwd(), 'data'));
  });

  it('creates a missing directory and returns it', () => {
    const root = fs.mkdtempSync(path.join(os.tmpdir(), 'orion-setup-'));
    created.push(root);
    const dataDir = path.join(root, 'nested', 'data');

    expect(initializeDataDirectory(dataDir)).toBe(dataDir);
    expect(fs.existsSync(dataDir)).toBe(true);
    expect(isDirectoryWritable(dataDir)).toBe(true);
  });

  it('reports a missing directory as not writable', () => {
    expect(isDirectoryWritable(path.join(os.tmpdir(), 'orion-does-not-exist-42'))).toBe(false);
  });
});
