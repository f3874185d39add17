/**
 * @fileoverview Tests for ConfigManager
 * Tests configuration loading, saving, validation, and event emission
 */

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { EventEmitter } from 'events';
import { ConfigManager, getConfigManager } from './ConfigManager';
import type { ConfigUpdateEvent } from '../types/config';

describe('ConfigManager', () => {
  let dataDir: string;
  let configManager: ConfigManager;

  beforeEach(() => {
    dataDir = fs.mkdtempSync(path.join(os.tmpdir(), 'orion-config-'));
  });

  afterEach(async () => {
    await configManager.dispose();
    jest.restoreAllMocks();
    fs.rmSync(dataDir, { recursive: true, force: true });
  });

  function writeConfigFile(contents: unknown): void {
    fs.writeFileSync(path.join(dataDir, 'config.json'), JSON.stringify(contents), 'utf8');
  }

  function readConfigFile(): unknown {
    return JSON.parse(fs.readFileSync(path.join(dataDir, 'config.json'), 'utf8'));
  }

  describe('Singleton Pattern', () => {
    it('should return the same instance from getConfigManager', async () => {
      jest.spyOn(process, 'cwd').mockReturnValue(dataDir);
      configManager = getConfigManager();
      expect(configManager.getConfigPath()).toBe(path.join(dataDir, 'data', 'config.json'));
      expect(getConfigManager()).toBe(configManager);
      await configManager.ready;
    });

    it('should extend EventEmitter', async () => {
      configManager = new ConfigManager({ dataDir });
      await configManager.ready;
      expect(configManager).toBeInstanceOf(EventEmitter);
    });
  });

  describe('Configuration Loading', () => {
    it('should use defaults when no file exists', async () => {
      configManager = new ConfigManager({ dataDir });
      await configManager.ready;

      expect(configManager.isConfigLoaded()).toBe(true);
      expect(configManager.getConfig()).toEqual({
        backend: 'odyssey',
        developer: { simulated: false },
        useUsbByDefault: false,
        odysseyUrl: 'http://localhost:12357',
        nanodlpBaseUrl: 'http://localhost',
        requestTimeoutMs: 5000,
        webUIEnabled: true,
        webUIPort: 3100,
      });
    });

    it('should load valid values from file', async () => {
      writeConfigFile({
        backend: 'nanodlp',
        developer: { simulated: true },
        useUsbByDefault: true,
        odysseyUrl: 'http://printer.local:12357',
        nanodlpBaseUrl: 'http://192.168.1.40',
        requestTimeoutMs: 8000,
        webUIEnabled: false,
        webUIPort: 4000,
      });
      configManager = new ConfigManager({ dataDir });
      await configManager.ready;

      expect(configManager.get('backend')).toBe('nanodlp');
      expect(configManager.get('developer')).toEqual({ simulated: true });
      expect(configManager.get('nanodlpBaseUrl')).toBe('http://192.168.1.40');
      expect(configManager.get('webUIPort')).toBe(4000);
    });

    it('should reset invalid keys to defaults and drop unknown keys', async () => {
      writeConfigFile({
        backend: 'klipper',
        webUIPort: 70000,
        requestTimeoutMs: 2500,
        legacyKey: 'x',
      });
      configManager = new ConfigManager({ dataDir });
      await configManager.ready;

      expect(configManager.get('backend')).toBe('odyssey');
      expect(configManager.get('webUIPort')).toBe(3100);
      expect(configManager.get('requestTimeoutMs')).toBe(2500);

      await configManager.forceSave();
      const saved = readConfigFile();
      expect(saved).toEqual(expect.objectContaining({ backend: 'odyssey', requestTimeoutMs: 2500 }));
      expect(saved).not.toHaveProperty('legacyKey');
    });

    it('should keep defaults when the file is not valid JSON', async () => {
      fs.writeFileSync(path.join(dataDir, 'config.json'), '{ not json', 'utf8');
      configManager = new ConfigManager({ dataDir });
      await configManager.ready;

      expect(configManager.get('backend')).toBe('odyssey');
      expect(readConfigFile()).toEqual(expect.objectContaining({ backend: 'odyssey', webUIPort: 3100 }));
    });
  });

  describe('Configuration Updates', () => {
    beforeEach(async () => {
      configManager = new ConfigManager({ dataDir });
      await configManager.ready;
    });

    it('should emit configUpdated with the changed keys', () => {
      const events: ConfigUpdateEvent[] = [];
      configManager.on('configUpdated', (event: ConfigUpdateEvent) => events.push(event));

      const changed = configManager.updateConfig({ webUIPort: 3101, backend: 'nanodlp' });

      expect(changed).toEqual(['webUIPort', 'backend']);
      expect(events).toHaveLength(1);
      expect(events[0].changedKeys).toEqual(['webUIPort', 'backend']);
      expect(events[0].previous.webUIPort).toBe(3100);
      expect(events[0].current.webUIPort).toBe(3101);
    });

    it('should emit a per-key event with new and previous values', () => {
      const listener = jest.fn();
      configManager.on('config:webUIPort', listener);

      configManager.set('webUIPort', 3200);

      expect(listener).toHaveBeenCalledWith(3200, 3100);
    });

    it('should not emit when nothing changes', () => {
      const listener = jest.fn();
      configManager.on('configUpdated', listener);

      expect(configManager.updateConfig({ webUIPort: 3100 })).toEqual([]);
      expect(listener).not.toHaveBeenCalled();
    });

    it('should reject invalid values', () => {
      expect(configManager.set('webUIPort', 0)).toBe(false);
      expect(configManager.set('odysseyUrl', 'ftp://printer')).toBe(false);
      expect(configManager.get('webUIPort')).toBe(3100);
      expect(configManager.get('odysseyUrl')).toBe('http://localhost:12357');
    });

    it('should compare nested values structurally', () => {
      const listener = jest.fn();
      configManager.on('configUpdated', listener);

      configManager.updateConfig({ developer: { simulated: false } });
      expect(listener).not.toHaveBeenCalled();

      configManager.updateConfig({ developer: { simulated: true } });
      expect(listener).toHaveBeenCalledTimes(1);
      expect(configManager.get('developer').simulated).toBe(true);
    });

    it('should return frozen snapshots', () => {
      const snapshot = configManager.getConfig();
      configManager.set('useUsbByDefault', true);

      expect(Object.isFrozen(snapshot)).toBe(true);
      expect(snapshot.useUsbByDefault).toBe(false);
    });

    it('should restore defaults', () => {
      configManager.updateConfig({ backend: 'nanodlp', webUIPort: 4100 });
      configManager.resetToDefaults();

      expect(configManager.get('backend')).toBe('odyssey');
      expect(configManager.get('webUIPort')).toBe(3100);
    });
  });

  describe('File System Operations', () => {
    it('should leave a missing data directory alone until the first save', async () => {
      const nested = path.join(dataDir, 'nested', 'data');
      configManager = new ConfigManager({ dataDir: nested });
      await configManager.ready;

      expect(fs.existsSync(nested)).toBe(false);
      expect(configManager.getConfigPath()).toBe(path.join(nested, 'config.json'));

      await configManager.forceSave();

      expect(fs.existsSync(path.join(nested, 'config.json'))).toBe(true);
    });

    it('should default to DATA_DIR when no directory is given', async () => {
      const custom = path.join(dataDir, 'from-env');
      const previous = process.env.DATA_DIR;
      process.env.DATA_DIR = custom;
      try {
        configManager = new ConfigManager();
      } finally {
        if (previous === undefined) {
          delete process.env.DATA_DIR;
        } else {
          process.env.DATA_DIR = previous;
        }
      }
      await configManager.ready;

      expect(configManager.getConfigPath()).toBe(path.join(custom, 'config.json'));
    });

    it('should write configuration on forceSave', async () => {
      configManager = new ConfigManager({ dataDir });
      await configManager.ready;
      configManager.set('backend', 'nanodlp');

      await configManager.forceSave();

      expect(configManager.configFileExists()).toBe(true);
      expect(readConfigFile()).toEqual(expect.objectContaining({ backend: 'nanodlp' }));
      expect(fs.existsSync(path.join(dataDir, 'config.lock'))).toBe(false);
    });

    it('should flush a pending save on dispose', async () => {
      configManager = new ConfigManager({ dataDir });
      await configManager.ready;
      configManager.set('webUIEnabled', false);

      await configManager.dispose();

      expect(readConfigFile()).toEqual(expect.objectContaining({ webUIEnabled: false }));
    });
  });
});
