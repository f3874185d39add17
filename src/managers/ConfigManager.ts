/**
 * @fileoverview Centralized configuration manager with automatic persistence.
 *
 * Holds the live configuration in memory and mirrors it to
 * `<dataDir>/config.json`:
 * - validation of loaded files and updates through the zod schemas in types/config
 * - debounced saves on change, with a lock file during writes
 * - `configUpdated` plus per-key `config:<key>` events
 *
 * Consumers that only need a value at startup (the backend clients, the
 * status engine) receive a snapshot from getConfig() through their
 * constructors rather than holding the manager.
 */

import { EventEmitter } from 'events';
import * as fs from 'fs';
import * as path from 'path';
import {
  AppConfig,
  MutableAppConfig,
  DEFAULT_CONFIG,
  ConfigUpdateEvent,
  CONFIG_KEYS,
  applyConfigUpdates,
  sanitizeConfig,
  isValidConfig,
  isValidConfigValue,
} from '../types/config';
import { logError, logInfo, logWarning } from '../utils/logging';
import { getDataPath } from '../utils/setup';

const LOG_NAMESPACE = 'ConfigManager';
const SAVE_DEBOUNCE_MS = 100;

export interface ConfigManagerOptions {
  /**
   * Directory holding config.json. Defaults to getDataPath(); index.ts
   * creates and checks it through initializeDataDirectory() first.
   */
  dataDir?: string;
}

function cloneConfig(config: AppConfig): MutableAppConfig {
  return { ...config, developer: { ...config.developer } };
}

export class ConfigManager extends EventEmitter {
  private static instance: ConfigManager | null = null;

  private readonly configPath: string;
  private readonly lockFilePath: string;
  private currentConfig: MutableAppConfig;
  private isLoading = false;
  private isSaving = false;
  private pendingSave: NodeJS.Timeout | null = null;
  private configLoaded = false;

  /** Settles once the initial load from disk has finished */
  readonly ready: Promise<void>;

  constructor(options: ConfigManagerOptions = {}) {
    super();

    const dataPath = options.dataDir ?? getDataPath();
    this.configPath = path.join(dataPath, 'config.json');
    this.lockFilePath = path.join(dataPath, 'config.lock');

    this.currentConfig = cloneConfig(DEFAULT_CONFIG);
    this.ready = this.loadFromFile();
  }

  public static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  /**
   * Snapshot of the current configuration
   */
  public getConfig(): Readonly<AppConfig> {
    return Object.freeze(cloneConfig(this.currentConfig));
  }

  public get<K extends keyof AppConfig>(key: K): AppConfig[K] {
    return this.currentConfig[key];
  }

  public isConfigLoaded(): boolean {
    return this.configLoaded;
  }

  /**
   * Set one value. Invalid values are rejected and logged.
   */
  public set<K extends keyof AppConfig>(key: K, value: AppConfig[K]): boolean {
    if (!isValidConfigValue(key, value)) {
      logWarning(LOG_NAMESPACE, `Rejected invalid value for ${key}`);
      return false;
    }
    const previousConfig = cloneConfig(this.currentConfig);
    const changedKeys = applyConfigUpdates(this.currentConfig, { [key]: value });
    if (changedKeys.length > 0) {
      this.emitUpdateEvent(previousConfig, changedKeys);
      this.scheduleSave();
    }
    return true;
  }

  /**
   * Apply several values at once. Unknown keys and invalid values are
   * skipped; returns the keys that changed.
   */
  public updateConfig(updates: Partial<AppConfig>): Array<keyof AppConfig> {
    const previousConfig = cloneConfig(this.currentConfig);
    const changedKeys = applyConfigUpdates(this.currentConfig, updates);

    if (changedKeys.length > 0) {
      this.emitUpdateEvent(previousConfig, changedKeys);
      this.scheduleSave();
    }
    return changedKeys;
  }

  public async forceSave(): Promise<void> {
    if (this.pendingSave) {
      clearTimeout(this.pendingSave);
      this.pendingSave = null;
    }
    return this.saveToFile();
  }

  public async reload(): Promise<void> {
    await this.loadFromFile();
  }

  public resetToDefaults(): void {
    const previousConfig = cloneConfig(this.currentConfig);
    this.currentConfig = cloneConfig(DEFAULT_CONFIG);
    this.emitUpdateEvent(previousConfig, CONFIG_KEYS);
    this.scheduleSave();
  }

  public configFileExists(): boolean {
    return fs.existsSync(this.configPath);
  }

  public getConfigPath(): string {
    return this.configPath;
  }

  private async loadFromFile(): Promise<void> {
    if (this.isLoading) {
      return;
    }
    this.isLoading = true;

    try {
      if (fs.existsSync(this.configPath)) {
        const fileContent = await fs.promises.readFile(this.configPath, 'utf8');
        const loadedData: unknown = JSON.parse(fileContent);
        const sanitizedConfig = sanitizeConfig(loadedData);
        const previousConfig = cloneConfig(this.currentConfig);
        this.currentConfig = cloneConfig(sanitizedConfig);
        this.emitUpdateEvent(previousConfig, CONFIG_KEYS);

        // Rewrite files with legacy keys, missing keys or invalid values
        if (!isValidConfig(loadedData)) {
          logWarning(LOG_NAMESPACE, 'Loaded config is incomplete or invalid; normalizing it');
          this.scheduleSave();
        }
      }
    } catch (error) {
      logError(LOG_NAMESPACE, 'Failed to load config file:', error);
      try {
        await this.forceSave();
      } catch (saveError) {
        logError(LOG_NAMESPACE, 'Failed to save defaults after load error:', saveError);
      }
    } finally {
      this.isLoading = false;
      this.configLoaded = true;
      logInfo(LOG_NAMESPACE, 'Config loading complete');
      this.emit('config-loaded');
    }
  }

  private scheduleSave(): void {
    if (this.pendingSave) {
      clearTimeout(this.pendingSave);
    }
    this.pendingSave = setTimeout(() => {
      this.pendingSave = null;
      this.saveToFile().catch((error: unknown) => {
        logError(LOG_NAMESPACE, 'Failed to save config:', error);
      });
    }, SAVE_DEBOUNCE_MS);
  }

  private async saveToFile(): Promise<void> {
    if (this.isSaving) {
      return;
    }
    this.isSaving = true;

    try {
      await fs.promises.mkdir(path.dirname(this.configPath), { recursive: true });
      await fs.promises.writeFile(this.lockFilePath, '');
      const configData = JSON.stringify(this.currentConfig, null, 2);
      await fs.promises.writeFile(this.configPath, configData, 'utf8');
      this.emit('configSaved', this.getConfig());
    } catch (error) {
      this.emit('saveError', error);
      throw error;
    } finally {
      try {
        if (fs.existsSync(this.lockFilePath)) {
          await fs.promises.unlink(this.lockFilePath);
        }
      } catch (lockError) {
        logWarning(LOG_NAMESPACE, 'Failed to remove config lock file:', lockError);
      }
      this.isSaving = false;
    }
  }

  /**
   * Blocking save for shutdown paths where the event loop may not get another turn
   */
  private saveToFileSync(): void {
    try {
      fs.mkdirSync(path.dirname(this.configPath), { recursive: true });
      fs.writeFileSync(this.configPath, JSON.stringify(this.currentConfig, null, 2), 'utf8');
      logInfo(LOG_NAMESPACE, 'Config saved synchronously during shutdown');
      this.emit('configSaved', this.getConfig());
    } catch (error) {
      logError(LOG_NAMESPACE, 'Failed to save config file synchronously:', error);
      this.emit('saveError', error);
    }
  }

  private emitUpdateEvent(previousConfig: MutableAppConfig, changedKeys: ReadonlyArray<keyof AppConfig>): void {
    const updateEvent: ConfigUpdateEvent = {
      previous: Object.freeze(cloneConfig(previousConfig)),
      current: this.getConfig(),
      changedKeys,
    };

    this.emit('configUpdated', updateEvent);
    for (const key of changedKeys) {
      this.emit(`config:${key}`, this.currentConfig[key], previousConfig[key]);
    }
  }

  /**
   * Flush pending changes and release the singleton
   */
  public async dispose(): Promise<void> {
    const hadPendingSave = this.pendingSave !== null;
    if (this.pendingSave) {
      clearTimeout(this.pendingSave);
      this.pendingSave = null;
    }

    if (hadPendingSave && !this.isSaving) {
      try {
        await this.saveToFile();
      } catch (error) {
        logWarning(LOG_NAMESPACE, 'Async save failed during shutdown, falling back to sync save:', error);
        this.saveToFileSync();
      }
    }

    this.removeAllListeners();
    if (ConfigManager.instance === this) {
      ConfigManager.instance = null;
    }
  }
}

export function getConfigManager(): ConfigManager {
  return ConfigManager.getInstance();
}
