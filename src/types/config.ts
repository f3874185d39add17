/**
 * @fileoverview Application configuration types and validation.
 *
 * The persisted file is validated with a zod schema. Invalid or unknown
 * values never reject the whole file: each key falls back to its default.
 *
 * Configuration categories:
 * - Backend: backend, developer.simulated, useUsbByDefault
 * - Endpoints: odysseyUrl, nanodlpBaseUrl, requestTimeoutMs
 * - WebUI server: webUIEnabled, webUIPort
 *
 * @module types/config
 */

import { z } from 'zod';

export const BACKEND_KINDS = ['odyssey', 'nanodlp'] as const;

export type BackendKind = (typeof BACKEND_KINDS)[number];

export interface DeveloperConfig {
  /** Use the in-process simulated NanoDLP device */
  readonly simulated: boolean;
}

/**
 * Application configuration. All properties are readonly; updates go
 * through ConfigManager.
 */
export interface AppConfig {
  // Backend
  readonly backend: BackendKind;
  readonly developer: DeveloperConfig;
  readonly useUsbByDefault: boolean;

  // Endpoints
  readonly odysseyUrl: string;
  readonly nanodlpBaseUrl: string;
  readonly requestTimeoutMs: number;

  // WebUI Server
  readonly webUIEnabled: boolean;
  readonly webUIPort: number;
}

export type MutableAppConfig = { -readonly [K in keyof AppConfig]: AppConfig[K] };

export const DEFAULT_CONFIG: AppConfig = {
  backend: 'odyssey',
  developer: { simulated: false },
  useUsbByDefault: false,
  odysseyUrl: 'http://localhost:12357',
  nanodlpBaseUrl: 'http://localhost',
  requestTimeoutMs: 5000,
  webUIEnabled: true,
  webUIPort: 3100,
};

const httpUrlSchema = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//.test(value), 'URL must start with http:// or https://');

export const portSchema = z.number().int().min(1).max(65535);

/** Per-key schemas; each key validates on its own */
export const CONFIG_KEY_SCHEMAS = {
  backend: z.enum(BACKEND_KINDS),
  developer: z.object({ simulated: z.boolean() }),
  useUsbByDefault: z.boolean(),
  odysseyUrl: httpUrlSchema,
  nanodlpBaseUrl: httpUrlSchema,
  requestTimeoutMs: z.number().int().min(100).max(120_000),
  webUIEnabled: z.boolean(),
  webUIPort: portSchema,
} satisfies { [K in keyof AppConfig]: z.ZodType<AppConfig[K]> };

export const AppConfigSchema = z.object(CONFIG_KEY_SCHEMAS).strict();

const keySchemas: { [K in keyof AppConfig]: z.ZodType<AppConfig[K]> } = CONFIG_KEY_SCHEMAS;

export const CONFIG_KEYS = Object.keys(DEFAULT_CONFIG).filter(isValidConfigKey);

/**
 * Configuration update event data
 */
export interface ConfigUpdateEvent {
  readonly previous: Readonly<AppConfig>;
  readonly current: Readonly<AppConfig>;
  readonly changedKeys: ReadonlyArray<keyof AppConfig>;
}

export function isValidConfigKey(key: string): key is keyof AppConfig {
  return Object.prototype.hasOwnProperty.call(DEFAULT_CONFIG, key);
}

/**
 * Type guard for a complete, valid config object with no extra keys
 */
export function isValidConfig(config: unknown): config is AppConfig {
  return AppConfigSchema.safeParse(config).success;
}

export function isValidConfigValue<K extends keyof AppConfig>(key: K, value: unknown): value is AppConfig[K] {
  return keySchemas[key].safeParse(value).success;
}

function assignConfigValue<K extends keyof AppConfig>(target: MutableAppConfig, key: K, value: unknown): boolean {
  const parsed = keySchemas[key].safeParse(value);
  if (!parsed.success) {
    return false;
  }
  target[key] = parsed.data;
  return true;
}

/**
 * Keep every valid known key of `config`; everything else takes its default.
 */
export function sanitizeConfig(config: unknown): AppConfig {
  const sanitized: MutableAppConfig = { ...DEFAULT_CONFIG, developer: { ...DEFAULT_CONFIG.developer } };
  if (!config || typeof config !== 'object') {
    return sanitized;
  }

  for (const [key, value] of Object.entries(config)) {
    if (isValidConfigKey(key)) {
      assignConfigValue(sanitized, key, value);
    }
  }
  return sanitized;
}

/**
 * Apply the valid entries of a partial update. Returns the keys whose value
 * actually changed.
 */
export function applyConfigUpdates(
  target: MutableAppConfig,
  updates: Partial<Record<string, unknown>>
): Array<keyof AppConfig> {
  const changed: Array<keyof AppConfig> = [];
  for (const [key, value] of Object.entries(updates)) {
    if (!isValidConfigKey(key) || value === undefined) {
      continue;
    }
    const before = JSON.stringify(target[key]);
    if (assignConfigValue(target, key, value) && JSON.stringify(target[key]) !== before) {
      changed.push(key);
    }
  }
  return changed;
}
