/**
 * @fileoverview CLI argument parser for the headless backend service
 *
 * Parses and validates command-line overrides for the persisted
 * configuration. Flags take the `--flag=value` form.
 *
 * Examples:
 *   node dist/index.js --backend=nanodlp --base-url=http://192.168.1.40
 *   node dist/index.js --simulated --webui-port=3101
 *   node dist/index.js --backend=odyssey --no-webui
 */

import { BACKEND_KINDS, type BackendKind } from '../types/config';

/**
 * Overrides parsed from CLI arguments. Values stay raw until validated so
 * that a bad value can be reported rather than silently dropped.
 */
export interface HeadlessConfig {
  backend?: string;
  simulated: boolean;
  /** Applies to whichever backend ends up selected */
  baseUrl?: string;
  webUIPort?: string;
  webUIEnabled?: boolean;
}

/**
 * Overrides after validation, ready to apply to the configuration
 */
export interface HeadlessOverrides {
  backend?: BackendKind;
  simulated: boolean;
  baseUrl?: string;
  webUIPort?: number;
  webUIEnabled?: boolean;
}

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  overrides: HeadlessOverrides;
}

/**
 * Parse command-line arguments
 *
 * @param args Full argv; defaults to process.argv
 */
export function parseHeadlessArguments(args: readonly string[] = process.argv): HeadlessConfig {
  return {
    backend: parseStringArgument(args, '--backend'),
    simulated: args.includes('--simulated'),
    baseUrl: parseStringArgument(args, '--base-url'),
    webUIPort: parseStringArgument(args, '--webui-port'),
    webUIEnabled: args.includes('--no-webui') ? false : undefined,
  };
}

/**
 * Parse a string argument, stripping surrounding quotes
 */
function parseStringArgument(args: readonly string[], flag: string): string | undefined {
  const arg = args.find((a) => a.startsWith(`${flag}=`));
  if (!arg) {
    return undefined;
  }
  // Keep any '=' inside the value, e.g. in a URL query
  const value = arg.slice(flag.length + 1);
  return value.replace(/^["']|["']$/g, '');
}

function isBackendKind(value: string): value is BackendKind {
  return BACKEND_KINDS.some((kind) => kind === value);
}

export function validateHeadlessConfig(config: HeadlessConfig): ValidationResult {
  const errors: string[] = [];
  const overrides: HeadlessOverrides = { simulated: config.simulated };

  if (config.backend !== undefined) {
    if (isBackendKind(config.backend)) {
      overrides.backend = config.backend;
    } else {
      errors.push(`Unknown backend "${config.backend}" (expected ${BACKEND_KINDS.join(' or ')})`);
    }
  }

  if (config.baseUrl !== undefined) {
    if (/^https?:\/\/\S+$/.test(config.baseUrl)) {
      overrides.baseUrl = config.baseUrl;
    } else {
      errors.push('Base URL must start with http:// or https://');
    }
  }

  if (config.webUIPort !== undefined) {
    const port = /^\d+$/.test(config.webUIPort) ? Number.parseInt(config.webUIPort, 10) : NaN;
    if (Number.isInteger(port) && port >= 1 && port <= 65535) {
      overrides.webUIPort = port;
    } else {
      errors.push('WebUI port must be between 1 and 65535');
    }
  }

  if (config.webUIEnabled !== undefined) {
    overrides.webUIEnabled = config.webUIEnabled;
  }

  return {
    valid: errors.length === 0,
    errors,
    overrides,
  };
}
