#!/usr/bin/env node
/**
 * @fileoverview Main entry point for the Orion backend service.
 *
 * Key responsibilities:
 * - Initialize the data directory and load configuration
 * - Apply command-line overrides
 * - Select the printer backend and build the shared services around it
 *   (thumbnails, analytics, status engine)
 * - Start the HTTP/WebSocket server
 * - Handle graceful shutdown on SIGINT/SIGTERM
 */

import { ConfigManager } from './managers/ConfigManager';
import { BackendService } from './printer-backends/BackendService';
import { AnalyticsPoller } from './services/AnalyticsPoller';
import { StatusProvider } from './services/StatusProvider';
import { ThumbnailService } from './services/ThumbnailService';
import type { AppConfig, BackendKind, MutableAppConfig } from './types/config';
import { parseHeadlessArguments, validateHeadlessConfig, type HeadlessOverrides } from './utils/HeadlessArguments';
import { toAppError } from './utils/error.utils';
import { createLogger } from './utils/logging';
import { initializeDataDirectory } from './utils/setup';
import { createHardDeadline, withTimeout } from './utils/ShutdownTimeout';
import { WebUIManager } from './webui/server/WebUIManager';

const log = createLogger('Init');

const SHUTDOWN_STEP_TIMEOUT_MS = 5_000;
const SHUTDOWN_HARD_DEADLINE_MS = 10_000;

interface RunningServices {
  readonly configManager: ConfigManager;
  readonly backend: BackendService;
  readonly analytics: AnalyticsPoller | null;
  readonly statusProvider: StatusProvider;
  readonly webUIManager: WebUIManager;
}

let services: RunningServices | null = null;
let shuttingDown = false;

/**
 * Translate CLI overrides into configuration updates. `--base-url` targets
 * whichever backend the overrides and the stored configuration select.
 */
export function overridesToConfig(current: Readonly<AppConfig>, overrides: HeadlessOverrides): Partial<AppConfig> {
  const updates: Partial<MutableAppConfig> = {};
  const backend: BackendKind = overrides.backend ?? current.backend;

  if (overrides.backend !== undefined) {
    updates.backend = overrides.backend;
  }
  if (overrides.simulated) {
    updates.developer = { ...current.developer, simulated: true };
  }
  if (overrides.baseUrl !== undefined) {
    if (backend === 'nanodlp') {
      updates.nanodlpBaseUrl = overrides.baseUrl;
    } else {
      updates.odysseyUrl = overrides.baseUrl;
    }
  }
  if (overrides.webUIPort !== undefined) {
    updates.webUIPort = overrides.webUIPort;
  }
  if (overrides.webUIEnabled !== undefined) {
    updates.webUIEnabled = overrides.webUIEnabled;
  }
  return updates;
}

function createServices(configManager: ConfigManager): RunningServices {
  const config = configManager.getConfig();
  const backend = new BackendService(config);
  const thumbnails = new ThumbnailService(backend);

  // Odyssey exposes no analytics endpoints
  const analytics = backend.selection === 'odyssey' ? null : new AnalyticsPoller(backend, { pollingOnly: backend.isPollingOnly });

  const statusProvider = new StatusProvider(backend, {
    pollingOnly: backend.isPollingOnly,
    analytics,
    thumbnails,
  });

  const webUIManager = new WebUIManager({ backend, statusProvider, thumbnails, analytics }, configManager);
  return { configManager, backend, analytics, statusProvider, webUIManager };
}

async function shutdown(): Promise<void> {
  if (!services || shuttingDown) {
    return;
  }
  shuttingDown = true;
  const { configManager, backend, analytics, statusProvider, webUIManager } = services;
  const deadline = createHardDeadline(SHUTDOWN_HARD_DEADLINE_MS);
  const shutdownLog = createLogger('Shutdown');

  shutdownLog.info('Stopping services...');
  analytics?.dispose();
  statusProvider.dispose();

  try {
    await withTimeout(webUIManager.dispose(), { timeoutMs: SHUTDOWN_STEP_TIMEOUT_MS, operation: 'stop WebUI' });
  } catch (error) {
    shutdownLog.error('WebUI did not stop cleanly:', toAppError(error).message);
  }

  backend.dispose();

  try {
    await withTimeout(configManager.dispose(), { timeoutMs: SHUTDOWN_STEP_TIMEOUT_MS, operation: 'save configuration' });
  } catch (error) {
    shutdownLog.error('Configuration was not saved:', toAppError(error).message);
  }

  clearTimeout(deadline);
  shutdownLog.info('Graceful shutdown complete');
}

function setupSignalHandlers(): void {
  const handle = (signal: NodeJS.Signals): void => {
    log.info(`Received ${signal}`);
    shutdown().then(
      () => process.exit(0),
      (error: unknown) => {
        log.error('Error during shutdown:', toAppError(error).message);
        process.exit(1);
      }
    );
  };
  process.on('SIGINT', handle);
  process.on('SIGTERM', handle);
}

async function main(): Promise<void> {
  log.info('Orion backend service starting');

  const validation = validateHeadlessConfig(parseHeadlessArguments());
  if (!validation.valid) {
    log.error('Invalid command-line arguments:');
    validation.errors.forEach((error) => log.error(`  - ${error}`));
    process.exit(1);
  }

  const dataDir = initializeDataDirectory();
  const configManager = new ConfigManager({ dataDir });
  await configManager.ready;

  const changed = configManager.updateConfig(overridesToConfig(configManager.getConfig(), validation.overrides));
  if (changed.length > 0) {
    log.info(`Command-line overrides applied: ${changed.join(', ')}`);
  }

  services = createServices(configManager);
  setupSignalHandlers();

  services.analytics?.start();
  services.statusProvider.start();

  if (configManager.get('webUIEnabled')) {
    const started = await services.webUIManager.start();
    if (!started) {
      log.error('WebUI failed to start - check the port and permissions');
      await shutdown();
      process.exit(1);
    }
    const status = services.webUIManager.getStatus();
    log.info(`Server running at ${status.url}`);
    log.info(`Access from this machine: http://localhost:${status.port}`);
  } else {
    log.info('WebUI disabled; status engine running headless');
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    log.error('Fatal error during startup:', toAppError(error).message);
    process.exit(1);
  });
}
