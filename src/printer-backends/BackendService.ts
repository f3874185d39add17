/**
 * @fileoverview Backend selection and façade.
 *
 * Picks one BackendClient from a configuration snapshot and forwards every
 * call to it, so the rest of the application never branches on backend
 * type:
 * - `developer.simulated` selects the in-process simulated NanoDLP device
 * - `backend: 'nanodlp'` selects the NanoDLP HTTP adapter
 * - anything else selects the Odyssey REST/SSE adapter
 *
 * The selection is fixed for the lifetime of the service; a configuration
 * change takes effect on the next start.
 */

import type { AppConfig } from '../types/config';
import type {
  ActionResult,
  AnalyticsRecord,
  BackendClient,
  FileListing,
  FileLocation,
  RawStatus,
  ThumbnailResult,
  ThumbnailSize,
} from '../types/backend-client';
import { toAppError } from '../utils/error.utils';
import { logInfo, logVerbose } from '../utils/logging';
import { NanoDlpHttpClient } from './nanodlp/NanoDlpHttpClient';
import { NanoDlpSimulatedClient } from './nanodlp/NanoDlpSimulatedClient';
import { OdysseyHttpClient } from './odyssey/OdysseyHttpClient';

const LOG_NAMESPACE = 'BackendService';

export type BackendSelection = 'simulated' | 'nanodlp' | 'odyssey';

export type BackendServiceConfig = Pick<
  AppConfig,
  'backend' | 'developer' | 'useUsbByDefault' | 'odysseyUrl' | 'nanodlpBaseUrl' | 'requestTimeoutMs'
>;

export function selectBackend(config: Pick<AppConfig, 'backend' | 'developer'>): BackendSelection {
  if (config.developer.simulated) {
    return 'simulated';
  }
  return config.backend === 'nanodlp' ? 'nanodlp' : 'odyssey';
}

/**
 * Instantiate the adapter for a selection
 */
export function createBackendClient(selection: BackendSelection, config: BackendServiceConfig): BackendClient {
  switch (selection) {
    case 'simulated':
      return new NanoDlpSimulatedClient();
    case 'nanodlp':
      return new NanoDlpHttpClient({ baseUrl: config.nanodlpBaseUrl, requestTimeoutMs: config.requestTimeoutMs });
    case 'odyssey':
      return new OdysseyHttpClient({ apiUrl: config.odysseyUrl, requestTimeoutMs: config.requestTimeoutMs });
  }
}

export class BackendService implements BackendClient {
  readonly selection: BackendSelection;
  private readonly client: BackendClient;
  private readonly useUsbByDefault: boolean;

  constructor(config: BackendServiceConfig, client?: BackendClient) {
    this.selection = selectBackend(config);
    this.client = client ?? createBackendClient(this.selection, config);
    this.useUsbByDefault = config.useUsbByDefault;
    logInfo(LOG_NAMESPACE, `Using ${this.client.name} backend`);
  }

  get name(): string {
    return this.client.name;
  }

  get pushCapable(): boolean {
    return this.client.pushCapable;
  }

  /**
   * NanoDLP and the simulator are driven by polling even though the
   * simulator can push.
   */
  get isPollingOnly(): boolean {
    return this.selection !== 'odyssey';
  }

  /**
   * `Usb` when configured as the default and the backend reports a drive
   */
  async defaultLocation(): Promise<FileLocation> {
    if (!this.useUsbByDefault) {
      return 'Local';
    }
    try {
      return (await this.client.usbAvailable()) ? 'Usb' : 'Local';
    } catch (error) {
      logVerbose(LOG_NAMESPACE, `USB probe failed: ${toAppError(error).message}`);
      return 'Local';
    }
  }

  getStatus(): Promise<RawStatus> {
    return this.client.getStatus();
  }

  getStatusStream(signal?: AbortSignal, onOpen?: () => void): AsyncIterable<RawStatus> {
    return this.client.getStatusStream(signal, onOpen);
  }

  listItems(location: string, pageSize: number, pageIndex: number, subdirectory: string): Promise<FileListing> {
    return this.client.listItems(location, pageSize, pageIndex, subdirectory);
  }

  getFileMetadata(location: string, filePath: string): Promise<Record<string, unknown>> {
    return this.client.getFileMetadata(location, filePath);
  }

  getFileThumbnail(location: string, filePath: string, size: ThumbnailSize): Promise<ThumbnailResult> {
    return this.client.getFileThumbnail(location, filePath, size);
  }

  deleteFile(location: string, filePath: string): Promise<ActionResult> {
    return this.client.deleteFile(location, filePath);
  }

  usbAvailable(): Promise<boolean> {
    return this.client.usbAvailable();
  }

  getConfig(): Promise<Record<string, unknown>> {
    return this.client.getConfig();
  }

  startPrint(location: string, filePath: string): Promise<ActionResult> {
    return this.client.startPrint(location, filePath);
  }

  cancelPrint(): Promise<ActionResult> {
    return this.client.cancelPrint();
  }

  pausePrint(): Promise<ActionResult> {
    return this.client.pausePrint();
  }

  resumePrint(): Promise<ActionResult> {
    return this.client.resumePrint();
  }

  canMoveToTop(): Promise<boolean> {
    return this.client.canMoveToTop();
  }

  move(heightMm: number): Promise<ActionResult> {
    return this.client.move(heightMm);
  }

  moveDelta(deltaMm: number): Promise<ActionResult> {
    return this.client.moveDelta(deltaMm);
  }

  moveToTop(): Promise<ActionResult> {
    return this.client.moveToTop();
  }

  manualHome(): Promise<ActionResult> {
    return this.client.manualHome();
  }

  manualCure(cure: boolean): Promise<ActionResult> {
    return this.client.manualCure(cure);
  }

  manualCommand(command: string): Promise<ActionResult> {
    return this.client.manualCommand(command);
  }

  displayTest(test: string): Promise<ActionResult> {
    return this.client.displayTest(test);
  }

  getAnalytics(count: number): Promise<AnalyticsRecord[]> {
    return this.client.getAnalytics(count);
  }

  getAnalyticValue(id: number): Promise<number | null> {
    return this.client.getAnalyticValue(id);
  }

  dispose(): void {
    this.client.dispose();
  }
}
