/**
 * @fileoverview Capability contract implemented by every printer backend.
 *
 * Status payloads are loosely-typed JSON maps; the Odyssey service already
 * emits the canonical wire shape while the NanoDLP adapters map into it.
 * Adapters that cannot push events implement `getStatusStream` as a poll loop
 * and report `pushCapable: false` so the status engine does not prefer it.
 * Calls may reject with transport errors; none is assumed idempotent.
 */

export type RawStatus = Record<string, unknown>;

export type ActionResult = Record<string, unknown>;

export type ThumbnailSize = 'Small' | 'Large';

export interface ThumbnailDimensions {
  width: number;
  height: number;
}

export const THUMBNAIL_DIMENSIONS: Readonly<Record<ThumbnailSize, ThumbnailDimensions>> = {
  Small: { width: 400, height: 400 },
  Large: { width: 800, height: 480 },
};

export interface ThumbnailResult {
  bytes: Buffer;
  /** True when the bytes are a generated stand-in rather than the file's preview */
  placeholder: boolean;
}

export type FileLocation = 'Local' | 'Usb';

export interface FileListing {
  files: Array<Record<string, unknown>>;
  dirs: Array<Record<string, unknown>>;
  page_index: number;
  page_size: number;
}

/** One NanoDLP analytics sample: metric type `T`, sample id `ID`, value `V` */
export interface AnalyticsRecord {
  T: number;
  ID: number;
  V: number;
}

export interface BackendClient {
  readonly name: string;
  readonly pushCapable: boolean;

  getStatus(): Promise<RawStatus>;
  /**
   * Status events until `signal` aborts. `onOpen` fires once the subscription
   * is established, before any event arrives.
   */
  getStatusStream(signal?: AbortSignal, onOpen?: () => void): AsyncIterable<RawStatus>;

  listItems(location: string, pageSize: number, pageIndex: number, subdirectory: string): Promise<FileListing>;
  getFileMetadata(location: string, filePath: string): Promise<Record<string, unknown>>;
  getFileThumbnail(location: string, filePath: string, size: ThumbnailSize): Promise<ThumbnailResult>;
  deleteFile(location: string, filePath: string): Promise<ActionResult>;
  usbAvailable(): Promise<boolean>;
  getConfig(): Promise<Record<string, unknown>>;

  startPrint(location: string, filePath: string): Promise<ActionResult>;
  cancelPrint(): Promise<ActionResult>;
  pausePrint(): Promise<ActionResult>;
  resumePrint(): Promise<ActionResult>;

  canMoveToTop(): Promise<boolean>;
  move(heightMm: number): Promise<ActionResult>;
  moveDelta(deltaMm: number): Promise<ActionResult>;
  moveToTop(): Promise<ActionResult>;
  manualHome(): Promise<ActionResult>;
  manualCure(cure: boolean): Promise<ActionResult>;
  manualCommand(command: string): Promise<ActionResult>;
  displayTest(test: string): Promise<ActionResult>;

  getAnalytics(count: number): Promise<AnalyticsRecord[]>;
  getAnalyticValue(id: number): Promise<number | null>;

  /** Stop timers and in-flight work owned by the client */
  dispose(): void;
}
