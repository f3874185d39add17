/**
 * @fileoverview Tests for the Odyssey adapter against a stubbed fetch
 */

import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import { jsonResponse, requestedPaths, stubFetch } from '../../__tests__/fetch-stub';
import { AppError, ErrorCode } from '../../utils/error.utils';
import { OdysseyHttpClient } from './OdysseyHttpClient';

const API_URL = 'http://odyssey.test:12357';

async function collect(stream: AsyncIterable<Record<string, unknown>>): Promise<Array<Record<string, unknown>>> {
  const items: Array<Record<string, unknown>> = [];
  for await (const item of stream) {
    items.push(item);
  }
  return items;
}

describe('OdysseyHttpClient', () => {
  let client: OdysseyHttpClient;

  beforeEach(() => {
    client = new OdysseyHttpClient({ apiUrl: `${API_URL}/` });
  });

  afterEach(() => {
    client.dispose();
    jest.restoreAllMocks();
  });

  it('requires an http(s) URL', () => {
    expect(() => new OdysseyHttpClient({ apiUrl: 'ftp://odyssey.test' })).toThrow(
      'apiUrl must start with either http:// or https://'
    );
  });

  it('passes status through unchanged', async () => {
    const spy = stubFetch(() => jsonResponse({ status: 'Idle', paused: false }));

    expect(await client.getStatus()).toEqual({ status: 'Idle', paused: false });
    expect(requestedPaths(spy)).toEqual(['/status']);
  });

  it('times out when the response body stalls', async () => {
    const slow = new OdysseyHttpClient({ apiUrl: API_URL, requestTimeoutMs: 50 });
    stubFetch(() => new Response(new ReadableStream<Uint8Array>({ start() {} })));

    await expect(slow.getStatus()).rejects.toMatchObject({
      code: ErrorCode.TIMEOUT,
      message: 'Operation timed out after 50ms',
    });
    slow.dispose();
  });

  it('sends listing parameters and drops malformed entries', async () => {
    const spy = stubFetch(() => jsonResponse({ files: [{ name: 'a.ctb' }, 'junk'], dirs: [], page_size: 20 }));

    const listing = await client.listItems('Usb', 20, 0, 'jobs');

    expect(requestedPaths(spy)).toEqual(['/files?location=Usb&subdirectory=jobs&page_index=0&page_size=20']);
    expect(listing).toEqual({ files: [{ name: 'a.ctb' }], dirs: [], page_index: 0, page_size: 20 });
  });

  it('rejects non-200 responses', async () => {
    stubFetch(() => new Response('busy', { status: 500 }));

    const error = await client.cancelPrint().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AppError);
    expect(error).toMatchObject({
      code: ErrorCode.BACKEND_HTTP_STATUS,
      message: 'Odyssey POST /print/cancel failed: HTTP 500',
    });
  });

  it('starts prints with a query string', async () => {
    const spy = stubFetch(() => new Response(null, { status: 200 }));

    await client.startPrint('Local', 'jobs/part.ctb');

    expect(requestedPaths(spy)).toEqual(['/print/start?location=Local&file_path=jobs%2Fpart.ctb']);
    expect(spy.mock.calls[0][1]?.method).toBe('POST');
  });

  it('moves relative to the reported height', async () => {
    const spy = stubFetch((url) =>
      url.pathname === '/status' ? jsonResponse({ physical_state: { z: 10 } }) : jsonResponse({ ok: true })
    );

    expect(await client.moveDelta(2.5)).toEqual({ ok: true });
    expect(requestedPaths(spy)).toEqual(['/status', '/manual?z=12.5']);
  });

  it('reports USB only when both listings succeed', async () => {
    stubFetch((url) =>
      url.searchParams.get('location') === 'Usb' ? new Response('', { status: 404 }) : jsonResponse({ files: [] })
    );
    expect(await client.usbAvailable()).toBe(false);

    jest.restoreAllMocks();
    stubFetch(() => jsonResponse({ files: [] }));
    expect(await client.usbAvailable()).toBe(true);
  });

  it('flags empty thumbnails as placeholders', async () => {
    stubFetch(() => new Response(new Uint8Array(0), { status: 200 }));
    const empty = await client.getFileThumbnail('Local', 'a.ctb', 'Small');
    expect(empty.placeholder).toBe(true);

    jest.restoreAllMocks();
    stubFetch(() => new Response(new Uint8Array([1, 2, 3]), { status: 200 }));
    const real = await client.getFileThumbnail('Local', 'a.ctb', 'Small');
    expect(real).toEqual({ bytes: Buffer.from([1, 2, 3]), placeholder: false });
  });

  it('streams server-sent status events', async () => {
    const spy = stubFetch(
      () =>
        new Response('data: {"status":"Idle"}\n\ndata: not-json\nevent: ping\ndata: {"status":"Printing"}\n', {
          status: 200,
          headers: { 'Content-Type': 'text/event-stream' },
        })
    );

    const statuses = await collect(client.getStatusStream());

    expect(statuses).toEqual([{ status: 'Idle' }, { status: 'Printing' }]);
    expect(requestedPaths(spy)).toEqual(['/status/stream']);
  });

  it('signals the open before the first event', async () => {
    stubFetch(() => new Response(new ReadableStream<Uint8Array>({ start() {} }), { status: 200 }));
    const onOpen = jest.fn<() => void>();
    const controller = new AbortController();

    const pending = collect(client.getStatusStream(controller.signal, onOpen));
    await new Promise<void>((resolve) => setImmediate(resolve));
    expect(onOpen).toHaveBeenCalledTimes(1);

    controller.abort();
    await expect(pending).resolves.toEqual([]);
  });

  it('does not signal the open for a rejected subscription', async () => {
    stubFetch(() => new Response('missing', { status: 404 }));
    const onOpen = jest.fn<() => void>();

    await expect(collect(client.getStatusStream(undefined, onOpen))).rejects.toMatchObject({
      code: ErrorCode.BACKEND_HTTP_STATUS,
    });
    expect(onOpen).not.toHaveBeenCalled();
  });

  it('fails the stream on a refused connection', async () => {
    stubFetch(() => {
      throw new TypeError('fetch failed');
    });

    await expect(collect(client.getStatusStream())).rejects.toMatchObject({ code: ErrorCode.NETWORK });
  });

  it('has no analytics or move-to-top', async () => {
    expect(await client.canMoveToTop()).toBe(false);
    await expect(client.moveToTop()).rejects.toMatchObject({ code: ErrorCode.BACKEND_UNSUPPORTED });
    await expect(client.getAnalytics()).rejects.toMatchObject({ code: ErrorCode.BACKEND_UNSUPPORTED });
  });
});
