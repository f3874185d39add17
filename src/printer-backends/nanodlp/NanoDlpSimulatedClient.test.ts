import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { NanoDlpSimulatedClient } from './NanoDlpSimulatedClient';

describe('NanoDlpSimulatedClient', () => {
  let client: NanoDlpSimulatedClient;

  beforeEach(() => {
    // Ticks are driven by hand
    client = new NanoDlpSimulatedClient({ tickMs: 3_600_000, totalLayers: 3, now: () => 50_000 });
  });

  afterEach(() => {
    client.dispose();
  });

  it('starts idle with no job', async () => {
    const status = await client.getStatus();

    expect(status.status).toBe('Idle');
    expect(status.layer).toBeNull();
    expect(status.print_data).toBeNull();
    expect(status.finished).toBe(false);
  });

  it('prints one layer per tick with file metadata', async () => {
    await client.getStatus();
    await client.startPrint('Local', 'jobs/part.ctb');
    expect((await client.getStatus()).status).toBe('Printing');

    client.tick();
    client.tick();
    const status = await client.getStatus();

    expect(status.status).toBe('Printing');
    expect(status.layer).toBe(1);
    expect(status.physical_state).toEqual({ z: 0.5, curing: false });
    expect(status.print_data).toMatchObject({
      layer_count: 3,
      file_data: { name: 'part.ctb', path: '/sim/part.ctb', location_category: 'Local' },
    });
  });

  it('finishes on the last layer', async () => {
    await client.startPrint('Local', 'part.ctb');
    for (let i = 0; i < 4; i++) {
      client.tick();
    }

    const status = await client.getStatus();

    expect(status.status).toBe('Idle');
    expect(status.finished).toBe(true);
    expect(status.layer).toBe(3);
  });

  it('latches a cancel through the following idle', async () => {
    await client.startPrint('Local', 'part.ctb');
    client.tick();
    await client.cancelPrint();
    expect((await client.getStatus()).status).toBe('Canceling');

    client.tick();
    const status = await client.getStatus();

    expect(status.status).toBe('Idle');
    expect(status.cancel_latched).toBe(true);
    expect(status.layer).toBeNull();
  });

  it('pauses and resumes', async () => {
    await client.startPrint('Local', 'part.ctb');
    client.tick();

    await client.pausePrint();
    client.tick();
    const paused = await client.getStatus();
    expect(paused.status).toBe('Paused');
    expect(paused.layer).toBe(0);

    await client.resumePrint();
    expect((await client.getStatus()).status).toBe('Printing');
  });

  it('pushes status changes to stream consumers until disposed', async () => {
    const iterator = client.getStatusStream()[Symbol.asyncIterator]();
    const next = iterator.next();

    await client.startPrint('Local', 'part.ctb');
    const event = await next;

    expect(event.done).toBe(false);
    expect(event.value).toMatchObject({ status: 'Printing' });

    client.dispose();
    expect((await iterator.next()).done).toBe(true);
  });

  it('lists simulated files', async () => {
    const listing = await client.listItems('Local', 10, 0);

    expect(listing.files).toHaveLength(5);
    expect(listing.files[1]).toEqual({ name: 'sim_model_2.stl', path: '/sim/sim_model_2.stl', last_modified: 49_000 });
  });
});
