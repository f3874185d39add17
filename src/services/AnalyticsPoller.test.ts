/**
 * @fileoverview Tests for the telemetry sampler
 */

import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import { FakeBackendClient, flushPromises } from '../__tests__/fake-backend';
import { metricIdForKey, metricKeyForId } from '../printer-backends/nanodlp/analytics-metrics';
import { AnalyticsPoller, ringCapacity } from './AnalyticsPoller';

describe('AnalyticsPoller', () => {
  let client: FakeBackendClient;
  let poller: AnalyticsPoller;
  const now = (): number => 5_000;

  beforeEach(() => {
    client = new FakeBackendClient();
  });

  afterEach(() => {
    poller.dispose();
  });

  describe('polling-only backends', () => {
    beforeEach(() => {
      poller = new AnalyticsPoller(client, { pollingOnly: true, now });
      client.getAnalyticValue.mockResolvedValue(1.5);
      client.getAnalytics.mockResolvedValue([
        { T: 11, ID: 1, V: 40 },
        { T: 11, ID: 2, V: 41 },
        { T: 6, ID: 3, V: 9 },
        { T: 99, ID: 4, V: 1 },
      ]);
    });

    it('samples the fast metric and groups the batch by metric', async () => {
      const updated = jest.fn();
      poller.on('updated', updated);

      await poller.refresh();

      expect(client.getAnalyticValue).toHaveBeenCalledWith(6);
      expect(client.getAnalytics).toHaveBeenCalledWith(200);
      expect(poller.getSeries('Pressure')).toEqual([{ id: 5_000, v: 1.5 }]);
      expect(poller.getSeries('TemperatureMCU')).toEqual([
        { id: 1, v: 40 },
        { id: 2, v: 41 },
      ]);
      expect(poller.getSeries('99')).toEqual([{ id: 4, v: 1 }]);
      expect(poller.getLatest('TemperatureMCU')).toBe(41);
      expect(updated).toHaveBeenCalledTimes(1);
    });

    it('skips batch points already held', async () => {
      await poller.refresh();
      await poller.refresh();

      expect(poller.getSeries('TemperatureMCU')).toHaveLength(2);
      expect(poller.getSeries('Pressure')).toHaveLength(2);
    });

    it('skips failed cycles without notifying', async () => {
      client.getAnalyticValue.mockRejectedValue(new Error('offline'));
      client.getAnalytics.mockRejectedValue(new Error('offline'));
      const updated = jest.fn();
      poller.on('updated', updated);

      await expect(poller.refresh()).resolves.toBeUndefined();

      expect(poller.snapshot()).toEqual({});
      expect(updated).not.toHaveBeenCalled();
      expect(poller.getLatest('Pressure')).toBeNull();
    });

    it('runs the batch on the first loop cycle', async () => {
      poller.start();
      await flushPromises();

      expect(poller.mode).toBe('polling');
      expect(client.getAnalyticValue).toHaveBeenCalledTimes(1);
      expect(client.getAnalytics).toHaveBeenCalledTimes(1);

      poller.stop();
      expect(poller.mode).toBe('stopped');
    });
  });

  describe('window sizing', () => {
    it('sizes rings by sampling rate', () => {
      poller = new AnalyticsPoller(client, { pollingOnly: true, fastHz: 1, slowEvery: 4, windowSeconds: 10 });

      expect(poller.capacityFor('Pressure')).toBe(10);
      expect(poller.capacityFor('TemperatureMCU')).toBe(3);
      expect(poller.slowIntervalMs).toBe(4_000);
    });

    it('drops points older than the window', async () => {
      poller = new AnalyticsPoller(client, { pollingOnly: true, fastHz: 1, windowSeconds: 2, now });
      client.getAnalyticValue.mockResolvedValueOnce(1).mockResolvedValueOnce(2).mockResolvedValueOnce(3);

      await poller.refresh();
      await poller.refresh();
      await poller.refresh();

      expect(poller.getSeries('Pressure').map((point) => point.v)).toEqual([2, 3]);
    });

    it('never sizes a ring below one', () => {
      expect(ringCapacity(0, 2)).toBe(1);
    });

    it('rejects a non-positive rate', () => {
      expect(() => new AnalyticsPoller(client, { fastHz: 0 })).toThrow(RangeError);
    });
  });

  describe('push-capable backends', () => {
    beforeEach(() => {
      client.pushCapable = true;
      poller = new AnalyticsPoller(client, { now });
    });

    it('reads every named numeric metric from a status payload', () => {
      poller.ingestStatus({ TemperatureMCU: 38, Pressure: 'high', status: 'Idle' });

      expect(poller.snapshot()).toEqual({ TemperatureMCU: [{ id: 5_000, v: 38 }] });
    });

    it('samples stream events and falls back to polling when the stream ends', async () => {
      client.getStatus.mockResolvedValue({ TemperatureVat: 24 });
      poller.start();
      expect(poller.mode).toBe('streaming');

      client.stream.push({ TemperatureMCU: 30 });
      await flushPromises();
      expect(poller.getLatest('TemperatureMCU')).toBe(30);
      expect(client.getStatus).not.toHaveBeenCalled();

      client.stream.end();
      await flushPromises();
      expect(poller.mode).toBe('polling');
      expect(client.getStatus).toHaveBeenCalledTimes(1);
      expect(poller.getLatest('TemperatureVat')).toBe(24);
    });
  });
});

describe('analytics metric table', () => {
  it('maps ids and keys both ways', () => {
    expect(metricKeyForId(11)).toBe('TemperatureMCU');
    expect(metricIdForKey('Pressure')).toBe(6);
    expect(metricKeyForId(999)).toBeNull();
  });
});
