import { describe, it, expect, jest } from '@jest/globals';
import { EventEmitter } from './EventEmitter';

interface TestEvents extends Record<string, unknown[]> {
  changed: [number];
  closed: [];
}

describe('EventEmitter', () => {
  it('delivers payloads to every listener', () => {
    const emitter = new EventEmitter<TestEvents>();
    const first = jest.fn();
    const second = jest.fn();
    emitter.on('changed', first).on('changed', second);

    expect(emitter.emit('changed', 3)).toBe(true);
    expect(first).toHaveBeenCalledWith(3);
    expect(second).toHaveBeenCalledWith(3);
  });

  it('reports when nobody listens', () => {
    expect(new EventEmitter<TestEvents>().emit('closed')).toBe(false);
  });

  it('fires once listeners a single time', () => {
    const emitter = new EventEmitter<TestEvents>();
    const listener = jest.fn();
    emitter.once('closed', listener);

    emitter.emit('closed');
    emitter.emit('closed');

    expect(listener).toHaveBeenCalledTimes(1);
    expect(emitter.listenerCount('closed')).toBe(0);
  });

  it('keeps notifying after a listener throws', () => {
    const emitter = new EventEmitter<TestEvents>();
    const after = jest.fn();
    emitter.on('changed', () => {
      throw new Error('boom');
    });
    emitter.on('changed', after);

    emitter.emit('changed', 1);

    expect(after).toHaveBeenCalledWith(1);
    expect(console.error).toHaveBeenCalledTimes(1);
  });

  it('removes listeners individually or all at once', () => {
    const emitter = new EventEmitter<TestEvents>();
    const listener = jest.fn();
    emitter.on('changed', listener);
    emitter.on('closed', jest.fn());

    emitter.off('changed', listener);
    expect(emitter.listenerCount('changed')).toBe(0);

    emitter.removeAllListeners();
    expect(emitter.listenerCount('closed')).toBe(0);
  });
});
