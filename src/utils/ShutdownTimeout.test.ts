import { describe, it, expect, jest, afterEach } from '@jest/globals';
import { ErrorCode } from './error.utils';
import { createHardDeadline, withTimeout } from './ShutdownTimeout';

describe('ShutdownTimeout', () => {
  afterEach(() => {
    jest.useRealTimers();
    jest.restoreAllMocks();
  });

  it('resolves with the value when the promise settles in time', async () => {
    await expect(withTimeout(Promise.resolve('saved'), { timeoutMs: 1000, operation: 'save' })).resolves.toBe('saved');
  });

  it('rejects with a timeout error when the deadline passes', async () => {
    jest.useFakeTimers();
    const pending = withTimeout(new Promise<never>(() => undefined), { timeoutMs: 5000, operation: 'stop WebUI' });

    jest.advanceTimersByTime(5000);

    await expect(pending).rejects.toMatchObject({
      code: ErrorCode.TIMEOUT,
      message: 'Timeout: stop WebUI exceeded 5000ms',
    });
    expect(console.warn).toHaveBeenCalledWith('[Shutdown]', 'Timeout: stop WebUI (5000ms)');
  });

  it('stays quiet when silent', async () => {
    jest.useFakeTimers();
    const pending = withTimeout(new Promise<never>(() => undefined), { timeoutMs: 10, operation: 'x', silent: true });

    jest.advanceTimersByTime(10);

    await expect(pending).rejects.toMatchObject({ code: ErrorCode.TIMEOUT });
    expect(console.warn).not.toHaveBeenCalled();
  });

  it('does not keep the process alive with the hard deadline', () => {
    const handle = createHardDeadline(10_000);

    expect(handle.hasRef()).toBe(false);
    clearTimeout(handle);
  });
});
