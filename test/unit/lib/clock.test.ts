import { describe, it, expect } from '@jest/globals';
import { systemClock, withTimeout } from '@/lib/clock';
import { TimeoutError } from '@/lib/errors';

describe('clock', () => {
  it('resolves with the wrapped value when it settles first', async () => {
    await expect(withTimeout(Promise.resolve('done'), 1000, 'fast')).resolves.toBe('done');
  });

  it('rejects with a TimeoutError naming the operation', async () => {
    const never = new Promise<string>(() => undefined);

    const outcome = withTimeout(never, 10, 'Probe startup-log');

    await expect(outcome).rejects.toBeInstanceOf(TimeoutError);
    await expect(outcome).rejects.toThrow('Probe startup-log timed out after 10ms');
  });

  it('passes through rejections of the wrapped promise', async () => {
    await expect(withTimeout(Promise.reject(new Error('refused')), 1000, 'x')).rejects.toThrow('refused');
  });

  it('sleeps on real time', async () => {
    const start = systemClock.now();
    await systemClock.sleep(20);
    expect(systemClock.now() - start).toBeGreaterThanOrEqual(15);
  });
});
