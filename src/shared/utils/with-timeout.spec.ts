import { TimeoutError, withTimeout } from './with-timeout';

describe('withTimeout', () => {
  it('resolves with the task result', async () => {
    await expect(withTimeout(Promise.resolve('done'), 50)).resolves.toBe('done');
  });

  it('passes task failures through', async () => {
    await expect(withTimeout(Promise.reject(new Error('boom')), 50)).rejects.toThrow('boom');
  });

  it('rejects with TimeoutError when the task is too slow', async () => {
    const never = new Promise<string>(() => undefined);
    await expect(withTimeout(never, 10)).rejects.toEqual(new TimeoutError(10));
  });
});
