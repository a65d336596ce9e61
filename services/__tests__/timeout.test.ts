import { describe, it, expect } from 'vitest';
import { TimeoutError } from '../errors.js';
import { withTimeout } from '../timeout.js';

describe('withTimeout', () => {
  it('resolves with the work result', async () => {
    await expect(withTimeout(Promise.resolve('done'), 1000, 'work')).resolves.toBe('done');
  });

  it('passes through rejections', async () => {
    await expect(withTimeout(Promise.reject(new Error('boom')), 1000, 'work')).rejects.toThrow('boom');
  });

  it('rejects with TimeoutError when the work takes too long', async () => {
    const never = new Promise<string>(() => {});

    const result = withTimeout(never, 10, 'embedding');

    await expect(result).rejects.toBeInstanceOf(TimeoutError);
    await expect(result).rejects.toThrow('embedding timed out after 10ms');
  });
});
