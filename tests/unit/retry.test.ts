import { describe, it, expect, vi } from 'vitest';
import { backoffDelay, withRetry } from '../../src/lib/db/retry';

const conflict = Object.assign(new Error('could not serialize access'), { code: '40001' });

describe('backoffDelay', () => {
  const policy = { baseDelayMs: 50, maxDelayMs: 300 };

  it('doubles the ceiling per failed attempt', () => {
    const top = () => 0.999999;
    expect(backoffDelay(1, policy, top)).toBe(49);
    expect(backoffDelay(2, policy, top)).toBe(99);
    expect(backoffDelay(3, policy, top)).toBe(199);
  });

  it('caps the ceiling at maxDelayMs', () => {
    expect(backoffDelay(6, policy, () => 0.5)).toBe(150);
  });
});

describe('withRetry', () => {
  it('re-runs the work after a serialization failure', async () => {
    const work = vi.fn()
      .mockRejectedValueOnce(conflict)
      .mockResolvedValueOnce('committed');

    await expect(withRetry(work, { baseDelayMs: 1 })).resolves.toBe('committed');
    expect(work).toHaveBeenNthCalledWith(1, 1);
    expect(work).toHaveBeenNthCalledWith(2, 2);
  });

  it('throws the last error once attempts run out', async () => {
    const work = vi.fn().mockRejectedValue(conflict);

    await expect(withRetry(work, { attempts: 3, baseDelayMs: 1 })).rejects.toBe(conflict);
    expect(work).toHaveBeenCalledTimes(3);
  });

  it('does not retry other errors', async () => {
    const boom = new Error('syntax error');
    const work = vi.fn().mockRejectedValue(boom);

    await expect(withRetry(work)).rejects.toBe(boom);
    expect(work).toHaveBeenCalledTimes(1);
  });
});
