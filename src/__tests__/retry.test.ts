import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import { retryWithBackoff } from '../retry.js';

beforeEach(() => {
  jest.spyOn(console, 'warn').mockImplementation(() => {});
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe('retryWithBackoff', () => {
  it('returns the first successful result', async () => {
    let calls = 0;
    const result = await retryWithBackoff(
      async () => {
        calls += 1;
        if (calls < 3) throw new Error(`attempt ${calls}`);
        return 'done';
      },
      { baseDelayMs: 1, maxDelayMs: 1 }
    );
    expect(result).toBe('done');
    expect(calls).toBe(3);
  });

  it('gives up after maxAttempts', async () => {
    let calls = 0;
    const failing = async (): Promise<string> => {
      calls += 1;
      throw new Error('still down');
    };
    await expect(retryWithBackoff(failing, { maxAttempts: 2, baseDelayMs: 1 })).rejects.toThrow('still down');
    expect(calls).toBe(2);
  });

  it('rethrows at once when shouldRetry declines', async () => {
    let calls = 0;
    const failing = async (): Promise<string> => {
      calls += 1;
      throw new Error('fatal');
    };
    await expect(retryWithBackoff(failing, { shouldRetry: () => false })).rejects.toThrow('fatal');
    expect(calls).toBe(1);
  });
});
