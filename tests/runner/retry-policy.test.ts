import { describe, it, expect, vi } from 'vitest';
import { RetryPolicy, withRetry } from '../../src/runner/retry-policy.js';
import { ConnectionLost, DialError, ProtocolError } from '../../src/exception/errors.js';

const noWait = (): Promise<void> => Promise.resolve();

describe('RetryPolicy.attempts', () => {
  it('yields one constant delay per retry', () => {
    expect(RetryPolicy.attempts({ maxRetries: 3, retryDelayMs: 250 })).toEqual([250, 250, 250]);
  });

  it('yields nothing when retries are disabled', () => {
    expect(RetryPolicy.attempts({ maxRetries: 0, retryDelayMs: 250 })).toEqual([]);
  });
});

describe('withRetry', () => {
  it('retries retryable errors until the call succeeds', async () => {
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new DialError('refused', 'ws://127.0.0.1:9222'))
      .mockRejectedValueOnce(new ConnectionLost())
      .mockResolvedValueOnce('ok');
    const onRetry = vi.fn();

    await expect(withRetry(fn, { maxRetries: 3, retryDelayMs: 10 }, { sleep: noWait, onRetry })).resolves.toBe('ok');
    expect(fn.mock.calls.map((call) => call[0])).toEqual([0, 1, 2]);
    expect(onRetry.mock.calls.map((call) => [call[1], call[2]])).toEqual([
      [1, 10],
      [2, 10],
    ]);
  });

  it('does not retry protocol errors', async () => {
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValue(new ProtocolError('DOM.focus', -32000, 'nope'));
    await expect(withRetry(fn, { maxRetries: 3, retryDelayMs: 10 }, { sleep: noWait })).rejects.toBeInstanceOf(
      ProtocolError,
    );
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('throws the last error once retries run out', async () => {
    const fn = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValue(new ConnectionLost('gone'));
    await expect(withRetry(fn, { maxRetries: 2, retryDelayMs: 10 }, { sleep: noWait })).rejects.toThrow('gone');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('honours a custom retry predicate', async () => {
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new Error('flaky'))
      .mockResolvedValue('ok');
    await expect(
      withRetry(fn, { maxRetries: 1, retryDelayMs: 0 }, { sleep: noWait, isRetryable: () => true }),
    ).resolves.toBe('ok');
  });
});
