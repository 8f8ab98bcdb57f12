import { describe, expect, it, vi } from 'vitest';

import { GatewayError, MalformedModelOutputError } from '../../src/core/errors.js';
import { classifyGatewayFailure, retryWithBackoff } from '../../src/core/retry.js';

describe('classifyGatewayFailure', () => {
  it('marks auth and request failures as terminal', () => {
    expect(classifyGatewayFailure(new Error('401 Incorrect API key provided')).classification).toBe('terminal');
    expect(classifyGatewayFailure(new Error('403 permission denied')).classification).toBe('terminal');
    expect(classifyGatewayFailure(new MalformedModelOutputError('bad', '{}')).reasonCode).toBe(
      'gateway.terminal.malformed_output'
    );
  });

  it('marks capacity and network failures as retryable', () => {
    expect(classifyGatewayFailure(new Error('Request timed out.')).classification).toBe('retryable');
    expect(classifyGatewayFailure(new Error('429 rate limit reached')).classification).toBe('retryable');
    expect(classifyGatewayFailure(new Error('socket hang up')).classification).toBe('retryable');
    expect(classifyGatewayFailure('network EAI_AGAIN').classification).toBe('retryable');
  });

  it('trusts the flag on a GatewayError', () => {
    expect(classifyGatewayFailure(new GatewayError('timeout', { retryable: false })).classification).toBe(
      'terminal'
    );
    expect(classifyGatewayFailure(new GatewayError('odd', { retryable: true })).classification).toBe(
      'retryable'
    );
  });

  it('treats unknown failures as terminal', () => {
    expect(classifyGatewayFailure(new Error('something odd')).reasonCode).toBe('gateway.terminal.unknown');
  });
});

describe('retryWithBackoff', () => {
  it('doubles the delay up to the cap', async () => {
    const sleep = vi.fn(async (_ms: number) => undefined);
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('a'))
      .mockRejectedValueOnce(new Error('b'))
      .mockRejectedValueOnce(new Error('c'))
      .mockResolvedValueOnce('done');

    const result = await retryWithBackoff(fn, { retries: 3, baseDelayMs: 100, maxDelayMs: 250, sleep });

    expect(result).toBe('done');
    expect(sleep.mock.calls.map((call) => call[0])).toEqual([100, 200, 250]);
  });

  it('rethrows the last error when retries run out', async () => {
    const fn = vi.fn(async () => {
      throw new Error('still failing');
    });

    await expect(
      retryWithBackoff(fn, { retries: 1, baseDelayMs: 0, maxDelayMs: 0, sleep: async () => undefined })
    ).rejects.toThrow('still failing');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('stops at once when the error is not retryable', async () => {
    const onRetry = vi.fn();
    const fn = vi.fn(async () => {
      throw new Error('fatal');
    });

    await expect(
      retryWithBackoff(fn, { retries: 5, baseDelayMs: 0, maxDelayMs: 0, isRetryable: () => false, onRetry })
    ).rejects.toThrow('fatal');
    expect(fn).toHaveBeenCalledTimes(1);
    expect(onRetry).not.toHaveBeenCalled();
  });

  it('reports each retry', async () => {
    const onRetry = vi.fn();
    const fn = vi.fn<() => Promise<number>>().mockRejectedValueOnce(new Error('x')).mockResolvedValueOnce(7);

    await retryWithBackoff(fn, { retries: 2, baseDelayMs: 0, maxDelayMs: 0, onRetry });

    expect(onRetry).toHaveBeenCalledWith(
      expect.objectContaining({ attempt: 1, retriesLeft: 2, delayMs: 0 })
    );
  });
});
