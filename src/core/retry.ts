import { GatewayError, MalformedModelOutputError, describeError } from './errors.js';

export type FailureRetryClass = 'retryable' | 'terminal';

export interface FailureClassification {
  classification: FailureRetryClass;
  reasonCode: string;
}

const TERMINAL_PATTERNS = [
  'invalid api key',
  'incorrect api key',
  'unauthorized',
  '401',
  '403',
  'permission',
  'invalid_request_error',
  'context length',
];

const RETRYABLE_PATTERNS = [
  'timeout',
  'timed out',
  'rate limit',
  '429',
  '500',
  '502',
  '503',
  '504',
  'overloaded',
  'temporarily unavailable',
  'network',
  'econnreset',
  'econnrefused',
  'eai_again',
  'socket hang up',
];

/**
 * Decide whether a failed model call is worth another attempt.
 */
export function classifyGatewayFailure(error: unknown): FailureClassification {
  if (error instanceof MalformedModelOutputError) {
    return { classification: 'terminal', reasonCode: 'gateway.terminal.malformed_output' };
  }
  if (error instanceof GatewayError) {
    return error.retryable
      ? { classification: 'retryable', reasonCode: 'gateway.retryable.flagged' }
      : { classification: 'terminal', reasonCode: 'gateway.terminal.flagged' };
  }

  const text = describeError(error).toLowerCase();
  if (TERMINAL_PATTERNS.some((p) => text.includes(p))) {
    return { classification: 'terminal', reasonCode: 'gateway.terminal.auth_or_request' };
  }
  if (RETRYABLE_PATTERNS.some((p) => text.includes(p))) {
    return { classification: 'retryable', reasonCode: 'gateway.retryable.transient' };
  }
  return { classification: 'terminal', reasonCode: 'gateway.terminal.unknown' };
}

export interface RetryOptions {
  /** Retries after the first attempt. */
  retries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterMs?: number;
  isRetryable?: (error: unknown) => boolean;
  onRetry?: (info: { attempt: number; retriesLeft: number; delayMs: number; error: unknown }) => void;
  sleep?: (ms: number) => Promise<void>;
}

function defaultSleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function toNonNegativeInt(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.max(0, Math.floor(value));
}

/**
 * Run `fn`, retrying with exponential backoff. The last error is rethrown once
 * retries run out or `isRetryable` rejects it.
 */
export async function retryWithBackoff<T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> {
  const retries = toNonNegativeInt(opts.retries);
  const baseDelayMs = toNonNegativeInt(opts.baseDelayMs);
  const maxDelayMs = Math.max(baseDelayMs, toNonNegativeInt(opts.maxDelayMs));
  const jitterMs = toNonNegativeInt(opts.jitterMs ?? 0);
  const isRetryable = opts.isRetryable ?? (() => true);
  const sleep = opts.sleep ?? defaultSleep;

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await fn();
    } catch (error) {
      const retriesLeft = retries + 1 - attempt;
      if (retriesLeft <= 0 || !isRetryable(error)) {
        throw error;
      }
      const exponential = Math.min(maxDelayMs, baseDelayMs * 2 ** (attempt - 1));
      const jitter = jitterMs > 0 ? Math.floor(Math.random() * jitterMs) : 0;
      const delayMs = exponential + jitter;
      opts.onRetry?.({ attempt, retriesLeft, delayMs, error });
      await sleep(delayMs);
    }
  }
}
