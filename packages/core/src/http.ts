import { fetch } from 'undici';
import { FetchError, isRetryableStatus } from './errors.js';

/** `Retry-After` as delay seconds or an HTTP date, in milliseconds. */
export function parseRetryAfter(value: string | null | undefined, now: number = Date.now()): number | undefined {
  if (!value) return undefined;
  const seconds = Number(value);
  if (Number.isFinite(seconds)) {
    return Math.max(0, seconds * 1000);
  }
  const date = Date.parse(value);
  return Number.isNaN(date) ? undefined : Math.max(0, date - now);
}

function toFetchError(error: unknown, url: string, ctrl: AbortController, timeoutMs: number): FetchError {
  if (error instanceof FetchError) return error;
  if (ctrl.signal.aborted) {
    return new FetchError(`Timed out after ${timeoutMs}ms for ${url}`, { cause: error });
  }
  return new FetchError(`Network error for ${url}: ${error instanceof Error ? error.message : 'Unknown error'}`, {
    cause: error
  });
}

/**
 * GETs `url` and parses the body as JSON. The timeout covers the whole
 * exchange, body included; an expired timer surfaces as a retryable
 * FetchError.
 */
export async function getJSON(
  url: string,
  headers: Record<string, string> = {},
  timeoutMs = 30000
): Promise<unknown> {
  const ctrl = new AbortController();
  const timeout = setTimeout(() => ctrl.abort(), timeoutMs);

  try {
    const res = await fetch(url, {
      signal: ctrl.signal,
      headers: {
        'User-Agent': buildUserAgent(),
        'Accept-Encoding': 'gzip',
        ...headers
      }
    });

    if (!res.ok) {
      throw new FetchError(`${res.status} ${res.statusText} for ${url}`, {
        status: res.status,
        retryable: isRetryableStatus(res.status),
        retryAfterMs: parseRetryAfter(res.headers.get('retry-after'))
      });
    }

    const text = await res.text();
    try {
      const json: unknown = JSON.parse(text);
      return json;
    } catch (error) {
      throw new FetchError(
        `Failed to parse JSON response from ${url}: ${error instanceof Error ? error.message : 'Unknown error'}`,
        { cause: error, retryable: false }
      );
    }
  } catch (error) {
    throw toFetchError(error, url, ctrl, timeoutMs);
  } finally {
    clearTimeout(timeout);
  }
}

export interface RetryPolicy {
  /** Total attempts, first try included */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 4,
  baseDelayMs: 800,
  maxDelayMs: 15000
};

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Delay before attempt `attempt + 1`: exponential from `baseDelayMs`, never
 * shorter than the server's Retry-After and never longer than `maxDelayMs`.
 */
export function backoffDelay(policy: RetryPolicy, attempt: number, error?: unknown): number {
  let delayMs = policy.baseDelayMs * 2 ** attempt;
  if (error instanceof FetchError && error.retryAfterMs !== undefined) {
    delayMs = Math.max(delayMs, error.retryAfterMs);
  }
  return Math.min(delayMs, policy.maxDelayMs);
}

export interface RetryHooks {
  sleep?: Sleep;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  hooks: RetryHooks = {}
): Promise<T> {
  const wait = hooks.sleep ?? sleep;
  const tries = Math.max(1, policy.maxAttempts);
  let lastError: unknown;

  for (let i = 0; i < tries; i++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (error instanceof FetchError && !error.retryable) {
        throw error;
      }

      if (i < tries - 1) {
        const delayMs = backoffDelay(policy, i, error);
        hooks.onRetry?.(error, i + 1, delayMs);
        await wait(delayMs);
      }
    }
  }

  throw lastError;
}

/**
 * Enforces a minimum spacing between calls to `wait()`.
 */
export class Throttle {
  private lastCallAt: number | null = null;

  constructor(
    private readonly minIntervalMs: number,
    private readonly now: () => number = Date.now,
    private readonly pause: Sleep = sleep
  ) {}

  /** Each caller reserves its slot before pausing, so concurrent callers queue up. */
  async wait(): Promise<void> {
    const now = this.now();
    const slot = this.lastCallAt === null ? now : Math.max(now, this.lastCallAt + this.minIntervalMs);
    this.lastCallAt = slot;
    if (slot > now) {
      await this.pause(slot - now);
    }
  }
}

export function buildUserAgent(contactEmail?: string): string {
  const base = 'pubintel/0.1';
  return contactEmail ? `${base} (mailto:${contactEmail})` : base;
}
