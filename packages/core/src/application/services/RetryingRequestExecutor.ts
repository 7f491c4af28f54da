import { setTimeout as delay } from 'node:timers/promises';
import type { ErrorKind, GeocodingError } from '../../domain/errors/GeocodingError.js';
import { classifyError } from '../../domain/services/ErrorClassifier.js';

/** Backoff configuration. Delay for attempt `n`: `min(base × factor^(n-1) × (1 + jitter × rand()), maxDelay)`. */
export interface RetryPolicy {
  /** Retries after the first attempt. */
  readonly retries: number;
  readonly baseDelayMs: number;
  readonly factor: number;
  readonly jitter: number;
  readonly maxDelayMs: number;
}

/** Published before each retry sleep. */
export interface RetryAttempt {
  /** The attempt that just failed (1-based). */
  readonly attempt: number;
  readonly maxAttempts: number;
  readonly delayMs: number;
  readonly errorKind: ErrorKind;
  readonly error: GeocodingError;
}

export type RequestOutcome<T> =
  | { readonly success: true; readonly value: T; readonly attempts: number }
  | { readonly success: false; readonly error: GeocodingError; readonly attempts: number };

export interface RetryingRequestExecutorOptions {
  /** Called before each retry sleep. */
  readonly onRetry?: (attempt: RetryAttempt) => void;
  /** Source of randomness for jitter, in `[0, 1)`. Default: `Math.random`. */
  readonly random?: () => number;
  /** Default: a timer that rejects as soon as `signal` aborts. */
  readonly sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  /** Once aborted, pending backoff ends and no further attempt starts; the last failure is returned. */
  readonly signal?: AbortSignal;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  retries: 5,
  baseDelayMs: 1000,
  factor: 2,
  jitter: 0.1,
  maxDelayMs: 60_000,
};

async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  await delay(ms, undefined, { signal });
}

/**
 * Runs one logical request with bounded exponential-backoff retry.
 *
 * Never rejects: failures come back classified in a `RequestOutcome`. Errors
 * the classifier marks non-retryable end the loop after the attempt that raised them.
 */
export class RetryingRequestExecutor {
  private readonly policy: RetryPolicy;
  private readonly onRetry: ((attempt: RetryAttempt) => void) | null;
  private readonly random: () => number;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly signal: AbortSignal | null;

  constructor(policy: Partial<RetryPolicy> = {}, options: RetryingRequestExecutorOptions = {}) {
    this.policy = { ...DEFAULT_RETRY_POLICY, ...policy };
    this.onRetry = options.onRetry ?? null;
    this.random = options.random ?? Math.random;
    this.sleep = options.sleep ?? sleep;
    this.signal = options.signal ?? null;
  }

  get maxAttempts(): number {
    return this.policy.retries + 1;
  }

  /** Backoff before the retry that follows failed attempt `attempt` (1-based). */
  delayFor(attempt: number): number {
    const { baseDelayMs, factor, jitter, maxDelayMs } = this.policy;
    const delay = baseDelayMs * Math.pow(factor, attempt - 1) * (1 + jitter * this.random());
    return Math.min(delay, maxDelayMs);
  }

  async execute<T>(request: (attempt: number) => Promise<T>): Promise<RequestOutcome<T>> {
    const maxAttempts = this.maxAttempts;

    for (let attempt = 1; ; attempt++) {
      try {
        const value = await request(attempt);
        return { success: true, value, attempts: attempt };
      } catch (raw) {
        const classified = classifyError(raw);

        if (!classified.retryable || attempt >= maxAttempts || this.signal?.aborted) {
          return { success: false, error: classified.error, attempts: attempt };
        }

        const delayMs = this.delayFor(attempt);
        this.onRetry?.({ attempt, maxAttempts, delayMs, errorKind: classified.kind, error: classified.error });
        try {
          await (this.signal ? this.sleep(delayMs, this.signal) : this.sleep(delayMs));
        } catch (error) {
          if (!this.signal?.aborted) throw error;
        }
        if (this.signal?.aborted) {
          return { success: false, error: classified.error, attempts: attempt };
        }
      }
    }
  }
}
