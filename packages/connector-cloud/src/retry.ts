/**
 * Retry policy for reads against an organization.
 * Writes never go through it: a failed batch create or rule add is reported once.
 */

import { ConnectorError, type ErrorCode } from '@fieldport/core';

export interface RetryConfig {
  /** Total attempts per read, the first one included (default: 1) */
  attempts?: number;
  /** Delay before the second attempt; doubles for each further one (default: 200ms) */
  baseDelayMs?: number;
  /** Upper bound for a single delay (default: 5000ms) */
  maxDelayMs?: number;
  /** Random spread applied to each delay, between 0 and 1 (default: 0.2) */
  jitter?: number;
}

/** Emitted before a failed read is attempted again */
export interface ReadRetryEvent {
  orgLabel: string;
  path: string;
  /** Attempt about to start (2 or more) */
  attempt: number;
  attempts: number;
  delayMs: number;
  error: ConnectorError;
}

export type ReadRetryListener = (event: ReadRetryEvent) => void;

const RETRYABLE_CODES: ReadonlySet<ErrorCode> = new Set<ErrorCode>([
  'TIMEOUT',
  'CONNECTION_FAILED',
  'RATE_LIMITED',
]);

export function isRetryableConnectorError(err: unknown): err is ConnectorError {
  return err instanceof ConnectorError && RETRYABLE_CODES.has(err.code);
}

export class ReadRetryPolicy {
  private readonly attempts: number;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly jitter: number;

  constructor(
    config: RetryConfig = {},
    private readonly onRetry?: ReadRetryListener
  ) {
    this.attempts = Math.max(1, Math.floor(config.attempts ?? 1));
    this.baseDelayMs = Math.max(0, config.baseDelayMs ?? 200);
    this.maxDelayMs = Math.max(0, config.maxDelayMs ?? 5000);
    this.jitter = Math.min(1, Math.max(0, config.jitter ?? 0.2));
  }

  /**
   * Run `read`, repeating it after timeouts, connection failures and rate limits.
   * Any other error, or the last attempt's error, is rethrown as is.
   */
  async run<T>(orgLabel: string, path: string, read: () => Promise<T>): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await read();
      } catch (err) {
        if (attempt >= this.attempts || !isRetryableConnectorError(err)) {
          throw err;
        }

        const delayMs = this.delayAfter(attempt);
        this.onRetry?.({
          orgLabel,
          path,
          attempt: attempt + 1,
          attempts: this.attempts,
          delayMs,
          error: err,
        });
        if (delayMs > 0) {
          await new Promise<void>((resolve) => setTimeout(resolve, delayMs));
        }
      }
    }
  }

  private delayAfter(failedAttempt: number): number {
    const capped = Math.min(this.maxDelayMs, this.baseDelayMs * 2 ** (failedAttempt - 1));
    const spread = 1 + (Math.random() * 2 - 1) * this.jitter;
    return Math.max(0, Math.round(capped * spread));
  }
}
