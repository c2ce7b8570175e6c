import type winston from "winston";
import { TransientRemoteError } from "../core/Errors";

export type Sleeper = (ms: number) => Promise<void>;

export const sleep: Sleeper = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms));

export interface ThrottleDelays {
  searchDelayMs: number;
  batchDelayMs: number;
  playlistDelayMs: number;
  retryBackoffMs: number;
}

export const DEFAULT_DELAYS: ThrottleDelays = {
  searchDelayMs: 1500,
  batchDelayMs: 3000,
  playlistDelayMs: 5000,
  retryBackoffMs: 5000,
};

/**
 * Cooperative rate limiting for the target platform. Every pause goes through
 * the injected sleeper so tests can record them instead of waiting.
 */
export class Throttle {
  constructor(
    private readonly delays: ThrottleDelays = DEFAULT_DELAYS,
    private readonly sleeper: Sleeper = sleep
  ) {}

  afterSearch(): Promise<void> {
    return this.pause(this.delays.searchDelayMs);
  }

  afterBatch(): Promise<void> {
    return this.pause(this.delays.batchDelayMs);
  }

  betweenPlaylists(): Promise<void> {
    return this.pause(this.delays.playlistDelayMs);
  }

  /** Linear backoff, stretched to the server's Retry-After hint when larger */
  beforeRetry(attempt: number, retryAfterMs?: number): Promise<void> {
    const backoff = this.delays.retryBackoffMs * attempt;
    return this.pause(Math.max(backoff, retryAfterMs ?? 0));
  }

  private async pause(ms: number): Promise<void> {
    if (ms > 0) {
      await this.sleeper(ms);
    }
  }
}

export interface RetryOptions {
  /** Retries after the first attempt */
  maxRetries: number;
  throttle: Throttle;
  label: string;
  logger?: winston.Logger;
}

/**
 * Runs `operation`, retrying only on TransientRemoteError. The last error is
 * rethrown once the retries are spent; `attempts` reports how many were made.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  let attempt = 0;

  while (true) {
    attempt++;
    try {
      return await operation(attempt);
    } catch (error) {
      if (!(error instanceof TransientRemoteError) || attempt > options.maxRetries) {
        throw error;
      }
      options.logger?.warn(
        `⚠️ ${options.label} failed (attempt ${attempt}/${
          options.maxRetries + 1
        }), retrying: ${error.message}`
      );
      await options.throttle.beforeRetry(attempt, error.retryAfterMs);
    }
  }
}
