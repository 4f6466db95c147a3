import { isAbortError, PolicyWallError, RetryExhaustedError } from "../core/errors.js";
import { sleep as defaultSleep, type Sleeper } from "./delay.js";
import { logger } from "./logger.js";

export interface BackoffOptions {
  sleep?: Sleeper;
  signal?: AbortSignal;
  /** Return false to rethrow the error immediately instead of retrying. */
  shouldRetry?: (error: unknown) => boolean;
  label?: string;
}

function retryable(error: unknown): boolean {
  return !(error instanceof PolicyWallError) && !isAbortError(error);
}

/**
 * Runs `operation`, retrying up to `maxRetries` more times. The pause before
 * retry n is `initialDelayMs * 2^(n-1)`, capped at `maxDelayMs`.
 */
export async function withBackoff<T>(
  operation: () => Promise<T>,
  maxRetries: number,
  initialDelayMs: number,
  maxDelayMs: number,
  options: BackoffOptions = {}
): Promise<T> {
  const pause = options.sleep ?? defaultSleep;
  const shouldRetry = options.shouldRetry ?? retryable;
  let backoff = initialDelayMs;
  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt += 1) {
    try {
      return await operation();
    } catch (error) {
      if (!shouldRetry(error)) {
        throw error;
      }
      lastError = error;
    }

    if (attempt === maxRetries) {
      break;
    }

    logger.debug(`Retrying ${options.label ?? "operation"}`, {
      attempt: attempt + 1,
      delayMs: backoff,
      error: lastError
    });
    await pause(backoff, options.signal);
    backoff = Math.min(backoff * 2, maxDelayMs);
  }

  throw new RetryExhaustedError(maxRetries, lastError);
}

export interface PollOptions {
  sleep?: Sleeper;
  signal?: AbortSignal;
}

/**
 * Re-runs `check` every `intervalMs` until it holds, for at most
 * `ceil(timeoutMs / intervalMs)` pauses. Resolves false on timeout and
 * rejects as soon as `signal` aborts.
 */
export async function pollUntil(
  check: () => Promise<boolean>,
  timeoutMs: number,
  intervalMs: number,
  options: PollOptions = {}
): Promise<boolean> {
  const pause = options.sleep ?? defaultSleep;
  const ticks = Math.ceil(timeoutMs / intervalMs);
  for (let tick = 0; ; tick += 1) {
    options.signal?.throwIfAborted();
    if (await check()) {
      return true;
    }
    if (tick >= ticks) {
      return false;
    }
    await pause(intervalMs, options.signal);
  }
}
