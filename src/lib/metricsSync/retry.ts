/**
 * Bounded retry with exponential backoff for store calls.
 *
 * Invariants:
 * - Explicit attempt loop, no recursion
 * - Delay before attempt k+1 is baseDelayMs × 2^(k-1): 1s, 2s, 4s, 8s by default
 * - Errors flagged `retryable: false` propagate immediately
 * - Exhaustion throws RetryExhaustedError wrapping the last error
 */

// ─── Constants ───────────────────────────────────────────────────────────────

export const DEFAULT_MAX_ATTEMPTS = 5;
export const DEFAULT_BASE_DELAY_MS = 1_000;

// ─── Types ───────────────────────────────────────────────────────────────────

export type Sleep = (ms: number) => Promise<void>;

export interface RetryOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  sleep?: Sleep;
  logger?: Pick<Console, "warn">;
}

export class RetryExhaustedError extends Error {
  readonly code = "RETRY_EXHAUSTED";
  readonly attempts: number;

  constructor(tag: string, attempts: number, cause: unknown) {
    super(`${tag} failed after ${attempts} attempts: ${errorMessage(cause)}`, { cause });
    this.name = "RetryExhaustedError";
    this.attempts = attempts;
  }
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/**
 * Everything is retryable unless the error says otherwise.
 */
export function isRetryableError(err: unknown): boolean {
  if (err instanceof Error && "retryable" in err) {
    return err.retryable !== false;
  }
  return true;
}

export function backoffDelayMs(attempt: number, baseDelayMs: number): number {
  return baseDelayMs * Math.pow(2, attempt - 1);
}

// ─── Retry Wrapper ───────────────────────────────────────────────────────────

export async function withRetry<T>(
  tag: string,
  fn: () => Promise<T>,
  opts?: RetryOptions,
): Promise<T> {
  const maxAttempts = Math.max(1, opts?.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
  const baseDelayMs = opts?.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
  const wait = opts?.sleep ?? sleep;
  const logger = opts?.logger ?? console;

  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (err: unknown) {
      lastError = err;

      if (!isRetryableError(err)) throw err;
      if (attempt === maxAttempts) break;

      const delayMs = backoffDelayMs(attempt, baseDelayMs);
      logger.warn(`[retry] ${tag} attempt ${attempt}/${maxAttempts} failed, retrying in ${delayMs}ms`, {
        message: errorMessage(err),
      });
      await wait(delayMs);
    }
  }

  throw new RetryExhaustedError(tag, maxAttempts, lastError);
}
