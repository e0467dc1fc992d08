import { sleep } from '../utils.js';

export interface BackoffPolicy {
  maxAttempts: number;
  unitMs: number;
  maxDelayMs: number;
  /** Fraction of the delay added as random jitter (0 disables jitter). */
  jitterRatio?: number;
}

export type AttemptVerdict<T> =
  | { done: true; value: T }
  | { done: false; retryable: true; reason: string }
  | { done: false; retryable: false; reason: string };

export type RetryResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; reason: string; attempts: number; exhausted: boolean };

interface RetryOptions {
  signal?: AbortSignal;
  random?: () => number;
  wait?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export function backoffDelayMs(policy: BackoffPolicy, attempt: number, random: () => number = Math.random): number {
  if (policy.unitMs <= 0) {
    return 0;
  }
  const exponentialMs = policy.unitMs * 2 ** attempt;
  const cappedMs = Math.min(policy.maxDelayMs, exponentialMs);
  const jitterRatio = policy.jitterRatio ?? 0.2;
  const jitterMs = Math.floor(random() * Math.max(1, Math.floor(cappedMs * jitterRatio)));
  return cappedMs + jitterMs;
}

/**
 * Runs `attempt` until it reports done, reports a terminal failure, or the
 * attempt ceiling is reached. Waits `unitMs * 2^attempt` (capped, jittered)
 * between retryable failures. Aborting the signal rejects the pending wait.
 */
export async function retryWithBackoff<T>(
  policy: BackoffPolicy,
  attempt: (attemptNumber: number) => Promise<AttemptVerdict<T>>,
  options: RetryOptions = {},
): Promise<RetryResult<T>> {
  const maxAttempts = Math.max(1, policy.maxAttempts);
  const wait = options.wait ?? sleep;
  let lastReason = 'no attempts made';

  for (let attemptNumber = 1; attemptNumber <= maxAttempts; attemptNumber += 1) {
    const verdict = await attempt(attemptNumber);
    if (verdict.done) {
      return { ok: true, value: verdict.value, attempts: attemptNumber };
    }

    lastReason = verdict.reason;
    if (!verdict.retryable) {
      return { ok: false, reason: verdict.reason, attempts: attemptNumber, exhausted: false };
    }

    if (attemptNumber < maxAttempts) {
      await wait(backoffDelayMs(policy, attemptNumber, options.random), options.signal);
    }
  }

  return { ok: false, reason: lastReason, attempts: maxAttempts, exhausted: true };
}
