import { normalizeError, ReadinessTimeoutError } from "../../common/src/errors.js";

export interface WaitPolicy {
  /** 0 retries forever. */
  maxAttempts: number;
  intervalMs: number;
  backoffFactor: number;
  maxIntervalMs: number;
}

export const UNBOUNDED_FIXED_POLICY: WaitPolicy = {
  maxAttempts: 0,
  intervalMs: 2000,
  backoffFactor: 1,
  maxIntervalMs: 30000,
};

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryFailure {
  attempt: number;
  delayMs: number;
  error: unknown;
}

export interface RetryOptions {
  sleep?: Sleep;
  signal?: AbortSignal;
  onFailure?: (failure: RetryFailure) => void;
}

export interface RetryOutcome {
  attempts: number;
  elapsedMs: number;
}

export function wait(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export function delayFor(policy: WaitPolicy, failedAttempt: number): number {
  const raw = policy.intervalMs * Math.pow(policy.backoffFactor, failedAttempt - 1);
  return Math.min(raw, Math.max(policy.maxIntervalMs, policy.intervalMs));
}

export async function retryUntilSuccess(
  policy: WaitPolicy,
  handler: () => Promise<void>,
  options: RetryOptions = {},
): Promise<RetryOutcome> {
  const sleep = options.sleep ?? wait;
  const startedAt = Date.now();
  let attempt = 1;

  for (;;) {
    if (options.signal?.aborted) {
      throw options.signal.reason;
    }

    try {
      await handler();
      return { attempts: attempt, elapsedMs: Date.now() - startedAt };
    } catch (error) {
      if (policy.maxAttempts > 0 && attempt >= policy.maxAttempts) {
        throw new ReadinessTimeoutError(attempt, normalizeError(error));
      }

      const delayMs = delayFor(policy, attempt);
      options.onFailure?.({ attempt, delayMs, error });
      await sleep(delayMs, options.signal);
      attempt += 1;
    }
  }
}
