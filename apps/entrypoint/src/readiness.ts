import type { AppEnv } from "../../common/src/env.js";
import { normalizeError } from "../../common/src/errors.js";
import { logger, type Logger } from "../../common/src/logger.js";
import {
  retryUntilSuccess,
  type RetryOutcome,
  type Sleep,
  type WaitPolicy,
} from "./retry.js";

export type DatabaseProbe = () => Promise<void>;

export interface WaitForDatabaseOptions {
  sleep?: Sleep;
  signal?: AbortSignal;
  log?: Logger;
  target?: string;
}

export function waitPolicyFromEnv(env: AppEnv): WaitPolicy {
  return {
    maxAttempts: env.DB_WAIT_MAX_ATTEMPTS,
    intervalMs: env.DB_WAIT_INTERVAL_MS,
    backoffFactor: env.DB_WAIT_BACKOFF_FACTOR,
    maxIntervalMs: env.DB_WAIT_MAX_INTERVAL_MS,
  };
}

/**
 * Blocks until `probe` resolves. Every failed attempt that will be retried
 * produces exactly one "not ready" line; connection refusals and
 * authentication failures are retried alike.
 */
export async function waitForDatabase(
  probe: DatabaseProbe,
  policy: WaitPolicy,
  options: WaitForDatabaseOptions = {},
): Promise<RetryOutcome> {
  const log = options.log ?? logger;

  log.info("waiting for Postgres...", {
    target: options.target,
    maxAttempts: policy.maxAttempts === 0 ? "unbounded" : policy.maxAttempts,
  });

  const outcome = await retryUntilSuccess(policy, probe, {
    sleep: options.sleep,
    signal: options.signal,
    onFailure: ({ attempt, delayMs, error }) => {
      log.info("Postgres is not ready, retrying", {
        attempt,
        retryInMs: delayMs,
        error: normalizeError(error),
      });
    },
  });

  log.info("Postgres ready", {
    attempts: outcome.attempts,
    elapsedMs: outcome.elapsedMs,
  });
  return outcome;
}
