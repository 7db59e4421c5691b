import { setTimeout as delay } from "node:timers/promises";
import { logger as rootLogger, type Logger } from "../logger.js";
import type { LlmResult } from "../llm/agents.js";

export interface RetryPolicy {
  /** Total attempts while the call keeps reporting a rate limit. */
  maxRetries: number;
  baseDelaySeconds: number;
  maxDelaySeconds: number;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  logger?: Logger;
}

const JITTER_FRACTION = 0.1;

/** `min(base * 2^attempt, max)` plus up to 10% jitter, never above `max`. */
export function backoffDelaySeconds(attempt: number, base: number, max: number, random: () => number = Math.random): number {
  const exponential = Math.min(base * 2 ** attempt, max);
  return Math.min(exponential + exponential * JITTER_FRACTION * random(), max);
}

/**
 * Retries only on a `rate_limited` error. Any other failure, or the last
 * rate-limited attempt, is returned to the caller unchanged.
 */
export async function withRateLimitRetry<T>(call: () => Promise<LlmResult<T>>, policy: RetryPolicy): Promise<LlmResult<T>> {
  const sleep = policy.sleep ?? ((ms: number) => delay(ms));
  const random = policy.random ?? Math.random;
  const log = (policy.logger ?? rootLogger).child({ component: "backoff" });
  const attempts = Math.max(1, policy.maxRetries);

  for (let attempt = 0; ; attempt++) {
    const result = await call();
    if (result.ok || result.error.kind !== "rate_limited" || attempt + 1 >= attempts) {
      if (!result.ok && result.error.kind === "rate_limited") {
        log.error("Rate limit retries exhausted", { attempts });
      }
      return result;
    }

    const seconds =
      result.error.retryAfterSeconds !== undefined
        ? Math.min(result.error.retryAfterSeconds, policy.maxDelaySeconds)
        : backoffDelaySeconds(attempt, policy.baseDelaySeconds, policy.maxDelaySeconds, random);
    log.warn("Rate limited, backing off", { attempt: attempt + 1, of: attempts, delay_s: Number(seconds.toFixed(2)) });
    await sleep(seconds * 1000);
  }
}
