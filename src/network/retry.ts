/**
 * Retry decorator for fetch attempts
 */

import { setTimeout as delay } from "node:timers/promises";
import type { FetchResult } from "../types.js";

export interface RetryOptions {
  retries: number;
  backoffMs: number;
  signal?: AbortSignal;
}

/** Only outcomes that might succeed on a second try */
export function isRetryable(result: FetchResult): boolean {
  return result.status === "transport-error" || result.status === "server-error";
}

/**
 * Re-run an attempt with exponential backoff while it keeps failing in a
 * retryable way. Returns the last result; never throws.
 */
export async function withRetry(
  attempt: () => Promise<FetchResult>,
  { retries, backoffMs, signal }: RetryOptions,
): Promise<FetchResult> {
  let result = await attempt();
  for (let i = 0; i < retries && isRetryable(result); i++) {
    if (signal?.aborted) break;
    try {
      await delay(backoffMs * 2 ** i, undefined, { signal });
    } catch {
      break; // aborted during backoff
    }
    result = await attempt();
  }
  return result;
}
