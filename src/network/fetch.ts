/**
 * Bounded-concurrency fetching with manual redirect handling
 */

import { setTimeout as delay } from "node:timers/promises";
import pLimit, { type LimitFunction } from "p-limit";
import { errorMessage } from "../errors.js";
import type { FetchFailure, FetchResult } from "../types.js";
import { withRetry } from "./retry.js";

const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36";

const BASE_REQUEST_HEADERS: Record<string, string> = {
  "User-Agent": DEFAULT_USER_AGENT,
  Accept:
    "text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,image/apng,*/*;q=0.8",
  "Accept-Language": "en-US,en;q=0.9,de;q=0.8",
  "Cache-Control": "no-cache",
  Pragma: "no-cache",
};

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

/** Anything shaped like the global fetch */
export type Transport = (url: string, init: RequestInit) => Promise<Response>;

export interface FetcherOptions {
  maxConcurrency: number;
  timeoutMs: number;
  maxRedirects: number;
  retries?: number;
  backoffMs?: number;
  /** Politeness delay before each request, with up to 20% jitter */
  delayMs?: number;
  userAgent?: string;
  referer?: string;
  /** Redirect hops to URLs failing this test are not followed */
  allowRedirect?: (url: URL) => boolean;
  /**
   * Called for each in-scope hop of a request for `from`. Returning false
   * means `to` is fetched by another request: the hop is not followed and
   * the result is `aliased`.
   */
  claimRedirect?: (from: string, to: URL) => boolean;
  transport?: Transport;
}

/**
 * Build headers for a specific request, including Referer
 */
function buildRequestHeaders(url: string, options: FetcherOptions): Record<string, string> {
  const headers = { ...BASE_REQUEST_HEADERS };
  if (options.userAgent) {
    headers["User-Agent"] = options.userAgent;
  }
  if (options.referer) {
    headers.Referer = options.referer;
  } else {
    headers.Referer = `${new URL(url).origin}/`;
  }
  return headers;
}

async function discard(res: Response): Promise<void> {
  try {
    await res.body?.cancel();
  } catch {
    // the connection is already gone
  }
}

/**
 * The pool is the crawl's only backpressure: every request, sitemap lookups
 * included, waits for one of `maxConcurrency` slots.
 */
export class FetcherPool {
  private readonly limit: LimitFunction;
  private readonly transport: Transport;

  constructor(private readonly options: FetcherOptions) {
    this.limit = pLimit(options.maxConcurrency);
    this.transport = options.transport ?? ((url, init) => fetch(url, init));
  }

  /**
   * Fetch a URL, following redirects. Network failures, HTTP errors,
   * redirect problems and claimed hops come back as FetchResult values;
   * this never rejects.
   */
  fetch(url: string, signal?: AbortSignal): Promise<FetchResult> {
    const { retries = 0, backoffMs = 400 } = this.options;
    return this.limit(() =>
      withRetry(() => this.fetchOnce(url, signal), { retries, backoffMs, signal }),
    );
  }

  get activeCount(): number {
    return this.limit.activeCount;
  }

  get pendingCount(): number {
    return this.limit.pendingCount;
  }

  private async fetchOnce(url: string, signal?: AbortSignal): Promise<FetchResult> {
    const { maxRedirects, timeoutMs, delayMs = 0, allowRedirect, claimRedirect } = this.options;
    const headers = buildRequestHeaders(url, this.options);
    const seen = new Set<string>([url]);
    let current = url;

    const fail = (
      status: FetchFailure["status"],
      kind: FetchFailure["kind"],
      message: string,
      statusCode?: number,
    ): FetchFailure => ({ status, kind, message, statusCode, url, finalUrl: current });

    for (let hop = 0; ; hop++) {
      const timeout = AbortSignal.timeout(timeoutMs);
      const requestSignal = signal ? AbortSignal.any([signal, timeout]) : timeout;

      let res: Response;
      try {
        if (delayMs > 0) {
          const jitter = Math.floor(Math.random() * Math.max(1, delayMs * 0.2));
          await delay(delayMs + jitter, undefined, { signal: requestSignal });
        }
        res = await this.transport(current, { redirect: "manual", headers, signal: requestSignal });
      } catch (err) {
        return fail("transport-error", "TransportError", transportMessage(err, timeout, timeoutMs));
      }

      if (REDIRECT_STATUSES.has(res.status)) {
        await discard(res);
        const location = res.headers.get("location");
        if (!location) {
          return fail("redirect", "RedirectLoop", `HTTP ${res.status} without Location`, res.status);
        }
        let next: URL;
        try {
          next = new URL(location, current);
        } catch {
          return fail("redirect", "RedirectLoop", `Invalid Location: ${location}`, res.status);
        }
        next.hash = "";
        if (hop >= maxRedirects) {
          return fail("redirect", "RedirectLoop", `More than ${maxRedirects} redirects`, res.status);
        }
        if (seen.has(next.href)) {
          return fail("redirect", "RedirectLoop", `Redirect cycle at ${next.href}`, res.status);
        }
        if (allowRedirect && !allowRedirect(next)) {
          return fail(
            "redirect",
            "RedirectOutOfScope",
            `Redirects out of scope to ${next.href}`,
            res.status,
          );
        }
        if (claimRedirect && !claimRedirect(url, next)) {
          return { status: "aliased", url, finalUrl: next.href, statusCode: res.status };
        }
        seen.add(next.href);
        current = next.href;
        continue;
      }

      if (!res.ok) {
        await discard(res);
        const status = res.status >= 500 ? "server-error" : "client-error";
        return fail(status, "HTTPError", `HTTP ${res.status}`, res.status);
      }

      try {
        const body = Buffer.from(await res.arrayBuffer());
        return {
          status: "success",
          url,
          finalUrl: current,
          statusCode: res.status,
          contentType: res.headers.get("content-type") ?? "",
          body,
        };
      } catch (err) {
        return fail("transport-error", "TransportError", transportMessage(err, timeout, timeoutMs));
      }
    }
  }
}

function transportMessage(err: unknown, timeout: AbortSignal, timeoutMs: number): string {
  return timeout.aborted ? `Timed out after ${timeoutMs}ms` : errorMessage(err);
}
