import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { setTimeout as delay } from 'node:timers/promises';
import type { Transport } from '../../network/fetch.js';

export type Route =
  | {
      status?: number;
      body?: string | Buffer;
      contentType?: string;
      headers?: Record<string, string>;
      delayMs?: number;
    }
  | Error;

export interface FakeSite {
  transport: Transport;
  /** Every URL requested, in order */
  calls: string[];
  /** Highest number of requests open at once */
  maxActive(): number;
}

/**
 * In-process stand-in for a web server. Unknown URLs answer 404.
 */
export function fakeSite(routes: Record<string, Route>): FakeSite {
  const calls: string[] = [];
  let active = 0;
  let peak = 0;

  const transport: Transport = async (url, init) => {
    calls.push(url);
    active++;
    peak = Math.max(peak, active);
    try {
      const route = routes[url];
      if (!route) {
        return new Response('not found', { status: 404, headers: { 'content-type': 'text/plain' } });
      }
      if (route instanceof Error) throw route;
      if (route.delayMs) {
        await delay(route.delayMs, undefined, { signal: init.signal ?? undefined });
      }
      const status = route.status ?? 200;
      return new Response(status >= 300 && status < 400 ? null : (route.body ?? ''), {
        status,
        headers: { 'content-type': route.contentType ?? 'text/html', ...route.headers },
      });
    } finally {
      active--;
    }
  };

  return { transport, calls, maxActive: () => peak };
}

export function html(body: string, head = ''): string {
  return `<!DOCTYPE html><html><head>${head}</head><body>${body}</body></html>`;
}

export async function tempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'webmirror-'));
}
