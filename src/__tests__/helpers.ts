import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { vi } from 'vitest';
import type { Logger } from '../config.js';
import type { HttpHeaders, HttpResponse, HttpTransport, TransportRequest } from '../http.js';

export type FakeClock = { now: () => number; advance: (ms: number) => void };

export function fakeClock(start = 1_000_000): FakeClock {
  let t = start;
  return {
    now: () => t,
    advance: (ms) => {
      t += ms;
    }
  };
}

/** Sleep that returns at once, records the wait and moves the clock forward. */
export function recordingSleep(clock: FakeClock, onSleep?: (ms: number) => void) {
  const waits: number[] = [];
  const sleep = async (ms: number) => {
    waits.push(ms);
    onSleep?.(ms);
    clock.advance(ms);
  };
  return { waits, sleep };
}

export function silentLogger() {
  return { log: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger;
}

export function tempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'forum-harvester-'));
}

type Reply = { status?: number; body?: string | Buffer; headers?: HttpHeaders } | Error;

/**
 * In-process stand-in for the network. Replies are queued per method and URL;
 * the last one keeps answering. Unknown URLs get a 404.
 */
export class FakeTransport implements HttpTransport {
  readonly calls: { url: string; method: TransportRequest['method'] }[] = [];
  private routes = new Map<string, Reply[]>();
  onRequest?: (url: string) => void;

  on(url: string, ...replies: Reply[]): this {
    this.routes.set(`GET ${url}`, replies);
    return this;
  }

  onHead(url: string, ...replies: Reply[]): this {
    this.routes.set(`HEAD ${url}`, replies);
    return this;
  }

  html(url: string, body: string): this {
    return this.on(url, { body, headers: { 'content-type': 'text/html; charset=utf-8' } });
  }

  urls(method: TransportRequest['method'] = 'GET'): string[] {
    return this.calls.filter((c) => c.method === method).map((c) => c.url);
  }

  async request(url: string, req: TransportRequest): Promise<HttpResponse> {
    this.calls.push({ url, method: req.method });
    this.onRequest?.(url);
    const queue = this.routes.get(`${req.method} ${url}`);
    const reply = queue && (queue.length > 1 ? queue.shift() : queue[0]);
    if (!reply) return { url, statusCode: 404, headers: {}, body: Buffer.alloc(0) };
    if (reply instanceof Error) throw reply;
    const body = typeof reply.body === 'string' ? Buffer.from(reply.body) : (reply.body ?? Buffer.alloc(0));
    return { url, statusCode: reply.status ?? 200, headers: reply.headers ?? {}, body };
  }
}

export function networkError(code: string): Error {
  return Object.assign(new Error(`connect ${code}`), { code });
}
