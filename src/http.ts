import got, { CancelError } from 'got';
import pLimit from 'p-limit';
import { FetchError } from './errors.js';
import type { Logger } from './config.js';
import type { AdaptiveThrottler } from './throttle.js';
import type { ResponseTelemetry } from './telemetry.js';
import { isAllowedHost, sleep } from './utils.js';

export type HttpHeaders = Record<string, string | string[] | undefined>;

export type HttpResponse = {
  url: string;
  statusCode: number;
  headers: HttpHeaders;
  body: Buffer;
};

export type TransportRequest = {
  method: 'GET' | 'HEAD';
  maxBytes?: number;
};

/** One network round trip, no retries. Non-2xx statuses resolve; only transport failures reject. */
export interface HttpTransport {
  request(url: string, req: TransportRequest): Promise<HttpResponse>;
}

export class ResponseTooLargeError extends Error {
  constructor(readonly url: string, readonly limit: number) {
    super(`Response from ${url} exceeds ${limit} bytes`);
    this.name = 'ResponseTooLargeError';
  }
}

type TransportOptions = {
  userAgent: string;
  timeoutMs: number;
};

export function createGotTransport(opts: TransportOptions): HttpTransport {
  const client = got.extend({
    headers: {
      'user-agent': opts.userAgent,
      accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
      'accept-language': 'en-US,en;q=0.9'
    },
    followRedirect: true,
    throwHttpErrors: false,
    retry: { limit: 0 },
    timeout: { request: opts.timeoutMs }
  });

  return {
    async request(url, req) {
      if (req.method === 'HEAD') {
        const res = await client.head(url);
        return { url: res.url, statusCode: res.statusCode, headers: res.headers, body: Buffer.alloc(0) };
      }

      const pending = client.get(url, { responseType: 'buffer' });
      const limit = req.maxBytes;
      let tooLarge = false;
      if (limit !== undefined) {
        pending.on('downloadProgress', (progress) => {
          if (progress.transferred > limit || (progress.total !== undefined && progress.total > limit)) {
            tooLarge = true;
            pending.cancel();
          }
        });
      }

      try {
        const res = await pending;
        return { url: res.url, statusCode: res.statusCode, headers: res.headers, body: res.body };
      } catch (err) {
        if (tooLarge && limit !== undefined && err instanceof CancelError) {
          throw new ResponseTooLargeError(url, limit);
        }
        throw err;
      }
    }
  };
}

export function headerValue(headers: HttpHeaders, name: string): string | null {
  const v = headers[name.toLowerCase()];
  if (Array.isArray(v)) return v[0] ?? null;
  return v ?? null;
}

type AttemptOutcome =
  | { type: 'ok'; response: HttpResponse }
  | { type: 'retry'; reason: string; status?: number }
  | { type: 'fail'; error: FetchError };

type HttpOptions = {
  transport: HttpTransport;
  throttler: AdaptiveThrottler;
  telemetry: ResponseTelemetry;
  allowedDomains: string[];
  concurrency?: number;
  maxRetries?: number;
  retryableStatuses?: number[];
  initialBackoffMs?: number;
  maxBackoffMs?: number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
};

export type DownloadedBody = {
  url: string;
  body: Buffer;
  contentType: string | null;
  etag: string | null;
  lastModified: string | null;
};

export type Validators = {
  etag: string | null;
  lastModified: string | null;
};

/**
 * Every outbound request goes through here: allow-list check, the shared
 * concurrency slot, the throttler's wait, then retries with exponential
 * backoff. The slot is only held for the throttle wait and the request
 * itself; backoff sleeps happen outside it.
 */
export class HttpClient {
  private transport: HttpTransport;
  private throttler: AdaptiveThrottler;
  private telemetry: ResponseTelemetry;
  private allowedDomains: string[];
  private limit: ReturnType<typeof pLimit>;
  private maxRetries: number;
  private retryable: Set<number>;
  private initialBackoffMs: number;
  private maxBackoffMs: number;
  private sleep: (ms: number) => Promise<void>;
  private logger: Logger;

  constructor(opts: HttpOptions) {
    this.transport = opts.transport;
    this.throttler = opts.throttler;
    this.telemetry = opts.telemetry;
    this.allowedDomains = opts.allowedDomains;
    this.limit = pLimit(Math.max(1, opts.concurrency ?? 4));
    this.maxRetries = Math.max(1, opts.maxRetries ?? 5);
    this.retryable = new Set(opts.retryableStatuses ?? [429, 500, 502, 503, 504]);
    this.initialBackoffMs = Math.max(0, opts.initialBackoffMs ?? 2000);
    this.maxBackoffMs = Math.max(this.initialBackoffMs, opts.maxBackoffMs ?? 60000);
    this.sleep = opts.sleep ?? sleep;
    this.logger = opts.logger ?? console;
  }

  async html(url: string): Promise<string> {
    const res = await this.fetch(url, { method: 'GET' });
    return res.body.toString('utf-8');
  }

  async download(url: string, maxBytes: number): Promise<DownloadedBody> {
    const res = await this.fetch(url, { method: 'GET', maxBytes });
    return {
      url: res.url,
      body: res.body,
      contentType: headerValue(res.headers, 'content-type'),
      etag: headerValue(res.headers, 'etag'),
      lastModified: headerValue(res.headers, 'last-modified')
    };
  }

  async validators(url: string): Promise<Validators> {
    const res = await this.fetch(url, { method: 'HEAD' });
    return {
      etag: headerValue(res.headers, 'etag'),
      lastModified: headerValue(res.headers, 'last-modified')
    };
  }

  async fetch(url: string, req: TransportRequest): Promise<HttpResponse> {
    if (!isAllowedHost(url, this.allowedDomains)) {
      this.logger.warn(`[http] blocked non-allow-listed url: ${url}`);
      throw new FetchError('blocked', url, `Blocked request to non-allowed domain: ${url}`);
    }

    let backoff = this.initialBackoffMs;
    let lastReason = 'unknown';
    let lastStatus: number | undefined;
    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      const outcome = await this.limit(() => this.attempt(url, req));
      if (outcome.type === 'ok') return outcome.response;
      if (outcome.type === 'fail') throw outcome.error;

      lastReason = outcome.reason;
      lastStatus = outcome.status;
      if (attempt < this.maxRetries) {
        this.logger.warn(`[http] ${outcome.reason} for ${url}, retrying in ${backoff}ms (${attempt}/${this.maxRetries})`);
        await this.sleep(backoff);
        backoff = Math.min(this.maxBackoffMs, backoff * 2);
      }
    }

    this.telemetry.recordRetryExhausted(lastReason);
    this.logger.error(`[http] giving up on ${url} after ${this.maxRetries} attempts (${lastReason})`);
    throw new FetchError(
      'exhausted',
      url,
      `Failed to fetch ${url} after ${this.maxRetries} attempts: ${lastReason}`,
      lastStatus
    );
  }

  private async attempt(url: string, req: TransportRequest): Promise<AttemptOutcome> {
    const wait = this.throttler.acquire();
    if (wait > 0) await this.sleep(wait);

    let res: HttpResponse;
    try {
      res = await this.transport.request(url, req);
    } catch (err) {
      if (err instanceof ResponseTooLargeError) {
        return { type: 'fail', error: new FetchError('too-large', url, err.message) };
      }
      return { type: 'retry', reason: `network: ${networkReason(err)}` };
    }

    this.telemetry.recordResponse(res.statusCode);

    if (this.retryable.has(res.statusCode)) {
      if (res.statusCode === 429) this.throttler.reportRateLimit();
      else if (res.statusCode === 503) this.throttler.reportServiceUnavailable();
      return { type: 'retry', reason: `HTTP ${res.statusCode}`, status: res.statusCode };
    }

    if (res.statusCode < 200 || res.statusCode >= 300) {
      return {
        type: 'fail',
        error: new FetchError('http', url, `HTTP ${res.statusCode} for ${url}`, res.statusCode)
      };
    }

    if (req.maxBytes !== undefined && res.body.length > req.maxBytes) {
      return {
        type: 'fail',
        error: new FetchError('too-large', url, `Response from ${url} exceeds ${req.maxBytes} bytes`)
      };
    }

    this.throttler.reportSuccess();
    return { type: 'ok', response: res };
  }
}

function networkReason(err: unknown): string {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  if (err instanceof Error) return err.name;
  return 'unknown';
}
