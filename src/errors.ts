export enum ErrorCode {
  NETWORK_ERROR = 'NETWORK_ERROR',
  RATE_LIMITED = 'RATE_LIMITED',
  SERVICE_UNAVAILABLE = 'SERVICE_UNAVAILABLE',
  CLIENT_ERROR = 'CLIENT_ERROR',
  BLOCKED = 'BLOCKED',
  PARSE_FAILURE = 'PARSE_FAILURE',
  INTEGRITY_ERROR = 'INTEGRITY_ERROR',
  PERSISTENCE_ERROR = 'PERSISTENCE_ERROR',
  DISCOVERY_FAILED = 'DISCOVERY_FAILED'
}

export class CrawlError extends Error {
  code: ErrorCode;
  retryable: boolean;
  context?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, retryable = false, context?: Record<string, unknown>) {
    super(message);
    this.name = 'CrawlError';
    this.code = code;
    this.retryable = retryable;
    this.context = context;
  }
}

/**
 * Terminal outcome of a fetch. Retries have already happened by the time one
 * of these is thrown:
 * - `blocked`: host not allow-listed, no request was made
 * - `http`: non-retryable status (4xx other than 429, or anything outside the retry set)
 * - `exhausted`: retry ceiling reached on retryable statuses or network errors
 * - `too-large`: download exceeded the size cap
 */
export type FetchErrorKind = 'blocked' | 'http' | 'exhausted' | 'too-large';

const KIND_CODES: Record<FetchErrorKind, ErrorCode> = {
  blocked: ErrorCode.BLOCKED,
  http: ErrorCode.CLIENT_ERROR,
  exhausted: ErrorCode.NETWORK_ERROR,
  'too-large': ErrorCode.INTEGRITY_ERROR
};

/** Retries that ran out on 429 or 503 carry the throttling code instead of a network one. */
function fetchErrorCode(kind: FetchErrorKind, status?: number): ErrorCode {
  if (kind === 'exhausted' && status === 429) return ErrorCode.RATE_LIMITED;
  if (kind === 'exhausted' && status === 503) return ErrorCode.SERVICE_UNAVAILABLE;
  return KIND_CODES[kind];
}

export class FetchError extends CrawlError {
  kind: FetchErrorKind;
  url: string;
  status?: number;

  constructor(kind: FetchErrorKind, url: string, message: string, status?: number) {
    super(fetchErrorCode(kind, status), message, false, { url, status });
    this.name = 'FetchError';
    this.kind = kind;
    this.url = url;
    this.status = status;
  }
}

export function toErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
