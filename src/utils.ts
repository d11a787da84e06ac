import crypto from 'node:crypto';
import path from 'node:path';

export function sleep(ms: number): Promise<void> {
  return new Promise((res) => setTimeout(res, ms));
}

export function textClean(s: string): string {
  return s.replace(/\s+/g, ' ').trim();
}

export function sha256(data: string | Buffer): string {
  return `sha256:${crypto.createHash('sha256').update(data).digest('hex')}`;
}

// Fingerprint of post text; whitespace-only differences do not count as edits
export function contentHash(text: string): string | null {
  const normalized = textClean(text);
  return normalized ? sha256(normalized) : null;
}

export function ensureAbsoluteUrl(baseUrl: string, href: string | undefined | null): string | null {
  if (!href) return null;
  try {
    const url = new URL(href, baseUrl);
    return url.toString();
  } catch {
    return null;
  }
}

export function urlBasename(urlStr: string): string {
  try {
    const u = new URL(urlStr);
    const last = path.posix.basename(u.pathname);
    return last || 'file';
  } catch {
    return 'file';
  }
}

export function isAllowedHost(urlStr: string, allowlist: readonly string[]): boolean {
  try {
    const host = new URL(urlStr).hostname.toLowerCase();
    return allowlist.some((d) => d.toLowerCase() === host);
  } catch {
    return false;
  }
}

const THREAD_ID_RE = /\/thread\/(\d+)-/;

export function threadIdFromUrl(urlStr: string): string | null {
  const m = urlStr.match(THREAD_ID_RE);
  return m ? m[1] : null;
}

export function setPageParam(urlStr: string, page: number): string {
  const u = new URL(urlStr);
  u.searchParams.set('pageNo', String(page));
  return u.toString();
}

/** "1,234" / "1.234" / "1234" -> 1234 */
export function parseCount(raw: string | undefined): number | null {
  if (!raw) return null;
  const n = parseInt(raw.replace(/[.,\s]/g, ''), 10);
  return Number.isFinite(n) ? n : null;
}

/** Lowercase extension with the dot, or '' */
export function fileType(filename: string): string {
  return path.posix.extname(filename).toLowerCase();
}

const MIME_BY_EXT: Record<string, string> = {
  '.xml': 'application/xml',
  '.zip': 'application/zip',
  '.gz': 'application/gzip',
  '.txt': 'text/plain',
  '.pdf': 'application/pdf',
  '.json': 'application/json'
};

/** Content-Type header wins (parameters dropped), then the extension, then octet-stream. */
export function inferMimeType(filename: string, contentType?: string | null): string {
  if (contentType) {
    const bare = contentType.split(';')[0].trim();
    if (bare) return bare;
  }
  return MIME_BY_EXT[fileType(filename)] ?? 'application/octet-stream';
}

/** Strip directories so a hostile filename cannot escape the thread folder. */
export function sanitizeFilename(input: string): string {
  const base = path.posix.basename(input.replace(/\\/g, '/'));
  const cleaned = base
    .replace(/[:*?"<>|]/g, '-')
    .replace(/\s+/g, ' ')
    .trim();
  if (!cleaned || cleaned === '.' || cleaned === '..') return 'unnamed_asset';
  return cleaned;
}
