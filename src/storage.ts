import fs from 'node:fs';
import path from 'node:path';

export function ensureDir(dir: string) {
  fs.mkdirSync(dir, { recursive: true });
}

function sortedKeys(_key: string, value: unknown): unknown {
  if (value && typeof value === 'object' && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
  }
  return value;
}

export function toJson(data: unknown, opts: { sortKeys?: boolean } = {}): string {
  return JSON.stringify(data, opts.sortKeys ? sortedKeys : undefined, 2);
}

/** Write to a sibling .tmp file and rename over the target, so readers never see half a file. */
export function writeJson(filePath: string, data: unknown, opts: { sortKeys?: boolean } = {}) {
  ensureDir(path.dirname(filePath));
  const tmp = `${filePath}.tmp`;
  fs.writeFileSync(tmp, toJson(data, opts), 'utf-8');
  fs.renameSync(tmp, filePath);
}

/** Parsed JSON, or undefined when the file does not exist. Invalid JSON throws. */
export function readJson(filePath: string): unknown {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    if (isNotFound(err)) return undefined;
    throw err;
  }
  return JSON.parse(raw);
}

function isNotFound(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}
