import fs from 'node:fs';
import path from 'node:path';
import type { AssetCategory } from './types.js';

const UNSAFE_RE = /[/\\:*?"<>|]/g;
const SLUG_MAX = 50;

/** Post date → [year, YYYY-MM-DD]; anything unparseable lands in the unknown bucket. */
export function dateFolder(postDate: string | null): [string, string] {
  if (postDate) {
    const m = postDate.match(/^(\d{4})-(\d{2})-(\d{2})/);
    if (m) return [m[1], `${m[1]}-${m[2]}-${m[3]}`];
    const d = new Date(postDate);
    if (!Number.isNaN(d.getTime())) {
      const iso = d.toISOString();
      return [iso.slice(0, 4), iso.slice(0, 10)];
    }
  }
  return ['unknown_year', 'unknown_date'];
}

export function titleSlug(title: string): string {
  return title.replace(UNSAFE_RE, '').trim().replace(/\s+/g, '_').slice(0, SLUG_MAX);
}

export function threadFolderName(threadId: string, title: string): string {
  const slug = titleSlug(title);
  return slug ? `thread_${threadId}_${slug}` : `thread_${threadId}`;
}

export function threadDir(
  outputDir: string,
  category: AssetCategory,
  postDate: string | null,
  threadId: string,
  title: string
): string {
  const [year, day] = dateFolder(postDate);
  return path.join(outputDir, category, year, day, threadFolderName(threadId, title));
}

/**
 * First free path for `filename` inside `dir`: `name.ext`, then `name_1.ext`,
 * `name_2.ext`, ... Names already handed out in this batch count as taken.
 */
export function uniqueFilePath(dir: string, filename: string, taken: Set<string> = new Set()): string {
  const ext = path.extname(filename);
  const stem = filename.slice(0, filename.length - ext.length);
  let candidate = filename;
  for (let i = 1; taken.has(candidate) || fs.existsSync(path.join(dir, candidate)); i++) {
    candidate = `${stem}_${i}${ext}`;
  }
  taken.add(candidate);
  return path.join(dir, candidate);
}
