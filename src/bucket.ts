// src/bucket.ts
//
// Deciding which bucket a path belongs to.

import type { Bucket } from "./config.js";
import { PathEncodingError } from "./errors.js";
import { decodedName, finalExtension } from "./paths.js";

/**
 * Whether `path` satisfies one of the bucket's filters.
 *
 * Only the final extension is compared, so `archive.tar.gz` matches an
 * extension filter of "gz" but not "tar". Name filters are tried only when
 * no extension filter matched, and are unanchored. A name holding U+FFFD
 * never fits unless `verifiedName` says its bytes decoded cleanly.
 */
export function fits(
  bucket: Bucket,
  path: string,
  { verifiedName = false }: { verifiedName?: boolean } = {},
): boolean {
  let name: string;
  try {
    name = decodedName(path, verifiedName);
  } catch (err) {
    if (err instanceof PathEncodingError) return false;
    throw err;
  }
  if (!name) return false;

  const ext = finalExtension(name);
  if (ext != null && bucket.extensionFilters.has(ext)) {
    return true;
  }
  return bucket.patterns.some((re) => re.test(name));
}

/**
 * Order two strings by Unicode code point, which is also the byte order of
 * their UTF-8 encodings. `<` compares UTF-16 code units and disagrees for
 * characters above U+FFFF.
 */
export function compareCodePoints(a: string, b: string): number {
  const ia = a[Symbol.iterator]();
  const ib = b[Symbol.iterator]();
  for (;;) {
    const ca = ia.next();
    const cb = ib.next();
    if (ca.done || cb.done) {
      return ca.done === cb.done ? 0 : ca.done ? -1 : 1;
    }
    const diff = (ca.value.codePointAt(0) ?? 0) - (cb.value.codePointAt(0) ?? 0);
    if (diff !== 0) return diff;
  }
}

/** Priority first, then name by code point; both ascending. */
export function compareBuckets(a: Bucket, b: Bucket): number {
  if (a.priority !== b.priority) return a.priority - b.priority;
  return compareCodePoints(a.name, b.name);
}

/**
 * The maximum candidate under `compareBuckets`: highest priority wins, and
 * equal priorities go to the lexicographically greatest name.
 */
export function selectBucket(
  candidates: readonly Bucket[],
): Bucket | undefined {
  let best: Bucket | undefined;
  for (const candidate of candidates) {
    if (!best || compareBuckets(candidate, best) > 0) {
      best = candidate;
    }
  }
  return best;
}

/** Buckets named by the watch spec, in configuration order. */
export function possibleBuckets(
  buckets: readonly Bucket[],
  bucketNames: readonly string[],
): Bucket[] {
  const wanted = new Set(bucketNames);
  return buckets.filter((b) => wanted.has(b.name));
}

export function fittingBuckets(
  buckets: readonly Bucket[],
  path: string,
  opts: { verifiedName?: boolean } = {},
): Bucket[] {
  return buckets.filter((b) => fits(b, path, opts));
}
