import fsp from "node:fs/promises";
import os from "node:os";
import { join } from "node:path";
import { activateConfig, type Bucket, type RawBucket } from "../config";

export function wait(ms: number) {
  return new Promise((r) => setTimeout(r, ms));
}

export async function fileExists(p: string) {
  try {
    await fsp.stat(p);
    return true;
  } catch {
    return false;
  }
}

/** Poll until `check` passes or `timeoutMs` elapses; returns the last result. */
export async function waitFor(
  check: () => Promise<boolean> | boolean,
  timeoutMs = 5000,
  stepMs = 25,
): Promise<boolean> {
  const deadline = Date.now() + timeoutMs;
  for (;;) {
    if (await check()) return true;
    if (Date.now() >= deadline) return false;
    await wait(stepMs);
  }
}

export async function mkTmp(prefix: string): Promise<string> {
  return fsp.mkdtemp(join(os.tmpdir(), `tidyd-${prefix}-`));
}

export type Dirs = {
  watchDir: string;
  destDir: string;
};

export async function mkCase(tmpBase: string, name: string): Promise<Dirs> {
  const base = join(tmpBase, name);
  const watchDir = join(base, "inbox");
  const destDir = join(base, "dest");
  await fsp.mkdir(watchDir, { recursive: true });
  await fsp.mkdir(destDir, { recursive: true });
  return { watchDir, destDir };
}

/** A compiled bucket with defaults for everything not given. */
export function makeBucket(
  fields: Partial<RawBucket> & { name: string },
): Bucket {
  const raw: RawBucket = {
    destination: `/dest/${fields.name}`,
    extension_filters: [],
    name_filters: [],
    priority: 0,
    action: "move",
    override_action: "skip",
    ...fields,
  };
  return activateConfig({ watch: [], bucket: [raw] }).buckets[0];
}
