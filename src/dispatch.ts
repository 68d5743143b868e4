// src/dispatch.ts
//
// Turn notifications (live mode) or a directory walk (one-shot mode) into
// (path, isFile) pairs and run each through match -> select -> apply.

import { walkStream, type Entry } from "@nodelib/fs.walk";
import { stat } from "node:fs/promises";
import path from "node:path";
import { applyAction, type ApplyOutcome, type ApplyOptions } from "./actions.js";
import { fittingBuckets, possibleBuckets, selectBucket } from "./bucket.js";
import type { Bucket, ConfigSnapshot, WatchSpec } from "./config.js";
import { ActionExecutionError, errorMessage } from "./errors.js";
import { describeEvent, type WatchEvent } from "./events.js";
import { NullLogger, type Logger } from "./logger.js";
import { nameDecodes } from "./paths.js";

export type Apply = (
  bucket: Bucket,
  source: string,
  isFile: boolean,
  opts: ApplyOptions,
) => Promise<ApplyOutcome>;

export type DispatchOutcome =
  | { status: "no-match" }
  | ApplyOutcome
  | { status: "failed"; error: ActionExecutionError };

export interface DispatchRecord {
  path: string;
  isFile: boolean;
  bucket?: string;
  outcome: DispatchOutcome;
}

export interface DispatchOptions {
  logger?: Logger;
  dryRun?: boolean;
  apply?: Apply;
}

async function checkName(entry: string, logger: Logger): Promise<boolean> {
  try {
    return await nameDecodes(entry);
  } catch (err) {
    logger.debug("cannot read raw name; treating it as undecodable", {
      path: entry,
      error: errorMessage(err),
    });
    return false;
  }
}

export async function dispatchPath(
  spec: WatchSpec,
  entry: string,
  isFile: boolean,
  snapshot: ConfigSnapshot,
  { logger = new NullLogger(), dryRun = false, apply = applyAction }: DispatchOptions = {},
): Promise<DispatchRecord> {
  const possible = possibleBuckets(snapshot.buckets, spec.bucketNames);
  const verifiedName = await checkName(entry, logger);
  const winner = selectBucket(
    fittingBuckets(possible, entry, { verifiedName }),
  );
  if (!winner) {
    logger.trace("no bucket fits", { path: entry });
    return { path: entry, isFile, outcome: { status: "no-match" } };
  }

  logger.trace("bucket selected", {
    path: entry,
    bucket: winner.name,
    priority: winner.priority,
  });
  try {
    const outcome = await apply(winner, entry, isFile, { logger, dryRun });
    return { path: entry, isFile, bucket: winner.name, outcome };
  } catch (err) {
    const error =
      err instanceof ActionExecutionError
        ? err
        : new ActionExecutionError({ action: winner.action, source: entry }, err);
    logger.error("action failed; make sure the destination exists", {
      path: entry,
      bucket: winner.name,
      error: error.message,
    });
    return {
      path: entry,
      isFile,
      bucket: winner.name,
      outcome: { status: "failed", error },
    };
  }
}

/**
 * Live mode: only creations are routed. Rescan notices, modifications,
 * removals and creations of unknown entry type are ignored.
 */
export async function handleEvent(
  spec: WatchSpec,
  event: WatchEvent,
  snapshot: ConfigSnapshot,
  opts: DispatchOptions = {},
): Promise<DispatchRecord[]> {
  const logger = opts.logger ?? new NullLogger();
  if (event.rescan) {
    logger.trace("rescan notice ignored", { watch: spec.path });
    return [];
  }
  const { kind } = event;
  if (kind.type !== "create" || kind.entry === "any") {
    logger.trace("event ignored", {
      kind: describeEvent(event),
      paths: event.paths,
    });
    return [];
  }

  const isFile = kind.entry === "file";
  const records: DispatchRecord[] = [];
  for (const p of event.paths) {
    records.push(await dispatchPath(spec, p, isFile, snapshot, opts));
  }
  return records;
}

export interface CollectedEntries {
  files: string[];
  dirs: string[];
}

type EntryType = "file" | "dir" | "other";

async function resolveLink(abs: string): Promise<EntryType> {
  try {
    const st = await stat(abs);
    return st.isDirectory() ? "dir" : st.isFile() ? "file" : "other";
  } catch {
    // dangling link
    return "other";
  }
}

/**
 * Walk a watch spec's root. Recursive specs descend into sub-directories
 * (never through symlinks) and collect every file; non-recursive specs
 * collect immediate files and immediate directories without entering them.
 */
export async function collectEntries(spec: WatchSpec): Promise<CollectedEntries> {
  const recursive = spec.recursiveMode === "recursive";
  const files: string[] = [];
  const dirs: string[] = [];

  const stream: AsyncIterable<Entry> = walkStream(path.resolve(spec.path), {
    followSymbolicLinks: false,
    deepFilter: () => recursive,
  });
  for await (const entry of stream) {
    const { dirent } = entry;
    const isLink = dirent.isSymbolicLink();
    const type: EntryType = isLink
      ? await resolveLink(entry.path)
      : dirent.isDirectory()
        ? "dir"
        : dirent.isFile()
          ? "file"
          : "other";

    if (type === "file") {
      files.push(entry.path);
    } else if (type === "dir" && !recursive) {
      dirs.push(entry.path);
    }
  }
  return { files, dirs };
}

export interface OneShotSummary {
  records: DispatchRecord[];
  failedWatches: string[];
}

/**
 * Process every pre-existing entry once: for each watch spec, all files
 * first, then all directories.
 */
export async function runOneShot(
  snapshot: ConfigSnapshot,
  opts: DispatchOptions = {},
): Promise<OneShotSummary> {
  const logger = opts.logger ?? new NullLogger();
  const records: DispatchRecord[] = [];
  const failedWatches: string[] = [];

  for (const spec of snapshot.watch) {
    let collected: CollectedEntries;
    try {
      collected = await collectEntries(spec);
    } catch (err) {
      logger.error("cannot walk watch path", {
        path: spec.path,
        error: errorMessage(err),
      });
      failedWatches.push(spec.path);
      continue;
    }
    logger.debug("walked watch path", {
      path: spec.path,
      files: collected.files.length,
      dirs: collected.dirs.length,
    });
    for (const file of collected.files) {
      records.push(await dispatchPath(spec, file, true, snapshot, opts));
    }
    for (const d of collected.dirs) {
      records.push(await dispatchPath(spec, d, false, snapshot, opts));
    }
  }

  const applied = records.filter((r) => r.outcome.status === "applied").length;
  const failed = records.filter((r) => r.outcome.status === "failed").length;
  logger.info("one-shot pass complete", {
    entries: records.length,
    applied,
    failed,
  });
  return { records, failedWatches };
}
