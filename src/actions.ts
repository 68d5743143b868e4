// src/actions.ts
//
// Apply a bucket's action to one path, honoring its override policy.

import { cp, lstat, rename, rm } from "node:fs/promises";
import path from "node:path";
import type { ActionKind, Bucket, OverrideAction } from "./config.js";
import { ActionExecutionError, errorCode } from "./errors.js";
import { NullLogger, type Logger } from "./logger.js";
import { finalSegment } from "./paths.js";

export type ApplyStatus = "applied" | "skipped" | "dry-run";

export interface ApplyOutcome {
  status: ApplyStatus;
  action: ActionKind;
  source: string;
  // unset for delete
  destination?: string;
  reason?: "exists" | "same-path";
}

export interface ApplyOptions {
  logger?: Logger;
  dryRun?: boolean;
}

export type DestinationPlan =
  | { kind: "skip"; path: string }
  | { kind: "use"; path: string; replace: boolean };

async function pathExists(p: string): Promise<boolean> {
  try {
    await lstat(p);
    return true;
  } catch (err) {
    if (errorCode(err) === "ENOENT") return false;
    throw err;
  }
}

/**
 * Where an entry should land given the collision policy:
 * - skip: leave things alone when `dest` is taken
 * - rename: first free name among dest.1, dest.2, ...
 * - overwrite: use `dest`, replacing what is there
 */
export async function resolveDestination(
  dest: string,
  policy: OverrideAction,
  logger: Logger = new NullLogger(),
): Promise<DestinationPlan> {
  const taken = await pathExists(dest);
  if (!taken) {
    return { kind: "use", path: dest, replace: false };
  }
  switch (policy) {
    case "skip":
      return { kind: "skip", path: dest };
    case "overwrite":
      return { kind: "use", path: dest, replace: true };
    case "rename": {
      for (let n = 1; ; n++) {
        const candidate = `${dest}.${n}`;
        if (!(await pathExists(candidate))) {
          return { kind: "use", path: candidate, replace: false };
        }
        logger.trace("rename candidate taken", { candidate });
      }
    }
  }
}

async function moveEntry(source: string, dest: string, isFile: boolean) {
  try {
    await rename(source, dest);
  } catch (err) {
    if (errorCode(err) !== "EXDEV") throw err;
    // different filesystem: copy, then remove the original
    await cp(source, dest, {
      recursive: !isFile,
      errorOnExist: true,
      force: false,
      preserveTimestamps: true,
    });
    await rm(source, { recursive: !isFile });
  }
}

async function copyEntry(source: string, dest: string, isFile: boolean) {
  await cp(source, dest, {
    recursive: !isFile,
    errorOnExist: true,
    force: false,
    preserveTimestamps: true,
  });
}

/**
 * Apply `bucket.action` to `source`. Does not check that the path fits the
 * bucket. Filesystem failures reject with ActionExecutionError.
 */
export async function applyAction(
  bucket: Bucket,
  source: string,
  isFile: boolean,
  { logger = new NullLogger(), dryRun = false }: ApplyOptions = {},
): Promise<ApplyOutcome> {
  const { action } = bucket;

  if (action === "delete") {
    if (dryRun) {
      logger.info("dry-run: would delete", { source, bucket: bucket.name });
      return { status: "dry-run", action, source };
    }
    try {
      await rm(source, { recursive: !isFile });
    } catch (err) {
      throw new ActionExecutionError({ action, source }, err);
    }
    logger.info("deleted", { source, bucket: bucket.name });
    return { status: "applied", action, source };
  }

  const target = path.join(bucket.destination, finalSegment(source));
  if (path.resolve(target) === path.resolve(source)) {
    logger.info("skipping: already in destination", { source });
    return {
      status: "skipped",
      action,
      source,
      destination: target,
      reason: "same-path",
    };
  }

  let plan: DestinationPlan;
  try {
    plan = await resolveDestination(target, bucket.overrideAction, logger);
  } catch (err) {
    throw new ActionExecutionError({ action, source, destination: target }, err);
  }

  if (plan.kind === "skip") {
    logger.info("skipping: destination exists", {
      source,
      destination: plan.path,
      bucket: bucket.name,
    });
    return {
      status: "skipped",
      action,
      source,
      destination: plan.path,
      reason: "exists",
    };
  }

  const destination = plan.path;
  if (destination !== target) {
    logger.info("renaming: destination exists", {
      source,
      destination,
      bucket: bucket.name,
    });
  }

  if (dryRun) {
    logger.info(`dry-run: would ${action}`, {
      source,
      destination,
      replace: plan.replace,
      bucket: bucket.name,
    });
    return { status: "dry-run", action, source, destination };
  }

  try {
    if (plan.replace) {
      logger.info("overwriting existing destination", { destination });
      await rm(destination, { recursive: true, force: true });
    }
    switch (action) {
      case "move":
        await moveEntry(source, destination, isFile);
        break;
      case "copy":
        await copyEntry(source, destination, isFile);
        break;
    }
  } catch (err) {
    throw new ActionExecutionError({ action, source, destination }, err);
  }

  logger.info(action === "move" ? "moved" : "copied", {
    source,
    destination,
    bucket: bucket.name,
  });
  return { status: "applied", action, source, destination };
}
