// src/event-source.ts
//
// One chokidar watcher per watched path (plus one for the config file), each
// feeding its own channel. Closing the sender is how a source reports that
// it is gone.

import chokidar, { type FSWatcher } from "chokidar";
import { realpath, stat } from "node:fs/promises";
import path from "node:path";
import { channel, type Receiver, type Sender } from "./channel.js";
import type { WatchSpec } from "./config.js";
import { STABILITY_MS, STABILITY_POLL_MS } from "./constants.js";
import { errorCode, errorMessage, WatchSetupError } from "./errors.js";
import {
  createdEvent,
  modifiedEvent,
  removedEvent,
  type SourceMessage,
} from "./events.js";
import { NullLogger, type Logger } from "./logger.js";

export interface EventSource {
  readonly label: string;
  readonly receiver: Receiver<SourceMessage>;
  close(): Promise<void>;
}

export interface EventSourceFactory {
  watch(spec: WatchSpec): Promise<EventSource>;
  watchConfig(file: string): Promise<EventSource>;
}

export interface ChokidarSourceOptions {
  logger?: Logger;
  /** ms a new file must stay unchanged before it is reported; 0 disables */
  stabilityMs?: number;
  pollMs?: number;
}

function asError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

function waitUntilReady(watcher: FSWatcher): Promise<void> {
  return new Promise((resolve, reject) => {
    const onError = (err: unknown) => reject(asError(err));
    watcher.once("error", onError);
    watcher.once("ready", () => {
      watcher.off("error", onError);
      resolve();
    });
  });
}

function awaitWriteFinish(stabilityMs: number, pollMs: number) {
  return stabilityMs > 0
    ? { stabilityThreshold: stabilityMs, pollInterval: pollMs }
    : false;
}

function forwardErrors(
  watcher: FSWatcher,
  tx: Sender<SourceMessage>,
  logger: Logger,
) {
  watcher.on("error", (err: unknown) => {
    const error = asError(err);
    logger.trace("watcher error", { error: error.message });
    tx.send({ ok: false, error });
  });
}

/**
 * The real path of a watch root, which must be an existing directory. A
 * symlinked root is resolved here; links below it are never followed.
 */
async function resolveWatchRoot(dir: string): Promise<string> {
  try {
    const real = await realpath(dir);
    const st = await stat(real);
    if (!st.isDirectory()) {
      throw new WatchSetupError(`not a directory: ${dir}`, { path: dir });
    }
    return real;
  } catch (err) {
    if (err instanceof WatchSetupError) throw err;
    const code = errorCode(err);
    throw new WatchSetupError(
      code === "ENOENT"
        ? `watch path does not exist: ${dir}`
        : `cannot watch ${dir}: ${errorMessage(err)}`,
      { path: dir, code },
      { cause: err },
    );
  }
}

export async function createWatchSource(
  spec: WatchSpec,
  {
    logger = new NullLogger(),
    stabilityMs = STABILITY_MS,
    pollMs = STABILITY_POLL_MS,
  }: ChokidarSourceOptions = {},
): Promise<EventSource> {
  const root = await resolveWatchRoot(path.resolve(spec.path));

  const [tx, rx] = channel<SourceMessage>();
  const watcher = chokidar.watch(root, {
    persistent: true,
    ignoreInitial: true,
    depth: spec.recursiveMode === "recursive" ? undefined : 0,
    followSymlinks: false,
    awaitWriteFinish: awaitWriteFinish(stabilityMs, pollMs),
  });

  watcher.on("add", (p: string) => {
    tx.send({ ok: true, event: createdEvent(p, "file") });
  });
  watcher.on("addDir", (p: string) => {
    if (path.resolve(p) === root) return;
    tx.send({ ok: true, event: createdEvent(p, "folder") });
  });
  watcher.on("change", (p: string) => {
    tx.send({ ok: true, event: modifiedEvent(p) });
  });
  watcher.on("unlink", (p: string) => {
    tx.send({ ok: true, event: removedEvent(p, "file") });
  });
  watcher.on("unlinkDir", (p: string) => {
    if (path.resolve(p) === root) {
      logger.warn("watched directory removed", { path: root });
      tx.close();
      return;
    }
    tx.send({ ok: true, event: removedEvent(p, "folder") });
  });
  forwardErrors(watcher, tx, logger);

  try {
    await waitUntilReady(watcher);
  } catch (err) {
    tx.close();
    await watcher.close();
    throw new WatchSetupError(
      `cannot watch ${root}: ${errorMessage(err)}`,
      { path: root },
      { cause: err },
    );
  }

  return {
    label: root,
    receiver: rx,
    close: async () => {
      tx.close();
      await watcher.close();
    },
  };
}

/**
 * Watch the configuration document. Both an in-place change and a
 * re-creation of the file are reported as `modify`.
 */
export async function createConfigSource(
  file: string,
  { logger = new NullLogger(), pollMs = STABILITY_POLL_MS }: ChokidarSourceOptions = {},
): Promise<EventSource> {
  const target = path.resolve(file);
  const [tx, rx] = channel<SourceMessage>();
  const watcher = chokidar.watch(target, {
    persistent: true,
    ignoreInitial: true,
    awaitWriteFinish: awaitWriteFinish(Math.max(pollMs * 2, 100), pollMs),
  });
  const onModified = (p: string) => {
    tx.send({ ok: true, event: modifiedEvent(p) });
  };
  watcher.on("change", onModified);
  watcher.on("add", onModified);
  watcher.on("unlink", (p: string) => {
    logger.warn("config file removed; keeping current configuration", {
      path: p,
    });
    tx.send({ ok: true, event: removedEvent(p, "file") });
  });
  forwardErrors(watcher, tx, logger);

  try {
    await waitUntilReady(watcher);
  } catch (err) {
    tx.close();
    await watcher.close();
    throw new WatchSetupError(
      `cannot watch config ${target}: ${errorMessage(err)}`,
      { path: target },
      { cause: err },
    );
  }

  return {
    label: target,
    receiver: rx,
    close: async () => {
      tx.close();
      await watcher.close();
    },
  };
}

export class ChokidarSourceFactory implements EventSourceFactory {
  constructor(private readonly opts: ChokidarSourceOptions = {}) {}

  watch(spec: WatchSpec): Promise<EventSource> {
    return createWatchSource(spec, this.opts);
  }

  watchConfig(file: string): Promise<EventSource> {
    return createConfigSource(file, this.opts);
  }
}
