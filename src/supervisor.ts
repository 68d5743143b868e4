// src/supervisor.ts
//
// Owns every event source: one per watch spec plus one for the config file.
// A single loop multiplexes them with a bounded wait, dispatches one event at
// a time, and swaps in a whole new snapshot (and source set) when the config
// file changes.

import { WaitSet } from "./channel.js";
import {
  loadConfig as defaultLoadConfig,
  type ConfigSnapshot,
  type WatchSpec,
} from "./config.js";
import { SELECT_TIMEOUT_MS } from "./constants.js";
import { type Apply, handleEvent, type DispatchRecord } from "./dispatch.js";
import { errorMessage } from "./errors.js";
import {
  ChokidarSourceFactory,
  type EventSource,
  type EventSourceFactory,
} from "./event-source.js";
import type { SourceMessage } from "./events.js";
import { NullLogger, type Logger } from "./logger.js";

export type SupervisorState = "idle" | "watching" | "reloading" | "stopped";

interface WatchSlot {
  readonly source: EventSource;
  readonly spec: WatchSpec;
  alive: boolean;
}

export interface SupervisorOptions {
  configPath: string;
  /** Use an already loaded snapshot instead of reading `configPath` on start. */
  snapshot?: ConfigSnapshot;
  factory?: EventSourceFactory;
  loadConfig?: (file: string) => Promise<ConfigSnapshot>;
  logger?: Logger;
  dryRun?: boolean;
  selectTimeoutMs?: number;
  apply?: Apply;
  onDispatch?: (records: DispatchRecord[], spec: WatchSpec) => void;
}

function warnUnknownBuckets(snapshot: ConfigSnapshot, logger: Logger) {
  for (const ref of snapshot.unknownBucketReferences) {
    logger.warn("watch references an unknown bucket", {
      watch: ref.watchPath,
      bucket: ref.bucketName,
    });
  }
}

async function closeSources(sources: EventSource[], logger: Logger) {
  await Promise.all(
    sources.map(async (source) => {
      try {
        await source.close();
      } catch (err) {
        logger.warn("closing event source failed", {
          source: source.label,
          error: errorMessage(err),
        });
      }
    }),
  );
}

export class WatchSupervisor {
  private readonly configPath: string;
  private readonly factory: EventSourceFactory;
  private readonly load: (file: string) => Promise<ConfigSnapshot>;
  private readonly logger: Logger;
  private readonly dispatchLogger: Logger;
  private readonly dryRun: boolean;
  private readonly selectTimeoutMs: number;
  private readonly apply?: Apply;
  private readonly onDispatch?: (
    records: DispatchRecord[],
    spec: WatchSpec,
  ) => void;

  private active: ConfigSnapshot | null;
  private slots: WatchSlot[] = [];
  private waitSet = new WaitSet<SourceMessage>([]);
  private readonly dead = new Set<number>();
  private configSource: EventSource | null = null;
  private configLost = false;
  private currentState: SupervisorState = "idle";
  private stopping = false;
  private running: Promise<void> | null = null;

  constructor(opts: SupervisorOptions) {
    this.configPath = opts.configPath;
    this.logger = opts.logger ?? new NullLogger();
    this.dispatchLogger = this.logger.child("dispatch");
    this.factory =
      opts.factory ??
      new ChokidarSourceFactory({ logger: this.logger.child("source") });
    this.load = opts.loadConfig ?? defaultLoadConfig;
    this.active = opts.snapshot ?? null;
    this.dryRun = opts.dryRun ?? false;
    this.selectTimeoutMs = opts.selectTimeoutMs ?? SELECT_TIMEOUT_MS;
    this.apply = opts.apply;
    this.onDispatch = opts.onDispatch;
  }

  get state(): SupervisorState {
    return this.currentState;
  }

  get snapshot(): ConfigSnapshot | null {
    return this.active;
  }

  get slotCount(): number {
    return this.slots.length;
  }

  get liveSlotCount(): number {
    return this.slots.filter((s) => s.alive).length;
  }

  get deadSlots(): ReadonlySet<number> {
    return this.dead;
  }

  /**
   * Load the configuration (unless one was given) and create every source.
   * Any failure here is fatal and propagates to the caller.
   */
  async start(): Promise<void> {
    if (this.currentState !== "idle") {
      throw new Error(`supervisor already ${this.currentState}`);
    }
    const snapshot = this.active ?? (await this.load(this.configPath));
    warnUnknownBuckets(snapshot, this.logger);

    const configSource = await this.factory.watchConfig(this.configPath);
    let slots: WatchSlot[];
    try {
      slots = await this.createSlots(snapshot);
    } catch (err) {
      await closeSources([configSource], this.logger);
      throw err;
    }

    this.configSource = configSource;
    this.activate(snapshot, slots);
    this.currentState = "watching";
    this.logger.info("watching", {
      config: this.configPath,
      watches: snapshot.watch.length,
      buckets: snapshot.buckets.length,
    });
  }

  /** Run the loop until stop() is called. */
  run(): Promise<void> {
    if (this.currentState === "idle") {
      return Promise.reject(new Error("supervisor not started"));
    }
    if (!this.running) {
      this.running = this.loop();
    }
    return this.running;
  }

  async stop(): Promise<void> {
    this.stopping = true;
    if (this.running) {
      await this.running;
      return;
    }
    await this.shutdown();
  }

  private async loop(): Promise<void> {
    try {
      while (!this.stopping) {
        await this.tick();
      }
    } finally {
      await this.shutdown();
    }
  }

  private async shutdown(): Promise<void> {
    if (this.currentState === "stopped") return;
    const sources = this.slots.map((s) => s.source);
    if (this.configSource) sources.push(this.configSource);
    this.slots = [];
    this.configSource = null;
    this.waitSet = new WaitSet<SourceMessage>([]);
    await closeSources(sources, this.logger);
    this.currentState = "stopped";
    this.logger.info("stopped watching");
  }

  /**
   * One loop turn: poll the config source without blocking, then wait up to
   * the select timeout for any watch source.
   */
  async tick(): Promise<void> {
    if (this.pollConfig()) {
      await this.reload();
    }
    if (this.stopping) return;

    const idx = await this.waitSet.select(this.selectTimeoutMs);
    if (idx == null) return;
    try {
      await this.handleReady(idx);
    } catch (err) {
      // dispatch problems never end the loop
      this.logger.error("handling event failed", {
        index: idx,
        error: errorMessage(err),
      });
    }
  }

  private pollConfig(): boolean {
    const source = this.configSource;
    if (!source) return false;
    let modified = false;
    for (;;) {
      const res = source.receiver.tryRecv();
      if (res.status === "empty") break;
      if (res.status === "disconnected") {
        if (!this.configLost) {
          this.configLost = true;
          this.logger.warn(
            "config file watcher disconnected; reloads are disabled",
            { config: this.configPath },
          );
        }
        break;
      }
      const msg = res.value;
      if (!msg.ok) {
        this.logger.error("config watch error", { error: msg.error.message });
        continue;
      }
      const { event } = msg;
      if (event.kind.type !== "modify") continue;
      if (event.rescan) {
        this.logger.trace("config rescan notice ignored");
        continue;
      }
      this.logger.warn("config file modified", {
        path: event.paths[0] ?? this.configPath,
      });
      modified = true;
    }
    return modified;
  }

  private async handleReady(idx: number): Promise<void> {
    const slot = this.slots[idx];
    const rx = this.waitSet.receiver(idx);
    if (!slot || !rx) return;

    if (this.dead.has(idx)) {
      rx.tryRecv();
      this.logger.info("skipping event from disconnected source", {
        index: idx,
        path: slot.spec.path,
      });
      return;
    }

    const res = rx.tryRecv();
    if (res.status === "empty") return;
    if (res.status === "disconnected") {
      slot.alive = false;
      this.dead.add(idx);
      this.logger.warn(
        "event source disconnected; ignoring it until the next reload",
        { index: idx, path: slot.spec.path },
      );
      return;
    }

    const msg = res.value;
    if (!msg.ok) {
      this.logger.error("notification error", {
        path: slot.spec.path,
        error: msg.error.message,
      });
      return;
    }
    const snapshot = this.active;
    if (!snapshot) return;
    const records = await handleEvent(slot.spec, msg.event, snapshot, {
      logger: this.dispatchLogger,
      dryRun: this.dryRun,
      apply: this.apply,
    });
    if (records.length && this.onDispatch) {
      this.onDispatch(records, slot.spec);
    }
  }

  /**
   * Replace the active snapshot with a freshly loaded one. Either everything
   * is replaced or nothing is: on any failure the previous snapshot and
   * sources stay in place. Returns whether the new configuration was applied.
   */
  async reload(): Promise<boolean> {
    if (this.currentState !== "watching") return false;
    this.currentState = "reloading";
    this.logger.info("reloading configuration", { config: this.configPath });
    try {
      let candidate: ConfigSnapshot;
      try {
        candidate = await this.load(this.configPath);
      } catch (err) {
        this.logger.error("reloading config failed", {
          error: errorMessage(err),
        });
        this.logger.warn(
          "previous configuration remains active; fix the config file and save it again to apply changes",
        );
        return false;
      }

      let slots: WatchSlot[];
      try {
        slots = await this.createSlots(candidate);
      } catch (err) {
        this.logger.error("setting up file watchers failed", {
          error: errorMessage(err),
        });
        this.logger.warn(
          "previous configuration remains active; fix the config file and save it again to apply changes",
        );
        return false;
      }

      warnUnknownBuckets(candidate, this.logger);
      const previous = this.slots.map((s) => s.source);
      this.activate(candidate, slots);
      await closeSources(previous, this.logger);
      this.logger.info("configuration reloaded", {
        watches: candidate.watch.length,
        buckets: candidate.buckets.length,
      });
      return true;
    } finally {
      this.currentState = "watching";
    }
  }

  private activate(snapshot: ConfigSnapshot, slots: WatchSlot[]) {
    this.active = snapshot;
    this.slots = slots;
    this.dead.clear();
    this.waitSet = new WaitSet(slots.map((s) => s.source.receiver));
  }

  // all or nothing: sources created before a failure are closed again
  private async createSlots(snapshot: ConfigSnapshot): Promise<WatchSlot[]> {
    const slots: WatchSlot[] = [];
    try {
      for (const spec of snapshot.watch) {
        const source = await this.factory.watch(spec);
        slots.push({ source, spec, alive: true });
        this.logger.debug("watching path", {
          path: spec.path,
          mode: spec.recursiveMode,
        });
      }
    } catch (err) {
      await closeSources(
        slots.map((s) => s.source),
        this.logger,
      );
      throw err;
    }
    return slots;
  }
}
