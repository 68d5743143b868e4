import { inspect } from "node:util";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error";
export const LOG_LEVELS: LogLevel[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
];

const LEVEL_ORDER: Record<LogLevel, number> = {
  trace: 0,
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LogEntry {
  ts: number;
  level: LogLevel;
  scope?: string;
  message: string;
  meta?: Record<string, unknown>;
}

export interface Logger {
  child(scope: string): Logger;
  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void;
  trace(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  isLevelEnabled(level: LogLevel): boolean;
}

type Sink = (entry: LogEntry) => void;
type EchoWriter = (entry: LogEntry) => void;

export interface LoggerOptions {
  scope?: string;
  sink?: Sink;
  echo?: {
    minLevel?: LogLevel;
    writer?: EchoWriter;
  };
  clock?: () => number;
}

const defaultClock = () => Date.now();

function isEchoSuppressed(): boolean {
  const raw = process.env.TIDYD_DISABLE_LOG_ECHO;
  if (!raw) return false;
  const normalized = raw.trim().toLowerCase();
  if (!normalized) return false;
  return normalized !== "0" && normalized !== "false";
}

const LEVEL_MARK: Record<LogLevel, string> = {
  trace: "··",
  debug: "·",
  info: "ℹ️",
  warn: "⚠️",
  error: "⛔",
};

export function formatEntry(entry: LogEntry): string {
  const { ts, level, scope, message, meta } = entry;
  const time = new Date(ts).toISOString().replace(/\.\d{3}Z$/, "Z");
  const scopeText = scope ? `[${scope}] ` : "";
  const line = `${time} ${LEVEL_MARK[level]} ${scopeText}${message}`;
  return meta ? `${line} ${serializeMeta(meta)}` : line;
}

const defaultEchoWriter: EchoWriter = (entry) => {
  if (isEchoSuppressed()) return;
  console.error(formatEntry(entry));
};

function serializeMeta(meta: Record<string, unknown>): string {
  try {
    return JSON.stringify(meta);
  } catch {
    return inspect(meta, { depth: 4 });
  }
}

export class StructuredLogger implements Logger {
  private readonly sink: Sink;
  private readonly echoMinLevel?: LogLevel;
  private readonly echoWriter: EchoWriter;
  private readonly clock: () => number;
  private readonly scope?: string;

  constructor({ scope, sink, echo, clock }: LoggerOptions = {}) {
    this.scope = scope;
    this.sink = sink ?? (() => {});
    this.echoMinLevel = echo?.minLevel;
    this.echoWriter = echo?.writer ?? defaultEchoWriter;
    this.clock = clock ?? defaultClock;
  }

  child(scope: string): Logger {
    const childScope = this.scope ? `${this.scope}.${scope}` : scope;
    return new StructuredLogger({
      scope: childScope,
      sink: this.sink,
      echo: this.echoMinLevel
        ? { minLevel: this.echoMinLevel, writer: this.echoWriter }
        : undefined,
      clock: this.clock,
    });
  }

  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    const entry: LogEntry = {
      ts: this.clock(),
      level,
      scope: this.scope,
      message,
      meta: meta && Object.keys(meta).length ? meta : undefined,
    };
    this.sink(entry);
    if (this.echoMinLevel && shouldEcho(level, this.echoMinLevel)) {
      this.echoWriter(entry);
    }
  }

  trace(message: string, meta?: Record<string, unknown>): void {
    this.log("trace", message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log("debug", message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log("info", message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log("warn", message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log("error", message, meta);
  }

  isLevelEnabled(level: LogLevel): boolean {
    return this.echoMinLevel ? shouldEcho(level, this.echoMinLevel) : true;
  }
}

function shouldEcho(level: LogLevel, minLevel: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];
}

export class NullLogger implements Logger {
  child(): Logger {
    return this;
  }
  log(): void {}
  trace(): void {}
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  isLevelEnabled(): boolean {
    return false;
  }
}

export class ConsoleLogger extends StructuredLogger {
  constructor(minLevel: LogLevel = "info") {
    super({ echo: { minLevel } });
  }
}

/**
 * Collects entries in memory instead of echoing them; used by tests and by
 * callers that want to inspect what a run reported.
 */
export class MemoryLogger extends StructuredLogger {
  readonly entries: LogEntry[];

  constructor(entries: LogEntry[] = []) {
    super({ sink: (entry) => entries.push(entry) });
    this.entries = entries;
  }

  messages(level?: LogLevel): string[] {
    return this.entries
      .filter((e) => !level || e.level === level)
      .map((e) => e.message);
  }
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((lvl) => lvl === value);
}

export function parseLogLevel(
  raw: string | undefined,
  fallback: LogLevel = "info",
): LogLevel {
  if (!raw) return fallback;
  const normalized = raw.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : fallback;
}
