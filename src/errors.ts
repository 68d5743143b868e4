import type { ActionKind } from "./config.js";

export class TidyError extends Error {
  constructor(
    message: string,
    public readonly context?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "TidyError";
  }
}

/** Malformed or unreadable configuration document. */
export class ConfigParseError extends TidyError {
  constructor(
    message: string,
    context?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, context, options);
    this.name = "ConfigParseError";
  }
}

/** A watched path could not be subscribed. */
export class WatchSetupError extends TidyError {
  constructor(
    message: string,
    context?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, context, options);
    this.name = "WatchSetupError";
  }
}

// Raised while reading a name for matching; the matcher turns it into a non-match.
export class PathEncodingError extends TidyError {
  constructor(path: string) {
    super(`path is not valid unicode: ${JSON.stringify(path)}`, { path });
    this.name = "PathEncodingError";
  }
}

export class ActionExecutionError extends TidyError {
  readonly action: ActionKind;
  readonly source: string;
  readonly destination?: string;
  readonly code?: string;

  constructor(
    {
      action,
      source,
      destination,
    }: { action: ActionKind; source: string; destination?: string },
    cause: unknown,
  ) {
    const code = errorCode(cause);
    super(
      `${action} ${source}${destination ? ` -> ${destination}` : ""} failed: ${errorMessage(cause)}`,
      { action, source, destination, code },
      { cause },
    );
    this.name = "ActionExecutionError";
    this.action = action;
    this.source = source;
    this.destination = destination;
    this.code = code;
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err ?? "unknown error");
}

export function errorCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) {
    return undefined;
  }
  const { code } = err;
  return typeof code === "string" ? code : undefined;
}
