// tests/logger.test.ts

import {
  formatEntry,
  type LogEntry,
  MemoryLogger,
  parseLogLevel,
  StructuredLogger,
} from "../logger";

describe("formatEntry", () => {
  test("time without millis, level mark, scope, message and meta", () => {
    const line = formatEntry({
      ts: Date.UTC(2026, 0, 2, 3, 4, 5, 678),
      level: "warn",
      scope: "a.b",
      message: "hi",
      meta: { x: 1 },
    });
    expect(line).toBe('2026-01-02T03:04:05Z ⚠️ [a.b] hi {"x":1}');
  });

  test("no scope and no meta", () => {
    expect(
      formatEntry({ ts: Date.UTC(2026, 0, 2), level: "info", message: "up" }),
    ).toBe("2026-01-02T00:00:00Z ℹ️ up");
  });
});

describe("StructuredLogger", () => {
  test("children extend the scope and share the sink", () => {
    const entries: LogEntry[] = [];
    const root = new StructuredLogger({
      scope: "tidyd",
      sink: (e) => entries.push(e),
      clock: () => 42,
    });
    root.child("supervisor").child("dispatch").info("moved", { n: 1 });
    root.debug("plain", {});
    expect(entries).toEqual([
      {
        ts: 42,
        level: "info",
        scope: "tidyd.supervisor.dispatch",
        message: "moved",
        meta: { n: 1 },
      },
      {
        ts: 42,
        level: "debug",
        scope: "tidyd",
        message: "plain",
        meta: undefined,
      },
    ]);
  });

  test("echo honours the minimum level", () => {
    const echoed: string[] = [];
    const logger = new StructuredLogger({
      echo: { minLevel: "warn", writer: (e) => echoed.push(e.message) },
    });
    logger.info("quiet");
    logger.warn("loud");
    logger.error("louder");
    expect(echoed).toEqual(["loud", "louder"]);
    expect(logger.isLevelEnabled("debug")).toBe(false);
    expect(logger.isLevelEnabled("error")).toBe(true);
  });

  test("MemoryLogger filters messages by level", () => {
    const logger = new MemoryLogger();
    logger.info("a");
    logger.child("x").warn("b");
    expect(logger.messages()).toEqual(["a", "b"]);
    expect(logger.messages("warn")).toEqual(["b"]);
  });
});

describe("parseLogLevel", () => {
  test("accepts known levels in any case", () => {
    expect(parseLogLevel(" DEBUG ")).toBe("debug");
    expect(parseLogLevel("trace")).toBe("trace");
  });

  test("falls back on unknown or missing input", () => {
    expect(parseLogLevel("verbose")).toBe("info");
    expect(parseLogLevel(undefined, "warn")).toBe("warn");
  });
});
