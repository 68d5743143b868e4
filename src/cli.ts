#!/usr/bin/env node
// src/cli.ts
import fs from "node:fs";
import path from "node:path";
import { Command, Option } from "commander";
import { loadConfig, resolveConfigPath } from "./config.js";
import { CLI_NAME, VERSION } from "./constants.js";
import { runOneShot } from "./dispatch.js";
import { errorMessage } from "./errors.js";
import {
  ConsoleLogger,
  LOG_LEVELS,
  parseLogLevel,
  type Logger,
} from "./logger.js";
import { WatchSupervisor } from "./supervisor.js";

export interface CliOptions {
  config?: string;
  oneShot: boolean;
  dryRun: boolean;
  logLevel: string;
}

export function buildProgram(): Command {
  return new Command()
    .name(CLI_NAME)
    .description(
      "Watch directories and route new files into buckets by extension and name rules",
    )
    .version(VERSION)
    .argument("[config]", "path to the TOML configuration file")
    .option(
      "--one-shot",
      "process every existing entry of the watch paths once and exit",
      false,
    )
    .option("--dry-run", "log what would happen without modifying files", false)
    .addOption(
      new Option("--log-level <level>", "log verbosity")
        .choices(LOG_LEVELS)
        .default("info"),
    );
}

export async function runOnce(
  configPath: string,
  { dryRun, logger }: { dryRun: boolean; logger: Logger },
): Promise<number> {
  const snapshot = await loadConfig(configPath);
  logger.info("loaded configuration", { config: configPath });
  logger.info("running in one-shot mode");
  const summary = await runOneShot(snapshot, {
    logger: logger.child("one-shot"),
    dryRun,
  });
  const failed = summary.records.some((r) => r.outcome.status === "failed");
  return failed || summary.failedWatches.length ? 1 : 0;
}

export async function runWatch(
  configPath: string,
  { dryRun, logger }: { dryRun: boolean; logger: Logger },
): Promise<number> {
  const supervisor = new WatchSupervisor({
    configPath,
    dryRun,
    logger: logger.child("supervisor"),
  });
  await supervisor.start();

  const onSignal = (signal: NodeJS.Signals) => {
    logger.info("received signal; shutting down", { signal });
    supervisor.stop().catch((err: unknown) => {
      logger.error("shutdown failed", { error: errorMessage(err) });
    });
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);
  try {
    await supervisor.run();
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
  }
  return 0;
}

export async function main(argv: string[] = process.argv): Promise<number> {
  const program = buildProgram();
  program.parse(argv);
  const opts = program.opts<Omit<CliOptions, "config">>();
  const logger = new ConsoleLogger(parseLogLevel(opts.logLevel));
  const configPath = resolveConfigPath(program.args[0]);
  logger.info("using config", { config: configPath });

  try {
    return opts.oneShot
      ? await runOnce(configPath, { dryRun: opts.dryRun, logger })
      : await runWatch(configPath, { dryRun: opts.dryRun, logger });
  } catch (err) {
    // startup failures (config, watcher setup) are fatal
    logger.error(errorMessage(err));
    return 1;
  }
}

function samePath(a: string, b: string) {
  const A = path.resolve(a);
  const B = path.resolve(b);
  return process.platform === "win32"
    ? A.toLowerCase() === B.toLowerCase()
    : A === B;
}

/**
 * True when `entryFile` is the script node was started with. The bin link
 * may point at it through a symlink, so both sides are resolved first.
 */
export function isDirectRun(
  entryFile: string,
  argv1 = process.argv[1] ?? "",
): boolean {
  if (!argv1) return false;
  const real = (p: string) => (fs.existsSync(p) ? fs.realpathSync(p) : p);
  return samePath(real(entryFile), real(argv1));
}

if (isDirectRun(__filename)) {
  main().then(
    (code) => process.exit(code),
    (err: unknown) => {
      console.error(`${CLI_NAME} fatal:`, err);
      process.exit(1);
    },
  );
}
