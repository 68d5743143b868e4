// src/config.ts
//
// Configuration document -> immutable ConfigSnapshot.
//
// The document is TOML with two arrays of tables:
//
//   [[watch]]
//   path = "~/Downloads"
//   recursive_mode = "non-recursive"
//   bucket_names = ["images", "archives"]
//
//   [[bucket]]
//   name = "images"
//   destination = "~/Pictures/inbox"
//   extension_filters = ["png", "jpg"]
//   name_filters = ["^Screenshot"]
//   priority = 1
//   action = "move"
//   override_action = "rename"

import fs from "node:fs";
import { readFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { parse as parseToml, TomlError } from "smol-toml";
import { z } from "zod";
import { CLI_NAME, CONFIG_FILE_NAME } from "./constants.js";
import { ConfigParseError, errorMessage } from "./errors.js";
import { expandHome, resolveUserPath } from "./paths.js";

export const RECURSIVE_MODES = ["recursive", "non-recursive"] as const;
export const ACTION_KINDS = ["move", "delete", "copy"] as const;
export const OVERRIDE_ACTIONS = ["overwrite", "rename", "skip"] as const;

export type RecursiveMode = (typeof RECURSIVE_MODES)[number];
export type ActionKind = (typeof ACTION_KINDS)[number];
export type OverrideAction = (typeof OVERRIDE_ACTIONS)[number];

const watchSchema = z.object({
  path: z.string().min(1),
  recursive_mode: z.enum(RECURSIVE_MODES).default("non-recursive"),
  bucket_names: z.array(z.string()).default([]),
});

const bucketSchema = z.object({
  name: z.string().min(1),
  destination: z.string().min(1),
  extension_filters: z.array(z.string()).default([]),
  name_filters: z.array(z.string()).default([]),
  priority: z.number().int().nonnegative().default(0),
  action: z.enum(ACTION_KINDS).default("move"),
  override_action: z.enum(OVERRIDE_ACTIONS).default("skip"),
});

const documentSchema = z.object({
  watch: z.array(watchSchema).default([]),
  bucket: z.array(bucketSchema).default([]),
});

export type RawWatch = z.infer<typeof watchSchema>;
export type RawBucket = z.infer<typeof bucketSchema>;
export type RawConfig = z.infer<typeof documentSchema>;

export interface Bucket {
  readonly name: string;
  readonly destination: string;
  readonly extensionFilters: ReadonlySet<string>;
  readonly nameFilters: readonly string[];
  // compiled once on activation, never per event
  readonly patterns: readonly RegExp[];
  readonly priority: number;
  readonly action: ActionKind;
  readonly overrideAction: OverrideAction;
}

export interface WatchSpec {
  readonly path: string;
  readonly recursiveMode: RecursiveMode;
  readonly bucketNames: readonly string[];
}

export interface UnknownBucketReference {
  watchPath: string;
  bucketName: string;
}

export interface ConfigSnapshot {
  readonly watch: readonly WatchSpec[];
  readonly buckets: readonly Bucket[];
  /** Names referenced by a watch spec that no bucket declares. */
  readonly unknownBucketReferences: readonly UnknownBucketReference[];
  readonly source?: string;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const where = issue.path.length ? issue.path.join(".") : "(root)";
      return `${where}: ${issue.message}`;
    })
    .join("; ");
}

/**
 * Parse and validate a TOML document. Watch paths and destinations are
 * home-expanded, and relative ones are resolved against `baseDir`.
 */
export function parseConfig(
  text: string,
  { baseDir, source }: { baseDir?: string; source?: string } = {},
): RawConfig {
  let doc: unknown;
  try {
    doc = parseToml(text);
  } catch (err) {
    const detail =
      err instanceof TomlError
        ? `line ${err.line}, column ${err.column}: ${err.message}`
        : errorMessage(err);
    throw new ConfigParseError(`invalid TOML: ${detail}`, { source }, {
      cause: err,
    });
  }

  const parsed = documentSchema.safeParse(doc);
  if (!parsed.success) {
    throw new ConfigParseError(
      `invalid configuration: ${describeIssues(parsed.error)}`,
      { source },
      { cause: parsed.error },
    );
  }

  const raw = parsed.data;
  return {
    watch: raw.watch.map((w) => ({
      ...w,
      path: resolveUserPath(w.path, baseDir),
    })),
    bucket: raw.bucket.map((b) => ({
      ...b,
      destination: resolveUserPath(b.destination, baseDir),
    })),
  };
}

function compilePattern(bucket: string, pattern: string): RegExp {
  try {
    return new RegExp(pattern, "u");
  } catch (err) {
    throw new ConfigParseError(
      `bucket '${bucket}': invalid name filter ${JSON.stringify(pattern)}: ${errorMessage(err)}`,
      { bucket, pattern },
      { cause: err },
    );
  }
}

/**
 * Turn a validated document into the snapshot used for dispatch. This is
 * the only place name filters are compiled.
 */
export function activateConfig(
  raw: RawConfig,
  { source }: { source?: string } = {},
): ConfigSnapshot {
  const seen = new Set<string>();
  const buckets: Bucket[] = [];
  for (const b of raw.bucket) {
    if (seen.has(b.name)) {
      throw new ConfigParseError(`duplicate bucket name '${b.name}'`, {
        bucket: b.name,
        source,
      });
    }
    seen.add(b.name);
    buckets.push(
      Object.freeze({
        name: b.name,
        destination: b.destination,
        extensionFilters: new Set(b.extension_filters),
        nameFilters: Object.freeze([...b.name_filters]),
        patterns: Object.freeze(
          b.name_filters.map((p) => compilePattern(b.name, p)),
        ),
        priority: b.priority,
        action: b.action,
        overrideAction: b.override_action,
      }),
    );
  }

  const unknownBucketReferences: UnknownBucketReference[] = [];
  const watch = raw.watch.map((w) => {
    for (const name of w.bucket_names) {
      if (!seen.has(name)) {
        unknownBucketReferences.push({ watchPath: w.path, bucketName: name });
      }
    }
    return Object.freeze({
      path: w.path,
      recursiveMode: w.recursive_mode,
      bucketNames: Object.freeze([...w.bucket_names]),
    });
  });

  return Object.freeze({
    watch: Object.freeze(watch),
    buckets: Object.freeze(buckets),
    unknownBucketReferences: Object.freeze(unknownBucketReferences),
    source,
  });
}

export async function loadConfig(file: string): Promise<ConfigSnapshot> {
  let text: string;
  try {
    text = await readFile(file, "utf8");
  } catch (err) {
    throw new ConfigParseError(
      `cannot read config ${file}: ${errorMessage(err)}`,
      { source: file },
      { cause: err },
    );
  }
  const raw = parseConfig(text, { baseDir: path.dirname(file), source: file });
  return activateConfig(raw, { source: file });
}

export function configCandidates(env = process.env): string[] {
  const out: string[] = [];
  if (env.XDG_CONFIG_HOME) {
    out.push(path.join(env.XDG_CONFIG_HOME, CLI_NAME, CONFIG_FILE_NAME));
  }
  out.push(path.join(os.homedir(), ".config", CLI_NAME, CONFIG_FILE_NAME));
  out.push(path.join(os.homedir(), `.${CLI_NAME}.toml`));
  return out;
}

/**
 * The explicit path if given, else the first candidate that exists, else
 * the conventional location under ~/.config.
 */
export function resolveConfigPath(
  explicit?: string,
  {
    env = process.env,
    exists = fs.existsSync,
  }: { env?: NodeJS.ProcessEnv; exists?: (p: string) => boolean } = {},
): string {
  if (explicit) return path.resolve(expandHome(explicit));
  const candidates = configCandidates(env);
  const found = candidates.find((p) => exists(p));
  return found ?? path.join(os.homedir(), ".config", CLI_NAME, CONFIG_FILE_NAME);
}
