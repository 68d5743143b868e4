// src/paths.ts
import { readdir } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { PathEncodingError } from "./errors.js";

export function expandHome(p: string): string {
  if (!p || p[0] !== "~") return p;
  if (p === "~") return os.homedir();
  if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
  // "~user" not handled
  return p;
}

/** Home-expand and, if still relative, resolve against `baseDir`. */
export function resolveUserPath(p: string, baseDir?: string): string {
  const expanded = expandHome(p);
  if (path.isAbsolute(expanded)) return path.normalize(expanded);
  return baseDir ? path.resolve(baseDir, expanded) : path.resolve(expanded);
}

// basename ignores trailing separators, so "/a/b/" -> "b"
export function finalSegment(p: string): string {
  return path.basename(p);
}

/**
 * Text after the last "." of a file name. A name without a dot, or whose
 * only dot is the leading one (".bashrc"), has no extension.
 */
export function finalExtension(name: string): string | undefined {
  const dot = name.lastIndexOf(".");
  if (dot <= 0) return undefined;
  return name.slice(dot + 1);
}

// Node decodes invalid byte sequences in names to U+FFFD, so a name holding
// it may or may not have decoded cleanly; see nameDecodes
export function isUndecodable(name: string): boolean {
  return name.includes("\uFFFD");
}

/**
 * Final segment of `p`. Throws PathEncodingError when the name holds U+FFFD,
 * unless `verified` says its on-disk bytes are valid UTF-8.
 */
export function decodedName(p: string, verified = false): string {
  const name = finalSegment(p);
  if (!verified && isUndecodable(name)) throw new PathEncodingError(p);
  return name;
}

const strictUtf8 = new TextDecoder("utf-8", { fatal: true });

function strictDecode(raw: Buffer): string | undefined {
  try {
    return strictUtf8.decode(raw);
  } catch {
    // not valid UTF-8
    return undefined;
  }
}

/**
 * Whether the on-disk name of `p` is valid UTF-8. Only names holding U+FFFD
 * are looked up: the raw entries of the parent directory are decoded strictly
 * and compared with the name.
 */
export async function nameDecodes(p: string): Promise<boolean> {
  const name = finalSegment(p);
  if (!isUndecodable(name)) return true;
  const raw = await readdir(path.dirname(p), { encoding: "buffer" });
  return raw.some((entry) => strictDecode(entry) === name);
}
