// tests/config.test.ts

import fsp from "node:fs/promises";
import os from "node:os";
import path, { join } from "node:path";
import {
  activateConfig,
  loadConfig,
  parseConfig,
  resolveConfigPath,
} from "../config";
import { ConfigParseError } from "../errors";
import { mkTmp } from "./util";

const SAMPLE = `
[[watch]]
path = "/some/path"
recursive_mode = "non-recursive"
bucket_names = ["bucket1", "bucket2", "bucket3"]

[[bucket]]
name = "bucket1"
destination = "/other/path"
extension_filters = ["zip"]
name_filters = ['.*\\.tar\\.gz']
action = "copy"
priority = 0
override_action = "skip"

[[bucket]]
name = "bucket2"
destination = "/other/other/path"
extension_filters = ["exe", "bin"]
name_filters = []
action = "move"
override_action = "rename"
priority = 0

[[bucket]]
name = "bucket3"
destination = "/random/path"
extension_filters = ["obj"]
name_filters = []
action = "delete"
priority = 255
override_action = "overwrite"
`;

describe("parseConfig", () => {
  test("reads watch specs and buckets", () => {
    const raw = parseConfig(SAMPLE);
    expect(raw.watch).toEqual([
      {
        path: "/some/path",
        recursive_mode: "non-recursive",
        bucket_names: ["bucket1", "bucket2", "bucket3"],
      },
    ]);
    expect(raw.bucket).toEqual([
      {
        name: "bucket1",
        destination: "/other/path",
        extension_filters: ["zip"],
        name_filters: [".*\\.tar\\.gz"],
        priority: 0,
        action: "copy",
        override_action: "skip",
      },
      {
        name: "bucket2",
        destination: "/other/other/path",
        extension_filters: ["exe", "bin"],
        name_filters: [],
        priority: 0,
        action: "move",
        override_action: "rename",
      },
      {
        name: "bucket3",
        destination: "/random/path",
        extension_filters: ["obj"],
        name_filters: [],
        priority: 255,
        action: "delete",
        override_action: "overwrite",
      },
    ]);
  });

  test("fills in defaults", () => {
    const raw = parseConfig(`
[[watch]]
path = "/w"

[[bucket]]
name = "b"
destination = "/d"
`);
    expect(raw.watch[0]).toEqual({
      path: "/w",
      recursive_mode: "non-recursive",
      bucket_names: [],
    });
    expect(raw.bucket[0]).toEqual({
      name: "b",
      destination: "/d",
      extension_filters: [],
      name_filters: [],
      priority: 0,
      action: "move",
      override_action: "skip",
    });
  });

  test("an empty document is an empty configuration", () => {
    expect(parseConfig("")).toEqual({ watch: [], bucket: [] });
  });

  test("expands ~ and resolves relative paths against the config directory", () => {
    const raw = parseConfig(
      `
[[watch]]
path = "~/Downloads"

[[bucket]]
name = "b"
destination = "sorted/images"
`,
      { baseDir: "/etc/tidyd" },
    );
    expect(raw.watch[0].path).toBe(join(os.homedir(), "Downloads"));
    expect(raw.bucket[0].destination).toBe("/etc/tidyd/sorted/images");
  });

  test("malformed TOML is a ConfigParseError", () => {
    expect(() => parseConfig("[[watch]\npath = ")).toThrow(ConfigParseError);
    expect(() => parseConfig("[[watch]\npath = ")).toThrow(/^invalid TOML/);
  });

  test("unknown action names the offending field", () => {
    const doc = `
[[bucket]]
name = "b"
destination = "/d"
action = "shred"
`;
    expect(() => parseConfig(doc)).toThrow(ConfigParseError);
    expect(() => parseConfig(doc)).toThrow(/bucket\.0\.action/);
  });

  test("priority must be a non-negative integer", () => {
    const doc = (p: string) => `
[[bucket]]
name = "b"
destination = "/d"
priority = ${p}
`;
    expect(() => parseConfig(doc("-1"))).toThrow(/bucket\.0\.priority/);
    expect(() => parseConfig(doc("1.5"))).toThrow(/bucket\.0\.priority/);
    expect(parseConfig(doc("7")).bucket[0].priority).toBe(7);
  });

  test("bad recursive mode is rejected", () => {
    expect(() =>
      parseConfig(`
[[watch]]
path = "/w"
recursive_mode = "deep"
`),
    ).toThrow(/watch\.0\.recursive_mode/);
  });
});

describe("activateConfig", () => {
  test("compiles name filters once into the snapshot", () => {
    const snap = activateConfig(parseConfig(SAMPLE));
    expect(snap.buckets.map((b) => b.name)).toEqual([
      "bucket1",
      "bucket2",
      "bucket3",
    ]);
    const [first] = snap.buckets;
    expect(first.patterns).toHaveLength(1);
    expect(first.patterns[0]).toBeInstanceOf(RegExp);
    expect(first.patterns[0].test("archive.tar.gz")).toBe(true);
    expect([...first.extensionFilters]).toEqual(["zip"]);
    expect(snap.watch[0]).toEqual({
      path: "/some/path",
      recursiveMode: "non-recursive",
      bucketNames: ["bucket1", "bucket2", "bucket3"],
    });
    expect(Object.isFrozen(snap)).toBe(true);
    expect(Object.isFrozen(snap.buckets)).toBe(true);
  });

  test("an invalid regular expression fails activation", () => {
    const raw = parseConfig(`
[[bucket]]
name = "broken"
destination = "/d"
name_filters = ["(unclosed"]
`);
    expect(() => activateConfig(raw)).toThrow(ConfigParseError);
    expect(() => activateConfig(raw)).toThrow(
      /bucket 'broken': invalid name filter/,
    );
  });

  test("duplicate bucket names fail activation", () => {
    const raw = parseConfig(`
[[bucket]]
name = "same"
destination = "/a"

[[bucket]]
name = "same"
destination = "/b"
`);
    expect(() => activateConfig(raw)).toThrow("duplicate bucket name 'same'");
  });

  test("references to undeclared buckets are reported, not fatal", () => {
    const snap = activateConfig(
      parseConfig(`
[[watch]]
path = "/w"
bucket_names = ["real", "ghost"]

[[bucket]]
name = "real"
destination = "/d"
`),
    );
    expect(snap.unknownBucketReferences).toEqual([
      { watchPath: "/w", bucketName: "ghost" },
    ]);
  });
});

describe("loadConfig", () => {
  let tmp: string;

  beforeAll(async () => {
    tmp = await mkTmp("config");
  });

  afterAll(async () => {
    await fsp.rm(tmp, { recursive: true, force: true });
  });

  test("reads a file and resolves relative paths next to it", async () => {
    const file = join(tmp, "config.toml");
    await fsp.writeFile(
      file,
      `
[[watch]]
path = "inbox"
bucket_names = ["b"]

[[bucket]]
name = "b"
destination = "out"
extension_filters = ["txt"]
`,
    );
    const snap = await loadConfig(file);
    expect(snap.source).toBe(file);
    expect(snap.watch[0].path).toBe(join(tmp, "inbox"));
    expect(snap.buckets[0].destination).toBe(join(tmp, "out"));
  });

  test("a missing file is a ConfigParseError", async () => {
    await expect(loadConfig(join(tmp, "nope.toml"))).rejects.toThrow(
      /^cannot read config/,
    );
    await expect(loadConfig(join(tmp, "nope.toml"))).rejects.toBeInstanceOf(
      ConfigParseError,
    );
  });
});

describe("resolveConfigPath", () => {
  test("an explicit path wins and is made absolute", () => {
    expect(resolveConfigPath("/etc/tidyd.toml")).toBe("/etc/tidyd.toml");
    expect(resolveConfigPath("~/x.toml")).toBe(join(os.homedir(), "x.toml"));
  });

  test("first existing candidate, XDG_CONFIG_HOME first", () => {
    const env = { XDG_CONFIG_HOME: "/xdg" };
    const dotfile = join(os.homedir(), ".tidyd.toml");
    expect(
      resolveConfigPath(undefined, {
        env,
        exists: (p) => p === dotfile,
      }),
    ).toBe(dotfile);
    expect(
      resolveConfigPath(undefined, {
        env,
        exists: () => true,
      }),
    ).toBe(path.join("/xdg", "tidyd", "config.toml"));
  });

  test("falls back to ~/.config/tidyd/config.toml", () => {
    expect(resolveConfigPath(undefined, { env: {}, exists: () => false })).toBe(
      join(os.homedir(), ".config", "tidyd", "config.toml"),
    );
  });
});
