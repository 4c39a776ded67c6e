import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import {
  BUILTIN_PREFIXES,
  CONFIG_FILE_NAME,
  parseBuildOptions,
  readConfigFile,
  resolveBuildOptions,
} from "../src/config.js";

describe("parseBuildOptions", () => {
  it("fills defaults", () => {
    const result = parseBuildOptions({});
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.concurrency).toBe(8);
      expect(result.value.extensions).toEqual([".java"]);
      expect(result.value.ignoreDirectories).toContain("node_modules");
      expect(result.value.builtinPrefixes).toEqual(BUILTIN_PREFIXES);
    }
  });

  it("treats undefined as empty options", () => {
    expect(parseBuildOptions(undefined).ok).toBe(true);
  });

  it("rejects concurrency outside 1-64", () => {
    for (const concurrency of [0, 65, 2.5]) {
      const result = parseBuildOptions({ concurrency });
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe("INVALID_CONFIG");
        expect(result.error.message).toMatch(/^Invalid build options: concurrency: /);
      }
    }
  });

  it("rejects extensions without a leading dot", () => {
    const result = parseBuildOptions({ extensions: ["java"] }, "test input");
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toMatch(/^Invalid test input: extensions\.0: /);
    }
  });

  it("rejects unknown keys", () => {
    const result = parseBuildOptions({ threads: 4 });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toContain("threads");
    }
  });
});

describe("config file", () => {
  let root: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "structgraph-config-"));
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("is optional", async () => {
    const result = await readConfigFile(root);
    expect(result).toEqual({ ok: true, value: null });
  });

  it("must be valid JSON", async () => {
    fs.writeFileSync(path.join(root, CONFIG_FILE_NAME), "{ concurrency: 2");
    const result = await readConfigFile(root);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe("structgraph.config.json is not valid JSON");
      expect(result.error.path).toBe(path.join(root, CONFIG_FILE_NAME));
    }
  });

  it("must hold an object", async () => {
    fs.writeFileSync(path.join(root, CONFIG_FILE_NAME), "[1, 2]");
    const result = await readConfigFile(root);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe("structgraph.config.json must hold an object");
    }
  });

  it("is overridden by explicit options", async () => {
    fs.writeFileSync(
      path.join(root, CONFIG_FILE_NAME),
      JSON.stringify({ concurrency: 2, extensions: [".java", ".jav"] })
    );
    const result = await resolveBuildOptions(root, { concurrency: 3 });
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.concurrency).toBe(3);
      expect(result.value.extensions).toEqual([".java", ".jav"]);
    }
  });

  it("names the file in validation errors", async () => {
    fs.writeFileSync(path.join(root, CONFIG_FILE_NAME), JSON.stringify({ concurrency: 100 }));
    const result = await resolveBuildOptions(root);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toMatch(/^Invalid structgraph\.config\.json: concurrency: /);
    }
  });
});
