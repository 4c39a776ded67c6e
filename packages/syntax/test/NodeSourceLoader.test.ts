import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { NodeSourceLoader } from "../src/infrastructure/loader/NodeSourceLoader.js";

describe("NodeSourceLoader", () => {
  let root: string;
  const loader = new NodeSourceLoader();

  const write = (relativePath: string, text: string): void => {
    const full = join(root, relativePath);
    mkdirSync(join(full, ".."), { recursive: true });
    writeFileSync(full, text);
  };

  beforeAll(() => {
    root = mkdtempSync(join(tmpdir(), "structgraph-loader-"));
    write("Z.java", "class Z {}");
    write("src/com/A.java", "package com; class A {}");
    write("src/notes.txt", "not source");
    write("target/generated/C.java", "class C {}");
    write("node_modules/pkg/D.java", "class D {}");
    write(".git/E.java", "class E {}");
  });

  afterAll(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("collects matching files sorted by relative path", async () => {
    const result = await loader.load(root);
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    expect(result.value.files.map((f) => f.path)).toEqual(["Z.java", "src/com/A.java"]);
    expect(result.value.files[1].text).toBe("package com; class A {}");
    expect(result.value.failures).toEqual([]);
  });

  it("honors custom extensions and ignore lists", async () => {
    const result = await loader.load(root, { extensions: [".txt"], ignoreDirectories: [] });
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    expect(result.value.files.map((f) => f.path)).toEqual(["src/notes.txt"]);
  });

  it("finds build output when it is not ignored", async () => {
    const result = await loader.load(root, { extensions: [".java"], ignoreDirectories: [".git"] });
    expect(result.ok).toBe(true);
    if (!result.ok) return;

    expect(result.value.files.map((f) => f.path)).toEqual([
      "Z.java",
      "node_modules/pkg/D.java",
      "src/com/A.java",
      "target/generated/C.java",
    ]);
  });

  it("fails when the root does not exist", async () => {
    const result = await loader.load(join(root, "missing"));
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe("SOURCE_ROOT_NOT_FOUND");
  });

  it("fails when the root is a file", async () => {
    const result = await loader.load(join(root, "Z.java"));
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe("SOURCE_ROOT_NOT_DIRECTORY");
  });
});
