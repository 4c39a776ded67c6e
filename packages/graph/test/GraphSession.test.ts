import { describe, it, expect, beforeAll, afterAll } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { silentLogger } from "@structgraph/core";

import { GraphBuilder } from "../src/GraphBuilder.js";
import { GraphSession, NOT_INITIALIZED } from "../src/GraphSession.js";
import type { GraphStore } from "../src/GraphStore.js";
import {
  describeEntity,
  formatCallees,
  formatCallers,
  formatEntities,
  formatRelations,
  formatStats,
} from "../src/tools/index.js";
import { buildSources } from "./support/build.js";

const A_B = {
  "src/p/A.java": "package p; class A { void foo() { bar(); } void bar() {} }",
  "src/p/B.java": "package p; class B extends A { void bar() {} }",
};

describe("GraphSession", () => {
  let root: string;

  beforeAll(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "structgraph-session-"));
    for (const [relative, text] of Object.entries(A_B)) {
      fs.mkdirSync(path.join(root, path.dirname(relative)), { recursive: true });
      fs.writeFileSync(path.join(root, relative), text);
    }
  });

  afterAll(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("answers with an error before initialization", () => {
    const session = new GraphSession(new GraphBuilder({ logger: silentLogger }));
    expect(session.isInitialized()).toBe(false);
    expect(session.store()).toEqual({ ok: false, error: NOT_INITIALIZED });
    expect(session.rootPath).toBeNull();
    expect(session.report).toBeNull();
  });

  it("holds the graph of the last successful build", async () => {
    const session = new GraphSession(new GraphBuilder({ logger: silentLogger }));

    const first = await session.initialize(root);
    expect(first.ok).toBe(true);
    expect(session.rootPath).toBe(root);
    expect(session.report?.filesIndexed).toBe(2);

    const failed = await session.initialize(path.join(root, "missing"));
    expect(failed.ok).toBe(false);
    expect(session.rootPath).toBe(root);

    const store = session.store();
    expect(store.ok).toBe(true);
    if (store.ok) {
      expect(store.value.hasEntity("p.B.bar()")).toBe(true);
    }
  });
});

describe("tool output", () => {
  let store: GraphStore;

  beforeAll(async () => {
    store = (await buildSources(A_B)).store;
  });

  it("lists counts of every kind", () => {
    const text = formatStats(store.stats());
    expect(text.split("\n").slice(0, 3)).toEqual(["## Graph Statistics", "", "**Entities:** 11"]);
    expect(text).toContain("\n- CLASS: 2\n");
    expect(text).toContain("\n- EXTERNAL: 0\n");
    expect(text.endsWith("- IMPORTS: 0")).toBe(true);
  });

  it("groups found entities by kind", () => {
    expect(formatEntities(store.findEntities(/bar/))).toBe(
      [
        "## Found 2 entities",
        "",
        "### METHOD (2)",
        "",
        "- **p.A.bar()** (METHOD) - src/p/A.java:1",
        "- **p.B.bar()** (METHOD) - src/p/B.java:1",
      ].join("\n")
    );
    expect(formatEntities([])).toBe("No entities found matching criteria");
  });

  it("describes an entity with its children", () => {
    expect(describeEntity(store, "p.A")).toBe(
      [
        "## p.A",
        "",
        "**Kind:** CLASS",
        "**Name:** A",
        "**Declared at:** src/p/A.java:1",
        "**Container:** src/p/A.java",
        "",
        "### Contains (3)",
        "- **p.A.foo()** (METHOD) - src/p/A.java:1",
        "- **p.A.bar()** (METHOD) - src/p/A.java:1",
        "- **p.A.A()** (CONSTRUCTOR) - src/p/A.java",
      ].join("\n")
    );
    expect(describeEntity(store, "p.C")).toBeNull();
  });

  it("describes a method signature", () => {
    expect(describeEntity(store, "p.B.B()")).toBe(
      [
        "## p.B.B()",
        "",
        "**Kind:** CONSTRUCTOR",
        "**Name:** B",
        "**Declared at:** src/p/B.java",
        "**Modifiers:** SYNTHETIC",
        "**Parameters:** ()",
        "**Container:** p.B",
      ].join("\n")
    );
  });

  it("lists relations by direction", () => {
    expect(formatRelations(store, "p.B", "outgoing")).toBe(
      [
        "## Relations of p.B",
        "",
        "### Outgoing (3)",
        "- CONTAINS → p.B.bar()",
        "- CONTAINS → p.B.B()",
        "- INHERITS → p.A at src/p/B.java:1",
      ].join("\n")
    );
    expect(formatRelations(store, "p.A", "incoming", "INHERITS")).toBe(
      ["## Relations of p.A", "", "### Incoming (1)", "- INHERITS ← p.B at src/p/B.java:1"].join("\n")
    );
  });

  it("lists callers and callees with their sites", () => {
    expect(formatCallers(store, "p.A.bar()")).toBe(
      [
        "## Callers of p.A.bar()",
        "",
        "Found 1 caller(s) at 1 call site(s):",
        "",
        "- INVOKES ← p.A.foo() at src/p/A.java:1",
      ].join("\n")
    );
    expect(formatCallers(store, "p.B.bar()")).toBe("No callers found for: p.B.bar()");
    expect(formatCallees(store, "p.A.foo()")).toBe(
      [
        "## Callees of p.A.foo()",
        "",
        "Found 1 callee(s) at 1 call site(s):",
        "",
        "- INVOKES → p.A.bar() at src/p/A.java:1",
      ].join("\n")
    );
    expect(formatCallees(store, "p.A.bar()")).toBe("No resolved calls from: p.A.bar()");
  });
});
