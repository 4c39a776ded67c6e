import { describe, it, expect, beforeAll } from "vitest";
import { TreeSitterParser } from "../src/infrastructure/parsers/TreeSitterParser.js";
import type { CompilationUnit, TypeDeclaration } from "../src/core/model.js";
import { readFileSync } from "fs";
import { join, dirname } from "path";
import { fileURLToPath } from "url";

const __dirname = dirname(fileURLToPath(import.meta.url));
const FIXTURES = join(__dirname, "fixtures");

function member(type: TypeDeclaration, name: string): TypeDeclaration {
  const found = type.types.find((t) => t.name === name);
  if (!found) throw new Error(`no member type ${name}`);
  return found;
}

describe("TreeSitterParser", () => {
  let parser: TreeSitterParser;
  let unit: CompilationUnit;

  beforeAll(async () => {
    parser = new TreeSitterParser();
    const source = readFileSync(join(FIXTURES, "Inventory.java"), "utf-8");
    const result = await parser.parse(source, "src/com/example/shop/Inventory.java");
    if (!result.ok) throw result.error;
    expect(result.value.issues).toHaveLength(0);
    unit = result.value.unit;
  });

  describe("file level", () => {
    it("keeps the path it was given", () => {
      expect(unit.path).toBe("src/com/example/shop/Inventory.java");
    });

    it("extracts the package", () => {
      expect(unit.packageName).toBe("com.example.shop");
    });

    it("extracts single, wildcard and static imports", () => {
      expect(unit.imports.map(({ path, isStatic, isWildcard }) => ({ path, isStatic, isWildcard }))).toEqual([
        { path: "java.util.List", isStatic: false, isWildcard: false },
        { path: "java.util", isStatic: false, isWildcard: true },
        { path: "java.util.Collections.sort", isStatic: true, isWildcard: false },
      ]);
    });

    it("extracts top-level types in order", () => {
      expect(unit.types.map((t) => [t.kind, t.name])).toEqual([
        ["class", "Inventory"],
        ["record", "Pair"],
      ]);
    });
  });

  describe("class declaration", () => {
    it("reads modifiers and erased supertypes", () => {
      const inventory = unit.types[0];
      expect(inventory.modifiers).toEqual(["public", "abstract"]);
      expect(inventory.superclass?.name).toBe("Base");
      expect(inventory.interfaces.map((i) => i.name)).toEqual(["Countable", "Comparable"]);
    });

    it("splits multi-declarator fields", () => {
      const fields = unit.types[0].fields.map((f) => ({
        name: f.name,
        type: f.type.name,
        dimensions: f.type.dimensions,
        hasInitializer: f.hasInitializer,
      }));
      expect(fields).toEqual([
        { name: "LIMIT", type: "int", dimensions: 0, hasInitializer: true },
        { name: "items", type: "List", dimensions: 0, hasInitializer: true },
        { name: "spare", type: "List", dimensions: 0, hasInitializer: false },
        { name: "counts", type: "int", dimensions: 1, hasInitializer: false },
      ]);
      expect(unit.types[0].fields[0].modifiers).toEqual(["private", "static", "final"]);
    });

    it("reads methods with parameters and bodies", () => {
      const methods = unit.types[0].methods;
      expect(methods.map((m) => m.name)).toEqual(["add", "count", "helper"]);

      const add = methods[0];
      expect(add.returnType.name).toBe("void");
      expect(add.parameters.map((p) => [p.name, p.type.name, p.variadic])).toEqual([
        ["item", "T", false],
        ["tags", "String", true],
      ]);

      expect(methods[1].modifiers).toEqual(["abstract"]);
    });

    it("reads constructors", () => {
      const constructors = unit.types[0].constructors;
      expect(constructors.map((c) => c.parameters.map((p) => p.type.name))).toEqual([[], ["int"]]);
      expect(constructors[0].modifiers).toEqual(["public"]);
    });

    it("reads static and instance initializers in order", () => {
      expect(unit.types[0].initializers.map((i) => i.isStatic)).toEqual([true, false]);
    });

    it("nests member types", () => {
      const inventory = unit.types[0];
      expect(inventory.types.map((t) => [t.kind, t.name])).toEqual([
        ["class", "Snapshot"],
        ["enum", "Mode"],
        ["interface", "Listener"],
      ]);
      expect(member(inventory, "Snapshot").modifiers).toEqual(["static"]);
      expect(member(inventory, "Listener").methods.map((m) => m.name)).toEqual(["changed"]);
    });

    it("reads enum constants and enum body declarations", () => {
      const mode = member(unit.types[0], "Mode");
      expect(mode.enumConstants.map((c) => [c.name, c.argumentCount])).toEqual([
        ["FAST", 0],
        ["SLOW", 1],
      ]);
      expect(mode.constructors).toHaveLength(2);
    });
  });

  describe("record declaration", () => {
    it("reads components and the compact constructor", () => {
      const pair = unit.types[1];
      expect(pair.recordComponents.map((c) => [c.name, c.type.name])).toEqual([
        ["left", "String"],
        ["right", "int"],
      ]);
      expect(pair.constructors).toHaveLength(1);
      expect(pair.constructors[0].parameters.map((p) => p.name)).toEqual(["left", "right"]);
    });
  });

  describe("bodies", () => {
    it("lists call sites in source order", () => {
      const summary = unit.calls.map((call) => {
        switch (call.kind) {
          case "unqualified":
          case "qualified":
            return `${call.kind}:${call.name}/${call.argumentCount}`;
          case "instantiation":
            return `new:${call.type.name}/${call.argumentCount}`;
          case "delegation":
            return `${call.target}/${call.argumentCount}`;
        }
      });
      expect(summary).toEqual([
        "new:ArrayList/0",
        "qualified:register/1",
        "qualified:clear/0",
        "this/1",
        "super/1",
        "qualified:add/1",
        "unqualified:helper/1",
        "qualified:size/0",
        "unqualified:log/1",
        "new:Snapshot/2",
        "unqualified:open/0",
        "qualified:read/0",
        "unqualified:handle/1",
        "unqualified:run/0",
        "unqualified:check/1",
      ]);
    });

    it("classifies receivers", () => {
      const register = unit.calls.find((c) => c.kind === "qualified" && c.name === "register");
      expect(register?.kind === "qualified" && register.receiver).toEqual({
        kind: "name",
        path: ["Registry"],
        viaThis: false,
      });

      const size = unit.calls.find((c) => c.kind === "qualified" && c.name === "size");
      expect(size?.kind === "qualified" && size.receiver).toEqual({
        kind: "name",
        path: ["items"],
        viaThis: true,
      });
    });

    it("records locals with their declared types", () => {
      const typeOf = (name: string) => {
        const variable = unit.locals.find((l) => l.name === name);
        if (!variable) throw new Error(`no local ${name}`);
        return variable.type ? `${variable.type.name}${"[]".repeat(variable.type.dimensions)}` : null;
      };

      expect(typeOf("capacity")).toBe("int");
      expect(typeOf("tags")).toBe("String[]");
      expect(typeOf("tag")).toBe("String");
      expect(typeOf("copy")).toBeNull();
      expect(typeOf("reader")).toBe("Reader");
      expect(typeOf("e")).toBeNull();
      expect(typeOf("r")).toBe("Runnable");
      expect(typeOf("depth")).toBe("int");
    });

    it("does not treat record components as locals", () => {
      expect(unit.locals.find((l) => l.name === "left")).toBeUndefined();
    });

    it("scopes a loop variable to its loop", () => {
      const tag = unit.locals.find((l) => l.name === "tag");
      const log = unit.calls.find((c) => c.kind === "unqualified" && c.name === "log");
      const helper = unit.calls.find((c) => c.kind === "unqualified" && c.name === "helper");
      if (!tag || !log || !helper) throw new Error("fixture changed");

      expect(log.span.start.offset).toBeGreaterThanOrEqual(tag.scope.start.offset);
      expect(log.span.start.offset).toBeLessThan(tag.scope.end.offset);
      expect(helper.span.start.offset).toBeLessThan(tag.scope.start.offset);
    });
  });

  describe("local declarations", () => {
    async function parseUnit(source: string): Promise<CompilationUnit> {
      const result = await parser.parse(source, "Local.java");
      if (!result.ok) throw result.error;
      return result.value.unit;
    }

    it("nests local types under the type declaring the body", async () => {
      const local = await parseUnit(
        "class Host { void run() { class Step { void go() {} } Runnable r = new Runnable() { class Hidden {} public void run() {} }; } }"
      );
      const host = local.types[0];
      expect(host.types.map((t) => [t.kind, t.name])).toEqual([["class", "Step"]]);
      expect(member(host, "Step").methods.map((m) => m.name)).toEqual(["go"]);
    });

    it("scopes an instanceof pattern variable to its statement", async () => {
      const source = "class Host { void run(Object o) { if (o instanceof String s) { s.trim(); } o.hashCode(); } }";
      const local = await parseUnit(source);
      const variable = local.locals.find((l) => l.name === "s");
      if (!variable) throw new Error("no pattern variable");

      expect(variable.type?.name).toBe("String");
      expect(variable.scope.start.offset).toBe(source.indexOf("if ("));
      expect(variable.scope.end.offset).toBe(source.indexOf(" o.hashCode"));
    });
  });

  describe("errors", () => {
    it("returns a tree with issues for recoverable syntax errors", async () => {
      const result = await parser.parse("class A { void f() { int x = ; } }", "A.java");
      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.unit.types.map((t) => t.name)).toEqual(["A"]);
      expect(result.value.issues.length).toBeGreaterThan(0);
    });

    it("rejects input with nothing recoverable", async () => {
      const result = await parser.parse("@@@ ### !!!", "Noise.java");
      expect(result.ok).toBe(false);
    });

    it("rejects unsupported files", async () => {
      const result = await parser.parse("text", "README.md");
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.message).toBe("Unsupported file type: README.md");
    });

    it("parses an empty file", async () => {
      const result = await parser.parse("", "Empty.java");
      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.unit.types).toEqual([]);
      expect(result.value.unit.packageName).toBeNull();
    });
  });

  it("supports .java files only", () => {
    expect(parser.supportsFile("a/B.java")).toBe(true);
    expect(parser.supportsFile("a/B.kt")).toBe(false);
    expect(parser.languages().map((l) => l.id)).toEqual(["java"]);
  });
});
