import { describe, it, expect } from "vitest";
import { buildSources, edges } from "./support/build.js";

const UTIL = `package a;
public class Util {
    public static final int LIMIT = 3;
    public static int twice(int x) { return x * 2; }
    public static long twice(long x) { return x * 2; }
    public static class Inner {}
}
`;

const CLIENT = `package b;
import a.Util;
import a.*;
import static a.Util.twice;
import static a.Util.Inner;
import static a.Util.LIMIT;
import static a.Util.*;
import java.util.List;
import java.util.*;
import org.slf4j.Logger;
import static org.junit.Assert.assertTrue;
class Client {}
`;

describe("ImportResolver", () => {
  it("resolves every import form to one edge per target", async () => {
    const { store } = await buildSources({ "src/a/Util.java": UTIL, "src/b/Client.java": CLIENT });

    expect(store.outgoing("src/b/Client.java", "IMPORTS").map((r) => `${r.line} ${r.targetId}`)).toEqual([
      "2 a.Util",
      "3 a",
      "4 a.Util.twice(int)",
      "4 a.Util.twice(long)",
      "5 a.Util.Inner",
      "8 stdlib:java.util.List",
      "9 stdlib:java.util.*",
      "10 external:org.slf4j.Logger",
      "11 external:org.junit.Assert",
    ]);
  });

  it("files placeholders under their namespace and package", async () => {
    const { store } = await buildSources({ "src/a/Util.java": UTIL, "src/b/Client.java": CLIENT });

    expect(store.children("<stdlib>").map((e) => e.id)).toEqual(["stdlib/java.util"]);
    expect(store.children("stdlib/java.util").map((e) => e.id)).toEqual([
      "stdlib:java.util.List",
      "stdlib:java.util.*",
    ]);
    expect(store.getEntity("stdlib:java.util.*")?.name).toBe("java.util.*");
    expect(store.children("<external>").map((e) => e.id)).toEqual(["external/org.slf4j", "external/org.junit"]);
  });

  it("shares one wildcard placeholder between importing files", async () => {
    const { store } = await buildSources({
      "One.java": "import com.vendor.*;\nclass One {}",
      "Two.java": "import com.vendor.*;\nclass Two {}",
    });

    expect(edges(store, "IMPORTS")).toEqual([
      "One.java -> external:com.vendor.*",
      "Two.java -> external:com.vendor.*",
    ]);
    expect(store.entitiesByKind("EXTERNAL").map((e) => e.id)).toEqual(["external:com.vendor.*"]);
  });

  it.each([
    ["the type first", "java.util.Map", "java.util.Map.*"],
    ["the wildcard first", "java.util.Map.*", "java.util.Map"],
  ])("keeps a type placeholder apart from a wildcard over it, importing %s", async (_order, first, second) => {
    const { store } = await buildSources({
      "A.java": `import ${first};\nclass A {}`,
      "B.java": `import ${second};\nclass B {}`,
    });

    expect(store.getEntity("stdlib:java.util.Map")?.kind).toBe("EXTERNAL");
    expect(store.children("stdlib:java.util.Map")).toEqual([]);
    expect(store.getEntity("stdlib/java.util")?.kind).toBe("PACKAGE");
    expect(store.children("stdlib/java.util").map((e) => e.id)).toEqual(
      first === "java.util.Map"
        ? ["stdlib:java.util.Map", "stdlib:java.util.Map.*"]
        : ["stdlib:java.util.Map.*", "stdlib:java.util.Map"]
    );
    expect(edges(store, "IMPORTS")).toEqual([`A.java -> stdlib:${first}`, `B.java -> stdlib:${second}`]);
  });

  it("targets a project type for a wildcard over its members", async () => {
    const { store } = await buildSources({
      "src/a/Util.java": UTIL,
      "src/c/User.java": "package c;\nimport a.Util.*;\nclass User {}",
    });
    expect(edges(store, "IMPORTS")).toEqual(["src/c/User.java -> a.Util"]);
  });

  it("creates no import edges for a file without imports", async () => {
    const { store } = await buildSources({ "src/a/Util.java": UTIL });
    expect(store.relationsByKind("IMPORTS")).toEqual([]);
    expect(store.getEntity("<stdlib>")).toBeNull();
  });
});
