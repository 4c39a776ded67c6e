import { silentLogger } from "@structgraph/core";
import type { SourceFile } from "@structgraph/syntax";

import type { BuildOptionsInput } from "../../src/config.js";
import { GraphBuilder, type BuildOutput } from "../../src/GraphBuilder.js";
import type { GraphStore } from "../../src/GraphStore.js";
import type { RelationKind } from "../../src/model.js";

export function sources(files: Record<string, string>): SourceFile[] {
  return Object.entries(files).map(([path, text]) => ({ path, text }));
}

/**
 * Build a graph from inline sources, failing the test on a fatal error.
 */
export async function buildSources(
  files: Record<string, string>,
  options: BuildOptionsInput = {}
): Promise<BuildOutput> {
  const result = await new GraphBuilder({ logger: silentLogger }).build(sources(files), options);
  if (!result.ok) throw result.error;
  return result.value;
}

/** `source -> target` per edge of one kind, in insertion order */
export function edges(store: GraphStore, kind: RelationKind): string[] {
  return store.relationsByKind(kind).map((r) => `${r.sourceId} -> ${r.targetId}`);
}

export function ids(store: GraphStore): string[] {
  return store
    .allEntities()
    .map((e) => e.id)
    .sort();
}
