/**
 * The graph a server currently answers queries from.
 * A failed re-initialization keeps the previous graph.
 */

import { Err, Ok, type GraphError, type Result } from "@structgraph/core";

import type { BuildOptionsInput } from "./config.js";
import { GraphBuilder, type BuildOutput } from "./GraphBuilder.js";
import type { GraphStore } from "./GraphStore.js";
import type { BuildReport } from "./model.js";

export const NOT_INITIALIZED = "Graph not initialized. Call graph_initialize first.";

export class GraphSession {
  private current: (BuildOutput & { rootPath: string }) | null = null;

  constructor(private readonly builder: GraphBuilder = new GraphBuilder()) {}

  async initialize(
    rootPath: string,
    overrides: BuildOptionsInput = {}
  ): Promise<Result<BuildOutput, GraphError>> {
    const result = await this.builder.buildFromDirectory(rootPath, overrides);
    if (result.ok) {
      this.current = { ...result.value, rootPath };
    }
    return result;
  }

  isInitialized(): boolean {
    return this.current !== null;
  }

  get rootPath(): string | null {
    return this.current?.rootPath ?? null;
  }

  get report(): BuildReport | null {
    return this.current?.report ?? null;
  }

  /**
   * The current store, or the message tools answer with before initialization.
   */
  store(): Result<GraphStore, string> {
    return this.current ? Ok(this.current.store) : Err(NOT_INITIALIZED);
  }
}
