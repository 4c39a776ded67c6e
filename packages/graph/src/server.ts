#!/usr/bin/env node
/**
 * MCP server for the Java dependency graph.
 */

import { runServer } from "@structgraph/core";
import { GraphSession } from "./GraphSession.js";
import { registerAllTools, type Services } from "./tools/index.js";

runServer<Services>({
  config: {
    name: "structgraph:graph",
    version: "0.1.0",
  },
  createServices: () => ({
    session: new GraphSession(),
  }),
  registerTools: registerAllTools,
  onStartup: async ({ session }) => {
    const rootPath = process.cwd();
    console.error(`[graph] Auto-initializing graph for workspace: ${rootPath}`);

    const result = await session.initialize(rootPath);
    if (!result.ok) {
      console.error(`[graph] Warning: Could not initialize graph: ${result.error.message}`);
      console.error(`[graph] Graph will not be available until manually initialized.`);
      return;
    }

    const { store, report } = result.value;
    const stats = store.stats();
    console.error(
      `[graph] Initialized: ${stats.totalEntities} entities, ${stats.totalRelations} relations from ${report.filesIndexed} files`
    );
  },
});
