/**
 * graph_initialize - Build the dependency graph of a source tree.
 */

import * as z from "zod/v4";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { markdown, resultToResponse } from "@structgraph/core";
import type { GraphSession } from "../GraphSession.js";

const InputSchema = {
  workspace_path: z.string().describe("Root directory of the sources to index"),
  concurrency: z
    .number()
    .int()
    .min(1)
    .max(64)
    .optional()
    .describe("Files parsed at once (default 8, or the config file's value)"),
};

export function registerInitialize(server: McpServer, session: GraphSession): void {
  server.registerTool(
    "graph_initialize",
    {
      title: "Initialize graph",
      description:
        "Index a Java source tree into the dependency graph. Call this first before any queries.",
      inputSchema: InputSchema,
    },
    async ({ workspace_path, concurrency }) => {
      const result = await session.initialize(
        workspace_path,
        concurrency === undefined ? {} : { concurrency }
      );

      return resultToResponse(result, ({ store, report }) => {
        const stats = store.stats();
        return markdown([
          "## Graph Initialized",
          "",
          `**Workspace:** ${workspace_path}`,
          `**Files:** ${report.filesIndexed}`,
          `**Entities:** ${stats.totalEntities}`,
          `**Relations:** ${stats.totalRelations}`,
          report.failures.length > 0 ? `**Skipped files:** ${report.failures.length}` : null,
          report.warnings.length > 0 ? `**Warnings:** ${report.warnings.length}` : null,
          "",
          ...report.failures.slice(0, 20).map((f) => `- ${f.message}`),
          report.failures.length > 0 ? "" : null,
          "Graph is ready for queries.",
        ]);
      });
    }
  );
}
