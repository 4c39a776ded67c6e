/**
 * graph_stats - Entity and relation counts per kind.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { markdown, resultToResponse } from "@structgraph/core";
import type { GraphSession } from "../GraphSession.js";
import { ENTITY_KINDS, RELATION_KINDS, type GraphStats } from "../model.js";

export function formatStats(stats: GraphStats): string {
  return markdown([
    "## Graph Statistics",
    "",
    `**Entities:** ${stats.totalEntities}`,
    ...ENTITY_KINDS.map((kind) => `- ${kind}: ${stats.entities[kind]}`),
    "",
    `**Relations:** ${stats.totalRelations}`,
    ...RELATION_KINDS.map((kind) => `- ${kind}: ${stats.relations[kind]}`),
  ]);
}

export function registerGetStats(server: McpServer, session: GraphSession): void {
  server.registerTool(
    "graph_stats",
    {
      title: "Graph stats",
      description: "Count entities and relations of the indexed graph, per kind.",
      inputSchema: {},
    },
    async () => resultToResponse(session.store(), (store) => formatStats(store.stats()))
  );
}
