/**
 * graph_relations - Edges into and out of an entity.
 */

import * as z from "zod/v4";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { errorResponse, resultToResponse } from "@structgraph/core";
import type { GraphSession } from "../GraphSession.js";
import type { GraphStore } from "../GraphStore.js";
import { RELATION_KINDS, type RelationKind } from "../model.js";
import { relationLine } from "./format.js";

const InputSchema = {
  id: z.string().describe("Entity id"),
  direction: z
    .enum(["outgoing", "incoming", "both"])
    .optional()
    .describe("Which edges to list (default both)"),
  kind: z.enum(RELATION_KINDS).optional().describe("Only this relation kind"),
};

export function formatRelations(
  store: GraphStore,
  id: string,
  direction: "outgoing" | "incoming" | "both",
  kind?: RelationKind
): string {
  const lines = [`## Relations of ${id}`];

  if (direction !== "incoming") {
    const outgoing = store.outgoing(id, kind);
    lines.push("", `### Outgoing (${outgoing.length})`);
    lines.push(...outgoing.map((r) => relationLine(r, "outgoing")));
  }
  if (direction !== "outgoing") {
    const incoming = store.incoming(id, kind);
    lines.push("", `### Incoming (${incoming.length})`);
    lines.push(...incoming.map((r) => relationLine(r, "incoming")));
  }

  return lines.join("\n");
}

export function registerGetRelations(server: McpServer, session: GraphSession): void {
  server.registerTool(
    "graph_relations",
    {
      title: "Get relations",
      description:
        "List CONTAINS, INHERITS, INVOKES and IMPORTS edges of an entity, with the file and line of each site.",
      inputSchema: InputSchema,
    },
    async ({ id, direction, kind }) => {
      const store = session.store();
      if (store.ok && !store.value.hasEntity(id)) {
        return errorResponse(`Entity not found: ${id}`);
      }
      return resultToResponse(store, (s) => formatRelations(s, id, direction ?? "both", kind));
    }
  );
}
