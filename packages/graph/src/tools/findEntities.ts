/**
 * graph_find_entities - Search entities by name or id.
 */

import * as z from "zod/v4";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { errorResponse, resultToResponse, tryCatch } from "@structgraph/core";
import type { GraphSession } from "../GraphSession.js";
import { ENTITY_KINDS, type Entity } from "../model.js";
import { entityLine } from "./format.js";

const InputSchema = {
  pattern: z.string().optional().describe("Regex matched against entity names and ids"),
  kinds: z.array(z.enum(ENTITY_KINDS)).optional().describe("Only these entity kinds"),
  limit: z.number().int().min(1).max(500).optional().describe("Maximum results (default 50)"),
};

export function formatEntities(entities: Entity[]): string {
  if (entities.length === 0) {
    return "No entities found matching criteria";
  }

  const lines = [`## Found ${entities.length} entit${entities.length === 1 ? "y" : "ies"}`, ""];

  const byKind = new Map<string, Entity[]>();
  for (const entity of entities) {
    const group = byKind.get(entity.kind);
    if (group) {
      group.push(entity);
    } else {
      byKind.set(entity.kind, [entity]);
    }
  }

  for (const [kind, group] of byKind) {
    lines.push(`### ${kind} (${group.length})`, "");
    lines.push(...group.map(entityLine));
    lines.push("");
  }

  return lines.join("\n").trimEnd();
}

export function registerFindEntities(server: McpServer, session: GraphSession): void {
  server.registerTool(
    "graph_find_entities",
    {
      title: "Find entities",
      description:
        "Search files, packages, types, methods and constructors by a name or id pattern, optionally by kind.",
      inputSchema: InputSchema,
    },
    async ({ pattern, kinds, limit }) => {
      const regex = tryCatch(() => (pattern ? new RegExp(pattern, "i") : /.*/));
      if (!regex.ok) {
        return errorResponse(`Invalid pattern: ${regex.error.message}`);
      }

      return resultToResponse(session.store(), (store) =>
        formatEntities(store.findEntities(regex.value, kinds, limit ?? 50))
      );
    }
  );
}
