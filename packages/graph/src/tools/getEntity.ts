/**
 * graph_get_entity - One entity with its container and children.
 */

import * as z from "zod/v4";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { errorResponse, markdown, textResponse } from "@structgraph/core";
import type { GraphSession } from "../GraphSession.js";
import type { GraphStore } from "../GraphStore.js";
import { entityLine, location } from "./format.js";

const InputSchema = {
  id: z.string().describe("Entity id, e.g. com.example.Foo or com.example.Foo.bar(int)"),
};

export function describeEntity(store: GraphStore, id: string): string | null {
  const entity = store.getEntity(id);
  if (!entity) return null;

  const children = store.children(id);
  return markdown([
    `## ${entity.id}`,
    "",
    `**Kind:** ${entity.kind}`,
    `**Name:** ${entity.name}`,
    location(entity) ? `**Declared at:** ${location(entity)}` : null,
    entity.modifiers.length > 0 ? `**Modifiers:** ${entity.modifiers.join(" ")}` : null,
    entity.parameterTypes ? `**Parameters:** (${entity.parameterTypes.join(", ")})` : null,
    entity.returnType ? `**Returns:** ${entity.returnType}` : null,
    entity.containerId ? `**Container:** ${entity.containerId}` : null,
    children.length > 0 ? "" : null,
    children.length > 0 ? `### Contains (${children.length})` : null,
    ...children.map(entityLine),
  ]);
}

export function registerGetEntity(server: McpServer, session: GraphSession): void {
  server.registerTool(
    "graph_get_entity",
    {
      title: "Get entity",
      description: "Show one entity by id: kind, declaration site, modifiers, container and children.",
      inputSchema: InputSchema,
    },
    async ({ id }) => {
      const store = session.store();
      if (!store.ok) return errorResponse(store.error);

      const text = describeEntity(store.value, id);
      return text === null ? errorResponse(`Entity not found: ${id}`) : textResponse(text);
    }
  );
}
