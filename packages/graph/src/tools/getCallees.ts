/**
 * graph_callees - What an executable invokes.
 */

import * as z from "zod/v4";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { errorResponse, textResponse } from "@structgraph/core";
import type { GraphSession } from "../GraphSession.js";
import type { GraphStore } from "../GraphStore.js";
import { relationLine } from "./format.js";

const InputSchema = {
  id: z.string().describe("Method, constructor or initializer id"),
};

export function formatCallees(store: GraphStore, id: string): string {
  const sites = store.outgoing(id, "INVOKES");
  if (sites.length === 0) {
    return `No resolved calls from: ${id}`;
  }

  return [
    `## Callees of ${id}`,
    "",
    `Found ${store.callees(id).length} callee(s) at ${sites.length} call site(s):`,
    "",
    ...sites.map((r) => relationLine(r, "outgoing")),
  ].join("\n");
}

export function registerGetCallees(server: McpServer, session: GraphSession): void {
  server.registerTool(
    "graph_callees",
    {
      title: "Get callees",
      description:
        "Find the methods and constructors an executable calls. Calls on receivers of external types are not resolved.",
      inputSchema: InputSchema,
    },
    async ({ id }) => {
      const store = session.store();
      if (!store.ok) return errorResponse(store.error);
      if (!store.value.hasEntity(id)) return errorResponse(`Entity not found: ${id}`);
      return textResponse(formatCallees(store.value, id));
    }
  );
}
