/**
 * graph_callers - Methods and initializers invoking an executable.
 */

import * as z from "zod/v4";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { errorResponse, textResponse } from "@structgraph/core";
import type { GraphSession } from "../GraphSession.js";
import type { GraphStore } from "../GraphStore.js";
import { relationLine } from "./format.js";

const InputSchema = {
  id: z.string().describe("Method or constructor id, e.g. com.example.Foo.bar(int)"),
};

export function formatCallers(store: GraphStore, id: string): string {
  const sites = store.incoming(id, "INVOKES");
  if (sites.length === 0) {
    return `No callers found for: ${id}`;
  }

  const callers = store.callers(id);
  return [
    `## Callers of ${id}`,
    "",
    `Found ${callers.length} caller(s) at ${sites.length} call site(s):`,
    "",
    ...sites.map((r) => relationLine(r, "incoming")),
  ].join("\n");
}

export function registerGetCallers(server: McpServer, session: GraphSession): void {
  server.registerTool(
    "graph_callers",
    {
      title: "Get callers",
      description: "Find every method, constructor or initializer with a call site resolved to the given one.",
      inputSchema: InputSchema,
    },
    async ({ id }) => {
      const store = session.store();
      if (!store.ok) return errorResponse(store.error);
      if (!store.value.hasEntity(id)) return errorResponse(`Entity not found: ${id}`);
      return textResponse(formatCallers(store.value, id));
    }
  );
}
