/**
 * MCP tool registration for the graph package.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { GraphSession } from "../GraphSession.js";

import { registerInitialize } from "./initialize.js";
import { registerGetStats } from "./getStats.js";
import { registerFindEntities } from "./findEntities.js";
import { registerGetEntity } from "./getEntity.js";
import { registerGetRelations } from "./getRelations.js";
import { registerGetCallers } from "./getCallers.js";
import { registerGetCallees } from "./getCallees.js";

export interface Services {
  session: GraphSession;
}

export function registerAllTools(server: McpServer, services: Services): void {
  const { session } = services;

  registerInitialize(server, session);
  registerGetStats(server, session);
  registerFindEntities(server, session);
  registerGetEntity(server, session);
  registerGetRelations(server, session);
  registerGetCallers(server, session);
  registerGetCallees(server, session);
}

export { formatStats } from "./getStats.js";
export { formatEntities } from "./findEntities.js";
export { describeEntity } from "./getEntity.js";
export { formatRelations } from "./getRelations.js";
export { formatCallers } from "./getCallers.js";
export { formatCallees } from "./getCallees.js";
