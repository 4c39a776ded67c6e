/**
 * MCP server bootstrap shared by the packages that expose tools.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { consoleLogger, type Logger } from "./logging.js";

export interface ServerConfig {
  name: string;
  version: string;
}

export interface ServerBootstrapOptions<S> {
  config: ServerConfig;

  /** Factory for the services the tools share */
  createServices: () => S | Promise<S>;

  registerTools: (server: McpServer, services: S) => void;

  /**
   * Runs before the transport connects. A rejection is logged and the server
   * still starts, so tools can report the missing state themselves.
   */
  onStartup?: (services: S) => Promise<void> | void;

  onShutdown?: (services: S) => Promise<void> | void;

  logger?: Logger;
}

/**
 * Create the server, register tools, wire signal handlers and connect over stdio.
 *
 * @example
 * ```typescript
 * bootstrapServer({
 *   config: { name: "structgraph:graph", version: "0.1.0" },
 *   createServices: () => ({ session: new GraphSession() }),
 *   registerTools: registerAllTools,
 * });
 * ```
 */
export async function bootstrapServer<S>(options: ServerBootstrapOptions<S>): Promise<void> {
  const { config, createServices, registerTools, onStartup, onShutdown } = options;
  const log = options.logger ?? consoleLogger(config.name, "info");

  const services = await createServices();

  const server = new McpServer({
    name: config.name,
    version: config.version,
  });
  registerTools(server, services);

  const transport = new StdioServerTransport();

  const shutdown = async (): Promise<void> => {
    await onShutdown?.(services);
    await server.close();
    process.exit(0);
  };
  const onSignal = (): void => {
    shutdown().catch((error: unknown) => {
      log("error", `Shutdown failed: ${error instanceof Error ? error.message : String(error)}`);
      process.exit(1);
    });
  };
  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);

  try {
    await onStartup?.(services);
  } catch (error) {
    log("warn", `Startup hook failed: ${error instanceof Error ? error.message : String(error)}`);
  }

  await server.connect(transport);
}

/**
 * Entry point for server scripts: bootstrap and exit non-zero on a fatal error.
 */
export function runServer<S>(options: ServerBootstrapOptions<S>): void {
  bootstrapServer(options).catch((error: unknown) => {
    console.error("Fatal error:", error);
    process.exit(1);
  });
}

export { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
