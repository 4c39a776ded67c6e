export type { Result } from "./result.js";
export {
  Ok,
  Err,
  isOk,
  isErr,
  map,
  mapErr,
  unwrapOr,
  tryCatch,
  tryCatchAsync,
  toError,
} from "./result.js";

export type { GraphErrorCode } from "./errors.js";
export { GraphError, isGraphError } from "./errors.js";

export type { Logger, LogLevel } from "./logging.js";
export { consoleLogger, silentLogger } from "./logging.js";

export type { TextContent, ToolResponse } from "./mcp.js";
export { textResponse, errorResponse, resultToResponse, markdown } from "./mcp.js";

export type { ServerConfig, ServerBootstrapOptions } from "./server.js";
export { bootstrapServer, runServer, McpServer } from "./server.js";
