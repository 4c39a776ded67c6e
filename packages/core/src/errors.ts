/**
 * Error taxonomy shared by the loader, parser and graph builder.
 *
 * Unresolved symbols and ambiguous overloads are not errors and have no code
 * here: they become placeholders, omitted edges or fan-out.
 */

export type GraphErrorCode =
  /** The analyzed root does not exist. Fatal for the run. */
  | "SOURCE_ROOT_NOT_FOUND"
  /** The analyzed root exists but is not a directory. Fatal for the run. */
  | "SOURCE_ROOT_NOT_DIRECTORY"
  /** One source file could not be read. The file is skipped. */
  | "READ_FAILURE"
  /** One source file could not be turned into a declaration tree. The file is skipped. */
  | "PARSE_FAILURE"
  /** Build options or the config file failed validation. Fatal for the run. */
  | "INVALID_CONFIG";

export class GraphError extends Error {
  readonly code: GraphErrorCode;
  /** File or directory the error is about, when there is one. */
  readonly path: string | null;

  constructor(code: GraphErrorCode, message: string, path: string | null = null, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "GraphError";
    this.code = code;
    this.path = path;
  }

  /** Whether the run can continue past this error. */
  get recoverable(): boolean {
    return this.code === "READ_FAILURE" || this.code === "PARSE_FAILURE";
  }
}

export function isGraphError(value: unknown): value is GraphError {
  return value instanceof GraphError;
}
