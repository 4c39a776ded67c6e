import { describe, it, expect, vi, afterEach } from "vitest";
import { GraphError, isGraphError } from "../src/errors.js";
import { consoleLogger } from "../src/logging.js";

describe("GraphError", () => {
  it("carries code, path and cause", () => {
    const cause = new Error("ENOENT");
    const error = new GraphError("READ_FAILURE", "Cannot read A.java", "src/A.java", cause);

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("GraphError");
    expect(error.code).toBe("READ_FAILURE");
    expect(error.path).toBe("src/A.java");
    expect(error.cause).toBe(cause);
    expect(isGraphError(error)).toBe(true);
    expect(isGraphError(cause)).toBe(false);
  });

  it("only per-file failures are recoverable", () => {
    expect(new GraphError("PARSE_FAILURE", "x").recoverable).toBe(true);
    expect(new GraphError("READ_FAILURE", "x").recoverable).toBe(true);
    expect(new GraphError("SOURCE_ROOT_NOT_FOUND", "x").recoverable).toBe(false);
    expect(new GraphError("INVALID_CONFIG", "x").recoverable).toBe(false);
  });

  it("defaults path to null", () => {
    expect(new GraphError("INVALID_CONFIG", "bad").path).toBeNull();
  });
});

describe("consoleLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("writes prefixed lines to stderr at or above the minimum level", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => {});
    const log = consoleLogger("graph", "info");

    log("debug", "hidden");
    log("info", "indexed 3 files");
    log("warn", "skipped B.java");

    expect(spy).toHaveBeenCalledTimes(2);
    expect(spy).toHaveBeenNthCalledWith(1, "[graph] indexed 3 files");
    expect(spy).toHaveBeenNthCalledWith(2, "[graph] warn: skipped B.java");
  });
});
