import { describe, it, expect } from "vitest";
import {
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
  type Result,
} from "../src/result.js";

describe("Result", () => {
  describe("constructors", () => {
    it("Ok carries the value", () => {
      const result = Ok(42);
      expect(result.ok).toBe(true);
      expect(result.value).toBe(42);
    });

    it("Err carries the error", () => {
      const error = new Error("boom");
      const result = Err(error);
      expect(result.ok).toBe(false);
      expect(result.error).toBe(error);
    });
  });

  describe("type guards", () => {
    it("isOk narrows to the value", () => {
      const result: Result<number, string> = Ok(7);
      expect(isOk(result)).toBe(true);
      if (isOk(result)) {
        expect(result.value).toBe(7);
      }
    });

    it("isErr narrows to the error", () => {
      const result: Result<number, string> = Err("missing");
      expect(isErr(result)).toBe(true);
      if (isErr(result)) {
        expect(result.error).toBe("missing");
      }
    });
  });

  describe("map / mapErr", () => {
    const failed: Result<number, string> = Err("e");
    const passed: Result<number, string> = Ok(1);

    it("map transforms Ok and passes Err through", () => {
      expect(map(Ok(5), (x) => x * 2)).toEqual(Ok(10));
      expect(map(failed, (x) => x * 2)).toEqual(Err("e"));
    });

    it("mapErr transforms Err and passes Ok through", () => {
      expect(mapErr(Err("e"), (e) => e.toUpperCase())).toEqual(Err("E"));
      expect(mapErr(passed, (e) => e.length)).toEqual(Ok(1));
    });
  });

  describe("unwrapOr", () => {
    it("returns the value or the default", () => {
      expect(unwrapOr(Ok(3), 0)).toBe(3);
      const failed: Result<number, string> = Err("e");
      expect(unwrapOr(failed, 0)).toBe(0);
    });
  });

  describe("tryCatch", () => {
    it("wraps a returned value in Ok", () => {
      expect(tryCatch(() => "fine")).toEqual(Ok("fine"));
    });

    it("wraps a thrown non-Error in an Error", () => {
      const result = tryCatch(() => {
        throw "plain string";
      });
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(Error);
        expect(result.error.message).toBe("plain string");
      }
    });
  });

  describe("tryCatchAsync", () => {
    it("wraps a resolved value in Ok", async () => {
      expect(await tryCatchAsync(async () => 1)).toEqual(Ok(1));
    });

    it("keeps a rejected Error as is", async () => {
      const error = new Error("async boom");
      const result = await tryCatchAsync(async () => {
        throw error;
      });
      expect(result).toEqual({ ok: false, error });
    });
  });

  describe("toError", () => {
    it("returns Errors unchanged and wraps everything else", () => {
      const error = new TypeError("t");
      expect(toError(error)).toBe(error);
      expect(toError(404).message).toBe("404");
    });
  });
});
