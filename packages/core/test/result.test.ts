import { describe, it, expect } from "vitest";
import {
  Ok,
  Err,
  map,
  mapErr,
  andThen,
  unwrapOr,
  tryCatch,
  tryCatchAsync,
  type Result,
} from "../src/result.js";

function parsePort(raw: string): Result<number, string> {
  const port = Number(raw);
  return Number.isInteger(port) && port > 0 ? Ok(port) : Err(`invalid port: ${raw}`);
}

describe("Result", () => {
  describe("Ok / Err", () => {
    it("creates a success result", () => {
      const result = Ok(42);
      expect(result).toEqual({ ok: true, value: 42 });
    });

    it("creates an error result", () => {
      const result = Err("boom");
      expect(result).toEqual({ ok: false, error: "boom" });
    });
  });

  describe("map", () => {
    it("transforms the value", () => {
      expect(map(parsePort("80"), (p) => p + 1)).toEqual({ ok: true, value: 81 });
    });

    it("passes errors through", () => {
      expect(map(parsePort("x"), (p) => p + 1)).toEqual({ ok: false, error: "invalid port: x" });
    });
  });

  describe("mapErr", () => {
    it("transforms the error", () => {
      const result = mapErr(parsePort("x"), (e) => ({ kind: "config", message: e }));
      expect(result).toEqual({ ok: false, error: { kind: "config", message: "invalid port: x" } });
    });

    it("passes values through", () => {
      expect(mapErr(parsePort("443"), (e) => e.length)).toEqual({ ok: true, value: 443 });
    });
  });

  describe("andThen", () => {
    it("chains successful steps", () => {
      const result = andThen(Ok("8080"), parsePort);
      expect(result).toEqual({ ok: true, value: 8080 });
    });

    it("stops at the first error", () => {
      const missing: Result<string, string> = Err("missing");
      const result = andThen(missing, parsePort);
      expect(result).toEqual({ ok: false, error: "missing" });
    });
  });

  describe("unwrapOr", () => {
    it("returns the value or the fallback", () => {
      expect(unwrapOr(parsePort("22"), 0)).toBe(22);
      expect(unwrapOr(parsePort("-1"), 0)).toBe(0);
    });
  });

  describe("tryCatch", () => {
    it("wraps a returned value", () => {
      expect(tryCatch(() => "fine")).toEqual({ ok: true, value: "fine" });
    });

    it("captures a thrown Error", () => {
      const result = tryCatch(() => {
        throw new Error("disk full");
      });
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe("disk full");
      }
    });

    it("wraps non-Error throws", () => {
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
    it("wraps a resolved value", async () => {
      await expect(tryCatchAsync(async () => 7)).resolves.toEqual({ ok: true, value: 7 });
    });

    it("captures a rejection", async () => {
      const result = await tryCatchAsync(async () => {
        throw new Error("timeout");
      });
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe("timeout");
      }
    });
  });
});
