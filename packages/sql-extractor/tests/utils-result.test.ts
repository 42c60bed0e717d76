/**
 * Unit tests for Result type utilities.
 */
import { describe, expect, it } from "vitest";

import { attempt, err, flatMap, ok, type Result } from "../src/utils/result";

function parsePosition(text: string): Result<number, string> {
  const position = Number(text);
  if (!Number.isInteger(position) || position < 1) {
    return err(`not a position: ${text}`);
  }
  return ok(position);
}

describe("result utilities", () => {
  describe("ok and err", () => {
    it("creates a successful result", () => {
      expect(ok("select 1")).toEqual({ success: true, data: "select 1" });
    });

    it("treats undefined as valid data", () => {
      expect(ok()).toEqual({ success: true, data: undefined });
    });

    it("creates a failed result", () => {
      const error = new Error("missing member");
      expect(err(error)).toEqual({ success: false, error });
    });
  });

  describe("flatMap", () => {
    it("chains successful operations", () => {
      const result = flatMap(ok("5"), parsePosition);
      expect(result).toEqual({ success: true, data: 5 });
    });

    it("short-circuits on initial error", () => {
      let called = false;
      flatMap(err<string>("missing"), (text: string) => {
        called = true;
        return parsePosition(text);
      });
      expect(called).toBe(false);
    });

    it("propagates error from chained operation", () => {
      expect(flatMap(ok("one"), parsePosition)).toEqual({
        success: false,
        error: "not a position: one",
      });
    });
  });

  describe("attempt", () => {
    it("wraps the return value", () => {
      expect(attempt(() => "select 1".split(" "), String)).toEqual({
        success: true,
        data: ["select", "1"],
      });
    });

    it("turns a thrown value into an error", () => {
      const result = attempt(
        () => {
          throw new Error("detached session");
        },
        (thrown) => (thrown instanceof Error ? thrown.message : "unknown"),
      );
      expect(result).toEqual({ success: false, error: "detached session" });
    });
  });
});
