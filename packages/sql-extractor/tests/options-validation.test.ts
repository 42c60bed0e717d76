import { describe, expect, it } from "vitest";
import { z } from "zod";

import {
  ConfigurationError,
  createSqlExtractor,
  drizzleProbe,
  type SqlExtractorOptions,
} from "../src";
import { validateOptions } from "../src/errors/validation";

describe("validateOptions", () => {
  const schema = z.strictObject({
    limit: z.number().int().positive().default(10),
    label: z.string().optional(),
  });

  it("returns parsed output with defaults applied", () => {
    expect(validateOptions(schema, {}, { subject: "test options" })).toEqual({
      limit: 10,
    });
  });

  it("throws ConfigurationError listing every invalid path", () => {
    try {
      validateOptions(
        schema,
        { limit: -1, label: 3 },
        { subject: "test options" },
      );
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.message).toBe("Invalid test options: limit, label");
        expect(error.details.subject).toBe("test options");
        expect(error.cause).toBeInstanceOf(z.ZodError);
      }
    }
  });
});

describe("createSqlExtractor options", () => {
  it("accepts an empty options object", () => {
    expect(() => createSqlExtractor({})).not.toThrow();
  });

  it("rejects an empty probe list", () => {
    expect(() => createSqlExtractor({ probes: [] })).toThrow(
      "Invalid extractor options: probes",
    );
  });

  it("rejects a probe missing steps", () => {
    const { statementSql: _statementSql, ...incomplete } = drizzleProbe;
    const options: unknown = { probes: [incomplete] };

    expect(() => createSqlExtractor(toOptions(options))).toThrow(
      "Invalid extractor options: probes.0",
    );
  });

  it("rejects hooks that are not functions", () => {
    const options: unknown = { hooks: { onFallback: "log" } };

    expect(() => createSqlExtractor(toOptions(options))).toThrow(
      ConfigurationError,
    );
  });

  it("rejects a non-boolean warnOnFallback", () => {
    const options: unknown = { warnOnFallback: "yes" };

    expect(() => createSqlExtractor(toOptions(options))).toThrow(
      "Invalid extractor options: warnOnFallback",
    );
  });
});

/**
 * Passes untyped input through, as options read from JSON or a plain
 * JavaScript caller would arrive.
 */
function toOptions(value: unknown): SqlExtractorOptions {
  return Object.assign({}, value);
}
