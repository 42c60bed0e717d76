import { describe, expect, it } from "vitest";

import { StructuralMismatchError } from "../src/errors";
import {
  expectIterable,
  expectObject,
  expectString,
  type Probe,
  reflect,
  type StructuralAccessor,
} from "../src/reflection/structural-accessor";

function accessor(value: unknown, label?: string): StructuralAccessor {
  const reflected = reflect(value, label);
  if (!reflected.success) {
    throw reflected.error;
  }
  return reflected.data;
}

function mismatchOf(probe: Probe<unknown>): StructuralMismatchError {
  if (probe.success) {
    throw new Error(`Expected a mismatch, got ${String(probe.data)}`);
  }
  return probe.error;
}

class Statement {
  readonly #sql = "select 1";
  readonly kind = "select";

  getSqlString(): string {
    return this.#sql;
  }

  describe(prefix: string): string {
    return `${prefix}${this.kind}`;
  }

  static parse(_text: string): Statement {
    return new Statement();
  }
}

describe("reflect", () => {
  it("rejects primitives and null", () => {
    expect(mismatchOf(reflect(null, "query")).details).toEqual({
      member: "query",
      expected: "an object",
      actual: "null",
    });
    expect(mismatchOf(reflect("text")).details.member).toBe("target");
  });

  it("accepts functions", () => {
    expect(reflect(Statement).success).toBe(true);
  });
});

describe("tryGetField", () => {
  it("reads own and inherited members", () => {
    const statement = accessor(new Statement());

    expect(statement.tryGetField("kind")).toEqual({
      success: true,
      data: "select",
    });
    expect(typeof unwrapData(statement.tryGetField("getSqlString"))).toBe(
      "function",
    );
  });

  it("succeeds with undefined for a present member holding undefined", () => {
    const target = accessor({ value: undefined });

    expect(target.tryGetField("value")).toEqual({
      success: true,
      data: undefined,
    });
  });

  it("does not see #private members", () => {
    const statement = accessor(new Statement(), "statement");

    expect(mismatchOf(statement.tryGetField("#sql")).details).toEqual({
      member: "statement.#sql",
      expected: "a member",
      actual: "nothing",
    });
  });

  it("captures exceptions thrown by getters", () => {
    const failure = new Error("detached");
    const target = accessor(
      Object.defineProperty({}, "session", {
        get: () => {
          throw failure;
        },
      }),
      "query",
    );

    const error = mismatchOf(target.tryGetField("session"));

    expect(error.details).toEqual({
      member: "query.session",
      expected: "a readable member",
      actual: "an exception",
    });
    expect(error.cause).toBe(failure);
  });

  it("captures exceptions thrown by proxy traps", () => {
    const target = accessor(
      new Proxy(
        {},
        {
          has: () => {
            throw new Error("revoked");
          },
        },
      ),
    );

    expect(mismatchOf(target.tryGetField("anything")).details.actual).toBe(
      "an exception",
    );
  });
});

describe("tryInvoke", () => {
  it("binds this to the target and passes arguments", () => {
    const statement = accessor(new Statement());

    expect(unwrapData(statement.tryInvoke("describe", ["kind: "]))).toBe(
      "kind: select",
    );
  });

  it("rejects members that are not methods", () => {
    const statement = accessor(new Statement(), "statement");

    expect(mismatchOf(statement.tryInvoke("kind")).details).toEqual({
      member: "statement.kind",
      expected: "a method",
      actual: "string",
    });
  });

  it("captures exceptions thrown by the method", () => {
    const target = accessor(
      {
        execute: () => {
          throw new Error("closed");
        },
      },
      "query",
    );

    expect(mismatchOf(target.tryInvoke("execute")).details).toEqual({
      member: "query.execute",
      expected: "a method that returns",
      actual: "an exception",
    });
  });
});

describe("tryRead", () => {
  it("prefers a field", () => {
    expect(unwrapData(accessor({ sqlString: "a" }).tryRead("sqlString"))).toBe(
      "a",
    );
  });

  it("calls the member when it is a method", () => {
    expect(
      unwrapData(accessor({ sqlString: () => "b" }).tryRead("sqlString")),
    ).toBe("b");
  });

  it("falls back to the getX() accessor", () => {
    expect(unwrapData(accessor(new Statement()).tryRead("sqlString"))).toBe(
      "select 1",
    );
  });

  it("reports a mismatch when neither exists", () => {
    expect(mismatchOf(accessor({}, "plan").tryRead("statement")).details).toEqual(
      {
        member: "plan.statement",
        expected: "a field or a getStatement() accessor",
        actual: "neither",
      },
    );
  });
});

describe("tryReadPath", () => {
  it("follows a chain of fields and accessors", () => {
    const engine = { name: "engine" };
    const handle = {
      getSession: () => ({ factory: { queryEngine: engine } }),
    };

    expect(
      unwrapData(
        accessor(handle).tryReadPath(["session", "factory", "queryEngine"]),
      ),
    ).toBe(engine);
  });

  it("names the segment that is not an object", () => {
    const handle = { session: { factory: null } };

    expect(
      mismatchOf(
        accessor(handle, "query").tryReadPath([
          "session",
          "factory",
          "queryEngine",
        ]),
      ).details,
    ).toEqual({
      member: "query.session.factory",
      expected: "an object",
      actual: "null",
    });
  });
});

describe("tryInvokeStatic", () => {
  it("invokes a static method on the target's class", () => {
    const result = unwrapData(
      accessor(new Statement()).tryInvokeStatic("parse", ["select 1"]),
    );

    expect(result).toBeInstanceOf(Statement);
  });

  it("reports a missing static method", () => {
    expect(
      mismatchOf(
        accessor(new Statement(), "plan").tryInvokeStatic("build"),
      ).details,
    ).toEqual({
      member: "plan.constructor.build",
      expected: "a method",
      actual: "undefined",
    });
  });
});

describe("expectations", () => {
  it("expectString", () => {
    expect(expectString("x", "sql")).toEqual({ success: true, data: "x" });
    expect(mismatchOf(expectString(1, "sql")).details).toEqual({
      member: "sql",
      expected: "a string",
      actual: "number",
    });
  });

  it("expectObject", () => {
    expect(expectObject([], "plan").success).toBe(true);
    expect(mismatchOf(expectObject(undefined, "plan")).details.actual).toBe(
      "undefined",
    );
  });

  it("expectIterable copies sets and arrays", () => {
    const values = new Set([1, 2]);

    expect(unwrapData(expectIterable(values, "params"))).toEqual([1, 2]);
    expect(mismatchOf(expectIterable("ab", "params")).details).toEqual({
      member: "params",
      expected: "an iterable",
      actual: "string",
    });
  });

  it("expectIterable reports a revoked proxy as a mismatch", () => {
    const { proxy, revoke } = Proxy.revocable([1], {});
    revoke();

    expect(mismatchOf(expectIterable(proxy, "params")).details).toEqual({
      member: "params",
      expected: "an iterable",
      actual: "an exception",
    });
  });
});

function unwrapData<T>(probe: Probe<T>): T {
  if (!probe.success) {
    throw probe.error;
  }
  return probe.data;
}
