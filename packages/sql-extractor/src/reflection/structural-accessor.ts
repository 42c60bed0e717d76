/**
 * StructuralAccessor - reads members of objects whose type is not known at
 * compile time.
 *
 * Every read returns a `Probe`: a successful value, or the
 * StructuralMismatchError describing what was missing. Nothing here throws;
 * exceptions raised by getters, proxies or invoked methods are captured as
 * the mismatch's cause.
 */
import { describeValue, StructuralMismatchError } from "../errors";
import { attempt, err, flatMap, ok, type Result } from "../utils/result";

// ============================================================
// Types
// ============================================================

export type Probe<T> = Result<T, StructuralMismatchError>;

export type StructuralAccessor = Readonly<{
  /** The object being inspected */
  target: object;
  /** Reads a member that exists on the target or its prototype chain. */
  tryGetField: (name: string) => Probe<unknown>;
  /** Invokes a method with `this` bound to the target. */
  tryInvoke: (name: string, args?: readonly unknown[]) => Probe<unknown>;
  /**
   * Reads `name`, calling it when it is a method. When the target has no such
   * member, calls the `getName()` accessor instead.
   */
  tryRead: (name: string) => Probe<unknown>;
  /** `tryRead` along a chain of members. */
  tryReadPath: (names: readonly string[]) => Probe<unknown>;
  /** Invokes a static method on the target's constructor. */
  tryInvokeStatic: (name: string, args?: readonly unknown[]) => Probe<unknown>;
}>;

// ============================================================
// Mismatch Helpers
// ============================================================

export function mismatch(
  member: string,
  expected: string,
  actual: string,
  cause?: unknown,
): Probe<never> {
  return err(
    new StructuralMismatchError(
      { member, expected, actual },
      cause === undefined ? undefined : { cause },
    ),
  );
}

function isReflectable(value: unknown): value is object {
  return (
    (typeof value === "object" && value !== null) ||
    typeof value === "function"
  );
}

function accessorName(name: string): string {
  return `get${name.charAt(0).toUpperCase()}${name.slice(1)}`;
}

function threw(member: string, expected: string) {
  return (cause: unknown) =>
    new StructuralMismatchError(
      { member, expected, actual: "an exception" },
      { cause },
    );
}

// ============================================================
// Value Expectations
// ============================================================

export function expectString(value: unknown, member: string): Probe<string> {
  if (typeof value === "string") return ok(value);
  return mismatch(member, "a string", describeValue(value));
}

export function expectObject(value: unknown, member: string): Probe<object> {
  if (typeof value === "object" && value !== null) return ok(value);
  return mismatch(member, "an object", describeValue(value));
}

function isIterable(value: unknown): value is Iterable<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    Symbol.iterator in value &&
    typeof value[Symbol.iterator] === "function"
  );
}

/**
 * Accepts arrays and any other iterable (sets, map values, generators),
 * copying the elements into a new array.
 */
export function expectIterable(
  value: unknown,
  member: string,
): Probe<readonly unknown[]> {
  const copied = attempt(
    (): readonly unknown[] | undefined =>
      isIterable(value) ? Array.from(value) : undefined,
    threw(member, "an iterable"),
  );
  return flatMap(copied, (values): Probe<readonly unknown[]> =>
    values === undefined ?
      mismatch(member, "an iterable", describeValue(value))
    : ok(values),
  );
}

// ============================================================
// Accessor
// ============================================================

function createAccessor(target: object, label: string): StructuralAccessor {
  const qualify = (name: string) => `${label}.${name}`;

  const tryGetField = (name: string): Probe<unknown> => {
    const member = qualify(name);
    return flatMap(
      attempt(() => name in target, threw(member, "a readable member")),
      (present): Probe<unknown> => {
        if (!present) {
          return mismatch(member, "a member", "nothing");
        }
        return attempt(
          (): unknown => Reflect.get(target, name),
          threw(member, "a readable member"),
        );
      },
    );
  };

  const invokeOn = (
    receiver: object,
    method: unknown,
    member: string,
    args: readonly unknown[],
  ): Probe<unknown> => {
    if (typeof method !== "function") {
      return mismatch(member, "a method", describeValue(method));
    }
    return attempt(
      (): unknown => Reflect.apply(method, receiver, args),
      threw(member, "a method that returns"),
    );
  };

  const tryInvoke = (
    name: string,
    args: readonly unknown[] = [],
  ): Probe<unknown> =>
    flatMap(tryGetField(name), (method) =>
      invokeOn(target, method, qualify(name), args),
    );

  const tryRead = (name: string): Probe<unknown> => {
    const direct = tryGetField(name);
    if (direct.success) {
      return typeof direct.data === "function" ?
          invokeOn(target, direct.data, qualify(name), [])
        : direct;
    }
    const getter = accessorName(name);
    const viaGetter = tryInvoke(getter);
    if (viaGetter.success) return viaGetter;
    return mismatch(
      qualify(name),
      `a field or a ${getter}() accessor`,
      "neither",
    );
  };

  const tryReadPath = (names: readonly string[]): Probe<unknown> => {
    let current: Probe<unknown> = ok(target);
    let path = label;
    for (const name of names) {
      const segmentLabel = path;
      current = flatMap(current, (value) =>
        flatMap(reflectAs(value, segmentLabel), (accessor) =>
          accessor.tryRead(name),
        ),
      );
      path = `${path}.${name}`;
    }
    return current;
  };

  const tryInvokeStatic = (
    name: string,
    args: readonly unknown[] = [],
  ): Probe<unknown> => {
    const member = `${label}.constructor.${name}`;
    return flatMap(tryGetField("constructor"), (constructor): Probe<unknown> => {
      if (typeof constructor !== "function") {
        return mismatch(
          qualify("constructor"),
          "a class",
          describeValue(constructor),
        );
      }
      return flatMap(
        attempt(
          (): unknown => Reflect.get(constructor, name),
          threw(member, "a readable static member"),
        ),
        (method) => invokeOn(constructor, method, member, args),
      );
    });
  };

  return {
    target,
    tryGetField,
    tryInvoke,
    tryRead,
    tryReadPath,
    tryInvokeStatic,
  };
}

function reflectAs(value: unknown, label: string): Probe<StructuralAccessor> {
  if (!isReflectable(value)) {
    return mismatch(label, "an object", describeValue(value));
  }
  return ok(createAccessor(value, label));
}

/**
 * Wraps a value for structural access.
 *
 * @example
 * ```typescript
 * const sql = flatMap(reflect(statement, "statement"), (s) =>
 *   flatMap(s.tryRead("sqlString"), (v) => expectString(v, "sqlString")),
 * );
 * ```
 */
export function reflect(
  value: unknown,
  label = "target",
): Probe<StructuralAccessor> {
  return reflectAs(value, label);
}
