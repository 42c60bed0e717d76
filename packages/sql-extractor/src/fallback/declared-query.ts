/**
 * Declared-query fallback.
 *
 * Reads what a query object exposes publicly: the query text as authored and
 * its parameters. This is the last tier of every extraction and must not rely
 * on any engine internals.
 */
import { describeValue } from "../errors";
import {
  expectIterable,
  expectString,
  mismatch,
  type Probe,
  reflect,
  type StructuralAccessor,
} from "../reflection/structural-accessor";
import { flatMap, ok } from "../utils/result";

/**
 * Members holding the authored text, in order. The `getQueryString()`
 * accessor comes before a `queryString` field of the same name.
 */
const DECLARED_TEXT_MEMBERS = [
  "getQueryString",
  "queryString",
  "getQuery",
] as const;

/** Methods returning a public compiled form with a `sql` string. */
const COMPILED_FORM_METHODS = ["toSQL", "compile"] as const;

const DECLARED_TEXT_EXPECTATION = `one of ${[
  ...DECLARED_TEXT_MEMBERS,
  ...COMPILED_FORM_METHODS.map((method) => `${method}().sql`),
].join(", ")}`;

/** Members of a compiled form holding its parameter values. */
const COMPILED_PARAMETER_MEMBERS = ["params", "bindings", "parameters"] as const;

function firstSuccess<T>(
  attempts: readonly (() => Probe<T>)[],
  member: string,
  expected: string,
): Probe<T> {
  for (const run of attempts) {
    const result = run();
    if (result.success) return result;
  }
  return mismatch(member, expected, "none of them");
}

function compiledForms(
  handle: StructuralAccessor,
): (() => Probe<StructuralAccessor>)[] {
  return COMPILED_FORM_METHODS.map(
    (method) => () =>
      flatMap(handle.tryInvoke(method), (compiled) =>
        reflect(compiled, `query.${method}()`),
      ),
  );
}

/**
 * When the handle exposes `unwrap()` returning another object, that object is
 * the query to inspect. Proxies and decorating wrappers use this.
 */
export function unwrapHandle(handle: object): object {
  const unwrapped = flatMap(reflect(handle, "query"), (query) =>
    query.tryInvoke("unwrap"),
  );
  if (
    unwrapped.success &&
    typeof unwrapped.data === "object" &&
    unwrapped.data !== null
  ) {
    return unwrapped.data;
  }
  return handle;
}

/**
 * The query text as the caller wrote it, or the public compiled SQL when the
 * query object keeps no authored text.
 */
export function declaredQueryText(handle: object): Probe<string> {
  return flatMap(reflect(handle, "query"), (query) =>
    firstSuccess(
      [
        ...DECLARED_TEXT_MEMBERS.map(
          (member) => () =>
            flatMap(query.tryRead(member), (text) =>
              expectString(text, `query.${member}`),
            ),
        ),
        ...compiledForms(query).map(
          (compiled) => () =>
            flatMap(compiled(), (form) =>
              flatMap(form.tryGetField("sql"), (sql) =>
                expectString(sql, "compiled.sql"),
              ),
            ),
        ),
      ],
      "query",
      DECLARED_TEXT_EXPECTATION,
    ),
  );
}

/**
 * The value to pass to `getParameterValue` for a declared parameter: its
 * position when it has one, else its name.
 */
function parameterReference(parameter: unknown): Probe<number | string> {
  return flatMap(
    reflect(parameter, "parameter"),
    (p): Probe<number | string> => {
      const position = p.tryRead("position");
      if (position.success && typeof position.data === "number") {
        return ok(position.data);
      }
      const name = p.tryRead("name");
      if (name.success && typeof name.data === "string") return ok(name.data);
      return mismatch(
        "parameter.position or parameter.name",
        "a number or a string",
        position.success ? describeValue(position.data) : "neither",
      );
    },
  );
}

function referencedParameterValues(
  query: StructuralAccessor,
): Probe<readonly unknown[]> {
  return flatMap(query.tryRead("parameters"), (declared) =>
    flatMap(
      expectIterable(declared, "query.parameters"),
      (parameters): Probe<readonly unknown[]> => {
        const values: unknown[] = [];
        for (const parameter of parameters) {
          const value = flatMap(parameterReference(parameter), (reference) =>
            query.tryInvoke("getParameterValue", [reference]),
          );
          if (!value.success) return value;
          values.push(value.data);
        }
        return ok(values);
      },
    ),
  );
}

/**
 * Succeeds with an empty list only when the query lists no parameters, so
 * that declared parameters which could not be resolved are never reported
 * as none.
 */
function noDeclaredParameters(
  query: StructuralAccessor,
): Probe<readonly unknown[]> {
  const declared = query.tryRead("parameters");
  if (!declared.success) return ok([]);
  return flatMap(
    expectIterable(declared.data, "query.parameters"),
    (parameters): Probe<readonly unknown[]> =>
      parameters.length === 0 ? ok([]) : (
        mismatch(
          "query.parameters",
          "no parameters",
          `${parameters.length} unresolved parameters`,
        )
      ),
  );
}

/**
 * Parameter values the query object exposes publicly.
 *
 * Tiers, in order: declared parameters re-resolved through
 * `getParameterValue`, by position or else by name, then the compiled form's
 * parameter array, then an empty list for query objects that have declared
 * text and list no parameters. The first tier yields values in the order the
 * query object lists its parameters, which some engines do not keep stable.
 */
export function declaredParameterValues(
  handle: object,
): Probe<readonly unknown[]> {
  return flatMap(reflect(handle, "query"), (query) =>
    firstSuccess<readonly unknown[]>(
      [
        () => referencedParameterValues(query),
        ...compiledForms(query).flatMap((compiled) =>
          COMPILED_PARAMETER_MEMBERS.map(
            (member) => () =>
              flatMap(compiled(), (form) =>
                flatMap(form.tryGetField(member), (values) =>
                  expectIterable(values, `compiled.${member}`),
                ),
              ),
          ),
        ),
        () =>
          flatMap(declaredQueryText(handle), () => noDeclaredParameters(query)),
      ],
      "query",
      "declared parameters or declared query text",
    ),
  );
}
