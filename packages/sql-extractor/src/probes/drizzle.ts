/**
 * Probe for drizzle-orm query builders.
 *
 * Drizzle builders (`db.select()...`, `db.update()...`, `db.delete()...`)
 * keep the dialect they were created with and render themselves through
 * `getSQL()`. There is no interpretation cache: the plan is built directly,
 * it is the drizzle `SQL` object, and the dialect's `sqlToQuery` turns it
 * into the final `{ sql, params }`.
 */
import { is, SQL } from "drizzle-orm";

import { describeValue } from "../errors";
import {
  expectIterable,
  expectObject,
  expectString,
  mismatch,
  type Probe,
  reflect,
} from "../reflection/structural-accessor";
import { flatMap, ok } from "../utils/result";
import { type QueryEngineProbe } from "./types";

function asDrizzleSql(value: unknown, member: string): Probe<SQL> {
  if (is(value, SQL)) return ok(value);
  return mismatch(member, "a drizzle SQL object", describeValue(value));
}

function dialectOf(query: object): Probe<object> {
  return flatMap(reflect(query, "builder"), (builder) =>
    flatMap(builder.tryGetField("dialect"), (dialect) =>
      expectObject(dialect, "builder.dialect"),
    ),
  );
}

function compile(query: object, plan: SQL): Probe<object> {
  return flatMap(dialectOf(query), (dialect) =>
    flatMap(reflect(dialect, "builder.dialect"), (accessor) =>
      flatMap(accessor.tryInvoke("sqlToQuery", [plan]), (compiled) =>
        expectObject(compiled, "builder.dialect.sqlToQuery()"),
      ),
    ),
  );
}

function buildPlan(query: object): Probe<unknown> {
  return flatMap(reflect(query, "builder"), (builder) =>
    flatMap(builder.tryInvoke("getSQL"), (plan) =>
      asDrizzleSql(plan, "builder.getSQL()"),
    ),
  );
}

export const drizzleProbe: QueryEngineProbe = {
  name: "drizzle",

  asExecutableQuery: (handle) =>
    flatMap(reflect(handle, "builder"), (builder) =>
      flatMap(builder.tryGetField("getSQL"), (getSql): Probe<object> => {
        if (typeof getSql !== "function") {
          return mismatch("builder.getSQL", "a method", describeValue(getSql));
        }
        return flatMap(dialectOf(handle), (dialect) =>
          flatMap(reflect(dialect, "builder.dialect"), (accessor) =>
            flatMap(accessor.tryGetField("sqlToQuery"), (sqlToQuery): Probe<object> =>
              typeof sqlToQuery === "function" ?
                ok(handle)
              : mismatch(
                  "builder.dialect.sqlToQuery",
                  "a method",
                  describeValue(sqlToQuery),
                ),
            ),
          ),
        );
      }),
    ),

  interpretationsKey: () =>
    mismatch("builder", "an interpretation cache key", "no plan cache"),

  resolveCachedPlan: () =>
    mismatch("builder", "an interpretation cache", "no plan cache"),

  buildPlan,

  asSelectPlan: (plan) => asDrizzleSql(plan, "plan"),

  cachedInterpretation: () => ok(undefined),

  buildInterpretation: (plan, query) =>
    flatMap(asDrizzleSql(plan, "plan"), (sql) => compile(query, sql)),

  statementSql: (interpretation) =>
    flatMap(reflect(interpretation, "compiled"), (compiled) =>
      flatMap(compiled.tryGetField("sql"), (sql) =>
        expectString(sql, "compiled.sql"),
      ),
    ),

  visitBindings: (query, visitor) =>
    flatMap(buildPlan(query), (plan) =>
      flatMap(asDrizzleSql(plan, "plan"), (sql) =>
        flatMap(compile(query, sql), (compiled) =>
          flatMap(reflect(compiled, "compiled"), (accessor) =>
            flatMap(accessor.tryGetField("params"), (params) =>
              flatMap(expectIterable(params, "compiled.params"), (values) => {
                for (const value of values) {
                  visitor(value);
                }
                return ok(undefined);
              }),
            ),
          ),
        ),
      ),
    ),
};
