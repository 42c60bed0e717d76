/**
 * Probe for engines that keep compiled select plans in a shared
 * interpretation cache.
 *
 * The expected layout, with the default member names:
 *
 * ```text
 * handle.session.factory.queryEngine
 *   .createInterpretationsKey(handle)       -> key | null
 *   .interpretationCache
 *     .resolveSelectQueryPlan(key, supplier) -> plan
 * handle.buildSelectQueryPlan()              -> plan (the supplier)
 * handle.parameterBindings
 *   .visitBindings((parameter, binding) => binding.bindValue)
 *
 * plan.cacheableInterpretation               -> interpretation | null
 * plan.statement, plan.parameterXref
 * plan.constructor.buildCacheableInterpretation(statement, xref, handle)
 * interpretation.selectStatement.sqlString   -> SQL text
 * ```
 *
 * Each member is read with `tryRead`, so `session` also matches a
 * `getSession()` method and `sqlString` matches `getSqlString()`.
 */
import { z } from "zod";

import { describeValue, type StructuralMismatchError } from "../errors";
import { validateOptions } from "../errors/validation";
import {
  expectObject,
  expectString,
  mismatch,
  type Probe,
  reflect,
} from "../reflection/structural-accessor";
import { err, flatMap, ok } from "../utils/result";
import { type QueryEngineProbe } from "./types";

// ============================================================
// Configuration
// ============================================================

const memberName = z.string().min(1);

export const PlanCacheProbeConfigSchema = z.strictObject({
  /** Probe name reported in events */
  name: memberName.default("plan-cache"),
  /** Path from the handle to the query engine */
  queryEnginePath: z
    .array(memberName)
    .min(1)
    .default(["session", "factory", "queryEngine"]),
  /** Engine method deriving the cache key from a handle */
  interpretationsKeyMethod: memberName.default("createInterpretationsKey"),
  /** Engine member holding the interpretation cache */
  interpretationCacheMember: memberName.default("interpretationCache"),
  /** Cache method taking (key, supplier) */
  resolvePlanMethod: memberName.default("resolveSelectQueryPlan"),
  /** Handle method building a select plan */
  buildPlanMethod: memberName.default("buildSelectQueryPlan"),
  /** Plan field caching the built interpretation */
  interpretationField: memberName.default("cacheableInterpretation"),
  /** Plan field holding the statement tree */
  statementTreeField: memberName.default("statement"),
  /** Plan field holding the parameter cross-reference */
  parameterXrefField: memberName.default("parameterXref"),
  /** Static method on the plan's class building an interpretation */
  interpretationBuilder: memberName.default("buildCacheableInterpretation"),
  /** Interpretation member holding the low-level statement */
  statementMember: memberName.default("selectStatement"),
  /** Statement member holding the SQL text */
  sqlTextMember: memberName.default("sqlString"),
  /** Handle member holding the parameter binding set */
  parameterBindingsMember: memberName.default("parameterBindings"),
  /** Binding-set method taking a (parameter, binding) visitor */
  visitBindingsMethod: memberName.default("visitBindings"),
  /** Binding member holding the bound value */
  bindValueMember: memberName.default("bindValue"),
});

export type PlanCacheProbeConfig = z.input<typeof PlanCacheProbeConfigSchema>;

type ResolvedPlanCacheProbeConfig = z.output<typeof PlanCacheProbeConfigSchema>;

// ============================================================
// Probe
// ============================================================

/**
 * Creates a probe for an interpretation-cache engine.
 *
 * @throws ConfigurationError when a member name is empty or unknown options
 *   are passed
 *
 * @example
 * ```typescript
 * const probe = createPlanCacheProbe({ sqlTextMember: "sql" });
 * const extractor = createSqlExtractor({ probes: [probe] });
 * ```
 */
export function createPlanCacheProbe(
  config: PlanCacheProbeConfig = {},
): QueryEngineProbe {
  const names = validateOptions(PlanCacheProbeConfigSchema, config, {
    subject: "plan-cache probe config",
  });
  return buildProbe(names);
}

function buildProbe(names: ResolvedPlanCacheProbeConfig): QueryEngineProbe {
  const queryEngine = (query: object): Probe<object> =>
    flatMap(reflect(query, "query"), (handle) =>
      flatMap(handle.tryReadPath(names.queryEnginePath), (engine) =>
        expectObject(engine, names.queryEnginePath.join(".")),
      ),
    );

  const parameterBindings = (query: object): Probe<object> =>
    flatMap(reflect(query, "query"), (handle) =>
      flatMap(handle.tryRead(names.parameterBindingsMember), (bindings) =>
        expectObject(bindings, `query.${names.parameterBindingsMember}`),
      ),
    );

  const asExecutableQuery = (handle: object): Probe<object> =>
    flatMap(reflect(handle, "query"), (query) =>
      flatMap(query.tryGetField(names.buildPlanMethod), (builder): Probe<object> => {
        if (typeof builder !== "function") {
          return mismatch(
            `query.${names.buildPlanMethod}`,
            "a method",
            describeValue(builder),
          );
        }
        return flatMap(parameterBindings(handle), () => ok(handle));
      }),
    );

  const interpretationsKey = (query: object): Probe<unknown> =>
    flatMap(queryEngine(query), (engine) =>
      flatMap(reflect(engine, "queryEngine"), (accessor) =>
        accessor.tryInvoke(names.interpretationsKeyMethod, [query]),
      ),
    );

  const resolveCachedPlan = (
    query: object,
    key: unknown,
    buildPlan: () => unknown,
  ): Probe<unknown> =>
    flatMap(queryEngine(query), (engine) =>
      flatMap(reflect(engine, "queryEngine"), (accessor) =>
        flatMap(accessor.tryRead(names.interpretationCacheMember), (cache) =>
          flatMap(
            reflect(cache, `queryEngine.${names.interpretationCacheMember}`),
            (cacheAccessor) =>
              cacheAccessor.tryInvoke(names.resolvePlanMethod, [
                key,
                buildPlan,
              ]),
          ),
        ),
      ),
    );

  const buildPlan = (query: object): Probe<unknown> =>
    flatMap(reflect(query, "query"), (handle) =>
      handle.tryInvoke(names.buildPlanMethod),
    );

  const asSelectPlan = (plan: unknown): Probe<object> =>
    flatMap(expectObject(plan, "plan"), (planObject) =>
      flatMap(reflect(planObject, "plan"), (accessor) =>
        flatMap(accessor.tryGetField(names.interpretationField), () =>
          flatMap(accessor.tryGetField("constructor"), (constructor) =>
            flatMap(reflect(constructor, "plan.constructor"), (planClass) =>
              flatMap(
                planClass.tryGetField(names.interpretationBuilder),
                (builder): Probe<object> =>
                  typeof builder === "function" ?
                    ok(planObject)
                  : mismatch(
                      `plan.constructor.${names.interpretationBuilder}`,
                      "a static method",
                      describeValue(builder),
                    ),
              ),
            ),
          ),
        ),
      ),
    );

  const cachedInterpretation = (plan: object): Probe<unknown> =>
    flatMap(reflect(plan, "plan"), (accessor) =>
      accessor.tryGetField(names.interpretationField),
    );

  const buildInterpretation = (plan: object, query: object): Probe<unknown> =>
    flatMap(reflect(plan, "plan"), (accessor) =>
      flatMap(accessor.tryGetField(names.statementTreeField), (statement) =>
        flatMap(accessor.tryGetField(names.parameterXrefField), (xref) =>
          flatMap(
            accessor.tryInvokeStatic(names.interpretationBuilder, [
              statement,
              xref,
              query,
            ]),
            (interpretation): Probe<unknown> =>
              interpretation === null || interpretation === undefined ?
                mismatch(
                  `plan.constructor.${names.interpretationBuilder}()`,
                  "an interpretation",
                  describeValue(interpretation),
                )
              : ok(interpretation),
          ),
        ),
      ),
    );

  const statementSql = (interpretation: unknown): Probe<string> =>
    flatMap(reflect(interpretation, "interpretation"), (accessor) =>
      flatMap(accessor.tryRead(names.statementMember), (statement) =>
        flatMap(
          reflect(statement, `interpretation.${names.statementMember}`),
          (statementAccessor) =>
            flatMap(statementAccessor.tryRead(names.sqlTextMember), (sql) =>
              expectString(
                sql,
                `interpretation.${names.statementMember}.${names.sqlTextMember}`,
              ),
            ),
        ),
      ),
    );

  const visitBindings = (
    query: object,
    visitor: (value: unknown) => void,
  ): Probe<undefined> =>
    flatMap(parameterBindings(query), (bindings) =>
      flatMap(reflect(bindings, "parameterBindings"), (accessor): Probe<undefined> => {
        const values: unknown[] = [];
        const failures: StructuralMismatchError[] = [];
        const visited = accessor.tryInvoke(names.visitBindingsMethod, [
          (_parameter: unknown, binding: unknown) => {
            if (failures.length > 0) return;
            const value = flatMap(reflect(binding, "binding"), (b) =>
              b.tryRead(names.bindValueMember),
            );
            if (value.success) {
              values.push(value.data);
            } else {
              failures.push(value.error);
            }
          },
        ]);
        if (!visited.success) return visited;
        const [failure] = failures;
        if (failure !== undefined) return err(failure);
        for (const value of values) {
          visitor(value);
        }
        return ok(undefined);
      }),
    );

  return {
    name: names.name,
    asExecutableQuery,
    interpretationsKey,
    resolveCachedPlan,
    buildPlan,
    asSelectPlan,
    cachedInterpretation,
    buildInterpretation,
    statementSql,
    visitBindings,
  };
}
