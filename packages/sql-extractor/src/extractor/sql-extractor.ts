/**
 * SQL Extractor
 *
 * Recovers the SQL an ORM generates for a query object, and the values bound
 * to it, by walking the engine's internals through a QueryEngineProbe. Every
 * step that finds an unexpected shape degrades to the query's declared text
 * or declared parameters.
 *
 * @example
 * ```typescript
 * const query = db.select().from(users).where(eq(users.id, 42));
 *
 * extractSql(query); // 'select "id", "name" from "users" where "users"."id" = ?'
 * extractParameterValues(query); // [42]
 * ```
 */
import {
  describeValue,
  InvalidQueryHandleError,
  StructuralMismatchError,
} from "../errors";
import {
  declaredParameterValues,
  declaredQueryText,
  unwrapHandle,
} from "../fallback/declared-query";
import { drizzleProbe } from "../probes/drizzle";
import { createPlanCacheProbe } from "../probes/plan-cache";
import { type QueryEngineProbe } from "../probes/types";
import { type Probe } from "../reflection/structural-accessor";
import { flatMap, ok } from "../utils/result";
import { parseExtractorOptions } from "./options";
import {
  type ExtractedEvent,
  type ExtractedQuery,
  type ExtractionOperation,
  type FallbackEvent,
  type SqlExtractor,
  type SqlExtractorOptions,
} from "./types";

// ============================================================
// Probe Selection
// ============================================================

type SelectedProbe = Readonly<{
  probe: QueryEngineProbe;
  /** The handle as the probe's executable query variant */
  query: object;
}>;

type Selection = Readonly<{
  selected: SelectedProbe | undefined;
  /** Why no probe accepted the handle; set when `selected` is undefined */
  rejection: StructuralMismatchError | undefined;
}>;

function selectProbe(
  probes: readonly QueryEngineProbe[],
  handle: object,
): Selection {
  const rejections: StructuralMismatchError[] = [];
  for (const probe of probes) {
    const accepted = probe.asExecutableQuery(handle);
    if (accepted.success) {
      return { selected: { probe, query: accepted.data }, rejection: undefined };
    }
    rejections.push(accepted.error);
  }
  return {
    selected: undefined,
    rejection: new StructuralMismatchError(
      {
        member: "query",
        expected: `a query accepted by one of: ${probes
          .map((probe) => probe.name)
          .join(", ")}`,
        actual: describeValue(handle),
      },
      { cause: new AggregateError(rejections, "No probe accepted the query") },
    ),
  };
}

// ============================================================
// Statement Path
// ============================================================

function isPresent(value: unknown): boolean {
  return value !== null && value !== undefined;
}

/**
 * Resolves the plan through the engine's interpretation cache, building it
 * on a miss. The plan is built at most once per call: when the cache ran the
 * supplier and then failed, the supplier's outcome is the result. Only when
 * the supplier never ran is the plan built directly.
 */
function resolvePlan(selected: SelectedProbe): Probe<unknown> {
  const { probe, query } = selected;
  const key = probe.interpretationsKey(query);

  if (key.success && isPresent(key.data)) {
    const builds: Probe<unknown>[] = [];
    const resolved = probe.resolveCachedPlan(query, key.data, () => {
      const built = probe.buildPlan(query);
      builds.push(built);
      if (!built.success) throw built.error;
      return built.data;
    });
    if (resolved.success) return resolved;
    const [supplied] = builds;
    if (supplied !== undefined) return supplied;
  }

  return probe.buildPlan(query);
}

function interpretationOf(
  selected: SelectedProbe,
  plan: object,
): Probe<unknown> {
  const { probe, query } = selected;
  return flatMap(
    probe.cachedInterpretation(plan),
    (cached): Probe<unknown> =>
      isPresent(cached) ? ok(cached) : probe.buildInterpretation(plan, query),
  );
}

function statementSql(selected: SelectedProbe): Probe<string> {
  const { probe } = selected;
  return flatMap(resolvePlan(selected), (plan) =>
    flatMap(probe.asSelectPlan(plan), (selectPlan) =>
      flatMap(interpretationOf(selected, selectPlan), (interpretation) =>
        probe.statementSql(interpretation),
      ),
    ),
  );
}

function boundValues(selected: SelectedProbe): Probe<unknown[]> {
  const values: unknown[] = [];
  return flatMap(
    selected.probe.visitBindings(selected.query, (value) => {
      values.push(value);
    }),
    () => ok(values),
  );
}

// ============================================================
// Extractor
// ============================================================

function assertQueryHandle(
  handle: unknown,
  operation: ExtractionOperation,
): asserts handle is object {
  if (typeof handle === "object" && handle !== null) return;
  throw new InvalidQueryHandleError(
    `${operation} expects a query object, received ${describeValue(handle)}`,
    { operation, receivedType: handle === null ? "null" : typeof handle },
  );
}

function unrecognizedHandle(
  handle: object,
  operation: ExtractionOperation,
  reason: StructuralMismatchError,
): InvalidQueryHandleError {
  const constructorName = describeValue(handle);
  return new InvalidQueryHandleError(
    `${operation} could not recognize ${constructorName} as a query: ${reason.message}`,
    {
      operation,
      receivedType: typeof handle,
      constructorName:
        constructorName.startsWith("object (") ?
          constructorName.slice("object (".length, -1)
        : undefined,
    },
    { cause: reason },
  );
}

function formatFallbackWarning(event: FallbackEvent): string {
  const probe = event.probe === undefined ? "" : ` (probe: ${event.probe})`;
  return `[SqlExtractor] ${event.operation} fell back to the ${event.tier}${probe}: ${event.reason.message}`;
}

/**
 * Creates an extractor bound to validated options.
 *
 * @throws ConfigurationError when the options are invalid
 *
 * @example
 * ```typescript
 * const extractor = createSqlExtractor({
 *   probes: [createPlanCacheProbe({ sqlTextMember: "sql" })],
 *   warnOnFallback: true,
 * });
 * const { sql, params, sqlSource } = extractor.extractQuery(query);
 * ```
 */
export function createSqlExtractor(
  options: SqlExtractorOptions = {},
): SqlExtractor {
  const parsed = parseExtractorOptions(options);
  const probes = parsed.probes ?? [createPlanCacheProbe(), drizzleProbe];
  const hooks = parsed.hooks ?? {};
  const warnOnFallback = parsed.warnOnFallback ?? false;

  const fallBack = (event: FallbackEvent): void => {
    if (warnOnFallback) {
      console.warn(formatFallbackWarning(event));
    }
    hooks.onFallback?.(event);
  };

  const extracted = (event: ExtractedEvent): void => {
    hooks.onExtracted?.(event);
  };

  const sqlOf = (
    handle: unknown,
  ): Pick<ExtractedQuery, "sql" | "sqlSource" | "probe"> => {
    const operation = "extractSql";
    assertQueryHandle(handle, operation);
    const query = unwrapHandle(handle);
    const { selected, rejection } = selectProbe(probes, query);

    let reason = rejection;
    if (selected !== undefined) {
      const sql = statementSql(selected);
      if (sql.success) {
        extracted({ operation, probe: selected.probe.name, source: "statement" });
        return { sql: sql.data, sqlSource: "statement", probe: selected.probe.name };
      }
      reason = sql.error;
    }

    const probe = selected?.probe.name;
    const declared = declaredQueryText(query);
    if (!declared.success) {
      throw unrecognizedHandle(query, operation, reason ?? declared.error);
    }
    if (reason !== undefined) {
      fallBack({ operation, probe, tier: "declared-query", reason });
    }
    extracted({ operation, probe, source: "declared" });
    return { sql: declared.data, sqlSource: "declared", probe };
  };

  const paramsOf = (
    handle: unknown,
  ): Pick<ExtractedQuery, "params" | "paramsSource" | "probe"> => {
    const operation = "extractParameterValues";
    assertQueryHandle(handle, operation);
    const query = unwrapHandle(handle);
    const { selected, rejection } = selectProbe(probes, query);

    let reason = rejection;
    if (selected !== undefined) {
      const values = boundValues(selected);
      if (values.success) {
        extracted({ operation, probe: selected.probe.name, source: "bindings" });
        return {
          params: values.data,
          paramsSource: "bindings",
          probe: selected.probe.name,
        };
      }
      reason = values.error;
    }

    const probe = selected?.probe.name;
    const declared = declaredParameterValues(query);
    if (!declared.success) {
      throw unrecognizedHandle(query, operation, reason ?? declared.error);
    }
    if (reason !== undefined) {
      fallBack({ operation, probe, tier: "declared-parameters", reason });
    }
    extracted({ operation, probe, source: "declared" });
    return { params: [...declared.data], paramsSource: "declared", probe };
  };

  return {
    extractSql: (handle) => sqlOf(handle).sql,
    extractParameterValues: (handle) => [...paramsOf(handle).params],
    extractQuery: (handle) => {
      const sql = sqlOf(handle);
      const params = paramsOf(handle);
      return {
        sql: sql.sql,
        params: params.params,
        sqlSource: sql.sqlSource,
        paramsSource: params.paramsSource,
        probe: sql.probe ?? params.probe,
      };
    },
  };
}

// ============================================================
// Default Extractor
// ============================================================

const defaultExtractor = createSqlExtractor();

function extractorFor(options: SqlExtractorOptions | undefined): SqlExtractor {
  return options === undefined ? defaultExtractor : createSqlExtractor(options);
}

/**
 * Returns the SQL the engine generates for `handle`, or its declared query
 * text when the engine internals cannot be reached.
 *
 * @throws InvalidQueryHandleError when `handle` is not a query object
 */
export function extractSql(
  handle: unknown,
  options?: SqlExtractorOptions,
): string {
  return extractorFor(options).extractSql(handle);
}

/**
 * Returns the values bound to `handle` in the engine's binding order. On the
 * declared-parameters fallback the order follows the query object's own
 * parameter listing and is not guaranteed to match the SQL placeholders.
 *
 * @throws InvalidQueryHandleError when `handle` is not a query object
 */
export function extractParameterValues(
  handle: unknown,
  options?: SqlExtractorOptions,
): unknown[] {
  return extractorFor(options).extractParameterValues(handle);
}

/**
 * Returns SQL and parameters together, with the tier each came from.
 *
 * @throws InvalidQueryHandleError when `handle` is not a query object
 */
export function extractQuery(
  handle: unknown,
  options?: SqlExtractorOptions,
): ExtractedQuery {
  return extractorFor(options).extractQuery(handle);
}
