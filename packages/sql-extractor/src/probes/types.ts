import { type Probe } from "../reflection/structural-accessor";

/**
 * Where one ORM keeps the pieces the extractor walks through.
 *
 * Each step answers with a `Probe`: a failed probe means "this engine does
 * not look the way we expected here" and sends the extractor to its next
 * fallback tier. Steps are called in this order:
 *
 * 1. `asExecutableQuery`: is the handle the engine's internal query variant?
 * 2. `interpretationsKey`: cache key for the handle (failure: build directly)
 * 3. `resolveCachedPlan` with `buildPlan` as the supplier, or `buildPlan` alone
 * 4. `asSelectPlan`: is the plan a concrete select plan?
 * 5. `cachedInterpretation`, then `buildInterpretation` when it is nullish
 * 6. `statementSql`: SQL text of the interpretation's low-level statement
 *
 * `visitBindings` is used on its own for parameter values.
 */
export type QueryEngineProbe = Readonly<{
  /** Name reported in fallback and extraction events */
  name: string;
  asExecutableQuery: (handle: object) => Probe<object>;
  interpretationsKey: (query: object) => Probe<unknown>;
  resolveCachedPlan: (
    query: object,
    key: unknown,
    buildPlan: () => unknown,
  ) => Probe<unknown>;
  buildPlan: (query: object) => Probe<unknown>;
  asSelectPlan: (plan: unknown) => Probe<object>;
  /** Succeeds with `null`/`undefined` when the plan has not built it yet. */
  cachedInterpretation: (plan: object) => Probe<unknown>;
  buildInterpretation: (plan: object, query: object) => Probe<unknown>;
  statementSql: (interpretation: unknown) => Probe<string>;
  visitBindings: (
    query: object,
    visitor: (value: unknown) => void,
  ) => Probe<undefined>;
}>;

const PROBE_STEPS = [
  "asExecutableQuery",
  "interpretationsKey",
  "resolveCachedPlan",
  "buildPlan",
  "asSelectPlan",
  "cachedInterpretation",
  "buildInterpretation",
  "statementSql",
  "visitBindings",
] as const satisfies readonly (keyof QueryEngineProbe)[];

/**
 * Type guard for values passed as probes in extractor options.
 */
export function isQueryEngineProbe(value: unknown): value is QueryEngineProbe {
  if (typeof value !== "object" || value === null) return false;
  const name: unknown = Reflect.get(value, "name");
  if (typeof name !== "string" || name === "") return false;
  return PROBE_STEPS.every(
    (step) => typeof Reflect.get(value, step) === "function",
  );
}
