import { type StructuralMismatchError } from "../errors";
import { type QueryEngineProbe } from "../probes/types";

// ============================================================
// Events
// ============================================================

export type ExtractionOperation = "extractSql" | "extractParameterValues";

/**
 * Where a value came from.
 *
 * - `statement`: the engine's low-level statement (SQL)
 * - `bindings`: the engine's parameter binding set (parameters)
 * - `declared`: what the query object exposes publicly
 */
export type ExtractionSource = "statement" | "bindings" | "declared";

export type FallbackTier = "declared-query" | "declared-parameters";

/**
 * Emitted when an extraction could not use the engine internals.
 */
export type FallbackEvent = Readonly<{
  operation: ExtractionOperation;
  /** Probe that accepted the handle, or undefined when none did */
  probe: string | undefined;
  tier: FallbackTier;
  /** The probe step that did not have the expected shape */
  reason: StructuralMismatchError;
}>;

/**
 * Emitted after every successful extraction.
 */
export type ExtractedEvent = Readonly<{
  operation: ExtractionOperation;
  probe: string | undefined;
  source: ExtractionSource;
}>;

/**
 * Observability hooks for extraction.
 *
 * Hooks run synchronously inside the extraction call. An exception thrown by
 * a hook propagates to the caller.
 *
 * @example
 * ```typescript
 * const extractor = createSqlExtractor({
 *   hooks: {
 *     onFallback: (event) => {
 *       console.log(`${event.operation} used ${event.tier}: ${event.reason.message}`);
 *     },
 *   },
 * });
 * ```
 */
export type ExtractorHooks = Readonly<{
  /** Called when an extraction falls back to the declared query */
  onFallback?: (event: FallbackEvent) => void;
  /** Called when an extraction produced its result */
  onExtracted?: (event: ExtractedEvent) => void;
}>;

// ============================================================
// Options and Results
// ============================================================

/**
 * Options for creating an extractor.
 */
export type SqlExtractorOptions = Readonly<{
  /**
   * Probes tried in order; the first whose `asExecutableQuery` accepts the
   * handle is used. Defaults to the plan-cache probe and the drizzle probe.
   */
  probes?: readonly QueryEngineProbe[];
  /** Observability hooks */
  hooks?: ExtractorHooks;
  /** Write a console warning for every fallback. Defaults to false. */
  warnOnFallback?: boolean;
}>;

/**
 * SQL and parameters of a query, with the tier each came from.
 */
export type ExtractedQuery = Readonly<{
  sql: string;
  params: readonly unknown[];
  sqlSource: "statement" | "declared";
  paramsSource: "bindings" | "declared";
  /** Probe that accepted the handle, or undefined when none did */
  probe: string | undefined;
}>;

export type SqlExtractor = Readonly<{
  /**
   * The SQL the engine generates for the query, or the declared query text
   * when the engine internals cannot be reached.
   *
   * @throws InvalidQueryHandleError when `handle` is not a query object
   */
  extractSql: (handle: unknown) => string;
  /**
   * Bound parameter values in the engine's binding order, or the publicly
   * declared parameter values when the internals cannot be reached.
   *
   * @throws InvalidQueryHandleError when `handle` is not a query object
   */
  extractParameterValues: (handle: unknown) => unknown[];
  /** Both of the above, with the tier each came from. */
  extractQuery: (handle: unknown) => ExtractedQuery;
}>;
