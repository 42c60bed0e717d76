/**
 * SQL Extractor: read the SQL an ORM generates for a query object, and the
 * values bound to it, without executing the query.
 *
 * @example
 * ```typescript
 * import { extractQuery } from "sql-extractor";
 *
 * const query = db.select().from(users).where(eq(users.id, 42));
 * const { sql, params, sqlSource } = extractQuery(query);
 *
 * logger.debug({ sql, params, sqlSource });
 * ```
 */

// ============================================================
// Extraction
// ============================================================

export {
  createSqlExtractor,
  type ExtractedEvent,
  type ExtractedQuery,
  type ExtractionOperation,
  type ExtractionSource,
  type ExtractorHooks,
  extractParameterValues,
  extractQuery,
  extractSql,
  type FallbackEvent,
  type FallbackTier,
  type SqlExtractor,
  type SqlExtractorOptions,
  SqlExtractorOptionsSchema,
} from "./extractor";

// ============================================================
// Probes
// ============================================================

export {
  createPlanCacheProbe,
  drizzleProbe,
  isQueryEngineProbe,
  type PlanCacheProbeConfig,
  PlanCacheProbeConfigSchema,
  type QueryEngineProbe,
} from "./probes";

export {
  declaredParameterValues,
  declaredQueryText,
  unwrapHandle,
} from "./fallback/declared-query";

export {
  expectIterable,
  expectObject,
  expectString,
  mismatch,
  type Probe,
  reflect,
  type StructuralAccessor,
} from "./reflection/structural-accessor";

// ============================================================
// Errors
// ============================================================

export type {
  ConfigurationIssue,
  ErrorCategory,
  InvalidQueryHandleDetails,
  SqlExtractorErrorOptions,
  StructuralMismatchDetails,
} from "./errors";
export {
  // Error classes
  ConfigurationError,
  InvalidQueryHandleError,
  SqlExtractorError,
  StructuralMismatchError,
  // Error utility functions
  describeValue,
  getErrorSuggestion,
  isSqlExtractorError,
  isSystemError,
  isUserRecoverable,
} from "./errors";

export type { ValidationContext } from "./errors/validation";
export { validateOptions } from "./errors/validation";

// ============================================================
// Utilities
// ============================================================

export { attempt, err, flatMap, ok, type Result } from "./utils";
