/**
 * SQL Extractor Error Hierarchy
 *
 * All errors extend SqlExtractorError with:
 * - `code`: Machine-readable error code for programmatic handling
 * - `category`: Classification for error handling strategies
 * - `suggestion`: Optional recovery guidance for users
 * - `details`: Structured context about the error
 *
 * Only `InvalidQueryHandleError` and `ConfigurationError` are ever thrown to
 * callers. `StructuralMismatchError` travels inside probe results and
 * fallback events.
 *
 * @example
 * ```typescript
 * try {
 *   extractSql(query);
 * } catch (error) {
 *   if (isSqlExtractorError(error)) {
 *     console.error(error.toUserMessage());
 *   }
 * }
 * ```
 */

// ============================================================
// Types
// ============================================================

/**
 * Error category for programmatic handling.
 *
 * - `user`: Caused by invalid input or incorrect usage. Recoverable by fixing input.
 * - `system`: The query engine's internals did not have the expected shape.
 */
export type ErrorCategory = "user" | "system";

/**
 * Options for SqlExtractorError constructor.
 */
export type SqlExtractorErrorOptions = Readonly<{
  /** Structured context about the error */
  details?: Record<string, unknown>;
  /** Error category for handling strategies */
  category: ErrorCategory;
  /** Recovery guidance for users */
  suggestion?: string;
  /** Underlying cause of the error */
  cause?: unknown;
}>;

function formatCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.stack ?? cause.message;
  }
  if (typeof cause === "string") {
    return cause;
  }
  if (
    typeof cause === "number" ||
    typeof cause === "boolean" ||
    typeof cause === "bigint"
  ) {
    return String(cause);
  }
  if (typeof cause === "symbol") {
    return cause.description ?? "Symbol";
  }
  if (cause === undefined) {
    return "Unknown cause";
  }

  try {
    return JSON.stringify(cause);
  } catch (error) {
    return `Unserializable cause: ${
      error instanceof Error ? error.message : "Unknown error"
    }`;
  }
}

// ============================================================
// Base Error
// ============================================================

/**
 * Base error class for all extractor errors.
 */
export class SqlExtractorError extends Error {
  /** Machine-readable error code (e.g., "INVALID_QUERY_HANDLE") */
  readonly code: string;

  /** Error category for handling strategies */
  readonly category: ErrorCategory;

  /** Structured context about the error */
  readonly details: Readonly<Record<string, unknown>>;

  /** Recovery guidance for users */
  readonly suggestion?: string;

  constructor(message: string, code: string, options: SqlExtractorErrorOptions) {
    super(message, options.cause ? { cause: options.cause } : undefined);
    this.name = "SqlExtractorError";
    this.code = code;
    this.category = options.category;
    this.details = Object.freeze(options.details ?? {});
    if (options.suggestion !== undefined) {
      this.suggestion = options.suggestion;
    }
  }

  /**
   * Returns a user-friendly error message with suggestion if available.
   */
  toUserMessage(): string {
    if (this.suggestion) {
      return `${this.message}\n\nSuggestion: ${this.suggestion}`;
    }
    return this.message;
  }

  /**
   * Returns a detailed string representation for logging.
   */
  toLogString(): string {
    const lines = [
      `[${this.code}] ${this.message}`,
      `  Category: ${this.category}`,
    ];

    if (this.suggestion) {
      lines.push(`  Suggestion: ${this.suggestion}`);
    }

    const detailKeys = Object.keys(this.details);
    if (detailKeys.length > 0) {
      lines.push(`  Details: ${JSON.stringify(this.details)}`);
    }

    if (this.cause) {
      lines.push(`  Cause: ${formatCause(this.cause)}`);
    }

    return lines.join("\n");
  }
}

// ============================================================
// Precondition Errors (category: "user")
// ============================================================

/**
 * Details for InvalidQueryHandleError.
 */
export type InvalidQueryHandleDetails = Readonly<{
  /** Extraction operation that rejected the handle */
  operation: string;
  /** `typeof` the rejected value, or "null" */
  receivedType: string;
  /** Constructor name of the rejected value, when it is an object */
  constructorName?: string;
}>;

/**
 * Thrown when the value passed to an extraction operation is not a query
 * handle: `null`, `undefined`, a primitive, or an object that no probe
 * recognizes and that exposes no declared query text.
 *
 * @example
 * ```typescript
 * try {
 *   extractSql(null);
 * } catch (error) {
 *   if (error instanceof InvalidQueryHandleError) {
 *     console.log(error.details.receivedType); // "null"
 *   }
 * }
 * ```
 */
export class InvalidQueryHandleError extends SqlExtractorError {
  declare readonly details: InvalidQueryHandleDetails;

  constructor(
    message: string,
    details: InvalidQueryHandleDetails,
    options?: { cause?: unknown },
  ) {
    super(message, "INVALID_QUERY_HANDLE", {
      details,
      category: "user",
      suggestion:
        "Pass the query object produced by your ORM (for example the result of createQuery() or a drizzle select builder), not its result rows or SQL string.",
      cause: options?.cause,
    });
    this.name = "InvalidQueryHandleError";
  }
}

// ============================================================
// Configuration Errors (category: "user")
// ============================================================

/**
 * Validation issue from Zod.
 */
export type ConfigurationIssue = Readonly<{
  /** Path to the invalid option (e.g., "hooks.onFallback") */
  path: string;
  /** Human-readable error message */
  message: string;
  /** Zod error code */
  code?: string;
}>;

/**
 * Thrown when extractor or probe options are invalid.
 */
export class ConfigurationError extends SqlExtractorError {
  constructor(
    message: string,
    details: Readonly<Record<string, unknown>> = {},
    options?: { cause?: unknown; suggestion?: string },
  ) {
    super(message, "CONFIGURATION_ERROR", {
      details,
      category: "user",
      suggestion:
        options?.suggestion ??
        "Check the options passed to createSqlExtractor() or createPlanCacheProbe().",
      cause: options?.cause,
    });
    this.name = "ConfigurationError";
  }
}

// ============================================================
// Structural Errors (category: "system")
// ============================================================

/**
 * Details for StructuralMismatchError.
 */
export type StructuralMismatchDetails = Readonly<{
  /** Member or probe step that did not have the expected shape */
  member: string;
  /** What the probe expected to find */
  expected: string;
  /** What it found instead */
  actual: string;
}>;

/**
 * An internal object did not expose the expected field, method or variant.
 *
 * Never thrown to callers of the extraction operations: it is the "not
 * found" value of a probe step and the reason attached to fallback events.
 */
export class StructuralMismatchError extends SqlExtractorError {
  declare readonly details: StructuralMismatchDetails;

  constructor(details: StructuralMismatchDetails, options?: { cause?: unknown }) {
    super(
      `Expected ${details.member} to be ${details.expected}, found ${details.actual}`,
      "STRUCTURAL_MISMATCH",
      {
        details,
        category: "system",
        suggestion:
          "The ORM version in use may lay out its query internals differently. Configure a probe for it.",
        cause: options?.cause,
      },
    );
    this.name = "StructuralMismatchError";
  }
}

// ============================================================
// Utility Functions
// ============================================================

/**
 * Type guard for SqlExtractorError.
 */
export function isSqlExtractorError(error: unknown): error is SqlExtractorError {
  return error instanceof SqlExtractorError;
}

/**
 * Check if error is recoverable by user action.
 *
 * @example
 * ```typescript
 * if (isUserRecoverable(error)) {
 *   showErrorToUser(error.toUserMessage());
 * }
 * ```
 */
export function isUserRecoverable(error: unknown): boolean {
  return isSqlExtractorError(error) && error.category === "user";
}

/**
 * Check if error describes the query engine's internal shape.
 */
export function isSystemError(error: unknown): boolean {
  return isSqlExtractorError(error) && error.category === "system";
}

/**
 * Extract suggestion from error if available.
 */
export function getErrorSuggestion(error: unknown): string | undefined {
  return isSqlExtractorError(error) ? error.suggestion : undefined;
}

/**
 * Describes a value for error details without serializing it. Never throws:
 * an object whose prototype cannot be read, such as a revoked proxy, is
 * described as "object".
 */
export function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (typeof value === "function") return "function";
  if (typeof value !== "object") return typeof value;
  try {
    if (Array.isArray(value)) return "array";
    const constructorName: unknown = Object.getPrototypeOf(value)?.constructor
      ?.name;
    return typeof constructorName === "string" && constructorName !== "" ?
        `object (${constructorName})`
      : "object";
  } catch {
    return "object";
  }
}
