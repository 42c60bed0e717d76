/**
 * Option Validation
 *
 * Wraps Zod parsing so invalid extractor or probe options surface as a
 * ConfigurationError that names every offending option.
 *
 * @example
 * ```typescript
 * const config = validateOptions(PlanCacheProbeConfigSchema, input, {
 *   subject: "plan-cache probe config",
 * });
 * ```
 */

import { type ZodError, type ZodType } from "zod";

import { ConfigurationError, type ConfigurationIssue } from "./index";

// ============================================================
// Types
// ============================================================

/**
 * Context for validation operations.
 */
export type ValidationContext = Readonly<{
  /** What is being validated, used in the error message */
  subject: string;
}>;

// ============================================================
// Validation Functions
// ============================================================

/**
 * Converts Zod issues to ConfigurationIssue format.
 */
function zodIssuesToConfigurationIssues(
  error: ZodError,
): ConfigurationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.map(String).join("."),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Validates options against a schema, returning the parsed output.
 *
 * @throws ConfigurationError listing each issue when validation fails
 */
export function validateOptions<T>(
  schema: ZodType<T>,
  input: unknown,
  context: ValidationContext,
): T {
  const result = schema.safeParse(input);

  if (result.success) {
    return result.data;
  }

  const issues = zodIssuesToConfigurationIssues(result.error);
  const fieldList = issues.map((issue) => issue.path || "(root)").join(", ");

  throw new ConfigurationError(
    `Invalid ${context.subject}: ${fieldList}`,
    { subject: context.subject, issues },
    {
      cause: result.error,
      suggestion: `Check the following options: ${fieldList}. See error.details.issues for specific validation failures.`,
    },
  );
}
