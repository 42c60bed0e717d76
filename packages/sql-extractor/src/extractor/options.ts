import { z } from "zod";

import { validateOptions } from "../errors/validation";
import { isQueryEngineProbe, type QueryEngineProbe } from "../probes/types";
import { type ExtractedEvent, type FallbackEvent, type SqlExtractorOptions } from "./types";

const probeSchema = z.custom<QueryEngineProbe>(isQueryEngineProbe, {
  message:
    "Expected a probe with a name and every probe step as a function",
});

const fallbackHookSchema = z.custom<(event: FallbackEvent) => void>(
  (value) => typeof value === "function",
  { message: "Expected a function" },
);

const extractedHookSchema = z.custom<(event: ExtractedEvent) => void>(
  (value) => typeof value === "function",
  { message: "Expected a function" },
);

export const SqlExtractorOptionsSchema = z.strictObject({
  probes: z.array(probeSchema).min(1).optional(),
  hooks: z
    .strictObject({
      onFallback: fallbackHookSchema.optional(),
      onExtracted: extractedHookSchema.optional(),
    })
    .optional(),
  warnOnFallback: z.boolean().optional(),
});

/**
 * Validates extractor options.
 *
 * @throws ConfigurationError naming every invalid option
 */
export function parseExtractorOptions(input: unknown): SqlExtractorOptions {
  return validateOptions(SqlExtractorOptionsSchema, input, {
    subject: "extractor options",
  });
}
