export { SqlExtractorOptionsSchema } from "./options";
export {
  createSqlExtractor,
  extractParameterValues,
  extractQuery,
  extractSql,
} from "./sql-extractor";
export type {
  ExtractedEvent,
  ExtractedQuery,
  ExtractionOperation,
  ExtractionSource,
  ExtractorHooks,
  FallbackEvent,
  FallbackTier,
  SqlExtractor,
  SqlExtractorOptions,
} from "./types";
