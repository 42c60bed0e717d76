export { drizzleProbe } from "./drizzle";
export {
  createPlanCacheProbe,
  type PlanCacheProbeConfig,
  PlanCacheProbeConfigSchema,
} from "./plan-cache";
export { isQueryEngineProbe, type QueryEngineProbe } from "./types";
