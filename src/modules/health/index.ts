/**
 * Health Module Index
 */

export { HealthController } from "./health.controller";
export type {
  CheckResult,
  HealthDependencies,
  HealthResponse,
} from "./health.controller";
export { createHealthRoutes } from "./routes";
