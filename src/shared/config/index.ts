import * as dotenv from "dotenv";

// Load environment variables
dotenv.config();

interface Config {
  // Server
  port: number;
  nodeEnv: string;

  // Policy Store (PostgreSQL)
  databaseUrl: string;
  databasePoolMax: number;
  policyStoreTimeoutMs: number;

  // Redis (distributed cache tier)
  redisUrl: string;
  distributedCacheEnabled: boolean;
  distributedCacheTimeoutMs: number;

  // Decision cache
  decisionTtlSeconds: number;
  rolesTtlSeconds: number;
  l1MaxEntries: number;
  epochTtlSeconds: number;

  // External policy evaluator
  remotePolicyUrl: string;
  remotePolicyDecisionPath: string;
  remotePolicyTimeoutMs: number;
  remotePolicyFailClosed: boolean;

  // Circuit breaker (shared by Redis and the external evaluator)
  circuitBreakerFailureThreshold: number;
  circuitBreakerRecoveryTimeoutMs: number;
  circuitBreakerSuccessThreshold: number;
  circuitBreakerMonitoringWindowMs: number;

  // Logging
  logLevel: string;
  jsonLogFormat: boolean;

  // CORS
  corsEnabled: boolean;
  corsAllowedOrigins: string[];
}

const config: Config = {
  // Server
  port: parseInt(process.env.PORT || "3000", 10),
  nodeEnv: process.env.NODE_ENV || "development",

  // Policy Store
  databaseUrl: process.env.DATABASE_URL || "",
  databasePoolMax: parseInt(process.env.DATABASE_POOL_MAX || "10", 10),
  policyStoreTimeoutMs: parseInt(
    process.env.POLICY_STORE_TIMEOUT_MS || "2000",
    10,
  ),

  // Redis
  redisUrl: process.env.REDIS_URL || "redis://localhost:6379",
  distributedCacheEnabled: process.env.CACHE_DISTRIBUTED_ENABLED === "true",
  distributedCacheTimeoutMs: parseInt(
    process.env.CACHE_DISTRIBUTED_TIMEOUT_MS || "100",
    10,
  ),

  // Decision cache
  decisionTtlSeconds: parseInt(
    process.env.CACHE_DECISION_TTL_SECONDS || "30",
    10,
  ),
  rolesTtlSeconds: parseInt(process.env.CACHE_ROLES_TTL_SECONDS || "300", 10),
  l1MaxEntries: parseInt(process.env.CACHE_L1_MAX_ENTRIES || "10000", 10),
  epochTtlSeconds: parseInt(
    process.env.CACHE_EPOCH_TTL_SECONDS || "86400",
    10,
  ),

  // External policy evaluator
  remotePolicyUrl: process.env.REMOTE_POLICY_URL || "",
  remotePolicyDecisionPath:
    process.env.REMOTE_POLICY_DECISION_PATH || "authz/allow",
  remotePolicyTimeoutMs: parseInt(
    process.env.REMOTE_POLICY_TIMEOUT_MS || "250",
    10,
  ),
  remotePolicyFailClosed: process.env.REMOTE_POLICY_FAIL_CLOSED === "true",

  // Circuit breaker
  circuitBreakerFailureThreshold: parseInt(
    process.env.CIRCUIT_BREAKER_FAILURE_THRESHOLD || "5",
    10,
  ),
  circuitBreakerRecoveryTimeoutMs: parseInt(
    process.env.CIRCUIT_BREAKER_RECOVERY_TIMEOUT_MS || "30000",
    10,
  ),
  circuitBreakerSuccessThreshold: parseInt(
    process.env.CIRCUIT_BREAKER_SUCCESS_THRESHOLD || "2",
    10,
  ),
  circuitBreakerMonitoringWindowMs: parseInt(
    process.env.CIRCUIT_BREAKER_MONITORING_WINDOW_MS || "60000",
    10,
  ),

  // Logging
  logLevel: process.env.LOG_LEVEL || "info",
  jsonLogFormat: process.env.JSON_LOG_FORMAT === "true",

  // CORS
  corsEnabled: process.env.CORS_ENABLED === "true",
  corsAllowedOrigins: process.env.CORS_ALLOWED_ORIGINS
    ? process.env.CORS_ALLOWED_ORIGINS.split(",").map((o) => o.trim())
    : [],
};

if (process.env.NODE_ENV === "production") {
  if (!config.databaseUrl) {
    throw new Error("Missing required environment variable: DATABASE_URL");
  }

  // An epoch key that expires before the entries written under it would let
  // invalidated entries become visible again.
  const longestEntryTtl = Math.max(
    config.decisionTtlSeconds,
    config.rolesTtlSeconds,
  );
  if (config.epochTtlSeconds <= longestEntryTtl) {
    throw new Error(
      `CACHE_EPOCH_TTL_SECONDS (${config.epochTtlSeconds}) must exceed the longest cache TTL (${longestEntryTtl})`,
    );
  }
}

export { config };
export type { Config };
