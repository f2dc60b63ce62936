import { Server } from "http";
import { sql } from "kysely";
import { createApp } from "./app";
import { createDatabase } from "./infrastructure/database/kysely";
import {
  RedisDistributedCache,
  connectRedis,
  createRedisKeyValueCommands,
} from "./infrastructure/redis/RedisDistributedCache";
import { GuardedPolicyStore } from "./infrastructure/repositories/GuardedPolicyStore";
import { KyselyPolicyStore } from "./infrastructure/repositories/KyselyPolicyStore";
import { CircuitBreaker } from "./infrastructure/resilience/CircuitBreaker";
import {
  AuthorizationService,
  DecisionCache,
  LocalOnlyPolicyEvaluator,
  OPAPolicyClient,
  RemotePolicyEvaluator,
} from "./modules/authz";
import { config } from "./shared/config";
import { logger } from "./shared/logger";

function createCircuitBreaker(name: string): CircuitBreaker {
  return new CircuitBreaker({
    name,
    failureThreshold: config.circuitBreakerFailureThreshold,
    recoveryTimeout: config.circuitBreakerRecoveryTimeoutMs,
    successThreshold: config.circuitBreakerSuccessThreshold,
    monitoringWindow: config.circuitBreakerMonitoringWindowMs,
  });
}

async function start(): Promise<void> {
  const db = createDatabase({
    connectionString: config.databaseUrl,
    max: config.databasePoolMax,
  });
  const store = new GuardedPolicyStore(
    new KyselyPolicyStore(db),
    config.policyStoreTimeoutMs,
  );

  let distributedCache: RedisDistributedCache | undefined;
  if (config.distributedCacheEnabled) {
    try {
      const client = await connectRedis(config.redisUrl);
      distributedCache = new RedisDistributedCache(
        createRedisKeyValueCommands(client),
        {
          timeoutMs: config.distributedCacheTimeoutMs,
          circuitBreaker: createCircuitBreaker("redis"),
        },
      );
    } catch (error) {
      // Decisions are still computed from the store without L2
      logger.error("Failed to connect to Redis, running without L2 cache", {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  let remoteEvaluator: RemotePolicyEvaluator = new LocalOnlyPolicyEvaluator();
  let remoteCircuit: CircuitBreaker | undefined;
  if (config.remotePolicyUrl) {
    remoteCircuit = createCircuitBreaker("remote-policy");
    remoteEvaluator = new OPAPolicyClient({
      baseUrl: config.remotePolicyUrl,
      decisionPath: config.remotePolicyDecisionPath,
      timeoutMs: config.remotePolicyTimeoutMs,
      circuitBreaker: remoteCircuit,
    });
  }

  const authorizationService = new AuthorizationService({
    store,
    cache: new DecisionCache(distributedCache ?? null, {
      decisionTtlSeconds: config.decisionTtlSeconds,
      rolesTtlSeconds: config.rolesTtlSeconds,
      l1MaxEntries: config.l1MaxEntries,
      epochTtlSeconds: config.epochTtlSeconds,
    }),
    remoteEvaluator,
    options: { failClosedOnDegraded: config.remotePolicyFailClosed },
  });

  const app = createApp({
    authorizationService,
    health: {
      checkPolicyStore: async () => {
        await sql`select 1`.execute(db);
      },
      ...(distributedCache ? { distributedCache } : {}),
      ...(remoteCircuit ? { remoteEvaluatorCircuit: remoteCircuit } : {}),
    },
  });

  const server: Server = app.listen(config.port, () => {
    logger.info(`Authorization service listening on port ${config.port}`, {
      environment: config.nodeEnv,
      distributedCache: distributedCache !== undefined,
      remoteEvaluator: remoteEvaluator.configured,
    });
  });

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    logger.info(`${signal} received, shutting down gracefully`);
    try {
      await new Promise<void>((resolve, reject) =>
        server.close((error) => (error ? reject(error) : resolve())),
      );
      if (distributedCache) {
        await distributedCache.disconnect();
      }
      await db.destroy();
      logger.info("All connections closed");
      process.exit(0);
    } catch (error) {
      logger.error("Error during shutdown", {
        error: error instanceof Error ? error.message : String(error),
      });
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

start().catch((error: unknown) => {
  logger.error("Failed to start server", {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
