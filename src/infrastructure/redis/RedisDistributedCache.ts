/**
 * Redis-backed distributed cache tier.
 *
 * Every command runs under a timeout and a circuit breaker; failures surface
 * as CacheUnavailableError so the decision cache can fall back to computing.
 */

import { createClient } from "redis";
import {
  CircuitBreaker,
  CircuitBreakerMetrics,
  CircuitState,
} from "../resilience/CircuitBreaker";
import { withTimeout } from "../../shared/utils/withTimeout";
import { logger } from "../../shared/logger";
import { CacheUnavailableError } from "../../modules/authz/errors/AuthorizationError";
import type { IDistributedCache } from "../../modules/authz/cache/DistributedCache";

export type RedisClient = ReturnType<typeof createClient>;

/**
 * The subset of Redis commands the cache tier needs.
 */
export interface RedisKeyValueCommands {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  del(keys: string[]): Promise<number>;
  ping(): Promise<string>;
  quit(): Promise<void>;
}

export interface RedisDistributedCacheConfig {
  timeoutMs: number;
  circuitBreaker: CircuitBreaker;
}

export function createRedisKeyValueCommands(
  client: RedisClient,
): RedisKeyValueCommands {
  return {
    get: (key) => client.get(key),
    set: async (key, value, ttlSeconds) => {
      await client.set(key, value, { EX: ttlSeconds });
    },
    del: (keys) => client.del(keys),
    ping: () => client.ping(),
    quit: async () => {
      await client.quit();
    },
  };
}

/**
 * Connect a node-redis client and wire its lifecycle events to the logger.
 */
export async function connectRedis(url: string): Promise<RedisClient> {
  const client = createClient({ url });

  client.on("error", (error: Error) => {
    logger.error("Redis client error", { error: error.message });
  });
  client.on("ready", () => logger.info("Redis client connected"));
  client.on("end", () => logger.warn("Redis client disconnected"));
  client.on("reconnecting", () => logger.info("Redis client reconnecting"));

  await client.connect();
  logger.info("Redis connection established", { url: redactUrl(url) });
  return client;
}

export class RedisDistributedCache implements IDistributedCache {
  constructor(
    private readonly commands: RedisKeyValueCommands,
    private readonly config: RedisDistributedCacheConfig,
  ) {}

  get(key: string): Promise<string | null> {
    return this.run("get", () => this.commands.get(key));
  }

  set(key: string, value: string, ttlSeconds: number): Promise<void> {
    return this.run("set", () => this.commands.set(key, value, ttlSeconds));
  }

  async delete(keys: string[]): Promise<void> {
    if (keys.length === 0) {
      return;
    }
    await this.run("delete", () => this.commands.del(keys));
  }

  async isHealthy(): Promise<boolean> {
    try {
      return (await this.run("ping", () => this.commands.ping())) === "PONG";
    } catch (error) {
      logger.debug("Redis health check failed", {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  async disconnect(): Promise<void> {
    await this.commands.quit();
    logger.info("Redis connection closed");
  }

  getCircuitMetrics(): CircuitBreakerMetrics {
    return this.config.circuitBreaker.getMetrics();
  }

  getCircuitState(): CircuitState {
    return this.config.circuitBreaker.getState();
  }

  private async run<T>(operation: string, command: () => Promise<T>): Promise<T> {
    try {
      return await this.config.circuitBreaker.execute(() =>
        withTimeout(command(), this.config.timeoutMs, `redis ${operation}`),
      );
    } catch (error) {
      throw new CacheUnavailableError(operation, error);
    }
  }
}

function redactUrl(url: string): string {
  return url.replace(/\/\/([^@/]*)@/, "//***@");
}
