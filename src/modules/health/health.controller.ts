/**
 * Health Check Controller
 *
 * - Liveness: the process is up
 * - Readiness: the policy store answers (without it no decision can be made)
 * - Detailed: store, distributed cache and remote evaluator status
 */

import { Request, Response } from "express";
import {
  CircuitBreakerMetrics,
  CircuitState,
} from "../../infrastructure/resilience/CircuitBreaker";
import { ResponseStatus } from "../../shared/errors/ResponseStatus";

export interface CheckResult {
  name: string;
  status: "healthy" | "degraded" | "unhealthy";
  message?: string;
  latencyMs?: number;
}

export interface HealthResponse {
  status: "OK" | "DEGRADED" | "ERROR";
  timestamp: string;
  uptime: number;
  checks: CheckResult[];
}

export interface DistributedCacheHealth {
  isHealthy(): Promise<boolean>;
  getCircuitState(): CircuitState;
}

export interface HealthDependencies {
  /** Resolves when the policy store answers a trivial query */
  checkPolicyStore: () => Promise<void>;
  distributedCache?: DistributedCacheHealth;
  /** Circuit breaker guarding the remote policy evaluator, if configured */
  remoteEvaluatorCircuit?: { getMetrics(): CircuitBreakerMetrics };
}

export class HealthController {
  constructor(private readonly deps: HealthDependencies) {}

  liveness(_req: Request, res: Response): void {
    res.status(ResponseStatus.OK).json({
      status: "OK",
      timestamp: new Date().toISOString(),
      uptime: Math.floor(process.uptime()),
    });
  }

  async readiness(_req: Request, res: Response): Promise<void> {
    const store = await this.checkPolicyStore();
    const ready = store.status === "healthy";

    const response: HealthResponse = {
      status: ready ? "OK" : "ERROR",
      timestamp: new Date().toISOString(),
      uptime: Math.floor(process.uptime()),
      checks: [store],
    };
    res
      .status(ready ? ResponseStatus.OK : ResponseStatus.SERVICE_UNAVAILABLE)
      .json(response);
  }

  async detailed(_req: Request, res: Response): Promise<void> {
    const checks = await Promise.all([
      this.checkPolicyStore(),
      this.checkDistributedCache(),
      Promise.resolve(this.checkRemoteEvaluator()),
    ]);

    const storeDown = checks[0].status === "unhealthy";
    const status: HealthResponse["status"] = storeDown
      ? "ERROR"
      : checks.some((check) => check.status !== "healthy")
        ? "DEGRADED"
        : "OK";

    const response: HealthResponse = {
      status,
      timestamp: new Date().toISOString(),
      uptime: Math.floor(process.uptime()),
      checks,
    };
    res
      .status(storeDown ? ResponseStatus.SERVICE_UNAVAILABLE : ResponseStatus.OK)
      .json(response);
  }

  private async checkPolicyStore(): Promise<CheckResult> {
    const startTime = Date.now();
    try {
      await this.deps.checkPolicyStore();
      return {
        name: "policyStore",
        status: "healthy",
        message: "Connected",
        latencyMs: Date.now() - startTime,
      };
    } catch (error) {
      return {
        name: "policyStore",
        status: "unhealthy",
        message: error instanceof Error ? error.message : "Unknown error",
        latencyMs: Date.now() - startTime,
      };
    }
  }

  private async checkDistributedCache(): Promise<CheckResult> {
    const cache = this.deps.distributedCache;
    if (!cache) {
      return { name: "distributedCache", status: "healthy", message: "Disabled" };
    }

    const startTime = Date.now();
    const healthy = await cache.isHealthy();
    const circuitState = cache.getCircuitState();

    // The engine keeps deciding without L2, so this is never unhealthy
    return {
      name: "distributedCache",
      status: healthy && circuitState === CircuitState.CLOSED ? "healthy" : "degraded",
      message: `Circuit: ${circuitState}`,
      latencyMs: Date.now() - startTime,
    };
  }

  private checkRemoteEvaluator(): CheckResult {
    const circuit = this.deps.remoteEvaluatorCircuit;
    if (!circuit) {
      return {
        name: "remoteEvaluator",
        status: "healthy",
        message: "Not configured",
      };
    }

    const metrics = circuit.getMetrics();
    return {
      name: "remoteEvaluator",
      status: metrics.state === CircuitState.CLOSED ? "healthy" : "degraded",
      message: `Circuit: ${metrics.state}, recent failures: ${metrics.failureCount}`,
    };
  }
}
