/**
 * Unit Tests for Circuit Breaker
 */

import {
  CircuitBreaker,
  CircuitBreakerConfig,
  CircuitOpenError,
  CircuitState,
} from "../src/infrastructure/resilience/CircuitBreaker";

const baseConfig: CircuitBreakerConfig = {
  name: "test-dependency",
  failureThreshold: 3,
  recoveryTimeout: 1000,
  successThreshold: 2,
  monitoringWindow: 10000,
};

describe("CircuitBreaker", () => {
  let now: number;
  let circuitBreaker: CircuitBreaker;

  const fail = () =>
    circuitBreaker.execute(async () => {
      throw new Error("dependency down");
    });
  const succeed = () => circuitBreaker.execute(async () => "ok");

  beforeEach(() => {
    now = 1_000_000;
    circuitBreaker = new CircuitBreaker(baseConfig, () => now);
  });

  describe("Initial State", () => {
    it("should start in CLOSED state", () => {
      expect(circuitBreaker.getState()).toBe(CircuitState.CLOSED);
    });

    it("should have zero failures initially", () => {
      const metrics = circuitBreaker.getMetrics();
      expect(metrics.name).toBe("test-dependency");
      expect(metrics.failureCount).toBe(0);
      expect(metrics.successCount).toBe(0);
      expect(metrics.nextAttemptTime).toBeNull();
    });
  });

  describe("Configuration", () => {
    it("should reject a failure threshold below 1", () => {
      expect(
        () => new CircuitBreaker({ ...baseConfig, failureThreshold: 0 }),
      ).toThrow("Failure threshold must be at least 1");
    });

    it("should reject a negative recovery timeout", () => {
      expect(
        () => new CircuitBreaker({ ...baseConfig, recoveryTimeout: -1 }),
      ).toThrow("Recovery timeout must not be negative");
    });
  });

  describe("CLOSED state", () => {
    it("should pass results through", async () => {
      await expect(succeed()).resolves.toBe("ok");
      expect(circuitBreaker.getState()).toBe(CircuitState.CLOSED);
    });

    it("should rethrow the operation's error", async () => {
      await expect(fail()).rejects.toThrow("dependency down");
      expect(circuitBreaker.getMetrics().failureCount).toBe(1);
    });

    it("should open after the failure threshold", async () => {
      for (let i = 0; i < 3; i++) {
        await expect(fail()).rejects.toThrow("dependency down");
      }

      const metrics = circuitBreaker.getMetrics();
      expect(metrics.state).toBe(CircuitState.OPEN);
      expect(metrics.nextAttemptTime).toBe(1_001_000);
    });

    it("should not count errors the caller does not treat as failures", async () => {
      const cancelled = () =>
        circuitBreaker.execute(
          async () => {
            throw new Error("cancelled");
          },
          (error) => !(error instanceof Error && error.message === "cancelled"),
        );

      for (let i = 0; i < 3; i++) {
        await expect(cancelled()).rejects.toThrow("cancelled");
      }

      expect(circuitBreaker.getState()).toBe(CircuitState.CLOSED);
      expect(circuitBreaker.getMetrics().failureCount).toBe(0);
    });

    it("should only count failures inside the monitoring window", async () => {
      await expect(fail()).rejects.toThrow();
      await expect(fail()).rejects.toThrow();
      now += 10_001;
      await expect(fail()).rejects.toThrow();

      expect(circuitBreaker.getState()).toBe(CircuitState.CLOSED);
      expect(circuitBreaker.getMetrics().failureCount).toBe(1);
    });
  });

  describe("OPEN state", () => {
    beforeEach(async () => {
      for (let i = 0; i < 3; i++) {
        await expect(fail()).rejects.toThrow();
      }
    });

    it("should reject without calling the operation", async () => {
      const operation = jest.fn(async () => "ok");

      await expect(circuitBreaker.execute(operation)).rejects.toThrow(
        CircuitOpenError,
      );
      await expect(circuitBreaker.execute(operation)).rejects.toThrow(
        "Circuit breaker 'test-dependency' is OPEN",
      );
      expect(operation).not.toHaveBeenCalled();
    });

    it("should move to HALF_OPEN once the recovery timeout elapses", async () => {
      now += 1000;

      await expect(succeed()).resolves.toBe("ok");
      expect(circuitBreaker.getState()).toBe(CircuitState.HALF_OPEN);
      expect(circuitBreaker.getMetrics().successCount).toBe(1);
    });
  });

  describe("HALF_OPEN state", () => {
    beforeEach(async () => {
      for (let i = 0; i < 3; i++) {
        await expect(fail()).rejects.toThrow();
      }
      now += 1000;
    });

    it("should close after the success threshold", async () => {
      await succeed();
      await succeed();

      const metrics = circuitBreaker.getMetrics();
      expect(metrics.state).toBe(CircuitState.CLOSED);
      expect(metrics.failureCount).toBe(0);
      expect(metrics.nextAttemptTime).toBeNull();
    });

    it("should reopen on a trial failure", async () => {
      await succeed();
      await expect(fail()).rejects.toThrow("dependency down");

      const metrics = circuitBreaker.getMetrics();
      expect(metrics.state).toBe(CircuitState.OPEN);
      expect(metrics.successCount).toBe(0);
      expect(metrics.nextAttemptTime).toBe(1_002_000);
    });
  });

  describe("reset", () => {
    it("should return to a clean CLOSED state", async () => {
      for (let i = 0; i < 3; i++) {
        await expect(fail()).rejects.toThrow();
      }

      circuitBreaker.reset();

      expect(circuitBreaker.getMetrics()).toEqual({
        name: "test-dependency",
        state: CircuitState.CLOSED,
        failureCount: 0,
        successCount: 0,
        lastFailureTime: null,
        lastSuccessTime: null,
        nextAttemptTime: null,
      });
    });
  });
});
