/**
 * Circuit Breaker
 *
 * Guards calls to a dependency that may become unavailable (the distributed
 * cache, the external policy evaluator). States:
 *
 * - CLOSED: calls pass through, failures are counted
 * - OPEN: calls fail immediately until the recovery timeout elapses
 * - HALF_OPEN: trial calls decide whether to close again
 */

export enum CircuitState {
  CLOSED = "CLOSED",
  OPEN = "OPEN",
  HALF_OPEN = "HALF_OPEN",
}

export interface CircuitBreakerConfig {
  /** Name used in errors and logs */
  name: string;
  failureThreshold: number; // Failures within the window before opening
  recoveryTimeout: number; // ms in OPEN before a trial call
  successThreshold: number; // Trial successes needed to close
  monitoringWindow: number; // ms over which failures are counted
}

export interface CircuitBreakerMetrics {
  name: string;
  state: CircuitState;
  failureCount: number;
  successCount: number;
  lastFailureTime: number | null;
  lastSuccessTime: number | null;
  nextAttemptTime: number | null;
}

export type Clock = () => number;

export class CircuitBreaker {
  private state: CircuitState = CircuitState.CLOSED;
  private successCount: number = 0;
  private lastFailureTime: number | null = null;
  private lastSuccessTime: number | null = null;
  private nextAttemptTime: number | null = null;
  private failureTimestamps: number[] = [];

  constructor(
    private readonly config: CircuitBreakerConfig,
    private readonly now: Clock = Date.now,
  ) {
    if (config.failureThreshold < 1) {
      throw new Error("Failure threshold must be at least 1");
    }
    if (config.successThreshold < 1) {
      throw new Error("Success threshold must be at least 1");
    }
    if (config.recoveryTimeout < 0) {
      throw new Error("Recovery timeout must not be negative");
    }
  }

  /**
   * Run `operation` under breaker protection. Throws CircuitOpenError without
   * calling it while the circuit is open.
   *
   * @param isFailure - errors it rejects are rethrown without being counted,
   *   e.g. a call the caller cancelled
   */
  async execute<T>(
    operation: () => Promise<T>,
    isFailure: (error: unknown) => boolean = () => true,
  ): Promise<T> {
    if (this.state === CircuitState.OPEN) {
      if (this.nextAttemptTime !== null && this.now() < this.nextAttemptTime) {
        throw new CircuitOpenError(this.config.name, this.getMetrics());
      }
      this.state = CircuitState.HALF_OPEN;
      this.successCount = 0;
    }

    try {
      const result = await operation();
      this.onSuccess();
      return result;
    } catch (error) {
      if (isFailure(error)) {
        this.onFailure();
      }
      throw error;
    }
  }

  private onSuccess(): void {
    this.lastSuccessTime = this.now();

    if (this.state === CircuitState.HALF_OPEN) {
      this.successCount++;
      if (this.successCount >= this.config.successThreshold) {
        this.close();
      }
    }
  }

  private onFailure(): void {
    const now = this.now();
    this.lastFailureTime = now;

    if (this.state === CircuitState.HALF_OPEN) {
      this.open();
      return;
    }

    this.failureTimestamps.push(now);
    this.pruneFailures();
    if (this.failureTimestamps.length >= this.config.failureThreshold) {
      this.open();
    }
  }

  private open(): void {
    this.state = CircuitState.OPEN;
    this.successCount = 0;
    this.nextAttemptTime = this.now() + this.config.recoveryTimeout;
  }

  private close(): void {
    this.state = CircuitState.CLOSED;
    this.successCount = 0;
    this.nextAttemptTime = null;
    this.failureTimestamps = [];
  }

  /**
   * Drop failures older than the monitoring window
   */
  private pruneFailures(): void {
    const cutoff = this.now() - this.config.monitoringWindow;
    this.failureTimestamps = this.failureTimestamps.filter(
      (timestamp) => timestamp > cutoff,
    );
  }

  getState(): CircuitState {
    return this.state;
  }

  getMetrics(): CircuitBreakerMetrics {
    this.pruneFailures();
    return {
      name: this.config.name,
      state: this.state,
      failureCount: this.failureTimestamps.length,
      successCount: this.successCount,
      lastFailureTime: this.lastFailureTime,
      lastSuccessTime: this.lastSuccessTime,
      nextAttemptTime: this.nextAttemptTime,
    };
  }

  reset(): void {
    this.close();
    this.lastFailureTime = null;
    this.lastSuccessTime = null;
  }
}

/**
 * Thrown instead of calling the dependency while the circuit is open
 */
export class CircuitOpenError extends Error {
  constructor(
    name: string,
    public readonly metrics: CircuitBreakerMetrics,
  ) {
    super(`Circuit breaker '${name}' is OPEN`);
    this.name = "CircuitOpenError";
  }
}
