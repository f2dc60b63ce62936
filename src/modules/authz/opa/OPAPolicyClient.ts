/**
 * OPA Policy Client
 *
 * Queries an Open Policy Agent server's data API for a boolean decision:
 * `POST {baseUrl}/v1/data/{decisionPath}` with `{ "input": {...} }`.
 * The input is a flat attribute map of the request and its context.
 */

import { z } from "zod";
import type {
  AttributeMap,
  AttributeValue,
} from "../../../domain/value-objects/Condition";
import {
  CircuitBreaker,
  CircuitOpenError,
} from "../../../infrastructure/resilience/CircuitBreaker";
import { logger } from "../../../shared/logger";
import { RemotePolicyUnavailableError } from "../errors/AuthorizationError";
import type { AuthorizationRequest } from "../types/authorization";
import type {
  RemoteEvaluationOptions,
  RemotePolicyEvaluator,
  RemoteVerdict,
} from "./RemotePolicyEvaluator";

export interface OPAPolicyClientConfig {
  baseUrl: string;
  /** e.g. "authz/allow" */
  decisionPath: string;
  timeoutMs: number;
  circuitBreaker: CircuitBreaker;
}

export type RemotePolicyInput = Record<string, AttributeValue>;

const decisionResponseSchema = z.union([
  z.object({ result: z.boolean() }),
  z.object({ result: z.object({ allow: z.boolean() }) }),
  z.object({ allowed: z.boolean() }),
]);

export class OPAPolicyClient implements RemotePolicyEvaluator {
  readonly configured = true;
  private readonly endpoint: string;

  constructor(private readonly config: OPAPolicyClientConfig) {
    const base = config.baseUrl.replace(/\/+$/, "");
    const path = config.decisionPath.replace(/^\/+/, "");
    this.endpoint = `${base}/v1/data/${path}`;
  }

  async evaluate(
    request: AuthorizationRequest,
    options: RemoteEvaluationOptions,
  ): Promise<RemoteVerdict> {
    if (options.signal?.aborted) {
      return { status: "unavailable", reason: "aborted by caller" };
    }

    const timeoutMs = Math.min(
      this.config.timeoutMs,
      options.timeoutMs ?? this.config.timeoutMs,
    );

    try {
      const allowed = await this.config.circuitBreaker.execute(
        () =>
          this.query(buildRemoteInput(request, options.now), timeoutMs, options.signal),
        (error) => !(error instanceof RemotePolicyUnavailableError && error.cancelled),
      );
      return { status: "ok", allowed };
    } catch (error) {
      const reason =
        error instanceof CircuitOpenError
          ? "circuit open"
          : error instanceof RemotePolicyUnavailableError
            ? error.reason
            : error instanceof Error
              ? error.message
              : String(error);
      logger.warn("Remote policy evaluator unavailable", {
        endpoint: this.endpoint,
        reason,
      });
      return { status: "unavailable", reason };
    }
  }

  private async query(
    input: RemotePolicyInput,
    timeoutMs: number,
    signal?: AbortSignal,
  ): Promise<boolean> {
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onCallerAbort = () => controller.abort();
    signal?.addEventListener("abort", onCallerAbort, { once: true });

    try {
      const response = await fetch(this.endpoint, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
        },
        body: JSON.stringify({ input }),
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new RemotePolicyUnavailableError(
          `HTTP ${response.status} ${response.statusText}`.trim(),
        );
      }

      const parsed = decisionResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new RemotePolicyUnavailableError("malformed decision response");
      }

      const body = parsed.data;
      if ("allowed" in body) {
        return body.allowed;
      }
      return typeof body.result === "boolean" ? body.result : body.result.allow;
    } catch (error) {
      if (error instanceof RemotePolicyUnavailableError) {
        throw error;
      }
      if (controller.signal.aborted) {
        if (!timedOut) {
          throw new RemotePolicyUnavailableError("aborted by caller", true);
        }
        // A deadline tighter than our own belongs to the caller
        throw new RemotePolicyUnavailableError(
          `timed out after ${timeoutMs}ms`,
          timeoutMs < this.config.timeoutMs,
        );
      }
      throw new RemotePolicyUnavailableError(
        error instanceof Error ? error.message : String(error),
      );
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onCallerAbort);
    }
  }
}

/**
 * Flatten the request into `{ subject_id, resource, action, scope, now,
 * "subject.department": ..., "environment.ip": ... }`.
 */
export function buildRemoteInput(
  request: AuthorizationRequest,
  now: Date,
): RemotePolicyInput {
  const input: RemotePolicyInput = {
    subject_id: request.subjectId,
    resource: request.resource,
    action: request.action,
    scope: request.scope,
    now: now.toISOString(),
  };

  const context = request.context ?? {};
  flattenInto(input, "subject", context.subject ?? {});
  flattenInto(input, "resource", context.resource ?? {});
  flattenInto(input, "environment", context.environment ?? {});
  input["subject.id"] = request.subjectId;

  return input;
}

function flattenInto(
  target: RemotePolicyInput,
  prefix: string,
  attributes: AttributeMap,
): void {
  for (const [key, value] of Object.entries(attributes)) {
    const path = `${prefix}.${key}`;
    if (typeof value === "object" && value !== null && !Array.isArray(value)) {
      flattenInto(target, path, value);
    } else {
      target[path] = value;
    }
  }
}
