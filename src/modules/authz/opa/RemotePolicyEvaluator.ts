/**
 * Pluggable external policy evaluator.
 *
 * Consulted after the local RBAC/ABAC decision allowed; both must allow.
 * Implementations never throw: every failure is reported as `unavailable`.
 */

import type { AuthorizationRequest } from "../types/authorization";

export type RemoteVerdict =
  | { status: "ok"; allowed: boolean }
  | { status: "unavailable"; reason: string };

export interface RemoteEvaluationOptions {
  now: Date;
  signal?: AbortSignal;
  /** Tightens the evaluator's own timeout for this call */
  timeoutMs?: number;
}

export interface RemotePolicyEvaluator {
  /** False when no external evaluator is deployed; the remote step is skipped */
  readonly configured: boolean;
  evaluate(
    request: AuthorizationRequest,
    options: RemoteEvaluationOptions,
  ): Promise<RemoteVerdict>;
}

/**
 * Default evaluator when no external policy engine is deployed.
 */
export class LocalOnlyPolicyEvaluator implements RemotePolicyEvaluator {
  readonly configured = false;

  async evaluate(): Promise<RemoteVerdict> {
    return { status: "unavailable", reason: "no remote evaluator configured" };
  }
}
