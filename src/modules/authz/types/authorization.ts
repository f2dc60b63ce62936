/**
 * Authorization Types
 * Request, context and decision shapes of the decision engine
 */

import type { AttributeMap } from "../../../domain/value-objects/Condition";
import type { PermissionSnapshot } from "../../../domain/entities/Permission";
import type { Scope } from "../../../domain/value-objects/Scope";

// ============================================================================
// REQUEST
// ============================================================================

/**
 * Attributes the caller supplies for ABAC evaluation. `subject` carries the
 * pre-verified identity claims; `subject.id` is always set by the engine.
 */
export interface AuthorizationContext {
  /** Evaluation time; defaults to the service clock */
  now?: Date;
  subject?: AttributeMap;
  resource?: AttributeMap;
  environment?: AttributeMap;
}

export interface AuthorizationRequest {
  subjectId: string;
  /** Resource namespace, e.g. "batch" */
  resource: string;
  action: string;
  scope: Scope;
  context?: AuthorizationContext;
}

export interface AuthorizeOptions {
  /** Aborts the remote evaluator call; the decision is then degraded */
  signal?: AbortSignal;
  /** Upper bound in ms for the remote evaluator call */
  deadlineMs?: number;
}

export interface InvalidationTarget {
  subjectId?: string;
  roleId?: string;
  permissionId?: string;
}

// ============================================================================
// DECISION
// ============================================================================

export type Outcome = "Allowed" | "Denied" | "DeniedDegraded";

export enum DecisionReason {
  ALLOWED_BY_ROLE = "ALLOWED_BY_ROLE",
  ALLOWED_BY_OVERRIDE = "ALLOWED_BY_OVERRIDE",
  EXPLICIT_DENY = "EXPLICIT_DENY",
  CONDITIONS_NOT_MET = "CONDITIONS_NOT_MET",
  NO_MATCHING_PERMISSION = "NO_MATCHING_PERMISSION",
  REMOTE_DENIED = "REMOTE_DENIED",
  REMOTE_UNAVAILABLE = "REMOTE_UNAVAILABLE",
}

export type DecisionSource = "computed" | "cache";

export interface Decision {
  allowed: boolean;
  outcome: Outcome;
  matchedPermission: PermissionSnapshot | null;
  reason: DecisionReason;
  /** Computed without a confirmation the configuration expected */
  degraded: boolean;
  /** ISO-8601 */
  evaluatedAt: string;
  source: DecisionSource;
}

// ============================================================================
// STATS
// ============================================================================

export interface CacheStats {
  l1Size: number;
  l1Hits: number;
  l2Hits: number;
  misses: number;
  staleEntries: number;
  l2Errors: number;
}

export interface AuthorizationStats {
  decisions: number;
  allowed: number;
  denied: number;
  degraded: number;
  integrityErrors: number;
  cache: CacheStats;
}
