/**
 * Authorization Service
 *
 * Entry point of the decision engine:
 *
 *   CacheLookup -> Resolve -> Match -> EvaluateAttributes -> RemoteCheck
 *   -> Populate
 *
 * Every dependency (store, cache, remote evaluator, clock) is injected; the
 * service holds no policy state of its own. Policy store failures propagate
 * as PolicyStoreUnavailableError and never turn into a decision.
 */

import { IPolicyStore } from "../../../infrastructure/repositories/IPolicyStore";
import { logger } from "../../../shared/logger";
import {
  DEFAULT_DECISION_CACHE_OPTIONS,
  DecisionCache,
  DecisionKey,
  EpochSnapshot,
} from "../cache/DecisionCache";
import {
  ConditionEvaluator,
  EvaluationContext,
} from "../conditions/ConditionEvaluator";
import {
  InvalidAttributeContextError,
  ValidationError,
} from "../errors/AuthorizationError";
import { Candidate, PermissionMatcher } from "../matcher/PermissionMatcher";
import {
  LocalOnlyPolicyEvaluator,
  RemotePolicyEvaluator,
} from "../opa/RemotePolicyEvaluator";
import { RoleResolver } from "../resolver/RoleResolver";
import {
  authorizationRequestSchema,
  invalidationTargetSchema,
} from "../schemas";
import {
  AuthorizationRequest,
  AuthorizationStats,
  AuthorizeOptions,
  Decision,
  DecisionReason,
  InvalidationTarget,
} from "../types/authorization";
import type { PermissionSnapshot } from "../../../domain/entities/Permission";
import type { ZodType } from "zod";

export interface AuthorizationServiceOptions {
  /** Deny (DeniedDegraded) instead of allowing when the remote is unavailable */
  failClosedOnDegraded: boolean;
}

export interface AuthorizationServiceDeps {
  store: IPolicyStore;
  cache?: DecisionCache;
  remoteEvaluator?: RemotePolicyEvaluator;
  clock?: () => Date;
  options?: Partial<AuthorizationServiceOptions>;
}

interface ResolvedRoleSet {
  roles: Set<string>;
  expiresAt: Date | null;
}

export class AuthorizationService {
  private readonly store: IPolicyStore;
  private readonly cache: DecisionCache;
  private readonly remote: RemotePolicyEvaluator;
  private readonly clock: () => Date;
  private readonly options: AuthorizationServiceOptions;
  private readonly resolver: RoleResolver;
  private readonly matcher: PermissionMatcher;
  private counters = {
    decisions: 0,
    allowed: 0,
    denied: 0,
    degraded: 0,
    integrityErrors: 0,
  };

  constructor(deps: AuthorizationServiceDeps) {
    this.store = deps.store;
    this.clock = deps.clock ?? (() => new Date());
    this.cache =
      deps.cache ??
      new DecisionCache(null, DEFAULT_DECISION_CACHE_OPTIONS, () =>
        this.clock().getTime(),
      );
    this.remote = deps.remoteEvaluator ?? new LocalOnlyPolicyEvaluator();
    this.options = { failClosedOnDegraded: false, ...deps.options };
    this.resolver = new RoleResolver(this.store);
    this.matcher = new PermissionMatcher(this.store, new ConditionEvaluator());
  }

  /**
   * Decide whether `subjectId` may perform `action` on `resource` at `scope`.
   *
   * @throws ValidationError for malformed requests
   * @throws PolicyStoreUnavailableError when the store cannot be read
   */
  async authorize(
    input: AuthorizationRequest,
    options: AuthorizeOptions = {},
  ): Promise<Decision> {
    const request = parseOrThrow(
      authorizationRequestSchema,
      input,
      "Invalid authorization request",
    );
    const now = request.context?.now ?? this.clock();
    // Decisions for an explicit evaluation time are never cached
    const cacheable = request.context?.now === undefined;
    const key: DecisionKey = {
      subjectId: request.subjectId,
      resource: request.resource,
      action: request.action,
      scope: request.scope,
    };

    if (cacheable) {
      const cached = await this.cache.getDecision(key);
      if (cached) {
        return this.record(request, cached);
      }
    }

    const epochs = cacheable
      ? await this.cache.captureEpochs(request.subjectId)
      : null;

    const roleSet = await this.resolveRoles(request.subjectId, now, epochs);
    const { candidates, changesAt } = await this.matcher.matchCandidates(
      roleSet.roles,
      {
        subjectId: request.subjectId,
        resource: request.resource,
        action: request.action,
        scope: request.scope,
        now,
      },
    );
    const local = this.matcher.decide(
      candidates,
      buildEvaluationContext(request, now),
    );

    this.counters.integrityErrors += local.integrityErrors.length;
    for (const error of local.integrityErrors) {
      logger.warn(error.message, {
        code: error.code,
        subjectId: request.subjectId,
      });
    }
    for (const path of local.missingAttributes) {
      const observation = new InvalidAttributeContextError(path);
      logger.debug(observation.message, {
        code: observation.code,
        subjectId: request.subjectId,
      });
    }

    const evaluatedAt = now.toISOString();
    let decision: Decision;
    let remoteConsulted = false;

    if (local.outcome === "Denied" || !this.remote.configured) {
      decision = {
        allowed: local.outcome === "Allowed",
        outcome: local.outcome,
        matchedPermission: snapshotOf(local.matched),
        reason: local.reason,
        degraded: false,
        evaluatedAt,
        source: "computed",
      };
    } else {
      remoteConsulted = true;
      const verdict = await this.remote.evaluate(request, {
        now,
        ...(options.signal ? { signal: options.signal } : {}),
        ...(options.deadlineMs !== undefined
          ? { timeoutMs: options.deadlineMs }
          : {}),
      });

      if (verdict.status === "ok") {
        decision = verdict.allowed
          ? {
              allowed: true,
              outcome: "Allowed",
              matchedPermission: snapshotOf(local.matched),
              reason: local.reason,
              degraded: false,
              evaluatedAt,
              source: "computed",
            }
          : {
              allowed: false,
              outcome: "Denied",
              matchedPermission: null,
              reason: DecisionReason.REMOTE_DENIED,
              degraded: false,
              evaluatedAt,
              source: "computed",
            };
      } else if (this.options.failClosedOnDegraded) {
        decision = {
          allowed: false,
          outcome: "DeniedDegraded",
          matchedPermission: snapshotOf(local.matched),
          reason: DecisionReason.REMOTE_UNAVAILABLE,
          degraded: true,
          evaluatedAt,
          source: "computed",
        };
      } else {
        decision = {
          allowed: true,
          outcome: "Allowed",
          matchedPermission: snapshotOf(local.matched),
          reason: local.reason,
          degraded: true,
          evaluatedAt,
          source: "computed",
        };
      }
    }

    const shouldCache =
      !decision.degraded &&
      !local.contextDependent &&
      !(remoteConsulted && hasContextAttributes(request));

    if (epochs !== null && shouldCache) {
      await this.cache.setDecision(
        key,
        decision,
        epochs,
        earliest(roleSet.expiresAt, changesAt),
      );
    }

    return this.record(request, decision);
  }

  /**
   * Drop cached state for a subject, a role, a permission, or (no target)
   * everything. Safe to repeat.
   */
  async invalidate(target: InvalidationTarget = {}): Promise<void> {
    const parsed = parseOrThrow(
      invalidationTargetSchema,
      target,
      "Invalid invalidation target",
    );
    await this.cache.invalidate(parsed);
  }

  getStats(): AuthorizationStats {
    return {
      ...this.counters,
      cache: this.cache.getStats(),
    };
  }

  /**
   * Effective roles, from the role-set cache when the request is cacheable.
   */
  private async resolveRoles(
    subjectId: string,
    now: Date,
    epochs: EpochSnapshot | null,
  ): Promise<ResolvedRoleSet> {
    if (epochs !== null) {
      const cached = await this.cache.getRoles(subjectId);
      if (cached) {
        return {
          roles: new Set(cached.roles),
          expiresAt: cached.expiresAt === null ? null : new Date(cached.expiresAt),
        };
      }
    }

    const resolved = await this.resolver.resolveEffectiveRoles(subjectId, now);
    // Logged by the resolver
    this.counters.integrityErrors += resolved.integrityErrors.length;

    if (epochs !== null) {
      await this.cache.setRoles(
        subjectId,
        {
          roles: [...resolved.roles].sort(),
          expiresAt: resolved.expiresAt?.getTime() ?? null,
        },
        epochs,
      );
    }

    return { roles: resolved.roles, expiresAt: resolved.expiresAt };
  }

  private record(request: AuthorizationRequest, decision: Decision): Decision {
    this.counters.decisions++;
    if (decision.allowed) {
      this.counters.allowed++;
    } else {
      this.counters.denied++;
    }
    if (decision.degraded) {
      this.counters.degraded++;
    }

    logger.logDecision(
      request.subjectId,
      request.resource,
      request.action,
      request.scope,
      {
        outcome: decision.outcome,
        reason: decision.reason,
        degraded: decision.degraded,
        source: decision.source,
        matchedPermissionId: decision.matchedPermission?.id ?? null,
      },
    );
    return decision;
  }
}

// ============================================================================
// Helpers
// ============================================================================

function parseOrThrow<T>(
  schema: ZodType<T>,
  value: unknown,
  message: string,
): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ValidationError(
      message,
      result.error.issues.map(
        (issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`,
      ),
    );
  }
  return result.data;
}

/**
 * The candidate's effective effect is reported, not the stored default.
 */
function snapshotOf(candidate: Candidate | null): PermissionSnapshot | null {
  if (candidate === null) {
    return null;
  }
  return { ...candidate.permission.toSnapshot(), effect: candidate.effect };
}

export function buildEvaluationContext(
  request: AuthorizationRequest,
  now: Date,
): EvaluationContext {
  const context = request.context ?? {};
  return {
    now,
    subject: { ...context.subject, id: request.subjectId },
    resource: context.resource ?? {},
    environment: context.environment ?? {},
  };
}

function hasContextAttributes(request: AuthorizationRequest): boolean {
  const context = request.context;
  if (!context) {
    return false;
  }
  return [context.subject, context.resource, context.environment].some(
    (attributes) => attributes !== undefined && Object.keys(attributes).length > 0,
  );
}

function earliest(a: Date | null, b: Date | null): Date | null {
  if (a === null) return b;
  if (b === null) return a;
  return a < b ? a : b;
}
