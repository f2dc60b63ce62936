/**
 * Permission Matcher
 *
 * Collects the permissions that apply to a request from the subject's
 * effective roles and direct overrides, orders them, and decides. An
 * applicable deny always wins; otherwise the first applicable allow in
 * order is authoritative.
 */

import { Effect, Permission } from "../../../domain/entities/Permission";
import {
  Scope,
  compareSpecificity,
} from "../../../domain/value-objects/Scope";
import {
  IPolicyStore,
  isWithinValidity,
} from "../../../infrastructure/repositories/IPolicyStore";
import {
  ConditionEvaluator,
  EvaluationContext,
} from "../conditions/ConditionEvaluator";
import { PolicyIntegrityError } from "../errors/AuthorizationError";
import { DecisionReason } from "../types/authorization";

export type CandidateSource = "override" | "role";

export interface Candidate {
  permission: Permission;
  /** Override effect, else binding effect, else the permission's own */
  effect: Effect;
  source: CandidateSource;
  /** Role the grant came through; null for overrides */
  roleId: string | null;
  validUntil: Date | null;
  integrityIssue?: string;
}

export interface MatchQuery {
  subjectId: string;
  resource: string;
  action: string;
  scope: Scope;
  now: Date;
}

export interface CandidateSet {
  candidates: Candidate[];
  /**
   * Earliest instant at which the candidate set can change on its own (an
   * override starting or a grant ending), null if none.
   */
  changesAt: Date | null;
}

export interface MatchDecision {
  outcome: "Allowed" | "Denied";
  reason: DecisionReason;
  matched: Candidate | null;
  /** Some evaluated candidate carried conditions */
  contextDependent: boolean;
  missingAttributes: string[];
  integrityErrors: PolicyIntegrityError[];
}

export class PermissionMatcher {
  constructor(
    private readonly store: IPolicyStore,
    private readonly evaluator: ConditionEvaluator = new ConditionEvaluator(),
  ) {}

  async matchCandidates(
    effectiveRoles: Set<string>,
    query: MatchQuery,
  ): Promise<CandidateSet> {
    const [grants, overrides] = await Promise.all([
      this.store.getRolePermissions([...effectiveRoles].sort()),
      this.store.getOverrides(query.subjectId),
    ]);

    const applies = (permission: Permission): boolean =>
      permission.matches(query.resource, query.action) &&
      permission.covers(query.scope);

    const candidates: Candidate[] = [];
    let changesAt: Date | null = null;
    const noteChange = (instant: Date | null): void => {
      if (instant !== null && (changesAt === null || instant < changesAt)) {
        changesAt = instant;
      }
    };

    for (const override of overrides) {
      if (!applies(override.permission)) continue;

      if (!isWithinValidity(override.validFrom, override.validUntil, query.now)) {
        if (
          override.validFrom !== null &&
          override.validFrom.getTime() > query.now.getTime()
        ) {
          noteChange(override.validFrom);
        }
        continue;
      }

      noteChange(override.validUntil);
      candidates.push({
        permission: override.permission,
        effect: override.effect,
        source: "override",
        roleId: null,
        validUntil: override.validUntil,
        ...(override.integrityIssue
          ? { integrityIssue: override.integrityIssue }
          : {}),
      });
    }

    for (const grant of grants) {
      if (!effectiveRoles.has(grant.roleId) || !applies(grant.permission)) {
        continue;
      }
      candidates.push({
        permission: grant.permission,
        effect: grant.effect ?? grant.permission.effect,
        source: "role",
        roleId: grant.roleId,
        validUntil: null,
        ...(grant.integrityIssue ? { integrityIssue: grant.integrityIssue } : {}),
      });
    }

    return { candidates: candidates.sort(compareCandidates), changesAt };
  }

  decide(candidates: Candidate[], context: EvaluationContext): MatchDecision {
    const missing = new Set<string>();
    const integrityErrors: PolicyIntegrityError[] = [];
    let firstAllow: Candidate | null = null;
    let allowFailedConditions = false;

    const contextDependent = candidates.some((candidate) =>
      candidate.permission.hasConditions(),
    );

    for (const candidate of candidates) {
      // Unreadable conditions: a deny still applies, an allow never does
      if (candidate.integrityIssue) {
        integrityErrors.push(
          new PolicyIntegrityError(
            "MALFORMED_CONDITIONS",
            candidate.permission.id,
          ),
        );
        if (candidate.effect === "deny") {
          return {
            outcome: "Denied",
            reason: DecisionReason.EXPLICIT_DENY,
            matched: candidate,
            contextDependent: false,
            missingAttributes: [...missing],
            integrityErrors,
          };
        }
        continue;
      }

      const result = this.evaluator.evaluate(
        candidate.permission.conditions,
        context,
      );
      result.missingAttributes.forEach((path) => missing.add(path));

      if (candidate.effect === "deny") {
        if (result.satisfied) {
          return {
            outcome: "Denied",
            reason: DecisionReason.EXPLICIT_DENY,
            matched: candidate,
            contextDependent: candidate.permission.hasConditions(),
            missingAttributes: [...missing],
            integrityErrors,
          };
        }
        continue;
      }

      if (result.satisfied) {
        firstAllow = firstAllow ?? candidate;
      } else {
        allowFailedConditions = true;
      }
    }

    if (firstAllow !== null) {
      return {
        outcome: "Allowed",
        reason:
          firstAllow.source === "override"
            ? DecisionReason.ALLOWED_BY_OVERRIDE
            : DecisionReason.ALLOWED_BY_ROLE,
        matched: firstAllow,
        contextDependent,
        missingAttributes: [...missing],
        integrityErrors,
      };
    }

    return {
      outcome: "Denied",
      reason: allowFailedConditions
        ? DecisionReason.CONDITIONS_NOT_MET
        : DecisionReason.NO_MATCHING_PERMISSION,
      matched: null,
      contextDependent,
      missingAttributes: [...missing],
      integrityErrors,
    };
  }
}

/**
 * Exact rows before wildcard rows, narrowest scope first, overrides before
 * role grants, higher priority first, then ids for a stable order.
 */
export function compareCandidates(a: Candidate, b: Candidate): number {
  const wildcard =
    Number(a.permission.isWildcard()) - Number(b.permission.isWildcard());
  if (wildcard !== 0) return wildcard;

  const specificity = compareSpecificity(a.permission.scope, b.permission.scope);
  if (specificity !== 0) return specificity;

  if (a.source !== b.source) return a.source === "override" ? -1 : 1;

  if (a.permission.priority !== b.permission.priority) {
    return b.permission.priority - a.permission.priority;
  }

  return (
    compareIds(a.permission.id, b.permission.id) ||
    compareIds(a.roleId ?? "", b.roleId ?? "")
  );
}

function compareIds(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
