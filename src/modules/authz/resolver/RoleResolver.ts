/**
 * Role Resolver
 *
 * Expands a subject's active role assignments into the set of effective
 * roles (assigned roles plus every ancestor). The parent chain is walked
 * iteratively over a per-call arena; a cycle or a dangling parent drops the
 * whole contribution of the assignment that reached it.
 */

import { Role } from "../../../domain/entities/Role";
import {
  IPolicyStore,
  SubjectRoleAssignment,
  isWithinValidity,
} from "../../../infrastructure/repositories/IPolicyStore";
import { logger } from "../../../shared/logger";
import { PolicyIntegrityError } from "../errors/AuthorizationError";

export interface ResolvedRoles {
  roles: Set<string>;
  integrityErrors: PolicyIntegrityError[];
  /**
   * Earliest instant the role set can change: the first validUntil among
   * contributing assignments or the first validFrom of one not yet started.
   * null if unbounded.
   */
  expiresAt: Date | null;
}

type ArenaEntry = Role | PolicyIntegrityError | null;

type WalkResult =
  | { ok: true; chain: string[]; warnings: PolicyIntegrityError[] }
  | { ok: false; error: PolicyIntegrityError; warnings: PolicyIntegrityError[] };

export class RoleResolver {
  constructor(private readonly store: IPolicyStore) {}

  async resolveEffectiveRoles(
    subjectId: string,
    now: Date,
  ): Promise<ResolvedRoles> {
    const assignments: SubjectRoleAssignment[] = [];
    let expiresAt: Date | null = null;
    for (const assignment of await this.store.getActiveAssignments(subjectId, now)) {
      if (assignment.validFrom > now) {
        expiresAt = earliest(expiresAt, assignment.validFrom);
      } else if (isWithinValidity(assignment.validFrom, assignment.validUntil, now)) {
        assignments.push(assignment);
      }
    }

    const arena = new Map<string, ArenaEntry>();
    const roles = new Set<string>();
    const integrityErrors: PolicyIntegrityError[] = [];

    for (const assignment of assignments) {
      const result = await this.walk(assignment.roleId, arena, roles);
      integrityErrors.push(...result.warnings);

      if (!result.ok) {
        integrityErrors.push(result.error);
        continue;
      }

      result.chain.forEach((roleId) => roles.add(roleId));
      if (assignment.validUntil !== null) {
        expiresAt = earliest(expiresAt, assignment.validUntil);
      }
    }

    for (const error of integrityErrors) {
      logger.warn("Role hierarchy integrity error", {
        subjectId,
        violation: error.violation,
        entityId: error.entityId,
        path: error.path,
      });
    }

    return { roles, integrityErrors, expiresAt };
  }

  /**
   * Walk from `roleId` up to a root or to a role resolved by an earlier walk.
   */
  private async walk(
    roleId: string,
    arena: Map<string, ArenaEntry>,
    resolved: Set<string>,
  ): Promise<WalkResult> {
    const chain: string[] = [];
    const onPath = new Set<string>();
    const warnings: PolicyIntegrityError[] = [];
    let child: Role | null = null;
    let currentId: string | null = roleId;

    while (currentId !== null) {
      if (onPath.has(currentId)) {
        return {
          ok: false,
          error: new PolicyIntegrityError("ROLE_CYCLE", currentId, [
            ...chain,
            currentId,
          ]),
          warnings,
        };
      }

      const entry = await this.load(currentId, arena);
      if (entry instanceof PolicyIntegrityError) {
        return { ok: false, error: entry, warnings };
      }
      if (entry === null) {
        return {
          ok: false,
          error: new PolicyIntegrityError("DANGLING_ROLE", currentId, [
            ...chain,
            currentId,
          ]),
          warnings,
        };
      }

      if (child !== null && !child.isBelow(entry)) {
        warnings.push(
          new PolicyIntegrityError("LEVEL_ORDER", child.id, [child.id, entry.id]),
        );
      }

      if (resolved.has(currentId)) {
        break;
      }

      chain.push(currentId);
      onPath.add(currentId);
      child = entry;
      currentId = entry.parentId;
    }

    return { ok: true, chain, warnings };
  }

  private async load(
    roleId: string,
    arena: Map<string, ArenaEntry>,
  ): Promise<ArenaEntry> {
    const cached = arena.get(roleId);
    if (cached !== undefined) {
      return cached;
    }

    let entry: ArenaEntry;
    try {
      entry = await this.store.getRole(roleId);
    } catch (error) {
      if (!(error instanceof PolicyIntegrityError)) {
        throw error;
      }
      entry = error;
    }
    arena.set(roleId, entry);
    return entry;
  }
}

function earliest(current: Date | null, candidate: Date): Date {
  return current === null || candidate < current ? candidate : current;
}
