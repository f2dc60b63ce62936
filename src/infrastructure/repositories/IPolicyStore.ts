import { Role } from "../../domain/entities/Role";
import { Effect, Permission } from "../../domain/entities/Permission";

export interface SubjectRoleAssignment {
  subjectId: string;
  roleId: string;
  validFrom: Date;
  /** null = unbounded */
  validUntil: Date | null;
}

export interface RolePermissionGrant {
  roleId: string;
  permission: Permission;
  /** Binding-level effect; overrides the permission's own effect when set. */
  effect?: Effect;
  /** Set when the stored row could not be mapped cleanly (e.g. bad conditions). */
  integrityIssue?: string;
}

export interface SubjectPermissionOverride {
  subjectId: string;
  permission: Permission;
  effect: Effect;
  validFrom: Date | null;
  validUntil: Date | null;
  integrityIssue?: string;
}

/**
 * Read-only contract of the authoritative policy store.
 */
export interface IPolicyStore {
  /** Active assignments not yet expired at `now`, including ones yet to start. */
  getActiveAssignments(
    subjectId: string,
    now: Date,
  ): Promise<SubjectRoleAssignment[]>;
  getRole(roleId: string): Promise<Role | null>;
  getRolePermissions(roleIds: string[]): Promise<RolePermissionGrant[]>;
  getOverrides(subjectId: string): Promise<SubjectPermissionOverride[]>;
}

/**
 * `validFrom <= now < validUntil`, with null bounds open.
 */
export function isWithinValidity(
  validFrom: Date | null,
  validUntil: Date | null,
  now: Date,
): boolean {
  const t = now.getTime();
  if (validFrom !== null && validFrom.getTime() > t) return false;
  if (validUntil !== null && validUntil.getTime() <= t) return false;
  return true;
}
