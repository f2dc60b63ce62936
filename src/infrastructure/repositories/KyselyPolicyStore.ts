import { Kysely } from "kysely";
import { Role } from "../../domain/entities/Role";
import { Effect, Permission } from "../../domain/entities/Permission";
import {
  Condition,
  parseCondition,
} from "../../domain/value-objects/Condition";
import { Scope, isScope } from "../../domain/value-objects/Scope";
import { logger } from "../../shared/logger";
import { PolicyIntegrityError } from "../../modules/authz/errors/AuthorizationError";
import type { DB } from "../database/schema";
import {
  IPolicyStore,
  RolePermissionGrant,
  SubjectPermissionOverride,
  SubjectRoleAssignment,
} from "./IPolicyStore";

export interface RoleRow {
  id: string;
  name: string;
  description: string | null;
  parent_role_id: string | null;
  level: number;
  is_system_role: boolean;
}

export interface PermissionRow {
  id: string;
  resource_type: string;
  action: string;
  scope: string;
  conditions: unknown;
  effect: string;
  priority: number;
  description: string | null;
}

export interface MappedPermission {
  permission: Permission;
  integrityIssue?: string;
}

const PERMISSION_COLUMNS = [
  "p.id",
  "p.resource_type",
  "p.action",
  "p.scope",
  "p.conditions",
  "p.effect",
  "p.priority",
  "p.description",
] as const;

export class KyselyPolicyStore implements IPolicyStore {
  constructor(private readonly db: Kysely<DB>) {}

  async getActiveAssignments(
    subjectId: string,
    now: Date,
  ): Promise<SubjectRoleAssignment[]> {
    const rows = await this.db
      .selectFrom("auth.user_roles as ur")
      .innerJoin("auth.roles as r", "r.id", "ur.role_id")
      .select(["ur.user_id", "ur.role_id", "ur.valid_from", "ur.valid_until"])
      .where("ur.user_id", "=", subjectId)
      .where("ur.is_active", "=", true)
      .where("r.deleted_at", "is", null)
      .where((eb) =>
        eb.or([
          eb("ur.valid_until", "is", null),
          eb("ur.valid_until", ">", now),
        ]),
      )
      .execute();

    return rows.map((row) => ({
      subjectId: row.user_id,
      roleId: row.role_id,
      validFrom: row.valid_from,
      validUntil: row.valid_until,
    }));
  }

  async getRole(roleId: string): Promise<Role | null> {
    const row = await this.db
      .selectFrom("auth.roles")
      .select([
        "id",
        "name",
        "description",
        "parent_role_id",
        "level",
        "is_system_role",
      ])
      .where("id", "=", roleId)
      .where("deleted_at", "is", null)
      .executeTakeFirst();

    return row ? mapRoleRow(row) : null;
  }

  async getRolePermissions(roleIds: string[]): Promise<RolePermissionGrant[]> {
    if (roleIds.length === 0) {
      return [];
    }

    const rows = await this.db
      .selectFrom("auth.role_permissions as rp")
      .innerJoin("auth.permissions as p", "p.id", "rp.permission_id")
      .select(["rp.role_id", "rp.effect as binding_effect", ...PERMISSION_COLUMNS])
      .where("rp.role_id", "in", roleIds)
      .where("p.deleted_at", "is", null)
      .execute();

    const grants: RolePermissionGrant[] = [];
    for (const row of rows) {
      const mapped = mapPermissionRow(row);
      if (!mapped) continue;
      const bindingEffect =
        row.binding_effect === null ? undefined : parseEffect(row.binding_effect);
      const issue = mapped.integrityIssue ?? bindingEffect?.issue;

      grants.push({
        roleId: row.role_id,
        permission: mapped.permission,
        ...(bindingEffect ? { effect: bindingEffect.effect } : {}),
        ...(issue ? { integrityIssue: issue } : {}),
      });
    }
    return grants;
  }

  async getOverrides(subjectId: string): Promise<SubjectPermissionOverride[]> {
    const rows = await this.db
      .selectFrom("auth.user_permissions as up")
      .innerJoin("auth.permissions as p", "p.id", "up.permission_id")
      .select([
        "up.user_id",
        "up.effect as override_effect",
        "up.valid_from",
        "up.valid_until",
        ...PERMISSION_COLUMNS,
      ])
      .where("up.user_id", "=", subjectId)
      .where("up.is_active", "=", true)
      .where("p.deleted_at", "is", null)
      .execute();

    const overrides: SubjectPermissionOverride[] = [];
    for (const row of rows) {
      const mapped = mapPermissionRow(row);
      if (!mapped) continue;
      const overrideEffect = parseEffect(row.override_effect);
      const issue = mapped.integrityIssue ?? overrideEffect.issue;

      overrides.push({
        subjectId: row.user_id,
        permission: mapped.permission,
        effect: overrideEffect.effect,
        validFrom: row.valid_from,
        validUntil: row.valid_until,
        ...(issue ? { integrityIssue: issue } : {}),
      });
    }
    return overrides;
  }
}

// ============================================================================
// Row mapping
// ============================================================================

/**
 * Throws PolicyIntegrityError for rows that violate the Role invariants so
 * the resolver can drop just that role's contribution.
 */
export function mapRoleRow(row: RoleRow): Role {
  if (row.parent_role_id === row.id) {
    throw new PolicyIntegrityError("ROLE_CYCLE", row.id, [row.id, row.id]);
  }
  try {
    return new Role(
      row.id,
      row.name,
      row.parent_role_id,
      row.level,
      row.is_system_role,
      row.description ?? "",
    );
  } catch (error) {
    logger.warn("Role row failed integrity checks", {
      roleId: row.id,
      error: error instanceof Error ? error.message : String(error),
    });
    throw new PolicyIntegrityError("MALFORMED_ROLE", row.id);
  }
}

/**
 * Map a permission row to the domain. Unknown effects become `deny`, unknown
 * scopes become `global` and unparseable conditions are reported, so a
 * corrupt row can only ever narrow access. A row without a resource or action
 * matches no request and maps to null.
 */
export function mapPermissionRow(row: PermissionRow): MappedPermission | null {
  const issues: string[] = [];

  const effect = parseEffect(row.effect);
  if (effect.issue) {
    issues.push(effect.issue);
  }

  let scope: Scope = "global";
  if (isScope(row.scope)) {
    scope = row.scope;
  } else {
    issues.push(`unknown scope '${row.scope}'`);
  }

  const parsed = parseCondition(decodeJson(row.conditions));
  let conditions: Condition | undefined;
  if (parsed.ok) {
    conditions = parsed.condition;
  } else {
    issues.push(`malformed conditions: ${parsed.error}`);
  }

  if (issues.length > 0) {
    logger.warn("Permission row failed integrity checks", {
      permissionId: row.id,
      issues,
    });
  }

  let permission: Permission;
  try {
    permission = new Permission(
      row.id,
      row.resource_type,
      row.action,
      scope,
      effect.effect,
      row.priority,
      conditions,
      row.description ?? "",
    );
  } catch (error) {
    logger.error("Permission row skipped", {
      permissionId: row.id,
      error: error instanceof Error ? error.message : String(error),
    });
    return null;
  }

  return issues.length > 0
    ? { permission, integrityIssue: issues.join("; ") }
    : { permission };
}

export function parseEffect(value: string): { effect: Effect; issue?: string } {
  const normalized = value.trim().toLowerCase();
  if (normalized === "allow" || normalized === "deny") {
    return { effect: normalized };
  }
  return { effect: "deny", issue: `unknown effect '${value}'` };
}

function decodeJson(value: unknown): unknown {
  if (typeof value !== "string") {
    return value;
  }
  try {
    return JSON.parse(value);
  } catch {
    // Reported by parseCondition as a malformed document
    return value;
  }
}
