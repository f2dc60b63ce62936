import type { ColumnType, Generated } from "kysely";

/**
 * Table shapes of the `auth` schema (see db/schema.sql). The engine only
 * reads these tables.
 */

type Timestamp = ColumnType<Date, Date | string, Date | string>;

/** Timestamp with a database default: optional on insert. */
type DefaultedTimestamp = ColumnType<Date, Date | string | undefined, Date | string>;

type Json = ColumnType<unknown, string, string>;

export interface RolesTable {
  id: Generated<string>;
  name: string;
  description: string | null;
  parent_role_id: string | null;
  level: Generated<number>;
  is_system_role: Generated<boolean>;
  deleted_at: Timestamp | null;
}

export interface PermissionsTable {
  id: Generated<string>;
  resource_type: string;
  action: string;
  scope: Generated<string>;
  conditions: Json | null;
  effect: Generated<string>;
  priority: Generated<number>;
  description: string | null;
  deleted_at: Timestamp | null;
}

export interface RolePermissionsTable {
  role_id: string;
  permission_id: string;
  effect: string | null;
}

export interface UserRolesTable {
  id: Generated<string>;
  user_id: string;
  role_id: string;
  valid_from: DefaultedTimestamp;
  valid_until: Timestamp | null;
  is_active: Generated<boolean>;
}

export interface UserPermissionsTable {
  id: Generated<string>;
  user_id: string;
  permission_id: string;
  effect: Generated<string>;
  valid_from: Timestamp | null;
  valid_until: Timestamp | null;
  is_active: Generated<boolean>;
}

export interface DB {
  "auth.roles": RolesTable;
  "auth.permissions": PermissionsTable;
  "auth.role_permissions": RolePermissionsTable;
  "auth.user_roles": UserRolesTable;
  "auth.user_permissions": UserPermissionsTable;
}
