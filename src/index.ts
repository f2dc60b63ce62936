/**
 * Library entry point. `server.ts` is the standalone HTTP service.
 */

export * from "./modules/authz";
export { createApp } from "./app";
export type { AppDependencies } from "./app";

// Domain
export { Role } from "./domain/entities/Role";
export { Permission, WILDCARD } from "./domain/entities/Permission";
export type { Effect, PermissionSnapshot } from "./domain/entities/Permission";
export {
  SCOPES,
  isScope,
  scopeCovers,
  compareSpecificity,
} from "./domain/value-objects/Scope";
export type { Scope } from "./domain/value-objects/Scope";
export { conditionSchema, parseCondition } from "./domain/value-objects/Condition";
export type {
  AttributeMap,
  AttributeValue,
  Condition,
} from "./domain/value-objects/Condition";

// Infrastructure
export type {
  IPolicyStore,
  RolePermissionGrant,
  SubjectPermissionOverride,
  SubjectRoleAssignment,
} from "./infrastructure/repositories/IPolicyStore";
export { GuardedPolicyStore } from "./infrastructure/repositories/GuardedPolicyStore";
export { KyselyPolicyStore } from "./infrastructure/repositories/KyselyPolicyStore";
export { createDatabase } from "./infrastructure/database/kysely";
export {
  RedisDistributedCache,
  connectRedis,
  createRedisKeyValueCommands,
} from "./infrastructure/redis/RedisDistributedCache";
export {
  CircuitBreaker,
  CircuitOpenError,
  CircuitState,
} from "./infrastructure/resilience/CircuitBreaker";
