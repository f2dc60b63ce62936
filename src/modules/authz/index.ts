/**
 * Authorization Module - Exports
 *
 * Decision engine (AuthorizationService), its building blocks, the express
 * enforcement middleware and the HTTP routes.
 */

// Service
export { AuthorizationService } from "./service/AuthorizationService";
export type {
  AuthorizationServiceDeps,
  AuthorizationServiceOptions,
} from "./service/AuthorizationService";

// Building blocks
export { RoleResolver } from "./resolver/RoleResolver";
export type { ResolvedRoles } from "./resolver/RoleResolver";
export { PermissionMatcher, compareCandidates } from "./matcher/PermissionMatcher";
export type { Candidate, MatchDecision } from "./matcher/PermissionMatcher";
export { ConditionEvaluator } from "./conditions/ConditionEvaluator";
export type {
  ConditionResult,
  EvaluationContext,
} from "./conditions/ConditionEvaluator";

// Cache
export {
  DecisionCache,
  DEFAULT_DECISION_CACHE_OPTIONS,
} from "./cache/DecisionCache";
export type { DecisionCacheOptions } from "./cache/DecisionCache";
export { MemoryCache } from "./cache/MemoryCache";
export type { IDistributedCache } from "./cache/DistributedCache";

// External evaluator
export { LocalOnlyPolicyEvaluator } from "./opa/RemotePolicyEvaluator";
export type {
  RemotePolicyEvaluator,
  RemoteVerdict,
} from "./opa/RemotePolicyEvaluator";
export { OPAPolicyClient } from "./opa/OPAPolicyClient";

// Enforcement and HTTP
export { requirePermission } from "./enforcement/Middleware";
export { createAuthorizationRouter } from "./routes";

// Types and errors
export * from "./types/authorization";
export * from "./errors/AuthorizationError";
