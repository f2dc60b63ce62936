/**
 * Authorization Errors
 *
 * Error taxonomy of the decision engine. Only store outages and invalid
 * requests reach the caller; the rest are recovered locally and surface in
 * logs and decision diagnostics.
 */

/**
 * Authorization Error Codes
 */
export enum AuthorizationErrorCode {
  POLICY_STORE_UNAVAILABLE = "POLICY_STORE_UNAVAILABLE",
  POLICY_INTEGRITY_ERROR = "POLICY_INTEGRITY_ERROR",
  REMOTE_POLICY_UNAVAILABLE = "REMOTE_POLICY_UNAVAILABLE",
  INVALID_ATTRIBUTE_CONTEXT = "INVALID_ATTRIBUTE_CONTEXT",
  VALIDATION_ERROR = "VALIDATION_ERROR",
  CACHE_ERROR = "CACHE_ERROR",
}

/**
 * Base Authorization Error
 */
export class AuthorizationError extends Error {
  constructor(
    message: string,
    public readonly code: AuthorizationErrorCode,
  ) {
    super(message);
    this.name = "AuthorizationError";
  }
}

/**
 * Policy Store read failed or timed out. Not recoverable locally.
 */
export class PolicyStoreUnavailableError extends AuthorizationError {
  constructor(
    public readonly operation: string,
    public readonly originalError?: unknown,
  ) {
    super(
      `Policy store unavailable during ${operation}: ${describeCause(originalError)}`,
      AuthorizationErrorCode.POLICY_STORE_UNAVAILABLE,
    );
    this.name = "PolicyStoreUnavailableError";
  }
}

export type IntegrityViolation =
  | "ROLE_CYCLE"
  | "DANGLING_ROLE"
  | "LEVEL_ORDER"
  | "MALFORMED_ROLE"
  | "MALFORMED_CONDITIONS";

/**
 * Role hierarchy or permission data is inconsistent. Only the affected
 * contribution is dropped.
 */
export class PolicyIntegrityError extends AuthorizationError {
  constructor(
    public readonly violation: IntegrityViolation,
    public readonly entityId: string,
    public readonly path: string[] = [],
  ) {
    super(
      `Policy integrity violation ${violation} at ${entityId}${
        path.length > 0 ? ` (path: ${path.join(" -> ")})` : ""
      }`,
      AuthorizationErrorCode.POLICY_INTEGRITY_ERROR,
    );
    this.name = "PolicyIntegrityError";
  }
}

/**
 * External policy evaluator timed out, was unreachable, or answered with
 * something other than a decision.
 */
export class RemotePolicyUnavailableError extends AuthorizationError {
  /**
   * @param cancelled - the caller gave up, by abort or by its own deadline
   */
  constructor(
    public readonly reason: string,
    public readonly cancelled: boolean = false,
  ) {
    super(
      `Remote policy evaluator unavailable: ${reason}`,
      AuthorizationErrorCode.REMOTE_POLICY_UNAVAILABLE,
    );
    this.name = "RemotePolicyUnavailableError";
  }
}

/**
 * A condition referenced an attribute the context does not carry.
 */
export class InvalidAttributeContextError extends AuthorizationError {
  constructor(public readonly attribute: string) {
    super(
      `Attribute not present in context: ${attribute}`,
      AuthorizationErrorCode.INVALID_ATTRIBUTE_CONTEXT,
    );
    this.name = "InvalidAttributeContextError";
  }
}

/**
 * Validation Error
 */
export class ValidationError extends AuthorizationError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message, AuthorizationErrorCode.VALIDATION_ERROR);
    this.name = "ValidationError";
  }
}

/**
 * Distributed cache tier failed or timed out.
 */
export class CacheUnavailableError extends AuthorizationError {
  constructor(
    public readonly operation: string,
    public readonly originalError?: unknown,
  ) {
    super(
      `Distributed cache unavailable during ${operation}: ${describeCause(originalError)}`,
      AuthorizationErrorCode.CACHE_ERROR,
    );
    this.name = "CacheUnavailableError";
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return cause === undefined ? "unknown error" : String(cause);
}
