import { Role } from "../../domain/entities/Role";
import {
  PolicyIntegrityError,
  PolicyStoreUnavailableError,
} from "../../modules/authz/errors/AuthorizationError";
import { withTimeout } from "../../shared/utils/withTimeout";
import { logger } from "../../shared/logger";
import {
  IPolicyStore,
  RolePermissionGrant,
  SubjectPermissionOverride,
  SubjectRoleAssignment,
} from "./IPolicyStore";

/**
 * Decorates a policy store with a per-read timeout and maps every failure
 * other than a data integrity problem to PolicyStoreUnavailableError, so the
 * engine never mistakes an outage for an empty policy.
 */
export class GuardedPolicyStore implements IPolicyStore {
  constructor(
    private readonly inner: IPolicyStore,
    private readonly timeoutMs: number,
  ) {}

  getActiveAssignments(
    subjectId: string,
    now: Date,
  ): Promise<SubjectRoleAssignment[]> {
    return this.guard("getActiveAssignments", () =>
      this.inner.getActiveAssignments(subjectId, now),
    );
  }

  getRole(roleId: string): Promise<Role | null> {
    return this.guard("getRole", () => this.inner.getRole(roleId));
  }

  getRolePermissions(roleIds: string[]): Promise<RolePermissionGrant[]> {
    if (roleIds.length === 0) {
      return Promise.resolve([]);
    }
    return this.guard("getRolePermissions", () =>
      this.inner.getRolePermissions(roleIds),
    );
  }

  getOverrides(subjectId: string): Promise<SubjectPermissionOverride[]> {
    return this.guard("getOverrides", () =>
      this.inner.getOverrides(subjectId),
    );
  }

  private async guard<T>(
    operation: string,
    read: () => Promise<T>,
  ): Promise<T> {
    try {
      return await withTimeout(read(), this.timeoutMs, `policy store ${operation}`);
    } catch (error) {
      if (
        error instanceof PolicyStoreUnavailableError ||
        error instanceof PolicyIntegrityError
      ) {
        throw error;
      }
      logger.error("Policy store read failed", {
        operation,
        error: error instanceof Error ? error.message : String(error),
      });
      throw new PolicyStoreUnavailableError(operation, error);
    }
  }
}
