/**
 * Decision Cache
 *
 * Two-tier cache (in-process L1, optional distributed L2) for decisions and
 * resolved role sets. Invalidation is epoch based: every entry records the
 * subject epoch and the policy epoch captured when its computation started,
 * and an entry whose epochs are no longer current is ignored. Epochs are
 * ordered (`<counter>:<uuid>`) and only ever move forward, so an L2 read that
 * was in flight during an invalidation cannot bring back the epoch it
 * replaced. Any L2 failure is a miss.
 */

import { randomUUID } from "crypto";
import { z } from "zod";
import { SCOPES } from "../../../domain/value-objects/Scope";
import { conditionSchema } from "../../../domain/value-objects/Condition";
import { logger } from "../../../shared/logger";
import type { IDistributedCache } from "./DistributedCache";
import { MemoryCache } from "./MemoryCache";
import {
  CacheStats,
  Decision,
  DecisionReason,
  InvalidationTarget,
} from "../types/authorization";

export interface DecisionCacheOptions {
  decisionTtlSeconds: number;
  rolesTtlSeconds: number;
  l1MaxEntries: number;
  /** Must exceed every entry TTL */
  epochTtlSeconds: number;
}

export interface DecisionKey {
  subjectId: string;
  resource: string;
  action: string;
  scope: string;
}

export interface CachedRoles {
  roles: string[];
  /** Earliest assignment expiry (epoch ms), null if unbounded */
  expiresAt: number | null;
}

export interface EpochSnapshot {
  subject: string;
  policy: string;
}

interface Versioned<T> {
  value: T;
  subjectEpoch: string;
  policyEpoch: string;
}

export const DEFAULT_DECISION_CACHE_OPTIONS: DecisionCacheOptions = {
  decisionTtlSeconds: 30,
  rolesTtlSeconds: 300,
  l1MaxEntries: 10000,
  epochTtlSeconds: 86400,
};

const INITIAL_EPOCH = "0";

const permissionSnapshotSchema = z.object({
  id: z.string(),
  resource: z.string(),
  action: z.string(),
  scope: z.enum(SCOPES),
  effect: z.enum(["allow", "deny"]),
  priority: z.number(),
  conditions: conditionSchema.optional(),
  description: z.string().optional(),
});

const decisionSchema: z.ZodType<Decision> = z.object({
  allowed: z.boolean(),
  outcome: z.enum(["Allowed", "Denied", "DeniedDegraded"]),
  matchedPermission: permissionSnapshotSchema.nullable(),
  reason: z.nativeEnum(DecisionReason),
  degraded: z.boolean(),
  evaluatedAt: z.string(),
  source: z.enum(["computed", "cache"]),
});

const cachedRolesSchema: z.ZodType<CachedRoles> = z.object({
  roles: z.array(z.string()),
  expiresAt: z.number().nullable(),
});

const envelopeSchema = z.object({
  value: z.unknown(),
  subjectEpoch: z.string(),
  policyEpoch: z.string(),
  expiresAt: z.number(),
});

export class DecisionCache {
  private readonly decisions: MemoryCache<Versioned<Decision>>;
  private readonly roleSets: MemoryCache<Versioned<CachedRoles>>;
  private readonly subjectEpochs: Map<string, string> = new Map();
  private policyEpoch: string = INITIAL_EPOCH;
  private stats = {
    l1Hits: 0,
    l2Hits: 0,
    misses: 0,
    staleEntries: 0,
    l2Errors: 0,
  };

  constructor(
    private readonly distributed: IDistributedCache | null,
    private readonly options: DecisionCacheOptions,
    private readonly now: () => number = Date.now,
  ) {
    this.decisions = new MemoryCache(options.l1MaxEntries, now);
    this.roleSets = new MemoryCache(options.l1MaxEntries, now);
  }

  // ==================== Epochs ====================

  /**
   * Epochs current at the start of a computation. Entries written with them
   * are ignored once either epoch moves on.
   */
  async captureEpochs(subjectId: string): Promise<EpochSnapshot> {
    if (this.distributed) {
      try {
        const [subjectEpoch, policyEpoch] = await Promise.all([
          this.distributed.get(subjectEpochKey(subjectId)),
          this.distributed.get(POLICY_EPOCH_KEY),
        ]);
        this.syncEpochs(subjectId, subjectEpoch, policyEpoch);
      } catch (error) {
        this.recordL2Error("captureEpochs", error);
      }
    }
    return this.currentEpochs(subjectId);
  }

  // ==================== Decisions ====================

  async getDecision(key: DecisionKey): Promise<Decision | null> {
    const entry = await this.read(
      decisionKey(key),
      key.subjectId,
      this.decisions,
      decisionSchema,
    );
    return entry ? { ...entry, source: "cache" } : null;
  }

  /**
   * @param notAfter - validity bound that contributed to the decision; the
   *   entry never outlives it
   */
  async setDecision(
    key: DecisionKey,
    decision: Decision,
    epochs: EpochSnapshot,
    notAfter: Date | null,
  ): Promise<void> {
    await this.write(
      decisionKey(key),
      key.subjectId,
      this.decisions,
      decision,
      epochs,
      this.ttlMs(this.options.decisionTtlSeconds, notAfter?.getTime() ?? null),
    );
  }

  // ==================== Role sets ====================

  async getRoles(subjectId: string): Promise<CachedRoles | null> {
    return this.read(
      rolesKey(subjectId),
      subjectId,
      this.roleSets,
      cachedRolesSchema,
    );
  }

  async setRoles(
    subjectId: string,
    roles: CachedRoles,
    epochs: EpochSnapshot,
  ): Promise<void> {
    await this.write(
      rolesKey(subjectId),
      subjectId,
      this.roleSets,
      roles,
      epochs,
      this.ttlMs(this.options.rolesTtlSeconds, roles.expiresAt),
    );
  }

  // ==================== Invalidation ====================

  /**
   * Subject invalidation bumps that subject's epoch; role or permission
   * invalidation, or no target at all, bumps the policy epoch. Idempotent.
   */
  async invalidate(target: InvalidationTarget = {}): Promise<void> {
    const subjectId = target.subjectId;
    const policyWide =
      target.roleId !== undefined ||
      target.permissionId !== undefined ||
      subjectId === undefined;

    const writes: Array<() => Promise<void>> = [];

    const published = await this.readPublishedEpochs(subjectId, policyWide);

    if (subjectId !== undefined) {
      const epoch = nextEpoch(
        this.currentEpochs(subjectId).subject,
        published.subject,
      );
      this.setSubjectEpoch(subjectId, epoch);
      this.decisions.deleteByPrefix(decisionPrefix(subjectId));
      this.roleSets.delete(rolesKey(subjectId));

      if (this.distributed) {
        const distributed = this.distributed;
        writes.push(
          () =>
            distributed.set(
              subjectEpochKey(subjectId),
              epoch,
              this.options.epochTtlSeconds,
            ),
          () => distributed.delete([rolesKey(subjectId)]),
        );
      }
    }

    if (policyWide) {
      const epoch = nextEpoch(this.policyEpoch, published.policy);
      this.policyEpoch = epoch;
      this.decisions.clear();
      this.roleSets.clear();

      if (this.distributed) {
        const distributed = this.distributed;
        writes.push(() =>
          distributed.set(POLICY_EPOCH_KEY, epoch, this.options.epochTtlSeconds),
        );
      }
    }

    logger.info("Authorization cache invalidated", {
      subjectId: target.subjectId,
      roleId: target.roleId,
      permissionId: target.permissionId,
    });

    if (writes.length === 0) {
      return;
    }
    try {
      await Promise.all(writes.map((write) => write()));
    } catch (error) {
      this.recordL2Error("invalidate", error);
    }
  }

  getStats(): CacheStats {
    return {
      l1Size: this.decisions.size + this.roleSets.size,
      ...this.stats,
    };
  }

  // ==================== Internals ====================

  private async read<T>(
    key: string,
    subjectId: string,
    l1: MemoryCache<Versioned<T>>,
    schema: z.ZodType<T>,
  ): Promise<T | null> {
    const local = l1.get(key);
    if (local) {
      if (this.isCurrent(subjectId, local)) {
        this.stats.l1Hits++;
        return local.value;
      }
      l1.delete(key);
      this.stats.staleEntries++;
    }

    if (!this.distributed) {
      this.stats.misses++;
      return null;
    }

    try {
      const [raw, subjectEpoch, policyEpoch] = await Promise.all([
        this.distributed.get(key),
        this.distributed.get(subjectEpochKey(subjectId)),
        this.distributed.get(POLICY_EPOCH_KEY),
      ]);
      this.syncEpochs(subjectId, subjectEpoch, policyEpoch);

      // No await between this check and the L1 write below
      const entry = raw === null ? null : decodeEnvelope(raw, schema);
      if (entry === null) {
        this.stats.misses++;
        return null;
      }

      const remainingMs = entry.expiresAt - this.now();
      if (remainingMs <= 0 || !this.isCurrent(subjectId, entry)) {
        this.stats.staleEntries++;
        this.stats.misses++;
        return null;
      }

      l1.set(key, entry, remainingMs);
      this.stats.l2Hits++;
      return entry.value;
    } catch (error) {
      this.recordL2Error("get", error);
      this.stats.misses++;
      return null;
    }
  }

  private async write<T>(
    key: string,
    subjectId: string,
    l1: MemoryCache<Versioned<T>>,
    value: T,
    epochs: EpochSnapshot,
    ttlMs: number,
  ): Promise<void> {
    const entry: Versioned<T> = {
      value,
      subjectEpoch: epochs.subject,
      policyEpoch: epochs.policy,
    };

    // Already invalidated while it was being computed
    if (ttlMs <= 0 || !this.isCurrent(subjectId, entry)) {
      return;
    }

    l1.set(key, entry, ttlMs);

    if (!this.distributed) {
      return;
    }
    try {
      await this.distributed.set(
        key,
        JSON.stringify({ ...entry, expiresAt: this.now() + ttlMs }),
        Math.ceil(ttlMs / 1000),
      );
    } catch (error) {
      this.recordL2Error("set", error);
    }
  }

  private ttlMs(ttlSeconds: number, notAfter: number | null): number {
    const ttlMs = ttlSeconds * 1000;
    return notAfter === null ? ttlMs : Math.min(ttlMs, notAfter - this.now());
  }

  private isCurrent(subjectId: string, entry: Versioned<unknown>): boolean {
    const current = this.currentEpochs(subjectId);
    return (
      entry.subjectEpoch === current.subject &&
      entry.policyEpoch === current.policy
    );
  }

  private currentEpochs(subjectId: string): EpochSnapshot {
    return {
      subject: this.subjectEpochs.get(subjectId) ?? INITIAL_EPOCH,
      policy: this.policyEpoch,
    };
  }

  /**
   * Adopt epochs published in L2 when they are newer than the local ones.
   */
  private syncEpochs(
    subjectId: string,
    subjectEpoch: string | null,
    policyEpoch: string | null,
  ): void {
    if (
      subjectEpoch !== null &&
      isNewerEpoch(subjectEpoch, this.currentEpochs(subjectId).subject)
    ) {
      this.setSubjectEpoch(subjectId, subjectEpoch);
    }
    if (policyEpoch !== null && isNewerEpoch(policyEpoch, this.policyEpoch)) {
      this.policyEpoch = policyEpoch;
    }
  }

  /**
   * Epochs other instances may have published, so a bump lands above them.
   * Without L2 the local epochs are the only ones.
   */
  private async readPublishedEpochs(
    subjectId: string | undefined,
    policyWide: boolean,
  ): Promise<{ subject: string | null; policy: string | null }> {
    const none = { subject: null, policy: null };
    if (!this.distributed) {
      return none;
    }
    const distributed = this.distributed;
    try {
      const [subject, policy] = await Promise.all([
        subjectId !== undefined
          ? distributed.get(subjectEpochKey(subjectId))
          : Promise.resolve(null),
        policyWide ? distributed.get(POLICY_EPOCH_KEY) : Promise.resolve(null),
      ]);
      return { subject, policy };
    } catch (error) {
      this.recordL2Error("invalidate", error);
      return none;
    }
  }

  private setSubjectEpoch(subjectId: string, epoch: string): void {
    this.subjectEpochs.delete(subjectId);
    // Forgetting an epoch only turns that subject's entries into misses
    if (this.subjectEpochs.size >= this.options.l1MaxEntries) {
      const oldest = this.subjectEpochs.keys().next();
      if (!oldest.done) {
        this.subjectEpochs.delete(oldest.value);
      }
    }
    this.subjectEpochs.set(subjectId, epoch);
  }

  private recordL2Error(operation: string, error: unknown): void {
    this.stats.l2Errors++;
    logger.warn("Distributed cache unavailable, falling back", {
      operation,
      error: error instanceof Error ? error.message : String(error),
    });
  }
}

// ============================================================================
// Keys
// ============================================================================

const POLICY_EPOCH_KEY = "epoch:policy";

const encode = (part: string): string => encodeURIComponent(part);

export function decisionKey(key: DecisionKey): string {
  return `${decisionPrefix(key.subjectId)}${encode(key.resource)}:${encode(
    key.action,
  )}:${encode(key.scope)}`;
}

function decisionPrefix(subjectId: string): string {
  return `decision:${encode(subjectId)}:`;
}

export function rolesKey(subjectId: string): string {
  return `roles:${encode(subjectId)}`;
}

export function subjectEpochKey(subjectId: string): string {
  return `epoch:subject:${encode(subjectId)}`;
}

// ============================================================================
// Epochs
// ============================================================================

function epochCounter(epoch: string): number | null {
  const match = /^(\d+)(?::|$)/.exec(epoch);
  return match?.[1] === undefined ? null : Number(match[1]);
}

/**
 * Counter first, then the random suffix for equal counters. Unreadable
 * values are never newer.
 */
export function isNewerEpoch(candidate: string, current: string): boolean {
  const candidateCounter = epochCounter(candidate);
  if (candidateCounter === null) {
    return false;
  }
  const currentCounter = epochCounter(current);
  if (currentCounter === null || candidateCounter !== currentCounter) {
    return currentCounter === null || candidateCounter > currentCounter;
  }
  return candidate > current;
}

export function nextEpoch(...known: Array<string | null>): string {
  const highest = Math.max(
    0,
    ...known.map((epoch) => (epoch === null ? 0 : (epochCounter(epoch) ?? 0))),
  );
  return `${highest + 1}:${randomUUID()}`;
}

function decodeEnvelope<T>(
  raw: string,
  schema: z.ZodType<T>,
): (Versioned<T> & { expiresAt: number }) | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    logger.debug("Dropping unparseable cache payload");
    return null;
  }

  const envelope = envelopeSchema.safeParse(json);
  if (!envelope.success) {
    logger.debug("Dropping malformed cache envelope");
    return null;
  }
  const value = schema.safeParse(envelope.data.value);
  if (!value.success) {
    logger.debug("Dropping malformed cache value");
    return null;
  }

  return {
    value: value.data,
    subjectEpoch: envelope.data.subjectEpoch,
    policyEpoch: envelope.data.policyEpoch,
    expiresAt: envelope.data.expiresAt,
  };
}
