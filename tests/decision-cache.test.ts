/**
 * Unit Tests for the two-tier Decision Cache
 */

import {
  DecisionCache,
  DecisionCacheOptions,
  DecisionKey,
  decisionKey,
  isNewerEpoch,
  nextEpoch,
  rolesKey,
  subjectEpochKey,
} from "../src/modules/authz/cache/DecisionCache";
import {
  Decision,
  DecisionReason,
} from "../src/modules/authz/types/authorization";
import {
  FIXED_NOW,
  InMemoryDistributedCache,
  TestClock,
  createClock,
  createInMemoryDistributedCache,
} from "./utils/test-helpers";

const options: DecisionCacheOptions = {
  decisionTtlSeconds: 30,
  rolesTtlSeconds: 300,
  l1MaxEntries: 100,
  epochTtlSeconds: 86400,
};

const key: DecisionKey = {
  subjectId: "u1",
  resource: "batch",
  action: "read",
  scope: "organization",
};

const decision: Decision = {
  allowed: true,
  outcome: "Allowed",
  matchedPermission: {
    id: "perm-batch-read",
    resource: "batch",
    action: "read",
    scope: "organization",
    effect: "allow",
    priority: 0,
  },
  reason: DecisionReason.ALLOWED_BY_ROLE,
  degraded: false,
  evaluatedAt: FIXED_NOW.toISOString(),
  source: "computed",
};

describe("DecisionCache", () => {
  let clock: TestClock;
  let l2: InMemoryDistributedCache;
  let cache: DecisionCache;

  const createCache = () => new DecisionCache(l2, options, clock.nowMs);

  beforeEach(() => {
    clock = createClock();
    l2 = createInMemoryDistributedCache();
    cache = createCache();
  });

  describe("keys", () => {
    it("should encode each key segment", () => {
      expect(
        decisionKey({ ...key, subjectId: "user:1", resource: "batch/items" }),
      ).toBe("decision:user%3A1:batch%2Fitems:read:organization");
      expect(rolesKey("u1")).toBe("roles:u1");
      expect(subjectEpochKey("u 1")).toBe("epoch:subject:u%201");
    });
  });

  describe("decisions", () => {
    it("should serve a stored decision from L1", async () => {
      const epochs = await cache.captureEpochs("u1");
      await cache.setDecision(key, decision, epochs, null);

      await expect(cache.getDecision(key)).resolves.toEqual({
        ...decision,
        source: "cache",
      });
      expect(cache.getStats()).toMatchObject({ l1Hits: 1, misses: 0 });
    });

    it("should write a versioned entry to L2", async () => {
      const epochs = await cache.captureEpochs("u1");
      await cache.setDecision(key, decision, epochs, null);

      const stored = l2._raw("decision:u1:batch:read:organization");
      expect(stored?.ttlSeconds).toBe(30);
      expect(JSON.parse(stored?.value ?? "null")).toEqual({
        value: decision,
        subjectEpoch: "0",
        policyEpoch: "0",
        expiresAt: FIXED_NOW.getTime() + 30_000,
      });
    });

    it("should serve another instance from L2 and then from its L1", async () => {
      await cache.setDecision(key, decision, await cache.captureEpochs("u1"), null);
      const other = createCache();

      await expect(other.getDecision(key)).resolves.toEqual({
        ...decision,
        source: "cache",
      });
      await other.getDecision(key);

      expect(other.getStats()).toEqual({
        l1Size: 1,
        l1Hits: 1,
        l2Hits: 1,
        misses: 0,
        staleEntries: 0,
        l2Errors: 0,
      });
    });

    it("should expire entries after the decision TTL", async () => {
      await cache.setDecision(key, decision, await cache.captureEpochs("u1"), null);

      clock.advance(30_000);

      await expect(cache.getDecision(key)).resolves.toBeNull();
      expect(cache.getStats()).toMatchObject({ staleEntries: 1, misses: 1 });
    });

    it("should cap the TTL at the validity bound", async () => {
      const notAfter = new Date(FIXED_NOW.getTime() + 5_000);
      await cache.setDecision(key, decision, await cache.captureEpochs("u1"), notAfter);

      expect(l2._raw(decisionKey(key))?.ttlSeconds).toBe(5);
      clock.advance(4_999);
      await expect(cache.getDecision(key)).resolves.not.toBeNull();
      clock.advance(1);
      await expect(cache.getDecision(key)).resolves.toBeNull();
    });

    it("should not store a decision whose validity bound has passed", async () => {
      const notAfter = new Date(FIXED_NOW.getTime() - 1);
      await cache.setDecision(key, decision, await cache.captureEpochs("u1"), notAfter);

      expect(l2._keys()).toEqual([]);
      await expect(cache.getDecision(key)).resolves.toBeNull();
    });

    it("should drop corrupt L2 payloads", async () => {
      l2._put(decisionKey(key), "not json");

      await expect(cache.getDecision(key)).resolves.toBeNull();
      expect(cache.getStats()).toMatchObject({ misses: 1, l2Errors: 0 });
    });

    it("should drop L2 payloads of the wrong shape", async () => {
      l2._put(
        decisionKey(key),
        JSON.stringify({
          value: { allowed: "yes" },
          subjectEpoch: "0",
          policyEpoch: "0",
          expiresAt: FIXED_NOW.getTime() + 30_000,
        }),
      );

      await expect(cache.getDecision(key)).resolves.toBeNull();
    });
  });

  describe("role sets", () => {
    it("should cap the TTL at the earliest assignment expiry", async () => {
      const roles = {
        roles: ["org:member"],
        expiresAt: FIXED_NOW.getTime() + 10_000,
      };
      await cache.setRoles("u1", roles, await cache.captureEpochs("u1"));

      expect(l2._raw("roles:u1")?.ttlSeconds).toBe(10);
      await expect(cache.getRoles("u1")).resolves.toEqual(roles);

      clock.advance(10_000);
      await expect(cache.getRoles("u1")).resolves.toBeNull();
    });
  });

  describe("invalidation", () => {
    it("should never return a subject's decision computed before invalidation", async () => {
      await cache.setDecision(key, decision, await cache.captureEpochs("u1"), null);

      await cache.invalidate({ subjectId: "u1" });

      await expect(cache.getDecision(key)).resolves.toBeNull();
      expect(cache.getStats()).toMatchObject({ staleEntries: 1, misses: 1 });
    });

    it("should keep other subjects' decisions on subject invalidation", async () => {
      const otherKey = { ...key, subjectId: "u2" };
      await cache.setDecision(otherKey, decision, await cache.captureEpochs("u2"), null);

      await cache.invalidate({ subjectId: "u1" });

      await expect(cache.getDecision(otherKey)).resolves.not.toBeNull();
    });

    it("should discard a write computed before the invalidation", async () => {
      const epochs = await cache.captureEpochs("u1");

      await cache.invalidate({ subjectId: "u1" });
      await cache.setDecision(key, decision, epochs, null);

      expect(l2._raw(decisionKey(key))).toBeUndefined();
      await expect(cache.getDecision(key)).resolves.toBeNull();
    });

    it("should publish the subject epoch and delete the role set in L2", async () => {
      await cache.setRoles(
        "u1",
        { roles: ["org:member"], expiresAt: null },
        await cache.captureEpochs("u1"),
      );

      await cache.invalidate({ subjectId: "u1" });

      expect(l2._raw("roles:u1")).toBeUndefined();
      expect(l2._raw("epoch:subject:u1")?.ttlSeconds).toBe(86400);
      expect(l2._raw("epoch:policy")).toBeUndefined();
      expect(l2.delete).toHaveBeenCalledWith(["roles:u1"]);
    });

    it("should invalidate every subject on role invalidation", async () => {
      const otherKey = { ...key, subjectId: "u2" };
      await cache.setDecision(key, decision, await cache.captureEpochs("u1"), null);
      await cache.setDecision(otherKey, decision, await cache.captureEpochs("u2"), null);

      await cache.invalidate({ roleId: "org:member" });

      await expect(cache.getDecision(key)).resolves.toBeNull();
      await expect(cache.getDecision(otherKey)).resolves.toBeNull();
      expect(l2._raw("epoch:policy")).toBeDefined();
    });

    it("should invalidate everything without a target", async () => {
      await cache.setDecision(key, decision, await cache.captureEpochs("u1"), null);

      await cache.invalidate();

      await expect(cache.getDecision(key)).resolves.toBeNull();
      expect(cache.getStats().l1Size).toBe(0);
    });

    it("should be idempotent", async () => {
      await cache.invalidate({ subjectId: "u1" });
      await cache.invalidate({ subjectId: "u1" });

      await cache.setDecision(key, decision, await cache.captureEpochs("u1"), null);

      await expect(cache.getDecision(key)).resolves.not.toBeNull();
    });

    it("should reach another instance through L2 epochs", async () => {
      const other = createCache();
      await cache.setDecision(key, decision, await cache.captureEpochs("u1"), null);

      await cache.invalidate({ subjectId: "u1" });

      await expect(other.getDecision(key)).resolves.toBeNull();
      expect(other.getStats()).toMatchObject({ staleEntries: 1, misses: 1 });
    });

    it("should bump past the epoch another instance published", async () => {
      const other = createCache();
      await other.invalidate({ subjectId: "u1" });
      await other.invalidate({ subjectId: "u1" });

      await cache.invalidate({ subjectId: "u1" });

      expect(l2._raw("epoch:subject:u1")?.value).toMatch(/^3:/);
      await expect(cache.captureEpochs("u1")).resolves.toMatchObject({
        subject: expect.stringMatching(/^3:/),
      });
    });

    it("should not let a read in flight during invalidation restore the old epoch", async () => {
      const earlier = createCache();
      await earlier.invalidate({ subjectId: "u1" });
      await earlier.setDecision(
        key,
        decision,
        await earlier.captureEpochs("u1"),
        null,
      );

      // Entry, subject epoch and policy epoch reads of the lookup
      l2._holdReads(3);
      const inFlight = cache.getDecision(key);
      await cache.invalidate({ subjectId: "u1" });
      l2._releaseReads();

      await expect(inFlight).resolves.toBeNull();
      await expect(cache.getDecision(key)).resolves.toBeNull();
      await expect(cache.captureEpochs("u1")).resolves.toMatchObject({
        subject: expect.stringMatching(/^2:/),
      });
    });

    it("should drop L1 entries once a newer epoch is seen in L2", async () => {
      const other = createCache();
      await cache.setDecision(key, decision, await cache.captureEpochs("u1"), null);
      await other.getDecision(key);

      await cache.invalidate({ permissionId: "perm-batch-read" });
      await other.captureEpochs("u1");

      await expect(other.getDecision(key)).resolves.toBeNull();
      expect(other.getStats()).toMatchObject({ l2Hits: 1, staleEntries: 2 });
    });
  });

  describe("epoch ordering", () => {
    it("should order by counter before the random suffix", () => {
      expect(isNewerEpoch("2:aaa", "1:zzz")).toBe(true);
      expect(isNewerEpoch("10:aaa", "9:zzz")).toBe(true);
      expect(isNewerEpoch("1:zzz", "1:aaa")).toBe(true);
      expect(isNewerEpoch("1:aaa", "1:aaa")).toBe(false);
      expect(isNewerEpoch("1:aaa", "2:aaa")).toBe(false);
      expect(isNewerEpoch("1:aaa", "0")).toBe(true);
    });

    it("should never adopt an unreadable epoch", () => {
      expect(isNewerEpoch("garbage", "0")).toBe(false);
      expect(isNewerEpoch("1:aaa", "garbage")).toBe(true);
    });

    it("should number the next epoch above every known one", () => {
      expect(nextEpoch("0", null)).toMatch(/^1:/);
      expect(nextEpoch("4:abc", "7:def")).toMatch(/^8:/);
      expect(nextEpoch("garbage")).toMatch(/^1:/);
    });
  });

  describe("distributed tier failures", () => {
    it("should keep serving from L1 when L2 writes fail", async () => {
      l2._fail(true);

      await cache.setDecision(key, decision, await cache.captureEpochs("u1"), null);

      await expect(cache.getDecision(key)).resolves.not.toBeNull();
      expect(cache.getStats().l2Errors).toBe(2);
    });

    it("should treat a failing L2 read as a miss", async () => {
      l2._fail(true);

      await expect(cache.getDecision(key)).resolves.toBeNull();
      expect(cache.getStats()).toMatchObject({ misses: 1, l2Errors: 1 });
    });

    it("should fall back to local epochs", async () => {
      l2._fail(true);

      await expect(cache.captureEpochs("u1")).resolves.toEqual({
        subject: "0",
        policy: "0",
      });
    });

    it("should still invalidate locally", async () => {
      await cache.setDecision(key, decision, await cache.captureEpochs("u1"), null);
      l2._fail(true);

      await expect(cache.invalidate({ subjectId: "u1" })).resolves.toBeUndefined();
      await expect(cache.getDecision(key)).resolves.toBeNull();
      // Reading the published epochs, publishing the new one, the lookup
      expect(cache.getStats().l2Errors).toBe(3);
    });
  });

  describe("without a distributed tier", () => {
    it("should work from L1 alone", async () => {
      const local = new DecisionCache(null, options, clock.nowMs);

      await local.setDecision(key, decision, await local.captureEpochs("u1"), null);

      await expect(local.getDecision(key)).resolves.not.toBeNull();
      await local.invalidate({ subjectId: "u1" });
      await expect(local.getDecision(key)).resolves.toBeNull();
      expect(local.getStats()).toEqual({
        l1Size: 0,
        l1Hits: 1,
        l2Hits: 0,
        misses: 1,
        staleEntries: 0,
        l2Errors: 0,
      });
    });
  });
});
