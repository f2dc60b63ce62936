/**
 * Unit Tests for Role Resolver
 */

import { RoleResolver } from "../src/modules/authz/resolver/RoleResolver";
import { PolicyIntegrityError } from "../src/modules/authz/errors/AuthorizationError";
import {
  FIXED_NOW,
  InMemoryPolicyStore,
  createInMemoryPolicyStore,
  seedOrganization,
} from "./utils/test-helpers";

const HOUR = 60 * 60 * 1000;

describe("RoleResolver", () => {
  let store: InMemoryPolicyStore;
  let resolver: RoleResolver;

  beforeEach(() => {
    store = createInMemoryPolicyStore();
    seedOrganization(store);
    resolver = new RoleResolver(store);
  });

  describe("acyclic hierarchies", () => {
    it("should return the assigned role and every ancestor", async () => {
      const resolved = await resolver.resolveEffectiveRoles("u2", FIXED_NOW);

      expect([...resolved.roles].sort()).toEqual(["org:member", "supplier"]);
      expect(resolved.integrityErrors).toEqual([]);
      expect(resolved.expiresAt).toBeNull();
    });

    it("should not include unrelated roles", async () => {
      store._addRole("admin");

      const resolved = await resolver.resolveEffectiveRoles("u1", FIXED_NOW);

      expect([...resolved.roles]).toEqual(["org:member"]);
    });

    it("should return no roles for a subject without assignments", async () => {
      const resolved = await resolver.resolveEffectiveRoles("nobody", FIXED_NOW);

      expect(resolved.roles.size).toBe(0);
      expect(resolved.expiresAt).toBeNull();
    });

    it("should load a shared ancestor once", async () => {
      store._assign("u2", "org:member");

      const resolved = await resolver.resolveEffectiveRoles("u2", FIXED_NOW);

      expect([...resolved.roles].sort()).toEqual(["org:member", "supplier"]);
      expect(store.getRole).toHaveBeenCalledTimes(2);
    });

    it("should not grant an assignment before it starts", async () => {
      const start = new Date(FIXED_NOW.getTime() + HOUR);
      store._assign("u3", "org:member", { validFrom: start });

      const resolved = await resolver.resolveEffectiveRoles("u3", FIXED_NOW);

      expect(resolved.roles.size).toBe(0);
      expect(resolved.expiresAt).toEqual(start);
    });

    it("should ignore expired assignments", async () => {
      store._assign("u3", "org:member", { validUntil: FIXED_NOW });

      const resolved = await resolver.resolveEffectiveRoles("u3", FIXED_NOW);

      expect(resolved.roles.size).toBe(0);
      expect(resolved.expiresAt).toBeNull();
    });

    it("should expire the role set when a pending assignment starts", async () => {
      const start = new Date(FIXED_NOW.getTime() + HOUR);
      store._addRole("viewer");
      store._assign("u1", "viewer", { validFrom: start });
      store._assign("u1", "supplier", {
        validUntil: new Date(FIXED_NOW.getTime() + 2 * HOUR),
      });

      const resolved = await resolver.resolveEffectiveRoles("u1", FIXED_NOW);

      expect([...resolved.roles].sort()).toEqual(["org:member", "supplier"]);
      expect(resolved.expiresAt).toEqual(start);
    });

    it("should report the earliest assignment expiry", async () => {
      const soon = new Date(FIXED_NOW.getTime() + HOUR);
      store._addRole("viewer");
      store._assign("u1", "viewer", { validUntil: soon });
      store._assign("u1", "supplier", {
        validUntil: new Date(FIXED_NOW.getTime() + 2 * HOUR),
      });

      const resolved = await resolver.resolveEffectiveRoles("u1", FIXED_NOW);

      expect(resolved.expiresAt).toEqual(soon);
    });
  });

  describe("integrity errors", () => {
    it("should drop a cyclic chain and keep the rest", async () => {
      store._addRole("a", "b", 1);
      store._addRole("b", "a", 0);
      store._addRole("viewer");
      store._assign("u3", "a");
      store._assign("u3", "viewer");

      const resolved = await resolver.resolveEffectiveRoles("u3", FIXED_NOW);

      expect([...resolved.roles]).toEqual(["viewer"]);
      expect(resolved.integrityErrors).toHaveLength(1);
      expect(resolved.integrityErrors[0]?.violation).toBe("ROLE_CYCLE");
      expect(resolved.integrityErrors[0]?.entityId).toBe("a");
      expect(resolved.integrityErrors[0]?.path).toEqual(["a", "b", "a"]);
    });

    it("should drop a chain with a dangling parent", async () => {
      store._addRole("orphan", "ghost", 1);
      store._assign("u3", "orphan", {
        validUntil: new Date(FIXED_NOW.getTime() + HOUR),
      });

      const resolved = await resolver.resolveEffectiveRoles("u3", FIXED_NOW);

      expect(resolved.roles.size).toBe(0);
      expect(resolved.expiresAt).toBeNull();
      expect(resolved.integrityErrors.map((e) => [e.violation, e.entityId, e.path])).toEqual([
        ["DANGLING_ROLE", "ghost", ["orphan", "ghost"]],
      ]);
    });

    it("should drop a chain through a role the store rejects", async () => {
      store._addRole("contractor", "broken", 1);
      store._failRole("broken", new PolicyIntegrityError("MALFORMED_ROLE", "broken"));
      store._assign("u3", "contractor");
      store._assign("u3", "org:member");

      const resolved = await resolver.resolveEffectiveRoles("u3", FIXED_NOW);

      expect([...resolved.roles]).toEqual(["org:member"]);
      expect(resolved.integrityErrors[0]?.violation).toBe("MALFORMED_ROLE");
    });

    it("should keep a role whose level does not sit below its parent", async () => {
      store._addRole("peer", "org:member", 0);
      store._assign("u3", "peer");

      const resolved = await resolver.resolveEffectiveRoles("u3", FIXED_NOW);

      expect([...resolved.roles].sort()).toEqual(["org:member", "peer"]);
      expect(resolved.integrityErrors.map((e) => [e.violation, e.entityId, e.path])).toEqual([
        ["LEVEL_ORDER", "peer", ["peer", "org:member"]],
      ]);
    });
  });

  it("should propagate store failures", async () => {
    store.getRole.mockRejectedValueOnce(new Error("connection reset"));

    await expect(
      resolver.resolveEffectiveRoles("u1", FIXED_NOW),
    ).rejects.toThrow("connection reset");
  });
});
