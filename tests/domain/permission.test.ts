/**
 * Unit Tests for Permission Entity and scope ordering
 */

import { Permission, WILDCARD } from "../../src/domain/entities/Permission";
import {
  compareSpecificity,
  isScope,
  scopeCovers,
  Scope,
} from "../../src/domain/value-objects/Scope";

describe("Permission Entity", () => {
  describe("Creation", () => {
    it("should default to an unconditional allow with priority 0", () => {
      const permission = new Permission("p1", "batch", "read", "organization");

      expect(permission.effect).toBe("allow");
      expect(permission.priority).toBe(0);
      expect(permission.conditions).toBeUndefined();
      expect(permission.hasConditions()).toBe(false);
    });

    it("should reject an empty id", () => {
      expect(() => new Permission("", "batch", "read", "global")).toThrow(
        "Permission ID is required",
      );
    });

    it("should reject a blank resource or action", () => {
      expect(() => new Permission("p1", " ", "read", "global")).toThrow(
        "Resource is required",
      );
      expect(() => new Permission("p1", "batch", "", "global")).toThrow(
        "Action is required",
      );
    });
  });

  describe("matches", () => {
    it("should match the exact resource and action", () => {
      const permission = new Permission("p1", "batch", "read", "global");

      expect(permission.matches("batch", "read")).toBe(true);
      expect(permission.matches("batch", "delete")).toBe(false);
      expect(permission.matches("invoice", "read")).toBe(false);
      expect(permission.isWildcard()).toBe(false);
    });

    it("should match any action with a wildcard action", () => {
      const permission = new Permission("p1", "batch", WILDCARD, "global");

      expect(permission.matches("batch", "delete")).toBe(true);
      expect(permission.matches("invoice", "delete")).toBe(false);
      expect(permission.isWildcard()).toBe(true);
    });

    it("should match any resource with a wildcard resource", () => {
      const permission = new Permission("p1", WILDCARD, "read", "global");

      expect(permission.matches("invoice", "read")).toBe(true);
      expect(permission.matches("invoice", "write")).toBe(false);
    });
  });

  describe("covers", () => {
    it("should cover requests at the same or a narrower scope", () => {
      const permission = new Permission("p1", "batch", "read", "organization");

      expect(permission.covers("organization")).toBe(true);
      expect(permission.covers("channel")).toBe(true);
      expect(permission.covers("public")).toBe(true);
      expect(permission.covers("global")).toBe(false);
    });
  });

  describe("toSnapshot", () => {
    it("should omit absent conditions and description", () => {
      const permission = new Permission("p1", "batch", "read", "self", "deny", 5);

      expect(permission.toSnapshot()).toEqual({
        id: "p1",
        resource: "batch",
        action: "read",
        scope: "self",
        effect: "deny",
        priority: 5,
      });
    });

    it("should restore an equivalent permission from a snapshot", () => {
      const permission = new Permission(
        "p1",
        "batch",
        "read",
        "channel",
        "allow",
        1,
        { kind: "attributeEquals", attribute: "subject.department", value: "ops" },
        "Channel read",
      );

      const restored = Permission.fromSnapshot(permission.toSnapshot());

      expect(restored.toSnapshot()).toEqual(permission.toSnapshot());
      expect(restored.hasConditions()).toBe(true);
      expect(restored.description).toBe("Channel read");
    });
  });
});

describe("Scope", () => {
  it("should recognise only the known scopes", () => {
    expect(isScope("organization")).toBe(true);
    expect(isScope("team")).toBe(false);
  });

  it("should treat a broader grant as covering a narrower request", () => {
    expect(scopeCovers("global", "self")).toBe(true);
    expect(scopeCovers("self", "self")).toBe(true);
    expect(scopeCovers("channel", "organization")).toBe(false);
  });

  it("should sort the narrowest scope first", () => {
    const scopes: Scope[] = ["global", "public", "channel", "organization", "self"];

    expect([...scopes].sort(compareSpecificity)).toEqual([
      "public",
      "self",
      "channel",
      "organization",
      "global",
    ]);
  });
});
