import {
  CycleError,
  SelfImplicationError,
  ValidationError,
} from "src/core/errors.ts";
import {
  HierarchyGraph,
  hierarchyLockKeys,
  visibleNamespaces,
} from "src/core/hierarchy.ts";
import type { HierarchyRule } from "src/core/types.ts";
import {
  createHarness,
  entity,
  platform,
  tenant,
  user,
} from "tests/helpers/client.ts";
import { describe, expect, test } from "vitest";

function rule(
  permission: string,
  implies: string,
  namespace = "global",
): HierarchyRule {
  return {
    id: `${permission}-${implies}`,
    namespace,
    resourceType: "repo",
    permission,
    implies,
    createdAt: new Date(0),
  };
}

describe("HierarchyGraph", () => {
  const graph = new HierarchyGraph([
    rule("admin", "write"),
    rule("write", "read"),
    rule("owner", "admin"),
  ]);

  test("closure lists the permission first, then its implicants breadth-first", () => {
    expect(graph.closure("read", 50)).toEqual([
      { relation: "read", chain: ["read"] },
      { relation: "write", chain: ["write", "read"] },
      { relation: "admin", chain: ["admin", "write", "read"] },
      { relation: "owner", chain: ["owner", "admin", "write", "read"] },
    ]);
  });

  test("closure stops at the depth bound", () => {
    expect(
      graph.closure("read", 1).map((entry) => entry.relation),
    ).toEqual(["read", "write"]);
  });

  test("implied follows rules downward", () => {
    expect(
      [...graph.implied("admin", 50)].sort(),
    ).toEqual(["admin", "read", "write"]);
  });
});

describe("namespace helpers", () => {
  test("global sees only itself", () => {
    expect(visibleNamespaces("global")).toEqual(["global"]);
  });

  test("tenant sees global and itself", () => {
    expect(visibleNamespaces("acme")).toEqual(["global", "acme"]);
  });

  test("lock keys are sorted", () => {
    expect(hierarchyLockKeys("acme", "repo")).toEqual([
      "hierarchy\x1Facme\x1Frepo",
      "hierarchy\x1Fglobal\x1Frepo",
    ]);
  });
});

describe("Hierarchy Store", () => {
  test("transitivity: admin on a repo grants read", async () => {
    const { client } = createHarness();
    await client.addHierarchy(platform, "repo", "admin", "write");
    await client.addHierarchy(platform, "repo", "write", "read");
    await client.grant(tenant(), {
      resource: entity("repo", "x"),
      relation: "admin",
      subject: user("alice"),
    });

    expect(
      await client.check(tenant(), {
        subject: user("alice"),
        permission: "read",
        resource: entity("repo", "x"),
      }),
    ).toBe(true);
  });

  test("cycle rejection leaves exactly the first two rules", async () => {
    const { client } = createHarness();
    const ctx = tenant();
    await client.addHierarchy(ctx, "repo", "a", "b");
    await client.addHierarchy(ctx, "repo", "b", "c");

    await expect(
      client.addHierarchy(ctx, "repo", "c", "a"),
    ).rejects.toThrow(CycleError);
    await expect(client.addHierarchy(ctx, "repo", "c", "a")).rejects.toThrow(
      "Adding hierarchy rule repo: c -> a would create a cycle",
    );

    const rules = await client.listHierarchy(ctx, "repo");
    expect(rules.map((r) => [r.permission, r.implies])).toEqual([
      ["a", "b"],
      ["b", "c"],
    ]);
  });

  test("self implication is rejected", async () => {
    const { client } = createHarness();
    await expect(
      client.addHierarchy(tenant(), "repo", "read", "read"),
    ).rejects.toThrow(SelfImplicationError);
  });

  test("duplicate insertion returns the existing id", async () => {
    const { client } = createHarness();
    const first = await client.addHierarchy(tenant(), "repo", "write", "read");
    const second = await client.addHierarchy(tenant(), "repo", "write", "read");
    expect(second).toBe(first);
    expect(await client.listHierarchy(tenant(), "repo")).toHaveLength(1);
  });

  test("a tenant rule closing a cycle with global rules is rejected", async () => {
    const { client } = createHarness();
    await client.addHierarchy(platform, "repo", "admin", "write");
    await expect(
      client.addHierarchy(tenant(), "repo", "write", "admin"),
    ).rejects.toThrow(CycleError);
  });

  test("a global rule closing a cycle with a tenant's rules is rejected", async () => {
    const { client } = createHarness();
    await client.addHierarchy(tenant("acme"), "repo", "write", "admin");
    await client.addHierarchy(tenant("globex"), "repo", "read", "write");
    await expect(
      client.addHierarchy(platform, "repo", "admin", "write"),
    ).rejects.toThrow(CycleError);
    expect(
      await client.addHierarchy(platform, "repo", "triage", "read"),
    ).toEqual(expect.any(String));
  });

  test("tenants cannot clear global rules", async () => {
    const { client } = createHarness();
    await client.addHierarchy(platform, "repo", "admin", "write");
    await client.addHierarchy(tenant(), "repo", "owner", "admin");
    await client.addHierarchy(tenant(), "repo", "write", "read");

    expect(await client.clearHierarchy(tenant(), "repo")).toBe(2);
    const remaining = await client.listHierarchy(tenant(), "repo");
    expect(
      remaining.map((r) => [r.namespace, r.permission, r.implies]),
    ).toEqual([
      ["global", "admin", "write"],
    ]);
  });

  test("removeHierarchy reports whether a rule was removed", async () => {
    const { client } = createHarness();
    await client.addHierarchy(tenant(), "repo", "write", "read");
    expect(
      await client.removeHierarchy(tenant(), "repo", "write", "read"),
    ).toBe(true);
    expect(
      await client.removeHierarchy(tenant(), "repo", "write", "read"),
    ).toBe(false);
  });

  test("setHierarchy adds the chain atomically", async () => {
    const { client } = createHarness();
    await client.addHierarchy(tenant(), "repo", "read", "admin");

    await expect(
      client.setHierarchy(tenant(), "repo", "admin", "write", "read"),
    ).rejects.toThrow(CycleError);
    expect(await client.listHierarchy(tenant(), "repo")).toHaveLength(1);
  });

  test("setHierarchy needs at least two permissions", async () => {
    const { client } = createHarness();
    await expect(
      client.setHierarchy(tenant(), "repo", "admin"),
    ).rejects.toThrow(ValidationError);
  });

  test("listHierarchy shows global rules first", async () => {
    const { client } = createHarness();
    await client.addHierarchy(tenant(), "repo", "billing", "read");
    await client.addHierarchy(platform, "repo", "write", "read");
    await client.addHierarchy(platform, "repo", "admin", "write");

    const rules = await client.listHierarchy(tenant(), "repo");
    expect(
      rules.map((r) => `${r.namespace}:${r.permission}>${r.implies}`),
    ).toEqual([
      "global:admin>write",
      "global:write>read",
      "acme:billing>read",
    ]);
  });
});
