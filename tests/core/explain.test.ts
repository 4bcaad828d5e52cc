import type { CheckRequest } from "src/core/types.ts";
import type { RelgraphClient } from "src/index.ts";
import {
  createHarness,
  entity,
  platform,
  tenant,
  user,
} from "tests/helpers/client.ts";
import { beforeAll, describe, expect, test } from "vitest";

const ctx = tenant();

describe("explain", () => {
  let client: RelgraphClient;

  beforeAll(async () => {
    ({ client } = createHarness());
    await client.setHierarchy(platform, "repo", "admin", "write", "read");
    await client.grant(ctx, {
      resource: entity("repo", "api"),
      relation: "read",
      subject: user("ann"),
    });
    await client.grant(ctx, {
      resource: entity("repo", "api"),
      relation: "write",
      subject: { type: "team", id: "eng", relation: "member" },
    });
    await client.grant(ctx, {
      resource: entity("team", "eng"),
      relation: "member",
      subject: entity("team", "core"),
    });
    await client.grant(ctx, {
      resource: entity("team", "core"),
      relation: "member",
      subject: user("ben"),
    });
    await client.grant(ctx, {
      resource: entity("folder", "f"),
      relation: "admin",
      subject: user("cat"),
    });
    await client.grant(ctx, {
      resource: entity("repo", "api"),
      relation: "parent",
      subject: entity("folder", "f"),
    });
  });

  test("direct grant", async () => {
    const explanation = await client.explain(ctx, {
      subject: user("ann"),
      permission: "read",
      resource: entity("repo", "api"),
    });
    expect(explanation.allowed).toBe(true);
    expect(explanation.text).toBe("DIRECT: user:ann has read on repo:api");
  });

  test("hierarchy, userset and nested group steps", async () => {
    const explanation = await client.explain(ctx, {
      subject: user("ben"),
      permission: "read",
      resource: entity("repo", "api"),
    });
    expect(
      explanation.path.map((step) => step.kind),
    ).toEqual(["hierarchy", "userset", "group", "direct"]);
    expect(explanation.text.split("\n")).toEqual([
      "HIERARCHY: write -> read on repo",
      "USERSET: team:eng#member has write on repo:api",
      "GROUP: team:core has member on team:eng",
      "DIRECT: user:ben has member on team:core",
    ]);
  });

  test("inheritance from a parent resource", async () => {
    const explanation = await client.explain(ctx, {
      subject: user("cat"),
      permission: "admin",
      resource: entity("repo", "api"),
    });
    expect(explanation.text.split("\n")).toEqual([
      "RESOURCE: repo:api is contained in folder:f",
      "DIRECT: user:cat has admin on folder:f",
    ]);
  });

  test("denial reports no access", async () => {
    const explanation = await client.explain(ctx, {
      subject: user("dan"),
      permission: "write",
      resource: entity("repo", "api"),
    });
    expect(explanation).toEqual({
      allowed: false,
      path: [],
      text: "NO ACCESS: user:dan does not have write on repo:api",
    });
  });

  test("explain agrees with check", async () => {
    const requests: CheckRequest[] = [];
    for (const name of ["ann", "ben", "cat", "dan"]) {
      for (const permission of ["read", "write", "admin"]) {
        requests.push({
          subject: user(name),
          permission,
          resource: entity("repo", "api"),
        });
      }
    }
    for (const request of requests) {
      const allowed = await client.check(ctx, request);
      const explanation = await client.explain(ctx, request);
      expect(explanation.allowed).toBe(allowed);
      expect(explanation.path.length > 0).toBe(allowed);
    }
  });
});
