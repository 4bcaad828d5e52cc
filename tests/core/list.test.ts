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

describe("List Engine", () => {
  let client: RelgraphClient;

  beforeAll(async () => {
    ({ client } = createHarness({ defaultListLimit: 3 }));
    await client.setHierarchy(platform, "repo", "admin", "write", "read");

    await client.grantMany(ctx, {
      resource: entity("repo", "api"),
      relation: "read",
      subjectType: "user",
      subjectIds: ["erin", "carl", "anna"],
    });
    await client.grant(ctx, {
      resource: entity("repo", "api"),
      relation: "admin",
      subject: user("dora"),
    });
    await client.grant(ctx, {
      resource: entity("repo", "api"),
      relation: "write",
      subject: { type: "team", id: "ops", relation: "member" },
    });
    await client.grant(ctx, {
      resource: entity("team", "ops"),
      relation: "member",
      subject: user("bill"),
    });
    await client.grant(ctx, {
      resource: entity("team", "ops"),
      relation: "member",
      subject: entity("bot", "ci"),
    });

    await client.grant(ctx, {
      resource: entity("repo", "web"),
      relation: "read",
      subject: entity("team", "ops"),
    });
    await client.grant(ctx, {
      resource: entity("repo", "docs"),
      relation: "admin",
      subject: user("bill"),
    });
    await client.grant(ctx, {
      resource: entity("folder", "f"),
      relation: "read",
      subject: user("bill"),
    });
    await client.grant(ctx, {
      resource: entity("repo", "zeta"),
      relation: "parent",
      subject: entity("folder", "f"),
    });
  });

  test("listUsers returns sorted ids truncated at the default limit", async () => {
    expect(
      await client.listUsers(ctx, {
        resource: entity("repo", "api"),
        permission: "read",
      }),
    ).toEqual([
      "anna",
      "bill",
      "carl",
    ]);
  });

  test("listUsers continues after the cursor", async () => {
    expect(
      await client.listUsers(ctx, {
        resource: entity("repo", "api"),
        permission: "read",
        cursor: "carl",
        limit: 10,
      }),
    ).toEqual(["dora", "erin"]);
  });

  test("listUsers honours the permission ladder", async () => {
    expect(
      await client.listUsers(ctx, {
        resource: entity("repo", "api"),
        permission: "write",
        limit: 10,
      }),
    ).toEqual(["bill", "dora"]);
  });

  test("listUsers collects other principal types on request", async () => {
    expect(
      await client.listUsers(ctx, {
        resource: entity("repo", "api"),
        permission: "read",
        subjectType: "bot",
      }),
    ).toEqual(["ci"]);
  });

  test("listResources follows groups, usersets, the ladder and parents", async () => {
    expect(
      await client.listResources(ctx, {
        subject: user("bill"),
        resourceType: "repo",
        permission: "read",
        limit: 10,
      }),
    ).toEqual(["api", "docs", "web", "zeta"]);
  });

  test("listResources applies limit and cursor", async () => {
    expect(
      await client.listResources(ctx, {
        subject: user("bill"),
        resourceType: "repo",
        permission: "read",
        cursor: "api",
        limit: 2,
      }),
    ).toEqual(["docs", "web"]);
  });

  test("listResources agrees with check for every candidate", async () => {
    const listed = await client.listResources(ctx, {
      subject: user("bill"),
      resourceType: "repo",
      permission: "write",
      limit: 10,
    });
    expect(listed).toEqual(["api", "docs"]);
    for (const id of ["api", "docs", "web", "zeta"]) {
      const allowed = await client.check(ctx, {
        subject: user("bill"),
        permission: "write",
        resource: entity("repo", id),
      });
      expect(allowed).toBe(listed.includes(id));
    }
  });

  test("a non-positive limit is rejected", async () => {
    await expect(
      client.listUsers(ctx, {
        resource: entity("repo", "api"),
        permission: "read",
        limit: 0,
      }),
    ).rejects.toThrow("limit must be a positive integer (got: 0)");
  });
});

describe("List Engine depth bounds", () => {
  test("a group first reached on a longer path is expanded again from a shorter one", async () => {
    const { client } = createHarness({ maxGroupDepth: 2 });
    await client.grant(ctx, {
      resource: entity("repo", "r"),
      relation: "read",
      subject: entity("team", "x"),
    });
    await client.grant(ctx, {
      resource: entity("team", "x"),
      relation: "member",
      subject: entity("team", "g"),
    });
    await client.grant(ctx, {
      resource: entity("team", "g"),
      relation: "member",
      subject: entity("team", "h"),
    });
    await client.grant(ctx, {
      resource: entity("team", "h"),
      relation: "member",
      subject: user("bob"),
    });
    await client.grant(ctx, {
      resource: entity("repo", "r"),
      relation: "read",
      subject: entity("team", "g"),
    });

    expect(
      await client.listUsers(ctx, {
        permission: "read",
        resource: entity("repo", "r"),
      }),
    ).toEqual(["bob"]);
    expect(
      await client.listResources(ctx, {
        subject: user("bob"),
        resourceType: "repo",
        permission: "read",
      }),
    ).toEqual(["r"]);
  });
});
