import type { AuthzContext, CheckRequest } from "src/core/types.ts";
import type { RelgraphClient } from "src/index.ts";
import { expect } from "vitest";

/**
 * Assert that check, explain, listResources and listUsers all agree on one
 * permission question, and that the answer is `expected`.
 */
export async function expectConformance(
  client: RelgraphClient,
  ctx: AuthzContext,
  params: CheckRequest,
  expected: boolean,
): Promise<void> {
  const [allowed, explanation, resources, users] = await Promise.all([
    client.check(ctx, params),
    client.explain(ctx, params),
    client.listResources(ctx, {
      subject: params.subject,
      resourceType: params.resource.type,
      permission: params.permission,
      limit: 1000,
    }),
    client.listUsers(ctx, {
      resource: params.resource,
      permission: params.permission,
      subjectType: params.subject.type,
      limit: 1000,
    }),
  ]);

  expect(allowed).toBe(expected);
  expect(explanation.allowed).toBe(expected);
  if (expected) {
    expect(explanation.path.length).toBeGreaterThan(0);
  } else {
    expect(explanation.path).toEqual([]);
  }
  expect(resources.includes(params.resource.id)).toBe(expected);
  expect(users.includes(params.subject.id)).toBe(expected);
}
