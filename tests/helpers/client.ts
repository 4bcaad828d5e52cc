import { type RelgraphOptions, resolveOptions } from "src/config.ts";
import { SegmentedAuditLog } from "src/core/audit.ts";
import type { AuthzContext, EntityRef } from "src/core/types.ts";
import { createRelgraph, type RelgraphClient } from "src/index.ts";
import { MemoryTupleStore } from "src/store/memory/adapter.ts";
import { TestClock } from "./clock.ts";

export interface TestHarness {
  client: RelgraphClient;
  store: MemoryTupleStore;
  audit: SegmentedAuditLog;
  clock: TestClock;
}

export function createHarness(options: RelgraphOptions = {}): TestHarness {
  const clock = new TestClock();
  const store = new MemoryTupleStore();
  const audit = new SegmentedAuditLog(clock.now);
  const client = createRelgraph(store, {
    clock: clock.now,
    auditSinks: [audit],
    ...options,
  });
  return { client, store, audit, clock };
}

/** Options as the engine sees them, for calling core functions directly. */
export function engineOptions(options: RelgraphOptions = {}) {
  return resolveOptions(options);
}

export function tenant(namespace = "acme"): AuthzContext {
  return { namespace, actorId: "admin-1", requestId: "req-1" };
}

export const platform: AuthzContext = { namespace: "global", actorId: "root" };

export function user(id: string): EntityRef {
  return { type: "user", id };
}

export function entity(type: string, id: string): EntityRef {
  return { type, id };
}
