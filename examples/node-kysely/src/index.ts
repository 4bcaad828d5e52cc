import { Kysely, PostgresDialect } from "kysely";
import pg from "pg";
import {
  type AuthzContext,
  createLogger,
  createRelgraph,
  type DB,
  databaseConfigFromEnv,
  KyselyTupleStore,
  migrateToLatest,
  optionsFromEnv,
} from "../../../src/index.ts";

// ── Connect to PostgreSQL ──────────────────────────────────────────

const db = new Kysely<DB>({
  dialect: new PostgresDialect({
    pool: new pg.Pool(databaseConfigFromEnv()),
  }),
});

await migrateToLatest(db);

const relgraph = createRelgraph(new KyselyTupleStore(db), {
  ...optionsFromEnv(),
  logger: createLogger({ level: "debug", context: "example" }),
});

const ctx: AuthzContext = { namespace: "example", actorId: "setup" };

// ── Permission hierarchy: admin ⇒ write ⇒ read on repo ─────────────

await relgraph.setHierarchy(ctx, "repo", "admin", "write", "read");

// ── Relationships ──────────────────────────────────────────────────
//
//   team:platform   member  user:alice
//   team:backend    member  team:platform
//   repo:api        write   team:backend#member
//   repo:api        read    user:bob (expires in one hour)

await relgraph.grant(ctx, {
  resource: { type: "team", id: "platform" },
  relation: "member",
  subject: { type: "user", id: "alice" },
});
await relgraph.grant(ctx, {
  resource: { type: "team", id: "backend" },
  relation: "member",
  subject: { type: "team", id: "platform" },
});
await relgraph.grant(ctx, {
  resource: { type: "repo", id: "api" },
  relation: "write",
  subject: { type: "team", id: "backend", relation: "member" },
});
await relgraph.grant(ctx, {
  resource: { type: "repo", id: "api" },
  relation: "read",
  subject: { type: "user", id: "bob" },
  expiresAt: new Date(Date.now() + 60 * 60 * 1000),
});

// ── Run permission checks ──────────────────────────────────────────

const checks = [
  { user: "alice", permission: "read" },
  { user: "alice", permission: "write" },
  { user: "alice", permission: "admin" },
  { user: "bob", permission: "read" },
  { user: "bob", permission: "write" },
];

console.log("Permission checks for repo:api\n");

for (const { user, permission } of checks) {
  const allowed = await relgraph.check(ctx, {
    subject: { type: "user", id: user },
    permission,
    resource: { type: "repo", id: "api" },
  });
  console.log("  %s → %s: %s", user, permission, allowed);
}

const explanation = await relgraph.explain(ctx, {
  subject: { type: "user", id: "alice" },
  permission: "read",
  resource: { type: "repo", id: "api" },
});
console.log("\nWhy alice can read repo:api:\n%s", explanation.text);

const readers = await relgraph.listUsers(ctx, {
  permission: "read",
  resource: { type: "repo", id: "api" },
});
console.log("\nReaders of repo:api: %s", readers.join(", "));

// ── Clean up ───────────────────────────────────────────────────────

await relgraph.revokeResourceGrants(ctx, { type: "repo", id: "api" });
await relgraph.revokeResourceGrants(ctx, { type: "team", id: "backend" });
await relgraph.revokeResourceGrants(ctx, { type: "team", id: "platform" });
await relgraph.clearHierarchy(ctx, "repo");

await db.destroy();
