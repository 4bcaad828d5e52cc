import { KyselyTupleStore } from "src/store/kysely/adapter.ts";
import { createRecordingDb, queries } from "tests/helpers/recording-driver.ts";
import { describe, expect, test } from "vitest";

const scope = { namespace: "acme", now: new Date("2030-01-15T12:00:00.000Z") };

describe("KyselyTupleStore", () => {
  test("reads inside one repeatable read transaction", async () => {
    const { db, log } = createRecordingDb();
    const store = new KyselyTupleStore(db);

    const tuples = await store.read(scope, (reader) =>
      reader.findTuples({ resourceType: "repo", resourceId: "r" }),
    );

    expect(tuples).toEqual([]);
    expect(
      log[0],
    ).toEqual({ kind: "begin", isolationLevel: "repeatable read" });
    expect(log.at(-1)).toEqual({ kind: "commit" });
    const [select] = queries(log);
    expect(select?.sql).toMatch(/^select \* from "tuples" where /);
    expect(select?.sql).toMatch(/ order by "id"$/);
    expect(select?.parameters.slice(0, 3)).toEqual(["acme", "repo", "r"]);
    expect(select?.parameters).toContain(scope.now);
  });

  test("counts as zero when the database returns no row", async () => {
    const { db } = createRecordingDb();
    const store = new KyselyTupleStore(db);
    expect(
      await store.read(
        scope,
        (reader) => reader.countTuples({ expiry: "any" }),
      ),
    ).toBe(0);
  });

  test("skips the query when no namespace is visible", async () => {
    const { db, log } = createRecordingDb();
    const store = new KyselyTupleStore(db);

    const rules = await store.read(scope, (reader) =>
      reader.findHierarchyRules({ resourceType: "repo", namespaces: [] }),
    );

    expect(rules).toEqual([]);
    expect(queries(log)).toEqual([]);
  });

  test("takes transaction-scoped advisory locks in the given order", async () => {
    const { db, log } = createRecordingDb();
    const store = new KyselyTupleStore(db);

    await store.write(
      scope,
      (
        writer,
      ) => writer.acquireLocks(["acme\x1Fteam\x1Fb", "acme\x1Fteam\x1Fa"]),
    );

    expect(log[0]).toEqual({ kind: "begin", isolationLevel: null });
    expect(queries(log)).toEqual([
      {
        kind: "query",
        sql: "select pg_advisory_xact_lock(hashtext($1))",
        parameters: ["acme\x1Fteam\x1Fb"],
      },
      {
        kind: "query",
        sql: "select pg_advisory_xact_lock(hashtext($1))",
        parameters: ["acme\x1Fteam\x1Fa"],
      },
    ]);
  });

  test("rolls back when the transaction body throws", async () => {
    const { db, log } = createRecordingDb();
    const store = new KyselyTupleStore(db);

    await expect(
      store.write(scope, async (writer) => {
        await writer.acquireLocks(["k"]);
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    expect(
      log.map((entry) => entry.kind),
    ).toEqual(["begin", "query", "rollback"]);
  });

  test("deletes expired rows of the scope's namespace", async () => {
    const { db, log } = createRecordingDb();
    const store = new KyselyTupleStore(db);

    const deleted = await store.write(
      scope,
      (writer) => writer.deleteTuples({ expiry: "expired" }),
    );

    expect(deleted).toEqual([]);
    const [remove] = queries(log);
    expect(remove?.sql).toMatch(/^delete from "tuples" where /);
    expect(remove?.sql).toMatch(/ returning \*$/);
    expect(remove?.parameters).toEqual(["acme", scope.now]);
  });

  test("stores a missing subject relation as the empty string", async () => {
    const { db, log } = createRecordingDb();
    const store = new KyselyTupleStore(db);
    const expiresAt = new Date("2030-02-01T00:00:00.000Z");

    const updated = await store.write(scope, (writer) =>
      writer.updateExpiration(
        {
          namespace: "acme",
          resourceType: "repo",
          resourceId: "r",
          relation: "read",
          subjectType: "user",
          subjectId: "ann",
          subjectRelation: null,
        },
        expiresAt,
      ),
    );

    expect(updated).toBeNull();
    expect(
      queries(log)[0]?.parameters,
    ).toEqual([expiresAt, "acme", "repo", "r", "read", "user", "ann", ""]);
  });
});
