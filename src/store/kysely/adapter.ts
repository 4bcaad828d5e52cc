import {
	type Expression,
	type ExpressionBuilder,
	type Kysely,
	type SqlBool,
	sql,
} from "kysely";
import type {
	HierarchyRule,
	NewHierarchyRule,
	NewTuple,
	Tuple,
	TupleKey,
} from "../../core/types.ts";
import type {
	GraphReader,
	GraphWriter,
	HierarchyQuery,
	InsertResult,
	StoreScope,
	TupleQuery,
	TupleStore,
} from "../interface.ts";
import type { DB, HierarchyRow, TupleRow } from "./schema.ts";

const TUPLE_KEY_COLUMNS = [
	"namespace",
	"resource_type",
	"resource_id",
	"relation",
	"subject_type",
	"subject_id",
	"subject_relation",
] as const;

const HIERARCHY_KEY_COLUMNS = [
	"namespace",
	"resource_type",
	"permission",
	"implies",
] as const;

function toTuple(row: TupleRow): Tuple {
	return {
		id: row.id,
		namespace: row.namespace,
		resourceType: row.resource_type,
		resourceId: row.resource_id,
		relation: row.relation,
		subjectType: row.subject_type,
		subjectId: row.subject_id,
		subjectRelation: row.subject_relation === "" ? null : row.subject_relation,
		createdAt: row.created_at,
		expiresAt: row.expires_at,
	};
}

function toRule(row: HierarchyRow): HierarchyRule {
	return {
		id: row.id,
		namespace: row.namespace,
		resourceType: row.resource_type,
		permission: row.permission,
		implies: row.implies,
		createdAt: row.created_at,
	};
}

function tupleFilter(namespace: string, now: Date, query: TupleQuery) {
	return (eb: ExpressionBuilder<DB, "tuples">): Expression<SqlBool> => {
		const conditions: Expression<SqlBool>[] = [eb("namespace", "=", namespace)];
		if (query.resourceType !== undefined) {
			conditions.push(eb("resource_type", "=", query.resourceType));
		}
		if (query.resourceId !== undefined) {
			conditions.push(eb("resource_id", "=", query.resourceId));
		}
		if (query.relation !== undefined) {
			conditions.push(eb("relation", "=", query.relation));
		}
		if (query.subjectType !== undefined) {
			conditions.push(eb("subject_type", "=", query.subjectType));
		}
		if (query.subjectId !== undefined) {
			conditions.push(eb("subject_id", "=", query.subjectId));
		}
		if (query.subjectRelation !== undefined) {
			conditions.push(eb("subject_relation", "=", query.subjectRelation ?? ""));
		}
		if (query.expiresBefore !== undefined) {
			conditions.push(eb("expires_at", "<=", query.expiresBefore));
		}
		switch (query.expiry ?? "active") {
			case "active":
				conditions.push(
					eb.or([eb("expires_at", "is", null), eb("expires_at", ">", now)]),
				);
				break;
			case "expired":
				conditions.push(eb("expires_at", "<=", now));
				break;
			case "any":
				break;
		}
		return eb.and(conditions);
	};
}

function keyFilter(key: TupleKey) {
	return (eb: ExpressionBuilder<DB, "tuples">): Expression<SqlBool> =>
		eb.and([
			eb("namespace", "=", key.namespace),
			eb("resource_type", "=", key.resourceType),
			eb("resource_id", "=", key.resourceId),
			eb("relation", "=", key.relation),
			eb("subject_type", "=", key.subjectType),
			eb("subject_id", "=", key.subjectId),
			eb("subject_relation", "=", key.subjectRelation ?? ""),
		]);
}

function ruleFilter(query: HierarchyQuery) {
	return (
		eb: ExpressionBuilder<DB, "permission_hierarchy">,
	): Expression<SqlBool> => {
		const conditions: Expression<SqlBool>[] = [
			eb("resource_type", "=", query.resourceType),
		];
		if (query.namespaces !== undefined) {
			conditions.push(eb("namespace", "in", query.namespaces));
		}
		if (query.permission !== undefined) {
			conditions.push(eb("permission", "=", query.permission));
		}
		if (query.implies !== undefined) {
			conditions.push(eb("implies", "=", query.implies));
		}
		return eb.and(conditions);
	};
}

class KyselyGraphReader implements GraphReader {
	readonly namespace: string;
	readonly now: Date;

	constructor(
		protected readonly db: Kysely<DB>,
		scope: StoreScope,
	) {
		this.namespace = scope.namespace;
		this.now = scope.now;
	}

	async findTuples(query: TupleQuery): Promise<Tuple[]> {
		const rows = await this.db
			.selectFrom("tuples")
			.selectAll()
			.where(tupleFilter(this.namespace, this.now, query))
			.orderBy("id")
			.execute();
		return rows.map(toTuple);
	}

	async countTuples(query: TupleQuery): Promise<number> {
		const row = await this.db
			.selectFrom("tuples")
			.select((eb) => eb.fn.countAll<string>().as("count"))
			.where(tupleFilter(this.namespace, this.now, query))
			.executeTakeFirst();
		return Number(row?.count ?? 0);
	}

	async findHierarchyRules(query: HierarchyQuery): Promise<HierarchyRule[]> {
		if (query.namespaces?.length === 0) return [];
		const rows = await this.db
			.selectFrom("permission_hierarchy")
			.selectAll()
			.where(ruleFilter(query))
			.orderBy("id")
			.execute();
		return rows.map(toRule);
	}

	async countHierarchyRules(): Promise<number> {
		const row = await this.db
			.selectFrom("permission_hierarchy")
			.select((eb) => eb.fn.countAll<string>().as("count"))
			.where("namespace", "=", this.namespace)
			.executeTakeFirst();
		return Number(row?.count ?? 0);
	}
}

class KyselyGraphWriter extends KyselyGraphReader implements GraphWriter {
	async acquireLocks(keys: string[]): Promise<void> {
		for (const key of keys) {
			await sql`select pg_advisory_xact_lock(hashtext(${key}))`.execute(
				this.db,
			);
		}
	}

	async insertTuple(tuple: NewTuple): Promise<InsertResult<Tuple>> {
		const row = await this.db
			.insertInto("tuples")
			.values({
				namespace: tuple.namespace,
				resource_type: tuple.resourceType,
				resource_id: tuple.resourceId,
				relation: tuple.relation,
				subject_type: tuple.subjectType,
				subject_id: tuple.subjectId,
				subject_relation: tuple.subjectRelation ?? "",
				created_at: this.now,
				expires_at: tuple.expiresAt,
			})
			.onConflict((oc) =>
				oc
					.columns(TUPLE_KEY_COLUMNS)
					.doUpdateSet({ expires_at: (eb) => eb.ref("excluded.expires_at") }),
			)
			.returningAll()
			// xmax is zero only on a freshly inserted row version.
			.returning(sql<boolean>`(xmax = 0)`.as("inserted"))
			.executeTakeFirstOrThrow();
		return { row: toTuple(row), created: row.inserted };
	}

	async updateExpiration(
		key: TupleKey,
		expiresAt: Date | null,
	): Promise<Tuple | null> {
		const row = await this.db
			.updateTable("tuples")
			.set({ expires_at: expiresAt })
			.where(keyFilter(key))
			.returningAll()
			.executeTakeFirst();
		return row ? toTuple(row) : null;
	}

	async deleteTuples(query: TupleQuery): Promise<Tuple[]> {
		const rows = await this.db
			.deleteFrom("tuples")
			.where(tupleFilter(this.namespace, this.now, query))
			.returningAll()
			.execute();
		return rows.map(toTuple);
	}

	async insertHierarchyRule(
		rule: NewHierarchyRule,
	): Promise<InsertResult<HierarchyRule>> {
		const inserted = await this.db
			.insertInto("permission_hierarchy")
			.values({
				namespace: rule.namespace,
				resource_type: rule.resourceType,
				permission: rule.permission,
				implies: rule.implies,
				created_at: this.now,
			})
			.onConflict((oc) => oc.columns(HIERARCHY_KEY_COLUMNS).doNothing())
			.returningAll()
			.executeTakeFirst();
		if (inserted) return { row: toRule(inserted), created: true };

		const existing = await this.db
			.selectFrom("permission_hierarchy")
			.selectAll()
			.where(
				ruleFilter({
					resourceType: rule.resourceType,
					namespaces: [rule.namespace],
					permission: rule.permission,
					implies: rule.implies,
				}),
			)
			.executeTakeFirstOrThrow();
		return { row: toRule(existing), created: false };
	}

	async deleteHierarchyRules(
		query: HierarchyQuery & { namespaces: string[] },
	): Promise<HierarchyRule[]> {
		if (query.namespaces.length === 0) return [];
		const rows = await this.db
			.deleteFrom("permission_hierarchy")
			.where(ruleFilter(query))
			.returningAll()
			.execute();
		return rows.map(toRule);
	}
}

/**
 * PostgreSQL store. Reads run in one `repeatable read` transaction so every
 * traversal step sees the same snapshot; writes run in one transaction and
 * lock through transaction-scoped advisory locks.
 */
export class KyselyTupleStore implements TupleStore {
	constructor(private readonly db: Kysely<DB>) {}

	read<T>(
		scope: StoreScope,
		fn: (reader: GraphReader) => Promise<T>,
	): Promise<T> {
		return this.db
			.transaction()
			.setIsolationLevel("repeatable read")
			.execute((trx) => fn(new KyselyGraphReader(trx, scope)));
	}

	write<T>(
		scope: StoreScope,
		fn: (writer: GraphWriter) => Promise<T>,
	): Promise<T> {
		return this.db
			.transaction()
			.execute((trx) => fn(new KyselyGraphWriter(trx, scope)));
	}
}
