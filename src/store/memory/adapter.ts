import {
	entityKey,
	isActive,
	tupleKeyString,
	tupleLockKey,
} from "../../core/refs.ts";
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
import { KeyedMutex } from "./keyed-mutex.ts";
import { type IndexLookup, VersionedTable } from "./versioned-table.ts";

/** True when a query field is set and the row's value is different. */
function differs<T>(wanted: T | undefined, actual: T): boolean {
	return wanted !== undefined && wanted !== actual;
}

function matchesTuple(tuple: Tuple, query: TupleQuery, now: Date): boolean {
	if (
		differs(query.resourceType, tuple.resourceType) ||
		differs(query.resourceId, tuple.resourceId) ||
		differs(query.relation, tuple.relation) ||
		differs(query.subjectType, tuple.subjectType) ||
		differs(query.subjectId, tuple.subjectId) ||
		differs(query.subjectRelation, tuple.subjectRelation)
	) {
		return false;
	}
	if (query.expiresBefore !== undefined) {
		if (tuple.expiresAt === null) return false;
		if (tuple.expiresAt.getTime() > query.expiresBefore.getTime()) {
			return false;
		}
	}
	switch (query.expiry ?? "active") {
		case "active":
			return isActive(tuple, now);
		case "expired":
			return !isActive(tuple, now);
		case "any":
			return true;
	}
}

function matchesRule(rule: HierarchyRule, query: HierarchyQuery): boolean {
	if (rule.resourceType !== query.resourceType) return false;
	if (query.namespaces && !query.namespaces.includes(rule.namespace)) {
		return false;
	}
	return (
		!differs(query.permission, rule.permission) &&
		!differs(query.implies, rule.implies)
	);
}

function tupleLookup(namespace: string, query: TupleQuery): IndexLookup {
	if (query.resourceType !== undefined && query.resourceId !== undefined) {
		return {
			index: "resource",
			key: entityKey(namespace, {
				type: query.resourceType,
				id: query.resourceId,
			}),
		};
	}
	if (query.subjectType !== undefined && query.subjectId !== undefined) {
		return {
			index: "subject",
			key: entityKey(namespace, {
				type: query.subjectType,
				id: query.subjectId,
			}),
		};
	}
	return { index: "namespace", key: namespace };
}

function ruleKeyString(rule: NewHierarchyRule): string {
	return [
		rule.namespace,
		rule.resourceType,
		rule.permission,
		rule.implies,
	].join("\x1F");
}

/** Row source a reader works against: a snapshot, or a transaction overlay. */
interface RowSource {
	tuples(lookup: IndexLookup): Tuple[];
	rules(lookup: IndexLookup): HierarchyRule[];
}

class MemoryGraphReader implements GraphReader {
	constructor(
		readonly namespace: string,
		readonly now: Date,
		protected readonly source: RowSource,
	) {}

	async findTuples(query: TupleQuery): Promise<Tuple[]> {
		return this.source
			.tuples(tupleLookup(this.namespace, query))
			.filter(
				(tuple) =>
					tuple.namespace === this.namespace &&
					matchesTuple(tuple, query, this.now),
			);
	}

	async countTuples(query: TupleQuery): Promise<number> {
		return (await this.findTuples(query)).length;
	}

	async findHierarchyRules(query: HierarchyQuery): Promise<HierarchyRule[]> {
		return this.source
			.rules({ index: "type", key: query.resourceType })
			.filter((rule) => matchesRule(rule, query));
	}

	async countHierarchyRules(): Promise<number> {
		return this.source
			.rules({ index: "namespace", key: this.namespace })
			.filter((rule) => rule.namespace === this.namespace).length;
	}
}

interface MemoryTransaction {
	insertedTuples: Tuple[];
	deletedTuples: Set<Tuple>;
	insertedRules: HierarchyRule[];
	deletedRules: Set<HierarchyRule>;
	heldLocks: Set<string>;
	releases: Array<() => void>;
}

class MemoryGraphWriter extends MemoryGraphReader implements GraphWriter {
	constructor(
		namespace: string,
		now: Date,
		source: RowSource,
		private readonly tx: MemoryTransaction,
		private readonly mutex: KeyedMutex,
		private readonly nextId: () => string,
	) {
		super(namespace, now, source);
	}

	async acquireLocks(keys: string[]): Promise<void> {
		for (const key of keys) {
			if (this.tx.heldLocks.has(key)) continue;
			this.tx.heldLocks.add(key);
			this.tx.releases.push(await this.mutex.acquire(key));
		}
	}

	async insertTuple(tuple: NewTuple): Promise<InsertResult<Tuple>> {
		// Serialises writers of the same key, like a unique index would.
		await this.acquireLocks([tupleLockKey(tuple)]);
		const existing = this.findByKey(tuple);
		if (existing) {
			const row = this.replaceExpiry(existing, tuple.expiresAt);
			return { row, created: false };
		}
		const row: Tuple = { ...tuple, id: this.nextId(), createdAt: this.now };
		this.tx.insertedTuples.push(row);
		return { row, created: true };
	}

	async updateExpiration(
		key: TupleKey,
		expiresAt: Date | null,
	): Promise<Tuple | null> {
		await this.acquireLocks([tupleLockKey(key)]);
		const existing = this.findByKey(key);
		return existing ? this.replaceExpiry(existing, expiresAt) : null;
	}

	/**
	 * Locks every matched key, then matches again: a transaction that held
	 * one of the locks may have replaced the row in the meantime.
	 */
	async deleteTuples(query: TupleQuery): Promise<Tuple[]> {
		const matched = await this.findTuples(query);
		await this.acquireLocks([...new Set(matched.map(tupleLockKey))].sort());
		const doomed = await this.findTuples(query);
		for (const tuple of doomed) this.removeTuple(tuple);
		return doomed;
	}

	async insertHierarchyRule(
		rule: NewHierarchyRule,
	): Promise<InsertResult<HierarchyRule>> {
		const [existing] = await this.findHierarchyRules({
			resourceType: rule.resourceType,
			namespaces: [rule.namespace],
			permission: rule.permission,
			implies: rule.implies,
		});
		if (existing) return { row: existing, created: false };
		const row: HierarchyRule = {
			...rule,
			id: this.nextId(),
			createdAt: this.now,
		};
		this.tx.insertedRules.push(row);
		return { row, created: true };
	}

	async deleteHierarchyRules(
		query: HierarchyQuery & { namespaces: string[] },
	): Promise<HierarchyRule[]> {
		const doomed = await this.findHierarchyRules(query);
		for (const rule of doomed) {
			const index = this.tx.insertedRules.indexOf(rule);
			if (index === -1) {
				this.tx.deletedRules.add(rule);
			} else {
				this.tx.insertedRules.splice(index, 1);
			}
		}
		return doomed;
	}

	private findByKey(key: TupleKey): Tuple | undefined {
		const wanted = tupleKeyString(key);
		return this.source
			.tuples({ index: "unique", key: wanted })
			.find((tuple) => tupleKeyString(tuple) === wanted);
	}

	private replaceExpiry(existing: Tuple, expiresAt: Date | null): Tuple {
		if (existing.expiresAt?.getTime() === expiresAt?.getTime()) return existing;
		this.removeTuple(existing);
		const row: Tuple = { ...existing, expiresAt };
		this.tx.insertedTuples.push(row);
		return row;
	}

	private removeTuple(tuple: Tuple): void {
		const index = this.tx.insertedTuples.indexOf(tuple);
		if (index === -1) {
			this.tx.deletedTuples.add(tuple);
		} else {
			this.tx.insertedTuples.splice(index, 1);
		}
	}
}

/**
 * In-process store keeping the relationship graph as hash-indexed adjacency:
 * a forward index by resource, a reverse index by subject and a unique index
 * by tuple key.
 *
 * Writes are staged per transaction and applied in one step on commit. Reads
 * pin the version current when they start and never wait for writers.
 */
export class MemoryTupleStore implements TupleStore {
	private version = 0;
	private idSequence = 0;
	private readonly activeReaders = new Map<number, number>();
	private readonly mutex = new KeyedMutex();

	private readonly tuples = new VersionedTable<Tuple>({
		resource: (t) =>
			entityKey(t.namespace, { type: t.resourceType, id: t.resourceId }),
		subject: (t) =>
			entityKey(t.namespace, { type: t.subjectType, id: t.subjectId }),
		unique: (t) => tupleKeyString(t),
		namespace: (t) => t.namespace,
	});

	private readonly rules = new VersionedTable<HierarchyRule>({
		type: (r) => r.resourceType,
		namespace: (r) => r.namespace,
		unique: (r) => ruleKeyString(r),
	});

	async read<T>(
		scope: StoreScope,
		fn: (reader: GraphReader) => Promise<T>,
	): Promise<T> {
		const version = this.version;
		this.activeReaders.set(version, (this.activeReaders.get(version) ?? 0) + 1);
		try {
			return await fn(
				new MemoryGraphReader(scope.namespace, scope.now, {
					tuples: (lookup) => this.tuples.rows(version, lookup),
					rules: (lookup) => this.rules.rows(version, lookup),
				}),
			);
		} finally {
			const remaining = (this.activeReaders.get(version) ?? 1) - 1;
			if (remaining === 0) {
				this.activeReaders.delete(version);
			} else {
				this.activeReaders.set(version, remaining);
			}
			this.prune();
		}
	}

	async write<T>(
		scope: StoreScope,
		fn: (writer: GraphWriter) => Promise<T>,
	): Promise<T> {
		const tx: MemoryTransaction = {
			insertedTuples: [],
			deletedTuples: new Set(),
			insertedRules: [],
			deletedRules: new Set(),
			heldLocks: new Set(),
			releases: [],
		};
		const overlay = <Row>(
			committed: Row[],
			inserted: Row[],
			deleted: Set<Row>,
		) => committed.filter((row) => !deleted.has(row)).concat(inserted);
		const writer = new MemoryGraphWriter(
			scope.namespace,
			scope.now,
			{
				tuples: (lookup) =>
					overlay(
						this.tuples.rows(this.version, lookup),
						tx.insertedTuples,
						tx.deletedTuples,
					),
				rules: (lookup) =>
					overlay(
						this.rules.rows(this.version, lookup),
						tx.insertedRules,
						tx.deletedRules,
					),
			},
			tx,
			this.mutex,
			() => String(++this.idSequence),
		);
		try {
			const result = await fn(writer);
			this.commit(tx);
			return result;
		} finally {
			for (const release of tx.releases.reverse()) release();
		}
	}

	/** Locks currently held by open transactions, for diagnostics. */
	isLocked(key: string): boolean {
		return this.mutex.isLocked(key);
	}

	private commit(tx: MemoryTransaction): void {
		const changed =
			tx.insertedTuples.length +
			tx.deletedTuples.size +
			tx.insertedRules.length +
			tx.deletedRules.size;
		if (changed === 0) return;
		const version = this.version + 1;
		this.tuples.apply(version, tx.insertedTuples, tx.deletedTuples);
		this.rules.apply(version, tx.insertedRules, tx.deletedRules);
		this.version = version;
		this.prune();
	}

	private prune(): void {
		let oldest = this.version;
		for (const version of this.activeReaders.keys()) {
			oldest = Math.min(oldest, version);
		}
		this.tuples.prune(oldest);
		this.rules.prune(oldest);
	}
}
