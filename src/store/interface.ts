import type {
	HierarchyRule,
	NewHierarchyRule,
	NewTuple,
	Tuple,
	TupleKey,
} from "../core/types.ts";

/**
 * Which tuples a query matches. Omitted fields match anything.
 * `subjectRelation: null` matches only tuples without a subject relation.
 */
export interface TupleQuery {
	resourceType?: string;
	resourceId?: string;
	relation?: string;
	subjectType?: string;
	subjectId?: string;
	subjectRelation?: string | null;
	/**
	 * - `active` (default): not expired at the scope's `now`
	 * - `expired`: expired at `now`
	 * - `any`: ignore expiry
	 */
	expiry?: "active" | "expired" | "any";
	/** Only tuples with an expiry at or before this instant. */
	expiresBefore?: Date;
}

export interface HierarchyQuery {
	resourceType: string;
	/** Namespaces to read from; omitted means every namespace. */
	namespaces?: string[];
	permission?: string;
	implies?: string;
}

export interface StoreScope {
	namespace: string;
	now: Date;
}

/**
 * Read access to one namespace. All reads of one reader observe the same
 * snapshot of the graph.
 */
export interface GraphReader {
	readonly namespace: string;
	readonly now: Date;
	findTuples(query: TupleQuery): Promise<Tuple[]>;
	countTuples(query: TupleQuery): Promise<number>;
	findHierarchyRules(query: HierarchyQuery): Promise<HierarchyRule[]>;
	countHierarchyRules(): Promise<number>;
}

export interface InsertResult<T> {
	row: T;
	created: boolean;
}

/**
 * Write access inside one atomic transaction. Reads see the transaction's own
 * changes. Locks are held until the transaction ends.
 */
export interface GraphWriter extends GraphReader {
	/** Acquires the given locks in the order given. */
	acquireLocks(keys: string[]): Promise<void>;
	/** Inserts a tuple; on a duplicate key, replaces its expiry instead. */
	insertTuple(tuple: NewTuple): Promise<InsertResult<Tuple>>;
	updateExpiration(
		key: TupleKey,
		expiresAt: Date | null,
	): Promise<Tuple | null>;
	deleteTuples(query: TupleQuery): Promise<Tuple[]>;
	insertHierarchyRule(
		rule: NewHierarchyRule,
	): Promise<InsertResult<HierarchyRule>>;
	deleteHierarchyRules(
		query: HierarchyQuery & { namespaces: string[] },
	): Promise<HierarchyRule[]>;
}

export interface TupleStore {
	read<T>(
		scope: StoreScope,
		fn: (reader: GraphReader) => Promise<T>,
	): Promise<T>;
	write<T>(
		scope: StoreScope,
		fn: (writer: GraphWriter) => Promise<T>,
	): Promise<T>;
}
