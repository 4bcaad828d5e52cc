interface Entry<Row> {
	row: Row;
	createdAt: number;
	deletedAt: number;
}

export interface IndexLookup {
	index: string;
	key: string;
}

/**
 * Multi-version row set with hash indexes. A row is visible at version `v`
 * when `createdAt <= v < deletedAt`, so readers holding an older version keep
 * seeing the rows that existed when they started.
 *
 * Rows are treated as immutable; an update is a delete plus an insert.
 */
export class VersionedTable<Row extends object> {
	private readonly entries = new Map<Row, Entry<Row>>();
	private readonly keyFns: Map<string, (row: Row) => string>;
	private readonly indexes = new Map<string, Map<string, Set<Entry<Row>>>>();
	private tombstones = 0;

	constructor(keyFns: Record<string, (row: Row) => string>) {
		this.keyFns = new Map(Object.entries(keyFns));
		for (const name of this.keyFns.keys()) {
			this.indexes.set(name, new Map());
		}
	}

	rows(version: number, lookup?: IndexLookup): Row[] {
		const indexed = lookup && this.indexes.get(lookup.index)?.get(lookup.key);
		const candidates = lookup
			? (indexed ?? new Set<Entry<Row>>())
			: this.entries.values();
		const visible: Row[] = [];
		for (const entry of candidates) {
			if (entry.createdAt <= version && version < entry.deletedAt) {
				visible.push(entry.row);
			}
		}
		return visible;
	}

	apply(
		version: number,
		inserted: readonly Row[],
		deleted: Iterable<Row>,
	): void {
		for (const row of deleted) {
			const entry = this.entries.get(row);
			// Already removed by a concurrent transaction.
			if (!entry || entry.deletedAt !== Number.POSITIVE_INFINITY) continue;
			entry.deletedAt = version;
			this.tombstones++;
		}
		for (const row of inserted) {
			const entry: Entry<Row> = {
				row,
				createdAt: version,
				deletedAt: Number.POSITIVE_INFINITY,
			};
			this.entries.set(row, entry);
			for (const [name, keyFn] of this.keyFns) {
				const index = this.indexes.get(name);
				if (!index) continue;
				const key = keyFn(row);
				const bucket = index.get(key);
				if (bucket) {
					bucket.add(entry);
				} else {
					index.set(key, new Set([entry]));
				}
			}
		}
	}

	/** Physically drops rows deleted at or before `oldestVisible`. */
	prune(oldestVisible: number): void {
		if (this.tombstones === 0) return;
		for (const [row, entry] of this.entries) {
			if (entry.deletedAt > oldestVisible) continue;
			this.entries.delete(row);
			this.tombstones--;
			for (const [name, keyFn] of this.keyFns) {
				const index = this.indexes.get(name);
				const key = keyFn(row);
				const bucket = index?.get(key);
				if (!bucket) continue;
				bucket.delete(entry);
				if (bucket.size === 0) index?.delete(key);
			}
		}
	}

	/** Number of physically stored entries, including tombstones. */
	get size(): number {
		return this.entries.size;
	}
}
