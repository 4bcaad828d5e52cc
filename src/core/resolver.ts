import { inheritsRelation, type ResolvedOptions } from "../config.ts";
import type { GraphReader } from "../store/interface.ts";
import { HierarchyCache } from "./hierarchy.ts";
import { sameEntity } from "./refs.ts";
import {
	type EntityRef,
	MEMBER_RELATION,
	PARENT_RELATION,
	type PathStep,
} from "./types.ts";

/** Group and parent hops taken from the resource a query started at. */
export interface Depth {
	group: number;
	resource: number;
}

export const ROOT: Depth = { group: 0, resource: 0 };

/** True when `a` has used at least as many hops as `b` on both axes. */
export function atLeastAsDeep(a: Depth, b: Depth): boolean {
	return a.group >= b.group && a.resource >= b.resource;
}

interface MemoEntry {
	path: PathStep[] | null;
	depth: Depth;
}

/**
 * A found path still fits with at least as much budget left; a miss still
 * holds with no more budget left.
 */
function reusable(entry: MemoEntry, depth: Depth): boolean {
	return entry.path
		? atLeastAsDeep(entry.depth, depth)
		: atLeastAsDeep(depth, entry.depth);
}

type ResolverOptions = Pick<
	ResolvedOptions,
	"maxGroupDepth" | "maxResourceDepth" | "maxHierarchyDepth" | "inheritance"
>;

/**
 * Answers "is this subject connected to that resource" for one subject,
 * over one reader snapshot. Results are memoised per `(entity, relation)`
 * together with the depth they were computed at, for the life of the
 * resolver, which is one query.
 */
export class Resolver {
	private readonly memo = new Map<string, MemoEntry>();
	private readonly inProgress = new Set<string>();
	private readonly hierarchies: HierarchyCache;
	private cycleHits = 0;

	constructor(
		private readonly reader: GraphReader,
		private readonly options: ResolverOptions,
		private readonly subject: EntityRef,
	) {
		this.hierarchies = new HierarchyCache(reader);
	}

	/**
	 * First witness path for `permission` on `resource`, or null. Tries the
	 * permission itself, then every permission that implies it.
	 */
	async resolve(
		permission: string,
		resource: EntityRef,
		depth: Depth = ROOT,
	): Promise<PathStep[] | null> {
		const hierarchy = await this.hierarchies.get(resource.type);
		for (const { relation, chain } of hierarchy.closure(
			permission,
			this.options.maxHierarchyDepth,
		)) {
			const path = await this.connect(resource, relation, depth);
			if (!path) continue;
			return chain.length > 1
				? [{ kind: "hierarchy", resourceType: resource.type, chain }, ...path]
				: path;
		}
		return null;
	}

	private async connect(
		resource: EntityRef,
		relation: string,
		depth: Depth,
	): Promise<PathStep[] | null> {
		if (
			depth.group > this.options.maxGroupDepth ||
			depth.resource > this.options.maxResourceDepth
		) {
			return null;
		}
		const key = `${resource.type}\x1F${resource.id}\x1F${relation}`;
		const cached = this.memo.get(key);
		if (cached && reusable(cached, depth)) return cached.path;
		if (this.inProgress.has(key)) {
			this.cycleHits++;
			return null;
		}

		const hitsBefore = this.cycleHits;
		this.inProgress.add(key);
		let path: PathStep[] | null;
		try {
			path = await this.search(resource, relation, depth);
		} finally {
			this.inProgress.delete(key);
		}
		// A miss that ran into an edge already on the stack is only a miss
		// from here; leave it uncached.
		if (path || this.cycleHits === hitsBefore) {
			this.memo.set(key, { path, depth });
		}
		return path;
	}

	private async search(
		resource: EntityRef,
		relation: string,
		depth: Depth,
	): Promise<PathStep[] | null> {
		const tuples = await this.reader.findTuples({
			resourceType: resource.type,
			resourceId: resource.id,
			relation,
		});

		for (const tuple of tuples) {
			if (
				tuple.subjectRelation === null &&
				tuple.subjectType === this.subject.type &&
				tuple.subjectId === this.subject.id
			) {
				return [{ kind: "direct", tuple }];
			}
		}

		const deeper = { ...depth, group: depth.group + 1 };
		for (const tuple of tuples) {
			const holder = { type: tuple.subjectType, id: tuple.subjectId };
			if (tuple.subjectRelation === null) {
				if (sameEntity(holder, this.subject)) continue;
				const membership = await this.connect(holder, MEMBER_RELATION, deeper);
				if (membership) return [{ kind: "group", tuple }, ...membership];
			} else {
				const userset = await this.resolve(
					tuple.subjectRelation,
					holder,
					deeper,
				);
				if (userset) return [{ kind: "userset", tuple }, ...userset];
			}
		}

		if (!inheritsRelation(this.options, resource.type, relation)) return null;
		const parents = await this.reader.findTuples({
			resourceType: resource.type,
			resourceId: resource.id,
			relation: PARENT_RELATION,
			subjectRelation: null,
		});
		const upward = { ...depth, resource: depth.resource + 1 };
		for (const tuple of parents) {
			const parent = { type: tuple.subjectType, id: tuple.subjectId };
			const inherited = await this.connect(parent, relation, upward);
			if (inherited) return [{ kind: "parent", tuple }, ...inherited];
		}
		return null;
	}
}
