import { inheritsRelation, type ResolvedOptions } from "../config.ts";
import type { GraphReader } from "../store/interface.ts";
import { HierarchyCache } from "./hierarchy.ts";
import { atLeastAsDeep, type Depth, ROOT } from "./resolver.ts";
import {
	type EntityRef,
	type ListResourcesRequest,
	type ListUsersRequest,
	MEMBER_RELATION,
	PARENT_RELATION,
} from "./types.ts";

type ListOptions = Pick<
	ResolvedOptions,
	| "maxGroupDepth"
	| "maxResourceDepth"
	| "maxHierarchyDepth"
	| "inheritance"
	| "defaultListLimit"
	| "defaultSubjectType"
>;

function page(ids: Iterable<string>, limit: number, cursor?: string): string[] {
	return [...ids]
		.sort()
		.filter((id) => cursor === undefined || id > cursor)
		.slice(0, limit);
}

/**
 * Depths each `(entity, relation)` was reached at. A revisit is skipped only
 * when an earlier visit had at least as much budget left on both axes.
 */
class Visits {
	private readonly seen = new Map<string, Depth[]>();

	/** Records the visit; false when an earlier one already covers it. */
	enter(entity: EntityRef, relation: string, depth: Depth): boolean {
		const key = `${entity.type}\x1F${entity.id}\x1F${relation}`;
		const earlier = this.seen.get(key) ?? [];
		if (earlier.some((prior) => atLeastAsDeep(depth, prior))) return false;
		this.seen.set(key, [
			...earlier.filter((prior) => !atLeastAsDeep(prior, depth)),
			depth,
		]);
		return true;
	}
}

/**
 * Walks from a resource toward principals along the same edges a check
 * follows, collecting every principal of the requested type.
 */
class UserCollector {
	readonly found = new Set<string>();
	private readonly visits = new Visits();
	private readonly hierarchies: HierarchyCache;

	constructor(
		private readonly reader: GraphReader,
		private readonly options: ListOptions,
		private readonly subjectType: string,
	) {
		this.hierarchies = new HierarchyCache(reader);
	}

	async expandPermission(
		permission: string,
		resource: EntityRef,
		depth: Depth,
	): Promise<void> {
		const hierarchy = await this.hierarchies.get(resource.type);
		const closure = hierarchy.closure(
			permission,
			this.options.maxHierarchyDepth,
		);
		for (const { relation } of closure) {
			await this.expand(resource, relation, depth);
		}
	}

	private async expand(
		resource: EntityRef,
		relation: string,
		depth: Depth,
	): Promise<void> {
		if (depth.group > this.options.maxGroupDepth) return;
		if (depth.resource > this.options.maxResourceDepth) return;
		if (!this.visits.enter(resource, relation, depth)) return;

		const tuples = await this.reader.findTuples({
			resourceType: resource.type,
			resourceId: resource.id,
			relation,
		});
		const deeper = { ...depth, group: depth.group + 1 };
		for (const tuple of tuples) {
			const holder = { type: tuple.subjectType, id: tuple.subjectId };
			if (tuple.subjectRelation === null) {
				if (holder.type === this.subjectType) this.found.add(holder.id);
				await this.expand(holder, MEMBER_RELATION, deeper);
			} else {
				await this.expandPermission(tuple.subjectRelation, holder, deeper);
			}
		}

		if (!inheritsRelation(this.options, resource.type, relation)) return;
		const parents = await this.reader.findTuples({
			resourceType: resource.type,
			resourceId: resource.id,
			relation: PARENT_RELATION,
			subjectRelation: null,
		});
		const upward = { ...depth, resource: depth.resource + 1 };
		for (const tuple of parents) {
			const parent = { type: tuple.subjectType, id: tuple.subjectId };
			await this.expand(parent, relation, upward);
		}
	}
}

export async function listUsers(
	reader: GraphReader,
	options: ListOptions,
	request: ListUsersRequest,
): Promise<string[]> {
	const collector = new UserCollector(
		reader,
		options,
		request.subjectType ?? options.defaultSubjectType,
	);
	await collector.expandPermission(request.permission, request.resource, ROOT);
	return page(
		collector.found,
		request.limit ?? options.defaultListLimit,
		request.cursor,
	);
}

interface Holding {
	entity: EntityRef;
	relation: string;
	depth: Depth;
}

/**
 * Every `(entity, relation)` the subject holds, found breadth-first from its
 * direct tuples: a held `member` pulls in whatever the group holds, a held
 * relation pulls in usersets naming it (or anything it implies), and a held
 * relation on a parent cascades to children that inherit it.
 */
async function collectHoldings(
	reader: GraphReader,
	options: ListOptions,
	subject: EntityRef,
): Promise<Holding[]> {
	const hierarchies = new HierarchyCache(reader);
	const visits = new Visits();
	const holdings: Holding[] = [];
	let frontier: Holding[] = [];

	const hold = (entity: EntityRef, relation: string, depth: Depth) => {
		if (depth.group > options.maxGroupDepth) return;
		if (depth.resource > options.maxResourceDepth) return;
		if (!visits.enter(entity, relation, depth)) return;
		const holding = { entity, relation, depth };
		holdings.push(holding);
		frontier.push(holding);
	};

	for (const tuple of await reader.findTuples({
		subjectType: subject.type,
		subjectId: subject.id,
		subjectRelation: null,
	})) {
		const resource = { type: tuple.resourceType, id: tuple.resourceId };
		hold(resource, tuple.relation, ROOT);
	}

	while (frontier.length > 0) {
		const current = frontier;
		frontier = [];
		for (const { entity, relation, depth } of current) {
			const naming = await reader.findTuples({
				subjectType: entity.type,
				subjectId: entity.id,
			});
			const implied = (await hierarchies.get(entity.type)).implied(
				relation,
				options.maxHierarchyDepth,
			);
			const deeper = { ...depth, group: depth.group + 1 };
			const upward = { ...depth, resource: depth.resource + 1 };
			for (const tuple of naming) {
				const target = { type: tuple.resourceType, id: tuple.resourceId };
				if (tuple.subjectRelation === null) {
					if (relation === MEMBER_RELATION) {
						hold(target, tuple.relation, deeper);
					}
					if (
						tuple.relation === PARENT_RELATION &&
						inheritsRelation(options, target.type, relation)
					) {
						hold(target, relation, upward);
					}
				} else if (implied.has(tuple.subjectRelation)) {
					hold(target, tuple.relation, deeper);
				}
			}
		}
	}
	return holdings;
}

export async function listResources(
	reader: GraphReader,
	options: ListOptions,
	request: ListResourcesRequest,
): Promise<string[]> {
	const hierarchy = await new HierarchyCache(reader).get(request.resourceType);
	const accepted = new Set(
		hierarchy
			.closure(request.permission, options.maxHierarchyDepth)
			.map((entry) => entry.relation),
	);
	const ids = new Set<string>();
	const holdings = await collectHoldings(reader, options, request.subject);
	for (const { entity, relation } of holdings) {
		if (entity.type === request.resourceType && accepted.has(relation)) {
			ids.add(entity.id);
		}
	}
	return page(ids, request.limit ?? options.defaultListLimit, request.cursor);
}
