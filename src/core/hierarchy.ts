import type {
	GraphReader,
	GraphWriter,
	InsertResult,
} from "../store/interface.ts";
import { hierarchyEvent } from "./audit.ts";
import { CycleError, SelfImplicationError, ValidationError } from "./errors.ts";
import type { WriteSession } from "./session.ts";
import { GLOBAL_NAMESPACE, type HierarchyRule } from "./types.ts";
import { validateIdentifier } from "./validation.ts";

export interface ClosureEntry {
	relation: string;
	/** Implication chain from `relation` down to the requested permission. */
	chain: string[];
}

/** Permission implication graph for one resource type. */
export class HierarchyGraph {
	private readonly impliedBy = new Map<string, string[]>();
	private readonly implies = new Map<string, string[]>();

	constructor(rules: readonly HierarchyRule[]) {
		for (const rule of rules) {
			this.addEdge(rule.permission, rule.implies);
		}
	}

	addEdge(permission: string, implies: string): void {
		push(this.implies, permission, implies);
		push(this.impliedBy, implies, permission);
	}

	/**
	 * `{permission} ∪ {r : r ⇒* permission}` in breadth-first order, so the
	 * requested permission itself always comes first.
	 */
	closure(permission: string, maxDepth: number): ClosureEntry[] {
		const seen = new Set([permission]);
		const result: ClosureEntry[] = [
			{ relation: permission, chain: [permission] },
		];
		let frontier = result;
		for (let depth = 0; depth < maxDepth && frontier.length > 0; depth++) {
			const next: ClosureEntry[] = [];
			for (const entry of frontier) {
				for (const higher of this.impliedBy.get(entry.relation) ?? []) {
					if (seen.has(higher)) continue;
					seen.add(higher);
					next.push({ relation: higher, chain: [higher, ...entry.chain] });
				}
			}
			result.push(...next);
			frontier = next;
		}
		return result;
	}

	/** `{permission} ∪ {q : permission ⇒* q}`. */
	implied(permission: string, maxDepth: number): Set<string> {
		const seen = new Set([permission]);
		let frontier = [permission];
		for (let depth = 0; depth < maxDepth && frontier.length > 0; depth++) {
			const next: string[] = [];
			for (const current of frontier) {
				for (const lower of this.implies.get(current) ?? []) {
					if (seen.has(lower)) continue;
					seen.add(lower);
					next.push(lower);
				}
			}
			frontier = next;
		}
		return seen;
	}
}

function push<T>(map: Map<string, T[]>, key: string, value: T): void {
	const list = map.get(key);
	if (list) {
		list.push(value);
	} else {
		map.set(key, [value]);
	}
}

/** Namespaces whose hierarchy rules apply to checks in `namespace`. */
export function visibleNamespaces(namespace: string): string[] {
	return namespace === GLOBAL_NAMESPACE
		? [GLOBAL_NAMESPACE]
		: [GLOBAL_NAMESPACE, namespace];
}

/** Loads each resource type's hierarchy at most once per query. */
export class HierarchyCache {
	private readonly graphs = new Map<string, Promise<HierarchyGraph>>();

	constructor(private readonly reader: GraphReader) {}

	get(resourceType: string): Promise<HierarchyGraph> {
		let graph = this.graphs.get(resourceType);
		if (!graph) {
			graph = this.reader
				.findHierarchyRules({
					resourceType,
					namespaces: visibleNamespaces(this.reader.namespace),
				})
				.then((rules) => new HierarchyGraph(rules));
			this.graphs.set(resourceType, graph);
		}
		return graph;
	}
}

export function hierarchyLockKeys(
	namespace: string,
	resourceType: string,
): string[] {
	return visibleNamespaces(namespace)
		.map((ns) => ["hierarchy", ns, resourceType].join("\x1F"))
		.sort();
}

/**
 * Rule sets a new rule in `namespace` has to stay acyclic against: the
 * tenant's rules together with the global ones, or for a global rule, the
 * global rules together with each tenant's.
 */
async function rulesToValidate(
	writer: GraphWriter,
	resourceType: string,
): Promise<HierarchyRule[][]> {
	if (writer.namespace !== GLOBAL_NAMESPACE) {
		return [
			await writer.findHierarchyRules({
				resourceType,
				namespaces: visibleNamespaces(writer.namespace),
			}),
		];
	}
	const all = await writer.findHierarchyRules({ resourceType });
	const global = all.filter((rule) => rule.namespace === GLOBAL_NAMESPACE);
	const byTenant = new Map<string, HierarchyRule[]>();
	for (const rule of all) {
		if (rule.namespace === GLOBAL_NAMESPACE) continue;
		push(byTenant, rule.namespace, rule);
	}
	if (byTenant.size === 0) return [global];
	return [...byTenant.values()].map((tenant) => [...global, ...tenant]);
}

/**
 * Adds `permission ⇒ implies` for `resourceType` in the writer's namespace.
 * Rejects self implication, and any rule that would let `implies` lead back
 * to `permission`.
 */
export async function insertHierarchyRule(
	writer: GraphWriter,
	resourceType: string,
	permission: string,
	implies: string,
	maxDepth: number,
): Promise<InsertResult<HierarchyRule>> {
	if (permission === implies) {
		throw new SelfImplicationError(resourceType, permission);
	}
	await writer.acquireLocks(
		hierarchyLockKeys(writer.namespace, resourceType),
	);

	for (const rules of await rulesToValidate(writer, resourceType)) {
		const reachable = new HierarchyGraph(rules).implied(implies, maxDepth);
		if (reachable.has(permission)) {
			throw new CycleError({
				kind: "hierarchy",
				resourceType,
				permission,
				implies,
			});
		}
	}

	return writer.insertHierarchyRule({
		namespace: writer.namespace,
		resourceType,
		permission,
		implies,
	});
}

// ── Operations ─────────────────────────────────────────────────────

export function validateRule(
	resourceType: string,
	permission: string,
	implies: string,
): void {
	validateIdentifier(resourceType, "resourceType");
	validateIdentifier(permission, "permission");
	validateIdentifier(implies, "implies");
}

export function validateChain(
	resourceType: string,
	permissions: readonly string[],
): void {
	validateIdentifier(resourceType, "resourceType");
	if (permissions.length < 2) {
		throw new ValidationError(
			"permissions",
			"must name at least two permissions",
		);
	}
	permissions.forEach((permission, index) => {
		validateIdentifier(permission, `permissions[${index}]`);
	});
}

export async function addHierarchy(
	session: WriteSession,
	resourceType: string,
	permission: string,
	implies: string,
): Promise<string> {
	const { row, created } = await insertHierarchyRule(
		session.writer,
		resourceType,
		permission,
		implies,
		session.options.maxHierarchyDepth,
	);
	if (created) {
		session.events.push(
			hierarchyEvent("hierarchy_created", session.ctx, row, session.writer.now),
		);
	}
	return row.id;
}

/** Adds `p0 ⇒ p1 ⇒ … ⇒ pn` as one change; returns the rule ids in order. */
export async function setHierarchy(
	session: WriteSession,
	resourceType: string,
	permissions: readonly string[],
): Promise<string[]> {
	const ids: string[] = [];
	for (let i = 0; i + 1 < permissions.length; i++) {
		const permission = permissions[i];
		const implies = permissions[i + 1];
		if (permission === undefined || implies === undefined) break;
		ids.push(await addHierarchy(session, resourceType, permission, implies));
	}
	return ids;
}

export async function removeHierarchy(
	session: WriteSession,
	resourceType: string,
	permission: string,
	implies: string,
): Promise<boolean> {
	const removed = await deleteRules(session, {
		resourceType,
		permission,
		implies,
	});
	return removed > 0;
}

/** Removes every rule for `resourceType` in the caller's own namespace. */
export function clearHierarchy(
	session: WriteSession,
	resourceType: string,
): Promise<number> {
	return deleteRules(session, { resourceType });
}

async function deleteRules(
	session: WriteSession,
	query: { resourceType: string; permission?: string; implies?: string },
): Promise<number> {
	const { writer } = session;
	const removed = await writer.deleteHierarchyRules({
		...query,
		namespaces: [writer.namespace],
	});
	for (const rule of removed) {
		session.events.push(
			hierarchyEvent("hierarchy_deleted", session.ctx, rule, writer.now),
		);
	}
	return removed.length;
}

/** Rules in effect for the reader's namespace: global ones, then its own. */
export async function listHierarchy(
	reader: GraphReader,
	resourceType: string,
): Promise<HierarchyRule[]> {
	const rules = await reader.findHierarchyRules({
		resourceType,
		namespaces: visibleNamespaces(reader.namespace),
	});
	const isGlobal = (rule: HierarchyRule) =>
		Number(rule.namespace === GLOBAL_NAMESPACE);
	return rules.sort(
		(a, b) =>
			isGlobal(b) - isGlobal(a) ||
			a.permission.localeCompare(b.permission) ||
			a.implies.localeCompare(b.implies),
	);
}
