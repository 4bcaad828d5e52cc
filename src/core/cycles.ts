import type { GraphReader, GraphWriter } from "../store/interface.ts";
import { CycleError } from "./errors.ts";
import { entityKey, formatEntity, sameEntity } from "./refs.ts";
import {
	type CycleReport,
	type EntityRef,
	MEMBER_RELATION,
	PARENT_RELATION,
} from "./types.ts";

export type StructuralGraph = "membership" | "resource";

export function structuralGraphOf(relation: string): StructuralGraph | null {
	if (relation === MEMBER_RELATION) return "membership";
	if (relation === PARENT_RELATION) return "resource";
	return null;
}

/** Both endpoint keys in lexicographic order, whichever end is the parent. */
export function endpointLockKeys(
	namespace: string,
	a: EntityRef,
	b: EntityRef,
): string[] {
	return [entityKey(namespace, a), entityKey(namespace, b)].sort();
}

/**
 * Ancestors one step above `entity`: the groups containing it, or its
 * parent resources. Expired edges count, since their expiry can be lifted.
 */
async function ancestorsOf(
	reader: GraphReader,
	graph: StructuralGraph,
	entity: EntityRef,
): Promise<EntityRef[]> {
	if (graph === "membership") {
		const tuples = await reader.findTuples({
			subjectType: entity.type,
			subjectId: entity.id,
			relation: MEMBER_RELATION,
			expiry: "any",
		});
		return tuples.map((t) => ({ type: t.resourceType, id: t.resourceId }));
	}
	const tuples = await reader.findTuples({
		resourceType: entity.type,
		resourceId: entity.id,
		relation: PARENT_RELATION,
		expiry: "any",
	});
	return tuples.map((t) => ({ type: t.subjectType, id: t.subjectId }));
}

/**
 * Whether adding the structural edge `(resource, relation, subject)` would
 * close a cycle: walks the ancestors of the proposed parent and looks for the
 * proposed child among them.
 */
export async function wouldCreateCycle(
	reader: GraphReader,
	graph: StructuralGraph,
	resource: EntityRef,
	subject: EntityRef,
	maxDepth: number,
): Promise<boolean> {
	// member: the resource is the parent group.
	// parent: the subject is the parent resource.
	const [parent, child] =
		graph === "membership" ? [resource, subject] : [subject, resource];
	const seen = new Set([formatEntity(parent)]);
	let frontier = [parent];
	for (let depth = 1; frontier.length > 0; depth++) {
		if (frontier.some((entity) => sameEntity(entity, child))) return true;
		if (depth >= maxDepth) break;
		const next: EntityRef[] = [];
		for (const entity of frontier) {
			for (const ancestor of await ancestorsOf(reader, graph, entity)) {
				const key = formatEntity(ancestor);
				if (seen.has(key)) continue;
				seen.add(key);
				next.push(ancestor);
			}
		}
		frontier = next;
	}
	return false;
}

/**
 * Lock-then-check for a structural edge. Both endpoint locks are held until
 * the writer's transaction ends, so a concurrent writer adding the reverse
 * edge re-checks against this one's committed state.
 */
export async function guardStructuralEdge(
	writer: GraphWriter,
	graph: StructuralGraph,
	resource: EntityRef,
	subject: EntityRef,
	maxDepth: number,
): Promise<void> {
	if (sameEntity(resource, subject)) {
		throw new CycleError({ kind: graph, resource, subject });
	}
	await writer.acquireLocks(
		endpointLockKeys(writer.namespace, resource, subject),
	);
	if (await wouldCreateCycle(writer, graph, resource, subject, maxDepth)) {
		throw new CycleError({ kind: graph, resource, subject });
	}
}

async function edgesOf(
	reader: GraphReader,
	graph: StructuralGraph,
): Promise<Map<string, Set<string>>> {
	const relation = graph === "membership" ? MEMBER_RELATION : PARENT_RELATION;
	const tuples = await reader.findTuples({ relation, expiry: "any" });
	const edges = new Map<string, Set<string>>();
	// Edges run resource -> subject: group -> member, or child -> parent.
	for (const tuple of tuples) {
		const from = formatEntity({
			type: tuple.resourceType,
			id: tuple.resourceId,
		});
		const to = formatEntity({ type: tuple.subjectType, id: tuple.subjectId });
		const targets = edges.get(from);
		if (targets) {
			targets.add(to);
		} else {
			edges.set(from, new Set([to]));
		}
	}
	return edges;
}

/**
 * Enumerates the elementary cycles of one structural graph. Each cycle is
 * reported once, starting from its smallest node.
 */
function findCycles(
	edges: Map<string, Set<string>>,
	maxDepth: number,
): string[][] {
	const cycles: string[][] = [];
	const starts = [...edges.keys()].sort();
	for (const start of starts) {
		const path = [start];
		const onPath = new Set(path);
		const visit = (node: string) => {
			for (const next of [...(edges.get(node) ?? [])].sort()) {
				if (next === start) {
					cycles.push([...path, start]);
				} else if (
					next > start &&
					!onPath.has(next) &&
					path.length < maxDepth
				) {
					path.push(next);
					onPath.add(next);
					visit(next);
					path.pop();
					onPath.delete(next);
				}
			}
		};
		visit(start);
	}
	return cycles;
}

/** Diagnostic sweep for cycles that entered the graph around the guard. */
export async function detectCycles(
	reader: GraphReader,
	maxDepth: { membership: number; resource: number },
): Promise<CycleReport[]> {
	const reports: CycleReport[] = [];
	for (const graph of ["membership", "resource"] as const) {
		const edges = await edgesOf(reader, graph);
		for (const path of findCycles(edges, maxDepth[graph])) {
			reports.push({ graph, path });
		}
	}
	return reports;
}
