import type { GraphReader, TupleQuery } from "../store/interface.ts";
import { tupleEvent } from "./audit.ts";
import { guardStructuralEdge, structuralGraphOf } from "./cycles.ts";
import { NotFoundError, ValidationError } from "./errors.ts";
import { tupleLockKey } from "./refs.ts";
import type { WriteSession } from "./session.ts";
import type {
	EntityRef,
	GrantManyRequest,
	GrantRequest,
	NamespaceStats,
	RevokeRequest,
	SubjectRef,
	Tuple,
	TupleKey,
} from "./types.ts";
import {
	validateEntity,
	validateExpiry,
	validateIdentifier,
	validateIds,
	validateSubject,
} from "./validation.ts";

export interface SubjectGrantFilter {
	resourceType?: string;
}

export interface ResourceGrantFilter {
	relation?: string;
}

// ── Validation (runs before a transaction opens) ───────────────────

export function validateEdge(request: RevokeRequest): void {
	validateEntity(request.resource, "resource");
	validateIdentifier(request.relation, "relation");
	validateSubject(request.subject, "subject");
}

export function validateGrant(request: GrantRequest, now: Date): void {
	validateEdge(request);
	validateExpiry(request.expiresAt ?? null, now);
}

export function validateGrantMany(request: GrantManyRequest): void {
	validateEntity(request.resource, "resource");
	validateIdentifier(request.relation, "relation");
	validateIdentifier(request.subjectType, "subjectType");
	validateIds(request.subjectIds, "subjectIds");
	if (structuralGraphOf(request.relation)) {
		throw new ValidationError(
			"relation",
			`'${request.relation}' edges are cycle-checked; grant them one at a time`,
		);
	}
}

export function validateSubjectFilter(
	subject: EntityRef,
	filter: SubjectGrantFilter,
): void {
	validateEntity(subject, "subject");
	if (filter.resourceType !== undefined) {
		validateIdentifier(filter.resourceType, "resourceType");
	}
}

export function validateResourceFilter(
	resource: EntityRef,
	filter: ResourceGrantFilter,
): void {
	validateEntity(resource, "resource");
	if (filter.relation !== undefined) {
		validateIdentifier(filter.relation, "relation");
	}
}

export function validateDuration(ms: number, field: string): void {
	if (!Number.isFinite(ms) || ms <= 0) {
		throw new ValidationError(
			field,
			`must be a positive number of milliseconds (got: ${ms})`,
		);
	}
}

function keyOf(namespace: string, request: RevokeRequest): TupleKey {
	return {
		namespace,
		resourceType: request.resource.type,
		resourceId: request.resource.id,
		relation: request.relation,
		subjectType: request.subject.type,
		subjectId: request.subject.id,
		subjectRelation: request.subject.relation ?? null,
	};
}

function exactQuery(key: TupleKey): TupleQuery {
	return {
		resourceType: key.resourceType,
		resourceId: key.resourceId,
		relation: key.relation,
		subjectType: key.subjectType,
		subjectId: key.subjectId,
		subjectRelation: key.subjectRelation,
		expiry: "any",
	};
}

// ── Writes ─────────────────────────────────────────────────────────

/**
 * Inserts one edge and returns its id. `member` and `parent` edges pass the
 * cycle guard first. Granting an existing edge replaces its expiry.
 */
export async function grant(
	session: WriteSession,
	request: GrantRequest,
): Promise<string> {
	const { writer, options } = session;
	const graph = structuralGraphOf(request.relation);
	if (graph) {
		const maxDepth =
			graph === "membership"
				? options.maxGroupDepth
				: options.maxResourceDepth;
		await guardStructuralEdge(
			writer,
			graph,
			request.resource,
			request.subject,
			maxDepth,
		);
	}
	const { row, created } = await writer.insertTuple({
		...keyOf(writer.namespace, request),
		expiresAt: request.expiresAt ?? null,
	});
	const type = created ? "tuple_created" : "tuple_updated";
	session.events.push(tupleEvent(type, session.ctx, row, writer.now));
	return row.id;
}

/**
 * Grants one relation to many subjects of one type; returns how many were
 * new.
 */
export async function grantMany(
	session: WriteSession,
	request: GrantManyRequest,
): Promise<number> {
	const { writer } = session;
	let created = 0;
	for (const subjectId of [...new Set(request.subjectIds)].sort()) {
		const result = await writer.insertTuple({
			namespace: writer.namespace,
			resourceType: request.resource.type,
			resourceId: request.resource.id,
			relation: request.relation,
			subjectType: request.subjectType,
			subjectId,
			subjectRelation: null,
			expiresAt: null,
		});
		if (!result.created) continue;
		created++;
		session.events.push(
			tupleEvent("tuple_created", session.ctx, result.row, writer.now),
		);
	}
	return created;
}

async function deleteAndRecord(
	session: WriteSession,
	query: TupleQuery,
): Promise<Tuple[]> {
	const { writer } = session;
	const deleted = await writer.deleteTuples(query);
	for (const tuple of deleted) {
		session.events.push(
			tupleEvent("tuple_deleted", session.ctx, tuple, writer.now),
		);
	}
	return deleted;
}

export async function revoke(
	session: WriteSession,
	request: RevokeRequest,
): Promise<boolean> {
	const deleted = await deleteAndRecord(
		session,
		exactQuery(keyOf(session.writer.namespace, request)),
	);
	return deleted.length > 0;
}

export async function revokeSubjectGrants(
	session: WriteSession,
	subject: EntityRef,
	filter: SubjectGrantFilter = {},
): Promise<number> {
	const deleted = await deleteAndRecord(session, {
		subjectType: subject.type,
		subjectId: subject.id,
		resourceType: filter.resourceType,
		expiry: "any",
	});
	return deleted.length;
}

/**
 * Deletes edges on one resource, optionally only those with
 * `filter.relation`.
 */
export async function revokeResourceGrants(
	session: WriteSession,
	resource: EntityRef,
	filter: ResourceGrantFilter = {},
): Promise<number> {
	const deleted = await deleteAndRecord(session, {
		resourceType: resource.type,
		resourceId: resource.id,
		relation: filter.relation,
		expiry: "any",
	});
	return deleted.length;
}

// ── Expiration ─────────────────────────────────────────────────────

export async function setExpiration(
	session: WriteSession,
	edge: RevokeRequest,
	expiresAt: Date | null,
): Promise<boolean> {
	const { writer } = session;
	const key = keyOf(writer.namespace, edge);
	const row = await writer.updateExpiration(key, expiresAt);
	if (!row) return false;
	session.events.push(
		tupleEvent("tuple_updated", session.ctx, row, writer.now),
	);
	return true;
}

/**
 * Pushes an edge's expiry back by `extensionMs`, counting from now when it
 * has already lapsed. Returns the new expiry.
 */
export async function extendExpiration(
	session: WriteSession,
	edge: RevokeRequest,
	extensionMs: number,
): Promise<Date> {
	const { writer } = session;
	const key = keyOf(writer.namespace, edge);
	await writer.acquireLocks([tupleLockKey(key)]);
	const [existing] = await writer.findTuples(exactQuery(key));
	if (!existing) throw new NotFoundError("grant");
	if (!existing.expiresAt) {
		throw new ValidationError("grant", "has no expiration to extend");
	}
	const base = Math.max(existing.expiresAt.getTime(), writer.now.getTime());
	const expiresAt = new Date(base + extensionMs);
	await setExpiration(session, edge, expiresAt);
	return expiresAt;
}

/** Active edges that expire within `withinMs` from now, soonest first. */
export async function listExpiring(
	reader: GraphReader,
	withinMs: number,
): Promise<Tuple[]> {
	const tuples = await reader.findTuples({
		expiresBefore: new Date(reader.now.getTime() + withinMs),
	});
	const expiry = (tuple: Tuple) => tuple.expiresAt?.getTime() ?? 0;
	return tuples.sort(
		(a, b) => expiry(a) - expiry(b) || a.id.localeCompare(b.id),
	);
}

// ── Maintenance ────────────────────────────────────────────────────

export async function listSubjectGrants(
	reader: GraphReader,
	subject: SubjectRef,
	filter: SubjectGrantFilter = {},
): Promise<Tuple[]> {
	return reader.findTuples({
		subjectType: subject.type,
		subjectId: subject.id,
		resourceType: filter.resourceType,
	});
}

/** Physically deletes expired edges; returns how many rows went. */
export async function cleanupExpired(session: WriteSession): Promise<number> {
	const deleted = await session.writer.deleteTuples({ expiry: "expired" });
	return deleted.length;
}

export async function stats(reader: GraphReader): Promise<NamespaceStats> {
	const active = await reader.findTuples({});
	const distinct = (key: (tuple: Tuple) => string) =>
		new Set(active.map(key)).size;
	return {
		tupleCount: await reader.countTuples({ expiry: "any" }),
		expiredTupleCount: await reader.countTuples({ expiry: "expired" }),
		hierarchyRuleCount: await reader.countHierarchyRules(),
		uniqueSubjects: distinct((t) => `${t.subjectType}:${t.subjectId}`),
		uniqueResources: distinct((t) => `${t.resourceType}:${t.resourceId}`),
	};
}
