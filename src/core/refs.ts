import { ValidationError } from "./errors.ts";
import type { EntityRef, SubjectRef, Tuple, TupleKey } from "./types.ts";

const SEPARATOR = "\x1F";

export function formatEntity(entity: EntityRef): string {
	return `${entity.type}:${entity.id}`;
}

export function formatSubject(subject: SubjectRef): string {
	return subject.relation
		? `${formatEntity(subject)}#${subject.relation}`
		: formatEntity(subject);
}

/** Parses `type:id`. The id may itself contain colons. */
export function parseEntity(value: string): EntityRef {
	const index = value.indexOf(":");
	if (index <= 0 || index === value.length - 1) {
		throw new ValidationError(
			"entity",
			`must look like type:id (got: ${value})`,
		);
	}
	return { type: value.slice(0, index), id: value.slice(index + 1) };
}

/** Parses `type:id` or the userset form `type:id#relation`. */
export function parseSubject(value: string): SubjectRef {
	const hash = value.lastIndexOf("#");
	if (hash === -1) return parseEntity(value);
	const relation = value.slice(hash + 1);
	if (relation === "") {
		throw new ValidationError(
			"subject",
			`has an empty relation (got: ${value})`,
		);
	}
	return { ...parseEntity(value.slice(0, hash)), relation };
}

export function resourceOf(tuple: Tuple): EntityRef {
	return { type: tuple.resourceType, id: tuple.resourceId };
}

export function subjectOf(tuple: Tuple): SubjectRef {
	const subject = { type: tuple.subjectType, id: tuple.subjectId };
	return tuple.subjectRelation
		? { ...subject, relation: tuple.subjectRelation }
		: subject;
}

export function sameEntity(a: EntityRef, b: EntityRef): boolean {
	return a.type === b.type && a.id === b.id;
}

/** Lock / index key for an entity inside a namespace. */
export function entityKey(namespace: string, entity: EntityRef): string {
	return [namespace, entity.type, entity.id].join(SEPARATOR);
}

export function tupleKeyString(key: TupleKey): string {
	return [
		key.namespace,
		key.resourceType,
		key.resourceId,
		key.relation,
		key.subjectType,
		key.subjectId,
		key.subjectRelation ?? "",
	].join(SEPARATOR);
}

/** Lock held by any transaction that inserts, changes or deletes the edge. */
export function tupleLockKey(key: TupleKey): string {
	return `tuple${SEPARATOR}${tupleKeyString(key)}`;
}

export function tupleKeyOf(tuple: Tuple): TupleKey {
	return {
		namespace: tuple.namespace,
		resourceType: tuple.resourceType,
		resourceId: tuple.resourceId,
		relation: tuple.relation,
		subjectType: tuple.subjectType,
		subjectId: tuple.subjectId,
		subjectRelation: tuple.subjectRelation,
	};
}

export function isActive(tuple: Tuple, now: Date): boolean {
	return tuple.expiresAt === null || tuple.expiresAt.getTime() > now.getTime();
}
