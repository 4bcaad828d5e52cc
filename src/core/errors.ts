import type { EntityRef } from "./types.ts";

export class RelgraphError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "RelgraphError";
	}
}

export class ValidationError extends RelgraphError {
	readonly field: string;
	constructor(field: string, message: string) {
		super(`${field} ${message}`);
		this.name = "ValidationError";
		this.field = field;
	}
}

export class SelfImplicationError extends RelgraphError {
	constructor(resourceType: string, permission: string) {
		super(
			`Hierarchy rule on ${resourceType} cannot make '${permission}' imply itself`,
		);
		this.name = "SelfImplicationError";
	}
}

export type CycleEdge =
	| {
			kind: "hierarchy";
			resourceType: string;
			permission: string;
			implies: string;
	  }
	| {
			kind: "membership" | "resource";
			resource: EntityRef;
			subject: EntityRef;
	  };

function entity(ref: EntityRef): string {
	return `${ref.type}:${ref.id}`;
}

function describeEdge(edge: CycleEdge): string {
	switch (edge.kind) {
		case "hierarchy": {
			const rule = `${edge.permission} -> ${edge.implies}`;
			return `hierarchy rule ${edge.resourceType}: ${rule}`;
		}
		case "membership":
			return `membership ${entity(edge.subject)} in ${entity(edge.resource)}`;
		case "resource":
			return `parent ${entity(edge.subject)} of ${entity(edge.resource)}`;
	}
}

export class CycleError extends RelgraphError {
	readonly edge: CycleEdge;
	constructor(edge: CycleEdge) {
		super(`Adding ${describeEdge(edge)} would create a cycle`);
		this.name = "CycleError";
		this.edge = edge;
	}
}

export class NotFoundError extends RelgraphError {
	constructor(what: string) {
		super(`${what} not found`);
		this.name = "NotFoundError";
	}
}
