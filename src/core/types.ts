/** Namespace of platform-wide hierarchy rules, readable by every tenant. */
export const GLOBAL_NAMESPACE = "global";

/** Relation forming the group-membership graph (group → member). */
export const MEMBER_RELATION = "member";

/** Relation forming the resource hierarchy graph (child → parent). */
export const PARENT_RELATION = "parent";

export interface EntityRef {
	type: string;
	id: string;
}

/**
 * A subject reference. When `relation` is set the reference is a userset:
 * "anyone holding `relation` on this entity".
 */
export interface SubjectRef extends EntityRef {
	relation?: string;
}

/**
 * Per-call tenant and actor context. Every store operation is scoped to
 * `namespace`; the remaining fields only travel into audit events.
 */
export interface AuthzContext {
	namespace: string;
	actorId?: string;
	requestId?: string;
	reason?: string;
}

export interface Tuple {
	id: string;
	namespace: string;
	resourceType: string;
	resourceId: string;
	relation: string;
	subjectType: string;
	subjectId: string;
	subjectRelation: string | null;
	createdAt: Date;
	expiresAt: Date | null;
}

export type NewTuple = Omit<Tuple, "id" | "createdAt">;

/** Identity of a tuple: everything that participates in the uniqueness rule. */
export type TupleKey = Omit<NewTuple, "expiresAt">;

export interface HierarchyRule {
	id: string;
	namespace: string;
	resourceType: string;
	permission: string;
	implies: string;
	createdAt: Date;
}

export type NewHierarchyRule = Omit<HierarchyRule, "id" | "createdAt">;

// ── Requests ───────────────────────────────────────────────────────

export interface GrantRequest {
	resource: EntityRef;
	relation: string;
	subject: SubjectRef;
	expiresAt?: Date | null;
}

export type RevokeRequest = Omit<GrantRequest, "expiresAt">;

export interface GrantManyRequest {
	resource: EntityRef;
	relation: string;
	subjectType: string;
	subjectIds: string[];
}

export interface CheckRequest {
	subject: EntityRef;
	permission: string;
	resource: EntityRef;
}

export interface CheckManyRequest {
	subject: EntityRef;
	permissions: string[];
	resource: EntityRef;
}

export interface FilterAuthorizedRequest {
	subject: EntityRef;
	permission: string;
	resourceType: string;
	resourceIds: string[];
}

export interface ListUsersRequest {
	resource: EntityRef;
	permission: string;
	limit?: number;
	/** Last subject id of the previous page. */
	cursor?: string;
	/** Principal type to collect; defaults to the configured subject type. */
	subjectType?: string;
}

export interface ListResourcesRequest {
	subject: EntityRef;
	resourceType: string;
	permission: string;
	limit?: number;
	/** Last resource id of the previous page. */
	cursor?: string;
}

// ── Results ────────────────────────────────────────────────────────

export type PathStep =
	| { kind: "direct"; tuple: Tuple }
	| { kind: "group"; tuple: Tuple }
	| { kind: "userset"; tuple: Tuple }
	| { kind: "parent"; tuple: Tuple }
	| { kind: "hierarchy"; resourceType: string; chain: string[] };

export interface Explanation {
	allowed: boolean;
	path: PathStep[];
	text: string;
}

export interface CycleReport {
	graph: "membership" | "resource";
	/** Entity strings; the first node is repeated at the end. */
	path: string[];
}

export interface NamespaceStats {
	tupleCount: number;
	expiredTupleCount: number;
	hierarchyRuleCount: number;
	uniqueSubjects: number;
	uniqueResources: number;
}
