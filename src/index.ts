import {
	type RelgraphOptions,
	type ResolvedOptions,
	resolveOptions,
} from "./config.ts";
import { emitAudit } from "./core/audit.ts";
import {
	checkAllPermissions,
	checkAnyPermission,
	checkPermission,
	filterAuthorized,
} from "./core/check.ts";
import { detectCycles } from "./core/cycles.ts";
import { ValidationError } from "./core/errors.ts";
import { explainPermission } from "./core/explain.ts";
import {
	addHierarchy,
	clearHierarchy,
	listHierarchy,
	removeHierarchy,
	setHierarchy,
	validateChain,
	validateRule,
} from "./core/hierarchy.ts";
import { listResources, listUsers } from "./core/list.ts";
import {
	cleanupExpired,
	extendExpiration,
	grant,
	grantMany,
	listExpiring,
	listSubjectGrants,
	type ResourceGrantFilter,
	revoke,
	revokeResourceGrants,
	revokeSubjectGrants,
	type SubjectGrantFilter,
	setExpiration,
	stats,
	validateDuration,
	validateEdge,
	validateGrant,
	validateGrantMany,
	validateResourceFilter,
	validateSubjectFilter,
} from "./core/relationships.ts";
import type { WriteSession } from "./core/session.ts";
import type {
	AuthzContext,
	CheckManyRequest,
	CheckRequest,
	CycleReport,
	EntityRef,
	Explanation,
	FilterAuthorizedRequest,
	GrantManyRequest,
	GrantRequest,
	HierarchyRule,
	ListResourcesRequest,
	ListUsersRequest,
	NamespaceStats,
	RevokeRequest,
	SubjectRef,
	Tuple,
} from "./core/types.ts";
import {
	validateEntity,
	validateExpiry,
	validateIdentifier,
	validateIds,
	validateNamespace,
} from "./core/validation.ts";
import type { GraphReader, TupleStore } from "./store/interface.ts";

export interface RelgraphClient {
	grant(ctx: AuthzContext, request: GrantRequest): Promise<string>;
	grantMany(ctx: AuthzContext, request: GrantManyRequest): Promise<number>;
	revoke(ctx: AuthzContext, request: RevokeRequest): Promise<boolean>;
	revokeSubjectGrants(
		ctx: AuthzContext,
		subject: EntityRef,
		filter?: SubjectGrantFilter,
	): Promise<number>;
	revokeResourceGrants(
		ctx: AuthzContext,
		resource: EntityRef,
		filter?: ResourceGrantFilter,
	): Promise<number>;

	setExpiration(
		ctx: AuthzContext,
		edge: RevokeRequest,
		expiresAt: Date,
	): Promise<boolean>;
	clearExpiration(ctx: AuthzContext, edge: RevokeRequest): Promise<boolean>;
	extendExpiration(
		ctx: AuthzContext,
		edge: RevokeRequest,
		extensionMs: number,
	): Promise<Date>;
	listExpiring(ctx: AuthzContext, withinMs?: number): Promise<Tuple[]>;
	listSubjectGrants(
		ctx: AuthzContext,
		subject: SubjectRef,
		filter?: SubjectGrantFilter,
	): Promise<Tuple[]>;
	cleanupExpired(ctx: AuthzContext): Promise<number>;
	stats(ctx: AuthzContext): Promise<NamespaceStats>;

	addHierarchy(
		ctx: AuthzContext,
		resourceType: string,
		permission: string,
		implies: string,
	): Promise<string>;
	setHierarchy(
		ctx: AuthzContext,
		resourceType: string,
		...permissions: string[]
	): Promise<string[]>;
	removeHierarchy(
		ctx: AuthzContext,
		resourceType: string,
		permission: string,
		implies: string,
	): Promise<boolean>;
	clearHierarchy(ctx: AuthzContext, resourceType: string): Promise<number>;
	listHierarchy(
		ctx: AuthzContext,
		resourceType: string,
	): Promise<HierarchyRule[]>;

	check(ctx: AuthzContext, request: CheckRequest): Promise<boolean>;
	checkAny(ctx: AuthzContext, request: CheckManyRequest): Promise<boolean>;
	checkAll(ctx: AuthzContext, request: CheckManyRequest): Promise<boolean>;
	filterAuthorized(
		ctx: AuthzContext,
		request: FilterAuthorizedRequest,
	): Promise<string[]>;
	listUsers(ctx: AuthzContext, request: ListUsersRequest): Promise<string[]>;
	listResources(
		ctx: AuthzContext,
		request: ListResourcesRequest,
	): Promise<string[]>;
	explain(ctx: AuthzContext, request: CheckRequest): Promise<Explanation>;
	detectCycles(ctx: AuthzContext): Promise<CycleReport[]>;
}

const WEEK_MS = 7 * 24 * 60 * 60 * 1000;

function validateCheck(request: CheckRequest): void {
	validateEntity(request.subject, "subject");
	validateIdentifier(request.permission, "permission");
	validateEntity(request.resource, "resource");
}

function validateCheckMany(request: CheckManyRequest): void {
	validateEntity(request.subject, "subject");
	request.permissions.forEach((permission, index) => {
		validateIdentifier(permission, `permissions[${index}]`);
	});
	validateEntity(request.resource, "resource");
}

function validateLimit(limit: number | undefined): void {
	if (limit === undefined) return;
	if (!Number.isInteger(limit) || limit <= 0) {
		throw new ValidationError(
			"limit",
			`must be a positive integer (got: ${limit})`,
		);
	}
}

export function createRelgraph(
	store: TupleStore,
	options?: RelgraphOptions,
): RelgraphClient {
	const resolved: ResolvedOptions = resolveOptions(options);
	const { clock, logger } = resolved;

	function read<T>(
		ctx: AuthzContext,
		fn: (reader: GraphReader) => Promise<T>,
	): Promise<T> {
		return store.read({ namespace: ctx.namespace, now: clock() }, fn);
	}

	async function write<T>(
		ctx: AuthzContext,
		fn: (session: WriteSession) => Promise<T>,
	): Promise<T> {
		const events: WriteSession["events"] = [];
		const result = await store.write(
			{ namespace: ctx.namespace, now: clock() },
			(writer) => fn({ writer, ctx, options: resolved, events }),
		);
		if (events.length > 0) {
			logger.debug("committed", {
				namespace: ctx.namespace,
				events: events.length,
			});
			await emitAudit(resolved.auditSinks, events, logger);
		}
		return result;
	}

	return {
		async grant(ctx: AuthzContext, request: GrantRequest): Promise<string> {
			validateNamespace(ctx.namespace);
			validateGrant(request, clock());
			return write(ctx, (session) => grant(session, request));
		},

		async grantMany(
			ctx: AuthzContext,
			request: GrantManyRequest,
		): Promise<number> {
			validateNamespace(ctx.namespace);
			validateGrantMany(request);
			return write(ctx, (session) => grantMany(session, request));
		},

		async revoke(ctx: AuthzContext, request: RevokeRequest): Promise<boolean> {
			validateNamespace(ctx.namespace);
			validateEdge(request);
			return write(ctx, (session) => revoke(session, request));
		},

		async revokeSubjectGrants(
			ctx: AuthzContext,
			subject: EntityRef,
			filter: SubjectGrantFilter = {},
		): Promise<number> {
			validateNamespace(ctx.namespace);
			validateSubjectFilter(subject, filter);
			return write(ctx, (session) =>
				revokeSubjectGrants(session, subject, filter),
			);
		},

		async revokeResourceGrants(
			ctx: AuthzContext,
			resource: EntityRef,
			filter: ResourceGrantFilter = {},
		): Promise<number> {
			validateNamespace(ctx.namespace);
			validateResourceFilter(resource, filter);
			return write(ctx, (session) =>
				revokeResourceGrants(session, resource, filter),
			);
		},

		async setExpiration(
			ctx: AuthzContext,
			edge: RevokeRequest,
			expiresAt: Date,
		): Promise<boolean> {
			validateNamespace(ctx.namespace);
			validateEdge(edge);
			validateExpiry(expiresAt, clock());
			return write(ctx, (session) => setExpiration(session, edge, expiresAt));
		},

		async clearExpiration(
			ctx: AuthzContext,
			edge: RevokeRequest,
		): Promise<boolean> {
			validateNamespace(ctx.namespace);
			validateEdge(edge);
			return write(ctx, (session) => setExpiration(session, edge, null));
		},

		async extendExpiration(
			ctx: AuthzContext,
			edge: RevokeRequest,
			extensionMs: number,
		): Promise<Date> {
			validateNamespace(ctx.namespace);
			validateEdge(edge);
			validateDuration(extensionMs, "extensionMs");
			return write(ctx, (session) =>
				extendExpiration(session, edge, extensionMs),
			);
		},

		async listExpiring(
			ctx: AuthzContext,
			withinMs = WEEK_MS,
		): Promise<Tuple[]> {
			validateNamespace(ctx.namespace);
			validateDuration(withinMs, "withinMs");
			return read(ctx, (reader) => listExpiring(reader, withinMs));
		},

		async listSubjectGrants(
			ctx: AuthzContext,
			subject: SubjectRef,
			filter: SubjectGrantFilter = {},
		): Promise<Tuple[]> {
			validateNamespace(ctx.namespace);
			validateSubjectFilter(subject, filter);
			return read(ctx, (reader) => listSubjectGrants(reader, subject, filter));
		},

		async cleanupExpired(ctx: AuthzContext): Promise<number> {
			validateNamespace(ctx.namespace);
			return write(ctx, async (session) => {
				const removed = await cleanupExpired(session);
				logger.info("expired tuples removed", {
					namespace: ctx.namespace,
					removed,
				});
				return removed;
			});
		},

		async stats(ctx: AuthzContext): Promise<NamespaceStats> {
			validateNamespace(ctx.namespace);
			return read(ctx, stats);
		},

		async addHierarchy(
			ctx: AuthzContext,
			resourceType: string,
			permission: string,
			implies: string,
		): Promise<string> {
			validateNamespace(ctx.namespace);
			validateRule(resourceType, permission, implies);
			return write(ctx, (session) =>
				addHierarchy(session, resourceType, permission, implies),
			);
		},

		async setHierarchy(
			ctx: AuthzContext,
			resourceType: string,
			...permissions: string[]
		): Promise<string[]> {
			validateNamespace(ctx.namespace);
			validateChain(resourceType, permissions);
			return write(ctx, (session) =>
				setHierarchy(session, resourceType, permissions),
			);
		},

		async removeHierarchy(
			ctx: AuthzContext,
			resourceType: string,
			permission: string,
			implies: string,
		): Promise<boolean> {
			validateNamespace(ctx.namespace);
			validateRule(resourceType, permission, implies);
			return write(ctx, (session) =>
				removeHierarchy(session, resourceType, permission, implies),
			);
		},

		async clearHierarchy(
			ctx: AuthzContext,
			resourceType: string,
		): Promise<number> {
			validateNamespace(ctx.namespace);
			validateIdentifier(resourceType, "resourceType");
			return write(ctx, (session) => clearHierarchy(session, resourceType));
		},

		async listHierarchy(
			ctx: AuthzContext,
			resourceType: string,
		): Promise<HierarchyRule[]> {
			validateNamespace(ctx.namespace);
			validateIdentifier(resourceType, "resourceType");
			return read(ctx, (reader) => listHierarchy(reader, resourceType));
		},

		async check(ctx: AuthzContext, request: CheckRequest): Promise<boolean> {
			validateNamespace(ctx.namespace);
			validateCheck(request);
			return read(ctx, (reader) => checkPermission(reader, resolved, request));
		},

		async checkAny(
			ctx: AuthzContext,
			request: CheckManyRequest,
		): Promise<boolean> {
			validateNamespace(ctx.namespace);
			validateCheckMany(request);
			return read(ctx, (reader) =>
				checkAnyPermission(reader, resolved, request),
			);
		},

		async checkAll(
			ctx: AuthzContext,
			request: CheckManyRequest,
		): Promise<boolean> {
			validateNamespace(ctx.namespace);
			validateCheckMany(request);
			return read(ctx, (reader) =>
				checkAllPermissions(reader, resolved, request),
			);
		},

		async filterAuthorized(
			ctx: AuthzContext,
			request: FilterAuthorizedRequest,
		): Promise<string[]> {
			validateNamespace(ctx.namespace);
			validateEntity(request.subject, "subject");
			validateIdentifier(request.permission, "permission");
			validateIdentifier(request.resourceType, "resourceType");
			validateIds(request.resourceIds, "resourceIds");
			return read(ctx, (reader) => filterAuthorized(reader, resolved, request));
		},

		async listUsers(
			ctx: AuthzContext,
			request: ListUsersRequest,
		): Promise<string[]> {
			validateNamespace(ctx.namespace);
			validateEntity(request.resource, "resource");
			validateIdentifier(request.permission, "permission");
			if (request.subjectType !== undefined) {
				validateIdentifier(request.subjectType, "subjectType");
			}
			validateLimit(request.limit);
			return read(ctx, (reader) => listUsers(reader, resolved, request));
		},

		async listResources(
			ctx: AuthzContext,
			request: ListResourcesRequest,
		): Promise<string[]> {
			validateNamespace(ctx.namespace);
			validateEntity(request.subject, "subject");
			validateIdentifier(request.resourceType, "resourceType");
			validateIdentifier(request.permission, "permission");
			validateLimit(request.limit);
			return read(ctx, (reader) => listResources(reader, resolved, request));
		},

		async explain(
			ctx: AuthzContext,
			request: CheckRequest,
		): Promise<Explanation> {
			validateNamespace(ctx.namespace);
			validateCheck(request);
			return read(ctx, (reader) =>
				explainPermission(reader, resolved, request),
			);
		},

		async detectCycles(ctx: AuthzContext): Promise<CycleReport[]> {
			validateNamespace(ctx.namespace);
			return read(ctx, (reader) =>
				detectCycles(reader, {
					membership: resolved.maxGroupDepth,
					resource: resolved.maxResourceDepth,
				}),
			);
		},
	};
}

// Re-exports
export {
	type DatabaseConfig,
	databaseConfigFromEnv,
	type EngineOptions,
	type InheritanceRule,
	optionsFromEnv,
	parseInheritance,
	type RelgraphOptions,
} from "./config.ts";
export {
	type AuditEvent,
	type AuditEventType,
	type AuditQuery,
	type AuditSink,
	SegmentedAuditLog,
} from "./core/audit.ts";
export {
	type CycleEdge,
	CycleError,
	NotFoundError,
	RelgraphError,
	SelfImplicationError,
	ValidationError,
} from "./core/errors.ts";
export { describeStep } from "./core/explain.ts";
export {
	createLogger,
	type Logger,
	type LoggerOptions,
	type LogLevel,
	silentLogger,
} from "./core/logger.ts";
export {
	formatEntity,
	formatSubject,
	parseEntity,
	parseSubject,
} from "./core/refs.ts";
export type {
	ResourceGrantFilter,
	SubjectGrantFilter,
} from "./core/relationships.ts";
export {
	GLOBAL_NAMESPACE,
	MEMBER_RELATION,
	PARENT_RELATION,
} from "./core/types.ts";
export type {
	AuthzContext,
	CheckManyRequest,
	CheckRequest,
	CycleReport,
	EntityRef,
	Explanation,
	FilterAuthorizedRequest,
	GrantManyRequest,
	GrantRequest,
	HierarchyRule,
	ListResourcesRequest,
	ListUsersRequest,
	NamespaceStats,
	PathStep,
	RevokeRequest,
	SubjectRef,
	Tuple,
} from "./core/types.ts";
export type {
	GraphReader,
	GraphWriter,
	TupleStore,
} from "./store/interface.ts";
export { KyselyTupleStore } from "./store/kysely/adapter.ts";
export { createMigrator, migrateToLatest } from "./store/kysely/migrate.ts";
export type { DB } from "./store/kysely/schema.ts";
export { MemoryTupleStore } from "./store/memory/adapter.ts";
