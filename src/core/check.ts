import type { ResolvedOptions } from "../config.ts";
import type { GraphReader } from "../store/interface.ts";
import { Resolver } from "./resolver.ts";
import type {
	CheckManyRequest,
	CheckRequest,
	FilterAuthorizedRequest,
} from "./types.ts";

type CheckOptions = Pick<
	ResolvedOptions,
	"maxGroupDepth" | "maxResourceDepth" | "maxHierarchyDepth" | "inheritance"
>;

export async function checkPermission(
	reader: GraphReader,
	options: CheckOptions,
	request: CheckRequest,
): Promise<boolean> {
	const resolver = new Resolver(reader, options, request.subject);
	const path = await resolver.resolve(request.permission, request.resource);
	return path !== null;
}

export async function checkAnyPermission(
	reader: GraphReader,
	options: CheckOptions,
	request: CheckManyRequest,
): Promise<boolean> {
	const resolver = new Resolver(reader, options, request.subject);
	for (const permission of request.permissions) {
		if (await resolver.resolve(permission, request.resource)) return true;
	}
	return false;
}

/** True for an empty permission list. */
export async function checkAllPermissions(
	reader: GraphReader,
	options: CheckOptions,
	request: CheckManyRequest,
): Promise<boolean> {
	const resolver = new Resolver(reader, options, request.subject);
	for (const permission of request.permissions) {
		if (!(await resolver.resolve(permission, request.resource))) return false;
	}
	return true;
}

/**
 * The subset of `resourceIds` the subject may access, deduplicated, in input
 * order.
 */
export async function filterAuthorized(
	reader: GraphReader,
	options: CheckOptions,
	request: FilterAuthorizedRequest,
): Promise<string[]> {
	const resolver = new Resolver(reader, options, request.subject);
	const allowed: string[] = [];
	for (const id of new Set(request.resourceIds)) {
		const resource = { type: request.resourceType, id };
		if (await resolver.resolve(request.permission, resource)) allowed.push(id);
	}
	return allowed;
}
