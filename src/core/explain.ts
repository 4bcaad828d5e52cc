import type { ResolvedOptions } from "../config.ts";
import type { GraphReader } from "../store/interface.ts";
import { formatEntity, formatSubject, resourceOf, subjectOf } from "./refs.ts";
import { Resolver } from "./resolver.ts";
import type {
	CheckRequest,
	Explanation,
	PathStep,
	Tuple,
} from "./types.ts";

type ExplainOptions = Pick<
	ResolvedOptions,
	"maxGroupDepth" | "maxResourceDepth" | "maxHierarchyDepth" | "inheritance"
>;

function holding(label: string, tuple: Tuple): string {
	const subject = formatSubject(subjectOf(tuple));
	const resource = formatEntity(resourceOf(tuple));
	return `${label}: ${subject} has ${tuple.relation} on ${resource}`;
}

/** One line per witness step, e.g. `GROUP: team:eng has read on repo:acme`. */
export function describeStep(step: PathStep): string {
	switch (step.kind) {
		case "direct":
			return holding("DIRECT", step.tuple);
		case "group":
			return holding("GROUP", step.tuple);
		case "userset":
			return holding("USERSET", step.tuple);
		case "parent": {
			const child = formatEntity(resourceOf(step.tuple));
			const parent = formatEntity(subjectOf(step.tuple));
			return `RESOURCE: ${child} is contained in ${parent}`;
		}
		case "hierarchy":
			return `HIERARCHY: ${step.chain.join(" -> ")} on ${step.resourceType}`;
	}
}

export function renderExplanation(
	request: CheckRequest,
	path: PathStep[] | null,
): Explanation {
	if (!path) {
		const subject = formatEntity(request.subject);
		const resource = formatEntity(request.resource);
		const missing = `${request.permission} on ${resource}`;
		return {
			allowed: false,
			path: [],
			text: `NO ACCESS: ${subject} does not have ${missing}`,
		};
	}
	return {
		allowed: true,
		path,
		text: path.map(describeStep).join("\n"),
	};
}

/**
 * Runs the same resolution as a check and returns its first witness path.
 * Denials report that no path exists; failed branches are not enumerated.
 */
export async function explainPermission(
	reader: GraphReader,
	options: ExplainOptions,
	request: CheckRequest,
): Promise<Explanation> {
	const resolver = new Resolver(reader, options, request.subject);
	return renderExplanation(
		request,
		await resolver.resolve(request.permission, request.resource),
	);
}
