import { z } from "zod";
import type { AuditSink } from "./core/audit.ts";
import { ValidationError } from "./core/errors.ts";
import { type Logger, silentLogger } from "./core/logger.ts";
import { identifierSchema } from "./core/validation.ts";

/**
 * Which relations granted on a parent resource cascade to a child of a given
 * type: every relation, none, or only the listed ones.
 */
export const inheritanceRuleSchema = z.union([
	z.literal("all"),
	z.literal("none"),
	z.array(identifierSchema),
]);

export type InheritanceRule = z.infer<typeof inheritanceRuleSchema>;

const depth = z.number().int().positive().max(1000);

export const engineOptionsSchema = z.object({
	maxGroupDepth: depth.default(50),
	maxResourceDepth: depth.default(50),
	maxHierarchyDepth: depth.default(50),
	defaultListLimit: z.number().int().positive().default(100),
	defaultSubjectType: identifierSchema.default("user"),
	/** Keyed by child resource type; types not listed inherit everything. */
	inheritance: z.record(z.string(), inheritanceRuleSchema).default({}),
});

export type EngineOptions = z.input<typeof engineOptionsSchema>;

export interface RelgraphOptions extends EngineOptions {
	clock?: () => Date;
	logger?: Logger;
	auditSinks?: AuditSink[];
}

export type ResolvedOptions = z.output<typeof engineOptionsSchema> & {
	clock: () => Date;
	logger: Logger;
	auditSinks: AuditSink[];
};

function firstIssue(error: z.ZodError): ValidationError {
	const issue = error.issues[0];
	const field = issue?.path.join(".") || "options";
	return new ValidationError(field, issue?.message ?? "is invalid");
}

export function resolveOptions(options: RelgraphOptions = {}): ResolvedOptions {
	const { clock, logger, auditSinks, ...engine } = options;
	const parsed = engineOptionsSchema.safeParse(engine);
	if (!parsed.success) throw firstIssue(parsed.error);
	return {
		...parsed.data,
		clock: clock ?? (() => new Date()),
		logger: logger ?? silentLogger,
		auditSinks: auditSinks ?? [],
	};
}

export function inheritsRelation(
	options: Pick<ResolvedOptions, "inheritance">,
	resourceType: string,
	relation: string,
): boolean {
	const rule = options.inheritance[resourceType] ?? "all";
	if (rule === "all") return true;
	if (rule === "none") return false;
	return rule.includes(relation);
}

// ── Environment ────────────────────────────────────────────────────

type Env = Record<string, string | undefined>;

const optionalInt = z.coerce.number().int().positive().optional();

const engineEnvSchema = z.object({
	RELGRAPH_MAX_GROUP_DEPTH: optionalInt,
	RELGRAPH_MAX_RESOURCE_DEPTH: optionalInt,
	RELGRAPH_MAX_HIERARCHY_DEPTH: optionalInt,
	RELGRAPH_DEFAULT_LIST_LIMIT: optionalInt,
	RELGRAPH_DEFAULT_SUBJECT_TYPE: z.string().optional(),
	RELGRAPH_INHERITANCE: z.string().optional(),
});

/** Parses `doc=read,write;folder=all;tag=none`. */
export function parseInheritance(
	value: string,
): Record<string, InheritanceRule> {
	const rules: Record<string, InheritanceRule> = {};
	for (const entry of value.split(";")) {
		if (entry.trim() === "") continue;
		const [type, relations] = entry.split("=").map((part) => part.trim());
		if (!type || relations === undefined) {
			throw new ValidationError(
				"RELGRAPH_INHERITANCE",
				`entries must look like type=relations (got: ${entry})`,
			);
		}
		rules[type] =
			relations === "all" || relations === "none"
				? relations
				: relations.split(",").map((relation) => relation.trim());
	}
	return rules;
}

export function optionsFromEnv(env: Env = process.env): EngineOptions {
	const parsed = engineEnvSchema.safeParse(env);
	if (!parsed.success) throw firstIssue(parsed.error);
	const vars = parsed.data;
	const options: EngineOptions = {};
	if (vars.RELGRAPH_MAX_GROUP_DEPTH) {
		options.maxGroupDepth = vars.RELGRAPH_MAX_GROUP_DEPTH;
	}
	if (vars.RELGRAPH_MAX_RESOURCE_DEPTH) {
		options.maxResourceDepth = vars.RELGRAPH_MAX_RESOURCE_DEPTH;
	}
	if (vars.RELGRAPH_MAX_HIERARCHY_DEPTH) {
		options.maxHierarchyDepth = vars.RELGRAPH_MAX_HIERARCHY_DEPTH;
	}
	if (vars.RELGRAPH_DEFAULT_LIST_LIMIT) {
		options.defaultListLimit = vars.RELGRAPH_DEFAULT_LIST_LIMIT;
	}
	if (vars.RELGRAPH_DEFAULT_SUBJECT_TYPE) {
		options.defaultSubjectType = vars.RELGRAPH_DEFAULT_SUBJECT_TYPE;
	}
	if (vars.RELGRAPH_INHERITANCE) {
		options.inheritance = parseInheritance(vars.RELGRAPH_INHERITANCE);
	}
	return options;
}

const databaseEnvSchema = z.object({
	POSTGRES_HOST: z.string().default("localhost"),
	POSTGRES_PORT: z.coerce.number().int().positive().default(5432),
	POSTGRES_USER: z.string().default("dev"),
	POSTGRES_PASSWORD: z.string().default("password"),
	POSTGRES_DB: z.string().default("dev"),
});

export interface DatabaseConfig {
	host: string;
	port: number;
	user: string;
	password: string;
	database: string;
}

export function databaseConfigFromEnv(env: Env = process.env): DatabaseConfig {
	const parsed = databaseEnvSchema.safeParse(env);
	if (!parsed.success) throw firstIssue(parsed.error);
	return {
		host: parsed.data.POSTGRES_HOST,
		port: parsed.data.POSTGRES_PORT,
		user: parsed.data.POSTGRES_USER,
		password: parsed.data.POSTGRES_PASSWORD,
		database: parsed.data.POSTGRES_DB,
	};
}
