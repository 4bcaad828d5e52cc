import { type ZodType, z } from "zod";
import { ValidationError } from "./errors.ts";
import type { EntityRef, SubjectRef } from "./types.ts";

const MAX_LENGTH = 1024;
const IDENTIFIER_PATTERN = /^[a-z][a-z0-9_-]*$/;
const NAMESPACE_PATTERN = /^[a-z0-9][a-z0-9_-]*$/;
// Tab, newline and carriage return are allowed in ids.
const CONTROL_CHARACTERS = /[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/;

type Check = (value: string, ctx: z.RefinementCtx) => boolean;

function fail(ctx: z.RefinementCtx, message: string): boolean {
	ctx.addIssue({ code: z.ZodIssueCode.custom, message });
	return false;
}

/** Runs checks in order and reports only the first failure. */
function text(...checks: Check[]): ZodType<string> {
	return z
		.string({
			required_error: "cannot be null",
			invalid_type_error: "must be a string",
		})
		.superRefine((value, ctx) => {
			for (const check of checks) {
				if (!check(value, ctx)) return;
			}
		});
}

const notBlank: Check = (value, ctx) =>
	value.trim() !== "" || fail(ctx, "cannot be empty");

const withinLength: Check = (value, ctx) =>
	value.length <= MAX_LENGTH ||
	fail(ctx, `exceeds maximum length of ${MAX_LENGTH} characters`);

export const identifierSchema = text(
	notBlank,
	withinLength,
	(value, ctx) =>
		IDENTIFIER_PATTERN.test(value) ||
		fail(
			ctx,
			`must start with a lowercase letter and contain only lowercase letters, numbers, underscores and hyphens (got: ${value})`,
		),
);

export const idSchema = text(
	notBlank,
	withinLength,
	(value, ctx) =>
		!CONTROL_CHARACTERS.test(value) ||
		fail(ctx, "contains invalid control characters"),
	(value, ctx) =>
		value === value.trim() ||
		fail(ctx, "cannot have leading or trailing whitespace"),
);

export const namespaceSchema = text(
	notBlank,
	withinLength,
	(value, ctx) =>
		NAMESPACE_PATTERN.test(value) ||
		fail(
			ctx,
			`must be lowercase alphanumeric with underscores or hyphens (got: ${value})`,
		),
);

function parseWith(schema: ZodType<string>, field: string, value: unknown) {
	const result = schema.safeParse(value);
	if (!result.success) {
		throw new ValidationError(
			field,
			result.error.issues[0]?.message ?? "is invalid",
		);
	}
	return result.data;
}

export function validateIdentifier(value: unknown, field: string): string {
	return parseWith(identifierSchema, field, value);
}

export function validateId(value: unknown, field: string): string {
	return parseWith(idSchema, field, value);
}

export function validateNamespace(value: unknown): string {
	return parseWith(namespaceSchema, "namespace", value);
}

/** Validates a list of ids, naming the index of the first bad element. */
export function validateIds(values: readonly unknown[], field: string): void {
	values.forEach((value, index) => {
		validateId(value, `${field}[${index}]`);
	});
}

export function validateEntity(entity: EntityRef, field: string): void {
	validateIdentifier(entity.type, `${field}.type`);
	validateId(entity.id, `${field}.id`);
}

export function validateSubject(subject: SubjectRef, field: string): void {
	validateEntity(subject, field);
	if (subject.relation !== undefined) {
		validateIdentifier(subject.relation, `${field}.relation`);
	}
}

export function validateExpiry(expiresAt: Date | null, now: Date): void {
	if (expiresAt === null) return;
	if (Number.isNaN(expiresAt.getTime())) {
		throw new ValidationError("expiresAt", "is not a valid date");
	}
	if (expiresAt.getTime() <= now.getTime()) {
		throw new ValidationError("expiresAt", "must be in the future");
	}
}
