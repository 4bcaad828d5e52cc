import { type Kysely, sql } from "kysely";

export async function up(db: Kysely<unknown>): Promise<void> {
	await db.schema
		.createTable("tuples")
		.addColumn("id", "bigserial", (col) => col.primaryKey())
		.addColumn("namespace", "text", (col) => col.notNull())
		.addColumn("resource_type", "text", (col) => col.notNull())
		.addColumn("resource_id", "text", (col) => col.notNull())
		.addColumn("relation", "text", (col) => col.notNull())
		.addColumn("subject_type", "text", (col) => col.notNull())
		.addColumn("subject_id", "text", (col) => col.notNull())
		.addColumn("subject_relation", "text", (col) => col.notNull().defaultTo(""))
		.addColumn("created_at", "timestamptz", (col) =>
			col.notNull().defaultTo(sql`now()`),
		)
		.addColumn("expires_at", "timestamptz")
		.addUniqueConstraint("tuples_edge_unique", [
			"namespace",
			"resource_type",
			"resource_id",
			"relation",
			"subject_type",
			"subject_id",
			"subject_relation",
		])
		.execute();

	// Reverse index for membership walks and subject-side queries.
	await db.schema
		.createIndex("tuples_subject_idx")
		.on("tuples")
		.columns(["namespace", "subject_type", "subject_id", "relation"])
		.execute();

	await db.schema
		.createIndex("tuples_expires_at_idx")
		.on("tuples")
		.columns(["namespace", "expires_at"])
		.execute();

	await db.schema
		.createTable("permission_hierarchy")
		.addColumn("id", "bigserial", (col) => col.primaryKey())
		.addColumn("namespace", "text", (col) => col.notNull())
		.addColumn("resource_type", "text", (col) => col.notNull())
		.addColumn("permission", "text", (col) => col.notNull())
		.addColumn("implies", "text", (col) => col.notNull())
		.addColumn("created_at", "timestamptz", (col) =>
			col.notNull().defaultTo(sql`now()`),
		)
		.addUniqueConstraint("permission_hierarchy_unique", [
			"namespace",
			"resource_type",
			"permission",
			"implies",
		])
		.addCheckConstraint(
			"permission_hierarchy_no_self",
			sql`permission <> implies`,
		)
		.execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
	await db.schema.dropTable("permission_hierarchy").execute();
	await db.schema.dropTable("tuples").execute();
}
