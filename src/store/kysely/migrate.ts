import {
	type Kysely,
	type Migration,
	type MigrationProvider,
	type MigrationResult,
	Migrator,
} from "kysely";
import * as initial from "./migrations/001_initial.ts";

const migrations: Record<string, Migration> = {
	"001_initial": initial,
};

/** Serves the bundled migrations without reading the migrations folder. */
class BundledMigrationProvider implements MigrationProvider {
	async getMigrations(): Promise<Record<string, Migration>> {
		return migrations;
	}
}

export function createMigrator<T>(db: Kysely<T>): Migrator {
	return new Migrator({ db, provider: new BundledMigrationProvider() });
}

/** Applies every pending migration; rethrows the first failure. */
export async function migrateToLatest<T>(
	db: Kysely<T>,
): Promise<MigrationResult[]> {
	const { error, results } = await createMigrator(db).migrateToLatest();
	if (error) throw error;
	return results ?? [];
}
