import { PostgresDialect } from "kysely";
import { defineConfig } from "kysely-ctl";
import pg from "pg";
import { databaseConfigFromEnv } from "./src/config.ts";

export default defineConfig({
  dialect: new PostgresDialect({
    pool: new pg.Pool(databaseConfigFromEnv()),
  }),
  migrations: {
    migrationFolder: "src/store/kysely/migrations",
  },
});
