import { Kysely, PostgresDialect } from "kysely";
import { Pool } from "pg";
import { logger } from "../../shared/logger";
import type { DB } from "./schema";

export interface DatabaseConfig {
  connectionString: string;
  max: number;
}

/**
 * Create the Kysely instance backing the policy store. The caller owns the
 * returned instance and must `destroy()` it on shutdown.
 */
export function createDatabase(dbConfig: DatabaseConfig): Kysely<DB> {
  const pool = new Pool({
    connectionString: dbConfig.connectionString,
    max: dbConfig.max,
  });

  pool.on("error", (error) => {
    logger.error("PostgreSQL pool error", { error: error.message });
  });

  return new Kysely<DB>({
    dialect: new PostgresDialect({ pool }),
  });
}
