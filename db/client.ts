/**
 * Neon Serverless Database Client
 *
 * Drizzle ORM over Neon's HTTP driver. Each query is an independent HTTP
 * request, so there is no pool to manage or close.
 *
 * Repositories take a `Database` rather than importing the client, so tests
 * can hand them a PGlite-backed instance with the same schema.
 *
 * @see {@link https://neon.tech/docs/serverless/serverless-driver} Neon Serverless Driver
 * @see {@link https://orm.drizzle.team/docs/get-started-postgresql#neon} Drizzle + Neon Setup
 *
 * @module db/client
 */

import { neon } from "@neondatabase/serverless"
import { drizzle } from "drizzle-orm/neon-http"
import type { PgDatabase, PgQueryResultHKT } from "drizzle-orm/pg-core"
import { ConfigError } from "@/lib/errors"
import * as schema from "./schema"

/**
 * Any Drizzle Postgres database carrying the application schema
 * (Neon HTTP in production, PGlite in tests).
 */
export type Database = PgDatabase<PgQueryResultHKT, typeof schema>

/**
 * Create a Drizzle client for a Neon connection string.
 *
 * @example
 * ```typescript
 * const db = createDatabase(config.databaseUrl)
 * const store = new DrizzleClauseStore(db)
 * ```
 */
export function createDatabase(databaseUrl: string | undefined): Database {
  if (!databaseUrl) {
    throw new ConfigError("DATABASE_URL is required for Postgres storage")
  }
  return drizzle(neon(databaseUrl), { schema })
}
