// test/setup.ts
// In-process Postgres (PGlite + pgvector) with transaction rollback per test
import { PGlite } from "@electric-sql/pglite"
import { vector } from "@electric-sql/pglite/vector"
import { drizzle } from "drizzle-orm/pglite"
import { sql } from "drizzle-orm"
import { beforeAll, beforeEach, afterEach, afterAll } from "vitest"
import * as schema from "@/db/schema"

// Create in-memory PGlite instance with the vector extension
const client = new PGlite({ extensions: { vector } })
export const testDb = drizzle(client, { schema })

// Track transaction state
let inTransaction = false

const SCHEMA_SQL = `
  CREATE EXTENSION IF NOT EXISTS vector;

  CREATE TABLE IF NOT EXISTS vector_entries (
    namespace TEXT NOT NULL,
    id TEXT NOT NULL,
    embedding vector(1024) NOT NULL,
    metadata JSONB NOT NULL DEFAULT '{}'::jsonb,
    updated_at TIMESTAMPTZ NOT NULL DEFAULT now(),
    PRIMARY KEY (namespace, id)
  );

  CREATE TABLE IF NOT EXISTS standard_clauses (
    clause_id TEXT PRIMARY KEY,
    title TEXT NOT NULL,
    text TEXT NOT NULL,
    category TEXT NOT NULL,
    version INTEGER NOT NULL DEFAULT 1,
    description TEXT,
    tags TEXT[] NOT NULL DEFAULT '{}',
    embedding vector(1024),
    embedding_text_hash TEXT,
    embedding_model TEXT,
    created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
    updated_at TIMESTAMPTZ NOT NULL DEFAULT now()
  );
`

// Each test file gets a fresh in-memory database
beforeAll(async () => {
  await client.exec(SCHEMA_SQL)
})

// Use transaction rollback pattern for test isolation
beforeEach(async () => {
  await testDb.execute(sql`BEGIN`)
  inTransaction = true
})

afterEach(async () => {
  if (inTransaction) {
    await testDb.execute(sql`ROLLBACK`)
    inTransaction = false
  }
})

afterAll(async () => {
  if (inTransaction) {
    await testDb.execute(sql`ROLLBACK`)
    inTransaction = false
  }
})
