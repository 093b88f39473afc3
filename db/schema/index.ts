/**
 * Database schema barrel.
 *
 * @module db/schema
 */

export * from "./clauses"
export * from "./vectors"
