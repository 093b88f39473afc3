#!/usr/bin/env npx tsx
/**
 * Contract Validation Script
 *
 * Validates a plain-text contract against a JSON clause library and prints
 * the report record followed by per-category counts.
 *
 * Clauses live in memory unless DATABASE_URL is set, in which case the
 * library and its index are read from and written to Postgres.
 *
 * Usage: npm run validate-contract -- <contract.txt> <clauses.json> [contract-id]
 */

import { config } from "dotenv"
config({ path: ".env.local" })

import "../instrument"
import { readFile } from "node:fs/promises"
import { basename } from "node:path"
import { createDatabase } from "@/db/client"
import { DrizzleClauseStore } from "@/db/queries/clauses"
import { buildChecklist } from "@/lib/checklist"
import {
  clauseLibraryFileSchema,
  MemoryClauseStore,
  type ClauseInput,
  type ClauseLibrary,
  type ClauseStore,
} from "@/lib/clause-library"
import { loadConfig } from "@/lib/config"
import { createValidationPipeline } from "@/lib/contract-validation"
import { VoyageEmbeddingProvider } from "@/lib/embeddings"
import { NotFoundError, ValidationError, isAppError } from "@/lib/errors"
import { PlainTextExtractor } from "@/lib/text-extraction"
import { buildReportRecord, summarizeByCategory } from "@/lib/validation"
import { MemoryVectorIndex, PgVectorIndex, type VectorIndex } from "@/lib/vector-index"

async function loadClauseFile(path: string): Promise<ClauseInput[]> {
  const raw: unknown = JSON.parse(await readFile(path, "utf-8"))
  const parsed = clauseLibraryFileSchema.safeParse(raw)
  if (!parsed.success) {
    throw ValidationError.fromZodError(parsed.error, `Invalid clause file ${path}`)
  }
  return parsed.data.clauses
}

async function syncClause(library: ClauseLibrary, input: ClauseInput): Promise<void> {
  try {
    const existing = await library.get(input.clauseId)
    if (
      existing.text !== input.text.trim() ||
      existing.title !== input.title.trim() ||
      existing.category !== input.category.trim().toLowerCase()
    ) {
      await library.update(input.clauseId, {
        title: input.title,
        text: input.text,
        category: input.category,
      })
    }
  } catch (error) {
    if (!(error instanceof NotFoundError)) throw error
    await library.add(input)
  }
}

async function main() {
  const [contractPath, clausesPath, contractIdArg] = process.argv.slice(2)
  if (!contractPath || !clausesPath) {
    console.error("Usage: validate-contract <contract.txt> <clauses.json> [contract-id]")
    process.exit(1)
  }

  const settings = loadConfig()
  const provider = new VoyageEmbeddingProvider({
    apiKey: settings.voyageApiKey ?? "",
    model: settings.embeddingModel,
    baseUrl: settings.voyageBaseUrl,
  })

  let store: ClauseStore
  let clauseIndex: VectorIndex
  if (settings.databaseUrl) {
    const db = createDatabase(settings.databaseUrl)
    store = new DrizzleClauseStore(db)
    clauseIndex = new PgVectorIndex(db, {
      namespace: "clauses",
      dimensions: settings.embeddingDimensions,
    })
  } else {
    store = new MemoryClauseStore()
    clauseIndex = new MemoryVectorIndex(settings.embeddingDimensions)
  }

  const { library, service } = createValidationPipeline(settings, {
    provider,
    store,
    clauseIndex,
  })

  for (const clause of await loadClauseFile(clausesPath)) {
    await syncClause(library, clause)
  }
  const refreshed = await library.refreshStale()
  const summary = await library.summary()
  console.error(
    `Clause library: ${summary.total} clauses, ${summary.prohibited} prohibited, ` +
      `${refreshed.length} re-embedded`
  )

  const text = await new PlainTextExtractor().extractText(await readFile(contractPath), "eng")
  const contractId = contractIdArg ?? basename(contractPath).replace(/\.[^.]+$/, "")

  const report = await service.validate(contractId, text)
  const record = buildReportRecord(report, await library.list(), { generatedAt: new Date() })

  console.log(JSON.stringify(record, null, 2))

  console.error("\nBy category:")
  for (const { category, counts } of summarizeByCategory(record)) {
    console.error(
      `  ${category.padEnd(24)} ${counts.satisfied}/${counts.total} satisfied, ` +
        `${counts.partial} partial, ${counts.missing} missing, ${counts.conflicting} conflicting`
    )
  }

  console.error("\nChecklist:")
  for (const item of buildChecklist(text).items) {
    console.error(`  ${item.present ? "[x]" : "[ ]"} ${item.label}`)
  }
}

main().catch((error: unknown) => {
  if (isAppError(error)) {
    console.error(`${error.code}: ${error.message}`)
    for (const detail of error.details ?? []) {
      console.error(`  ${detail.field ?? "(input)"}: ${detail.message}`)
    }
  } else {
    console.error(error)
  }
  process.exit(1)
})
