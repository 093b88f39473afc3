import { config } from "dotenv"
import { defineConfig } from "drizzle-kit"

config({ path: ".env.local" })

const url = process.env.DATABASE_URL
if (!url) {
  throw new Error("DATABASE_URL is not set in .env or .env.local")
}

export default defineConfig({
  schema: "./db/schema/index.ts",
  out: "./drizzle",
  dialect: "postgresql",
  dbCredentials: { url },
})
