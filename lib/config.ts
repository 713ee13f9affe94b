/**
 * Environment configuration. Values come from process.env (after dotenv has
 * loaded .env.local / .env) and are validated with zod.
 */

import { z } from "zod"
import { ConfigError } from "@/lib/errors"

const optionalString = z
  .string()
  .optional()
  .transform((s) => (s?.trim() ? s.trim() : undefined))

const int = (fallback: number, min: number, max = Number.MAX_SAFE_INTEGER) =>
  z.coerce.number().int().min(min).max(max).default(fallback)

const EnvSchema = z.object({
  OPENAI_API_KEY: optionalString,
  OPENROUTER_API_KEY: optionalString,
  OPENAI_MODEL: optionalString,
  OPENAI_EMBEDDING_MODEL: optionalString,
  COURSELENS_TOP_K: int(20, 1, 100),
  COURSELENS_BUNDLE_CHAR_BUDGET: int(6000, 200),
  COURSELENS_SEARCH_ATTEMPTS: int(3, 1, 10),
  COURSELENS_SEARCH_TIMEOUT_MS: int(5000, 1),
  COURSELENS_BACKOFF_MS: int(250, 0),
  COURSELENS_GENERATION_TIMEOUT_MS: int(30000, 1),
  COURSELENS_MIN_GENERATION_INTERVAL_MS: int(0, 0),
  COURSELENS_CATALOG_PATH: z.string().default("data/catalog.json"),
  COURSELENS_EVIDENCE_PATH: z.string().default("data/evidence.json"),
  EVIDENCE_STORE_URL: optionalString.pipe(z.string().url().optional()),
})

export type RetrievalSettings = {
  topK: number
  charBudget: number
  searchAttempts: number
  searchTimeoutMs: number
  backoffMs: number
}

export type CourseLensConfig = {
  openai: {
    apiKey?: string
    baseURL?: string
    model: string
    embeddingModel: string
    minIntervalMs: number
  }
  retrieval: RetrievalSettings
  generationTimeoutMs: number
  catalogPath: string
  evidencePath: string
  evidenceStoreUrl?: string
}

export const DEFAULT_RETRIEVAL: RetrievalSettings = {
  topK: 20,
  charBudget: 6000,
  searchAttempts: 3,
  searchTimeoutMs: 5000,
  backoffMs: 250,
}

/** Blank values count as unset so an empty line in .env falls back to the default. */
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {}
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") out[key] = value
  }
  return out
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CourseLensConfig {
  const parsed = EnvSchema.safeParse(withoutBlanks(env))
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`)
    throw new ConfigError(`Invalid configuration: ${issues.join("; ")}`)
  }
  const e = parsed.data
  const useOpenRouter = !!e.OPENROUTER_API_KEY
  return {
    openai: {
      apiKey: useOpenRouter ? e.OPENROUTER_API_KEY : e.OPENAI_API_KEY,
      baseURL: useOpenRouter ? "https://openrouter.ai/api/v1" : undefined,
      model:
        e.OPENAI_MODEL ?? (useOpenRouter ? "meta-llama/llama-3.3-70b-instruct:free" : "gpt-4o-mini"),
      embeddingModel: e.OPENAI_EMBEDDING_MODEL ?? "text-embedding-3-small",
      minIntervalMs: e.COURSELENS_MIN_GENERATION_INTERVAL_MS,
    },
    retrieval: {
      topK: e.COURSELENS_TOP_K,
      charBudget: e.COURSELENS_BUNDLE_CHAR_BUDGET,
      searchAttempts: e.COURSELENS_SEARCH_ATTEMPTS,
      searchTimeoutMs: e.COURSELENS_SEARCH_TIMEOUT_MS,
      backoffMs: e.COURSELENS_BACKOFF_MS,
    },
    generationTimeoutMs: e.COURSELENS_GENERATION_TIMEOUT_MS,
    catalogPath: e.COURSELENS_CATALOG_PATH,
    evidencePath: e.COURSELENS_EVIDENCE_PATH,
    evidenceStoreUrl: e.EVIDENCE_STORE_URL,
  }
}
