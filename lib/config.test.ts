import { describe, expect, it } from "vitest"

import { DEFAULT_RETRIEVAL, loadConfig } from "@/lib/config"
import { ConfigError } from "@/lib/errors"

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({})).toEqual({
      openai: { model: "gpt-4o-mini", embeddingModel: "text-embedding-3-small", minIntervalMs: 0 },
      retrieval: DEFAULT_RETRIEVAL,
      generationTimeoutMs: 30000,
      catalogPath: "data/catalog.json",
      evidencePath: "data/evidence.json",
    })
  })

  it("prefers OpenRouter when its key is set", () => {
    const config = loadConfig({ OPENAI_API_KEY: "test-openai", OPENROUTER_API_KEY: "test-secret" })
    expect(config.openai).toEqual({
      apiKey: "test-secret",
      baseURL: "https://openrouter.ai/api/v1",
      model: "meta-llama/llama-3.3-70b-instruct:free",
      embeddingModel: "text-embedding-3-small",
      minIntervalMs: 0,
    })
  })

  it("parses numbers and treats blank values as unset", () => {
    const config = loadConfig({ COURSELENS_TOP_K: "5", COURSELENS_BACKOFF_MS: "0", OPENAI_MODEL: "  " })
    expect(config.retrieval.topK).toBe(5)
    expect(config.retrieval.backoffMs).toBe(0)
    expect(config.openai.model).toBe("gpt-4o-mini")
  })

  it("rejects out-of-range values", () => {
    expect(() => loadConfig({ COURSELENS_TOP_K: "0" })).toThrow(ConfigError)
    expect(() => loadConfig({ COURSELENS_TOP_K: "0" })).toThrow(
      "Invalid configuration: COURSELENS_TOP_K: Number must be greater than or equal to 1"
    )
    expect(() => loadConfig({ EVIDENCE_STORE_URL: "not a url" })).toThrow("Invalid configuration: EVIDENCE_STORE_URL")
  })
})
