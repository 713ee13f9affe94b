/**
 * OpenAI-backed generation and embedding capabilities.
 * Set OPENAI_API_KEY (OpenAI) or OPENROUTER_API_KEY (OpenRouter free models) in .env.local.
 */

import OpenAI from "openai"
import type { CourseLensConfig } from "@/lib/config"
import { ConfigError } from "@/lib/errors"
import type { Embedder } from "@/lib/evidenceStore"
import { debugLog } from "@/lib/log"
import { sleep } from "@/lib/retry"
import type { Generator } from "@/lib/synthesis"

type OpenAISettings = CourseLensConfig["openai"]

export type ChatOptions = {
  model: string
  system?: string
  signal?: AbortSignal
}

export function createOpenAIClient(settings: OpenAISettings): OpenAI {
  if (!settings.apiKey) {
    throw new ConfigError("OPENAI_API_KEY or OPENROUTER_API_KEY must be set to use the OpenAI capabilities")
  }
  return new OpenAI({
    apiKey: settings.apiKey,
    ...(settings.baseURL ? { baseURL: settings.baseURL } : {}),
  })
}

/**
 * Send a prompt to OpenAI and return the assistant's text response.
 */
export async function promptOpenAI(client: OpenAI, userContent: string, options: ChatOptions): Promise<string> {
  const { model, system, signal } = options
  const messages: OpenAI.Chat.ChatCompletionMessageParam[] = system
    ? [
        { role: "system", content: system },
        { role: "user", content: userContent },
      ]
    : [{ role: "user", content: userContent }]

  const completion = await client.chat.completions.create(
    { model, messages, temperature: 0.2 },
    { signal }
  )

  const text = completion.choices[0]?.message?.content?.trim()
  if (!text) throw new Error("Empty response from OpenAI")
  return text
}

/**
 * Spaces calls at least minIntervalMs apart, for free-tier quotas.
 * Each call reserves the next slot before it waits.
 */
export function createRateGate(minIntervalMs: number): (signal?: AbortSignal) => Promise<void> {
  let nextSlot = 0
  return async (signal) => {
    if (minIntervalMs <= 0) return
    const now = Date.now()
    const wait = Math.max(0, nextSlot - now)
    nextSlot = Math.max(now, nextSlot) + minIntervalMs
    if (wait > 0) {
      debugLog("openai", `rate limit: waiting ${wait}ms`)
      await sleep(wait, signal)
    }
  }
}

export function createOpenAIGenerator(settings: OpenAISettings, client = createOpenAIClient(settings)): Generator {
  const gate = createRateGate(settings.minIntervalMs)
  return {
    async generate(contextText, instructions, signal) {
      await gate(signal)
      return promptOpenAI(client, contextText, { model: settings.model, system: instructions, signal })
    },
  }
}

export function createOpenAIEmbedder(settings: OpenAISettings, client = createOpenAIClient(settings)): Embedder {
  return {
    async embed(text, signal) {
      const res = await client.embeddings.create({ model: settings.embeddingModel, input: text }, { signal })
      const vector = res.data[0]?.embedding
      if (!vector?.length) throw new Error("Empty embedding from OpenAI")
      return vector
    },
  }
}
