/**
 * Grounding Assembler. Renders an EvidenceBundle into the text block handed to
 * generation and keeps a map from each citation token back to its source.
 * Lines hold a token, a source label and the item text with whitespace
 * collapsed; nothing else is written into the block.
 */

import type { CitationSource, EvidenceBundle, GroundedContext } from "@/lib/types"

export function normalizeExcerpt(text: string): string {
  return text.replace(/\s+/g, " ").trim()
}

export function citationToken(n: number): string {
  return `E${n}`
}

export function assembleContext(bundle: EvidenceBundle): GroundedContext {
  const lines: string[] = []
  const tokens: string[] = []
  const citations = new Map<string, CitationSource>()

  const push = (label: string, text: string, source: CitationSource) => {
    const token = citationToken(tokens.length + 1)
    tokens.push(token)
    citations.set(token, source)
    lines.push(`[${token}] (${label}) ${normalizeExcerpt(text)}`)
  }

  for (const fact of bundle.facts) {
    push("course graph", fact.text, { sourceType: "graph", sourceId: fact.id, itemId: fact.id })
  }
  for (const chunk of bundle.chunks) {
    const { sourceType, sourceId, offset } = chunk.source
    push(`${sourceType}: ${sourceId}`, chunk.text, {
      sourceType,
      sourceId,
      ...(offset !== undefined ? { offset } : {}),
      itemId: chunk.chunkId,
    })
  }

  return { text: lines.join("\n"), tokens, citations }
}

/** Bracketed groups such as "[E1]" or "[E1, E3]". */
const CITATION_GROUP = /\[([^[\]]+)\]/g
const CITATION_LIKE = /^[A-Z]\d+$/

/** Citation tokens used in an answer, in order of first use. */
export function extractCitations(answer: string): string[] {
  const seen: string[] = []
  for (const m of answer.matchAll(CITATION_GROUP)) {
    for (const part of m[1].split(/[\s,;]+/)) {
      const token = part.trim().toUpperCase()
      if (CITATION_LIKE.test(token) && !seen.includes(token)) seen.push(token)
    }
  }
  return seen
}

export type CitationCheck = {
  used: string[]
  unknown: string[]
}

export function checkCitations(answer: string, context: GroundedContext): CitationCheck {
  const used = extractCitations(answer)
  return { used, unknown: used.filter((t) => !context.citations.has(t)) }
}
