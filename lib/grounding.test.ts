import { describe, expect, it } from "vitest"

import { assembleContext, checkCitations, extractCitations } from "@/lib/grounding"
import type { EvidenceBundle } from "@/lib/types"

const bundle: EvidenceBundle = {
  query: "Is CMPUT 301 manageable with CMPUT 366?",
  catalogVersion: "v1",
  plan: { query: "Is CMPUT 301 manageable with CMPUT 366?", mentions: ["CMPUT 301", "CMPUT 366"], intents: ["overlap"], transitive: false },
  facts: [
    {
      id: "overlap:CMPUT 301|CMPUT 366",
      kind: "overlap",
      subjects: ["CMPUT 301", "CMPUT 366"],
      text: "CMPUT 301 and CMPUT 366\n share no prerequisites.",
      provenance: { operation: "overlap", args: ["CMPUT 301", "CMPUT 366"], catalogVersion: "v1" },
    },
  ],
  chunks: [
    { chunkId: "cat-301-0", score: 0.8, text: "Team   project.", source: { sourceType: "catalog", sourceId: "CMPUT 301", offset: 0 } },
    { chunkId: "rev-1", score: 0.5, text: "Heavy.", source: { sourceType: "review", sourceId: "review-1", courseCode: "CMPUT 301" } },
  ],
  partial: false,
  degradedReasons: [],
  dropped: { chunks: 0, facts: 0 },
  charCount: 69,
}

describe("assembleContext", () => {
  it("numbers facts before chunks and labels each source", () => {
    const context = assembleContext(bundle)
    expect(context.text).toBe(
      [
        "[E1] (course graph) CMPUT 301 and CMPUT 366 share no prerequisites.",
        "[E2] (catalog: CMPUT 301) Team project.",
        "[E3] (review: review-1) Heavy.",
      ].join("\n")
    )
    expect(context.tokens).toEqual(["E1", "E2", "E3"])
    expect(context.citations.get("E1")).toEqual({
      sourceType: "graph",
      sourceId: "overlap:CMPUT 301|CMPUT 366",
      itemId: "overlap:CMPUT 301|CMPUT 366",
    })
    expect(context.citations.get("E2")).toEqual({ sourceType: "catalog", sourceId: "CMPUT 301", offset: 0, itemId: "cat-301-0" })
    expect(context.citations.get("E3")).toEqual({ sourceType: "review", sourceId: "review-1", itemId: "rev-1" })
  })

  it("renders an empty bundle as an empty block", () => {
    const context = assembleContext({ ...bundle, facts: [], chunks: [] })
    expect(context).toEqual({ text: "", tokens: [], citations: new Map() })
  })
})

describe("extractCitations", () => {
  it("collects tokens from single and grouped brackets in first-use order", () => {
    expect(extractCitations("Yes [E2]. Also [e1, E3; E2] and [see notes] [X9].")).toEqual(["E2", "E1", "E3", "X9"])
  })

  it("finds nothing in an uncited answer", () => {
    expect(extractCitations("Both courses are fine.")).toEqual([])
  })
})

describe("checkCitations", () => {
  it("separates tokens missing from the context", () => {
    const context = assembleContext(bundle)
    expect(checkCitations("Fine [E1] but [E4].", context)).toEqual({ used: ["E1", "E4"], unknown: ["E4"] })
  })
})
