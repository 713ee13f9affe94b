import { fileURLToPath } from "url"
import { AxiosError, AxiosHeaders } from "axios"
import { beforeEach, describe, expect, it, vi } from "vitest"

import { EvidenceStoreUnavailableError } from "@/lib/errors"
import {
  HttpEvidenceStore,
  InMemoryEvidenceStore,
  cosineSimilarity,
  embedEvidence,
  readEvidenceFile,
} from "@/lib/evidenceStore"
import { chunk, keywordEmbedder } from "@/lib/testFixtures"

const { post } = vi.hoisted(() => ({ post: vi.fn<(...args: unknown[]) => Promise<unknown>>() }))

vi.mock("axios", async (importOriginal) => {
  const actual = await importOriginal<typeof import("axios")>()
  return { ...actual, default: { ...actual.default, post } }
})

function httpError(status?: number): AxiosError {
  const err = new AxiosError(status ? `Request failed with status code ${status}` : "connect ECONNREFUSED", "ERR")
  if (status) {
    err.response = { status, statusText: "", headers: {}, config: { headers: new AxiosHeaders() }, data: null }
  }
  return err
}

describe("cosineSimilarity", () => {
  it("scores direction, not length", () => {
    expect(cosineSimilarity([1, 0], [3, 0])).toBe(1)
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0)
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0)
  })
})

describe("InMemoryEvidenceStore", () => {
  const store = new InMemoryEvidenceStore([
    chunk("c", "CMPUT 366", "search", [0, 1, 0]),
    chunk("a", "CMPUT 301", "workload", [1, 0, 0]),
    chunk("b", "CMPUT 301", "workload project", [1, 1, 0]),
    chunk("cat", "CMPUT 301", "catalog text", [1, 0, 0], "catalog"),
  ])

  it("ranks by descending score, ties by chunk id, capped at topK", async () => {
    const hits = await store.search([1, 0, 0], {}, 3)
    expect(hits.map((h) => h.chunkId)).toEqual(["a", "cat", "b"])
    expect(hits[0].score).toBe(1)
  })

  it("filters by course and source type", async () => {
    const hits = await store.search([1, 0, 0], { courseCodes: ["CMPUT 366"] }, 10)
    expect(hits.map((h) => h.chunkId)).toEqual(["c"])
    const catalogOnly = await store.search([1, 0, 0], { sourceTypes: ["catalog"] }, 10)
    expect(catalogOnly).toEqual([
      {
        chunkId: "cat",
        score: 1,
        rawText: "catalog text",
        source: { sourceType: "catalog", sourceId: "CMPUT 301", courseCode: "CMPUT 301" },
      },
    ])
  })

  it("rejects duplicate chunk ids", () => {
    expect(() => new InMemoryEvidenceStore([chunk("a", "CMPUT 301", "x", [1]), chunk("a", "CMPUT 366", "y", [1])])).toThrow(
      "Duplicate evidence chunk id: a"
    )
  })
})

describe("HttpEvidenceStore", () => {
  const store = new HttpEvidenceStore({ baseUrl: "http://evidence.test/", timeoutMs: 1234 })

  beforeEach(() => {
    post.mockReset()
  })

  it("posts the query and validates the hits", async () => {
    const hit = { chunkId: "a", score: 0.5, rawText: "text", source: { sourceType: "review", sourceId: "review-a" } }
    post.mockResolvedValueOnce({ data: { hits: [hit, { ...hit, chunkId: "b" }] } })

    const hits = await store.search([1, 0], { courseCodes: ["CMPUT 301"] }, 1)

    expect(hits).toEqual([hit])
    expect(post).toHaveBeenCalledWith(
      "http://evidence.test/search",
      { embedding: [1, 0], filter: { courseCodes: ["CMPUT 301"] }, topK: 1 },
      { timeout: 1234, signal: undefined }
    )
  })

  it("treats 5xx and network failures as unavailable", async () => {
    post.mockRejectedValueOnce(httpError(503))
    await expect(store.search([1], {}, 5)).rejects.toThrow(
      "Evidence store unavailable (HTTP 503): Request failed with status code 503"
    )
    post.mockRejectedValueOnce(httpError())
    await expect(store.search([1], {}, 5)).rejects.toBeInstanceOf(EvidenceStoreUnavailableError)
  })

  it("does not mark client errors or bad payloads as retriable", async () => {
    post.mockRejectedValueOnce(httpError(400))
    const rejected = await store.search([1], {}, 5).catch((err: unknown) => err)
    expect(rejected).not.toBeInstanceOf(EvidenceStoreUnavailableError)
    expect(rejected).toEqual(new Error("Evidence store rejected search (HTTP 400): Request failed with status code 400"))

    post.mockResolvedValueOnce({ data: { results: [] } })
    await expect(store.search([1], {}, 5)).rejects.toThrow("Evidence store returned an unexpected response")
  })
})

describe("evidence files", () => {
  it("reads the sample evidence file", () => {
    const records = readEvidenceFile(fileURLToPath(new URL("../data/evidence.json", import.meta.url)))
    expect(records).toHaveLength(8)
    expect(records[0]).toEqual({
      id: "cat-301-0",
      sourceType: "catalog",
      sourceId: "CMPUT 301",
      offset: 0,
      text: "CMPUT 301 covers object-oriented design, requirements and testing through a semester-long team project.",
    })
  })

  it("embeds records and normalizes their course codes", async () => {
    const chunks = await embedEvidence(
      [
        { id: "c1", sourceType: "catalog", sourceId: "cmput301", text: "Workload is high" },
        { id: "r1", sourceType: "review", sourceId: "review-1", courseCode: "cmput-366", text: "search heavy" },
      ],
      keywordEmbedder
    )
    expect(chunks).toEqual([
      { id: "c1", sourceType: "catalog", sourceId: "CMPUT 301", courseCode: "CMPUT 301", text: "Workload is high", embedding: [1, 0, 0] },
      { id: "r1", sourceType: "review", sourceId: "review-1", courseCode: "CMPUT 366", text: "search heavy", embedding: [0, 0, 1] },
    ])
  })
})
