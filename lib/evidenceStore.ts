/**
 * Evidence Store contract plus two adapters: an in-memory cosine index for
 * local catalogs and tests, and an HTTP client for a remote vector store.
 */

import fs from "fs"
import axios from "axios"
import { z } from "zod"
import { CatalogFileError, EvidenceStoreUnavailableError, errorMessage } from "@/lib/errors"
import { normalizeCode } from "@/lib/courseCodes"
import type { EvidenceChunk, SearchFilter, SearchHit, SourceType } from "@/lib/types"

export interface EvidenceStore {
  /** Nearest neighbours by embedding, ordered by descending score. */
  search(embedding: number[], filter: SearchFilter, topK: number, signal?: AbortSignal): Promise<SearchHit[]>
}

export interface Embedder {
  embed(text: string, signal?: AbortSignal): Promise<number[]>
}

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  const n = Math.min(a.length, b.length)
  let dot = 0
  let normA = 0
  let normB = 0
  for (let i = 0; i < n; i++) {
    dot += a[i] * b[i]
    normA += a[i] * a[i]
    normB += b[i] * b[i]
  }
  if (normA === 0 || normB === 0) return 0
  return dot / (Math.sqrt(normA) * Math.sqrt(normB))
}

/** Course a chunk is about; catalog chunks default to their source course. */
function courseOf(chunk: EvidenceChunk): string | undefined {
  return chunk.courseCode ?? (chunk.sourceType === "catalog" ? chunk.sourceId : undefined)
}

function matchesFilter(chunk: EvidenceChunk, filter: SearchFilter): boolean {
  if (filter.sourceTypes?.length && !filter.sourceTypes.includes(chunk.sourceType)) return false
  if (filter.courseCodes?.length) {
    const course = courseOf(chunk)
    if (!course || !filter.courseCodes.includes(course)) return false
  }
  return true
}

export class InMemoryEvidenceStore implements EvidenceStore {
  private readonly chunks: readonly Readonly<EvidenceChunk>[]

  constructor(chunks: EvidenceChunk[]) {
    const ids = new Set<string>()
    this.chunks = chunks.map((c) => {
      if (ids.has(c.id)) throw new Error(`Duplicate evidence chunk id: ${c.id}`)
      ids.add(c.id)
      return Object.freeze({ ...c, embedding: [...c.embedding] })
    })
  }

  get size(): number {
    return this.chunks.length
  }

  async search(embedding: number[], filter: SearchFilter, topK: number): Promise<SearchHit[]> {
    return this.chunks
      .filter((c) => matchesFilter(c, filter))
      .map((c): SearchHit => {
        const courseCode = courseOf(c)
        return {
          chunkId: c.id,
          score: cosineSimilarity(embedding, c.embedding),
          rawText: c.text,
          source: {
            sourceType: c.sourceType,
            sourceId: c.sourceId,
            ...(courseCode ? { courseCode } : {}),
            ...(c.offset !== undefined ? { offset: c.offset } : {}),
          },
        }
      })
      .sort((x, y) => y.score - x.score || (x.chunkId < y.chunkId ? -1 : x.chunkId > y.chunkId ? 1 : 0))
      .slice(0, topK)
  }
}

const SearchHitSchema = z.object({
  chunkId: z.string(),
  score: z.number(),
  rawText: z.string(),
  source: z.object({
    sourceType: z.enum(["catalog", "review"]),
    sourceId: z.string(),
    courseCode: z.string().optional(),
    offset: z.number().int().nonnegative().optional(),
  }),
})

const SearchResponseSchema = z.object({ hits: z.array(SearchHitSchema) })

export type HttpEvidenceStoreOptions = {
  baseUrl: string
  timeoutMs?: number
}

/**
 * Remote store speaking `POST {baseUrl}/search` with `{ embedding, filter, topK }`
 * and answering `{ hits: SearchHit[] }`. Network errors, timeouts and 5xx
 * responses surface as EvidenceStoreUnavailableError so the caller retries them.
 */
export class HttpEvidenceStore implements EvidenceStore {
  private readonly baseUrl: string
  private readonly timeoutMs: number

  constructor(options: HttpEvidenceStoreOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "")
    this.timeoutMs = options.timeoutMs ?? 5000
  }

  async search(embedding: number[], filter: SearchFilter, topK: number, signal?: AbortSignal): Promise<SearchHit[]> {
    let data: unknown
    try {
      const res = await axios.post<unknown>(
        `${this.baseUrl}/search`,
        { embedding, filter, topK },
        { timeout: this.timeoutMs, signal }
      )
      data = res.data
    } catch (err) {
      if (axios.isAxiosError(err)) {
        const status = err.response?.status
        if (status === undefined || status >= 500) {
          throw new EvidenceStoreUnavailableError(
            `Evidence store unavailable${status ? ` (HTTP ${status})` : ""}: ${err.message}`,
            err
          )
        }
        throw new Error(`Evidence store rejected search (HTTP ${status}): ${err.message}`)
      }
      throw err
    }
    const parsed = SearchResponseSchema.safeParse(data)
    if (!parsed.success) {
      throw new Error(`Evidence store returned an unexpected response: ${parsed.error.issues[0]?.message ?? "invalid"}`)
    }
    return parsed.data.hits.slice(0, topK)
  }
}

const EvidenceRecordSchema = z.object({
  id: z.string().min(1),
  sourceType: z.enum(["catalog", "review"]),
  sourceId: z.string().min(1),
  /** Defaults to sourceId for catalog chunks. */
  courseCode: z.string().min(1).optional(),
  offset: z.number().int().nonnegative().optional(),
  text: z.string().min(1),
})

const EvidenceFileSchema = z.object({ chunks: z.array(EvidenceRecordSchema) })

export type EvidenceRecord = z.infer<typeof EvidenceRecordSchema>

/** Read text chunks (without embeddings) from a JSON file: { chunks: [...] }. */
export function readEvidenceFile(filePath: string): EvidenceRecord[] {
  let data: unknown
  try {
    data = JSON.parse(fs.readFileSync(filePath, "utf-8"))
  } catch (err) {
    throw new CatalogFileError(`Cannot read evidence file ${filePath}: ${errorMessage(err)}`, err)
  }
  const parsed = EvidenceFileSchema.safeParse(data)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`)
    throw new CatalogFileError(`Invalid evidence file ${filePath}: ${issues.slice(0, 10).join("; ")}`)
  }
  return parsed.data.chunks
}

/** Embed records one by one; course codes are normalized, catalog chunks default to their source. */
export async function embedEvidence(records: EvidenceRecord[], embedder: Embedder): Promise<EvidenceChunk[]> {
  const out: EvidenceChunk[] = []
  for (const r of records) {
    const sourceType: SourceType = r.sourceType
    const sourceId = sourceType === "catalog" ? normalizeCode(r.sourceId) : r.sourceId
    const courseCode = r.courseCode ? normalizeCode(r.courseCode) : sourceType === "catalog" ? sourceId : undefined
    out.push({
      id: r.id,
      sourceType,
      sourceId,
      ...(courseCode ? { courseCode } : {}),
      ...(r.offset !== undefined ? { offset: r.offset } : {}),
      text: r.text,
      embedding: await embedder.embed(r.text),
    })
  }
  return out
}
