/**
 * Retrieval Coordinator: one query → graph facts + vector-search chunks,
 * merged into a bounded, deterministically ordered EvidenceBundle.
 */

import type { CatalogSnapshot } from "@/lib/catalog"
import { DEFAULT_RETRIEVAL, type RetrievalSettings } from "@/lib/config"
import type { EvidenceStore, Embedder } from "@/lib/evidenceStore"
import { EvidenceStoreUnavailableError, QueryCancelledError, errorMessage } from "@/lib/errors"
import { debugLog, warnLog } from "@/lib/log"
import { analyzeQuery } from "@/lib/queryAnalysis"
import { retryWithBackoff, withTimeout } from "@/lib/retry"
import type {
  Course,
  EvidenceBundle,
  FactKind,
  OverlapReport,
  QueryIntent,
  QueryPlan,
  RetrievedChunk,
  SearchFilter,
  SearchHit,
  StructuralFact,
} from "@/lib/types"

/** More than two mentions in an overlap question: every pair in mention order, up to this many. */
export const MAX_PAIRS = 6

const SOURCE_RANK = { catalog: 0, review: 1 } as const

const codesOf = (courses: Course[]) => courses.map((c) => c.code).join(", ")

function pairs(codes: string[], limit: number): [string, string][] {
  const out: [string, string][] = []
  for (let i = 0; i < codes.length; i++) {
    for (let j = i + 1; j < codes.length; j++) out.push([codes[i], codes[j]])
  }
  return out.slice(0, limit)
}

export function describeOverlap(r: OverlapReport): string {
  const { courseA: a, courseB: b } = r
  const shared = r.sharedPrerequisites.length
    ? `${a} and ${b} share prerequisites: ${codesOf(r.sharedPrerequisites)}.`
    : `${a} and ${b} share no prerequisites.`
  const ordering = r.aRequiresB
    ? `${b} is a prerequisite of ${a}.`
    : r.bRequiresA
      ? `${a} is a prerequisite of ${b}.`
      : "Neither course is a prerequisite of the other."
  const exclusion = r.mutuallyExclusive
    ? `${a} and ${b} cannot both be taken for credit.`
    : "Neither course excludes the other."
  return `${shared} ${ordering} ${exclusion}`
}

/**
 * Graph queries for the plan's intents. With course mentions but no
 * recognisable intent, each mention still gets its requirement fact.
 */
export function collectFacts(plan: QueryPlan, catalog: CatalogSnapshot): StructuralFact[] {
  const { graph, version } = catalog
  const facts: StructuralFact[] = []
  const add = (kind: FactKind, operation: string, args: string[], subjects: string[], text: string) => {
    facts.push({
      id: `${kind}:${args.join("|")}`,
      kind,
      subjects,
      text,
      provenance: { operation, args, catalogVersion: version },
    })
  }
  const intents: QueryIntent[] = plan.intents.length ? plan.intents : plan.mentions.length ? ["prerequisites"] : []

  for (const intent of intents) {
    switch (intent) {
      case "prerequisites":
        for (const code of plan.mentions) {
          add("requirements", "requirements_of", [code], [code], graph.describeRequirements(code))
          const excluded = graph.exclusionsOf(code)
          if (excluded.length) {
            add("exclusions", "exclusions_of", [code], [code], `${code} cannot be taken for credit with: ${codesOf(excluded)}.`)
          }
          if (!plan.transitive) continue
          const chain = graph.prerequisitesOf(code, true)
          if (chain.length > graph.prerequisitesOf(code).length) {
            add(
              "prerequisites",
              "prerequisites_of",
              [code, "transitive"],
              [code],
              `Full prerequisite chain for ${code} (closest first): ${codesOf(chain)}.`
            )
          }
        }
        break
      case "unlocks":
        for (const code of plan.mentions) {
          const unlocked = graph.unlocksOf(code, plan.transitive)
          const text = unlocked.length
            ? plan.transitive
              ? `Courses ${code} eventually leads to (closest first): ${codesOf(unlocked)}.`
              : `${code} is a direct prerequisite of: ${codesOf(unlocked)}.`
            : `${code} is not a prerequisite of any course.`
          add("unlocks", "unlocks_of", plan.transitive ? [code, "transitive"] : [code], [code], text)
        }
        break
      case "overlap":
        for (const [a, b] of pairs(plan.mentions, MAX_PAIRS)) {
          add("overlap", "overlap", [a, b], [a, b], describeOverlap(graph.overlap(a, b)))
        }
        break
      case "path":
        for (let i = 0; i + 1 < plan.mentions.length && i < MAX_PAIRS; i++) {
          const [a, b] = [plan.mentions[i], plan.mentions[i + 1]]
          const forward = graph.shortestPath(a, b)
          const backward = forward ? null : graph.shortestPath(b, a)
          const text = forward
            ? `Shortest prerequisite path from ${a} to ${b}: ${forward.map((c) => c.code).join(" -> ")}.`
            : backward
              ? `There is no prerequisite path from ${a} to ${b}; ${b} leads to ${a}: ${backward.map((c) => c.code).join(" -> ")}.`
              : `There is no prerequisite path between ${a} and ${b}.`
          add("path", "shortest_path", [a, b], [a, b], text)
        }
        break
    }
  }
  return facts
}

/**
 * Deduplicate by chunk id (best score wins), then order by descending score.
 * Equal scores: catalog text before reviews, then chunk id.
 */
export function mergeHits(hits: SearchHit[]): RetrievedChunk[] {
  const best = new Map<string, SearchHit>()
  for (const h of hits) {
    const prev = best.get(h.chunkId)
    if (!prev || h.score > prev.score) best.set(h.chunkId, h)
  }
  return [...best.values()]
    .sort(
      (x, y) =>
        y.score - x.score ||
        SOURCE_RANK[x.source.sourceType] - SOURCE_RANK[y.source.sourceType] ||
        (x.chunkId < y.chunkId ? -1 : x.chunkId > y.chunkId ? 1 : 0)
    )
    .map((h) => ({ chunkId: h.chunkId, score: h.score, text: h.rawText, source: h.source }))
}

/**
 * Fit facts and chunks into the character budget. Lowest-ranked chunks go
 * first; facts are only cut once no chunks remain.
 */
export function applyBudget(
  facts: StructuralFact[],
  chunks: RetrievedChunk[],
  charBudget: number
): { facts: StructuralFact[]; chunks: RetrievedChunk[]; dropped: { facts: number; chunks: number }; charCount: number } {
  const keptFacts = [...facts]
  const keptChunks = [...chunks]
  let total = keptFacts.reduce((n, f) => n + f.text.length, 0) + keptChunks.reduce((n, c) => n + c.text.length, 0)
  while (total > charBudget && keptChunks.length > 0) {
    total -= keptChunks.pop()?.text.length ?? 0
  }
  while (total > charBudget && keptFacts.length > 0) {
    total -= keptFacts.pop()?.text.length ?? 0
  }
  return {
    facts: keptFacts,
    chunks: keptChunks,
    dropped: { facts: facts.length - keptFacts.length, chunks: chunks.length - keptChunks.length },
    charCount: total,
  }
}

type SearchOutcome = { hits: SearchHit[]; failure?: string }

export type QueryOptions = {
  signal?: AbortSignal
  /** Courses from earlier turns, used when the query names none. */
  contextCourses?: readonly string[]
}

export type RetrievalDeps = {
  store: EvidenceStore
  embedder: Embedder
}

export class RetrievalCoordinator {
  private readonly deps: RetrievalDeps
  readonly settings: RetrievalSettings

  constructor(deps: RetrievalDeps, settings: Partial<RetrievalSettings> = {}) {
    this.deps = deps
    this.settings = { ...DEFAULT_RETRIEVAL, ...settings }
  }

  /**
   * Graph facts and the vector search run concurrently and are joined before
   * merging. A failed search degrades the bundle to facts only (partial)
   * instead of failing; UnknownCourseError and cancellation propagate.
   */
  async retrieve(query: string, catalog: CatalogSnapshot, opts: QueryOptions = {}): Promise<EvidenceBundle> {
    const { signal } = opts
    const plan = analyzeQuery(query, catalog.graph, opts.contextCourses)
    debugLog("retrieval", `mentions=[${plan.mentions.join(", ")}] intents=[${plan.intents.join(", ")}]`)

    const [facts, search] = await Promise.all([
      Promise.resolve().then(() => collectFacts(plan, catalog)),
      this.searchEvidence(plan, signal),
    ])
    if (signal?.aborted) throw new QueryCancelledError()

    const fitted = applyBudget(facts, mergeHits(search.hits), this.settings.charBudget)
    if (fitted.dropped.chunks || fitted.dropped.facts) {
      debugLog("retrieval", `budget dropped ${fitted.dropped.chunks} chunks, ${fitted.dropped.facts} facts`)
    }
    return {
      query,
      catalogVersion: catalog.version,
      plan,
      facts: fitted.facts,
      chunks: fitted.chunks,
      partial: search.failure !== undefined,
      degradedReasons: search.failure !== undefined ? [search.failure] : [],
      dropped: fitted.dropped,
      charCount: fitted.charCount,
    }
  }

  private async searchEvidence(plan: QueryPlan, signal?: AbortSignal): Promise<SearchOutcome> {
    const { topK, searchAttempts, searchTimeoutMs, backoffMs } = this.settings
    const filter: SearchFilter = plan.mentions.length ? { courseCodes: plan.mentions } : {}
    let embedding: number[] | undefined

    try {
      const hits = await retryWithBackoff(
        async () => {
          const vector =
            embedding ??
            (embedding = await withTimeout(
              (s) => this.deps.embedder.embed(plan.query, s),
              searchTimeoutMs,
              () => new EvidenceStoreUnavailableError(`Query embedding timed out after ${searchTimeoutMs}ms`),
              signal
            ))
          return withTimeout(
            (s) => this.deps.store.search(vector, filter, topK, s),
            searchTimeoutMs,
            () => new EvidenceStoreUnavailableError(`Evidence search timed out after ${searchTimeoutMs}ms`),
            signal
          )
        },
        {
          attempts: searchAttempts,
          baseDelayMs: backoffMs,
          shouldRetry: (err) => err instanceof EvidenceStoreUnavailableError,
          onRetry: (err, attempt, delayMs) =>
            warnLog("retrieval", `search attempt ${attempt} failed (${errorMessage(err)}); retrying in ${delayMs}ms`),
          signal,
        }
      )
      return { hits }
    } catch (err) {
      if (err instanceof QueryCancelledError) throw err
      warnLog("retrieval", "vector search gave up, continuing with structural facts only:", errorMessage(err))
      return { hits: [], failure: `vector search failed: ${errorMessage(err)}` }
    }
  }
}
