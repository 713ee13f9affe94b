/**
 * Wires the catalog registry, retrieval, grounding and synthesis into one
 * object, and keeps simple run statistics. Follow-up questions go through a
 * ConversationSession, which remembers the courses of the previous turn.
 */

import { CatalogRegistry, type CatalogSnapshot } from "@/lib/catalog"
import type { CourseLensConfig } from "@/lib/config"
import type { ErrorKind } from "@/lib/errors"
import {
  HttpEvidenceStore,
  InMemoryEvidenceStore,
  embedEvidence,
  readEvidenceFile,
  type Embedder,
  type EvidenceStore,
} from "@/lib/evidenceStore"
import { debugLog } from "@/lib/log"
import { createOpenAIClient, createOpenAIEmbedder, createOpenAIGenerator } from "@/lib/openai"
import { RetrievalCoordinator, type QueryOptions } from "@/lib/retrieval"
import { SynthesisOrchestrator, type Generator, type SynthesisResult, type TransitionListener } from "@/lib/synthesis"
import type { Answer, Citation, Course, PrerequisiteEdgeRecord } from "@/lib/types"

export type CourseLensStats = {
  queries: number
  done: number
  failed: number
  degraded: number
  failuresByKind: Partial<Record<ErrorKind, number>>
  catalogVersion: string | null
  courseCount: number
}

/** Answer as returned to callers: the bundle stays server-side. */
export type AnswerPayload = {
  text: string
  citations: Citation[]
  coverage: number
  degraded: boolean
}

export function toAnswerPayload(answer: Answer): AnswerPayload {
  return {
    text: answer.text,
    citations: answer.citations,
    coverage: answer.coverage,
    degraded: answer.degraded,
  }
}

export type CourseLensDeps = {
  store: EvidenceStore
  embedder: Embedder
  generator: Generator
  registry?: CatalogRegistry
  retrieval?: Partial<CourseLensConfig["retrieval"]>
  generationTimeoutMs?: number
  onTransition?: TransitionListener
}

export class CourseLens {
  readonly registry: CatalogRegistry
  private readonly orchestrator: SynthesisOrchestrator
  private readonly counters = { queries: 0, done: 0, failed: 0, degraded: 0 }
  private readonly failuresByKind: Partial<Record<ErrorKind, number>> = {}

  constructor(deps: CourseLensDeps) {
    this.registry = deps.registry ?? new CatalogRegistry()
    const retriever = new RetrievalCoordinator({ store: deps.store, embedder: deps.embedder }, deps.retrieval)
    this.orchestrator = new SynthesisOrchestrator(
      { catalog: () => this.registry.current(), retriever, generator: deps.generator },
      { generationTimeoutMs: deps.generationTimeoutMs ?? 30_000, onTransition: deps.onTransition }
    )
  }

  activateCatalog(version: string, courses: Course[], edges: PrerequisiteEdgeRecord[]): CatalogSnapshot {
    return this.registry.activate(version, courses, edges)
  }

  async ask(query: string, opts: QueryOptions = {}): Promise<SynthesisResult> {
    this.counters.queries++
    const result = await this.orchestrator.run(query, opts)
    if (result.status === "DONE") {
      this.counters.done++
      if (result.answer.degraded) this.counters.degraded++
    } else {
      this.counters.failed++
      const kind = result.error.kind
      this.failuresByKind[kind] = (this.failuresByKind[kind] ?? 0) + 1
    }
    return result
  }

  /** A fresh conversation; sessions share nothing but this lens. */
  session(): ConversationSession {
    return new ConversationSession(this)
  }

  stats(): CourseLensStats {
    const active = this.registry.hasActive ? this.registry.current() : null
    return {
      ...this.counters,
      failuresByKind: { ...this.failuresByKind },
      catalogVersion: active?.version ?? null,
      courseCount: active?.graph.size ?? 0,
    }
  }
}

export class ConversationSession {
  private selected: string[] = []
  private turnCount = 0

  constructor(private readonly lens: CourseLens) {}

  /** Courses mentioned by the most recent turn that named any. */
  get selectedCourses(): readonly string[] {
    return this.selected
  }

  get turns(): number {
    return this.turnCount
  }

  async ask(query: string, opts: { signal?: AbortSignal } = {}): Promise<SynthesisResult> {
    const result = await this.lens.ask(query, { ...opts, contextCourses: this.selected })
    this.turnCount++
    const bundle = result.status === "DONE" ? result.answer.bundle : result.bundle
    const mentions = bundle?.plan.mentions ?? []
    if (mentions.length > 0) this.selected = [...mentions]
    return result
  }

  clear(): void {
    this.selected = []
    this.turnCount = 0
  }
}

/**
 * Build a CourseLens from configuration: OpenAI for generation and
 * embeddings, the remote store when EVIDENCE_STORE_URL is set, otherwise the
 * evidence file embedded into memory. The catalog file is activated last.
 */
export async function createCourseLensFromConfig(config: CourseLensConfig): Promise<CourseLens> {
  const client = createOpenAIClient(config.openai)
  const embedder = createOpenAIEmbedder(config.openai, client)
  const generator = createOpenAIGenerator(config.openai, client)

  let store: EvidenceStore
  if (config.evidenceStoreUrl) {
    store = new HttpEvidenceStore({ baseUrl: config.evidenceStoreUrl, timeoutMs: config.retrieval.searchTimeoutMs })
    debugLog("courselens", `using remote evidence store ${config.evidenceStoreUrl}`)
  } else {
    const records = readEvidenceFile(config.evidencePath)
    store = new InMemoryEvidenceStore(await embedEvidence(records, embedder))
    debugLog("courselens", `embedded ${records.length} evidence chunks from ${config.evidencePath}`)
  }

  const lens = new CourseLens({
    store,
    embedder,
    generator,
    retrieval: config.retrieval,
    generationTimeoutMs: config.generationTimeoutMs,
  })
  lens.registry.activateFile(config.catalogPath)
  return lens
}
