/**
 * Synthesis Orchestrator: drives one query through
 * RECEIVED → RETRIEVING → ASSEMBLING → GENERATING → VALIDATING → DONE | FAILED.
 *
 * Each run holds its own state and the catalog snapshot it started with, so
 * concurrent runs share nothing mutable.
 */

import type { CatalogSnapshot } from "@/lib/catalog"
import {
  CourseLensError,
  GenerationFailedError,
  GenerationTimeoutError,
  InsufficientEvidenceError,
  UngroundedAnswerError,
} from "@/lib/errors"
import { assembleContext, checkCitations, type CitationCheck } from "@/lib/grounding"
import { debugLog, warnLog } from "@/lib/log"
import type { QueryOptions, RetrievalCoordinator } from "@/lib/retrieval"
import { withTimeout } from "@/lib/retry"
import type { Answer, EvidenceBundle, FactKind, GroundedContext, QueryIntent } from "@/lib/types"

export type SynthesisState = "RECEIVED" | "RETRIEVING" | "ASSEMBLING" | "GENERATING" | "VALIDATING" | "DONE" | "FAILED"

/** VALIDATING → GENERATING is the single regeneration after an ungrounded answer. */
const TRANSITIONS: Record<SynthesisState, readonly SynthesisState[]> = {
  RECEIVED: ["RETRIEVING", "FAILED"],
  RETRIEVING: ["ASSEMBLING", "FAILED"],
  ASSEMBLING: ["GENERATING", "FAILED"],
  GENERATING: ["VALIDATING", "FAILED"],
  VALIDATING: ["GENERATING", "DONE", "FAILED"],
  DONE: [],
  FAILED: [],
}

/** Long-latency text generation; treated as a black box. */
export interface Generator {
  generate(contextText: string, instructions: string, signal?: AbortSignal): Promise<string>
}

export type SynthesisResult =
  | { status: "DONE"; answer: Answer; history: SynthesisState[] }
  | { status: "FAILED"; error: CourseLensError; history: SynthesisState[]; bundle?: EvidenceBundle }

export type TransitionListener = (from: SynthesisState, to: SynthesisState, query: string) => void

export type OrchestratorDeps = {
  /** Called once per run; the snapshot is used for the whole run. */
  catalog: () => CatalogSnapshot
  retriever: Pick<RetrievalCoordinator, "retrieve">
  generator: Generator
}

export type OrchestratorOptions = {
  generationTimeoutMs: number
  onTransition?: TransitionListener
}

const ANSWER_RULES = `You are an academic planning assistant. Answer the student's question using ONLY the evidence list you are given.

Rules:
- End every factual sentence with the citation tokens it relies on, in square brackets, e.g. [E1] or [E2, E4].
- Only use tokens that appear in the evidence list. Never invent tokens, courses or facts.
- Course graph facts are exact. Reviews are opinions; attribute them ("students report ...").
- If the evidence does not cover part of the question, say so plainly.`

const DEGRADED_NOTE =
  "Catalog text and reviews could not be retrieved for this question. Answer from the course graph facts only and say that the answer may be incomplete."

export function buildInstructions(query: string, bundle: EvidenceBundle, context: GroundedContext, retry?: CitationCheck): string {
  const parts = [ANSWER_RULES]
  if (bundle.partial) parts.push(DEGRADED_NOTE)
  if (retry) {
    const problem = retry.unknown.length
      ? `Your previous answer cited ${retry.unknown.join(", ")}, which are not in the evidence list.`
      : "Your previous answer did not cite any evidence."
    parts.push(`${problem} Cite ONLY these tokens: ${context.tokens.join(", ")}.`)
  }
  parts.push(`Question: ${query}`)
  return parts.join("\n\n")
}

const INTENT_FACTS: Record<QueryIntent, readonly FactKind[]> = {
  prerequisites: ["requirements", "prerequisites", "exclusions"],
  unlocks: ["unlocks"],
  overlap: ["overlap"],
  path: ["path"],
}

/**
 * Fraction of the query's sub-intents addressed by the bundle. A mentioned
 * course is addressed by a text chunk about it; graph facts alone do not
 * count, so an answer degraded to facts reports the text it lacks. A
 * requested intent is addressed by a fact of its kind. A query with no
 * sub-intents counts as covered when anything was retrieved.
 */
export function computeCoverage(bundle: EvidenceBundle): number {
  const { plan, facts, chunks } = bundle
  const addressed: boolean[] = []
  for (const code of plan.mentions) {
    addressed.push(chunks.some((c) => c.source.courseCode === code))
  }
  for (const intent of plan.intents) {
    addressed.push(facts.some((f) => INTENT_FACTS[intent].includes(f.kind)))
  }
  if (addressed.length === 0) return facts.length + chunks.length > 0 ? 1 : 0
  return addressed.filter(Boolean).length / addressed.length
}

function isGrounded(check: CitationCheck): boolean {
  return check.used.length > 0 && check.unknown.length === 0
}

class SynthesisRun {
  private current: SynthesisState = "RECEIVED"
  readonly history: SynthesisState[] = ["RECEIVED"]

  constructor(
    private readonly query: string,
    private readonly listener?: TransitionListener
  ) {}

  get state(): SynthesisState {
    return this.current
  }

  to(next: SynthesisState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Illegal synthesis transition ${this.current} -> ${next}`)
    }
    const from = this.current
    this.current = next
    this.history.push(next)
    debugLog("synthesis", `${from} -> ${next}`)
    this.listener?.(from, next, this.query)
  }
}

export class SynthesisOrchestrator {
  private readonly deps: OrchestratorDeps
  private readonly options: OrchestratorOptions

  constructor(deps: OrchestratorDeps, options: OrchestratorOptions) {
    this.deps = deps
    this.options = options
  }

  async run(query: string, opts: QueryOptions = {}): Promise<SynthesisResult> {
    const { signal } = opts
    const run = new SynthesisRun(query, this.options.onTransition)
    let bundle: EvidenceBundle | undefined

    try {
      const catalog = this.deps.catalog()
      run.to("RETRIEVING")
      bundle = await this.deps.retriever.retrieve(query, catalog, opts)
      if (bundle.facts.length === 0 && bundle.chunks.length === 0) {
        throw new InsufficientEvidenceError(
          bundle.partial ? `No structural facts and ${bundle.degradedReasons.join("; ")}` : undefined
        )
      }

      run.to("ASSEMBLING")
      const context = assembleContext(bundle)

      run.to("GENERATING")
      let raw = await this.generate(context, buildInstructions(query, bundle, context), signal)
      run.to("VALIDATING")
      let check = checkCitations(raw, context)

      if (!isGrounded(check)) {
        warnLog("synthesis", `ungrounded answer (unknown: ${check.unknown.join(", ") || "none cited"}); regenerating once`)
        run.to("GENERATING")
        raw = await this.generate(context, buildInstructions(query, bundle, context, check), signal)
        run.to("VALIDATING")
        check = checkCitations(raw, context)
        if (!isGrounded(check)) throw new UngroundedAnswerError(check.unknown)
      }

      const answer: Answer = {
        text: raw,
        citations: check.used.flatMap((token) => {
          const source = context.citations.get(token)
          return source ? [{ token, sourceType: source.sourceType, sourceId: source.sourceId }] : []
        }),
        coverage: computeCoverage(bundle),
        degraded: bundle.partial,
        bundle,
      }
      run.to("DONE")
      return { status: "DONE", answer, history: run.history }
    } catch (err) {
      run.to("FAILED")
      if (!(err instanceof CourseLensError)) throw err
      debugLog("synthesis", `failed: ${err.kind}: ${err.message}`)
      return { status: "FAILED", error: err, history: run.history, ...(bundle ? { bundle } : {}) }
    }
  }

  /** Generation bounded by the configured timeout; other failures become GenerationFailedError. */
  private async generate(context: GroundedContext, instructions: string, signal?: AbortSignal): Promise<string> {
    const timeoutMs = this.options.generationTimeoutMs
    try {
      return await withTimeout(
        (s) => this.deps.generator.generate(context.text, instructions, s),
        timeoutMs,
        () => new GenerationTimeoutError(timeoutMs),
        signal
      )
    } catch (err) {
      if (err instanceof CourseLensError) throw err
      throw new GenerationFailedError(err)
    }
  }
}
