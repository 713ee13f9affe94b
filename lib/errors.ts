export type ErrorKind =
  | "graph_integrity"
  | "unknown_course"
  | "insufficient_evidence"
  | "generation_timeout"
  | "generation_failed"
  | "ungrounded_answer"
  | "evidence_store_unavailable"
  | "query_cancelled"
  | "no_active_catalog"
  | "config"
  | "catalog_file"

const UNGROUNDED_MESSAGE = "Unable to produce a grounded answer. Please try again."

export class CourseLensError extends Error {
  readonly kind: ErrorKind
  /** Message safe to show to the person who asked. */
  readonly publicMessage: string
  readonly retryable: boolean

  constructor(
    kind: ErrorKind,
    message: string,
    opts?: { publicMessage?: string; retryable?: boolean; cause?: unknown }
  ) {
    super(message, opts?.cause === undefined ? undefined : { cause: opts.cause })
    this.name = "CourseLensError"
    this.kind = kind
    this.publicMessage = opts?.publicMessage ?? message
    this.retryable = opts?.retryable ?? false
  }
}

export type IntegrityViolation =
  | { type: "unknown-course"; code: string; edge: { course: string; requiredCourse: string } }
  | { type: "duplicate-course"; code: string }
  | { type: "self-requirement"; code: string }
  | { type: "inconsistent-group"; course: string; groupId: string }
  | { type: "cycle"; cycle: string[] }

export function describeViolation(v: IntegrityViolation): string {
  switch (v.type) {
    case "unknown-course":
      return `edge ${v.edge.course} -> ${v.edge.requiredCourse} references unknown course ${v.code}`
    case "duplicate-course":
      return `course ${v.code} is defined more than once`
    case "self-requirement":
      return `course ${v.code} requires itself`
    case "inconsistent-group":
      return `group ${v.groupId} of ${v.course} mixes AND and OR logic`
    case "cycle":
      return `prerequisite cycle ${[...v.cycle, v.cycle[0]].join(" -> ")}`
  }
}

/** Catalog failed validation at load; it must not be activated. */
export class GraphIntegrityError extends CourseLensError {
  readonly violations: IntegrityViolation[]

  constructor(violations: IntegrityViolation[]) {
    super(
      "graph_integrity",
      `Catalog graph failed integrity checks (${violations.length}): ${violations.map(describeViolation).join("; ")}`,
      { publicMessage: "The course catalog could not be loaded." }
    )
    this.name = "GraphIntegrityError"
    this.violations = violations
  }

  /** Cycles reported in the error, each as a list of codes where the last requires the first. */
  get cycles(): string[][] {
    return this.violations.flatMap((v) => (v.type === "cycle" ? [v.cycle] : []))
  }
}

export class UnknownCourseError extends CourseLensError {
  readonly code: string

  constructor(code: string) {
    super("unknown_course", `Unknown course: ${code}`, {
      publicMessage: `Course not recognized: ${code}`,
    })
    this.name = "UnknownCourseError"
    this.code = code
  }
}

export class InsufficientEvidenceError extends CourseLensError {
  constructor(message = "No structural facts or evidence chunks were retrieved") {
    super("insufficient_evidence", message, {
      publicMessage: "Not enough information to answer that question.",
    })
    this.name = "InsufficientEvidenceError"
  }
}

export class GenerationTimeoutError extends CourseLensError {
  constructor(timeoutMs: number) {
    super("generation_timeout", `Generation did not finish within ${timeoutMs}ms`, {
      publicMessage: UNGROUNDED_MESSAGE,
      retryable: true,
    })
    this.name = "GenerationTimeoutError"
  }
}

export class GenerationFailedError extends CourseLensError {
  constructor(cause: unknown) {
    super("generation_failed", `Generation failed: ${errorMessage(cause)}`, {
      publicMessage: UNGROUNDED_MESSAGE,
      retryable: true,
      cause,
    })
    this.name = "GenerationFailedError"
  }
}

export class UngroundedAnswerError extends CourseLensError {
  readonly unknownTokens: string[]

  constructor(unknownTokens: string[]) {
    super(
      "ungrounded_answer",
      unknownTokens.length
        ? `Answer cited unknown evidence: ${unknownTokens.join(", ")}`
        : "Answer cited no evidence",
      { publicMessage: UNGROUNDED_MESSAGE, retryable: true }
    )
    this.name = "UngroundedAnswerError"
    this.unknownTokens = unknownTokens
  }
}

/** Transient Evidence Store failure. Retried internally, never surfaced directly. */
export class EvidenceStoreUnavailableError extends CourseLensError {
  constructor(message: string, cause?: unknown) {
    super("evidence_store_unavailable", message, { retryable: true, cause })
    this.name = "EvidenceStoreUnavailableError"
  }
}

export class QueryCancelledError extends CourseLensError {
  constructor() {
    super("query_cancelled", "Query was cancelled")
    this.name = "QueryCancelledError"
  }
}

export class NoActiveCatalogError extends CourseLensError {
  constructor() {
    super("no_active_catalog", "No catalog version has been activated", {
      publicMessage: "The course catalog is not loaded yet.",
    })
    this.name = "NoActiveCatalogError"
  }
}

export class ConfigError extends CourseLensError {
  constructor(message: string) {
    super("config", message)
    this.name = "ConfigError"
  }
}

export class CatalogFileError extends CourseLensError {
  constructor(message: string, cause?: unknown) {
    super("catalog_file", message, {
      publicMessage: "The course catalog could not be loaded.",
      cause,
    })
    this.name = "CatalogFileError"
  }
}

export type PublicError = {
  kind: ErrorKind | "internal"
  message: string
  retryable: boolean
}

export function toPublicError(err: unknown): PublicError {
  if (err instanceof CourseLensError) {
    return { kind: err.kind, message: err.publicMessage, retryable: err.retryable }
  }
  return { kind: "internal", message: "Something went wrong.", retryable: false }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
