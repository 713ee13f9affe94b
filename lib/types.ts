/** One course as loaded from a catalog version. Immutable once the catalog is active. */
export type Course = {
  code: string
  title: string
  credits: number
  terms: readonly string[]
  description: string
  /** Assessment-style tags, e.g. "project", "exam-heavy". */
  tags: readonly string[]
}

/** REQUIRES: course needs requiredCourse first. EXCLUDES: the two cannot both be taken. */
export type EdgeKind = "REQUIRES" | "EXCLUDES"

export type GroupLogic = "AND" | "OR"

/** Edge record as delivered by catalog ingestion. */
export type PrerequisiteEdgeRecord = {
  course: string
  requiredCourse: string
  groupId?: string
  groupLogic?: GroupLogic
  minGrade?: string
  kind?: EdgeKind
}

/** Edge stored in the graph: endpoints are indices into the node table. */
export type GraphEdge = {
  from: number
  to: number
  kind: EdgeKind
  groupId?: string
  groupLogic?: GroupLogic
  minGrade?: string
}

export type RequirementGroup = {
  /** Undefined for a single ungrouped (mandatory) requirement. */
  groupId?: string
  logic: GroupLogic
  courses: { code: string; minGrade?: string }[]
}

export type OverlapReport = {
  courseA: string
  courseB: string
  /** Common transitive prerequisites, sorted by code. */
  sharedPrerequisites: Course[]
  /** courseB is a (transitive) prerequisite of courseA. */
  aRequiresB: boolean
  /** courseA is a (transitive) prerequisite of courseB. */
  bRequiresA: boolean
  /** Either course carries an EXCLUDES constraint against the other. */
  mutuallyExclusive: boolean
}

export type SourceType = "catalog" | "review"

export type SourceDescriptor = {
  sourceType: SourceType
  /** Course code for catalog text, review id for reviews. */
  sourceId: string
  /** Course the text is about, when known. */
  courseCode?: string
  /** Character offset of the chunk within its source document. */
  offset?: number
}

export type EvidenceChunk = {
  id: string
  sourceType: SourceType
  sourceId: string
  courseCode?: string
  offset?: number
  embedding: number[]
  text: string
}

export type SearchFilter = {
  /** Only chunks about one of these courses. */
  courseCodes?: string[]
  sourceTypes?: SourceType[]
}

/** One Evidence Store result, ordered by descending score. */
export type SearchHit = {
  chunkId: string
  score: number
  rawText: string
  source: SourceDescriptor
}

export type QueryIntent = "prerequisites" | "unlocks" | "overlap" | "path"

export type QueryPlan = {
  query: string
  /** Course codes mentioned in the query, in order of first appearance. */
  mentions: string[]
  intents: QueryIntent[]
  /** Whether closures (not just direct neighbours) were asked for. */
  transitive: boolean
}

export type FactKind = "requirements" | "exclusions" | "prerequisites" | "unlocks" | "overlap" | "path"

/** A sentence derived mechanically from one graph query, with the query that produced it. */
export type StructuralFact = {
  id: string
  kind: FactKind
  /** Course codes the fact is about. */
  subjects: string[]
  text: string
  provenance: {
    operation: string
    args: string[]
    catalogVersion: string
  }
}

export type RetrievedChunk = {
  chunkId: string
  score: number
  text: string
  source: SourceDescriptor
}

/** Structural facts first, then text chunks by descending score. */
export type EvidenceBundle = {
  query: string
  catalogVersion: string
  plan: QueryPlan
  facts: StructuralFact[]
  chunks: RetrievedChunk[]
  /** True when the vector search failed and only structural facts could be gathered. */
  partial: boolean
  degradedReasons: string[]
  dropped: { chunks: number; facts: number }
  charCount: number
}

export type CitationSource = {
  sourceType: SourceType | "graph"
  /** Course code or review id; the fact id for graph facts. */
  sourceId: string
  offset?: number
  /** Bundle element the token stands for: a fact id or a chunk id. */
  itemId: string
}

export type GroundedContext = {
  text: string
  /** Citation tokens in the order they appear in the text block. */
  tokens: string[]
  citations: Map<string, CitationSource>
}

export type Citation = {
  token: string
  sourceType: CitationSource["sourceType"]
  sourceId: string
}

export type Answer = {
  text: string
  citations: Citation[]
  /** Fraction of query sub-intents addressed by at least one evidence item, in [0, 1]. */
  coverage: number
  degraded: boolean
  bundle: EvidenceBundle
}
