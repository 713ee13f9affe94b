/**
 * Turns a free-text question into a QueryPlan: which catalog courses it
 * mentions and which structural questions its phrasing asks.
 */

import { compareCodes, editDistance, findCodeTokens, normalizeCode } from "@/lib/courseCodes"
import type { CourseGraph } from "@/lib/courseGraph"
import { UnknownCourseError } from "@/lib/errors"
import type { QueryIntent, QueryPlan } from "@/lib/types"

const INTENT_PATTERNS: Record<QueryIntent, RegExp[]> = {
  overlap: [
    /\bmanageable with\b/,
    /\btogether\b/,
    /\bsame (term|semester)\b/,
    /\bat the same time\b/,
    /\boverlap/,
    /\bconflict/,
    /\balongside\b/,
    /\bcombined? with\b/,
  ],
  prerequisites: [
    /\bprereq/,
    /\brequire/,
    /\bneed(ed)? (to take )?before\b/,
    /\bbefore (taking|i take|enrolling)\b/,
    /\bwhat do i need\b/,
    /\bneeded for\b/,
  ],
  unlocks: [
    /\bunlock/,
    /\blead(s)? to\b/,
    /\bopen(s)? up\b/,
    /\bafter (taking|completing|finishing)\b/,
    /\bqualif(y|ies) (me )?for\b/,
  ],
  path: [/\bpath\b/, /\bget from\b/, /\broute\b/, /\bhow (do|can) i get to\b/, /\bsequence\b/],
}

const TRANSITIVE_PATTERNS = [
  /\bchain\b/,
  /\beventually\b/,
  /\bultimately\b/,
  /\ball (of )?(the )?(prereq|course)/,
  /\bfull\b/,
  /\bentire\b/,
  /\btransitive/,
]

/** Intents that compare two courses need at least two mentions. */
const PAIRWISE: ReadonlySet<QueryIntent> = new Set(["overlap", "path"])

/**
 * Resolve course-code tokens against the catalog. Exact codes win; otherwise
 * the same number under a subject within edit distance 1 ("CMPT" → "CMPUT").
 * A token whose subject belongs to the catalog but names no course fails with
 * UnknownCourseError; tokens with foreign subjects are not course mentions.
 */
export function extractCourseMentions(query: string, graph: CourseGraph): string[] {
  const subjects = [...graph.subjects()].sort(compareCodes)
  const mentions: string[] = []
  for (const token of findCodeTokens(query)) {
    const exact = `${token.subject} ${token.number}`
    let resolved: string | undefined
    if (graph.has(exact)) {
      resolved = exact
    } else {
      const near = subjects
        .map((s) => ({ s, d: editDistance(s, token.subject) }))
        .filter(({ d }) => d <= 1)
        .sort((x, y) => x.d - y.d || compareCodes(x.s, y.s))
      if (near.length === 0) continue
      resolved = near.map(({ s }) => `${s} ${token.number}`).find((code) => graph.has(code))
      if (!resolved) throw new UnknownCourseError(exact)
    }
    if (!mentions.includes(resolved)) mentions.push(resolved)
  }
  return mentions
}

export function detectIntents(query: string, mentionCount: number): QueryIntent[] {
  const q = query.toLowerCase()
  const order: QueryIntent[] = ["prerequisites", "unlocks", "overlap", "path"]
  return order.filter((intent) => {
    if (PAIRWISE.has(intent) && mentionCount < 2) return false
    return INTENT_PATTERNS[intent].some((re) => re.test(q))
  })
}

/**
 * A query naming no course ("and what does it unlock?") falls back to the
 * context courses still present in the catalog.
 */
export function analyzeQuery(query: string, graph: CourseGraph, contextCourses: readonly string[] = []): QueryPlan {
  const named = extractCourseMentions(query, graph)
  const mentions = named.length > 0 ? named : contextCourses.map(normalizeCode).filter((code) => graph.has(code))
  const lower = query.toLowerCase()
  return {
    query,
    mentions,
    intents: detectIntents(query, mentions.length),
    transitive: TRANSITIVE_PATTERNS.some((re) => re.test(lower)),
  }
}
