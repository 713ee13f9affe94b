/**
 * Course dependency graph for one catalog version.
 *
 * Nodes live in a table sorted by course code; edges and adjacency lists hold
 * indices into that table. Because the table is sorted, ascending index order
 * is also lexical code order, which is what every tie-break below relies on.
 * A built graph is never mutated; a catalog update builds a new one.
 */

import { compareCodes, normalizeCode, splitCode } from "@/lib/courseCodes"
import { GraphIntegrityError, UnknownCourseError, type IntegrityViolation } from "@/lib/errors"
import type {
  Course,
  GraphEdge,
  GroupLogic,
  OverlapReport,
  PrerequisiteEdgeRecord,
  RequirementGroup,
} from "@/lib/types"

type Adjacency = readonly (readonly number[])[]

export class CourseGraph {
  readonly edges: readonly GraphEdge[]
  private readonly nodes: readonly Course[]
  private readonly index: ReadonlyMap<string, number>
  /** course → courses it requires */
  private readonly requires: Adjacency
  /** course → courses that require it */
  private readonly unlocks: Adjacency
  /** course → courses it declares "cannot be taken with" */
  private readonly excludes: Adjacency

  private constructor(nodes: readonly Course[], edges: readonly GraphEdge[]) {
    this.nodes = nodes
    this.edges = edges
    this.index = new Map(nodes.map((c, i) => [c.code, i]))
    this.requires = adjacency(nodes.length, edges, "REQUIRES", false)
    this.unlocks = adjacency(nodes.length, edges, "REQUIRES", true)
    this.excludes = adjacency(nodes.length, edges, "EXCLUDES", false)
  }

  /** @internal Use loadCourseGraph; this skips validation. */
  static fromValidated(nodes: readonly Course[], edges: readonly GraphEdge[]): CourseGraph {
    return new CourseGraph(nodes, edges)
  }

  get size(): number {
    return this.nodes.length
  }

  has(code: string): boolean {
    return this.index.has(normalizeCode(code))
  }

  getCourse(code: string): Course {
    return this.nodes[this.indexOf(code)]
  }

  /** All course codes, sorted. */
  codes(): string[] {
    return this.nodes.map((c) => c.code)
  }

  /** Subject prefixes present in the catalog, e.g. "CMPUT", "MATH". */
  subjects(): Set<string> {
    const out = new Set<string>()
    for (const c of this.nodes) {
      const parts = splitCode(c.code)
      if (parts) out.add(parts.subject)
    }
    return out
  }

  prerequisitesOf(code: string, transitive = false): Course[] {
    const start = this.indexOf(code)
    const found = transitive ? closure(start, this.requires) : [...this.requires[start]]
    return found.map((i) => this.nodes[i])
  }

  unlocksOf(code: string, transitive = false): Course[] {
    const start = this.indexOf(code)
    const found = transitive ? closure(start, this.unlocks) : [...this.unlocks[start]]
    return found.map((i) => this.nodes[i])
  }

  /** Courses that declare, or are declared, "cannot be taken with" this one. */
  exclusionsOf(code: string): Course[] {
    const i = this.indexOf(code)
    const out = new Set<number>(this.excludes[i])
    this.excludes.forEach((targets, j) => {
      if (targets.includes(i)) out.add(j)
    })
    return [...out].sort((a, b) => a - b).map((j) => this.nodes[j])
  }

  overlap(codeA: string, codeB: string): OverlapReport {
    const a = this.indexOf(codeA)
    const b = this.indexOf(codeB)
    const ancestorsA = new Set(closure(a, this.requires))
    const ancestorsB = new Set(closure(b, this.requires))
    const shared = [...ancestorsA].filter((i) => ancestorsB.has(i)).sort((x, y) => x - y)
    return {
      courseA: this.nodes[a].code,
      courseB: this.nodes[b].code,
      sharedPrerequisites: shared.map((i) => this.nodes[i]),
      aRequiresB: ancestorsA.has(b),
      bRequiresA: ancestorsB.has(a),
      mutuallyExclusive: this.excludes[a].includes(b) || this.excludes[b].includes(a),
    }
  }

  /** Whether `to` can be reached from `from` by following prerequisite → unlocked course. */
  pathExists(from: string, to: string): boolean {
    return this.shortestPath(from, to) !== null
  }

  /**
   * Fewest-edge path from `from` to `to` in the progression direction
   * (prerequisite first). Among equally short paths, the lexically smallest
   * sequence of codes wins: neighbours are visited in code order and the
   * first discovery of a node fixes its parent.
   */
  shortestPath(from: string, to: string): Course[] | null {
    const start = this.indexOf(from)
    const goal = this.indexOf(to)
    const parent = bfsParents(start, this.unlocks)
    if (!parent.has(goal)) return null
    const path: number[] = []
    for (let at: number | undefined = goal; at !== undefined && at !== -1; at = parent.get(at)) {
      path.push(at)
    }
    return path.reverse().map((i) => this.nodes[i])
  }

  /**
   * Direct prerequisites grouped by logical set. Ungrouped edges come first as
   * single mandatory requirements, then named groups in groupId order.
   */
  requirementsOf(code: string): RequirementGroup[] {
    const i = this.indexOf(code)
    const single: RequirementGroup[] = []
    const grouped = new Map<string, { logic?: GroupLogic; courses: { code: string; minGrade?: string }[] }>()
    const own = this.edges
      .filter((e) => e.kind === "REQUIRES" && e.from === i)
      .sort((x, y) => x.to - y.to)
    for (const e of own) {
      const entry = { code: this.nodes[e.to].code, ...(e.minGrade ? { minGrade: e.minGrade } : {}) }
      if (!e.groupId) {
        single.push({ logic: "AND", courses: [entry] })
        continue
      }
      const g = grouped.get(e.groupId) ?? { courses: [] }
      g.logic = g.logic ?? e.groupLogic
      g.courses.push(entry)
      grouped.set(e.groupId, g)
    }
    const groups = [...grouped.entries()]
      .sort(([x], [y]) => compareCodes(x, y))
      .map(([groupId, g]): RequirementGroup => ({ groupId, logic: g.logic ?? "AND", courses: g.courses }))
    return [...single, ...groups]
  }

  /** Mechanical one-sentence rendering of requirementsOf. */
  describeRequirements(code: string): string {
    const course = this.getCourse(code)
    const groups = this.requirementsOf(code)
    if (groups.length === 0) return `${course.code} has no prerequisites.`
    const withGrade = (c: { code: string; minGrade?: string }) =>
      c.minGrade ? `${c.code} (minimum grade ${c.minGrade})` : c.code
    const parts = groups.map((g) => {
      if (g.courses.length === 1) return withGrade(g.courses[0])
      const list = g.courses.map(withGrade).join(", ")
      return g.logic === "OR" ? `one of (${list})` : `all of (${list})`
    })
    return `${course.code} requires ${parts.join(" and ")}.`
  }

  private indexOf(code: string): number {
    const normalized = normalizeCode(code)
    const i = this.index.get(normalized)
    if (i === undefined) throw new UnknownCourseError(normalized)
    return i
  }
}

function adjacency(
  n: number,
  edges: readonly GraphEdge[],
  kind: GraphEdge["kind"],
  reverse: boolean
): number[][] {
  const sets = Array.from({ length: n }, () => new Set<number>())
  for (const e of edges) {
    if (e.kind !== kind) continue
    if (reverse) sets[e.to].add(e.from)
    else sets[e.from].add(e.to)
  }
  return sets.map((s) => [...s].sort((a, b) => a - b))
}

/** Everything reachable from start (excluding start), closest first, ties by index. */
function closure(start: number, adj: Adjacency): number[] {
  const seen = new Set<number>([start])
  const out: number[] = []
  let layer = [start]
  while (layer.length > 0) {
    const next: number[] = []
    for (const u of layer) {
      for (const v of adj[u]) {
        if (seen.has(v)) continue
        seen.add(v)
        next.push(v)
      }
    }
    next.sort((a, b) => a - b)
    out.push(...next)
    layer = next
  }
  return out
}

/** BFS parent map; the start node maps to -1. */
function bfsParents(start: number, adj: Adjacency): Map<number, number> {
  const parent = new Map<number, number>([[start, -1]])
  const queue = [start]
  for (let head = 0; head < queue.length; head++) {
    const u = queue[head]
    for (const v of adj[u]) {
      if (parent.has(v)) continue
      parent.set(v, u)
      queue.push(v)
    }
  }
  return parent
}

/**
 * Finds cycles with an iterative depth-first search that tracks each node as
 * new, in progress or finished. A back edge u → v (v still in progress)
 * closes a cycle; the shortest v ⇝ u path plus that edge is reported, so each
 * cycle is the minimal one through the back edge.
 */
function findCycles(adj: Adjacency): number[][] {
  const NEW = 0
  const ACTIVE = 1
  const DONE = 2
  const state = new Uint8Array(adj.length)
  const cycles: number[][] = []
  const seen = new Set<string>()

  for (let root = 0; root < adj.length; root++) {
    if (state[root] !== NEW) continue
    const stack = [{ node: root, next: 0 }]
    state[root] = ACTIVE
    while (stack.length > 0) {
      const frame = stack[stack.length - 1]
      const nbrs = adj[frame.node]
      if (frame.next >= nbrs.length) {
        state[frame.node] = DONE
        stack.pop()
        continue
      }
      const v = nbrs[frame.next++]
      if (state[v] === NEW) {
        state[v] = ACTIVE
        stack.push({ node: v, next: 0 })
      } else if (state[v] === ACTIVE) {
        const cycle = cycleThrough(frame.node, v, adj)
        const key = cycle.join(",")
        if (!seen.has(key)) {
          seen.add(key)
          cycles.push(cycle)
        }
      }
    }
  }
  return cycles
}

/** Shortest cycle containing the edge u → v, rotated to start at its smallest index. */
function cycleThrough(u: number, v: number, adj: Adjacency): number[] {
  const parent = bfsParents(v, adj)
  const path: number[] = []
  for (let at: number | undefined = u; at !== undefined && at !== -1; at = parent.get(at)) {
    path.push(at)
  }
  path.reverse()
  const min = path.indexOf(Math.min(...path))
  return [...path.slice(min), ...path.slice(0, min)]
}

function freezeCourse(c: Course): Course {
  return Object.freeze({
    ...c,
    code: normalizeCode(c.code),
    terms: Object.freeze([...c.terms]),
    tags: Object.freeze([...c.tags]),
  })
}

/**
 * Build and validate a graph. Every violation found is collected before
 * failing, so one GraphIntegrityError lists all of them.
 */
export function loadCourseGraph(courses: Course[], edges: PrerequisiteEdgeRecord[]): CourseGraph {
  const violations: IntegrityViolation[] = []

  const byCode = new Map<string, Course>()
  for (const c of courses) {
    const course = freezeCourse(c)
    if (byCode.has(course.code)) {
      if (!violations.some((v) => v.type === "duplicate-course" && v.code === course.code)) {
        violations.push({ type: "duplicate-course", code: course.code })
      }
      continue
    }
    byCode.set(course.code, course)
  }
  const nodes = [...byCode.values()].sort((a, b) => compareCodes(a.code, b.code))
  const index = new Map(nodes.map((c, i) => [c.code, i]))

  const graphEdges: GraphEdge[] = []
  const groupLogic = new Map<string, GroupLogic>()
  const flaggedGroups = new Set<string>()
  const seenEdges = new Set<string>()
  for (const record of edges) {
    const course = normalizeCode(record.course)
    const required = normalizeCode(record.requiredCourse)
    const from = index.get(course)
    const to = index.get(required)
    if (from === undefined || to === undefined) {
      for (const code of new Set([course, required])) {
        if (!index.has(code)) {
          violations.push({ type: "unknown-course", code, edge: { course, requiredCourse: required } })
        }
      }
      continue
    }
    if (from === to) {
      violations.push({ type: "self-requirement", code: course })
      continue
    }
    const kind = record.kind ?? "REQUIRES"
    const edgeKey = [from, to, kind, record.groupId ?? ""].join("|")
    if (seenEdges.has(edgeKey)) continue
    seenEdges.add(edgeKey)
    if (record.groupId && record.groupLogic) {
      const key = `${course}\u0000${record.groupId}`
      const existing = groupLogic.get(key)
      if (existing === undefined) groupLogic.set(key, record.groupLogic)
      else if (existing !== record.groupLogic && !flaggedGroups.has(key)) {
        flaggedGroups.add(key)
        violations.push({ type: "inconsistent-group", course, groupId: record.groupId })
      }
    }
    graphEdges.push({
      from,
      to,
      kind,
      ...(record.groupId ? { groupId: record.groupId } : {}),
      ...(record.groupLogic ? { groupLogic: record.groupLogic } : {}),
      ...(record.minGrade ? { minGrade: record.minGrade } : {}),
    })
  }

  for (const cycle of findCycles(adjacency(nodes.length, graphEdges, "REQUIRES", false))) {
    violations.push({ type: "cycle", cycle: cycle.map((i) => nodes[i].code) })
  }

  if (violations.length > 0) throw new GraphIntegrityError(violations)
  return CourseGraph.fromValidated(Object.freeze(nodes), Object.freeze(graphEdges))
}
