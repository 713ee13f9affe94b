/**
 * Catalog files and the active catalog version.
 * A catalog file is JSON: { version, courses: [...], edges: [...] }.
 */

import fs from "fs"
import { z } from "zod"
import { loadCourseGraph, type CourseGraph } from "@/lib/courseGraph"
import { CatalogFileError, NoActiveCatalogError, errorMessage } from "@/lib/errors"
import { debugLog } from "@/lib/log"
import type { Course, PrerequisiteEdgeRecord } from "@/lib/types"

export const CourseRecordSchema = z.object({
  code: z.string().min(1),
  title: z.string().default(""),
  credits: z.number().nonnegative().default(3),
  terms: z.array(z.string()).default([]),
  description: z.string().default(""),
  tags: z.array(z.string()).default([]),
})

export const EdgeRecordSchema = z.object({
  course: z.string().min(1),
  requiredCourse: z.string().min(1),
  groupId: z.string().min(1).optional(),
  groupLogic: z.enum(["AND", "OR"]).optional(),
  minGrade: z.string().min(1).optional(),
  kind: z.enum(["REQUIRES", "EXCLUDES"]).optional(),
})

export const CatalogFileSchema = z.object({
  version: z.string().min(1),
  courses: z.array(CourseRecordSchema),
  edges: z.array(EdgeRecordSchema).default([]),
})

export type CatalogFile = {
  version: string
  courses: Course[]
  edges: PrerequisiteEdgeRecord[]
}

export function parseCatalog(data: unknown): CatalogFile {
  const parsed = CatalogFileSchema.safeParse(data)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`)
    throw new CatalogFileError(`Invalid catalog: ${issues.slice(0, 10).join("; ")}`)
  }
  return parsed.data
}

export function readCatalogFile(filePath: string): CatalogFile {
  let raw: string
  try {
    raw = fs.readFileSync(filePath, "utf-8")
  } catch (err) {
    throw new CatalogFileError(`Cannot read catalog file ${filePath}: ${errorMessage(err)}`, err)
  }
  try {
    return parseCatalog(JSON.parse(raw))
  } catch (err) {
    if (err instanceof CatalogFileError) throw err
    throw new CatalogFileError(`Catalog file ${filePath} is not valid JSON: ${errorMessage(err)}`, err)
  }
}

/** One immutable catalog version. In-flight queries hold on to the snapshot they started with. */
export type CatalogSnapshot = Readonly<{
  version: string
  activatedAt: string
  graph: CourseGraph
}>

/**
 * Holds the single current catalog reference. Activation builds the graph
 * before swapping, so a catalog that fails integrity checks never serves
 * queries and the previous version stays current.
 */
export class CatalogRegistry {
  private active: CatalogSnapshot | null = null

  activate(version: string, courses: Course[], edges: PrerequisiteEdgeRecord[]): CatalogSnapshot {
    const graph = loadCourseGraph(courses, edges)
    const snapshot: CatalogSnapshot = Object.freeze({
      version,
      activatedAt: new Date().toISOString(),
      graph,
    })
    this.active = snapshot
    debugLog("catalog", `activated ${version} (${graph.size} courses, ${graph.edges.length} edges)`)
    return snapshot
  }

  activateFile(filePath: string): CatalogSnapshot {
    const { version, courses, edges } = readCatalogFile(filePath)
    return this.activate(version, courses, edges)
  }

  current(): CatalogSnapshot {
    if (!this.active) throw new NoActiveCatalogError()
    return this.active
  }

  get hasActive(): boolean {
    return this.active !== null
  }
}
