/** Small catalogs and fakes shared by the test files. */

import { CatalogRegistry, type CatalogSnapshot } from "@/lib/catalog"
import type { Embedder } from "@/lib/evidenceStore"
import type { Course, EvidenceChunk, PrerequisiteEdgeRecord } from "@/lib/types"

export function makeCourse(code: string, title = `${code} title`): Course {
  return { code, title, credits: 3, terms: ["fall"], description: "", tags: [] }
}

export function makeCourses(...codes: string[]): Course[] {
  return codes.map((c) => makeCourse(c))
}

export const requires = (course: string, requiredCourse: string): PrerequisiteEdgeRecord => ({ course, requiredCourse })

/** CMPUT 301 requires CMPUT 291; CMPUT 366 requires CMPUT 275. */
export function workloadCatalog(): CatalogSnapshot {
  const registry = new CatalogRegistry()
  return registry.activate(
    "test-v1",
    makeCourses("CMPUT 275", "CMPUT 291", "CMPUT 301", "CMPUT 366"),
    [requires("CMPUT 301", "CMPUT 291"), requires("CMPUT 366", "CMPUT 275")]
  )
}

/**
 * Embeds text onto three axes by keyword so cosine scores are predictable:
 * "workload" → x, "project" → y, "search" → z.
 */
export const keywordEmbedder: Embedder = {
  async embed(text) {
    const t = text.toLowerCase()
    return [t.includes("workload") ? 1 : 0, t.includes("project") ? 1 : 0, t.includes("search") ? 1 : 0]
  },
}

export function chunk(
  id: string,
  courseCode: string,
  text: string,
  embedding: number[],
  sourceType: EvidenceChunk["sourceType"] = "review"
): EvidenceChunk {
  return {
    id,
    sourceType,
    sourceId: sourceType === "catalog" ? courseCode : `review-${id}`,
    courseCode,
    embedding,
    text,
  }
}
