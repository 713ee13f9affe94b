import { describe, expect, it } from "vitest"

import { CourseLens, toAnswerPayload } from "@/lib/courseLens"
import { InMemoryEvidenceStore } from "@/lib/evidenceStore"
import { chunk, keywordEmbedder, makeCourses, requires } from "@/lib/testFixtures"

function lens(): CourseLens {
  return new CourseLens({
    store: new InMemoryEvidenceStore([chunk("rev-a", "CMPUT 301", "The project workload is heavy", [1, 1, 0])]),
    embedder: keywordEmbedder,
    generator: { generate: async () => "CMPUT 301 requires CMPUT 291 [E1]." },
    retrieval: { backoffMs: 0 },
  })
}

describe("CourseLens", () => {
  it("reports empty stats before a catalog is active", () => {
    expect(lens().stats()).toEqual({
      queries: 0,
      done: 0,
      failed: 0,
      degraded: 0,
      failuresByKind: {},
      catalogVersion: null,
      courseCount: 0,
    })
  })

  it("counts answers and failures by kind", async () => {
    const courseLens = lens()
    courseLens.activateCatalog("v1", makeCourses("CMPUT 291", "CMPUT 301"), [requires("CMPUT 301", "CMPUT 291")])

    const done = await courseLens.ask("What are the prerequisites for CMPUT 301?")
    await courseLens.ask("What does CMPUT 999 unlock?")
    await courseLens.ask("What does CMPUT 998 unlock?")

    if (done.status !== "DONE") throw new Error(`expected DONE, got ${done.status}`)
    expect(toAnswerPayload(done.answer)).toEqual({
      text: "CMPUT 301 requires CMPUT 291 [E1].",
      citations: [{ token: "E1", sourceType: "graph", sourceId: "requirements:CMPUT 301" }],
      coverage: 1,
      degraded: false,
    })
    expect(courseLens.stats()).toEqual({
      queries: 3,
      done: 1,
      failed: 2,
      degraded: 0,
      failuresByKind: { unknown_course: 2 },
      catalogVersion: "v1",
      courseCount: 2,
    })
  })
})

describe("ConversationSession", () => {
  function activeLens(): CourseLens {
    const courseLens = lens()
    courseLens.activateCatalog("v1", makeCourses("CMPUT 291", "CMPUT 301"), [requires("CMPUT 301", "CMPUT 291")])
    return courseLens
  }

  it("answers a follow-up about the courses of the previous question", async () => {
    const session = activeLens().session()
    await session.ask("What are the prerequisites for CMPUT 301?")
    expect(session.selectedCourses).toEqual(["CMPUT 301"])

    const followUp = await session.ask("And what does it unlock?")

    if (followUp.status !== "DONE") throw new Error(`expected DONE, got ${followUp.status}`)
    expect(followUp.answer.bundle.plan.mentions).toEqual(["CMPUT 301"])
    expect(followUp.answer.bundle.facts.map((f) => [f.id, f.text])).toEqual([
      ["unlocks:CMPUT 301", "CMPUT 301 is not a prerequisite of any course."],
    ])
    expect(session.turns).toBe(2)
  })

  it("forgets the context on clear", async () => {
    const session = activeLens().session()
    await session.ask("What are the prerequisites for CMPUT 301?")
    session.clear()

    const result = await session.ask("And what does it unlock?")

    if (result.status !== "DONE") throw new Error(`expected DONE, got ${result.status}`)
    expect(result.answer.bundle.plan.mentions).toEqual([])
    expect(result.answer.bundle.facts).toEqual([])
    expect(session.selectedCourses).toEqual([])
    expect(session.turns).toBe(1)
  })

  it("keeps context separate between sessions and away from ask", async () => {
    const courseLens = activeLens()
    const first = courseLens.session()
    const second = courseLens.session()
    await first.ask("What are the prerequisites for CMPUT 291?")

    const other = await second.ask("And what does it unlock?")
    const direct = await courseLens.ask("And what does it unlock?")

    expect(first.selectedCourses).toEqual(["CMPUT 291"])
    expect(second.selectedCourses).toEqual([])
    if (other.status !== "DONE" || direct.status !== "DONE") throw new Error("expected both answers")
    expect(other.answer.bundle.plan.mentions).toEqual([])
    expect(direct.answer.bundle.plan.mentions).toEqual([])
  })
})
