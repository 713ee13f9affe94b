import { describe, expect, it } from "vitest"

import {
  GenerationTimeoutError,
  GraphIntegrityError,
  UnknownCourseError,
  describeViolation,
  toPublicError,
} from "@/lib/errors"

describe("toPublicError", () => {
  it("exposes only the public message of known errors", () => {
    expect(toPublicError(new UnknownCourseError("CMPUT 999"))).toEqual({
      kind: "unknown_course",
      message: "Course not recognized: CMPUT 999",
      retryable: false,
    })
    expect(toPublicError(new GenerationTimeoutError(30000))).toEqual({
      kind: "generation_timeout",
      message: "Unable to produce a grounded answer. Please try again.",
      retryable: true,
    })
  })

  it("hides anything else behind a generic message", () => {
    expect(toPublicError(new Error("socket hang up"))).toEqual({
      kind: "internal",
      message: "Something went wrong.",
      retryable: false,
    })
  })
})

describe("GraphIntegrityError", () => {
  it("lists every violation in its message", () => {
    const err = new GraphIntegrityError([
      { type: "cycle", cycle: ["CMPUT 101", "CMPUT 102"] },
      { type: "self-requirement", code: "CMPUT 174" },
    ])
    expect(err.message).toBe(
      "Catalog graph failed integrity checks (2): prerequisite cycle CMPUT 101 -> CMPUT 102 -> CMPUT 101; course CMPUT 174 requires itself"
    )
    expect(describeViolation({ type: "duplicate-course", code: "MATH 125" })).toBe("course MATH 125 is defined more than once")
  })
})
