/** Normalize "CMPUT 301" / "cmput301" / "CMPUT-301" → "CMPUT 301" for comparison. */
export function normalizeCode(code: string): string {
  const s = String(code || "").replace(/[\s-]+/g, " ").trim().toUpperCase()
  const parts = s.match(/^([A-Z]+)\s*(\d.*)$/)
  if (parts) return `${parts[1]} ${parts[2]}`
  return s
}

/** Split a normalized code into subject and number; null when it doesn't look like a course code. */
export function splitCode(code: string): { subject: string; number: string } | null {
  const m = normalizeCode(code).match(/^([A-Z]+) (\d{2,4}[A-Z]?)$/)
  return m ? { subject: m[1], number: m[2] } : null
}

/** Course-code-shaped tokens in free text, e.g. "cmput 301", "MATH125", "ENGG-100". */
const CODE_TOKEN = /\b([A-Za-z]{2,6})[\s-]?(\d{3}[A-Za-z]?)\b/g

export type CodeToken = { subject: string; number: string; index: number; raw: string }

export function findCodeTokens(text: string): CodeToken[] {
  const out: CodeToken[] = []
  for (const m of text.matchAll(CODE_TOKEN)) {
    out.push({
      subject: m[1].toUpperCase(),
      number: m[2].toUpperCase(),
      index: m.index ?? 0,
      raw: m[0],
    })
  }
  return out
}

/** Levenshtein distance, used to match "CMPT" against "CMPUT". */
export function editDistance(a: string, b: string): number {
  if (a === b) return 0
  let prev = Array.from({ length: b.length + 1 }, (_, j) => j)
  for (let i = 1; i <= a.length; i++) {
    const curr = [i]
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1
      curr[j] = Math.min(prev[j] + 1, curr[j - 1] + 1, prev[j - 1] + cost)
    }
    prev = curr
  }
  return prev[b.length]
}

export function compareCodes(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}
