/**
 * Interactive CLI: ask planning questions against the configured catalog.
 * Usage: npm start   (reads .env.local / .env)
 */

import readline from "readline"
import { config as loadEnv } from "dotenv"
import { loadConfig } from "@/lib/config"
import { createCourseLensFromConfig, toAnswerPayload, type CourseLens } from "@/lib/courseLens"
import { errorMessage, toPublicError } from "@/lib/errors"
import { errorLog } from "@/lib/log"

loadEnv({ path: ".env.local" })
loadEnv()

const HELP = `What you can ask:
  - What are the prerequisites for CMPUT 301?
  - What does CMPUT 201 unlock?
  - Is CMPUT 301 manageable with CMPUT 366?
  - What is the path from CMPUT 174 to CMPUT 301?
  - And what does it unlock?   (follows up on the last courses named)

Commands:
  help       Show this help message
  stats      Show query statistics
  courses    List courses in the active catalog
  reload     Reload the catalog file
  clear      Forget the courses of earlier questions
  quit/exit  Exit (Ctrl-C cancels a running question)`

function printStats(lens: CourseLens): void {
  const s = lens.stats()
  console.log(`Catalog: ${s.catalogVersion ?? "(none)"} (${s.courseCount} courses)`)
  console.log(`Queries: ${s.queries}  done: ${s.done}  failed: ${s.failed}  degraded: ${s.degraded}`)
  const kinds = Object.entries(s.failuresByKind)
  if (kinds.length) console.log(`Failures: ${kinds.map(([k, n]) => `${k}=${n}`).join(", ")}`)
}

async function main() {
  const config = loadConfig()
  const lens = await createCourseLensFromConfig(config)
  const session = lens.session()
  console.log(`CourseLens ready: catalog ${lens.stats().catalogVersion}. Type "help" for examples.\n`)

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout, prompt: "You: " })
  let running: AbortController | null = null

  rl.on("SIGINT", () => {
    if (running) {
      running.abort()
      console.log("\n(cancelled)")
    } else {
      rl.close()
    }
  })

  rl.prompt()
  for await (const line of rl) {
    const input = line.trim()
    const cmd = input.toLowerCase()
    if (!input) {
      rl.prompt()
      continue
    }
    if (cmd === "quit" || cmd === "exit" || cmd === "q") break
    if (cmd === "help") {
      console.log(HELP)
    } else if (cmd === "stats") {
      printStats(lens)
    } else if (cmd === "clear") {
      session.clear()
      console.log("Conversation context cleared.")
    } else if (cmd === "courses") {
      console.log(lens.registry.current().graph.codes().join("\n"))
    } else if (cmd === "reload") {
      try {
        const snapshot = lens.registry.activateFile(config.catalogPath)
        console.log(`Activated catalog ${snapshot.version} (${snapshot.graph.size} courses)`)
      } catch (err) {
        console.log(`Reload failed, keeping ${lens.stats().catalogVersion}: ${errorMessage(err)}`)
      }
    } else {
      running = new AbortController()
      const result = await session.ask(input, { signal: running.signal })
      running = null
      if (result.status === "DONE") {
        const payload = toAnswerPayload(result.answer)
        console.log(`\n${payload.text}\n`)
        for (const c of payload.citations) console.log(`  [${c.token}] ${c.sourceType}: ${c.sourceId}`)
        console.log(`  coverage ${(payload.coverage * 100).toFixed(0)}%${payload.degraded ? " (degraded: partial evidence)" : ""}\n`)
      } else {
        const error = toPublicError(result.error)
        console.log(`\n${error.message}${error.retryable ? " (you can retry)" : ""}\n`)
      }
    }
    rl.prompt()
  }
  rl.close()
  console.log("Goodbye.")
}

main().catch((err: unknown) => {
  errorLog("courselens", errorMessage(err))
  process.exitCode = 1
})
