/**
 * Scoped console logging. Debug and warn output only appear when
 * NODE_ENV=development or DEBUG_COURSELENS=true.
 */

function debugEnabled(): boolean {
  return process.env.NODE_ENV === "development" || process.env.DEBUG_COURSELENS === "true"
}

export function debugLog(scope: string, ...args: unknown[]): void {
  if (debugEnabled()) console.log(`[${scope}]`, ...args)
}

export function warnLog(scope: string, ...args: unknown[]): void {
  if (debugEnabled()) console.warn(`[${scope}]`, ...args)
}

export function errorLog(scope: string, ...args: unknown[]): void {
  console.error(`[${scope}]`, ...args)
}
