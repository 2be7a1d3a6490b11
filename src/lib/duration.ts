/**
 * Parse an interval such as `2`, `1.5`, `500ms`, `3s` or `1m`. Bare numbers are seconds.
 */
export function parseDurationMs(input: string): number | null {
  const raw = input.trim()
  const match = raw.match(/^(\d+(?:\.\d+)?)\s*(ms|[smh])?$/i)
  if (!match) return null

  const numRaw = match[1]
  const unitRaw = (match[2] ?? "s").toLowerCase()
  if (!numRaw) return null

  const n = Number.parseFloat(numRaw)
  if (!Number.isFinite(n) || n <= 0) return null

  const unitMs =
    unitRaw === "ms" ? 1
    : unitRaw === "s" ? 1000
    : unitRaw === "m" ? 60_000
    : unitRaw === "h" ? 3_600_000
    : null

  if (unitMs === null) return null

  const ms = Math.round(n * unitMs)
  return Number.isFinite(ms) && ms > 0 ? ms : null
}

export function formatSeconds(ms: number): string {
  const seconds = ms / 1000
  return Number.isInteger(seconds) ? `${seconds}s` : `${Number(seconds.toFixed(3))}s`
}
