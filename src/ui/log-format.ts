import { TRACK_HEADER_RULE } from "../constants.ts"
import { describeStatus } from "../lib/shell.ts"
import { ansi } from "./terminal.ts"

import type { MuxEvent } from "./log-mux.ts"

/** Per-pattern colors, cycled by pattern index. */
export const SOURCE_COLORS = [
  "\x1b[36m",
  "\x1b[32m",
  "\x1b[35m",
  "\x1b[33m",
  "\x1b[34m",
  "\x1b[96m",
  "\x1b[92m",
  "\x1b[95m"
] as const

export function sourceColor(index: number): string {
  return SOURCE_COLORS[index % SOURCE_COLORS.length] ?? ansi.reset
}

export function formatTrackedLine(opts: { readonly line: string; readonly tty: boolean }): string {
  const { timestampIso, payload } = splitIsoTimestampPrefix(opts.line)
  if (!timestampIso) return payload
  return `${formatTimePrefix({ iso: timestampIso, tty: opts.tty })}${payload}`
}

export interface TrackPrinterOptions {
  readonly write: (text: string) => void
  readonly writeError: (text: string) => void
  readonly tty: boolean
  /** ANSI color for a source's header; only used when `tty` is set. */
  readonly colorFor?: (sourceId: string) => string
}

/**
 * Print multiplexer events, announcing each switch to a different source with a header.
 */
export function createTrackPrinter(opts: TrackPrinterOptions): (event: MuxEvent) => void {
  let lastSource: string | null = null

  return event => {
    if (event.kind === "error") {
      opts.writeError(
        `\n${color("[error]", ansi.red, opts.tty)} Failed to follow logs for ${event.source}: ${event.error.message}\n\n`
      )
      return
    }

    if (event.kind === "exit") {
      opts.writeError(`${color(`[${event.source}] ${describeStatus(event.status)}`, ansi.dim, opts.tty)}\n`)
      return
    }

    if (lastSource !== event.source) {
      opts.write(renderSourceHeader(event.source, opts.tty ? (opts.colorFor?.(event.source) ?? null) : null))
      lastSource = event.source
    }
    opts.write(`${formatTrackedLine({ line: event.text, tty: opts.tty })}\n`)
  }
}

export function renderSourceHeader(sourceId: string, colorCode: string | null): string {
  if (colorCode === null) return `\n${TRACK_HEADER_RULE}\n ${sourceId}\n${TRACK_HEADER_RULE}\n`
  const style = `${colorCode}${ansi.bold}`
  return (
    `\n${style}${TRACK_HEADER_RULE}${ansi.reset}\n` +
    `${style} ${sourceId}${ansi.reset}\n` +
    `${style}${TRACK_HEADER_RULE}${ansi.reset}\n`
  )
}

export function renderNoMatchWarning(pattern: string, tty: boolean): string {
  if (!tty) return `\nNo pods found matching pattern: "${pattern}"\n\n`
  return `\n\x1b[93m${ansi.bold}⚠  No pods found matching pattern: "${pattern}"${ansi.reset}\n\n`
}

function color(text: string, code: string, tty: boolean): string {
  return tty ? `${code}${text}${ansi.reset}` : text
}

function splitIsoTimestampPrefix(payload: string): {
  readonly timestampIso: string | null
  readonly payload: string
} {
  const match = payload.match(/^(\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d+)?Z)([\s\S]*)$/)
  if (!match) return { timestampIso: null, payload }

  const iso = match[1] ?? null
  let rest = match[2] ?? ""
  // kubectl adds a single separator space; keep any indentation from the container output.
  if (rest.startsWith(" ")) rest = rest.slice(1)
  return { timestampIso: iso, payload: rest }
}

function formatTimePrefix(opts: { readonly iso: string; readonly tty: boolean }): string {
  const label = isoToClock(opts.iso)
  if (!opts.tty) return `[${label}] `
  return `${color("[", ansi.dim, true)}${color(label, ansi.dim, true)}${color("]", ansi.dim, true)} `
}

function isoToClock(iso: string): string {
  const match = iso.match(/T(\d{2}:\d{2}:\d{2})(?:\.(\d+))?Z$/)
  if (!match) return iso
  const hms = match[1] ?? iso
  const frac = match[2]
  if (!frac) return hms
  const ms = frac.slice(0, 3).padEnd(3, "0")
  return `${hms}.${ms}`
}
