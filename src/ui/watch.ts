import { diffSnapshots, splitChangedSegments } from "../lib/line-diff.ts"
import { formatSeconds } from "../lib/duration.ts"
import { formatCommand, runProcess } from "../lib/shell.ts"
import { sleep as sleepWithSignal } from "../lib/time.ts"
import { ansi, isColorEnabled, paint, processTerminal } from "./terminal.ts"

import type { DiffLine } from "../lib/line-diff.ts"
import type { ProcessOutcome, ProcessRunner, ProcessSpec } from "../lib/shell.ts"
import type { TerminalWriter } from "./terminal.ts"

export type WatchState = "idle" | "executing" | "rendering" | "sleeping" | "stopped"

export interface WatchFrame {
  /** Zero-based cycle number. */
  readonly cycle: number
  readonly lines: readonly DiffLine[]
  /** Whether changed and added lines should be highlighted. */
  readonly highlight: boolean
  readonly outcome: ProcessOutcome
}

export interface WatchRenderer {
  render(frame: WatchFrame): void
  /** Restore terminal state. Called once when the loop stops. */
  dispose(): void
}

export interface WatchLoopOptions {
  readonly spec: ProcessSpec
  readonly intervalMs: number
  readonly diff: boolean
  readonly signal: AbortSignal
  readonly renderer: WatchRenderer
  readonly runner?: ProcessRunner
  readonly sleep?: (ms: number, signal: AbortSignal) => Promise<boolean>
  readonly now?: () => number
  readonly onStateChange?: (state: WatchState) => void
}

export interface WatchLoopResult {
  readonly cycles: number
}

/**
 * Re-run a command every `intervalMs`, rendering each run against the previous one.
 *
 * The sleep after a cycle covers only what is left of the interval, so a slow command is
 * re-run immediately with no backlog. A non-zero exit keeps the loop going; a spawn
 * failure propagates. Aborting the signal cancels an in-flight run without rendering it.
 */
export async function runWatchLoop(opts: WatchLoopOptions): Promise<WatchLoopResult> {
  const runner = opts.runner ?? runProcess
  const sleepFor = opts.sleep ?? sleepWithSignal
  const now = opts.now ?? Date.now

  let previous: readonly string[] | null = null
  let cycles = 0
  const setState = (state: WatchState) => opts.onStateChange?.(state)

  setState("idle")
  try {
    while (!opts.signal.aborted) {
      setState("executing")
      const startedAt = now()
      const outcome = await runner(opts.spec, { signal: opts.signal })
      if (outcome.status.kind === "cancelled" || opts.signal.aborted) break

      setState("rendering")
      const snapshot = outcome.lines.map(line => line.text)
      opts.renderer.render({
        cycle: cycles,
        lines: diffSnapshots(previous, snapshot),
        highlight: opts.diff && previous !== null,
        outcome
      })
      previous = snapshot
      cycles += 1

      const remaining = opts.intervalMs - (now() - startedAt)
      if (remaining <= 0) continue

      setState("sleeping")
      const slept = await sleepFor(remaining, opts.signal)
      if (!slept) break
    }
  } finally {
    opts.renderer.dispose()
    setState("stopped")
  }

  return { cycles }
}

export interface TerminalWatchRendererOptions {
  readonly spec: ProcessSpec
  readonly intervalMs: number
  readonly diff: boolean
  readonly terminal?: TerminalWriter
  readonly color?: boolean
}

/**
 * Full-screen renderer: clears the screen, prints the header and the snapshot.
 */
export function createTerminalWatchRenderer(opts: TerminalWatchRendererOptions): WatchRenderer {
  const terminal = opts.terminal ?? processTerminal
  const color = opts.color ?? isColorEnabled()
  let cursorHidden = false

  return {
    render(frame) {
      if (!cursorHidden) {
        terminal.write("stdout", ansi.hideCursor)
        cursorHidden = true
      }
      const body = renderWatchScreen({
        command: formatCommand(opts.spec),
        intervalMs: opts.intervalMs,
        diff: opts.diff,
        frame,
        color
      })
      terminal.write("stdout", `${ansi.clearScreen}${body}`)
    },
    dispose() {
      if (cursorHidden) terminal.write("stdout", ansi.showCursor)
      cursorHidden = false
    }
  }
}

export function renderWatchScreen(opts: {
  readonly command: string
  readonly intervalMs: number
  readonly diff: boolean
  readonly frame: WatchFrame
  readonly color: boolean
}): string {
  const out: string[] = []
  out.push(paint(`Every ${formatSeconds(opts.intervalMs)}: ${opts.command}`, ansi.bold, opts.color))
  if (opts.diff) out.push(paint("green = changed since last run", ansi.dim, opts.color))
  out.push("")

  for (const line of opts.frame.lines) {
    if (line.status === "removed") continue
    out.push(opts.frame.highlight ? renderDiffLine(line, opts.color) : line.content)
  }

  return `${out.join("\n")}\n`
}

export function renderDiffLine(line: DiffLine, color: boolean): string {
  if (line.status === "added") return paint(line.content, ansi.green, color)
  if (line.status !== "changed" || line.previous === undefined) return line.content

  const { head, middle, tail } = splitChangedSegments(line.previous, line.content)
  if (middle.length === 0) return paint(line.content, ansi.green, color)
  return `${head}${paint(middle, ansi.green, color)}${tail}`
}
