import { isSuccess, runProcess } from "../lib/shell.ts"
import { redirectLogs } from "./logger.ts"
import { ansi, isSpinnerDisabled, paint, processTerminal } from "./terminal.ts"

import type { OutputStream, ProcessOutcome, ProcessRunner, ProcessSpec } from "../lib/shell.ts"
import type { TerminalWriter } from "./terminal.ts"

export const SPINNER_FRAMES = ["⣾", "⣽", "⣻", "⢿", "⡿", "⣟", "⣯", "⣷"] as const

const DEFAULT_INTERVAL_MS = 100

export class SpinnerActiveError extends Error {
  public constructor(message: string) {
    super(`A spinner is already running ("${message}")`)
    this.name = "SpinnerActiveError"
  }
}

export interface SpinnerOptions {
  readonly terminal?: TerminalWriter
  readonly intervalMs?: number
  readonly env?: NodeJS.ProcessEnv
  /** Install SIGINT/exit handlers that restore the terminal (default true). */
  readonly handleSignals?: boolean
}

export interface SpinnerSession {
  /** Aborted when the user presses Ctrl+C while the session is live. */
  readonly signal: AbortSignal
  /** False in degraded mode (no terminal, or NO_SPINNER set). */
  readonly animated: boolean
  readonly startedAt: number
  message(): string
  update(message: string): void
  /** Output produced by the work; buffered while the spinner line is showing. */
  write(stream: OutputStream, text: string): void
  suspend(): void
  resume(): void
  /** Clear the spinner, flush buffered output, and optionally print a completion line. */
  end(opts?: { readonly done?: string }): void
}

type Mode = "animating" | "suspended" | "passthrough" | "ended"

let liveMessage: string | null = null

export function isSpinnerLive(): boolean {
  return liveMessage !== null
}

/**
 * Start the process-wide spinner. Only one session may be live at a time.
 */
export function beginSpinner(message: string, opts: SpinnerOptions = {}): SpinnerSession {
  if (liveMessage !== null) throw new SpinnerActiveError(liveMessage)

  const terminal = opts.terminal ?? processTerminal
  const intervalMs = opts.intervalMs ?? DEFAULT_INTERVAL_MS
  const animated = terminal.interactive && !isSpinnerDisabled(opts.env)
  const controller = new AbortController()
  const startedAt = Date.now()

  let current = message
  let mode: Mode = animated ? "animating" : "passthrough"
  let frameIdx = 0
  let timer: NodeJS.Timeout | undefined
  let buffered: { readonly stream: OutputStream; readonly text: string }[] = []

  const draw = () => {
    const frame = SPINNER_FRAMES[frameIdx % SPINNER_FRAMES.length] ?? ""
    terminal.write("stderr", `${ansi.clearLine}${frame} ${current}`)
  }

  const startAnimation = () => {
    terminal.write("stderr", ansi.hideCursor)
    draw()
    timer = setInterval(() => {
      frameIdx += 1
      draw()
    }, intervalMs)
  }

  const stopAnimation = () => {
    if (timer) clearInterval(timer)
    timer = undefined
    terminal.write("stderr", `${ansi.clearLine}${ansi.showCursor}`)
  }

  const flush = () => {
    const pending = buffered
    buffered = []
    for (const item of pending) terminal.write(item.stream, item.text)
  }

  const write = (stream: OutputStream, text: string) => {
    if (mode === "animating") buffered.push({ stream, text })
    else terminal.write(stream, text)
  }

  const restore = () => {
    if (mode !== "animating") return
    stopAnimation()
    flush()
    mode = "suspended"
  }

  const onSigint = () => {
    restore()
    controller.abort()
  }

  const onExit = () => {
    if (mode === "animating") stopAnimation()
  }

  const handleSignals = opts.handleSignals !== false
  if (handleSignals) {
    process.once("SIGINT", onSigint)
    process.once("exit", onExit)
  }

  liveMessage = message
  const restoreLogs = animated ? redirectLogs(text => write("stderr", text)) : null
  if (animated) startAnimation()

  return {
    signal: controller.signal,
    animated,
    startedAt,
    message: () => current,
    update(next) {
      current = next
      if (mode === "animating") draw()
    },
    write,
    suspend() {
      restore()
    },
    resume() {
      if (mode !== "suspended" || controller.signal.aborted) return
      mode = "animating"
      startAnimation()
    },
    end(endOpts) {
      if (mode === "ended") return
      if (mode === "animating") {
        stopAnimation()
        flush()
      }
      mode = "ended"
      liveMessage = null
      restoreLogs?.()
      if (handleSignals) {
        process.off("SIGINT", onSigint)
        process.off("exit", onExit)
      }
      if (endOpts?.done) {
        terminal.write("stderr", `${paint("✓", ansi.green, animated)} ${endOpts.done}\n`)
      }
    }
  }
}

/**
 * Run `work` behind a spinner. The session is always ended, whether the work resolves or
 * throws.
 */
export async function withSpinner<T>(
  message: string,
  work: (session: SpinnerSession) => Promise<T>,
  opts: SpinnerOptions = {}
): Promise<T> {
  const session = beginSpinner(message, opts)
  try {
    return await work(session)
  } finally {
    session.end()
  }
}

export interface RunWithSpinnerOptions extends SpinnerOptions {
  readonly runner?: ProcessRunner
  /** Printed as `✓ <done>` when the command exits 0. */
  readonly done?: string
  /** Replay the command's output after the spinner clears (default true). */
  readonly echo?: boolean
}

export async function runWithSpinner(
  message: string,
  spec: ProcessSpec,
  opts: RunWithSpinnerOptions = {}
): Promise<ProcessOutcome> {
  const runner = opts.runner ?? runProcess
  const echo = opts.echo !== false

  return await withSpinner(
    message,
    async session => {
      const outcome = await runner(spec, {
        signal: session.signal,
        onLine: echo ? line => session.write(line.stream, `${line.text}\n`) : undefined
      })
      if (isSuccess(outcome.status)) session.end({ done: opts.done })
      return outcome
    },
    opts
  )
}
