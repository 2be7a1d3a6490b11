import { spawn } from "node:child_process"
import { once } from "node:events"
import { access } from "node:fs/promises"
import { accessSync, constants } from "node:fs"
import { constants as osConstants } from "node:os"
import { delimiter, isAbsolute, join } from "node:path"

import { readLinesFromStream } from "../ui/lines.ts"

export type OutputStream = "stdout" | "stderr"

export interface OutputLine {
  readonly stream: OutputStream
  readonly text: string
}

/**
 * One external command invocation. `env` entries are layered over the current environment.
 */
export interface ProcessSpec {
  readonly program: string
  readonly args: readonly string[]
  readonly cwd?: string
  readonly env?: Readonly<Record<string, string>>
  /** Text written to the child's stdin, which is then closed. */
  readonly input?: string
  /** Used when `input` is not set. */
  readonly stdin?: "inherit" | "ignore"
  readonly stderr?: "pipe" | "inherit"
}

export type ProcessStatus =
  | { readonly kind: "exited"; readonly code: number }
  | { readonly kind: "signalled"; readonly signal: NodeJS.Signals }
  | { readonly kind: "cancelled" }

export interface ProcessOutcome {
  readonly status: ProcessStatus
  readonly lines: readonly OutputLine[]
  readonly durationMs: number
}

export interface RunProcessOptions {
  readonly onLine?: (line: OutputLine) => void
  readonly signal?: AbortSignal
  /** Delay between SIGTERM and SIGKILL after cancellation. */
  readonly killGraceMs?: number
}

export type ProcessRunner = (spec: ProcessSpec, opts?: RunProcessOptions) => Promise<ProcessOutcome>

const DEFAULT_KILL_GRACE_MS = 2_000

export class SpawnFailedError extends Error {
  public readonly program: string

  public constructor(opts: { readonly program: string; readonly cause: unknown }) {
    const reason = opts.cause instanceof Error ? opts.cause.message : String(opts.cause)
    super(`Failed to start ${opts.program}: ${reason}`, { cause: opts.cause })
    this.name = "SpawnFailedError"
    this.program = opts.program
  }
}

/**
 * Run a command to completion, streaming each output line as it arrives.
 *
 * A non-zero exit is reported in the outcome. Only a failure to start the program throws
 * ({@link SpawnFailedError}). Aborting `opts.signal` sends SIGTERM to the child's process
 * group, escalates to SIGKILL after the grace period, and resolves with status `cancelled`
 * and the lines captured so far as soon as the child itself has exited.
 */
export async function runProcess(
  spec: ProcessSpec,
  opts: RunProcessOptions = {}
): Promise<ProcessOutcome> {
  const startedAt = Date.now()
  const lines: OutputLine[] = []

  if (opts.signal?.aborted) {
    return { status: { kind: "cancelled" }, lines, durationMs: 0 }
  }

  const stdinMode = spec.input !== undefined ? "pipe" : (spec.stdin ?? "ignore")
  // A child that reads the terminal must stay in the foreground process group.
  const ownGroup = process.platform !== "win32" && stdinMode !== "inherit"

  const child = spawn(spec.program, [...spec.args], {
    cwd: spec.cwd,
    env: spec.env ? { ...process.env, ...spec.env } : process.env,
    stdio: [stdinMode, "pipe", spec.stderr ?? "pipe"],
    detached: ownGroup
  })

  const closed = new Promise<{
    readonly code: number | null
    readonly signal: NodeJS.Signals | null
  }>(resolve => {
    child.once("close", (code, signal) => resolve({ code, signal }))
  })

  try {
    await once(child, "spawn")
  } catch (error: unknown) {
    throw new SpawnFailedError({ program: spec.program, cause: error })
  }

  const stdin = child.stdin
  if (stdin && spec.input !== undefined) {
    stdin.on("error", (error: NodeJS.ErrnoException) => {
      // The child may exit before reading its input; the exit status reports that.
      if (error.code !== "EPIPE") lines.push({ stream: "stderr", text: error.message })
    })
    stdin.end(spec.input)
  }

  const kill = (signal: NodeJS.Signals) => {
    const pid = child.pid
    if (ownGroup && pid !== undefined && signalGroup(pid, signal)) return
    child.kill(signal)
  }

  const hasExited = () => child.exitCode !== null || child.signalCode !== null

  // Descendants that inherited the pipes can keep them open after the child is gone.
  const releasePipes = () => {
    child.stdout?.destroy()
    child.stderr?.destroy()
  }

  let cancelled = false
  let killTimer: NodeJS.Timeout | undefined

  const onAbort = () => {
    cancelled = true
    if (hasExited()) {
      releasePipes()
      return
    }
    child.once("exit", releasePipes)
    kill("SIGTERM")
    killTimer = setTimeout(() => {
      if (!hasExited()) kill("SIGKILL")
    }, opts.killGraceMs ?? DEFAULT_KILL_GRACE_MS)
  }
  opts.signal?.addEventListener("abort", onAbort, { once: true })

  const pump = async (stream: OutputStream, source: typeof child.stdout) => {
    try {
      for await (const text of readLinesFromStream(source)) {
        const line = { stream, text } satisfies OutputLine
        lines.push(line)
        opts.onLine?.(line)
      }
    } catch (error: unknown) {
      // Released pipes end with a premature-close error.
      if (!cancelled) throw error
    }
  }

  try {
    const [, , exit] = await Promise.all([
      pump("stdout", child.stdout),
      pump("stderr", child.stderr),
      closed
    ])

    const status: ProcessStatus =
      cancelled ? { kind: "cancelled" }
      : exit.code !== null ? { kind: "exited", code: exit.code }
      : { kind: "signalled", signal: exit.signal ?? "SIGTERM" }

    return { status, lines, durationMs: Date.now() - startedAt }
  } finally {
    opts.signal?.removeEventListener("abort", onAbort)
    child.off("exit", releasePipes)
    if (killTimer) clearTimeout(killTimer)
  }
}

/**
 * Signal every process in the group led by `pid`. False when the group is gone or not
 * ours to signal.
 */
function signalGroup(pid: number, signal: NodeJS.Signals): boolean {
  try {
    process.kill(-pid, signal)
    return true
  } catch {
    return false
  }
}

export function isSuccess(status: ProcessStatus): boolean {
  return status.kind === "exited" && status.code === 0
}

export function describeStatus(status: ProcessStatus): string {
  if (status.kind === "exited") return `exited with code ${status.code}`
  if (status.kind === "signalled") return `killed by ${status.signal}`
  return "cancelled"
}

/**
 * Render a spec the way a user would type it (for dry runs and headers).
 */
export function formatCommand(spec: Pick<ProcessSpec, "program" | "args">): string {
  return [spec.program, ...spec.args].map(quoteArg).join(" ")
}

function quoteArg(arg: string): string {
  if (arg.length > 0 && /^[\w@%+=:,./{}-]+$/.test(arg)) return arg
  return `'${arg.replaceAll("'", `'\\''`)}'`
}

export interface ExecResult {
  readonly exitCode: number
  readonly stdout: string
  readonly stderr: string
}

export interface ExecOptions {
  readonly cwd?: string
  readonly env?: Readonly<Record<string, string>>
  readonly stdin?: "inherit" | "ignore"
  readonly signal?: AbortSignal
  readonly runner?: ProcessRunner
}

/**
 * Run a command and collect its output as text. Cancellation reports exit code 130.
 */
export async function exec(cmd: readonly string[], opts: ExecOptions = {}): Promise<ExecResult> {
  const [program, ...args] = cmd
  if (!program) throw new Error("exec: empty command")

  const runner = opts.runner ?? runProcess
  const outcome = await runner(
    { program, args, cwd: opts.cwd, env: opts.env, stdin: opts.stdin ?? "ignore" },
    { signal: opts.signal }
  )

  return {
    exitCode: exitCodeOf(outcome.status),
    stdout: joinStream(outcome.lines, "stdout"),
    stderr: joinStream(outcome.lines, "stderr")
  }
}

function exitCodeOf(status: ProcessStatus): number {
  if (status.kind === "exited") return status.code
  if (status.kind === "signalled") return 128 + (osConstants.signals[status.signal] ?? 0)
  return 130
}

function joinStream(lines: readonly OutputLine[], stream: OutputStream): string {
  const picked = lines.filter(l => l.stream === stream)
  return picked.length > 0 ? `${picked.map(l => l.text).join("\n")}\n` : ""
}

export class CommandError extends Error {
  public readonly exitCode: number
  public readonly stdout: string
  public readonly stderr: string
  public readonly cmd: readonly string[]

  public constructor(opts: {
    readonly cmd: readonly string[]
    readonly exitCode: number
    readonly stdout: string
    readonly stderr: string
  }) {
    const detail = opts.stderr.trim()
    super(
      `${formatCommand({ program: opts.cmd[0] ?? "", args: opts.cmd.slice(1) })} failed ` +
        `(exit ${opts.exitCode})${detail.length > 0 ? `: ${detail}` : ""}`
    )
    this.name = "CommandError"
    this.exitCode = opts.exitCode
    this.stdout = opts.stdout
    this.stderr = opts.stderr
    this.cmd = opts.cmd
  }
}

/**
 * {@link exec}, throwing {@link CommandError} unless the command exits 0.
 */
export async function execOrThrow(
  cmd: readonly string[],
  opts: ExecOptions = {}
): Promise<ExecResult> {
  const res = await exec(cmd, opts)
  if (res.exitCode !== 0) {
    throw new CommandError({ cmd, exitCode: res.exitCode, stdout: res.stdout, stderr: res.stderr })
  }
  return res
}

export async function findExecutableInPath(executableName: string): Promise<string | null> {
  for (const candidate of executableCandidates(executableName)) {
    if (await isExecutable(candidate)) return candidate
  }
  return null
}

/**
 * Synchronous PATH lookup for hot paths such as logging.
 */
export function whichSync(executableName: string): string | null {
  for (const candidate of executableCandidates(executableName)) {
    try {
      accessSync(candidate, constants.X_OK)
      return candidate
    } catch {
      continue
    }
  }
  return null
}

function executableCandidates(executableName: string): string[] {
  if (isAbsolute(executableName)) return [executableName]
  const dirs = (process.env.PATH ?? "").split(delimiter).filter(d => d.length > 0)
  return dirs.map(dir => join(dir, executableName))
}

async function isExecutable(path: string): Promise<boolean> {
  try {
    await access(path, constants.X_OK)
    return true
  } catch {
    return false
  }
}
