import { KUBECTL_DISCOVERY_TIMEOUT_MS } from "../constants.ts"
import { SpawnFailedError, isSuccess, runProcess } from "./shell.ts"

import type { OutputLine, ProcessRunner, ProcessSpec } from "./shell.ts"

export interface PodInfo {
  readonly namespace: string
  readonly name: string
  /** Index of the first pattern the pod name matched. */
  readonly patternIndex: number
}

export function podKey(pod: Pick<PodInfo, "namespace" | "name">): string {
  return `${pod.namespace}/${pod.name}`
}

export class KubectlError extends Error {
  public constructor(message: string) {
    super(message)
    this.name = "KubectlError"
  }
}

/**
 * Compile a pod pattern. A leading `(?i)` makes it case-insensitive; a pattern that is not a
 * valid regular expression is matched literally, ignoring case.
 */
export function podPatternRegex(pattern: string): RegExp {
  const insensitive = pattern.startsWith("(?i)")
  const source = insensitive ? pattern.slice(4) : pattern
  try {
    return new RegExp(source, insensitive ? "i" : "")
  } catch {
    return new RegExp(escapeRegExp(pattern), "i")
  }
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")
}

export const LIST_PODS_COMMAND: ProcessSpec = {
  program: "kubectl",
  args: [
    "get",
    "pods",
    "-A",
    "-o",
    "custom-columns=NAMESPACE:.metadata.namespace,NAME:.metadata.name",
    "--no-headers",
    "--request-timeout=10s"
  ],
  stdin: "ignore"
}

export function parsePodList(lines: readonly string[], regexes: readonly RegExp[]): PodInfo[] {
  const pods: PodInfo[] = []
  for (const raw of lines) {
    const [namespace, name] = raw.trim().split(/\s+/)
    if (!namespace || !name) continue
    const patternIndex = regexes.findIndex(re => re.test(name))
    if (patternIndex !== -1) pods.push({ namespace, name, patternIndex })
  }
  return pods
}

const AUTH_HINT =
  "Authenticate to your cluster first (e.g. open the login URL in a browser or run your auth command), then run track again."

function needsAuth(stderr: string): boolean {
  return (
    stderr.includes("could not open the browser") ||
    stderr.includes("Please visit the following URL") ||
    stderr.includes("authenticate")
  )
}

/**
 * List pods in every namespace whose name matches one of `regexes`.
 *
 * kubectl can block on an interactive login; the call is abandoned after `timeoutMs`.
 */
export async function findMatchingPods(opts: {
  readonly regexes: readonly RegExp[]
  readonly runner?: ProcessRunner
  readonly signal?: AbortSignal
  readonly timeoutMs?: number
}): Promise<PodInfo[]> {
  const runner = opts.runner ?? runProcess
  const timeoutMs = opts.timeoutMs ?? KUBECTL_DISCOVERY_TIMEOUT_MS
  const controller = new AbortController()
  let timedOut = false
  const timer = setTimeout(() => {
    timedOut = true
    controller.abort()
  }, timeoutMs)
  const onParentAbort = () => controller.abort()
  opts.signal?.addEventListener("abort", onParentAbort, { once: true })
  if (opts.signal?.aborted) controller.abort()

  try {
    const outcome = await runner(LIST_PODS_COMMAND, { signal: controller.signal })
    const stderr = outcome.lines
      .filter(line => line.stream === "stderr")
      .map(line => line.text)
      .join("\n")
    const stderrSuffix = stderr.trim().length > 0 ? `\n\nkubectl stderr:\n${stderr}` : ""

    if (timedOut) {
      throw new KubectlError(
        `kubectl get pods timed out (${Math.round(timeoutMs / 1000)}s). ` +
          "If your cluster requires authentication, run your auth command first, then run track again." +
          stderrSuffix
      )
    }
    if (outcome.status.kind === "cancelled") return []
    if (outcome.status.kind !== "exited" || outcome.status.code !== 0) {
      const hint = needsAuth(stderr) ? ` ${AUTH_HINT}` : ""
      throw new KubectlError(`kubectl get pods failed.${hint}${stderrSuffix}`)
    }

    const stdout = outcome.lines.filter(line => line.stream === "stdout").map(line => line.text)
    return parsePodList(stdout, opts.regexes)
  } finally {
    clearTimeout(timer)
    opts.signal?.removeEventListener("abort", onParentAbort)
  }
}

export function followLogsCommand(pod: PodInfo, tail: number): ProcessSpec {
  return {
    program: "kubectl",
    args: ["logs", "-f", `--tail=${tail}`, "--timestamps", pod.name, "-n", pod.namespace],
    stdin: "ignore"
  }
}

export function describePodCommand(pod: Pick<PodInfo, "namespace" | "name">): ProcessSpec {
  return {
    program: "kubectl",
    args: ["describe", "pod", pod.name, "-n", pod.namespace],
    stdin: "ignore"
  }
}

/**
 * Container images listed in `kubectl describe pod` output, in order. `Image ID:` lines
 * are not images.
 */
export function parsePodImages(lines: readonly string[]): string[] {
  const images: string[] = []
  for (const raw of lines) {
    const line = raw.trim()
    if (!line.startsWith("Image:")) continue
    const image = line.slice("Image:".length).trim()
    if (image.length > 0) images.push(image)
  }
  return images
}

/**
 * Describe every pod concurrently and collect its images. A pod whose describe fails (or
 * whose kubectl cannot start) reports no images. `onProgress` fires as each pod finishes.
 */
export async function describePodImages(opts: {
  readonly pods: readonly PodInfo[]
  readonly runner?: ProcessRunner
  readonly signal?: AbortSignal
  readonly onProgress?: (finished: number, total: number) => void
}): Promise<string[][]> {
  const runner = opts.runner ?? runProcess
  const total = opts.pods.length
  let finished = 0

  const describeOne = async (pod: PodInfo): Promise<string[]> => {
    try {
      const outcome = await runner(describePodCommand(pod), { signal: opts.signal })
      if (!isSuccess(outcome.status)) return []
      return parsePodImages(
        outcome.lines.filter(line => line.stream === "stdout").map(line => line.text)
      )
    } catch (error: unknown) {
      if (error instanceof SpawnFailedError) return []
      throw error
    } finally {
      finished += 1
      opts.onProgress?.(finished, total)
    }
  }

  return await Promise.all(opts.pods.map(describeOne))
}

const ERROR_KEYWORDS = ["WARNING", "ERROR", "CRITICAL", "FATAL"] as const

const TIMESTAMP_PREFIX = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d+)?(?:Z|[+-]\d{2}:\d{2}) /

export interface TracebackState {
  inTraceback: boolean
}

/**
 * Error-only filter for one log stream. Keeps lines mentioning a warning or error level and
 * whole Python tracebacks: the header, its indented frames, and the first unindented line
 * that follows (the exception itself).
 */
export function shouldShowLine(line: string, state: TracebackState): boolean {
  const text = line.replace(TIMESTAMP_PREFIX, "")

  if (text.includes("Traceback (most recent call last)")) {
    state.inTraceback = true
    return true
  }

  if (state.inTraceback) {
    if (text.startsWith(" ") || text.startsWith("\t")) return true
    state.inTraceback = false
    if (text.length > 0) return true
  }

  const upper = text.toUpperCase()
  return ERROR_KEYWORDS.some(keyword => upper.includes(keyword))
}

/**
 * Build a multiplexer filter that keeps separate traceback state per source.
 */
export function createErrorOnlyFilter(): (line: OutputLine, sourceId: string) => boolean {
  const states = new Map<string, TracebackState>()
  return (line, sourceId) => {
    let state = states.get(sourceId)
    if (!state) {
      state = { inTraceback: false }
      states.set(sourceId, state)
    }
    return shouldShowLine(line.text, state)
  }
}
