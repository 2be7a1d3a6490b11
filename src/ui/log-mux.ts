import { SpawnFailedError, runProcess } from "../lib/shell.ts"
import { sleep } from "../lib/time.ts"

import type {
  OutputLine,
  OutputStream,
  ProcessRunner,
  ProcessSpec,
  ProcessStatus
} from "../lib/shell.ts"

export interface SourceSpec {
  readonly id: string
  readonly spec: ProcessSpec
}

export type MuxEvent =
  | {
      readonly kind: "line"
      readonly source: string
      /** 1-based position among this source's emitted lines. */
      readonly seq: number
      readonly stream: OutputStream
      readonly text: string
    }
  | { readonly kind: "exit"; readonly source: string; readonly status: ProcessStatus }
  | { readonly kind: "error"; readonly source: string; readonly error: SpawnFailedError }

export interface SourceDiscovery {
  readonly intervalMs: number
  /** Return every source that should be running; ones already tracked are ignored. */
  find(signal: AbortSignal): Promise<readonly SourceSpec[]>
}

export interface TrackSourcesOptions {
  readonly sources: readonly SourceSpec[]
  readonly onEvent: (event: MuxEvent) => void
  readonly filter?: (line: OutputLine, sourceId: string) => boolean
  readonly signal?: AbortSignal
  readonly runner?: ProcessRunner
  /** Keep polling for new sources. The session then ends only through `signal`. */
  readonly discover?: SourceDiscovery
}

export interface TrackResult {
  readonly reason: "ended" | "stopped"
  /** Every source id that was started during the session. */
  readonly started: readonly string[]
}

interface TrackedSource {
  readonly id: string
  task: Promise<void>
  lastSeq: number
}

/**
 * Run several long-lived commands at once and merge their output into one event stream.
 *
 * Lines are delivered in arrival order and keep per-source order. A source that exits or
 * fails to start produces one informational event and the others keep running. Aborting
 * `signal` stops every source; output arriving after that is dropped.
 */
export async function trackSources(opts: TrackSourcesOptions): Promise<TrackResult> {
  const runner = opts.runner ?? runProcess
  const session = new AbortController()
  const active = new Map<string, TrackedSource>()
  const started: string[] = []
  let failure: unknown = null

  const onParentAbort = () => session.abort()
  if (opts.signal?.aborted) session.abort()
  else opts.signal?.addEventListener("abort", onParentAbort, { once: true })

  const stopped = new Promise<void>(resolve => {
    if (session.signal.aborted) resolve()
    else session.signal.addEventListener("abort", () => resolve(), { once: true })
  })

  const emit = (event: MuxEvent) => {
    if (!session.signal.aborted) opts.onEvent(event)
  }

  const start = (source: SourceSpec) => {
    if (active.has(source.id) || session.signal.aborted) return

    const tracked: TrackedSource = { id: source.id, task: Promise.resolve(), lastSeq: 0 }
    active.set(source.id, tracked)
    started.push(source.id)

    const onLine = (line: OutputLine) => {
      if (opts.filter && !opts.filter(line, source.id)) return
      tracked.lastSeq += 1
      emit({ kind: "line", source: source.id, seq: tracked.lastSeq, ...line })
    }

    tracked.task = (async () => {
      try {
        const outcome = await runner(source.spec, { signal: session.signal, onLine })
        emit({ kind: "exit", source: source.id, status: outcome.status })
      } catch (error: unknown) {
        if (error instanceof SpawnFailedError) {
          emit({ kind: "error", source: source.id, error })
        } else {
          failure ??= error
          session.abort()
        }
      } finally {
        active.delete(source.id)
      }
    })()
  }

  try {
    for (const source of opts.sources) start(source)

    if (opts.discover) {
      while (!session.signal.aborted) {
        const slept = await sleep(opts.discover.intervalMs, session.signal)
        if (!slept) break
        const found = await opts.discover.find(session.signal)
        for (const source of found) start(source)
      }
    } else {
      while (active.size > 0 && !session.signal.aborted) {
        await Promise.race([Promise.all([...active.values()].map(s => s.task)), stopped])
      }
    }
  } finally {
    opts.signal?.removeEventListener("abort", onParentAbort)
    session.abort()
  }

  if (failure !== null) throw failure
  return { reason: opts.signal?.aborted ? "stopped" : "ended", started }
}
