import { CliUsageError, defineCommand, defineOption, withHandler } from "../cli/command.ts"
import {
  KubectlError,
  createErrorOnlyFilter,
  findMatchingPods,
  followLogsCommand,
  podKey,
  podPatternRegex
} from "../lib/kube.ts"
import { createTrackPrinter, renderNoMatchWarning, sourceColor } from "../ui/log-format.ts"
import { trackSources } from "../ui/log-mux.ts"
import { logger } from "../ui/logger.ts"
import { withSpinner } from "../ui/spinner.ts"
import { loadConfigOrWarn } from "./package-utils.ts"

import type { CliContext, CommandArgs } from "../cli/command.ts"
import type { PodInfo } from "../lib/kube.ts"
import type { SourceSpec } from "../ui/log-mux.ts"

const optErrOnly = defineOption({
  name: "errOnly",
  type: "boolean",
  long: "--err-only",
  description: "Only show warnings, errors and tracebacks"
} as const)

const optTail = defineOption({
  name: "tail",
  type: "number",
  long: "--tail",
  valueHint: "<n>",
  description: "Lines of history per pod (default: track.tail, 1000)"
} as const)

const trackOptions = [optErrOnly, optTail] as const
const trackPositionals = [
  {
    name: "patterns",
    required: true,
    multiple: true,
    description: "Pod name patterns (regular expressions; prefix with (?i) to ignore case)"
  }
] as const

type TrackArgs = CommandArgs<typeof trackOptions, typeof trackPositionals>

const trackSpec = defineCommand({
  name: "track",
  summary: "Follow logs from every pod matching the patterns, across namespaces",
  description: "New pods that start matching are picked up while tracking. Ctrl+C stops.",
  group: "Cluster",
  options: trackOptions,
  positionals: trackPositionals,
  subcommands: []
} as const)

export const trackCommand = withHandler(trackSpec, handleTrack)

async function handleTrack({
  args
}: {
  readonly ctx: CliContext
  readonly args: TrackArgs
}): Promise<number> {
  const patterns = args.positionals.patterns
  if (patterns.length === 0) throw new CliUsageError("Pass at least one pod pattern")

  const config = await loadConfigOrWarn()
  const tail = args.options.tail ?? config.track.tail
  if (!Number.isInteger(tail) || tail < 0) throw new CliUsageError(`Invalid --tail: ${tail}`)

  const regexes = patterns.map(podPatternRegex)

  const discovered = await withSpinner(
    "Finding pods...",
    async session => {
      const pods = await findMatchingPods({ regexes, signal: session.signal })
      if (!session.signal.aborted) session.end({ done: "Found pods" })
      return { pods, cancelled: session.signal.aborted }
    },
    { intervalMs: config.spinner.intervalMs }
  )
  if (discovered.cancelled) return 130

  const tty = process.stdout.isTTY === true
  patterns.forEach((pattern, idx) => {
    if (!discovered.pods.some(pod => pod.patternIndex === idx)) {
      process.stdout.write(renderNoMatchWarning(pattern, tty))
    }
  })
  if (discovered.pods.length === 0) return 0

  const colors = new Map<string, string>()
  const toSource = (pod: PodInfo): SourceSpec => {
    const id = podKey(pod)
    colors.set(id, sourceColor(pod.patternIndex))
    return { id, spec: followLogsCommand(pod, tail) }
  }

  let lastDiscoveryError: string | null = null
  const rediscover = async (signal: AbortSignal): Promise<SourceSpec[]> => {
    try {
      const pods = await findMatchingPods({ regexes, signal })
      lastDiscoveryError = null
      return pods.map(toSource)
    } catch (error: unknown) {
      if (!(error instanceof KubectlError)) throw error
      // Keep following the pods we have; report each new failure once.
      if (error.message !== lastDiscoveryError) logger.warn({ message: error.message })
      lastDiscoveryError = error.message
      return []
    }
  }

  const controller = new AbortController()
  const onSigint = () => controller.abort()
  process.once("SIGINT", onSigint)

  try {
    await trackSources({
      sources: discovered.pods.map(toSource),
      onEvent: createTrackPrinter({
        write: text => process.stdout.write(text),
        writeError: text => process.stderr.write(text),
        tty,
        colorFor: id => colors.get(id) ?? sourceColor(0)
      }),
      filter: args.options.errOnly ? createErrorOnlyFilter() : undefined,
      signal: controller.signal,
      discover: {
        intervalMs: Math.round(config.track.rediscoverSeconds * 1000),
        find: rediscover
      }
    })
  } finally {
    process.off("SIGINT", onSigint)
  }

  return 0
}
