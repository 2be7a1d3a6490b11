import { CliUsageError, defineCommand, withHandler } from "../cli/command.ts"
import { describePodImages, findMatchingPods, podPatternRegex } from "../lib/kube.ts"
import { renderNoMatchWarning } from "../ui/log-format.ts"
import { ansi } from "../ui/terminal.ts"
import { withSpinner } from "../ui/spinner.ts"
import { loadConfigOrWarn } from "./package-utils.ts"

import type { CliContext, CommandArgs } from "../cli/command.ts"
import type { ProcessRunner } from "../lib/shell.ts"
import type { SpinnerOptions } from "../ui/spinner.ts"

const kmgPositionals = [
  {
    name: "pattern",
    required: true,
    description: "Pod name pattern (regular expression; prefix with (?i) to ignore case)"
  }
] as const

type KmgArgs = CommandArgs<readonly [], typeof kmgPositionals>

const kmgSpec = defineCommand({
  name: "kmg",
  summary: "Show the container images of every pod matching a pattern",
  group: "Cluster",
  options: [],
  positionals: kmgPositionals,
  subcommands: []
} as const)

export const kmgCommand = withHandler(kmgSpec, handleKmg)

async function handleKmg({
  args
}: {
  readonly ctx: CliContext
  readonly args: KmgArgs
}): Promise<number> {
  const pattern = args.positionals.pattern
  if (!pattern) throw new CliUsageError("Pass a pod pattern")

  const config = await loadConfigOrWarn()
  return await inspectPodImages({
    pattern,
    spinner: { intervalMs: config.spinner.intervalMs }
  })
}

export function formatImageLine(opts: {
  readonly index: number
  readonly total: number
  readonly pod: string
  readonly images: readonly string[]
  readonly color: boolean
}): string {
  const label = opts.color ? `\x1b[36m${ansi.bold}[${opts.pod}]${ansi.reset}` : `[${opts.pod}]`
  const images = opts.images.length > 0 ? opts.images.join(", ") : "(no image)"
  return `[${opts.index}/${opts.total}] ${label}: ${images}\n`
}

/**
 * Find the pods matching `pattern`, describe them concurrently, and print one line of
 * images per pod. Resolves to the CLI exit code.
 */
export async function inspectPodImages(input: {
  readonly pattern: string
  readonly runner?: ProcessRunner
  readonly spinner?: SpinnerOptions
  readonly print?: (text: string) => void
  readonly color?: boolean
}): Promise<number> {
  const print = input.print ?? (text => process.stdout.write(text))
  const color = input.color ?? process.stdout.isTTY === true

  const found = await withSpinner(
    "Fetching pods...",
    async session => {
      const pods = await findMatchingPods({
        regexes: [podPatternRegex(input.pattern)],
        runner: input.runner,
        signal: session.signal
      })
      if (!session.signal.aborted) session.end({ done: "Fetched pods" })
      return { pods, cancelled: session.signal.aborted }
    },
    input.spinner
  )
  if (found.cancelled) return 130

  if (found.pods.length === 0) {
    print(renderNoMatchWarning(input.pattern, color))
    return 0
  }

  const total = found.pods.length
  const described = await withSpinner(
    `Describing pods (0/${total})...`,
    async session => {
      const images = await describePodImages({
        pods: found.pods,
        runner: input.runner,
        signal: session.signal,
        onProgress: finished => session.update(`Describing pods (${finished}/${total})...`)
      })
      return { images, cancelled: session.signal.aborted }
    },
    input.spinner
  )
  if (described.cancelled) return 130

  found.pods.forEach((pod, idx) => {
    print(
      formatImageLine({
        index: idx + 1,
        total,
        pod: pod.name,
        images: described.images[idx] ?? [],
        color
      })
    )
  })
  return 0
}
