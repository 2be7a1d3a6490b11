import { CliUsageError, defineCommand, defineOption, withHandler } from "../cli/command.ts"
import { parseDurationMs } from "../lib/duration.ts"
import { createTerminalWatchRenderer, runWatchLoop } from "../ui/watch.ts"
import { loadConfigOrWarn } from "./package-utils.ts"

import type { CliContext, CommandArgs } from "../cli/command.ts"
import type { ProcessSpec } from "../lib/shell.ts"

const optInterval = defineOption({
  name: "interval",
  type: "string",
  long: "--interval",
  short: "-n",
  valueHint: "<secs>",
  description: "Time between runs, e.g. 2, 1.5, 500ms or 1m (default: watch.intervalSeconds, 2)"
} as const)

const optNoDiff = defineOption({
  name: "noDiff",
  type: "boolean",
  long: "--no-diff",
  description: "Do not highlight changes between runs"
} as const)

const watchOptions = [optInterval, optNoDiff] as const
const watchPositionals = [
  { name: "command", required: true, multiple: true, description: "Command line to re-run" }
] as const

type WatchArgs = CommandArgs<typeof watchOptions, typeof watchPositionals>

const watchSpec = defineCommand({
  name: "watch",
  summary: "Re-run a command on an interval and highlight what changed",
  description: "Everything after the watch options belongs to the command. Ctrl+C stops.",
  group: "Workflow",
  options: watchOptions,
  positionals: watchPositionals,
  subcommands: [],
  passthrough: true
} as const)

export const watchCommand = withHandler(watchSpec, handleWatch)

async function handleWatch({
  ctx,
  args
}: {
  readonly ctx: CliContext
  readonly args: WatchArgs
}): Promise<number> {
  const config = await loadConfigOrWarn()
  const spec = buildWatchSpec(args.positionals.command, ctx.cwd)
  const intervalMs = resolveIntervalMs(args.options.interval, config.watch.intervalSeconds)
  const diff = config.watch.diff && !args.options.noDiff

  const controller = new AbortController()
  const onSigint = () => controller.abort()
  process.once("SIGINT", onSigint)

  try {
    await runWatchLoop({
      spec,
      intervalMs,
      diff,
      signal: controller.signal,
      renderer: createTerminalWatchRenderer({ spec, intervalMs, diff })
    })
  } finally {
    process.off("SIGINT", onSigint)
  }

  return controller.signal.aborted ? 130 : 0
}

export function buildWatchSpec(command: readonly string[], cwd: string): ProcessSpec {
  const [program, ...rest] = command
  if (!program) throw new CliUsageError("Missing command to watch")
  return { program, args: rest, cwd, stdin: "ignore" }
}

export function resolveIntervalMs(raw: string | undefined, fallbackSeconds: number): number {
  if (raw === undefined) return Math.round(fallbackSeconds * 1000)
  const ms = parseDurationMs(raw)
  if (ms === null) throw new CliUsageError(`Invalid interval: ${raw}`)
  return ms
}
