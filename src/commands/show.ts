import { defineCommand, withHandler } from "../cli/command.ts"
import { detectProjectTool } from "../lib/tools.ts"
import { listPackages } from "./package-utils.ts"

import type { CliContext, CommandArgs } from "../cli/command.ts"

const showPositionals = [
  {
    name: "patterns",
    required: false,
    multiple: true,
    description: "Only print lines containing one of these (case-insensitive)"
  }
] as const

type ShowArgs = CommandArgs<readonly [], typeof showPositionals>

const showSpec = defineCommand({
  name: "show",
  summary: "List installed dependencies",
  group: "Packages",
  options: [],
  positionals: showPositionals,
  subcommands: []
} as const)

export const showCommand = withHandler(showSpec, handleShow)

async function handleShow({
  ctx,
  args
}: {
  readonly ctx: CliContext
  readonly args: ShowArgs
}): Promise<number> {
  const tool = await detectProjectTool(ctx.cwd)
  const { lines } = await listPackages({ tool, cwd: ctx.cwd })
  for (const line of filterDependencyLines(lines, args.positionals.patterns)) {
    process.stdout.write(`${line}\n`)
  }
  return 0
}

export function filterDependencyLines(
  lines: readonly string[],
  patterns: readonly string[]
): string[] {
  if (patterns.length === 0) return [...lines]
  const needles = patterns.map(p => p.toLowerCase())
  return lines.filter(line => {
    const haystack = line.toLowerCase()
    return needles.some(needle => haystack.includes(needle))
  })
}
