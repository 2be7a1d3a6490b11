import { defineCommand, withHandler } from "../cli/command.ts"

import type { CliContext, CliSpec, CommandArgs } from "../cli/command.ts"

type VersionArgs = CommandArgs<readonly [], readonly []>

const versionSpec = defineCommand({
  name: "version",
  summary: "Print version",
  group: "Diagnostics",
  options: [],
  positionals: [],
  subcommands: []
} as const)

export function formatVersionLine(cli: Pick<CliSpec, "name" | "version">): string {
  return `${cli.name} v${cli.version} (node ${process.version})`
}

async function handleVersion({
  ctx
}: {
  readonly ctx: CliContext
  readonly args: VersionArgs
}): Promise<number> {
  process.stdout.write(`${formatVersionLine(ctx.cli)}\n`)
  return 0
}

export const versionCommand = withHandler(versionSpec, handleVersion)
