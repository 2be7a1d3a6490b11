import { printHelpForPath } from "../cli/help.ts"
import { defineCommand, withHandler } from "../cli/command.ts"

import type { CliContext, CommandArgs } from "../cli/command.ts"

const helpPositionals = [
  { name: "path", required: false, multiple: true, description: "Command path, e.g. git sync" }
] as const

type HelpArgs = CommandArgs<readonly [], typeof helpPositionals>

const helpSpec = defineCommand({
  name: "help",
  summary: "Show help for a command (e.g. devwrap help git sync)",
  group: "Diagnostics",
  options: [],
  positionals: helpPositionals,
  subcommands: []
} as const)

export const helpCommand = withHandler(helpSpec, handleHelp)

async function handleHelp({
  ctx,
  args
}: {
  readonly ctx: CliContext
  readonly args: HelpArgs
}): Promise<number> {
  printHelpForPath(ctx.cli, args.positionals.path)
  return 0
}
