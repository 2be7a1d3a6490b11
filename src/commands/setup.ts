import { resolve } from "node:path"

import { defineCommand, defineOption, withHandler } from "../cli/command.ts"
import { optDryRun, optVerbose } from "../cli/options.ts"
import { removeDir } from "../lib/fs.ts"
import { detectProjectTool } from "../lib/tools.ts"
import { logger } from "../ui/logger.ts"
import { loadConfigOrWarn, runToolAction } from "./package-utils.ts"

import type { CliContext, CommandArgs } from "../cli/command.ts"
import type { ProcessRunner } from "../lib/shell.ts"
import type { ProjectTool } from "../lib/tools.ts"
import type { SpinnerOptions } from "../ui/spinner.ts"

const optFrozen = defineOption({
  name: "frozen",
  type: "boolean",
  long: "--frozen",
  description: "Install exactly what the lock file pins"
} as const)

const optRm = defineOption({
  name: "rm",
  type: "boolean",
  long: "--rm",
  description: "Remove the environment (.venv or target) first and skip the cache"
} as const)

const setupOptions = [optFrozen, optRm, optDryRun, optVerbose] as const

type SetupArgs = CommandArgs<typeof setupOptions, readonly []>

const setupSpec = defineCommand({
  name: "setup",
  summary: "Install project dependencies with uv, poetry or cargo",
  group: "Packages",
  options: setupOptions,
  positionals: [],
  subcommands: []
} as const)

export const setupCommand = withHandler(setupSpec, handleSetup)

async function handleSetup({
  ctx,
  args
}: {
  readonly ctx: CliContext
  readonly args: SetupArgs
}): Promise<number> {
  const config = await loadConfigOrWarn()
  const tool = await detectProjectTool(ctx.cwd)
  return await setupProject({
    tool,
    cwd: ctx.cwd,
    frozen: args.options.frozen,
    rm: args.options.rm,
    dryRun: args.options.dryRun,
    verbose: args.options.verbose,
    spinner: { intervalMs: config.spinner.intervalMs }
  })
}

export interface SetupProjectInput {
  readonly tool: ProjectTool
  readonly cwd: string
  readonly frozen: boolean
  readonly rm: boolean
  readonly dryRun: boolean
  readonly verbose: boolean
  readonly runner?: ProcessRunner
  readonly spinner?: SpinnerOptions
  readonly print?: (text: string) => void
}

export async function setupProject(input: SetupProjectInput): Promise<number> {
  const print = input.print ?? (text => process.stdout.write(text))

  if (input.rm) {
    if (input.dryRun) {
      print(`rm -rf ${input.tool.envDir}\n`)
    } else {
      const { removed } = await removeDir(resolve(input.cwd, input.tool.envDir))
      if (removed) logger.info({ message: `Removed ${input.tool.envDir}` })
    }
  }

  return await runToolAction({
    tool: input.tool,
    action: { kind: "install", frozen: input.frozen, noCache: input.rm },
    cwd: input.cwd,
    dryRun: input.dryRun,
    verbose: input.verbose,
    done: "Dependencies installed",
    runner: input.runner,
    spinner: input.spinner,
    print
  })
}
