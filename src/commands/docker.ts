import { dirname, resolve } from "node:path"

import { defineCommand, defineOption, withHandler } from "../cli/command.ts"
import { optDryRun } from "../cli/options.ts"
import { pathExists } from "../lib/fs.ts"
import { describeStatus, formatCommand, isSuccess } from "../lib/shell.ts"
import { logger } from "../ui/logger.ts"
import { runWithSpinner } from "../ui/spinner.ts"
import { loadConfigOrWarn } from "./package-utils.ts"

import type { CliContext, CommandArgs } from "../cli/command.ts"
import type { ProcessSpec } from "../lib/shell.ts"

const optFile = defineOption({
  name: "file",
  type: "string",
  long: "--file",
  short: "-f",
  valueHint: "<path>",
  description: "Dockerfile to build",
  defaultValue: "Dockerfile"
} as const)

const optTag = defineOption({
  name: "tag",
  type: "string",
  long: "--tag",
  short: "-t",
  valueHint: "<name>",
  description: "Image tag"
} as const)

const optNoCache = defineOption({
  name: "noCache",
  type: "boolean",
  long: "--no-cache",
  description: "Build without the layer cache"
} as const)

const optContext = defineOption({
  name: "context",
  type: "string",
  long: "--context",
  short: "-c",
  valueHint: "<dir>",
  description: "Build context (default: the Dockerfile's directory)"
} as const)

const buildOptions = [optFile, optTag, optNoCache, optContext, optDryRun] as const

type BuildArgs = CommandArgs<typeof buildOptions, readonly []>

const buildSpec = defineCommand({
  name: "build",
  summary: "Build an image from a Dockerfile",
  group: "Workflow",
  options: buildOptions,
  positionals: [],
  subcommands: []
} as const)

const buildCommand = withHandler(buildSpec, handleBuild)

export const dockerCommand = defineCommand({
  name: "docker",
  summary: "Docker shortcuts",
  group: "Workflow",
  expandInRootHelp: true,
  options: [],
  positionals: [],
  subcommands: [buildCommand]
} as const)

async function handleBuild({
  ctx,
  args
}: {
  readonly ctx: CliContext
  readonly args: BuildArgs
}): Promise<number> {
  const dockerfile = resolve(ctx.cwd, args.options.file ?? "Dockerfile")
  if (!(await pathExists(dockerfile))) {
    throw new Error(`Dockerfile path not found: ${args.options.file ?? "Dockerfile"}`)
  }

  const spec = buildDockerSpec({
    dockerfile,
    tag: args.options.tag,
    noCache: args.options.noCache,
    context: args.options.context ? resolve(ctx.cwd, args.options.context) : undefined,
    cwd: ctx.cwd
  })

  if (args.options.dryRun) {
    process.stdout.write(`${formatCommand(spec)}\n`)
    return 0
  }

  const config = await loadConfigOrWarn()
  const outcome = await runWithSpinner("Building image...", spec, {
    done: args.options.tag ? `Built ${args.options.tag}` : "Image built",
    intervalMs: config.spinner.intervalMs
  })
  if (outcome.status.kind === "cancelled") return 130
  if (!isSuccess(outcome.status)) {
    logger.error({ message: `docker build ${describeStatus(outcome.status)}` })
    return 1
  }
  return 0
}

/**
 * The context defaults to the directory holding the Dockerfile.
 */
export function buildDockerSpec(opts: {
  readonly dockerfile: string
  readonly tag?: string
  readonly noCache: boolean
  readonly context?: string
  readonly cwd: string
}): ProcessSpec {
  return {
    program: "docker",
    args: [
      "build",
      "-f",
      opts.dockerfile,
      ...(opts.tag ? ["-t", opts.tag] : []),
      ...(opts.noCache ? ["--no-cache"] : []),
      opts.context ?? dirname(opts.dockerfile)
    ],
    cwd: opts.cwd,
    stdin: "ignore"
  }
}
