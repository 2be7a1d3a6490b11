import { defineCommand, defineOption, withHandler } from "../cli/command.ts"
import { optDryRun } from "../cli/options.ts"
import { describeStatus, exec, formatCommand, isSuccess, runProcess } from "../lib/shell.ts"
import { splitLines } from "../ui/lines.ts"
import { logger } from "../ui/logger.ts"

import type { CliContext, CommandArgs } from "../cli/command.ts"
import type { ProcessRunner, ProcessSpec } from "../lib/shell.ts"

const optCurrent = defineOption({
  name: "current",
  type: "boolean",
  long: "--current",
  description: "Sync the checked-out branch instead of the default branch"
} as const)

const syncOptions = [optCurrent, optDryRun] as const

type SyncArgs = CommandArgs<typeof syncOptions, readonly []>

const syncSpec = defineCommand({
  name: "sync",
  summary: "Check out the default branch, pull it and fetch all remotes",
  group: "Workflow",
  options: syncOptions,
  positionals: [],
  subcommands: []
} as const)

const syncCommand = withHandler(syncSpec, handleSync)

export const gitCommand = defineCommand({
  name: "git",
  summary: "Git shortcuts",
  group: "Workflow",
  expandInRootHelp: true,
  options: [],
  positionals: [],
  subcommands: [syncCommand]
} as const)

async function handleSync({
  ctx,
  args
}: {
  readonly ctx: CliContext
  readonly args: SyncArgs
}): Promise<number> {
  return await syncBranch({
    cwd: ctx.cwd,
    current: args.options.current,
    dryRun: args.options.dryRun
  })
}

export interface SyncStep {
  readonly title: string
  readonly spec: ProcessSpec
}

export function buildSyncSteps(opts: {
  readonly branch: string
  readonly current: boolean
  readonly cwd: string
}): SyncStep[] {
  const git = (...args: string[]): ProcessSpec => ({
    program: "git",
    args,
    cwd: opts.cwd,
    stdin: "ignore"
  })
  return [
    ...(opts.current ?
      []
    : [{ title: `Checking out '${opts.branch}'`, spec: git("checkout", opts.branch) }]),
    { title: `Pulling origin '${opts.branch}'`, spec: git("pull", "origin", opts.branch) },
    { title: "Fetching all", spec: git("fetch", "--all") }
  ]
}

export async function syncBranch(opts: {
  readonly cwd: string
  readonly current: boolean
  readonly dryRun: boolean
  readonly runner?: ProcessRunner
  readonly print?: (text: string) => void
}): Promise<number> {
  const runner = opts.runner ?? runProcess
  const print = opts.print ?? (text => process.stdout.write(text))

  const branch =
    opts.current ?
      await resolveCurrentBranch({ cwd: opts.cwd, runner })
    : await resolveDefaultBranch({ cwd: opts.cwd, runner })

  for (const step of buildSyncSteps({ branch, current: opts.current, cwd: opts.cwd })) {
    logger.step({ message: step.title })
    if (opts.dryRun) {
      print(`${formatCommand(step.spec)}\n`)
      continue
    }

    const outcome = await runner(step.spec, {
      onLine: line => {
        if (line.stream === "stdout") process.stdout.write(`${line.text}\n`)
        else process.stderr.write(`${line.text}\n`)
      }
    })
    if (!isSuccess(outcome.status)) {
      logger.error({ message: `${formatCommand(step.spec)} ${describeStatus(outcome.status)}` })
      return outcome.status.kind === "exited" ? outcome.status.code : 1
    }
  }
  return 0
}

async function gitStdout(opts: {
  readonly args: readonly string[]
  readonly cwd: string
  readonly runner: ProcessRunner
}): Promise<string[] | null> {
  const res = await exec(["git", ...opts.args], { cwd: opts.cwd, runner: opts.runner })
  return res.exitCode === 0 ? splitLines(res.stdout) : null
}

export async function resolveCurrentBranch(opts: {
  readonly cwd: string
  readonly runner: ProcessRunner
}): Promise<string> {
  const lines = await gitStdout({ args: ["branch", "--show-current"], ...opts })
  if (lines === null) {
    throw new Error("Could not determine current branch. Are you in a git repository?")
  }
  const branch = lines.join("").trim()
  if (branch.length === 0) throw new Error("Not on a branch (detached HEAD)")
  return branch
}

/**
 * Ask origin for its HEAD, then the local origin/HEAD ref, then `git remote show origin`.
 */
export async function resolveDefaultBranch(opts: {
  readonly cwd: string
  readonly runner: ProcessRunner
}): Promise<string> {
  const lsRemote = await gitStdout({ args: ["ls-remote", "--symref", "origin", "HEAD"], ...opts })
  const fromLsRemote = lsRemote ? parseLsRemoteHead(lsRemote) : null
  if (fromLsRemote) return fromLsRemote

  const symbolic = await gitStdout({ args: ["symbolic-ref", "refs/remotes/origin/HEAD"], ...opts })
  const fromSymbolic = symbolic ? parseOriginHeadRef(symbolic) : null
  if (fromSymbolic) return fromSymbolic

  const remoteShow = await gitStdout({ args: ["remote", "show", "origin"], ...opts })
  const fromRemoteShow = remoteShow ? parseRemoteShowHead(remoteShow) : null
  if (fromRemoteShow) return fromRemoteShow

  throw new Error("Could not determine default branch. Are you in a git repository?")
}

export function parseLsRemoteHead(lines: readonly string[]): string | null {
  for (const line of lines) {
    if (!line.startsWith("ref:") || !line.includes("HEAD")) continue
    const ref = line.split(/\s+/)[1] ?? ""
    if (ref.startsWith("refs/heads/")) return ref.slice("refs/heads/".length)
  }
  return null
}

export function parseOriginHeadRef(lines: readonly string[]): string | null {
  const ref = lines.join("").trim()
  const prefix = "refs/remotes/origin/"
  return ref.startsWith(prefix) && ref.length > prefix.length ? ref.slice(prefix.length) : null
}

export function parseRemoteShowHead(lines: readonly string[]): string | null {
  for (const line of lines) {
    const trimmed = line.trim()
    if (!trimmed.startsWith("HEAD branch:")) continue
    const branch = trimmed.slice("HEAD branch:".length).trim()
    return branch.length > 0 ? branch : null
  }
  return null
}
