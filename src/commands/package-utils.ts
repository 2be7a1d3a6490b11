import {
  SpawnFailedError,
  describeStatus,
  exec,
  execOrThrow,
  formatCommand,
  isSuccess,
  runProcess
} from "../lib/shell.ts"
import { readDevwrapConfig } from "../lib/config.ts"
import { splitLines } from "../ui/lines.ts"
import { logger } from "../ui/logger.ts"
import { withSpinner } from "../ui/spinner.ts"

import type { DevwrapConfig } from "../lib/config.ts"
import type { ProcessRunner, ProcessSpec } from "../lib/shell.ts"
import type { ProjectTool, ToolAction } from "../lib/tools.ts"
import type { SpinnerOptions } from "../ui/spinner.ts"

export async function loadConfigOrWarn(): Promise<DevwrapConfig> {
  const { config, parseError } = await readDevwrapConfig()
  if (parseError) logger.warn({ message: parseError })
  return config
}

export interface ToolRunInput {
  readonly tool: ProjectTool
  readonly action: ToolAction
  readonly cwd: string
  readonly dryRun: boolean
  /** Replay the tool's output once the spinner clears. */
  readonly verbose: boolean
  readonly done?: string
  readonly runner?: ProcessRunner
  readonly spinner?: SpinnerOptions
  readonly print?: (text: string) => void
}

/**
 * Run every command of a tool action in order behind one spinner, stopping at the first
 * failure. Dry runs print the commands instead. Resolves to the CLI exit code.
 */
export async function runToolAction(input: ToolRunInput): Promise<number> {
  const specs: ProcessSpec[] = input.tool
    .buildCommands(input.action)
    .map(spec => ({ ...spec, cwd: input.cwd }))
  const print = input.print ?? (text => process.stdout.write(text))

  if (input.dryRun) {
    for (const spec of specs) print(`${formatCommand(spec)}\n`)
    return 0
  }

  const runner = input.runner ?? runProcess
  return await withSpinner(
    input.tool.describe(input.action),
    async session => {
      for (const spec of specs) {
        const stderr: string[] = []
        const outcome = await runner(spec, {
          signal: session.signal,
          onLine: line => {
            if (input.verbose) session.write(line.stream, `${line.text}\n`)
            else if (line.stream === "stderr") stderr.push(line.text)
          }
        })

        if (outcome.status.kind === "cancelled") return 130
        if (!isSuccess(outcome.status)) {
          session.end()
          for (const text of stderr) process.stderr.write(`${text}\n`)
          logger.error({ message: `${formatCommand(spec)} ${describeStatus(outcome.status)}` })
          return 1
        }
      }
      session.end({ done: input.done })
      return 0
    },
    input.spinner
  )
}

/**
 * Ask the tool for the installed version of `pkg`. Unknown when the query fails.
 */
export async function readInstalledVersion(opts: {
  readonly tool: ProjectTool
  readonly pkg: string
  readonly cwd: string
  readonly runner?: ProcessRunner
}): Promise<string | null> {
  const spec = opts.tool.versionCommand(opts.pkg)
  try {
    const res = await exec([spec.program, ...spec.args], {
      cwd: opts.cwd,
      env: spec.env,
      runner: opts.runner
    })
    if (res.exitCode !== 0) return null
    return opts.tool.parseVersion(splitLines(res.stdout), opts.pkg)
  } catch (error: unknown) {
    if (error instanceof SpawnFailedError) return null
    throw error
  }
}

/**
 * Run the tool's list command and return the package names it reports.
 */
export async function listPackages(opts: {
  readonly tool: ProjectTool
  readonly cwd: string
  readonly runner?: ProcessRunner
}): Promise<{ readonly names: string[]; readonly lines: string[] }> {
  const spec = opts.tool.listCommand()
  const res = await execOrThrow([spec.program, ...spec.args], {
    cwd: opts.cwd,
    env: spec.env,
    runner: opts.runner
  })
  const lines = splitLines(res.stdout)
  return { names: opts.tool.parsePackages(lines), lines }
}
