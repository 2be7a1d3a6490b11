import { defineCommand, withHandler } from "../cli/command.ts"
import { optDryRun, optVerbose, optYes } from "../cli/options.ts"
import { candidatesFromNames, matchQueries } from "../lib/match.ts"
import { detectProjectTool, formatVersion, versionChange } from "../lib/tools.ts"
import { isGumAvailable } from "../ui/gum.ts"
import { createPicker, resolveSelection } from "../ui/select.ts"
import { ansi, isInteractiveSession, paint } from "../ui/terminal.ts"
import {
  listPackages,
  loadConfigOrWarn,
  readInstalledVersion,
  runToolAction
} from "./package-utils.ts"

import type { CliContext, CommandArgs } from "../cli/command.ts"
import type { ProcessRunner } from "../lib/shell.ts"
import type { ProjectTool, VersionChange } from "../lib/tools.ts"
import type { Picker } from "../ui/select.ts"
import type { SpinnerOptions } from "../ui/spinner.ts"

const updateOptions = [optDryRun, optYes, optVerbose] as const
const updatePositionals = [
  {
    name: "packages",
    required: false,
    multiple: true,
    description: "Partial package names; each is fuzzy-matched against installed packages"
  }
] as const

type UpdateArgs = CommandArgs<typeof updateOptions, typeof updatePositionals>

const updateSpec = defineCommand({
  name: "update",
  summary: "Update dependencies (all, or the packages matching each name)",
  description:
    "With one name you pick a single package; with several you pick any of the combined matches.",
  group: "Packages",
  options: updateOptions,
  positionals: updatePositionals,
  subcommands: []
} as const)

export const updateCommand = withHandler(updateSpec, handleUpdate)

async function handleUpdate({
  ctx,
  args
}: {
  readonly ctx: CliContext
  readonly args: UpdateArgs
}): Promise<number> {
  const config = await loadConfigOrWarn()
  const tool = await detectProjectTool(ctx.cwd)

  return await updatePackages({
    tool,
    cwd: ctx.cwd,
    patterns: args.positionals.packages,
    dryRun: args.options.dryRun,
    autoSelect: args.options.yes,
    verbose: args.options.verbose,
    interactive: isInteractiveSession(),
    picker: createPicker({ preference: config.picker, gumAvailable: isGumAvailable() }),
    spinner: { intervalMs: config.spinner.intervalMs }
  })
}

export interface UpdatePackagesInput {
  readonly tool: ProjectTool
  readonly cwd: string
  readonly patterns: readonly string[]
  readonly dryRun: boolean
  readonly autoSelect: boolean
  readonly verbose: boolean
  readonly interactive: boolean
  readonly picker?: Picker
  readonly runner?: ProcessRunner
  readonly spinner?: SpinnerOptions
  readonly print?: (text: string) => void
  readonly report?: (text: string) => void
}

export async function updatePackages(input: UpdatePackagesInput): Promise<number> {
  const report = input.report ?? (text => process.stderr.write(text))
  const base = {
    tool: input.tool,
    cwd: input.cwd,
    dryRun: input.dryRun,
    verbose: input.verbose,
    runner: input.runner,
    spinner: input.spinner,
    print: input.print
  }

  if (input.patterns.length === 0) {
    return await runToolAction({
      ...base,
      action: { kind: "update", packages: [] },
      done: "Dependencies updated"
    })
  }

  const { names } = await listPackages({ tool: input.tool, cwd: input.cwd, runner: input.runner })
  const results = matchQueries(input.patterns, candidatesFromNames(names))
  const multiple = input.patterns.length > 1

  if (input.autoSelect && results.length > 1) {
    const first = results[0]?.candidate.name ?? ""
    const listed = results.map(r => `  ${r.candidate.name}\n`).join("")
    report(
      multiple ?
        `Selecting all ${results.length} matching packages:\n${listed}`
      : `Multiple packages found, selecting first match:\n${listed}Selected: ${first}\n`
    )
  }

  const selection = await resolveSelection({
    results,
    query: input.patterns.join(", "),
    autoSelect: input.autoSelect,
    interactive: input.interactive,
    multiple,
    picker: input.picker,
    message: multiple ? "Select packages to update" : "Select a package to update"
  })

  if (selection.length === 0) return 0

  const packages = selection.map(c => c.name)
  if (input.dryRun) {
    return await runToolAction({ ...base, action: { kind: "update", packages } })
  }

  const before = new Map<string, string | null>()
  for (const pkg of packages) {
    before.set(
      pkg,
      await readInstalledVersion({ tool: input.tool, pkg, cwd: input.cwd, runner: input.runner })
    )
  }

  const code = await runToolAction({
    ...base,
    action: { kind: "update", packages },
    done: packages.length === 1 ? `Updated ${packages[0] ?? ""}` : `Updated ${packages.length} packages`
  })
  if (code !== 0) return code

  const color = process.stderr.isTTY === true
  for (const pkg of packages) {
    const after = await readInstalledVersion({
      tool: input.tool,
      pkg,
      cwd: input.cwd,
      runner: input.runner
    })
    report(`${renderBumpLine(pkg, before.get(pkg) ?? null, after, color)}\n`)
  }
  return 0
}

export function renderBumpLine(
  pkg: string,
  before: string | null,
  after: string | null,
  color: boolean
): string {
  const from = formatVersion(before)
  const to = formatVersion(after)
  const change = before !== null && after !== null ? versionChange(before, after) : "unchanged"
  return (
    `${paint("[update]", ansi.green, color)}: ${paint(pkg, ansi.green, color)} bumped from ` +
    `${paint(from, ansi.yellow, color)} -> ${paint(to, changeColor(change), color)}`
  )
}

function changeColor(change: VersionChange): string {
  if (change === "upgraded") return ansi.green
  if (change === "downgraded") return ansi.red
  return ansi.dim
}
