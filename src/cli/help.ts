import { builtinOptions, renderArgsFromPositionals, resolveCommand } from "./command.ts"

import type { AnyCommandSpec, CliSpec, OptionSpec, PositionalSpec } from "./command.ts"

interface HelpRow {
  readonly left: string
  readonly right: string
}

interface HelpSection {
  readonly title: string
  readonly rows: readonly HelpRow[]
}

/**
 * Help text for the command named by `positionals`, or the root help when they name none.
 */
export function renderHelp(cli: CliSpec, positionals: readonly string[]): string {
  const resolved = resolveCommand(cli, positionals)
  if (!resolved.command) return renderRoot(cli)
  return renderCommand(cli, resolved.command, resolved.path.map(c => c.name))
}

export function printHelpForPath(cli: CliSpec, positionals: readonly string[]): void {
  process.stdout.write(renderHelp(cli, positionals))
}

function renderRoot(cli: CliSpec): string {
  const groups = new Map<string, HelpRow[]>()
  for (const cmd of cli.commands) {
    const rows = groups.get(cmd.group) ?? []
    groups.set(cmd.group, rows)
    if (cmd.expandInRootHelp) {
      rows.push(...cmd.subcommands.map(sub => commandRow([cmd.name, sub.name], sub)))
    } else {
      rows.push(commandRow([cmd.name], cmd))
    }
  }

  const sections: HelpSection[] = [...groups].map(([group, rows]) => ({
    title: group,
    rows
  }))
  sections.push({ title: "Options", rows: builtinOptions().map(optionRow) })

  return [
    `${cli.name} v${cli.version}: ${cli.summary}`,
    "",
    `Usage: ${cli.name} <command> [options]`,
    "",
    ...sections.flatMap(renderSection),
    "Run any command with --help for its options.",
    ""
  ].join("\n")
}

function renderCommand(cli: CliSpec, cmd: AnyCommandSpec, path: readonly string[]): string {
  const usage = [cli.name, ...path]
  if (cmd.subcommands.length > 0) usage.push("<subcommand>")
  usage.push("[options]")
  const args = renderArgsFromPositionals(cmd.positionals)
  if (args) usage.push(args)

  const lines = [`Usage: ${usage.join(" ")}`, "", cmd.summary]
  if (cmd.description) lines.push("", cmd.description)
  lines.push("")

  const sections: HelpSection[] = [
    { title: "Arguments", rows: cmd.positionals.map(positionalRow) },
    {
      title: "Subcommands",
      rows: cmd.subcommands.map(sub => commandRow([sub.name], sub))
    },
    { title: "Options", rows: [...cmd.options, ...builtinOptions()].map(optionRow) }
  ]

  return [...lines, ...sections.flatMap(renderSection)].join("\n")
}

function renderSection(section: HelpSection): string[] {
  if (section.rows.length === 0) return []
  const width = Math.max(...section.rows.map(row => row.left.length))
  const rows = section.rows.map(row =>
    `  ${row.left.padEnd(width + 2)}${row.right}`.trimEnd()
  )
  return [`${section.title}:`, ...rows, ""]
}

function commandRow(path: readonly string[], cmd: AnyCommandSpec): HelpRow {
  const args = renderArgsFromPositionals(cmd.positionals)
  return { left: args ? `${path.join(" ")} ${args}` : path.join(" "), right: cmd.summary }
}

function positionalRow(p: PositionalSpec): HelpRow {
  return { left: p.multiple ? `${p.name}...` : p.name, right: p.description ?? "" }
}

function optionRow(o: OptionSpec): HelpRow {
  const flags = o.short ? `${o.short}, ${o.long}` : o.long
  const hint = o.type === "boolean" ? "" : ` ${o.valueHint ?? "<value>"}`
  const right = o.defaultValue ? `${o.description} (default: ${o.defaultValue})` : o.description
  return { left: `${flags}${hint}`, right }
}
