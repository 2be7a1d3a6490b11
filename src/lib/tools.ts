import { resolve } from "node:path"

import { pathExists, readTextFile } from "./fs.ts"
import { findExecutableInPath } from "./shell.ts"

import type { ProcessSpec } from "./shell.ts"

export type ProjectToolId = "uv" | "poetry" | "cargo"

export type ToolAction =
  | { readonly kind: "install"; readonly frozen: boolean; readonly noCache: boolean }
  /** An empty package list updates everything. */
  | { readonly kind: "update"; readonly packages: readonly string[] }

/**
 * What devwrap needs to know about a dependency manager. Everything tool-specific lives
 * behind this interface; commands never branch on `id`.
 */
export interface ProjectTool {
  readonly id: ProjectToolId
  readonly program: string
  /** Build output or virtualenv removed by `setup --rm`. */
  readonly envDir: string
  listCommand(): ProcessSpec
  parsePackages(stdout: readonly string[]): string[]
  versionCommand(pkg: string): ProcessSpec
  parseVersion(stdout: readonly string[], pkg: string): string | null
  buildCommands(action: ToolAction): ProcessSpec[]
  /** Spinner message for an action. */
  describe(action: ToolAction): string
}

export class ProjectToolError extends Error {
  public constructor(message: string) {
    super(message)
    this.name = "ProjectToolError"
  }
}

function stripTreePrefix(line: string): string {
  return line.trim().replace(/^[│├└─\s]+/u, "")
}

function firstToken(line: string): string | null {
  const token = line.trim().split(/\s+/)[0]
  return token && token.length > 0 ? token : null
}

export const uvTool: ProjectTool = {
  id: "uv",
  program: "uv",
  envDir: ".venv",
  listCommand: () => ({ program: "uv", args: ["pip", "list"] }),
  parsePackages: stdout =>
    stdout.slice(2).flatMap(line => {
      const name = firstToken(line)
      return name ? [name] : []
    }),
  versionCommand: pkg => ({ program: "uv", args: ["pip", "show", pkg] }),
  parseVersion: stdout => {
    for (const line of stdout) {
      if (line.startsWith("Version:")) return line.slice("Version:".length).trim() || null
    }
    return null
  },
  buildCommands: action => {
    if (action.kind === "install") {
      return [
        {
          program: "uv",
          args: [
            "sync",
            "--all-extras",
            ...(action.frozen ? ["--frozen"] : []),
            ...(action.noCache ? ["--no-cache"] : [])
          ]
        }
      ]
    }
    const lock =
      action.packages.length === 0 ?
        ["lock", "--upgrade"]
      : ["lock", ...action.packages.flatMap(p => ["--upgrade-package", p])]
    return [
      { program: "uv", args: lock },
      { program: "uv", args: ["sync", "--all-extras"] }
    ]
  },
  describe: action =>
    action.kind === "install" ? "Installing dependencies with uv..." : "Updating with uv..."
}

export const poetryTool: ProjectTool = {
  id: "poetry",
  program: "poetry",
  envDir: ".venv",
  listCommand: () => ({ program: "poetry", args: ["show"] }),
  parsePackages: stdout =>
    stdout.flatMap(line => {
      const named = /^name\s*:\s*(\S+)/.exec(line.trim())
      if (named?.[1]) return [named[1]]
      const name = firstToken(line)
      return name ? [name] : []
    }),
  versionCommand: pkg => ({ program: "poetry", args: ["show", pkg] }),
  parseVersion: stdout => {
    for (const line of stdout) {
      const match = /^\s*version\s*:\s*(\S+)/.exec(line)
      if (match?.[1]) return match[1]
    }
    return null
  },
  buildCommands: action => {
    if (action.kind === "install") {
      return [
        {
          program: "poetry",
          args: [
            "install",
            "--all-extras",
            ...(action.frozen ? ["--sync"] : []),
            ...(action.noCache ? ["--no-cache"] : [])
          ]
        }
      ]
    }
    return [{ program: "poetry", args: ["update", ...action.packages] }]
  },
  describe: action =>
    action.kind === "install" ? "Installing dependencies with poetry..." : "Updating with poetry..."
}

export const cargoTool: ProjectTool = {
  id: "cargo",
  program: "cargo",
  envDir: "target",
  listCommand: () => ({ program: "cargo", args: ["tree", "--depth", "1", "--format", "{p}"] }),
  parsePackages: stdout => {
    const out: string[] = []
    for (const raw of stdout) {
      const line = raw.trim()
      if (line.length === 0) continue
      // Lines without a tree prefix are workspace roots.
      if (!/^[│├└]/u.test(line)) continue
      const name = firstToken(stripTreePrefix(line))
      if (name) out.push(name)
    }
    return out
  },
  versionCommand: pkg => ({ program: "cargo", args: ["tree", "-p", pkg, "--depth", "0"] }),
  parseVersion: (stdout, pkg) => {
    for (const raw of stdout) {
      const line = stripTreePrefix(raw)
      if (!line.startsWith(`${pkg} `)) continue
      const rest = line.slice(pkg.length).trim()
      const version = rest.startsWith("v") ? rest.slice(1) : rest
      const token = firstToken(version)
      if (token && /^\d/.test(token)) return token
    }
    return null
  },
  buildCommands: action => {
    if (action.kind === "install") {
      return [{ program: "cargo", args: ["build", ...(action.frozen ? ["--frozen"] : [])] }]
    }
    return [{ program: "cargo", args: ["update", ...action.packages.flatMap(p => ["-p", p])] }]
  },
  describe: action => (action.kind === "install" ? "Building with cargo..." : "Updating with cargo...")
}

export const PROJECT_TOOLS = [cargoTool, uvTool, poetryTool] as const satisfies readonly ProjectTool[]

/**
 * Work out which tool manages the project in `cwd`.
 *
 * Cargo.toml wins, then uv (uv.lock or a `[project]` table), then poetry (poetry.lock or
 * `[tool.poetry]`). Returns null when nothing matches.
 */
export async function detectProjectToolId(cwd: string): Promise<ProjectToolId | null> {
  if (await pathExists(resolve(cwd, "Cargo.toml"))) return "cargo"

  const pyproject = (await readTextFile(resolve(cwd, "pyproject.toml"))) ?? ""
  if ((await pathExists(resolve(cwd, "uv.lock"))) || pyproject.includes("[project]")) return "uv"
  if ((await pathExists(resolve(cwd, "poetry.lock"))) || pyproject.includes("[tool.poetry]")) {
    return "poetry"
  }
  return null
}

export async function detectProjectTool(
  cwd: string,
  opts: { readonly which?: (name: string) => Promise<string | null> } = {}
): Promise<ProjectTool> {
  const id = await detectProjectToolId(cwd)
  if (!id) throw new ProjectToolError("No uv/poetry/cargo project found")

  const tool = PROJECT_TOOLS.find(t => t.id === id)
  if (!tool) throw new ProjectToolError(`Unsupported project tool: ${id}`)

  const which = opts.which ?? findExecutableInPath
  if (!(await which(tool.program))) {
    throw new ProjectToolError(`${tool.program} not found on PATH`)
  }
  return tool
}

export type VersionChange = "upgraded" | "unchanged" | "downgraded"

export function compareVersions(a: string, b: string): number {
  const parts = (v: string) =>
    v
      .replace(/^v/, "")
      .split(".")
      .map(s => Number.parseInt(s.split("-")[0] ?? "", 10))
      .filter(n => Number.isFinite(n))
  const pa = parts(a)
  const pb = parts(b)
  for (let i = 0; i < Math.min(pa.length, pb.length); i += 1) {
    const diff = (pa[i] ?? 0) - (pb[i] ?? 0)
    if (diff !== 0) return Math.sign(diff)
  }
  return Math.sign(pa.length - pb.length)
}

export function versionChange(before: string, after: string): VersionChange {
  const cmp = compareVersions(before, after)
  return cmp < 0 ? "upgraded" : cmp === 0 ? "unchanged" : "downgraded"
}

export function formatVersion(v: string | null): string {
  if (v === null) return "?"
  return v.startsWith("v") ? v : `v${v}`
}
