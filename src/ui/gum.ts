import { spawnSync } from "node:child_process"

import { isRecord } from "../lib/guards.ts"
import { runProcess, whichSync } from "../lib/shell.ts"

import type { ProcessRunner } from "../lib/shell.ts"

export type GumLogLevel = "debug" | "info" | "warn" | "error" | "fatal"

export type GumFieldValue = string | number | boolean
export type GumFields = Readonly<Record<string, GumFieldValue>>

export type GumOutcome<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly reason: "unavailable" }
  | { readonly ok: false; readonly reason: "cancelled" }
  | {
      readonly ok: false
      readonly reason: "failed"
      readonly exitCode: number
    }

export interface GumLogInput {
  readonly level: GumLogLevel
  readonly message: string
  readonly fields?: GumFields
}

let gumPathCached: string | null | undefined

export function getGumPath(): string | null {
  if (gumPathCached !== undefined) return gumPathCached
  const overrideRaw = (process.env.DEVWRAP_GUM_PATH ?? "").trim()
  if (overrideRaw.length > 0) {
    gumPathCached = overrideRaw
    return gumPathCached
  }

  gumPathCached = whichSync("gum")
  return gumPathCached
}

export function resetGumPathCacheForTests(): void {
  gumPathCached = undefined
}

export function isGumAvailable(): boolean {
  return getGumPath() !== null
}

export function tryGumLog({ level, message, fields }: GumLogInput): boolean {
  const gum = getGumPath()
  if (!gum) return false

  const kv: string[] = []
  if (fields && isRecord(fields)) {
    for (const key of Object.keys(fields).sort()) {
      const value = fields[key]
      if (value === undefined) continue
      kv.push(key, String(value))
    }
  }

  const cmd = [
    "log",
    "--level",
    level,
    ...(kv.length > 0 ? ["--structured"] : []),
    message,
    ...kv
  ]

  const res = spawnSync(gum, cmd, {
    env: process.env,
    stdio: ["ignore", "inherit", "inherit"]
  })

  return res.error === undefined && res.status === 0
}

export interface GumFilterInput {
  readonly options: readonly string[]
  readonly header?: string
  readonly placeholder?: string
  readonly limit?: number
  readonly noLimit?: boolean
  readonly fuzzy?: boolean
  readonly runner?: ProcessRunner
}

/**
 * Interactive filter over `options`. The list is fed through stdin; gum draws on stderr and
 * prints the chosen lines on stdout.
 */
export async function gumFilterMany(input: GumFilterInput): Promise<GumOutcome<readonly string[]>> {
  const gum = getGumPath()
  if (!gum) return { ok: false, reason: "unavailable" }

  const runner = input.runner ?? runProcess
  const args = [
    "filter",
    ...(input.header ? ["--header", input.header] : []),
    ...(input.placeholder ? ["--placeholder", input.placeholder] : []),
    ...(input.fuzzy === undefined ? []
    : input.fuzzy ? ["--fuzzy"]
    : ["--no-fuzzy"]),
    ...(input.noLimit ? ["--no-limit"] : []),
    ...(input.limit === undefined ? [] : ["--limit", String(input.limit)])
  ]

  const outcome = await runner({
    program: gum,
    args,
    input: `${input.options.join("\n")}\n`,
    stderr: "inherit"
  })

  if (outcome.status.kind === "cancelled") return { ok: false, reason: "cancelled" }
  if (outcome.status.kind === "signalled") return { ok: false, reason: "cancelled" }

  const exitCode = outcome.status.code
  if (exitCode === 0) {
    const value = outcome.lines
      .filter(line => line.stream === "stdout")
      .map(line => line.text)
      .filter(text => text.length > 0)
    return { ok: true, value }
  }
  if (exitCode === 130) return { ok: false, reason: "cancelled" }
  return { ok: false, reason: "failed", exitCode }
}

