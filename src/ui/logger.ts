import { log as clackLog } from "@clack/prompts"

import { isGumAvailable, tryGumLog } from "./gum.ts"

import type { GumFields } from "./gum.ts"

export type LogLevel = "debug" | "info" | "warn" | "error" | "success" | "step"

export type LogFieldValue = string | number | boolean
export type LogFields = Readonly<Record<string, LogFieldValue>>

export interface LogInput {
  readonly message: string
  readonly fields?: LogFields
}

export interface Logger {
  debug(input: LogInput): void
  info(input: LogInput): void
  warn(input: LogInput): void
  error(input: LogInput): void
  success(input: LogInput): void
  step(input: LogInput): void
}

export type LoggerBackend = "gum" | "clack" | "console"

export function resolveBackend(
  env: NodeJS.ProcessEnv = process.env,
  gumAvailable: () => boolean = isGumAvailable
): LoggerBackend {
  const raw = (env.DEVWRAP_LOGGER ?? "").trim().toLowerCase()
  if (raw === "gum") return "gum"
  if (raw === "clack") return "clack"
  if (raw === "console" || raw === "plain") return "console"
  return gumAvailable() ? "gum" : "clack"
}

/**
 * While set, log lines are handed to this writer instead of a backend. The live spinner
 * uses it so that log output is buffered with the rest of the work's output.
 */
let redirect: ((text: string) => void) | null = null

export function redirectLogs(write: (text: string) => void): () => void {
  const previous = redirect
  redirect = write
  return () => {
    redirect = previous
  }
}

function mergeFields(
  base: LogFields | undefined,
  extra: LogFields | undefined
): LogFields | undefined {
  if (!base && !extra) return undefined
  return { ...(base ?? {}), ...(extra ?? {}) }
}

function toGumLevel(level: LogLevel): "debug" | "info" | "warn" | "error" {
  if (level === "debug") return "debug"
  if (level === "warn") return "warn"
  if (level === "error") return "error"
  return "info"
}

function toGumFields(fields: LogFields | undefined): GumFields | undefined {
  return fields
}

export function formatFieldsInline(fields: LogFields | undefined): string {
  if (!fields) return ""
  const parts: string[] = []
  for (const key of Object.keys(fields).sort()) {
    parts.push(`${key}=${String(fields[key])}`)
  }
  return parts.length > 0 ? ` (${parts.join(", ")})` : ""
}

export function formatPlainLogLine(level: LogLevel, { message, fields }: LogInput): string {
  return `${level.toUpperCase()}: ${message}${formatFieldsInline(fields)}\n`
}

function logWithClack(level: LogLevel, { message, fields }: LogInput): void {
  const suffix = formatFieldsInline(fields)
  const line = `${message}${suffix}`

  if (level === "debug" || level === "info") clackLog.info(line)
  else if (level === "warn") clackLog.warn(line)
  else if (level === "error") clackLog.error(line)
  else if (level === "success") clackLog.success(line)
  else clackLog.step(line)
}

function logWithConsole(level: LogLevel, input: LogInput): void {
  process.stderr.write(formatPlainLogLine(level, input))
}

function logWithGum(level: LogLevel, { message, fields }: LogInput): void {
  const extra =
    level === "success" ? ({ status: "success" } satisfies LogFields)
    : level === "step" ? ({ status: "step" } satisfies LogFields)
    : undefined

  const ok = tryGumLog({
    level: toGumLevel(level),
    message,
    fields: toGumFields(mergeFields(fields, extra))
  })

  if (!ok) {
    logWithClack(level, { message, fields })
  }
}

export const logger: Logger = (() => {
  const emit = (level: LogLevel, input: LogInput) => {
    if (redirect) return redirect(formatPlainLogLine(level, input))
    const backend = resolveBackend()
    if (backend === "gum") return logWithGum(level, input)
    if (backend === "console") return logWithConsole(level, input)
    return logWithClack(level, input)
  }

  return {
    debug: input => emit("debug", input),
    info: input => emit("info", input),
    warn: input => emit("warn", input),
    error: input => emit("error", input),
    success: input => emit("success", input),
    step: input => emit("step", input)
  } satisfies Logger
})()
