import type { OutputStream } from "../lib/shell.ts"

function isTruthyEnv(value: string | undefined): boolean {
  const v = (value ?? "").trim().toLowerCase()
  return v === "1" || v === "true" || v === "yes" || v === "on"
}

export function isTty(): boolean {
  return process.stdout.isTTY === true
}

export function isColorEnabled(): boolean {
  if (!isTty()) return false
  return !isTruthyEnv(process.env.DEVWRAP_NO_COLOR)
}

/**
 * True when a human can answer a prompt: both stdin and stdout are terminals.
 */
export function isInteractiveSession(): boolean {
  return process.stdin.isTTY === true && process.stdout.isTTY === true
}

/**
 * NO_SPINNER disables the spinner when set to any non-empty value.
 */
export function isSpinnerDisabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return (env.NO_SPINNER ?? "").length > 0
}

export const ansi = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  greenBackground: "\x1b[42m\x1b[30m",
  hideCursor: "\x1b[?25l",
  showCursor: "\x1b[?25h",
  clearLine: "\r\x1b[2K",
  clearScreen: "\x1b[2J\x1b[H"
} as const

/**
 * Where UI output goes. The process implementation writes to stdout/stderr; tests pass a
 * recording writer.
 */
export interface TerminalWriter {
  /** Whether the stream that carries live UI (stderr) is a terminal. */
  readonly interactive: boolean
  write(stream: OutputStream, text: string): void
}

export const processTerminal: TerminalWriter = {
  get interactive() {
    return process.stderr.isTTY === true
  },
  write(stream, text) {
    if (stream === "stdout") process.stdout.write(text)
    else process.stderr.write(text)
  }
}

export function paint(text: string, code: string, enabled: boolean = isColorEnabled()): string {
  return enabled ? `${code}${text}${ansi.reset}` : text
}
