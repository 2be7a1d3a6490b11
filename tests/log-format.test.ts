import { expect, test } from "vitest"

import { TRACK_HEADER_RULE } from "../src/constants.ts"
import { SpawnFailedError } from "../src/lib/shell.ts"
import {
  createTrackPrinter,
  formatTrackedLine,
  renderNoMatchWarning,
  renderSourceHeader,
  sourceColor
} from "../src/ui/log-format.ts"
import { ansi } from "../src/ui/terminal.ts"

test("formatTrackedLine turns kubectl timestamps into a clock prefix", () => {
  expect(formatTrackedLine({ line: "2024-01-01T10:00:00.5Z hello", tty: false })).toBe(
    "[10:00:00.500] hello"
  )
  expect(formatTrackedLine({ line: "2024-01-01T10:00:00Z   indented", tty: false })).toBe(
    "[10:00:00]   indented"
  )
  expect(formatTrackedLine({ line: "no timestamp here", tty: false })).toBe("no timestamp here")
  expect(formatTrackedLine({ line: "2024-01-01T10:00:00Z x", tty: true })).toBe(
    `${ansi.dim}[${ansi.reset}${ansi.dim}10:00:00${ansi.reset}${ansi.dim}]${ansi.reset} x`
  )
})

test("track printer announces each switch between sources", () => {
  const out: string[] = []
  const err: string[] = []
  const print = createTrackPrinter({
    write: text => out.push(text),
    writeError: text => err.push(text),
    tty: false
  })

  print({ kind: "line", source: "prod/a", seq: 1, stream: "stdout", text: "2024-01-01T10:00:00Z one" })
  print({ kind: "line", source: "prod/a", seq: 2, stream: "stdout", text: "two" })
  print({ kind: "line", source: "prod/b", seq: 1, stream: "stderr", text: "three" })
  print({ kind: "exit", source: "prod/b", status: { kind: "exited", code: 0 } })
  print({
    kind: "error",
    source: "prod/c",
    error: new SpawnFailedError({ program: "kubectl", cause: new Error("boom") })
  })

  expect(out).toEqual([
    `\n${TRACK_HEADER_RULE}\n prod/a\n${TRACK_HEADER_RULE}\n`,
    "[10:00:00] one\n",
    "two\n",
    `\n${TRACK_HEADER_RULE}\n prod/b\n${TRACK_HEADER_RULE}\n`,
    "three\n"
  ])
  expect(err).toEqual([
    "[prod/b] exited with code 0\n",
    "\n[error] Failed to follow logs for prod/c: Failed to start kubectl: boom\n\n"
  ])
})

test("colored headers use the source color", () => {
  const style = `${sourceColor(1)}${ansi.bold}`
  expect(renderSourceHeader("ns/pod", sourceColor(1))).toBe(
    `\n${style}${TRACK_HEADER_RULE}${ansi.reset}\n` +
      `${style} ns/pod${ansi.reset}\n` +
      `${style}${TRACK_HEADER_RULE}${ansi.reset}\n`
  )
  expect(sourceColor(8)).toBe(sourceColor(0))
})

test("no-match warning is plain without a terminal", () => {
  expect(renderNoMatchWarning("api", false)).toBe('\nNo pods found matching pattern: "api"\n\n')
})
