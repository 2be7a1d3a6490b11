import { afterEach, expect, test, vi } from "vitest"

import {
  SpinnerActiveError,
  beginSpinner,
  isSpinnerLive,
  runWithSpinner,
  withSpinner
} from "../src/ui/spinner.ts"
import { exited, fakeRunner, recordingTerminal } from "./helpers/fake-process.ts"

import type { ProcessRunner } from "../src/lib/shell.ts"

afterEach(() => {
  vi.useRealTimers()
})

test("animated spinner draws frames and flushes buffered output after clearing", () => {
  vi.useFakeTimers()
  const terminal = recordingTerminal(true)
  const session = beginSpinner("Working", { terminal, intervalMs: 100, env: {}, handleSignals: false })

  expect(session.animated).toBe(true)
  vi.advanceTimersByTime(100)
  session.write("stdout", "out\n")
  expect(terminal.text("stdout")).toBe("")

  session.end({ done: "Done" })

  expect(terminal.writes).toEqual([
    { stream: "stderr", text: "\x1b[?25l" },
    { stream: "stderr", text: "\r\x1b[2K⣾ Working" },
    { stream: "stderr", text: "\r\x1b[2K⣽ Working" },
    { stream: "stderr", text: "\r\x1b[2K\x1b[?25h" },
    { stream: "stdout", text: "out\n" },
    { stream: "stderr", text: "\x1b[32m✓\x1b[0m Done\n" }
  ])
  expect(isSpinnerLive()).toBe(false)
})

test("update redraws the current frame with the new message", () => {
  vi.useFakeTimers()
  const terminal = recordingTerminal(true)
  const session = beginSpinner("Step 1", { terminal, env: {}, handleSignals: false })
  session.update("Step 2")
  expect(session.message()).toBe("Step 2")
  expect(terminal.writes[2]).toEqual({ stream: "stderr", text: "\r\x1b[2K⣾ Step 2" })
  session.end()
})

test("only one spinner may be live at a time", () => {
  const terminal = recordingTerminal(false)
  const first = beginSpinner("Working", { terminal, handleSignals: false })
  try {
    expect(() => beginSpinner("Other", { terminal, handleSignals: false })).toThrow(
      new SpinnerActiveError("Working")
    )
    expect(isSpinnerLive()).toBe(true)
  } finally {
    first.end()
  }
  const second = beginSpinner("Other", { terminal, handleSignals: false })
  second.end()
})

test("without a terminal the spinner passes output straight through", () => {
  const terminal = recordingTerminal(false)
  const session = beginSpinner("Working", { terminal, handleSignals: false })
  expect(session.animated).toBe(false)

  session.write("stderr", "warn\n")
  session.end({ done: "ok" })
  session.end({ done: "again" })

  expect(terminal.writes).toEqual([
    { stream: "stderr", text: "warn\n" },
    { stream: "stderr", text: "✓ ok\n" }
  ])
})

test("NO_SPINNER disables animation on a terminal", () => {
  const terminal = recordingTerminal(true)
  const session = beginSpinner("Working", {
    terminal,
    env: { NO_SPINNER: "1" },
    handleSignals: false
  })
  expect(session.animated).toBe(false)
  session.end()
  expect(terminal.writes).toEqual([])
})

test("suspend clears the line and resume starts drawing again", () => {
  vi.useFakeTimers()
  const terminal = recordingTerminal(true)
  const session = beginSpinner("Working", { terminal, env: {}, handleSignals: false })
  session.write("stdout", "early\n")
  session.suspend()
  session.write("stdout", "direct\n")
  session.resume()
  session.end()

  expect(terminal.writes).toEqual([
    { stream: "stderr", text: "\x1b[?25l" },
    { stream: "stderr", text: "\r\x1b[2K⣾ Working" },
    { stream: "stderr", text: "\r\x1b[2K\x1b[?25h" },
    { stream: "stdout", text: "early\n" },
    { stream: "stdout", text: "direct\n" },
    { stream: "stderr", text: "\x1b[?25l" },
    { stream: "stderr", text: "\r\x1b[2K⣾ Working" },
    { stream: "stderr", text: "\r\x1b[2K\x1b[?25h" }
  ])
})

test("withSpinner ends the session when the work throws", async () => {
  const terminal = recordingTerminal(false)
  await expect(
    withSpinner(
      "Working",
      async () => {
        throw new Error("boom")
      },
      { terminal, handleSignals: false }
    )
  ).rejects.toThrow("boom")
  expect(isSpinnerLive()).toBe(false)
})

test("runWithSpinner echoes output and prints the completion line on success", async () => {
  const terminal = recordingTerminal(false)
  const fake = fakeRunner(() => ({ stdout: ["hello"] }))
  const outcome = await runWithSpinner(
    "Installing...",
    { program: "uv", args: ["sync"] },
    { terminal, handleSignals: false, runner: fake.runner, done: "finished" }
  )

  expect(outcome.status).toEqual({ kind: "exited", code: 0 })
  expect(terminal.writes).toEqual([
    { stream: "stdout", text: "hello\n" },
    { stream: "stderr", text: "✓ finished\n" }
  ])
})

test("runWithSpinner skips the completion line when the command fails", async () => {
  const terminal = recordingTerminal(false)
  const fake = fakeRunner(() => ({ stderr: ["bad"], status: exited(1) }))
  await runWithSpinner(
    "Installing...",
    { program: "uv", args: ["sync"] },
    { terminal, handleSignals: false, runner: fake.runner, done: "finished" }
  )
  expect(terminal.writes).toEqual([{ stream: "stderr", text: "bad\n" }])
})

test("Ctrl+C cancels the command and leaves the cursor visible", async () => {
  const terminal = recordingTerminal(true)
  const runner: ProcessRunner = (_spec, opts) =>
    new Promise(resolve => {
      const finish = () => resolve({ status: { kind: "cancelled" }, lines: [], durationMs: 0 })
      if (opts?.signal?.aborted) finish()
      else opts?.signal?.addEventListener("abort", finish, { once: true })
    })
  const listenersBefore = process.listenerCount("SIGINT")

  const pending = runWithSpinner(
    "Building",
    { program: "docker", args: ["build", "."] },
    { terminal, runner, env: {}, intervalMs: 1_000, done: "Built" }
  )
  process.emit("SIGINT", "SIGINT")
  const outcome = await pending

  expect(outcome.status).toEqual({ kind: "cancelled" })
  expect(terminal.writes).toEqual([
    { stream: "stderr", text: "\x1b[?25l" },
    { stream: "stderr", text: "\r\x1b[2K⣾ Building" },
    { stream: "stderr", text: "\r\x1b[2K\x1b[?25h" }
  ])
  const text = terminal.text("stderr")
  expect(text.slice(text.lastIndexOf("\x1b[?25"))).toBe("\x1b[?25h")
  expect(isSpinnerLive()).toBe(false)
  expect(process.listenerCount("SIGINT")).toBe(listenersBefore)
})
