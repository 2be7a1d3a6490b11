import { expect, test } from "vitest"

import { CLI_SPEC } from "../src/cli/spec.ts"
import {
  CliUsageError,
  collectAllowedOptionNames,
  insertPassthroughTerminator,
  parseCliArgv,
  parseOptionsForCommand,
  parsePositionalsForCommand,
  renderArgsFromPositionals,
  resolveCommand
} from "../src/cli/command.ts"

test("resolveCommand finds nested subcommand and remaining positionals", () => {
  const resolved = resolveCommand(CLI_SPEC, ["git", "sync"])
  expect(resolved.command?.name).toBe("sync")
  expect(resolved.path.map(c => c.name)).toEqual(["git", "sync"])
  expect(resolved.remainingPositionals).toEqual([])

  const update = resolveCommand(CLI_SPEC, ["update", "requests", "httpx"])
  expect(update.command?.name).toBe("update")
  expect(update.remainingPositionals).toEqual(["requests", "httpx"])
})

test("built-in options are always allowed for a command", () => {
  const resolved = resolveCommand(CLI_SPEC, ["git", "sync"])
  const allowed = collectAllowedOptionNames(resolved.command)
  expect(allowed.has("help")).toBe(true)
  expect(allowed.has("version")).toBe(true)
  expect(allowed.has("current")).toBe(true)
  expect(allowed.has("interval")).toBe(false)
})

test("watch keeps the wrapped command's flags out of option parsing", () => {
  expect(insertPassthroughTerminator(CLI_SPEC, ["watch", "-n", "1", "ls", "-la"])).toEqual([
    "watch",
    "-n",
    "1",
    "--",
    "ls",
    "-la"
  ])
  expect(
    insertPassthroughTerminator(CLI_SPEC, ["watch", "--no-diff", "git", "status", "--short"])
  ).toEqual(["watch", "--no-diff", "--", "git", "status", "--short"])
  expect(insertPassthroughTerminator(CLI_SPEC, ["watch", "--interval=2", "--", "df", "-h"])).toEqual(
    ["watch", "--interval=2", "--", "df", "-h"]
  )
})

test("commands without passthrough are left alone", () => {
  expect(insertPassthroughTerminator(CLI_SPEC, ["update", "-y", "req"])).toEqual([
    "update",
    "-y",
    "req"
  ])
})

test("parseCliArgv hands wrapped flags to positionals", () => {
  const parsed = parseCliArgv(CLI_SPEC, ["watch", "-n", "500ms", "ls", "-la"])
  expect(parsed.values).toEqual({ interval: "500ms" })
  expect(parsed.positionals).toEqual(["watch", "ls", "-la"])
})

test("parseCliArgv fills a bare option with its default", () => {
  const parsed = parseCliArgv(CLI_SPEC, ["docker", "build", "--file", "--no-cache"])
  expect(parsed.values["file"]).toBe("Dockerfile")
  expect(parsed.values["no-cache"]).toBe(true)
})

test("parseCliArgv rejects unknown options", () => {
  expect(() => parseCliArgv(CLI_SPEC, ["update", "--bogus"])).toThrow(CliUsageError)
})

test("parsePositionalsForCommand throws on extra and missing args", () => {
  expect(() =>
    parsePositionalsForCommand([{ name: "service", required: false }], ["api", "extra"])
  ).toThrow("Unexpected arguments: extra")
  expect(() => parsePositionalsForCommand([{ name: "name", required: true }], [])).toThrow(
    "Missing required argument: name"
  )
})

test("parseOptionsForCommand converts number options", () => {
  const opts = [
    {
      name: "tail",
      type: "number",
      long: "--tail",
      description: "Tail",
      valueHint: "<n>"
    },
    {
      name: "errOnly",
      type: "boolean",
      long: "--err-only",
      description: "Errors only"
    }
  ] as const

  const parsed = parseOptionsForCommand(opts, { tail: "10", "err-only": true })
  expect(parsed.tail).toBe(10)
  expect(parsed.errOnly).toBe(true)
  expect(parseOptionsForCommand(opts, { tail: "ten" }).tail).toBeUndefined()
})

test("renderArgsFromPositionals marks required and repeated arguments", () => {
  expect(
    renderArgsFromPositionals([
      { name: "command", required: true, multiple: true },
      { name: "extra" }
    ])
  ).toBe("<command...> [extra]")
})
