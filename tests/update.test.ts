import { afterEach, beforeEach, expect, test, vi } from "vitest"

import { renderBumpLine, updatePackages } from "../src/commands/update.ts"
import { uvTool } from "../src/lib/tools.ts"
import { ansi } from "../src/ui/terminal.ts"
import { exited, fakeRunner, recordingTerminal } from "./helpers/fake-process.ts"

import type { ProcessSpec } from "../src/lib/shell.ts"
import type { PickRequest, Picker } from "../src/ui/select.ts"
import type { FakeResponse } from "./helpers/fake-process.ts"

const PIP_LIST = [
  "Package        Version",
  "-------------- -------",
  "django         5.0",
  "django-environ 0.11",
  "flask          3.0"
]

function uvProject(versions: Readonly<Record<string, readonly string[]>> = {}) {
  const served = new Map<string, number>()
  return fakeRunner((spec: ProcessSpec): FakeResponse => {
    const [sub, second, pkg] = spec.args
    if (sub === "pip" && second === "list") return { stdout: PIP_LIST }
    if (sub === "pip" && second === "show" && pkg) {
      const seen = served.get(pkg) ?? 0
      served.set(pkg, seen + 1)
      const version = versions[pkg]?.[seen]
      return version ? { stdout: [`Name: ${pkg}`, `Version: ${version}`] } : { status: exited(1) }
    }
    return {}
  })
}

function scriptedPicker(answer: readonly string[]): Picker & { readonly requests: PickRequest[] } {
  const requests: PickRequest[] = []
  return {
    requests,
    async pick(request) {
      requests.push(request)
      return answer
    }
  }
}

const stripAnsi = (text: string) => text.replace(/\x1b\[[0-9;]*m/g, "")

const base = {
  tool: uvTool,
  cwd: "/work",
  dryRun: true,
  autoSelect: false,
  verbose: false,
  interactive: false
}

beforeEach(() => {
  vi.stubEnv("DEVWRAP_LOGGER", "console")
})

afterEach(() => {
  vi.unstubAllEnvs()
  vi.restoreAllMocks()
})

test("no names updates everything", async () => {
  const { runner, calls } = uvProject()
  const printed: string[] = []
  const code = await updatePackages({ ...base, patterns: [], runner, print: t => printed.push(t) })
  expect(code).toBe(0)
  expect(printed).toEqual(["uv lock --upgrade\n", "uv sync --all-extras\n"])
  expect(calls).toEqual([])
})

test("a single match is updated without asking", async () => {
  const { runner, calls } = uvProject()
  const printed: string[] = []
  const code = await updatePackages({
    ...base,
    patterns: ["flask"],
    runner,
    print: t => printed.push(t)
  })
  expect(code).toBe(0)
  expect(printed).toEqual(["uv lock --upgrade-package flask\n", "uv sync --all-extras\n"])
  expect(calls).toEqual([{ program: "uv", args: ["pip", "list"], cwd: "/work", stdin: "ignore" }])
})

test("--yes takes the best match and reports the others", async () => {
  const { runner } = uvProject()
  const printed: string[] = []
  const reported: string[] = []
  await updatePackages({
    ...base,
    patterns: ["dj"],
    autoSelect: true,
    runner,
    print: t => printed.push(t),
    report: t => reported.push(t)
  })
  expect(reported).toEqual([
    "Multiple packages found, selecting first match:\n  django\n  django-environ\nSelected: django\n"
  ])
  expect(printed[0]).toBe("uv lock --upgrade-package django\n")
})

test("--yes with several names takes every match", async () => {
  const { runner } = uvProject()
  const printed: string[] = []
  const reported: string[] = []
  await updatePackages({
    ...base,
    patterns: ["flask", "environ"],
    autoSelect: true,
    runner,
    print: t => printed.push(t),
    report: t => reported.push(t)
  })
  expect(reported).toEqual(["Selecting all 2 matching packages:\n  flask\n  django-environ\n"])
  expect(printed[0]).toBe(
    "uv lock --upgrade-package flask --upgrade-package django-environ\n"
  )
})

test("several names open a multi-select picker", async () => {
  const { runner } = uvProject()
  const picker = scriptedPicker(["flask", "django"])
  const printed: string[] = []
  await updatePackages({
    ...base,
    patterns: ["dj", "fl"],
    interactive: true,
    picker,
    runner,
    print: t => printed.push(t)
  })
  expect(picker.requests).toEqual([
    {
      message: "Select packages to update",
      names: ["django", "django-environ", "flask"],
      multiple: true
    }
  ])
  expect(printed[0]).toBe("uv lock --upgrade-package django --upgrade-package flask\n")
})

test("a cancelled pick updates nothing", async () => {
  vi.spyOn(process.stderr, "write").mockImplementation(() => true)
  const { runner, calls } = uvProject()
  const printed: string[] = []
  const code = await updatePackages({
    ...base,
    patterns: ["dj"],
    interactive: true,
    picker: scriptedPicker([]),
    runner,
    print: t => printed.push(t)
  })
  expect(code).toBe(0)
  expect(printed).toEqual([])
  expect(calls).toHaveLength(1)
  expect(process.stderr.write).not.toHaveBeenCalled()
})

test("a real update reports the version bump", async () => {
  const { runner, calls } = uvProject({ flask: ["2.0.0", "3.0.1"] })
  const terminal = recordingTerminal(false)
  const reported: string[] = []
  const code = await updatePackages({
    ...base,
    dryRun: false,
    patterns: ["flask"],
    runner,
    spinner: { terminal, handleSignals: false },
    report: t => reported.push(t)
  })

  expect(code).toBe(0)
  expect(calls.map(c => c.args.join(" "))).toEqual([
    "pip list",
    "pip show flask",
    "lock --upgrade-package flask",
    "sync --all-extras",
    "pip show flask"
  ])
  expect(terminal.text("stderr")).toBe("✓ Updated flask\n")
  expect(reported.map(stripAnsi)).toEqual(["[update]: flask bumped from v2.0.0 -> v3.0.1\n"])
})

test("a failing tool command stops the update and shows its stderr", async () => {
  const write = vi.spyOn(process.stderr, "write").mockImplementation(() => true)
  const { runner, calls } = fakeRunner(spec => {
    if (spec.args[0] === "pip" && spec.args[1] === "list") return { stdout: PIP_LIST }
    if (spec.args[0] === "lock") return { stderr: ["No solution found"], status: exited(1) }
    return {}
  })
  const code = await updatePackages({
    ...base,
    dryRun: false,
    patterns: ["flask"],
    runner,
    spinner: { terminal: recordingTerminal(false), handleSignals: false }
  })

  expect(code).toBe(1)
  expect(calls.some(c => c.args[0] === "sync")).toBe(false)
  expect(write).toHaveBeenCalledWith("No solution found\n")
  expect(write).toHaveBeenCalledWith(
    "ERROR: uv lock --upgrade-package flask exited with code 1\n"
  )
})

test("renderBumpLine colors the new version by direction", () => {
  expect(renderBumpLine("flask", "2.0", "1.9", true)).toBe(
    `${ansi.green}[update]${ansi.reset}: ${ansi.green}flask${ansi.reset} bumped from ` +
      `${ansi.yellow}v2.0${ansi.reset} -> ${ansi.red}v1.9${ansi.reset}`
  )
  expect(renderBumpLine("flask", null, "1.9", false)).toBe(
    "[update]: flask bumped from ? -> v1.9"
  )
})
