import { afterEach, beforeEach, expect, test, vi } from "vitest"

import {
  buildSyncSteps,
  parseLsRemoteHead,
  parseOriginHeadRef,
  parseRemoteShowHead,
  resolveCurrentBranch,
  resolveDefaultBranch,
  syncBranch
} from "../src/commands/git.ts"
import { exited, fakeRunner } from "./helpers/fake-process.ts"

import type { ProcessSpec } from "../src/lib/shell.ts"
import type { FakeResponse } from "./helpers/fake-process.ts"

const command = (spec: ProcessSpec) => [spec.program, ...spec.args].join(" ")

let stderr: string[] = []

beforeEach(() => {
  vi.stubEnv("DEVWRAP_LOGGER", "console")
  stderr = []
  vi.spyOn(process.stderr, "write").mockImplementation(chunk => {
    stderr.push(String(chunk))
    return true
  })
})

afterEach(() => {
  vi.unstubAllEnvs()
  vi.restoreAllMocks()
})

test("parsers read the default branch from each git source", () => {
  expect(parseLsRemoteHead(["ref: refs/heads/main\tHEAD", "abc123\tHEAD"])).toBe("main")
  expect(parseLsRemoteHead(["abc123\tHEAD"])).toBeNull()
  expect(parseOriginHeadRef(["refs/remotes/origin/develop"])).toBe("develop")
  expect(parseOriginHeadRef(["refs/remotes/origin/"])).toBeNull()
  expect(parseRemoteShowHead(["* remote origin", "  HEAD branch: trunk"])).toBe("trunk")
})

test("buildSyncSteps skips the checkout for the current branch", () => {
  const steps = buildSyncSteps({ branch: "main", current: false, cwd: "/repo" })
  expect(steps.map(s => s.title)).toEqual(["Checking out 'main'", "Pulling origin 'main'", "Fetching all"])
  expect(steps.map(s => command(s.spec))).toEqual([
    "git checkout main",
    "git pull origin main",
    "git fetch --all"
  ])
  expect(
    buildSyncSteps({ branch: "feature/x", current: true, cwd: "/repo" }).map(s => s.title)
  ).toEqual(["Pulling origin 'feature/x'", "Fetching all"])
})

test("resolveDefaultBranch falls back to the local origin/HEAD ref", async () => {
  const { runner, calls } = fakeRunner((spec): FakeResponse => {
    if (spec.args[0] === "ls-remote") return { status: exited(128) }
    if (spec.args[0] === "symbolic-ref") return { stdout: ["refs/remotes/origin/develop"] }
    return { status: exited(1) }
  })
  expect(await resolveDefaultBranch({ cwd: "/repo", runner })).toBe("develop")
  expect(calls.map(command)).toEqual([
    "git ls-remote --symref origin HEAD",
    "git symbolic-ref refs/remotes/origin/HEAD"
  ])
})

test("resolveDefaultBranch fails outside a repository", async () => {
  const { runner } = fakeRunner(() => ({ status: exited(128) }))
  await expect(resolveDefaultBranch({ cwd: "/tmp", runner })).rejects.toThrow(
    "Could not determine default branch. Are you in a git repository?"
  )
})

test("resolveCurrentBranch rejects a detached HEAD", async () => {
  const { runner } = fakeRunner(() => ({ stdout: [""] }))
  await expect(resolveCurrentBranch({ cwd: "/repo", runner })).rejects.toThrow(
    "Not on a branch (detached HEAD)"
  )
})

test("dry run prints each step after resolving the branch", async () => {
  const { runner, calls } = fakeRunner(() => ({ stdout: ["ref: refs/heads/main\tHEAD"] }))
  const printed: string[] = []
  const code = await syncBranch({
    cwd: "/repo",
    current: false,
    dryRun: true,
    runner,
    print: t => printed.push(t)
  })
  expect(code).toBe(0)
  expect(calls).toHaveLength(1)
  expect(printed).toEqual(["git checkout main\n", "git pull origin main\n", "git fetch --all\n"])
  expect(stderr).toEqual([
    "STEP: Checking out 'main'\n",
    "STEP: Pulling origin 'main'\n",
    "STEP: Fetching all\n"
  ])
})

test("sync stops at the first failing step", async () => {
  const { runner, calls } = fakeRunner((spec): FakeResponse => {
    if (spec.args[0] === "branch") return { stdout: ["feature/x"] }
    if (spec.args[0] === "pull") return { status: exited(1) }
    return {}
  })
  const code = await syncBranch({ cwd: "/repo", current: true, dryRun: false, runner })
  expect(code).toBe(1)
  expect(calls.map(command)).toEqual(["git branch --show-current", "git pull origin feature/x"])
  expect(stderr).toEqual([
    "STEP: Pulling origin 'feature/x'\n",
    "ERROR: git pull origin feature/x exited with code 1\n"
  ])
})
