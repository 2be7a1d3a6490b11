import { mkdtemp, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"

import { afterEach, beforeEach, expect, test } from "vitest"

import {
  cargoTool,
  compareVersions,
  detectProjectTool,
  detectProjectToolId,
  formatVersion,
  poetryTool,
  uvTool,
  versionChange
} from "../src/lib/tools.ts"

let dir = ""

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "devwrap-tools-"))
})

afterEach(async () => {
  await rm(dir, { recursive: true, force: true })
})

test("uv parses pip list and pip show output", () => {
  expect(
    uvTool.parsePackages([
      "Package    Version",
      "---------- -------",
      "requests   2.31.0",
      "urllib3    2.0.0",
      ""
    ])
  ).toEqual(["requests", "urllib3"])
  expect(
    uvTool.parseVersion(["Name: requests", "Version: 2.31.0", "Location: /tmp"], "requests")
  ).toBe("2.31.0")
  expect(uvTool.parseVersion(["Name: requests"], "requests")).toBeNull()
})

test("uv builds lock and sync commands", () => {
  expect(uvTool.buildCommands({ kind: "update", packages: [] })).toEqual([
    { program: "uv", args: ["lock", "--upgrade"] },
    { program: "uv", args: ["sync", "--all-extras"] }
  ])
  expect(uvTool.buildCommands({ kind: "update", packages: ["a", "b"] })[0]).toEqual({
    program: "uv",
    args: ["lock", "--upgrade-package", "a", "--upgrade-package", "b"]
  })
  expect(uvTool.buildCommands({ kind: "install", frozen: true, noCache: true })).toEqual([
    { program: "uv", args: ["sync", "--all-extras", "--frozen", "--no-cache"] }
  ])
})

test("poetry parses show output", () => {
  expect(
    poetryTool.parsePackages(["black      24.1.0 The uncompromising formatter", "click 8.1.7 CLI"])
  ).toEqual(["black", "click"])
  expect(
    poetryTool.parseVersion([" name         : black", " version      : 24.1.0"], "black")
  ).toBe("24.1.0")
})

test("poetry builds install and update commands", () => {
  expect(poetryTool.buildCommands({ kind: "install", frozen: true, noCache: false })).toEqual([
    { program: "poetry", args: ["install", "--all-extras", "--sync"] }
  ])
  expect(poetryTool.buildCommands({ kind: "update", packages: ["black"] })).toEqual([
    { program: "poetry", args: ["update", "black"] }
  ])
})

test("cargo reads direct dependencies from the tree", () => {
  expect(
    cargoTool.parsePackages(["myapp v0.1.0 (/work/myapp)", "├── anyhow v1.0.80", "└── serde v1.0.197"])
  ).toEqual(["anyhow", "serde"])
  expect(cargoTool.parseVersion(["serde v1.0.197"], "serde")).toBe("1.0.197")
  expect(cargoTool.parseVersion(["serde_json v1.0.1"], "serde")).toBeNull()
})

test("cargo builds build and update commands", () => {
  expect(cargoTool.buildCommands({ kind: "install", frozen: true, noCache: false })).toEqual([
    { program: "cargo", args: ["build", "--frozen"] }
  ])
  expect(cargoTool.buildCommands({ kind: "update", packages: ["serde", "tokio"] })).toEqual([
    { program: "cargo", args: ["update", "-p", "serde", "-p", "tokio"] }
  ])
  expect(cargoTool.describe({ kind: "update", packages: [] })).toBe("Updating with cargo...")
})

test("detectProjectToolId prefers cargo, then uv, then poetry", async () => {
  expect(await detectProjectToolId(dir)).toBeNull()

  await writeFile(join(dir, "pyproject.toml"), "[tool.poetry]\nname = \"demo\"\n")
  expect(await detectProjectToolId(dir)).toBe("poetry")

  await writeFile(join(dir, "uv.lock"), "")
  expect(await detectProjectToolId(dir)).toBe("uv")

  await writeFile(join(dir, "Cargo.toml"), "[package]\nname = \"demo\"\n")
  expect(await detectProjectToolId(dir)).toBe("cargo")
})

test("detectProjectToolId treats a [project] table as uv", async () => {
  await writeFile(join(dir, "pyproject.toml"), "[project]\nname = \"demo\"\n")
  expect(await detectProjectToolId(dir)).toBe("uv")
})

test("detectProjectTool requires a project and the tool on PATH", async () => {
  await expect(detectProjectTool(dir, { which: async () => "/bin/x" })).rejects.toThrow(
    "No uv/poetry/cargo project found"
  )

  await writeFile(join(dir, "uv.lock"), "")
  await expect(detectProjectTool(dir, { which: async () => null })).rejects.toThrow(
    "uv not found on PATH"
  )
  expect((await detectProjectTool(dir, { which: async () => "/usr/bin/uv" })).id).toBe("uv")
})

test("version helpers compare numerically", () => {
  expect(compareVersions("1.2.0", "1.10.0")).toBe(-1)
  expect(compareVersions("v1.0", "1.0")).toBe(0)
  expect(versionChange("2.0.0", "1.9.9")).toBe("downgraded")
  expect(versionChange("1.0", "1.0.1")).toBe("upgraded")
  expect(formatVersion(null)).toBe("?")
  expect(formatVersion("1.0")).toBe("v1.0")
  expect(formatVersion("v2")).toBe("v2")
})
