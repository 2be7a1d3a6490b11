import { mkdtemp, rm, writeFile } from "node:fs/promises"
import { homedir, tmpdir } from "node:os"
import { join, resolve } from "node:path"

import { afterEach, beforeEach, expect, test } from "vitest"

import { defaultConfig, readDevwrapConfig } from "../src/lib/config.ts"
import { resolveConfigPath } from "../src/lib/config-paths.ts"

let dir = ""
let path = ""

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "devwrap-config-"))
  path = join(dir, "devwrap.config.json")
})

afterEach(async () => {
  await rm(dir, { recursive: true, force: true })
})

test("a missing file yields the defaults", async () => {
  const result = await readDevwrapConfig({ path })
  expect(result).toEqual({ config: defaultConfig(), path })
  expect(result.config).toEqual({
    watch: { intervalSeconds: 2, diff: true },
    spinner: { intervalMs: 100 },
    track: { tail: 1000, rediscoverSeconds: 5 },
    picker: "auto"
  })
})

test("partial files are merged over the defaults", async () => {
  await writeFile(path, JSON.stringify({ watch: { intervalSeconds: 0.5 }, picker: "clack" }))
  const { config, parseError } = await readDevwrapConfig({ path })
  expect(parseError).toBeUndefined()
  expect(config.watch).toEqual({ intervalSeconds: 0.5, diff: true })
  expect(config.picker).toBe("clack")
  expect(config.track.tail).toBe(1000)
})

test("invalid JSON falls back to defaults with an error", async () => {
  await writeFile(path, "{")
  const result = await readDevwrapConfig({ path })
  expect(result.config).toEqual(defaultConfig())
  expect(result.parseError?.startsWith(`Config parse error (${path}): `)).toBe(true)
})

test("a non-object config is rejected", async () => {
  await writeFile(path, "[1, 2]")
  expect((await readDevwrapConfig({ path })).parseError).toBe(
    `Config parse error (${path}): invalid config shape`
  )
})

test("schema violations name the offending field", async () => {
  await writeFile(path, JSON.stringify({ track: { tail: -1 } }))
  const result = await readDevwrapConfig({ path })
  expect(result.config).toEqual(defaultConfig())
  expect(result.parseError).toBe(
    `Config error (${path}): track.tail: Number must be greater than or equal to 0`
  )
})

test("resolveConfigPath honours the override", () => {
  expect(resolveConfigPath({ DEVWRAP_CONFIG_PATH: " /etc/devwrap.json " })).toBe("/etc/devwrap.json")
  expect(resolveConfigPath({})).toBe(resolve(homedir(), ".devwrap", "devwrap.config.json"))
})
