import { z } from "zod"

import { resolveConfigPath } from "./config-paths.ts"
import { readTextFile } from "./fs.ts"
import { isRecord } from "./guards.ts"

const WatchConfigSchema = z.object({
  intervalSeconds: z.number().positive().default(2),
  diff: z.boolean().default(true)
})

const SpinnerConfigSchema = z.object({
  intervalMs: z.number().int().positive().default(100)
})

const TrackConfigSchema = z.object({
  tail: z.number().int().nonnegative().default(1000),
  rediscoverSeconds: z.number().positive().default(5)
})

const DevwrapConfigSchema = z.object({
  watch: WatchConfigSchema.default(WatchConfigSchema.parse({})),
  spinner: SpinnerConfigSchema.default(SpinnerConfigSchema.parse({})),
  track: TrackConfigSchema.default(TrackConfigSchema.parse({})),
  picker: z.enum(["auto", "gum", "clack"]).default("auto")
})

export type DevwrapConfig = z.infer<typeof DevwrapConfigSchema>

export type DevwrapConfigResult = {
  readonly config: DevwrapConfig
  readonly path: string
  readonly parseError?: string
}

export function defaultConfig(): DevwrapConfig {
  return DevwrapConfigSchema.parse({})
}

/**
 * Load the user config. A missing file yields defaults; an invalid one yields defaults
 * plus a `parseError` for the caller to report.
 */
export async function readDevwrapConfig(opts: {
  readonly path?: string
} = {}): Promise<DevwrapConfigResult> {
  const path = opts.path ?? resolveConfigPath()
  const text = await readTextFile(path)
  if (text === null) return { config: defaultConfig(), path }

  let parsed: unknown
  try {
    parsed = JSON.parse(text)
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : "Invalid JSON"
    return { config: defaultConfig(), path, parseError: `Config parse error (${path}): ${message}` }
  }

  if (!isRecord(parsed)) {
    return {
      config: defaultConfig(),
      path,
      parseError: `Config parse error (${path}): invalid config shape`
    }
  }

  const result = DevwrapConfigSchema.safeParse(parsed)
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ")
    return { config: defaultConfig(), path, parseError: `Config error (${path}): ${issues}` }
  }

  return { config: result.data, path }
}
