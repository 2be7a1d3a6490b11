import { homedir } from "node:os"
import { resolve } from "node:path"

import { CONFIG_DIR_NAME, CONFIG_FILENAME } from "../constants.ts"

/**
 * Resolve the devwrap.config.json path (override with DEVWRAP_CONFIG_PATH).
 */
export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const override = (env.DEVWRAP_CONFIG_PATH ?? "").trim()
  if (override.length > 0) return override
  return resolve(homedir(), CONFIG_DIR_NAME, CONFIG_FILENAME)
}
