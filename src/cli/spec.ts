import { readFileSync } from "node:fs"

import { z } from "zod"

import { defineCli } from "./command.ts"
import { versionCommand } from "../commands/version.ts"
import { helpCommand } from "../commands/help.ts"
import { updateCommand } from "../commands/update.ts"
import { setupCommand } from "../commands/setup.ts"
import { showCommand } from "../commands/show.ts"
import { watchCommand } from "../commands/watch.ts"
import { trackCommand } from "../commands/track.ts"
import { kmgCommand } from "../commands/kmg.ts"
import { gitCommand } from "../commands/git.ts"
import { dockerCommand } from "../commands/docker.ts"

const PackageJsonSchema = z.object({
  name: z.string(),
  version: z.string()
})

function readPackageVersion(): string {
  const raw: unknown = JSON.parse(
    readFileSync(new URL("../../package.json", import.meta.url), "utf8")
  )
  const parsed = PackageJsonSchema.safeParse(raw)
  return parsed.success ? parsed.data.version : "0.0.0"
}

export const CLI_SPEC = defineCli({
  name: "devwrap",
  version: readPackageVersion(),
  summary: "wrap everyday dev commands with fuzzy selection, spinners, watch and log tailing",
  commands: [
    updateCommand,
    setupCommand,
    showCommand,
    watchCommand,
    gitCommand,
    dockerCommand,
    trackCommand,
    kmgCommand,
    versionCommand,
    helpCommand
  ]
} as const)
