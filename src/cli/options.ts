import { defineOption } from "./command.ts"

export const optDryRun = defineOption({
  name: "dryRun",
  type: "boolean",
  long: "--dry-run",
  description: "Print the commands that would run and exit"
} as const)

export const optYes = defineOption({
  name: "yes",
  type: "boolean",
  long: "--yes",
  short: "-y",
  description: "Take the best match instead of prompting"
} as const)

export const optVerbose = defineOption({
  name: "verbose",
  type: "boolean",
  long: "--verbose",
  description: "Print the wrapped command's output once it finishes"
} as const)
