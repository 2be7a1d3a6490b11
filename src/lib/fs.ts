import { readFile, rm, stat } from "node:fs/promises"

export async function pathExists(absolutePath: string): Promise<boolean> {
  try {
    await stat(absolutePath)
    return true
  } catch {
    return false
  }
}

export async function readTextFile(absolutePath: string): Promise<string | null> {
  try {
    return await readFile(absolutePath, "utf8")
  } catch {
    return null
  }
}

export async function removeDir(absoluteDir: string): Promise<{ readonly removed: boolean }> {
  if (!(await pathExists(absoluteDir))) return { removed: false }
  await rm(absoluteDir, { recursive: true, force: true })
  return { removed: true }
}
