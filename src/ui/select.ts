import { isCancel, multiselect, select } from "@clack/prompts"

import { gumFilterMany } from "./gum.ts"

import type { Candidate, MatchResult } from "../lib/match.ts"
import type { ProcessRunner } from "../lib/shell.ts"

export class NoMatchError extends Error {
  public readonly query: string

  public constructor(query: string) {
    super(`No matches for ${query}`)
    this.name = "NoMatchError"
    this.query = query
  }
}

export class AmbiguousNonInteractiveError extends Error {
  public readonly query: string
  public readonly candidates: readonly string[]

  public constructor(opts: { readonly query: string; readonly candidates: readonly string[] }) {
    super(`Multiple matches for ${opts.query}; pass a more specific name or run interactively`)
    this.name = "AmbiguousNonInteractiveError"
    this.query = opts.query
    this.candidates = opts.candidates
  }
}

export interface PickRequest {
  readonly message: string
  /** Candidate names, best match first. */
  readonly names: readonly string[]
  readonly multiple: boolean
}

export interface Picker {
  /** Resolves to the chosen names; an empty list means the user cancelled. */
  pick(request: PickRequest): Promise<readonly string[]>
}

export type PickerPreference = "auto" | "gum" | "clack"

export function createGumPicker(opts: { readonly runner?: ProcessRunner } = {}): Picker {
  return {
    async pick({ message, names, multiple }) {
      const res = await gumFilterMany({
        options: names,
        header: message,
        placeholder: "Type to filter...",
        ...(multiple ? { noLimit: true } : { limit: 1 }),
        runner: opts.runner
      })
      if (res.ok) return res.value
      if (res.reason === "cancelled") return []
      throw new Error(
        res.reason === "unavailable" ? "gum is not installed" : `gum filter failed (exit ${res.exitCode})`
      )
    }
  }
}

export const clackPicker: Picker = {
  async pick({ message, names, multiple }) {
    const options = names.map(name => ({ value: name, label: name }))
    if (multiple) {
      const picked = await multiselect({ message, options, required: false })
      return isCancel(picked) ? [] : picked
    }
    const picked = await select({ message, options })
    return isCancel(picked) ? [] : [picked]
  }
}

/**
 * gum's filter when it is installed (or requested), clack's prompts otherwise.
 */
export function createPicker(opts: {
  readonly preference?: PickerPreference
  readonly gumAvailable: boolean
  readonly runner?: ProcessRunner
}): Picker {
  const preference = opts.preference ?? "auto"
  if (preference === "clack") return clackPicker
  if (preference === "gum" || opts.gumAvailable) return createGumPicker({ runner: opts.runner })
  return clackPicker
}

export interface ResolveSelectionInput<Id> {
  readonly results: readonly MatchResult<Id>[]
  readonly query: string
  readonly autoSelect: boolean
  readonly interactive: boolean
  readonly multiple?: boolean
  readonly picker?: Picker
  readonly message?: string
}

/**
 * Turn ranked matches into the candidates to act on.
 *
 * One match is taken as is. With several, `autoSelect` takes the best one (every one in
 * multiple mode), an interactive terminal asks the picker, and anything else is an error.
 * A cancelled pick yields an empty selection.
 */
export async function resolveSelection<Id>(
  input: ResolveSelectionInput<Id>
): Promise<Candidate<Id>[]> {
  const { results } = input
  const first = results[0]
  if (!first) throw new NoMatchError(input.query)
  if (results.length === 1) return [first.candidate]

  if (input.autoSelect) {
    return input.multiple ? results.map(r => r.candidate) : [first.candidate]
  }

  const names = results.map(r => r.candidate.name)
  if (!input.interactive || !input.picker) {
    throw new AmbiguousNonInteractiveError({ query: input.query, candidates: names })
  }

  const picked = await input.picker.pick({
    message: input.message ?? `Select ${input.multiple ? "items" : "one"} matching "${input.query}"`,
    names,
    multiple: input.multiple === true
  })

  const chosen = new Set(picked)
  const selection = results.filter(r => chosen.has(r.candidate.name)).map(r => r.candidate)
  return input.multiple ? selection : selection.slice(0, 1)
}
