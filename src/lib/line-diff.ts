export type DiffStatus = "unchanged" | "changed" | "added" | "removed"

export interface DiffLine {
  readonly content: string
  readonly status: DiffStatus
  /** Content at the same position in the previous snapshot, for `changed` lines. */
  readonly previous?: string
}

/**
 * Compare two snapshots line by line at the same index.
 *
 * Lines only in `next` are `added`, lines only in `previous` are `removed`. An inserted
 * line therefore shows every following line as `changed`. With no previous snapshot every
 * line is `unchanged`.
 */
export function diffSnapshots(previous: readonly string[] | null, next: readonly string[]): DiffLine[] {
  if (previous === null) {
    return next.map(content => ({ content, status: "unchanged" }))
  }

  const out: DiffLine[] = []
  const total = Math.max(previous.length, next.length)
  for (let i = 0; i < total; i += 1) {
    const before = previous[i]
    const after = next[i]

    if (after === undefined) {
      if (before !== undefined) out.push({ content: before, status: "removed" })
      continue
    }
    if (before === undefined) {
      out.push({ content: after, status: "added" })
      continue
    }
    out.push(
      before === after ?
        { content: after, status: "unchanged" }
      : { content: after, status: "changed", previous: before }
    )
  }
  return out
}

export interface ChangedSegments {
  readonly head: string
  readonly middle: string
  readonly tail: string
}

/**
 * Split `next` into the prefix and suffix it shares with `previous` and the differing middle.
 */
export function splitChangedSegments(previous: string, next: string): ChangedSegments {
  const a = Array.from(previous)
  const b = Array.from(next)

  let prefix = 0
  while (prefix < a.length && prefix < b.length && a[prefix] === b[prefix]) prefix += 1

  let suffix = 0
  const maxSuffix = Math.min(a.length, b.length) - prefix
  while (suffix < maxSuffix && a[a.length - 1 - suffix] === b[b.length - 1 - suffix]) {
    suffix += 1
  }

  return {
    head: b.slice(0, prefix).join(""),
    middle: b.slice(prefix, b.length - suffix).join(""),
    tail: b.slice(b.length - suffix).join("")
  }
}
