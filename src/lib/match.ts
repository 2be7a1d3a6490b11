export type MatchTier = "exact" | "prefix" | "substring" | "subsequence"

export interface Candidate<Id = string> {
  readonly name: string
  readonly id: Id
}

export interface MatchResult<Id = string> {
  readonly candidate: Candidate<Id>
  readonly tier: MatchTier
  /** Characters of the name consumed by the match (tightest window for subsequence hits). */
  readonly span: number
  /** Position of the candidate in the input list. */
  readonly index: number
}

const TIER_RANK = {
  exact: 0,
  prefix: 1,
  substring: 2,
  subsequence: 3
} as const satisfies Record<MatchTier, number>

export function candidatesFromNames(names: readonly string[]): Candidate[] {
  return names.map(name => ({ name, id: name }))
}

/**
 * Rank candidates against a partial name.
 *
 * Matching is case-insensitive. Results are ordered by tier
 * (exact, prefix, substring, subsequence), then by span for subsequence hits,
 * then by original position.
 */
export function matchCandidates<Id>(
  query: string,
  candidates: readonly Candidate<Id>[]
): MatchResult<Id>[] {
  const needle = query.trim().toLowerCase()
  if (needle.length === 0) return []

  const out: MatchResult<Id>[] = []
  candidates.forEach((candidate, index) => {
    const hit = matchName(needle, candidate.name.toLowerCase())
    if (hit) out.push({ candidate, index, ...hit })
  })

  return out.sort(compareResults)
}

/**
 * Match several queries and concatenate the results in query order, keeping the first
 * occurrence of each candidate.
 */
export function matchQueries<Id>(
  queries: readonly string[],
  candidates: readonly Candidate<Id>[]
): MatchResult<Id>[] {
  const seen = new Set<number>()
  const out: MatchResult<Id>[] = []
  for (const query of queries) {
    for (const result of matchCandidates(query, candidates)) {
      if (seen.has(result.index)) continue
      seen.add(result.index)
      out.push(result)
    }
  }
  return out
}

function matchName(
  needle: string,
  haystack: string
): { readonly tier: MatchTier; readonly span: number } | null {
  if (haystack === needle) return { tier: "exact", span: needle.length }
  if (haystack.startsWith(needle)) return { tier: "prefix", span: needle.length }
  if (haystack.includes(needle)) return { tier: "substring", span: needle.length }

  const span = subsequenceSpan(needle, haystack)
  return span === null ? null : { tier: "subsequence", span }
}

/**
 * Width of the tightest window of `haystack` containing `needle` as a subsequence.
 *
 * Each pass scans forward to the first window end, then walks backward from that end to
 * find the latest start for it. The next pass resumes just after that start.
 */
export function subsequenceSpan(needle: string, haystack: string): number | null {
  if (needle.length === 0) return 0

  let best: number | null = null
  let from = 0

  while (from < haystack.length) {
    const end = forwardEnd(needle, haystack, from)
    if (end === null) break

    const start = backwardStart(needle, haystack, end)
    const span = end - start + 1
    if (best === null || span < best) best = span

    from = start + 1
  }

  return best
}

function forwardEnd(needle: string, haystack: string, from: number): number | null {
  let n = 0
  for (let h = from; h < haystack.length; h += 1) {
    if (haystack[h] !== needle[n]) continue
    n += 1
    if (n === needle.length) return h
  }
  return null
}

function backwardStart(needle: string, haystack: string, end: number): number {
  let n = needle.length - 1
  let h = end
  while (h >= 0) {
    if (haystack[h] === needle[n]) {
      if (n === 0) return h
      n -= 1
    }
    h -= 1
  }
  return 0
}

function compareResults<Id>(a: MatchResult<Id>, b: MatchResult<Id>): number {
  const tier = TIER_RANK[a.tier] - TIER_RANK[b.tier]
  if (tier !== 0) return tier
  if (a.tier === "subsequence") {
    const span = a.span - b.span
    if (span !== 0) return span
  }
  return a.index - b.index
}
