export type RankDirection = 'desc' | 'asc'

/**
 * Normalizes a requested ranking size. Non-positive or non-finite sizes
 * select nothing; fractional sizes round down.
 */
const rankSize = (n: number): number => (Number.isFinite(n) && n > 0 ? Math.floor(n) : 0)

/**
 * Returns the first `n` items ordered by `score`.
 *
 * Ties keep their original relative order in both directions, so
 * `rank(xs, f, n, 'asc')` is not simply the reverse of the `desc` ranking
 * when scores repeat.
 *
 * @example
 * rank([{ v: 1 }, { v: 3 }, { v: 2 }], (x) => x.v, 2) // => [{ v: 3 }, { v: 2 }]
 */
export const rank = <T>(
  items: readonly T[],
  score: (item: T) => number,
  n: number,
  direction: RankDirection = 'desc'
): T[] => {
  const size = rankSize(n)
  if (size === 0) return []

  const sign = direction === 'desc' ? -1 : 1
  return items
    .map((item, index) => ({ item, index, value: score(item) }))
    .sort((a, b) => sign * (a.value - b.value) || a.index - b.index)
    .slice(0, size)
    .map((entry) => entry.item)
}
