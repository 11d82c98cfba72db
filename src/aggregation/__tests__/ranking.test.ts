import { describe, it, expect } from 'vitest'
import { rank } from '../ranking.js'

const items = [
  { id: 'a', v: 5 },
  { id: 'b', v: 9 },
  { id: 'c', v: 5 },
  { id: 'd', v: 1 },
]

const ids = (xs: { id: string }[]) => xs.map((x) => x.id)

describe('rank', () => {
  it('orders highest first by default', () => {
    expect(ids(rank(items, (x) => x.v, 4))).toEqual(['b', 'a', 'c', 'd'])
  })

  it('orders lowest first when ascending', () => {
    expect(ids(rank(items, (x) => x.v, 4, 'asc'))).toEqual(['d', 'a', 'c', 'b'])
  })

  it('keeps original order among ties in both directions', () => {
    expect(ids(rank(items, (x) => x.v, 3, 'desc')).slice(1)).toEqual(['a', 'c'])
    expect(ids(rank(items, (x) => x.v, 3, 'asc')).slice(1)).toEqual(['a', 'c'])
  })

  it('returns everything when n exceeds the size', () => {
    expect(rank(items, (x) => x.v, 10)).toHaveLength(4)
  })

  it('returns nothing for zero, negative or non-finite n', () => {
    expect(rank(items, (x) => x.v, 0)).toEqual([])
    expect(rank(items, (x) => x.v, -2)).toEqual([])
    expect(rank(items, (x) => x.v, Number.NaN)).toEqual([])
  })

  it('rounds fractional sizes down', () => {
    expect(ids(rank(items, (x) => x.v, 1.9))).toEqual(['b'])
  })

  it('does not reorder the input', () => {
    rank(items, (x) => x.v, 4)

    expect(ids(items)).toEqual(['a', 'b', 'c', 'd'])
  })
})
