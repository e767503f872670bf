import { describe, expect, it } from 'vitest'
import { CandidateSpace, describeShape } from '../explorer.js'
import type { CandidateDimensions } from '../types.js'

const dimensions: CandidateDimensions = {
  endpoints: ['https://a.example.test/draws', 'https://b.example.test/draws'],
  dateKeys: ['openDate', 'drawDate'],
  dateFormats: ['iso', 'roc'],
  pageKeys: ['pageNum'],
  methods: ['GET', 'POST'],
  pageIndexOrigins: [1, 0],
}

describe('CandidateSpace', () => {
  it('has the size of the cartesian product', () => {
    expect(new CandidateSpace(dimensions).size).toBe(32)
  })

  it('varies pageIndexOrigin fastest and endpoint slowest', () => {
    const space = new CandidateSpace(dimensions)

    expect(space.at(0)).toEqual({
      index: 0,
      endpoint: 'https://a.example.test/draws',
      dateKey: 'openDate',
      dateFormat: 'iso',
      pageKey: 'pageNum',
      method: 'GET',
      pageIndexOrigin: 1,
    })
    expect(space.at(1)).toMatchObject({ method: 'GET', pageIndexOrigin: 0 })
    expect(space.at(2)).toMatchObject({ method: 'POST', pageIndexOrigin: 1 })
    expect(space.at(4)).toMatchObject({ dateFormat: 'roc', method: 'GET', pageIndexOrigin: 1 })
    expect(space.at(16)).toMatchObject({
      endpoint: 'https://b.example.test/draws',
      dateKey: 'openDate',
      dateFormat: 'iso',
    })
  })

  it('returns undefined outside the space', () => {
    const space = new CandidateSpace(dimensions)
    expect(space.at(32)).toBeUndefined()
    expect(space.at(-1)).toBeUndefined()
    expect(space.at(1.5)).toBeUndefined()
  })

  it('yields the same order on every iteration', () => {
    const space = new CandidateSpace(dimensions)
    const first = [...space]
    const second = [...space]

    expect(first.map(candidate => candidate.index)).toEqual(Array.from({ length: 32 }, (_, i) => i))
    expect(second).toEqual(first)
  })

  it('lets a consumer stop early', () => {
    const taken: number[] = []
    for (const candidate of new CandidateSpace(dimensions)) {
      taken.push(candidate.index)
      if (taken.length === 3) break
    }
    expect(taken).toEqual([0, 1, 2])
  })

  it('is empty when any dimension list is empty', () => {
    const space = new CandidateSpace({ ...dimensions, dateKeys: [] })
    expect(space.size).toBe(0)
    expect([...space]).toEqual([])
  })
})

describe('describeShape', () => {
  it('summarizes a shape on one line', () => {
    const first = new CandidateSpace(dimensions).at(0)
    expect(first && describeShape(first)).toBe('#0 GET openDate(iso) pageNum@1')
  })
})
