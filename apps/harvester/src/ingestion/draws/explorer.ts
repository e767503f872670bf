/**
 * Parameter Space Explorer
 *
 * Enumerates candidate request shapes as the cartesian product of the
 * configured dimension lists. The space is lazy and restartable: iterating
 * twice yields the same shapes in the same order, and a consumer that stops
 * early never materializes the rest.
 *
 * Order: endpoint varies slowest, then dateKey, dateFormat, pageKey, method,
 * and pageIndexOrigin fastest.
 */

import type { CandidateDimensions, CandidateRequestShape } from './types.js'

export class CandidateSpace implements Iterable<CandidateRequestShape> {
  private readonly dimensions: CandidateDimensions
  private readonly radices: number[]

  constructor(dimensions: CandidateDimensions) {
    this.dimensions = dimensions
    this.radices = [
      dimensions.endpoints.length,
      dimensions.dateKeys.length,
      dimensions.dateFormats.length,
      dimensions.pageKeys.length,
      dimensions.methods.length,
      dimensions.pageIndexOrigins.length,
    ]
  }

  /** Number of shapes; 0 when any dimension list is empty. */
  get size(): number {
    return this.radices.reduce((product, radix) => product * radix, 1)
  }

  /**
   * Shape at a position in the enumeration order, or undefined past the end.
   */
  at(index: number): CandidateRequestShape | undefined {
    if (!Number.isInteger(index) || index < 0 || index >= this.size) {
      return undefined
    }

    const digits = new Array<number>(this.radices.length).fill(0)
    let remainder = index
    for (let position = this.radices.length - 1; position >= 0; position--) {
      const radix = this.radices[position]
      digits[position] = remainder % radix
      remainder = Math.floor(remainder / radix)
    }

    const [endpoint, dateKey, dateFormat, pageKey, method, origin] = digits
    const d = this.dimensions
    return {
      index,
      endpoint: d.endpoints[endpoint],
      dateKey: d.dateKeys[dateKey],
      dateFormat: d.dateFormats[dateFormat],
      pageKey: d.pageKeys[pageKey],
      method: d.methods[method],
      pageIndexOrigin: d.pageIndexOrigins[origin],
    }
  }

  *[Symbol.iterator](): Iterator<CandidateRequestShape> {
    const size = this.size
    for (let index = 0; index < size; index++) {
      const shape = this.at(index)
      if (shape) {
        yield shape
      }
    }
  }
}

export function describeShape(shape: CandidateRequestShape): string {
  return `#${shape.index} ${shape.method} ${shape.dateKey}(${shape.dateFormat}) ${shape.pageKey}@${shape.pageIndexOrigin}`
}
