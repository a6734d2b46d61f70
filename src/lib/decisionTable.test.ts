import { describe, it, expect } from 'vitest'
import { DecisionTable, type DecisionTableInit } from './decisionTable'
import { DecisionTableError } from './errors'
import { MISSING, isMissing } from './missing'

function makeTable(overrides: Partial<DecisionTableInit> = {}): DecisionTable {
  return new DecisionTable({
    criteria: ['Safety', 'Cost'],
    weights: [10, 8],
    alternatives: ['A', 'B'],
    scores: [
      [8, 7],
      [9, 3],
    ],
    ...overrides,
  })
}

function errorKind(fn: () => unknown): string | null {
  try {
    fn()
    return null
  } catch (error) {
    return error instanceof DecisionTableError ? error.kind : 'other'
  }
}

describe('DecisionTable', () => {
  describe('scoring', () => {
    it('computes weighted scores and totals', () => {
      const table = makeTable()
      expect(table.weightedScore(1, 1)).toBe(24)
      expect(table.totalWeightedScore(0)).toBe(136)
      expect(table.totalWeightedScore(1)).toBe(114)
      expect(table.totals()).toEqual([136, 114])
      expect(table.bestAlternative()).toBe(0)
    })

    it('propagates a missing score to the weighted score and total', () => {
      const table = makeTable({ scores: [[MISSING, 9], [2, 2]] })
      expect(isMissing(table.weightedScore(0, 0))).toBe(true)
      expect(table.weightedScore(0, 1)).toBe(72)
      expect(isMissing(table.totalWeightedScore(0))).toBe(true)
    })

    it('keeps an overflowing total as Infinity rather than missing', () => {
      const table = makeTable({ weights: [1e308, 1e308], scores: [[1, 1], [1, 0]] })
      expect(table.totalWeightedScore(0)).toBe(Infinity)
      expect(table.totalWeightedScore(1)).toBe(1e308)
      expect(table.bestAlternative()).toBe(0)
    })

    it('breaks ties on the best total by lowest index', () => {
      const weights = [1, 1]
      const alternatives = ['X', 'Y', 'Z']
      expect(makeTable({ weights, alternatives, scores: [[3, 5], [5, 3], [4, 4]] }).bestAlternative()).toBe(0)
      expect(makeTable({ weights, alternatives, scores: [[1, 1], [5, 3], [3, 5]] }).bestAlternative()).toBe(1)
    })

    it('excludes alternatives with a missing total from the best', () => {
      const table = makeTable({ weights: [1, 1], scores: [[MISSING, 9], [2, 2]] })
      expect(table.bestAlternative()).toBe(1)
    })

    it('returns null when no alternative has a known total', () => {
      expect(makeTable({ scores: [[MISSING, 1], [1, MISSING]] }).bestAlternative()).toBeNull()
      expect(makeTable({ alternatives: [], scores: [] }).bestAlternative()).toBeNull()
    })

    it('rejects out-of-range and non-integer indexes', () => {
      const table = makeTable()
      expect(errorKind(() => table.weightedScore(2, 0))).toBe('index')
      expect(errorKind(() => table.weightedScore(0, -1))).toBe('index')
      expect(errorKind(() => table.weightedScore(0.5, 0))).toBe('index')
      expect(errorKind(() => table.totalWeightedScore(5))).toBe('index')
    })
  })

  describe('construction', () => {
    it('fails on a weight count that does not match the criteria', () => {
      expect(errorKind(() => makeTable({ weights: [1, 2, 3] }))).toBe('shape')
    })

    it('fails on a weight that is not finite', () => {
      expect(errorKind(() => makeTable({ weights: [Infinity, 1] }))).toBe('shape')
      expect(errorKind(() => makeTable({ weights: [8, NaN] }))).toBe('shape')
    })

    it('fails on a score row of the wrong length', () => {
      expect(errorKind(() => makeTable({ scores: [[1, 2], [3]] }))).toBe('shape')
    })

    it('fails when score rows and alternatives differ in number', () => {
      expect(errorKind(() => makeTable({ scores: [[1, 2]] }))).toBe('shape')
    })

    it('lists every shape issue in the error details', () => {
      try {
        makeTable({ weights: [1], scores: [[1], [2, 3]] })
        expect.unreachable()
      } catch (error) {
        expect(error).toBeInstanceOf(DecisionTableError)
        if (error instanceof DecisionTableError) expect(error.details).toHaveLength(2)
      }
    })

    it('does not share arrays with its input', () => {
      const weights = [10, 8]
      const row = [8, 7]
      const table = makeTable({ weights, scores: [row, [9, 3]] })
      weights[0] = 0
      row[0] = 0
      expect(table.weights).toEqual([10, 8])
      expect(table.scores[0]).toEqual([8, 7])
      expect(Object.isFrozen(table.scores[0])).toBe(true)
    })

    it('appends alternatives into a new table', () => {
      const table = makeTable()
      const extended = table.withAlternatives(['C'], [[MISSING, 4]])
      expect(extended.alternatives).toEqual(['A', 'B', 'C'])
      expect(extended.scores[2]).toEqual([MISSING, 4])
      expect(table.alternativeCount).toBe(2)
    })
  })

  describe('normalized', () => {
    it('scales weights to total 100', () => {
      const normalized = makeTable().normalized()
      expect(normalized.weights[0] + normalized.weights[1]).toBeCloseTo(100, 10)
      expect(normalized.weights[0]).toBeCloseTo(1000 / 18, 10)
    })

    it('divides scores by the maximum score', () => {
      const table = makeTable({ scores: [[8, 7], [12, MISSING]] })
      const normalized = table.normalized()
      expect(normalized.scores[0][1]).toBe(7 / 10)
      expect(normalized.scores[1][0]).toBe(1.2)
      expect(isMissing(normalized.scores[1][1])).toBe(true)
      expect(table.normalized(5).scores[0][0]).toBe(8 / 5)
    })

    it('keeps names and leaves the source table unchanged', () => {
      const table = makeTable()
      const normalized = table.normalized()
      expect(normalized).not.toBe(table)
      expect(normalized.criteria).toEqual(['Safety', 'Cost'])
      expect(normalized.alternatives).toEqual(['A', 'B'])
      expect(table.weights).toEqual([10, 8])
      expect(table.scores[0]).toEqual([8, 7])
    })

    it('reports weights that sum to zero', () => {
      expect(errorKind(() => makeTable({ weights: [0, 0] }).normalized())).toBe('degenerate_weights')
      expect(errorKind(() => makeTable({ weights: [2, -2] }).normalized())).toBe('degenerate_weights')
    })

    it('rejects a non-positive maximum score', () => {
      expect(errorKind(() => makeTable().normalized(0))).toBe('config')
    })
  })
})
