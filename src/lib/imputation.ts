/**
 * Nearest-neighbor imputation of missing scores. A row with missing cells
 * borrows them from the closest complete row; its own known cells are kept.
 */

import { sum } from 'simple-statistics'
import type { DecisionTable } from './decisionTable'
import { DecisionTableError } from './errors'
import { countMissing, hasMissing, isMissing } from './missing'

/** What to do when no other row is complete. */
export type NoCompleteRowPolicy = 'error' | 'least_incomplete'

export interface ImputationOptions {
  noCompleteRow?: NoCompleteRowPolicy
}

export interface ImputedRow {
  alternativeIndex: number
  donorIndex: number
  /** Criterion indexes filled from the donor */
  filled: number[]
  /** Criterion indexes still missing because the donor was missing there too */
  stillMissing: number[]
}

export interface ImputationResult {
  table: DecisionTable
  rows: ImputedRow[]
  /** Rows that are still incomplete after imputation (least_incomplete fallback only) */
  unresolved: ImputedRow[]
}

/**
 * Euclidean distance over the positions known in both rows. Positions missing
 * in either row are skipped, so rows with no jointly known position are at 0.
 */
export function distance(x: readonly number[], y: readonly number[]): number {
  if (x.length !== y.length)
    throw new DecisionTableError('shape', `Cannot compare rows of length ${x.length} and ${y.length}.`)
  const squares: number[] = []
  x.forEach((xx, i) => {
    const yy = y[i]
    if (isMissing(xx) || isMissing(yy)) return
    const d = xx - yy
    squares.push(d * d)
  })
  return Math.sqrt(sum(squares))
}

function nearest(table: DecisionTable, queryIndex: number, candidates: number[]): number {
  const query = table.scores[queryIndex]
  let result = candidates[0]
  let resultDistance = Infinity
  for (const i of candidates) {
    const d = distance(table.scores[i], query)
    if (d < resultDistance) {
      result = i
      resultDistance = d
    }
  }
  return result
}

function checkQuery(table: DecisionTable, queryIndex: number): void {
  if (!Number.isInteger(queryIndex) || queryIndex < 0 || queryIndex >= table.alternativeCount)
    throw new DecisionTableError('index', `Alternative index ${queryIndex} is out of range [0, ${table.alternativeCount}).`)
}

/** Index of the nearest other row with no missing scores; lowest index wins ties. */
export function closestCompleteRow(table: DecisionTable, queryIndex: number): number {
  checkQuery(table, queryIndex)
  const candidates = table.scores
    .map((_, i) => i)
    .filter((i) => i !== queryIndex && !hasMissing(table.scores[i]))
  if (!candidates.length)
    throw new DecisionTableError(
      'no_complete_row',
      `No complete row to impute "${table.alternatives[queryIndex]}" from: every other alternative has missing scores.`
    )
  return nearest(table, queryIndex, candidates)
}

/** Among the other rows with the fewest missing scores, the nearest one. */
export function closestLeastIncompleteRow(table: DecisionTable, queryIndex: number): number {
  checkQuery(table, queryIndex)
  const others = table.scores.map((_, i) => i).filter((i) => i !== queryIndex)
  if (!others.length)
    throw new DecisionTableError('no_complete_row', `"${table.alternatives[queryIndex]}" has no other row to impute from.`)
  const fewest = Math.min(...others.map((i) => countMissing(table.scores[i])))
  return nearest(
    table,
    queryIndex,
    others.filter((i) => countMissing(table.scores[i]) === fewest)
  )
}

function findDonor(table: DecisionTable, queryIndex: number, policy: NoCompleteRowPolicy): number {
  if (policy === 'error') return closestCompleteRow(table, queryIndex)
  const hasComplete = table.scores.some((row, i) => i !== queryIndex && !hasMissing(row))
  return hasComplete ? closestCompleteRow(table, queryIndex) : closestLeastIncompleteRow(table, queryIndex)
}

export function imputeWithReport(table: DecisionTable, options: ImputationOptions = {}): ImputationResult {
  const policy = options.noCompleteRow ?? 'error'
  const rows: ImputedRow[] = []
  const scores = table.scores.map((query, i) => {
    if (!hasMissing(query)) return query
    const donorIndex = findDonor(table, i, policy)
    const synthesized = [...table.scores[donorIndex]]
    const filled: number[] = []
    query.forEach((score, k) => {
      if (!isMissing(score)) synthesized[k] = score
      else if (!isMissing(synthesized[k])) filled.push(k)
    })
    const stillMissing = synthesized.flatMap((v, k) => (isMissing(v) ? [k] : []))
    rows.push({ alternativeIndex: i, donorIndex, filled, stillMissing })
    return synthesized
  })
  return {
    table: table.withScores(scores),
    rows,
    unresolved: rows.filter((r) => r.stillMissing.length > 0),
  }
}

/**
 * New table with every incomplete row filled from its nearest complete neighbor.
 * Throws when a row would stay partly missing; use imputeWithReport to accept that.
 */
export function impute(table: DecisionTable, options: ImputationOptions = {}): DecisionTable {
  const result = imputeWithReport(table, options)
  if (result.unresolved.length) {
    const details = result.unresolved.map(
      (r) =>
        `"${table.alternatives[r.alternativeIndex]}" still missing ${r.stillMissing.map((c) => table.criteria[c]).join(', ')}`
    )
    throw new DecisionTableError(
      'no_complete_row',
      `Imputation left ${details.length} row(s) incomplete: ${details.join('; ')}.`,
      details
    )
  }
  return result.table
}
