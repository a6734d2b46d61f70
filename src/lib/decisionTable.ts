/**
 * Weighted decision table: criteria with weights, alternatives scored on every
 * criterion. Tables are immutable; derived tables (normalized, re-weighted,
 * imputed) are new instances.
 */

import { sum } from 'simple-statistics'
import { DecisionTableError } from './errors'
import { isMissing } from './missing'

export interface DecisionTableInit {
  criteria: readonly string[]
  weights: readonly number[]
  alternatives: readonly string[]
  /** scores[alternative][criterion]; MISSING for an unmeasured cell */
  scores: readonly (readonly number[])[]
}

export const DEFAULT_MAX_SCORE = 10

function shapeIssues({ criteria, weights, alternatives, scores }: DecisionTableInit): string[] {
  const issues: string[] = []
  if (weights.length !== criteria.length)
    issues.push(`Expected ${criteria.length} weights (one per criterion), got ${weights.length}.`)
  weights.forEach((w, c) => {
    if (!Number.isFinite(w)) issues.push(`Weight of "${criteria[c] ?? c}" must be a finite number, got ${w}.`)
  })
  if (scores.length !== alternatives.length)
    issues.push(`Expected ${alternatives.length} score rows (one per alternative), got ${scores.length}.`)
  scores.forEach((row, i) => {
    if (row.length !== criteria.length)
      issues.push(`Score row ${i} (${alternatives[i] ?? '?'}) has ${row.length} cells, expected ${criteria.length}.`)
  })
  return issues
}

export class DecisionTable {
  readonly criteria: readonly string[]
  readonly weights: readonly number[]
  readonly alternatives: readonly string[]
  readonly scores: readonly (readonly number[])[]

  constructor(init: DecisionTableInit) {
    const issues = shapeIssues(init)
    if (issues.length) throw new DecisionTableError('shape', issues[0], issues)
    this.criteria = Object.freeze([...init.criteria])
    this.weights = Object.freeze([...init.weights])
    this.alternatives = Object.freeze([...init.alternatives])
    this.scores = Object.freeze(init.scores.map((row) => Object.freeze([...row])))
  }

  get criterionCount(): number {
    return this.criteria.length
  }

  get alternativeCount(): number {
    return this.alternatives.length
  }

  private checkAlternative(a: number): void {
    if (!Number.isInteger(a) || a < 0 || a >= this.alternatives.length)
      throw new DecisionTableError('index', `Alternative index ${a} is out of range [0, ${this.alternatives.length}).`)
  }

  private checkCriterion(c: number): void {
    if (!Number.isInteger(c) || c < 0 || c >= this.criteria.length)
      throw new DecisionTableError('index', `Criterion index ${c} is out of range [0, ${this.criteria.length}).`)
  }

  /** weights[c] * scores[a][c]; MISSING if the score is missing. */
  weightedScore(a: number, c: number): number {
    this.checkAlternative(a)
    this.checkCriterion(c)
    return this.weights[c] * this.scores[a][c]
  }

  /** Sum of weighted scores; one missing cell makes the total missing. Overflow gives Infinity, not missing. */
  totalWeightedScore(a: number): number {
    this.checkAlternative(a)
    const row = this.scores[a]
    return this.weights.reduce((total, w, c) => total + w * row[c], 0)
  }

  totals(): number[] {
    return this.alternatives.map((_, a) => this.totalWeightedScore(a))
  }

  /**
   * Index of the alternative with the highest total. Lowest index wins ties;
   * missing totals never win. null when no alternative has a known total.
   */
  bestAlternative(): number | null {
    let best: number | null = null
    let bestTotal = -Infinity
    const totals = this.totals()
    for (let a = 0; a < totals.length; a++) {
      const total = totals[a]
      if (isMissing(total)) continue
      if (best === null || total > bestTotal) {
        best = a
        bestTotal = total
      }
    }
    return best
  }

  /** Weights rescaled to total 100, scores divided by maxScore. Scores above maxScore are not clamped. */
  normalized(maxScore: number = DEFAULT_MAX_SCORE): DecisionTable {
    if (!Number.isFinite(maxScore) || maxScore <= 0)
      throw new DecisionTableError('config', `maxScore must be a finite positive number, got ${maxScore}.`)
    const weightSum = sum([...this.weights])
    if (weightSum === 0 || !Number.isFinite(weightSum))
      throw new DecisionTableError('degenerate_weights', `Cannot normalize weights that sum to ${weightSum}.`)
    return new DecisionTable({
      criteria: this.criteria,
      weights: this.weights.map((w) => (100 * w) / weightSum),
      alternatives: this.alternatives,
      scores: this.scores.map((row) => row.map((x) => x / maxScore)),
    })
  }

  withWeights(weights: readonly number[]): DecisionTable {
    return new DecisionTable({ ...this.toInit(), weights })
  }

  withScores(scores: readonly (readonly number[])[]): DecisionTable {
    return new DecisionTable({ ...this.toInit(), scores })
  }

  /** New table with extra alternatives appended after the existing ones. */
  withAlternatives(alternatives: readonly string[], scores: readonly (readonly number[])[]): DecisionTable {
    return new DecisionTable({
      ...this.toInit(),
      alternatives: [...this.alternatives, ...alternatives],
      scores: [...this.scores, ...scores],
    })
  }

  toInit(): DecisionTableInit {
    return {
      criteria: this.criteria,
      weights: this.weights,
      alternatives: this.alternatives,
      scores: this.scores,
    }
  }
}
