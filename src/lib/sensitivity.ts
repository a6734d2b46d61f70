/**
 * Weight sensitivity: scale one criterion weight at a time and see which
 * alternative comes out best.
 */

import type { DecisionTable } from './decisionTable'

export const DEFAULT_PERTURBATION_FACTORS: readonly number[] = [0.9, 1.1]

export interface SensitivityRecord {
  criterion: string
  criterionIndex: number
  factor: number
  /** Weight of the criterion after scaling */
  weight: number
  /** 0-based index of the best alternative, null if no alternative has a known total */
  bestAlternative: number | null
  /** 1-based position for display */
  bestRank: number | null
  bestName: string | null
}

export interface SensitivitySummary {
  baseline: number | null
  /** Records whose best alternative differs from the baseline */
  changes: SensitivityRecord[]
  stable: boolean
}

export function runSensitivityAnalysis(
  table: DecisionTable,
  factors: readonly number[] = DEFAULT_PERTURBATION_FACTORS
): SensitivityRecord[] {
  const records: SensitivityRecord[] = []
  table.criteria.forEach((criterion, criterionIndex) => {
    for (const factor of factors) {
      const weights = [...table.weights]
      weights[criterionIndex] *= factor
      const best = table.withWeights(weights).bestAlternative()
      records.push({
        criterion,
        criterionIndex,
        factor,
        weight: weights[criterionIndex],
        bestAlternative: best,
        bestRank: best === null ? null : best + 1,
        bestName: best === null ? null : table.alternatives[best],
      })
    }
  })
  return records
}

export function summarizeSensitivity(table: DecisionTable, records: readonly SensitivityRecord[]): SensitivitySummary {
  const baseline = table.bestAlternative()
  const changes = records.filter((r) => r.bestAlternative !== baseline)
  return { baseline, changes, stable: changes.length === 0 }
}
