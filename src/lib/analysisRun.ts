/**
 * Full analysis of one decision table: score it, normalize it, sweep the
 * weights, and impute missing scores before re-scoring. Every step is logged.
 */

import { resolveAnalysisConfig, type AnalysisConfigInput } from '../config'
import type { DecisionTable } from './decisionTable'
import { isDecisionTableError } from './errors'
import { imputeWithReport, type ImputationResult } from './imputation'
import { AnalysisLogger } from './logger'
import { hasMissing, isMissing } from './missing'
import { runSensitivityAnalysis, summarizeSensitivity, type SensitivityRecord, type SensitivitySummary } from './sensitivity'

export interface TableScores {
  totals: number[]
  best: number | null
}

export interface AnalysisRun {
  table: DecisionTable
  scores: TableScores
  /** null when the weights sum to zero */
  normalized: DecisionTable | null
  sensitivity: SensitivityRecord[]
  sensitivitySummary: SensitivitySummary
  /** null when no score is missing */
  imputation: ImputationResult | null
  imputedScores: TableScores | null
  log: AnalysisLogger
}

function scoreTable(table: DecisionTable): TableScores {
  return { totals: table.totals(), best: table.bestAlternative() }
}

export function runDecisionAnalysis(
  table: DecisionTable,
  configInput: AnalysisConfigInput = {},
  log?: AnalysisLogger
): AnalysisRun {
  const config = resolveAnalysisConfig(configInput)
  const logger = log ?? new AnalysisLogger(config.logLevel)

  const scores = scoreTable(table)
  logger.info('score', `Scored ${table.alternativeCount} alternatives on ${table.criterionCount} criteria.`, {
    totals: scores.totals,
    best: scores.best,
  })
  const missingTotals = scores.totals.flatMap((t, a) => (isMissing(t) ? [table.alternatives[a]] : []))
  if (missingTotals.length)
    logger.warn('score', `${missingTotals.length} alternative(s) have missing scores and no total.`, {
      alternatives: missingTotals,
    })

  let normalized: DecisionTable | null = null
  try {
    normalized = table.normalized(config.maxScore)
    logger.info('normalize', `Normalized weights to total 100 and divided scores by ${config.maxScore}.`)
  } catch (error) {
    if (!isDecisionTableError(error, 'degenerate_weights')) throw error
    logger.warn('normalize', error.message)
  }

  const sensitivity = runSensitivityAnalysis(table, config.perturbationFactors)
  const sensitivitySummary = summarizeSensitivity(table, sensitivity)
  logger.info('sensitivity', `${sensitivity.length} weight perturbations, ${sensitivitySummary.changes.length} change the best alternative.`)

  let imputation: ImputationResult | null = null
  let imputedScores: TableScores | null = null
  if (table.scores.some(hasMissing)) {
    imputation = imputeWithReport(table, { noCompleteRow: config.noCompleteRow })
    imputedScores = scoreTable(imputation.table)
    for (const row of imputation.rows)
      logger.debug(
        'impute',
        `"${table.alternatives[row.alternativeIndex]}" filled from "${table.alternatives[row.donorIndex]}".`,
        { filled: row.filled }
      )
    for (const row of imputation.unresolved)
      logger.warn('impute', `"${table.alternatives[row.alternativeIndex]}" still has missing scores after imputation.`, {
        stillMissing: row.stillMissing.map((c) => table.criteria[c]),
      })
  }

  return { table, scores, normalized, sensitivity, sensitivitySummary, imputation, imputedScores, log: logger }
}
