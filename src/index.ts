export { DecisionTable, DEFAULT_MAX_SCORE, type DecisionTableInit } from './lib/decisionTable'
export { DecisionTableError, isDecisionTableError, type DecisionTableErrorKind } from './lib/errors'
export { MISSING, isMissing, hasMissing, countMissing, parseScore } from './lib/missing'
export {
  distance,
  closestCompleteRow,
  closestLeastIncompleteRow,
  impute,
  imputeWithReport,
  type ImputationOptions,
  type ImputationResult,
  type ImputedRow,
  type NoCompleteRowPolicy,
} from './lib/imputation'
export {
  runSensitivityAnalysis,
  summarizeSensitivity,
  DEFAULT_PERTURBATION_FACTORS,
  type SensitivityRecord,
  type SensitivitySummary,
} from './lib/sensitivity'
export { runDecisionAnalysis, type AnalysisRun, type TableScores } from './lib/analysisRun'
export { AnalysisLogger, type LogEntry } from './lib/logger'
export { formatDecisionTable, formatAlternativeLegend, formatSensitivityRecords } from './lib/tableReport'
export { parseDecisionTableCSV } from './lib/csvParse'
export { resolveAnalysisConfig, AnalysisConfigSchema, type AnalysisConfig, type AnalysisConfigInput, type LogLevel } from './config'
