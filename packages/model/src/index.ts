/**
 * @docsense/model
 *
 * Presentation-agnostic result types for hierarchical document analysis.
 *
 * @packageDocumentation
 */

export type {
  AnalysisResult,
  AnalysisStageReport,
  AnalysisUnit,
  HolisticAssessment,
  ScoreSource,
  ScoredValue,
  StageStatus,
  UnitEvaluation,
} from './analysis-result';
export { QualityBand, QUALITY_BAND_STARS, toStarRating } from './quality-band';
export type {
  ComponentUsageReport,
  ModelUsageDetail,
  PhaseUsageReport,
  TokenUsageReport,
  TokenUsageSummary,
} from './token-usage-report';
