import type { QualityBand } from './quality-band';
import type { TokenUsageReport } from './token-usage-report';

/**
 * A named subdivision of a document (a resume section, a movie genre)
 * discovered by the structure stage.
 */
export interface AnalysisUnit {
  readonly name: string;
}

/**
 * Where a numeric score came from.
 *
 * 'fallback' marks the sentinel used when the oracle text held no number,
 * so it can be told apart from a genuine mid-range score.
 */
export type ScoreSource = 'parsed' | 'fallback';

export interface ScoredValue {
  readonly value: number;
  readonly source: ScoreSource;
}

/**
 * Evaluation of one unit, keyed by the unit name
 */
export interface UnitEvaluation {
  readonly unit: string;
  readonly narrative: string;
  readonly score: number;
  readonly scoreSource: ScoreSource;
}

/**
 * Whole-document synthesis.
 *
 * Every list and narrative declared by the analysis profile is present,
 * empty when the stage failed or the oracle left the field blank.
 */
export interface HolisticAssessment {
  readonly summary: string;
  readonly labeledLists: Readonly<Record<string, readonly string[]>>;
  readonly narratives: Readonly<Record<string, string>>;
  readonly qualityRatings: Readonly<Record<string, QualityBand>>;

  /**
   * Overall rating, only for profiles that declare one
   */
  readonly rating: ScoredValue | null;
}

/**
 * Outcome of a pipeline stage.
 *
 * - completed: every call succeeded
 * - partial: some per-unit calls failed
 * - failed: the stage produced nothing
 * - skipped: there was nothing to do (no units)
 */
export type StageStatus = 'completed' | 'partial' | 'failed' | 'skipped';

export interface AnalysisStageReport {
  readonly structure: StageStatus;
  readonly evaluation: StageStatus;
  readonly holistic: StageStatus;

  /**
   * Units whose evaluation call failed; they stay in `units` but have no
   * entry in `evaluations`
   */
  readonly failedUnits: readonly string[];
}

/**
 * Aggregate root of one analysis run. Frozen once assembled.
 */
export interface AnalysisResult {
  /**
   * Id of the analysis profile that produced this result
   */
  readonly profile: string;
  readonly units: readonly AnalysisUnit[];
  readonly evaluations: Readonly<Record<string, UnitEvaluation>>;
  readonly holistic: HolisticAssessment;
  readonly stages: AnalysisStageReport;
  readonly usage: TokenUsageReport;
}
