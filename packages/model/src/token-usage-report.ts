/**
 * Token usage report types
 *
 * Breakdown of oracle token consumption for one analysis run, by component
 * (UnitIdentifier, UnitEvaluator, HolisticAssessor), phase and model type.
 * Oracles that do not report usage contribute nothing.
 */

export interface TokenUsageReport {
  /**
   * Components in the order they first reported usage
   */
  components: ComponentUsageReport[];

  /**
   * Grand total across all components and phases
   */
  total: TokenUsageSummary;
}

export interface ComponentUsageReport {
  component: string;
  phases: PhaseUsageReport[];
  total: TokenUsageSummary;
}

/**
 * Token usage for a single phase of a component
 *
 * Phase names are set by the component performing the call, e.g.
 * 'identification', 'evaluation', 'assessment'.
 */
export interface PhaseUsageReport {
  phase: string;

  /**
   * Present when the primary model answered at least one call
   */
  primary?: ModelUsageDetail;

  /**
   * Present when the fallback model answered at least one call
   */
  fallback?: ModelUsageDetail;

  total: TokenUsageSummary;
}

export interface ModelUsageDetail {
  modelName: string;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export interface TokenUsageSummary {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}
