import type { LoggerMethods } from '@docsense/logger';
import type { AnalysisUnit, UnitEvaluation } from '@docsense/model';
import type { LLMTokenUsageAggregator } from '@docsense/shared';

import type { BaseOracleComponentOptions } from '../core';
import type { TextOracle } from '../oracle';
import type { AnalysisProfile } from '../profiles';

import { z } from 'zod';

import { BaseOracleComponent } from '../core';
import { parseScore } from '../normalizers';

/**
 * UnitEvaluator
 *
 * Per-unit stage: one oracle call per unit, given the unit name and the
 * whole document, returning narrative feedback and a score.
 */
export class UnitEvaluator extends BaseOracleComponent {
  private readonly profile: AnalysisProfile;

  constructor(
    logger: LoggerMethods,
    oracle: TextOracle,
    profile: AnalysisProfile,
    options?: BaseOracleComponentOptions,
    aggregator?: LLMTokenUsageAggregator,
  ) {
    super(logger, oracle, 'UnitEvaluator', options, aggregator);
    this.profile = profile;
  }

  async evaluate(
    unit: AnalysisUnit,
    document: string,
  ): Promise<UnitEvaluation> {
    const output = await this.callOracle(
      this.buildSchema(),
      { unit: unit.name, document },
      'evaluation',
    );
    const score = parseScore(output.score, this.profile.evaluationScoreRange);

    if (score.source === 'fallback') {
      this.log(
        'warn',
        `No score found for "${unit.name}", using fallback ${score.value}`,
      );
    }

    return {
      unit: unit.name,
      narrative: output.analysis.trim(),
      score: score.value,
      scoreSource: score.source,
    };
  }

  protected buildInstruction(): string {
    return this.profile.instructions.evaluation;
  }

  private buildSchema() {
    const { min, max } = this.profile.evaluationScoreRange;
    return z.object({
      analysis: z
        .string()
        .describe(`Feedback on this ${this.profile.unitLabel}`),
      score: z.string().describe(`Score from ${min} to ${max}`),
    });
  }
}
