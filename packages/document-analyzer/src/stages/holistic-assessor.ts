import type { LoggerMethods } from '@docsense/logger';
import type { HolisticAssessment } from '@docsense/model';
import type { LLMTokenUsageAggregator } from '@docsense/shared';

import type { BaseOracleComponentOptions } from '../core';
import type { TextOracle } from '../oracle';
import type { AnalysisProfile } from '../profiles';

import { z } from 'zod';

import { BaseOracleComponent } from '../core';
import {
  extractList,
  mapQualityToStars,
  parseScore,
} from '../normalizers';

/**
 * HolisticAssessor
 *
 * Synthesis stage: one oracle call over the whole document producing the
 * summary plus every list, narrative, quality and rating field the profile
 * declares.
 */
export class HolisticAssessor extends BaseOracleComponent {
  private readonly profile: AnalysisProfile;

  constructor(
    logger: LoggerMethods,
    oracle: TextOracle,
    profile: AnalysisProfile,
    options?: BaseOracleComponentOptions,
    aggregator?: LLMTokenUsageAggregator,
  ) {
    super(logger, oracle, 'HolisticAssessor', options, aggregator);
    this.profile = profile;
  }

  async assess(document: string): Promise<HolisticAssessment> {
    this.log('info', `Assessing the ${this.profile.documentLabel}...`);

    const output = await this.callOracle(
      this.buildSchema(),
      { document },
      'assessment',
    );
    const { lists, narratives, qualities, rating } = this.profile.holistic;

    return {
      summary: output.summary.trim(),
      labeledLists: Object.fromEntries(
        lists.map((field) => [
          field.key,
          extractList(output[field.key], field.delimiter),
        ]),
      ),
      narratives: Object.fromEntries(
        narratives.map((field) => [field.key, output[field.key].trim()]),
      ),
      qualityRatings: Object.fromEntries(
        qualities.map((field) => [
          field.key,
          mapQualityToStars(output[field.key]),
        ]),
      ),
      rating: rating ? parseScore(output[rating.key], rating.range) : null,
    };
  }

  /**
   * Assessment used when the stage fails: every declared field present and
   * empty
   */
  static emptyAssessment(profile: AnalysisProfile): HolisticAssessment {
    const { lists, narratives } = profile.holistic;
    return {
      summary: '',
      labeledLists: Object.fromEntries(lists.map((field) => [field.key, []])),
      narratives: Object.fromEntries(
        narratives.map((field) => [field.key, '']),
      ),
      qualityRatings: {},
      rating: null,
    };
  }

  protected buildInstruction(): string {
    return this.profile.instructions.holistic;
  }

  private buildSchema(): z.ZodType<Record<string, string>> {
    const { summaryDescription, lists, narratives, qualities, rating } =
      this.profile.holistic;
    const shape: Record<string, z.ZodString> = {
      summary: z.string().describe(summaryDescription),
    };

    for (const field of lists) {
      shape[field.key] = z
        .string()
        .describe(`${field.description}, separated by "${field.delimiter}"`);
    }
    for (const field of narratives) {
      shape[field.key] = z.string().describe(field.description);
    }
    for (const field of qualities) {
      shape[field.key] = z
        .string()
        .describe(`${field.description}: excellent, good, average or poor`);
    }
    if (rating) {
      shape[rating.key] = z
        .string()
        .describe(
          `${rating.description}, a number from ${rating.range.min} to ${rating.range.max}`,
        );
    }

    return z.object(shape);
  }
}
