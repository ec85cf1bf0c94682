import type { LoggerMethods } from '@docsense/logger';
import type { AnalysisUnit } from '@docsense/model';
import type { LLMTokenUsageAggregator } from '@docsense/shared';

import type { BaseOracleComponentOptions } from '../core';
import type { TextOracle } from '../oracle';
import type { AnalysisProfile, UnitNameStyle } from '../profiles';

import { z } from 'zod';

import { BaseOracleComponent } from '../core';
import { extractList, normalizeLabel } from '../normalizers';

/**
 * UnitIdentifier
 *
 * Structure stage: asks the oracle for the document's units (resume
 * sections, movie genres) as one comma-separated string.
 */
export class UnitIdentifier extends BaseOracleComponent {
  private readonly profile: AnalysisProfile;

  constructor(
    logger: LoggerMethods,
    oracle: TextOracle,
    profile: AnalysisProfile,
    options?: BaseOracleComponentOptions,
    aggregator?: LLMTokenUsageAggregator,
  ) {
    super(logger, oracle, 'UnitIdentifier', options, aggregator);
    this.profile = profile;
  }

  /**
   * @returns Distinct units in first-seen order; empty when the oracle
   * named none
   */
  async identify(document: string): Promise<AnalysisUnit[]> {
    this.log('info', `Identifying ${this.profile.unitLabel}s...`);

    const output = await this.callOracle(
      this.buildSchema(),
      { document },
      'identification',
    );
    const units = UnitIdentifier.parseUnitNames(
      output.units,
      this.profile.unitNameStyle,
    ).map((name) => ({ name }));

    this.log(
      'info',
      `Identified ${units.length} ${this.profile.unitLabel}(s): ${units.map((unit) => unit.name).join(', ')}`,
    );
    return units;
  }

  /**
   * Split a comma-separated answer into distinct names.
   *
   * "Skills, Skills, Experience" -> ["Skills", "Experience"]
   */
  static parseUnitNames(text: string, style: UnitNameStyle): string[] {
    const names = extractList(text, ',').map((name) =>
      style === 'title-case' ? normalizeLabel(name) : name,
    );
    return [...new Set(names)];
  }

  protected buildInstruction(): string {
    return this.profile.instructions.identification;
  }

  private buildSchema() {
    return z.object({
      units: z
        .string()
        .describe(
          `Names of the ${this.profile.unitLabel}s of the ${this.profile.documentLabel}, separated by commas`,
        ),
    });
  }
}
