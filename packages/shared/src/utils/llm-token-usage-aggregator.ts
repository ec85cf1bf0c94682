import type { LoggerMethods } from '@docsense/logger';
import type {
  ModelUsageDetail,
  PhaseUsageReport,
  TokenUsageReport,
  TokenUsageSummary,
} from '@docsense/model';

import type { ExtendedTokenUsage } from './llm-caller';

/**
 * Token usage totals
 */
export type TokenUsage = TokenUsageSummary;

function formatTokens(usage: TokenUsage): string {
  return `${usage.inputTokens} input, ${usage.outputTokens} output, ${usage.totalTokens} total`;
}

function emptyTotals(): TokenUsage {
  return { inputTokens: 0, outputTokens: 0, totalTokens: 0 };
}

function addTokens(target: TokenUsage, usage: TokenUsage): void {
  target.inputTokens += usage.inputTokens;
  target.outputTokens += usage.outputTokens;
  target.totalTokens += usage.totalTokens;
}

interface PhaseAggregate {
  primary?: ModelUsageDetail;
  fallback?: ModelUsageDetail;
  total: TokenUsage;
}

interface ComponentAggregate {
  component: string;
  phases: Map<string, PhaseAggregate>;
  total: TokenUsage;
}

/**
 * LLMTokenUsageAggregator - Aggregates token usage across all oracle calls
 * of one analysis run.
 *
 * Tracks usage by component (UnitIdentifier, UnitEvaluator, ...), phase and
 * model (primary vs fallback). Safe to feed from concurrent calls: tracking
 * is synchronous.
 *
 * @example
 * ```typescript
 * const aggregator = new LLMTokenUsageAggregator();
 *
 * aggregator.track({
 *   component: 'UnitEvaluator',
 *   phase: 'evaluation',
 *   model: 'primary',
 *   modelName: 'llama3.2:3b',
 *   inputTokens: 900,
 *   outputTokens: 120,
 *   totalTokens: 1020,
 * });
 *
 * aggregator.logSummary(logger);
 * // [DocumentAnalyzer] Token usage summary:
 * // UnitEvaluator:
 * //   - evaluation:
 * //       primary (llama3.2:3b): 900 input, 120 output, 1020 total
 * // ...
 * ```
 */
export class LLMTokenUsageAggregator {
  private readonly usage = new Map<string, ComponentAggregate>();

  track(usage: ExtendedTokenUsage): void {
    let component = this.usage.get(usage.component);
    if (!component) {
      component = {
        component: usage.component,
        phases: new Map(),
        total: emptyTotals(),
      };
      this.usage.set(usage.component, component);
    }

    let phase = component.phases.get(usage.phase);
    if (!phase) {
      phase = { total: emptyTotals() };
      component.phases.set(usage.phase, phase);
    }

    const slot = usage.model === 'primary' ? 'primary' : 'fallback';
    const detail = phase[slot] ?? {
      modelName: usage.modelName,
      ...emptyTotals(),
    };
    addTokens(detail, usage);
    phase[slot] = detail;

    addTokens(phase.total, usage);
    addTokens(component.total, usage);
  }

  /**
   * Structured report, components in first-seen order
   */
  getReport(): TokenUsageReport {
    const components = [...this.usage.values()].map((component) => {
      const phases: PhaseUsageReport[] = [];

      for (const [phaseName, phaseData] of component.phases) {
        const phaseReport: PhaseUsageReport = {
          phase: phaseName,
          total: { ...phaseData.total },
        };
        if (phaseData.primary) phaseReport.primary = { ...phaseData.primary };
        if (phaseData.fallback) {
          phaseReport.fallback = { ...phaseData.fallback };
        }
        phases.push(phaseReport);
      }

      return {
        component: component.component,
        phases,
        total: { ...component.total },
      };
    });

    return { components, total: this.getTotalUsage() };
  }

  getTotalUsage(): TokenUsage {
    const total = emptyTotals();
    for (const component of this.usage.values()) {
      addTokens(total, component.total);
    }
    return total;
  }

  /**
   * Log usage grouped by component, with phase and model breakdown
   *
   * @param logger - Logger instance for output
   * @param label - Prefix of the heading lines
   */
  logSummary(logger: LoggerMethods, label = 'DocumentAnalyzer'): void {
    if (this.usage.size === 0) {
      logger.info(`[${label}] No token usage to report`);
      return;
    }

    logger.info(`[${label}] Token usage summary:`);

    for (const component of this.usage.values()) {
      logger.info(`${component.component}:`);

      for (const [phase, phaseData] of component.phases) {
        logger.info(`  - ${phase}:`);
        if (phaseData.primary) {
          logger.info(
            `      primary (${phaseData.primary.modelName}): ${formatTokens(phaseData.primary)}`,
          );
        }
        if (phaseData.fallback) {
          logger.info(
            `      fallback (${phaseData.fallback.modelName}): ${formatTokens(phaseData.fallback)}`,
          );
        }
      }

      logger.info(
        `  ${component.component} total: ${formatTokens(component.total)}`,
      );
    }

    logger.info(`Grand total: ${formatTokens(this.getTotalUsage())}`);
  }
}
