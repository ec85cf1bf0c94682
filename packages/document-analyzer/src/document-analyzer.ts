import type { LoggerMethods } from '@docsense/logger';
import type {
  AnalysisResult,
  AnalysisStageReport,
  AnalysisUnit,
  HolisticAssessment,
  StageStatus,
  TokenUsageReport,
  UnitEvaluation,
} from '@docsense/model';

import type { BaseOracleComponentOptions } from './core';
import type { TextOracle } from './oracle';
import type { AnalysisProfile } from './profiles';

import { ConcurrentPool, LLMTokenUsageAggregator } from '@docsense/shared';

import { DEFAULT_CALL_TIMEOUT_MS } from './core';
import { OracleError } from './oracle';
import { HolisticAssessor, UnitEvaluator, UnitIdentifier } from './stages';
import { deepFreeze } from './utils/deep-freeze';
import { validateDocument } from './validation';

export interface DocumentAnalyzerOptions {
  logger: LoggerMethods;

  /**
   * Oracle answering every stage's calls
   */
  oracle: TextOracle;

  /**
   * Document domain (resume, movie review, ...)
   */
  profile: AnalysisProfile;

  /**
   * Number of units evaluated at the same time (default: 1, sequential)
   */
  unitConcurrency?: number;

  /**
   * Deadline per oracle call in milliseconds, 0 disables (default: 30000)
   */
  callTimeoutMs?: number;

  /**
   * Callback fired after each stage completes.
   * Receives the current cumulative token usage report of the run.
   */
  onTokenUsage?: (report: TokenUsageReport) => void;
}

export interface AnalyzeOptions {
  /**
   * Abort signal for cancellation support.
   * In-flight oracle calls are cancelled and analyze rejects with an AbortError.
   */
  abortSignal?: AbortSignal;
}

type StageOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; error: OracleError };

interface UnitOutcome {
  unit: AnalysisUnit;
  outcome: StageOutcome<UnitEvaluation>;
}

/**
 * Per-run state; analyze() may run concurrently on one analyzer
 */
interface AnalysisRun {
  aggregator: LLMTokenUsageAggregator;
  componentOptions: BaseOracleComponentOptions;
  abortSignal?: AbortSignal;
}

/**
 * DocumentAnalyzer
 *
 * Analyzes a document in three oracle-backed stages:
 * 1. Structure: identify the document's units
 * 2. Evaluation: score each unit against the whole document
 * 3. Holistic: summarize the document and fill the profile's lists,
 *    narratives, quality ratings and rating
 *
 * A failed oracle call only removes that stage's (or unit's) contribution.
 * If every stage fails the result is empty but valid. Results are frozen.
 *
 * @example
 * ```typescript
 * const analyzer = new DocumentAnalyzer({
 *   logger: Logger.console(),
 *   oracle: new LanguageModelOracle({ model }),
 *   profile: resumeProfile,
 * });
 * const result = await analyzer.analyze(resumeText);
 * ```
 */
export class DocumentAnalyzer {
  private readonly logger: LoggerMethods;
  private readonly oracle: TextOracle;
  private readonly profile: AnalysisProfile;
  private readonly unitConcurrency: number;
  private readonly callTimeoutMs: number;
  private readonly onTokenUsage?: (report: TokenUsageReport) => void;

  constructor(options: DocumentAnalyzerOptions) {
    this.logger = options.logger;
    this.oracle = options.oracle;
    this.profile = options.profile;
    this.unitConcurrency = options.unitConcurrency ?? 1;
    this.callTimeoutMs = options.callTimeoutMs ?? DEFAULT_CALL_TIMEOUT_MS;
    this.onTokenUsage = options.onTokenUsage;
  }

  /**
   * Analyze one document.
   *
   * @throws {InputTooShortError} Before any oracle call, when the document is too short
   * @throws {Error} with name 'AbortError' when the caller's signal aborts
   */
  async analyze(
    document: string,
    options: AnalyzeOptions = {},
  ): Promise<AnalysisResult> {
    const { abortSignal } = options;
    const wordCount = validateDocument(document, this.profile.minWords);

    this.logger.info(
      `[DocumentAnalyzer] Starting ${this.profile.documentLabel} analysis (${wordCount} words)...`,
    );
    this.checkAborted(abortSignal);

    const run: AnalysisRun = {
      aggregator: new LLMTokenUsageAggregator(),
      componentOptions: { callTimeoutMs: this.callTimeoutMs, abortSignal },
      abortSignal,
    };

    try {
      return await this.runStages(document, run);
    } catch (error) {
      if (abortSignal?.aborted) {
        this.logger.warn('[DocumentAnalyzer] Analysis was aborted');
        throw this.createAbortError(abortSignal);
      }
      throw error;
    }
  }

  private async runStages(
    document: string,
    run: AnalysisRun,
  ): Promise<AnalysisResult> {
    const startTimeStructure = Date.now();
    const structure = await this.runStage('Structure', () =>
      new UnitIdentifier(
        this.logger,
        this.oracle,
        this.profile,
        run.componentOptions,
        run.aggregator,
      ).identify(document),
    );
    const units = structure.ok ? structure.value : [];
    this.logger.info(
      `[DocumentAnalyzer] Structure stage took ${Date.now() - startTimeStructure}ms`,
    );
    this.emitTokenUsage(run);
    this.checkAborted(run.abortSignal);

    const startTimeEvaluation = Date.now();
    const unitOutcomes = await this.evaluateUnits(document, units, run);
    this.logger.info(
      `[DocumentAnalyzer] Evaluation stage took ${Date.now() - startTimeEvaluation}ms`,
    );
    this.emitTokenUsage(run);
    this.checkAborted(run.abortSignal);

    const startTimeHolistic = Date.now();
    const holistic = await this.runStage('Holistic', () =>
      new HolisticAssessor(
        this.logger,
        this.oracle,
        this.profile,
        run.componentOptions,
        run.aggregator,
      ).assess(document),
    );
    this.logger.info(
      `[DocumentAnalyzer] Holistic stage took ${Date.now() - startTimeHolistic}ms`,
    );
    this.emitTokenUsage(run);

    const evaluations: Record<string, UnitEvaluation> = Object.fromEntries(
      unitOutcomes.flatMap(({ unit, outcome }) =>
        outcome.ok ? [[unit.name, outcome.value] as const] : [],
      ),
    );
    const failedUnits = unitOutcomes
      .filter(({ outcome }) => !outcome.ok)
      .map(({ unit }) => unit.name);

    const stages: AnalysisStageReport = {
      structure: structure.ok ? 'completed' : 'failed',
      evaluation: this.evaluationStatus(units.length, failedUnits.length),
      holistic: holistic.ok ? 'completed' : 'failed',
      failedUnits,
    };

    if (!structure.ok && !holistic.ok) {
      this.logger.error(
        '[DocumentAnalyzer] Every stage failed, returning an empty result',
      );
    }

    run.aggregator.logSummary(this.logger);
    this.logger.info('[DocumentAnalyzer] Document analysis completed');

    const assessment: HolisticAssessment = holistic.ok
      ? holistic.value
      : HolisticAssessor.emptyAssessment(this.profile);

    return deepFreeze({
      profile: this.profile.id,
      units,
      evaluations,
      holistic: assessment,
      stages,
      usage: run.aggregator.getReport(),
    });
  }

  /**
   * Evaluate units through the worker pool. Outcomes are collected per unit
   * and returned in unit order.
   */
  private async evaluateUnits(
    document: string,
    units: AnalysisUnit[],
    run: AnalysisRun,
  ): Promise<UnitOutcome[]> {
    if (units.length === 0) {
      this.logger.info(
        '[DocumentAnalyzer] No units identified, skipping evaluation',
      );
      return [];
    }

    const evaluator = new UnitEvaluator(
      this.logger,
      this.oracle,
      this.profile,
      run.componentOptions,
      run.aggregator,
    );

    return ConcurrentPool.run(
      units,
      this.unitConcurrency,
      async (unit) => ({
        unit,
        outcome: await this.runStage(`Evaluation of "${unit.name}"`, () =>
          evaluator.evaluate(unit, document),
        ),
      }),
      {
        abortSignal: run.abortSignal,
        onItemComplete: (_outcome, index) =>
          this.logger.debug(
            `[DocumentAnalyzer] Evaluated ${index + 1}/${units.length}`,
          ),
      },
    );
  }

  /**
   * Run one stage, turning an oracle failure into a failed outcome.
   * Anything else (cancellation included) propagates.
   */
  private async runStage<T>(
    stage: string,
    task: () => Promise<T>,
  ): Promise<StageOutcome<T>> {
    try {
      return { ok: true, value: await task() };
    } catch (error) {
      if (!(error instanceof OracleError)) {
        throw error;
      }
      this.logger.warn(`[DocumentAnalyzer] ${stage} failed: ${error.message}`);
      return { ok: false, error };
    }
  }

  private evaluationStatus(
    unitCount: number,
    failedCount: number,
  ): StageStatus {
    if (unitCount === 0) {
      return 'skipped';
    }
    if (failedCount === 0) {
      return 'completed';
    }
    return failedCount === unitCount ? 'failed' : 'partial';
  }

  /**
   * Emit current token usage report via callback
   */
  private emitTokenUsage(run: AnalysisRun): void {
    this.onTokenUsage?.(run.aggregator.getReport());
  }

  /**
   * @throws {Error} with name 'AbortError' if aborted
   */
  private checkAborted(abortSignal?: AbortSignal): void {
    if (abortSignal?.aborted) {
      throw this.createAbortError(abortSignal);
    }
  }

  private createAbortError(abortSignal: AbortSignal): Error {
    const error = new Error('Document analysis was aborted', {
      cause: abortSignal.reason,
    });
    error.name = 'AbortError';
    return error;
  }
}
