import type { LoggerMethods } from '@docsense/logger';
import type {
  ExtendedTokenUsage,
  LLMTokenUsageAggregator,
} from '@docsense/shared';
import type { z } from 'zod';

import type { OracleInputs, OracleResponse, TextOracle } from '../oracle';

import { TimeoutError, withTimeout } from '@docsense/shared';

import {
  OracleContractError,
  OracleError,
  OracleTimeoutError,
  OracleUnavailableError,
} from '../oracle';

export const DEFAULT_CALL_TIMEOUT_MS = 30_000;

/**
 * Base options for all oracle-backed components
 */
export interface BaseOracleComponentOptions {
  /**
   * Deadline per oracle call in milliseconds, 0 disables (default: 30000)
   */
  callTimeoutMs?: number;

  /**
   * Abort signal for cancellation support
   */
  abortSignal?: AbortSignal;
}

/**
 * Abstract base class for the analysis stages
 *
 * Provides common functionality:
 * - Consistent logging with component name prefix
 * - Token usage tracking via optional aggregator
 * - Oracle calls under a deadline, with the response checked against the
 *   stage schema
 *
 * Subclasses must implement buildInstruction().
 */
export abstract class BaseOracleComponent {
  protected readonly logger: LoggerMethods;
  protected readonly oracle: TextOracle;
  protected readonly componentName: string;
  protected readonly callTimeoutMs: number;
  protected readonly aggregator?: LLMTokenUsageAggregator;
  protected readonly abortSignal?: AbortSignal;

  /**
   * @param logger - Logger instance for logging
   * @param oracle - Oracle answering this component's calls
   * @param componentName - Name of the component for logging (e.g., "UnitEvaluator")
   * @param options - Optional configuration (callTimeoutMs, abortSignal)
   * @param aggregator - Optional token usage aggregator for tracking oracle calls
   */
  constructor(
    logger: LoggerMethods,
    oracle: TextOracle,
    componentName: string,
    options?: BaseOracleComponentOptions,
    aggregator?: LLMTokenUsageAggregator,
  ) {
    this.logger = logger;
    this.oracle = oracle;
    this.componentName = componentName;
    this.callTimeoutMs = options?.callTimeoutMs ?? DEFAULT_CALL_TIMEOUT_MS;
    this.abortSignal = options?.abortSignal;
    this.aggregator = aggregator;
  }

  /**
   * Log a message with consistent component name prefix
   */
  protected log(
    level: 'debug' | 'info' | 'warn' | 'error',
    message: string,
    ...args: unknown[]
  ): void {
    const formattedMessage = `[${this.componentName}] ${message}`;
    this.logger[level](formattedMessage, ...args);
  }

  /**
   * Track token usage to aggregator if available
   */
  protected trackUsage(usage: ExtendedTokenUsage): void {
    if (this.aggregator) {
      this.aggregator.track(usage);
    }
  }

  /**
   * Call the oracle with this component's instruction.
   *
   * Caller cancellation is rethrown as is; every other failure surfaces as
   * an OracleError.
   *
   * @throws {OracleTimeoutError} When the call exceeds callTimeoutMs
   * @throws {OracleUnavailableError} When the oracle fails to answer
   * @throws {OracleContractError} When the answer lacks declared fields
   */
  protected async callOracle<TOutput>(
    schema: z.ZodType<TOutput>,
    inputs: OracleInputs,
    phase: string,
  ): Promise<TOutput> {
    const instruction = this.buildInstruction();
    let response: OracleResponse<TOutput>;

    try {
      response = await withTimeout(
        (signal) =>
          this.oracle.call({
            instruction,
            inputs,
            schema,
            component: this.componentName,
            phase,
            abortSignal: signal,
          }),
        this.callTimeoutMs,
        this.abortSignal,
      );
    } catch (error) {
      if (this.abortSignal?.aborted) {
        throw error;
      }
      if (error instanceof TimeoutError) {
        throw new OracleTimeoutError(
          `[${this.componentName}] ${phase} call timed out after ${error.timeoutMs}ms`,
          error.timeoutMs,
          { cause: error },
        );
      }
      if (error instanceof OracleError) {
        throw error;
      }
      throw OracleUnavailableError.fromError(
        `[${this.componentName}] ${phase} call failed`,
        error,
      );
    }

    if (response.usage) {
      this.trackUsage(response.usage);
    }

    const parsed = schema.safeParse(response.output);
    if (!parsed.success) {
      throw new OracleContractError(
        `[${this.componentName}] ${phase} response is missing declared fields`,
        parsed.error.issues.map(
          (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
        ),
      );
    }
    return parsed.data;
  }

  /**
   * Natural-language instruction sent with every call of this component
   */
  protected abstract buildInstruction(): string;
}
