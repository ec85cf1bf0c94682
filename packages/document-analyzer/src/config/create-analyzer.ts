import type { LoggerMethods } from '@docsense/logger';
import type { TokenUsageReport } from '@docsense/model';

import type { AnalysisProfile } from '../profiles';
import type { AnalyzerConfig } from './analyzer-config';

import { Logger } from '@docsense/logger';

import { DocumentAnalyzer } from '../document-analyzer';
import { LanguageModelOracle } from '../oracle';
import { ModelFactory } from './model-factory';

export interface CreateAnalyzerOptions {
  /**
   * Defaults to a console logger at the configured level
   */
  logger?: LoggerMethods;

  /**
   * Defaults to a factory built from the configuration
   */
  modelFactory?: ModelFactory;

  onTokenUsage?: (report: TokenUsageReport) => void;
}

/**
 * Wire configuration, models and oracle into a DocumentAnalyzer
 *
 * @throws {ConfigError} When a configured model id cannot be resolved
 */
export function createAnalyzerFromConfig(
  profile: AnalysisProfile,
  config: AnalyzerConfig,
  options: CreateAnalyzerOptions = {},
): DocumentAnalyzer {
  const logger = options.logger ?? Logger.console(config.logLevel);
  const modelFactory =
    options.modelFactory ??
    new ModelFactory({
      ollamaBaseUrl: config.ollamaBaseUrl,
      apiKeys: config.apiKeys,
    });

  const oracle = new LanguageModelOracle({
    model: modelFactory.create(config.model),
    fallbackModel: config.fallbackModel
      ? modelFactory.create(config.fallbackModel)
      : undefined,
    maxRetries: config.maxRetries,
    temperature: config.temperature,
  });

  logger.info(
    `[DocumentAnalyzer] Using model ${config.model}${config.fallbackModel ? ` (fallback ${config.fallbackModel})` : ''}`,
  );

  return new DocumentAnalyzer({
    logger,
    oracle,
    profile,
    unitConcurrency: config.unitConcurrency,
    callTimeoutMs: config.callTimeoutMs,
    onTokenUsage: options.onTokenUsage,
  });
}
