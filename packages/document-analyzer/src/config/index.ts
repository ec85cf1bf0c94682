export {
  loadAnalyzerConfig,
  type AnalyzerConfig,
  type ProviderApiKeys,
} from './analyzer-config';
export { ConfigError } from './config-error';
export {
  createAnalyzerFromConfig,
  type CreateAnalyzerOptions,
} from './create-analyzer';
export { ModelFactory, type ModelFactoryOptions } from './model-factory';
