export { ConcurrentPool, type ConcurrentPoolOptions } from './utils/concurrent-pool';
export {
  LLMCaller,
  type ExtendedTokenUsage,
  type LLMCallConfig,
  type LLMCallResult,
} from './utils/llm-caller';
export {
  LLMTokenUsageAggregator,
  type TokenUsage,
} from './utils/llm-token-usage-aggregator';
export { detectProvider, type ProviderType } from './utils/provider-detector';
export { TimeoutError, withTimeout } from './utils/with-timeout';
