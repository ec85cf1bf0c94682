export {
  createAnalyzerFromConfig,
  ConfigError,
  loadAnalyzerConfig,
  ModelFactory,
} from './config';
export type {
  AnalyzerConfig,
  CreateAnalyzerOptions,
  ModelFactoryOptions,
  ProviderApiKeys,
} from './config';
export {
  BaseOracleComponent,
  DEFAULT_CALL_TIMEOUT_MS,
} from './core';
export type { BaseOracleComponentOptions } from './core';
export { DocumentAnalyzer } from './document-analyzer';
export type {
  AnalyzeOptions,
  DocumentAnalyzerOptions,
} from './document-analyzer';
export {
  FALLBACK_SCORE,
  QUALITY_KEYWORDS,
  extractList,
  extractScore,
  mapQualityToStars,
  normalizeLabel,
  parseScore,
} from './normalizers';
export type { ListDelimiter, ScoreRange } from './normalizers';
export {
  LanguageModelOracle,
  OracleContractError,
  OracleError,
  OracleTimeoutError,
  OracleUnavailableError,
} from './oracle';
export type {
  LanguageModelOracleOptions,
  OracleInputs,
  OracleRequest,
  OracleResponse,
  TextOracle,
} from './oracle';
export {
  AnalysisProfileError,
  defineAnalysisProfile,
  movieReviewProfile,
  resumeProfile,
} from './profiles';
export type {
  AnalysisProfile,
  HolisticFields,
  HolisticListField,
  HolisticTextField,
  UnitNameStyle,
} from './profiles';
export { HolisticAssessor, UnitEvaluator, UnitIdentifier } from './stages';
export {
  countWords,
  InputTooShortError,
  validateDocument,
} from './validation';
