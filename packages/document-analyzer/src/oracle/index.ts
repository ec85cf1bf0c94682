export {
  OracleContractError,
  OracleError,
  OracleTimeoutError,
  OracleUnavailableError,
} from './oracle-error';
export {
  LanguageModelOracle,
  type LanguageModelOracleOptions,
} from './language-model-oracle';
export type {
  OracleInputs,
  OracleRequest,
  OracleResponse,
  TextOracle,
} from './text-oracle';
