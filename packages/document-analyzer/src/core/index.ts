export {
  BaseOracleComponent,
  DEFAULT_CALL_TIMEOUT_MS,
  type BaseOracleComponentOptions,
} from './base-oracle-component';
