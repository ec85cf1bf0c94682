/**
 * OracleError
 *
 * Base class for failures of a single oracle call. Stages catch these and
 * drop their contribution; they never abort a whole analysis.
 */
export class OracleError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'OracleError';
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }
}

/**
 * OracleUnavailableError
 *
 * The oracle could not be reached or did not produce an answer (transport
 * failure, provider error, exhausted retries).
 */
export class OracleUnavailableError extends OracleError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'OracleUnavailableError';
  }

  /**
   * Create OracleUnavailableError from unknown error with context
   */
  static fromError(context: string, error: unknown): OracleUnavailableError {
    return new OracleUnavailableError(
      `${context}: ${OracleError.getErrorMessage(error)}`,
      { cause: error },
    );
  }
}

/**
 * OracleTimeoutError
 *
 * The call did not finish within the per-call deadline.
 */
export class OracleTimeoutError extends OracleUnavailableError {
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number, options?: ErrorOptions) {
    super(message, options);
    this.name = 'OracleTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * OracleContractError
 *
 * The oracle answered, but without the declared output fields.
 */
export class OracleContractError extends OracleError {
  /**
   * One line per violated field, e.g. "score: Required"
   */
  readonly issues: string[];

  constructor(message: string, issues: string[]) {
    super(`${message} (${issues.join('; ')})`);
    this.name = 'OracleContractError';
    this.issues = issues;
  }
}
