/**
 * ConfigError
 *
 * Invalid environment configuration or model id.
 */
export class ConfigError extends Error {
  /**
   * One line per invalid setting, e.g. "DOCSENSE_UNIT_CONCURRENCY: ..."
   */
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}
