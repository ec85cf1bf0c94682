/**
 * AnalysisProfileError
 *
 * Raised by defineAnalysisProfile when a profile definition is invalid.
 */
export class AnalysisProfileError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'AnalysisProfileError';
    this.issues = issues;
  }
}
