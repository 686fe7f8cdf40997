/**
 * Fatal errors: each aborts the whole analysis and is shown as one message.
 * Metric-level problems are warnings (see AnalysisWarning), not errors.
 */

/** The supplied loss series could not be read as numbers at all. */
export class MalformedInputError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "MalformedInputError";
  }
}

/** No usable loss observations reached the pipeline. */
export class InsufficientDataError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InsufficientDataError";
  }
}

export class InvalidTreatyTermsError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`TreatyTerms: invalid terms. ${issues.join("; ")}`);
    this.name = "InvalidTreatyTermsError";
    this.issues = issues;
  }
}
