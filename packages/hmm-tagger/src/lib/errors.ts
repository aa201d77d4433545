/**
 * Error classes for hmm-tagger.
 *
 * Every error thrown by the tagger is an `HmmError`, so callers can tell
 * them apart from unrelated runtime errors with one `instanceof` check.
 */

export class HmmError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'HmmError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Invalid setup: a negative smoothing parameter, a tag set or vocabulary
 * without its sentinels, a malformed saved model.
 *
 * @example
 * ```ts
 * try {
 *   hmm.train(corpus, loss, { lambda: -1 });
 * } catch (err) {
 *   if (err instanceof ConfigurationError) console.error(err.issues);
 * }
 * ```
 */
export class ConfigurationError extends HmmError {
  /** Individual problems, when the error comes from schema validation. */
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = 'ConfigurationError';
    this.issues = issues;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** A sentence or corpus that was integerized against a different tag set or vocabulary. */
export class VocabularyMismatchError extends HmmError {
  constructor(message: string) {
    super(message);
    this.name = 'VocabularyMismatchError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * An internal invariant failed: forward and backward log Z disagree,
 * expected counts landed in a structurally forbidden cell, or a parameter
 * row does not sum to one. These indicate a bug, never bad input.
 */
export class ConsistencyError extends HmmError {
  constructor(message: string) {
    super(message);
    this.name = 'ConsistencyError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** A probability that underflowed to zero or became NaN where a finite value is required. */
export class NumericalError extends HmmError {
  readonly value: number;

  constructor(message: string, value: number) {
    super(message);
    this.name = 'NumericalError';
    this.value = value;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
