/**
 * Error taxonomy
 *
 * Only malformed input is exceptional. Undefined metrics, short
 * histories and small groups are result states, never errors.
 */

export type FairnessErrorCode = 'INVALID_INPUT';

export class FairnessError extends Error {
  readonly code: FairnessErrorCode;

  constructor(code: FairnessErrorCode, message: string) {
    super(message);
    this.name = 'FairnessError';
    this.code = code;
  }
}

/** Batch or request rejected wholesale: mismatched lengths or out-of-range values */
export class InvalidInputError extends FairnessError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super('INVALID_INPUT', `Invalid input: ${issues.join('; ')}`);
    this.name = 'InvalidInputError';
    this.issues = issues;
  }
}

export function isInvalidInputError(error: unknown): error is InvalidInputError {
  return error instanceof InvalidInputError;
}
