import { PropscanError } from '@propscan/shared';

/**
 * PropertyExtractionError
 *
 * Base error for the structured extraction stage.
 */
export class PropertyExtractionError extends PropscanError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'PropertyExtractionError';
  }

  /**
   * Create PropertyExtractionError from unknown error with context
   */
  static fromError(context: string, error: unknown): PropertyExtractionError {
    if (error instanceof PropertyExtractionError) {
      return error;
    }
    return new PropertyExtractionError(
      `${context}: ${PropscanError.getErrorMessage(error)}`,
      { cause: error },
    );
  }
}

/**
 * Why a single candidate did not produce a result
 */
export type CandidateAttemptOutcome =
  | 'cooling-down'
  | 'rate-limited'
  | 'request-failed'
  | 'unparsable'
  | 'sparse';

export interface CandidateAttempt {
  modelId: string;
  outcome: CandidateAttemptOutcome;
  detail: string;
}

/**
 * Raised when every model candidate was skipped or failed for one call.
 *
 * Also raised immediately when the candidate list is empty.
 */
export class CandidatesExhaustedError extends PropertyExtractionError {
  readonly attempts: readonly CandidateAttempt[];

  constructor(attempts: readonly CandidateAttempt[]) {
    super(CandidatesExhaustedError.buildMessage(attempts));
    this.name = 'CandidatesExhaustedError';
    this.attempts = attempts;
  }

  /**
   * True when no candidate produced a response because each one was
   * rate-limited or still cooling down
   */
  get rateLimitedOnly(): boolean {
    return (
      this.attempts.length > 0 &&
      this.attempts.every(
        ({ outcome }) => outcome === 'rate-limited' || outcome === 'cooling-down',
      )
    );
  }

  private static buildMessage(attempts: readonly CandidateAttempt[]): string {
    if (attempts.length === 0) {
      return 'No model candidates configured';
    }
    const summary = attempts
      .map(({ modelId, outcome }) => `${modelId} (${outcome})`)
      .join(', ');
    return `All model candidates failed: ${summary}`;
  }
}
