import { PropscanError } from '@propscan/shared';

/**
 * TextExtractionError
 *
 * Raised when a file cannot be turned into text: unreadable input, a failed
 * rasterization, or an OCR service error. Never raised for empty output.
 */
export class TextExtractionError extends PropscanError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TextExtractionError';
  }

  /**
   * Create TextExtractionError from unknown error with context
   */
  static fromError(context: string, error: unknown): TextExtractionError {
    if (error instanceof TextExtractionError) {
      return error;
    }
    return new TextExtractionError(
      `${context}: ${PropscanError.getErrorMessage(error)}`,
      { cause: error },
    );
  }
}
