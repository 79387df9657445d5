import { PropscanError } from '@propscan/shared';

/**
 * Raised by store operations addressing an unknown document id
 */
export class DocumentNotFoundError extends PropscanError {
  readonly documentId: number;

  constructor(documentId: number) {
    super(`Document ${documentId} not found`);
    this.name = 'DocumentNotFoundError';
    this.documentId = documentId;
  }
}

/**
 * Raised when the database file cannot be read or has an unexpected shape
 */
export class DocumentStoreError extends PropscanError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'DocumentStoreError';
  }

  static fromError(context: string, error: unknown): DocumentStoreError {
    if (error instanceof DocumentStoreError) {
      return error;
    }
    return new DocumentStoreError(
      `${context}: ${PropscanError.getErrorMessage(error)}`,
      { cause: error },
    );
  }
}

/**
 * Raised when a file cannot be ingested
 */
export class IngestionError extends PropscanError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'IngestionError';
  }
}

/**
 * Raised when a manual operation targets a document with a run in flight
 */
export class DocumentBusyError extends PropscanError {
  constructor(documentId: number) {
    super(`Document ${documentId} is being processed`);
    this.name = 'DocumentBusyError';
  }
}
