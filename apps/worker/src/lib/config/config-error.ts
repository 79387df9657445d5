import { PropscanError } from '@propscan/shared';

/**
 * Raised when the worker configuration cannot be loaded or is invalid
 */
export class ConfigError extends PropscanError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigError';
  }

  static fromError(context: string, error: unknown): ConfigError {
    if (error instanceof ConfigError) {
      return error;
    }
    return new ConfigError(
      `${context}: ${PropscanError.getErrorMessage(error)}`,
      { cause: error },
    );
  }
}
