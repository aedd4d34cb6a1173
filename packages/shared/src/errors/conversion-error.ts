/**
 * Category of a fatal conversion failure, reported to the user as-is
 */
export type ConversionErrorCategory =
  | 'structure'
  | 'cache'
  | 'content'
  | 'configuration'
  | 'compile';

/**
 * ConversionError
 *
 * Base class for every error that aborts a conversion run. Non-fatal
 * conditions are recorded in the run report instead of being thrown.
 */
export class ConversionError extends Error {
  readonly category: ConversionErrorCategory;

  constructor(
    message: string,
    category: ConversionErrorCategory,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'ConversionError';
    this.category = category;
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }
}

/**
 * Error thrown when a run is cancelled through its AbortSignal
 */
export function createAbortError(message = 'Conversion was aborted'): Error {
  const error = new Error(message);
  error.name = 'AbortError';
  return error;
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}
