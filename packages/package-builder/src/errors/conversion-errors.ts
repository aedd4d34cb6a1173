import { ConversionError } from '@bookpack/shared';

/**
 * StructureError
 *
 * Thrown when the parsed document cannot yield a book, i.e. it has no pages.
 */
export class StructureError extends ConversionError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'structure', options);
    this.name = 'StructureError';
  }
}

/**
 * ContentExtractionError
 *
 * Fatal failure inside a page extraction task. Raising it cancels the
 * remaining tasks of the run; recoverable per-block problems are recorded
 * as warnings instead.
 */
export class ContentExtractionError extends ConversionError {
  readonly pageNo: number;

  constructor(message: string, pageNo: number, options?: ErrorOptions) {
    super(message, 'content', options);
    this.name = 'ContentExtractionError';
    this.pageNo = pageNo;
  }

  /**
   * Create ContentExtractionError from unknown error with context
   */
  static fromError(
    context: string,
    pageNo: number,
    error: unknown,
  ): ContentExtractionError {
    return new ContentExtractionError(
      `${context} (page ${pageNo}): ${ConversionError.getErrorMessage(error)}`,
      pageNo,
      { cause: error },
    );
  }
}

/**
 * PackageCompileError
 *
 * Thrown when the external package compiler exits with a non-zero code.
 */
export class PackageCompileError extends ConversionError {
  readonly exitCode: number;
  readonly stderr: string;

  constructor(message: string, exitCode: number, stderr: string) {
    super(message, 'compile');
    this.name = 'PackageCompileError';
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}
