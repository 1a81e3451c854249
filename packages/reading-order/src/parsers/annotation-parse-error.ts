/**
 * AnnotationParseError
 *
 * Thrown when raw annotation input fails validation at the boundary.
 */
export class AnnotationParseError extends Error {
  /**
   * One `path: message` entry per validation issue
   */
  readonly issues: string[];

  constructor(message: string, issues: string[] = [], options?: ErrorOptions) {
    super(message, options);
    this.name = 'AnnotationParseError';
    this.issues = issues;
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  /**
   * Create AnnotationParseError from unknown error with context
   */
  static fromError(context: string, error: unknown): AnnotationParseError {
    return new AnnotationParseError(
      `${context}: ${AnnotationParseError.getErrorMessage(error)}`,
      [],
      { cause: error },
    );
  }
}
