/**
 * Error type for analysis failures
 * Messages carry a suggested action so tool consumers can act on them
 */

export type AnalysisErrorCode =
  | 'INVALID_UNIT'
  | 'UNKNOWN_SHAPE'
  | 'MEMBER_CLASSIFICATION_FAILED'
  | 'ANALYSIS_CANCELLED'
  | 'UNIT_NOT_FOUND'
  | 'DIAGNOSTIC_NOT_FOUND'
  | 'UNIT_CHANGED'
  | 'UNKNOWN';

export interface AnalysisErrorDetails {
  /** Error code for programmatic handling */
  code: AnalysisErrorCode;
  /** Human-readable message */
  message: string;
  /** Analysis unit being processed */
  unitId?: string;
  /** Suggested action to resolve */
  suggestion?: string;
  /** Original error (if wrapping) */
  cause?: Error;
  /** Additional context */
  context?: Record<string, unknown>;
}

export class AnalysisError extends Error {
  readonly code: AnalysisErrorCode;
  readonly unitId?: string;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: AnalysisErrorDetails) {
    super(details.message);
    this.name = 'AnalysisError';
    this.code = details.code;
    this.unitId = details.unitId;
    this.suggestion = details.suggestion;
    this.context = details.context;

    if (details.cause) {
      this.cause = details.cause;
    }

    Error.captureStackTrace(this, AnalysisError);
  }

  /**
   * Format error for tool output
   */
  toActionableMessage(): string {
    const parts = [`Error [${this.code}]: ${this.message}`];

    if (this.unitId) {
      parts.push(`Unit: ${this.unitId}`);
    }

    if (this.suggestion) {
      parts.push(`Suggested action: ${this.suggestion}`);
    }

    return parts.join('\n');
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      unitId: this.unitId,
      suggestion: this.suggestion,
      context: this.context,
    };
  }
}

/**
 * Helper to wrap unknown errors as AnalysisError
 */
export function wrapError(
  error: unknown,
  unitId?: string,
  defaultCode: AnalysisErrorCode = 'UNKNOWN'
): AnalysisError {
  if (error instanceof AnalysisError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;

  return new AnalysisError({
    code: defaultCode,
    message,
    unitId,
    cause,
  });
}
