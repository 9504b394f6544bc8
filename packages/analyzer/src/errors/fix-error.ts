/**
 * Fix-specific Error Types
 */

export type FixErrorCode =
  | 'EDIT_ANCHOR_NOT_FOUND'
  | 'FIX_NOT_APPLICABLE'
  | 'UNKNOWN_FIX';

export interface FixErrorDetails {
  code: FixErrorCode;
  message: string;
  suggestion?: string;
  cause?: Error;
  context?: Record<string, unknown>;
}

export class FixError extends Error {
  readonly code: FixErrorCode;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: FixErrorDetails) {
    super(details.message);
    this.name = 'FixError';
    this.code = details.code;
    this.suggestion = details.suggestion;
    this.context = details.context;

    if (details.cause) {
      this.cause = details.cause;
    }
  }

  /**
   * Format error for tool output
   */
  toActionableMessage(): string {
    const parts = [`Error [${this.code}]: ${this.message}`];
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
      suggestion: this.suggestion,
      context: this.context,
    };
  }
}
