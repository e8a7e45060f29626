/**
 * Base class for every error this project raises
 *
 * Errors carry a code for programmatic handling plus enough context (offending
 * identifier, field or URL) to act on them without re-running with more logging.
 */

export interface ErrorDetails<TCode extends string> {
  /** Error code for programmatic handling */
  code: TCode;
  /** Human-readable message */
  message: string;
  /** Suggested action to resolve */
  suggestion?: string;
  /** Original error (if wrapping) */
  cause?: Error;
  /** Additional context */
  context?: Record<string, unknown>;
}

export abstract class BaseError<TCode extends string> extends Error {
  readonly code: TCode;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  protected constructor(name: string, details: ErrorDetails<TCode>) {
    super(details.message);
    this.name = name;
    this.code = details.code;
    this.suggestion = details.suggestion;
    this.context = details.context;

    if (details.cause) {
      this.cause = details.cause;
    }
  }

  /**
   * Format error for the operator
   * Returns a structured, actionable error message
   */
  toActionableMessage(): string {
    const parts = [`Error [${this.code}]: ${this.message}`];

    if (this.suggestion) {
      parts.push(`Suggested action: ${this.suggestion}`);
    }

    return parts.join('\n');
  }

  /**
   * Convert to JSON for structured log records
   */
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

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
