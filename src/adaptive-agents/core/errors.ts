/**
 * Error taxonomy for the adaptive-agents core
 *
 * Scoring and learning math never throw. Only lifecycle misuse, bad input and
 * unknown identifiers are rejected, at the point where they happen.
 */

export type AdaptiveAgentsErrorCode = 'USAGE_ERROR' | 'VALIDATION_ERROR' | 'NOT_FOUND';

export class AdaptiveAgentsError extends Error {
  readonly code: AdaptiveAgentsErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: AdaptiveAgentsErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Lifecycle misuse: completing an unassigned or completed task, re-assigning a task,
 * or demanding an assignment that cannot be made.
 */
export class UsageError extends AdaptiveAgentsError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('USAGE_ERROR', message, details);
  }
}

export class ValidationError extends AdaptiveAgentsError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('VALIDATION_ERROR', message, details);
  }
}

export class NotFoundError extends AdaptiveAgentsError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('NOT_FOUND', message, details);
  }
}

export function isAdaptiveAgentsError(error: unknown): error is AdaptiveAgentsError {
  return error instanceof AdaptiveAgentsError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
