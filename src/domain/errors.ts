/**
 * Domain Errors
 *
 * Failures the evaluation engine reports to its callers. Extraction never
 * raises: a field that cannot be parsed degrades to a sentinel instead.
 */

export type EvaluationErrorCode = 'VALIDATION_ERROR' | 'NOT_FOUND' | 'COLLABORATOR_UNAVAILABLE';

export class EvaluationError extends Error {
  constructor(
    message: string,
    public code: EvaluationErrorCode,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'EvaluationError';
  }
}

/**
 * Malformed requirement or request input. The caller must retry with
 * corrected input.
 */
export class ValidationError extends EvaluationError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends EvaluationError {
  constructor(resource: string, id?: string) {
    super(id ? `${resource} not found: ${id}` : `${resource} not found`, 'NOT_FOUND', {
      resource,
      id,
    });
    this.name = 'NotFoundError';
  }
}

/**
 * A retrieval, index or LLM collaborator is down or not configured.
 * Callers fall back to the next resolution tier or to retrieval-only mode.
 */
export class CollaboratorUnavailableError extends EvaluationError {
  constructor(collaborator: string, message: string, cause?: unknown) {
    super(`${collaborator} unavailable: ${message}`, 'COLLABORATOR_UNAVAILABLE', {
      collaborator,
    });
    this.name = 'CollaboratorUnavailableError';
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
