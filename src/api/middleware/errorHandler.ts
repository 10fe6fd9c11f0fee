/**
 * Error Handler Middleware
 *
 * Centralized error handling for the API. Domain errors keep their code;
 * the status follows from it.
 */

import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { EvaluationError, type EvaluationErrorCode } from '../../domain/errors.js';

// =============================================================================
// ERROR TYPES
// =============================================================================

export class ApiError extends Error {
  constructor(
    message: string,
    public statusCode: number,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

export class BadRequestError extends ApiError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 400, 'BAD_REQUEST', details);
  }
}

const DOMAIN_STATUS: Record<EvaluationErrorCode, number> = {
  VALIDATION_ERROR: 422,
  NOT_FOUND: 404,
  COLLABORATOR_UNAVAILABLE: 503,
};

// =============================================================================
// ERROR RESPONSE TYPE
// =============================================================================

export interface ErrorResponse {
  error: {
    message: string;
    code: string;
    details?: Record<string, unknown>;
    requestId?: string;
  };
}

function requestIdOf(req: Request): string | undefined {
  const header = req.headers['x-request-id'];
  return typeof header === 'string' ? header : undefined;
}

// =============================================================================
// ERROR HANDLER MIDDLEWARE
// =============================================================================

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const requestId = requestIdOf(req);

  if (err instanceof ApiError) {
    res.status(err.statusCode).json({
      error: {
        message: err.message,
        code: err.code,
        details: err.details,
        requestId,
      },
    } satisfies ErrorResponse);
    return;
  }

  if (err instanceof EvaluationError) {
    const statusCode = DOMAIN_STATUS[err.code];
    if (statusCode >= 500) {
      console.error(`[API] ${req.method} ${req.path}: ${err.message}`);
    }
    res.status(statusCode).json({
      error: {
        message: err.message,
        code: err.code,
        details: err.details,
        requestId,
      },
    } satisfies ErrorResponse);
    return;
  }

  if (err instanceof ZodError) {
    res.status(422).json({
      error: {
        message: 'Validation error',
        code: 'VALIDATION_ERROR',
        details: {
          issues: err.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
        },
        requestId,
      },
    } satisfies ErrorResponse);
    return;
  }

  // Malformed JSON from express.json()
  if (err instanceof SyntaxError && 'body' in err) {
    res.status(400).json({
      error: { message: 'Malformed JSON body', code: 'BAD_REQUEST', requestId },
    } satisfies ErrorResponse);
    return;
  }

  console.error('[API] Unhandled error:', {
    name: err.name,
    message: err.message,
    stack: err.stack,
    path: req.path,
    method: req.method,
  });

  res.status(500).json({
    error: {
      message: process.env.NODE_ENV === 'production' ? 'Internal server error' : err.message,
      code: 'INTERNAL_ERROR',
      requestId,
    },
  } satisfies ErrorResponse);
}

// =============================================================================
// NOT FOUND HANDLER
// =============================================================================

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    error: {
      message: `Route not found: ${req.method} ${req.path}`,
      code: 'ROUTE_NOT_FOUND',
      requestId: requestIdOf(req),
    },
  } satisfies ErrorResponse);
}
