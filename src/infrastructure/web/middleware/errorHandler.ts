import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { ZodError } from 'zod';
import { AllProvidersFailedError, AppError, ValidationError, errorMessage } from '../../../core/errors.js';
import { createLogger } from '../../../utils/logger.js';

const logger = createLogger('ErrorHandler');

export interface ErrorBody {
  success: false;
  error: string;
  code?: string;
  details?: unknown;
}

/**
 * Wraps an async route so a rejection reaches the error middleware
 */
export function asyncHandler(
  handler: (req: Request, res: Response) => Promise<void>
): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

function isBodyParserError(error: unknown): error is { type: 'entity.parse.failed' } {
  return (
    typeof error === 'object' &&
    error !== null &&
    'type' in error &&
    error.type === 'entity.parse.failed'
  );
}

export function toErrorResponse(error: unknown): { status: number; body: ErrorBody } {
  if (error instanceof ZodError) {
    return {
      status: 400,
      body: {
        success: false,
        error: 'Validation failed',
        code: 'VALIDATION_ERROR',
        details: error.errors.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
      },
    };
  }

  if (isBodyParserError(error)) {
    return { status: 400, body: { success: false, error: 'Malformed JSON body', code: 'VALIDATION_ERROR' } };
  }

  if (error instanceof AllProvidersFailedError) {
    return {
      status: error.statusCode,
      body: { success: false, error: error.message, code: error.code, details: error.attempts },
    };
  }

  if (error instanceof ValidationError) {
    return {
      status: error.statusCode,
      body: {
        success: false,
        error: error.message,
        code: error.code,
        ...(error.details !== undefined ? { details: error.details } : {}),
      },
    };
  }

  if (error instanceof AppError) {
    return { status: error.statusCode, body: { success: false, error: error.message, code: error.code } };
  }

  return { status: 500, body: { success: false, error: 'Internal server error', code: 'INTERNAL_ERROR' } };
}

export function errorHandler(error: unknown, req: Request, res: Response, _next: NextFunction): void {
  const { status, body } = toErrorResponse(error);

  if (status >= 500) {
    logger.error(`${req.method} ${req.originalUrl} failed`, {
      error: errorMessage(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
  } else {
    logger.warn(`${req.method} ${req.originalUrl} rejected: ${body.error}`, { status });
  }

  res.status(status).json(body);
}

export function apiNotFound(req: Request, res: Response): void {
  res.status(404).json({
    success: false,
    error: `Route ${req.method} ${req.originalUrl} not found`,
    code: 'NOT_FOUND',
  } satisfies ErrorBody);
}
