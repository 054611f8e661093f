/**
 * Global Error Handler Middleware
 * Layer: Interfaces (HTTP)
 *
 * Registered last in app.ts. Express 5 forwards both thrown errors and
 * rejected promises from handlers here.
 *
 *   - Operational AppError (UnknownVariantError 404, ValidationError 400,
 *     DelegationError 502, ...): logged at warn, answered with the error's
 *     status and message.
 *   - Body-parser rejections (malformed JSON, oversized payload, bad
 *     charset): answered with their own 4xx status.
 *   - Anything else, including a ContractViolationError: logged at error,
 *     answered with a generic 500.
 */
import { logger } from '@core/logger';
import { AppError } from '@shared/errors/AppError';
import type { NextFunction, Request, Response } from 'express';

/** Shape of the http-errors instances express.json() raises. */
interface BodyParserError extends Error {
  status: number;
  type: string;
}

function isBodyParserError(err: Error): err is BodyParserError {
  return (
    'status' in err &&
    typeof err.status === 'number' &&
    err.status >= 400 &&
    err.status < 500 &&
    'type' in err &&
    typeof err.type === 'string' &&
    /^(entity|charset|encoding)\./.test(err.type)
  );
}

export function errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof AppError && err.isOperational) {
    logger.warn(
      { statusCode: err.statusCode, error: err.name, message: err.message },
      'Operational error',
    );
    res.status(err.statusCode).json({
      status: 'error',
      error: err.name,
      message: err.message,
    });
    return;
  }

  if (isBodyParserError(err)) {
    logger.warn({ statusCode: err.status, type: err.type }, 'Rejected request body');
    res.status(err.status).json({
      status: 'error',
      error: 'BadRequestBody',
      message: err.type === 'entity.parse.failed' ? 'Malformed JSON body' : err.message,
    });
    return;
  }

  logger.error({ err }, 'Unhandled error');
  res.status(500).json({
    status: 'error',
    message: 'Internal server error',
  });
}
