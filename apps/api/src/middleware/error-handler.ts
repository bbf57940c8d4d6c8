import type { Request, Response, NextFunction } from 'express';
import { ERROR_MESSAGES, type ErrorResponseBody } from '@mdocx/shared';
import { logger } from '../shared/logger';

export class AppError extends Error {
  constructor(
    public readonly statusCode: number,
    message: string,
    public readonly code: string = 'INTERNAL_ERROR',
    public readonly details?: string,
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class UnsupportedMediaTypeError extends AppError {
  constructor() {
    super(415, ERROR_MESSAGES.notJson, 'UNSUPPORTED_MEDIA_TYPE');
  }
}

export class BadRequestError extends AppError {
  constructor(message: string) {
    super(400, message, 'BAD_REQUEST');
  }
}

export class PayloadTooLargeError extends AppError {
  constructor() {
    super(413, ERROR_MESSAGES.bodyTooLarge, 'PAYLOAD_TOO_LARGE');
  }
}

/** Converter exited non-zero. The captured stderr goes back to the author. */
export class ConversionFailedError extends AppError {
  constructor(stderr: string) {
    super(500, ERROR_MESSAGES.conversionFailed, 'CONVERSION_FAILED', stderr);
  }
}

export class ConversionTimeoutError extends AppError {
  constructor(public readonly timeoutMs: number) {
    super(504, ERROR_MESSAGES.conversionTimeout, 'CONVERSION_TIMEOUT');
  }
}

export class OutputMissingError extends AppError {
  constructor() {
    super(500, ERROR_MESSAGES.outputMissing, 'OUTPUT_MISSING');
  }
}

/**
 * Local I/O or process-start failure. The cause is logged, never sent.
 */
export class InternalError extends AppError {
  constructor(cause?: unknown) {
    super(500, ERROR_MESSAGES.internal, 'INTERNAL_ERROR');
    this.cause = cause;
  }
}

export class NotFoundError extends AppError {
  constructor() {
    super(404, ERROR_MESSAGES.notFound, 'NOT_FOUND');
  }
}

/**
 * body-parser tags its errors with a `type` string. Those we recognise become
 * client errors; anything else stays unexpected.
 */
function fromBodyParserError(err: Error): AppError | undefined {
  const type = 'type' in err && typeof err.type === 'string' ? err.type : undefined;
  switch (type) {
    case 'entity.parse.failed':
      return new BadRequestError(ERROR_MESSAGES.malformedJson);
    case 'entity.too.large':
      return new PayloadTooLargeError();
    default:
      return undefined;
  }
}

/**
 * Global error handler middleware.
 * Converts known error types to `{ error, details? }` JSON responses.
 */
export function errorHandler(
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction,
): void {
  const appError = err instanceof AppError ? err : fromBodyParserError(err);

  if (appError) {
    if (appError instanceof InternalError) {
      logger.error({ err: appError.cause ?? appError }, 'Internal error');
    }
    const body: ErrorResponseBody = { error: appError.message };
    if (appError.details !== undefined) {
      body.details = appError.details;
    }
    res.status(appError.statusCode).json(body);
    return;
  }

  // Unexpected errors
  logger.error({ err }, 'Unhandled error');
  res.status(500).json({ error: ERROR_MESSAGES.internal });
}

export function notFoundHandler(_req: Request, _res: Response, next: NextFunction): void {
  next(new NotFoundError());
}
