import { Request, Response, NextFunction, RequestHandler } from 'express';
import { AppError, ErrorCode } from '../../domain/errors/AppError';
import { logger } from '../../infrastructure/logging/Logger';

/** HTTP status for every application error code. */
export const HTTP_STATUS_BY_CODE: Record<ErrorCode, number> = {
  [ErrorCode.NOT_FOUND]: 404,
  [ErrorCode.ITERATION_OUT_OF_RANGE]: 404,
  [ErrorCode.VALIDATION_ERROR]: 400,
  [ErrorCode.CONFLICT]: 409,
  [ErrorCode.RATE_LIMIT_EXCEEDED]: 429,
  [ErrorCode.AI_SERVICE_ERROR]: 502,
  [ErrorCode.CONTENT_GENERATION_ERROR]: 502,
  [ErrorCode.TREND_SOURCE_ERROR]: 502,
  [ErrorCode.PERSISTENCE_ERROR]: 500,
  [ErrorCode.CONFIGURATION_ERROR]: 500,
  [ErrorCode.INTERNAL_ERROR]: 500
};

// express.json() marks unparseable bodies this way
function isMalformedBody(error: Error): boolean {
  return 'type' in error && error.type === 'entity.parse.failed';
}

export function errorHandler(
  error: Error,
  req: Request,
  res: Response,
  next: NextFunction
): void {
  if (res.headersSent) {
    return next(error);
  }

  const requestInfo = { path: req.path, method: req.method, ip: req.ip };

  if (error instanceof AppError) {
    const status = HTTP_STATUS_BY_CODE[error.code];
    if (status < 500) {
      logger.warn('Request rejected', { ...requestInfo, code: error.code, error: error.message });
    } else {
      logger.error('Request failed', { ...requestInfo, code: error.code, error: error.message, details: error.details });
    }

    res.status(status).json({
      success: false,
      error: error.message,
      code: error.code,
      ...(error.details !== undefined ? { details: error.details } : {})
    });
    return;
  }

  if (isMalformedBody(error)) {
    logger.warn('Malformed JSON body', requestInfo);
    res.status(400).json({
      success: false,
      error: 'Request body is not valid JSON',
      code: ErrorCode.VALIDATION_ERROR
    });
    return;
  }

  logger.error('Unhandled error', {
    ...requestInfo,
    error: error.message,
    stack: error.stack,
    query: req.query,
    params: req.params
  });

  const isDevelopment = process.env.NODE_ENV === 'development';

  res.status(500).json({
    success: false,
    error: isDevelopment ? error.message : 'Internal server error',
    code: ErrorCode.INTERNAL_ERROR,
    ...(isDevelopment ? { stack: error.stack } : {})
  });
}

export function notFoundHandler(req: Request, res: Response): void {
  logger.warn('Route not found', {
    path: req.path,
    method: req.method,
    ip: req.ip
  });

  res.status(404).json({
    success: false,
    error: 'Route not found',
    code: ErrorCode.NOT_FOUND
  });
}

export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
): RequestHandler {
  return (req, res, next) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
