export enum ErrorCode {
  NOT_FOUND = 'NOT_FOUND',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  CONFLICT = 'CONFLICT',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  RATE_LIMIT_EXCEEDED = 'RATE_LIMIT_EXCEEDED',
  AI_SERVICE_ERROR = 'AI_SERVICE_ERROR',
  CONTENT_GENERATION_ERROR = 'CONTENT_GENERATION_ERROR',
  TREND_SOURCE_ERROR = 'TREND_SOURCE_ERROR',
  PERSISTENCE_ERROR = 'PERSISTENCE_ERROR',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  ITERATION_OUT_OF_RANGE = 'ITERATION_OUT_OF_RANGE'
}

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly statusCode: number = 500,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  static notFound(message = 'Not found'): AppError {
    return new AppError(ErrorCode.NOT_FOUND, message, 404);
  }

  static validationError(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.VALIDATION_ERROR, message, 400, details);
  }

  static conflict(message: string): AppError {
    return new AppError(ErrorCode.CONFLICT, message, 409);
  }

  static internalError(message = 'Internal server error'): AppError {
    return new AppError(ErrorCode.INTERNAL_ERROR, message, 500);
  }

  static rateLimitExceeded(message = 'Rate limit exceeded'): AppError {
    return new AppError(ErrorCode.RATE_LIMIT_EXCEEDED, message, 429);
  }

  static aiServiceError(provider: string, cause?: unknown): AppError {
    const reason = cause instanceof Error ? cause.message : 'Unknown error';
    return new AppError(
      ErrorCode.AI_SERVICE_ERROR,
      `Text generation failed (${provider}): ${reason}`,
      502,
      reason
    );
  }

  static contentGenerationError(platform: string, cause?: unknown): AppError {
    return new AppError(
      ErrorCode.CONTENT_GENERATION_ERROR,
      `Failed to generate ${platform} post`,
      502,
      cause instanceof Error ? cause.message : cause
    );
  }

  static persistenceError(message: string, cause?: unknown): AppError {
    return new AppError(
      ErrorCode.PERSISTENCE_ERROR,
      message,
      500,
      cause instanceof Error ? cause.message : cause
    );
  }

  static configurationError(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.CONFIGURATION_ERROR, message, 500, details);
  }

  static iterationOutOfRange(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.ITERATION_OUT_OF_RANGE, message, 404, details);
  }
}
