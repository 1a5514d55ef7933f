// Standardized error handling utilities
// Shared by routes, the session pipeline and the model transport

export enum ErrorCode {
  NOT_FOUND = 'not_found',
  BAD_REQUEST = 'bad_request',
  INTERNAL_ERROR = 'internal_error',
  VALIDATION_ERROR = 'validation_error',
  UPSTREAM_UNAVAILABLE = 'upstream_unavailable',
  TOOL_CATALOG_ERROR = 'tool_catalog_error',
}

export class AppError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public statusCode: number = 500,
    public details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
  }

  static notFound(message: string = 'Resource not found', details?: unknown): AppError {
    return new AppError(ErrorCode.NOT_FOUND, message, 404, details);
  }

  static badRequest(message: string = 'Bad request', details?: unknown): AppError {
    return new AppError(ErrorCode.BAD_REQUEST, message, 400, details);
  }

  static validationError(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.VALIDATION_ERROR, message, 400, details);
  }

  static upstreamUnavailable(message: string = 'The language model did not respond', details?: unknown): AppError {
    return new AppError(ErrorCode.UPSTREAM_UNAVAILABLE, message, 503, details);
  }

  static toolCatalog(message: string, details?: unknown): AppError {
    return new AppError(ErrorCode.TOOL_CATALOG_ERROR, message, 500, details);
  }

  static internal(message: string = 'Internal server error', details?: unknown): AppError {
    return new AppError(ErrorCode.INTERNAL_ERROR, message, 500, details);
  }
}

/**
 * Raised by providers when the model API answers with a non-success status.
 * The orchestrator never lets it escape a model call.
 */
export class ProviderError extends Error {
  constructor(
    public provider: string,
    public status: number,
    message: string
  ) {
    super(message);
    this.name = 'ProviderError';
  }

  get isRateLimited(): boolean {
    return this.status === 429;
  }
}

export interface ErrorResponse {
  error: ErrorCode;
  message: string;
  statusCode: number;
  details?: unknown;
}

export function formatErrorResponse(error: AppError, includeDetails: boolean = false): ErrorResponse {
  const response: ErrorResponse = {
    error: error.code,
    message: error.message,
    statusCode: error.statusCode,
  };

  if (includeDetails && error.details) {
    response.details = error.details;
  }

  return response;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
