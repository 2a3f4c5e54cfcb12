export interface ErrorDetail {
  field: string;
  message: string;
}

export interface ErrorResponse {
  ok: false;
  error: string;
  code: string;
  details?: ErrorDetail[];
}

export class AppError extends Error {
  constructor(
    public statusCode: number,
    public errorCode: string,
    message: string,
    public exitCode: number = 1,
    public details?: ErrorDetail[]
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: ErrorDetail[]) {
    super(400, 'VALIDATION_ERROR', message, 2, details);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(404, 'NOT_FOUND', message, 1);
    this.name = 'NotFoundError';
  }
}

export class ContentLoadError extends AppError {
  constructor(message: string, details?: ErrorDetail[]) {
    super(500, 'CONTENT_LOAD_ERROR', message, 1, details);
    this.name = 'ContentLoadError';
  }
}

export function toErrorResponse(error: AppError): ErrorResponse {
  const response: ErrorResponse = {
    ok: false,
    error: error.message,
    code: error.errorCode,
  };

  if (error.details && error.details.length > 0) {
    response.details = error.details;
  }

  return response;
}
