export type FieldErrors = Record<string, string[]>;

export class ApiError extends Error {
  public statusCode: number;
  public errors?: FieldErrors;

  constructor(statusCode: number, message: string, errors?: FieldErrors) {
    super(message);
    this.statusCode = statusCode;
    this.errors = errors;
    this.name = 'ApiError';
  }

  static badRequest(message: string, errors?: FieldErrors): ApiError {
    return new ApiError(400, message, errors);
  }

  /** A 400 carrying a single message against one field. */
  static invalidField(field: string, message: string): ApiError {
    return new ApiError(400, 'Validation failed', { [field]: [message] });
  }

  static unauthorized(message: string = 'Unauthorized'): ApiError {
    return new ApiError(401, message);
  }

  static notFound(message: string = 'Not found'): ApiError {
    return new ApiError(404, message);
  }
}

