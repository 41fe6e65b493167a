export type ErrorCode =
  | 'INVALID_REQUEST'
  | 'AUTH_ERROR'
  | 'RETRIEVAL_ERROR'
  | 'GENERATION_ERROR'
  | 'PROCESSING_ERROR'
  | 'INTERNAL_ERROR';

export class AppError extends Error {
    constructor(
      message: string,
      public code: ErrorCode,
      public statusCode: number = 500,
      public details?: Record<string, unknown>
    ) {
      super(message);
      this.name = 'AppError';
      Error.captureStackTrace(this, this.constructor);
    }
  }

  export class ValidationError extends AppError {
    constructor(message: string = 'Validation failed', details?: Record<string, unknown>) {
      super(message, 'INVALID_REQUEST', 400, details);
      this.name = 'ValidationError';
    }
  }

  export class AuthenticationError extends AppError {
    constructor(message: string = 'Authentication failed', details?: Record<string, unknown>) {
      super(message, 'AUTH_ERROR', 401, details);
      this.name = 'AuthenticationError';
    }
  }

  export class RetrievalError extends AppError {
    constructor(message: string = 'Data retrieval failed', details?: Record<string, unknown>) {
      super(message, 'RETRIEVAL_ERROR', 500, details);
      this.name = 'RetrievalError';
    }
  }

  export class GenerationError extends AppError {
    constructor(message: string = 'Text generation failed', details?: Record<string, unknown>) {
      super(message, 'GENERATION_ERROR', 500, details);
      this.name = 'GenerationError';
    }
  }

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
}
