export type ErrorCode =
  | 'EXTRACTION_FAILED'
  | 'EMPTY_CONTENT'
  | 'VALIDATION_FAILED'
  | 'FILE_TOO_LARGE'
  | 'SERVICE_UNAVAILABLE'
  | 'GENERATION_TIMEOUT'
  | 'GENERATION_SERVICE_ERROR'
  | 'UNKNOWN_CLIENT_ERROR'
  | 'GENERATION_EXHAUSTED';

/**
 * Base class for every failure that is reported to the API caller.
 * `status` is the HTTP status the error middleware responds with.
 */
export abstract class AppError extends Error {
  abstract readonly status: number;
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ExtractionError extends AppError {
  readonly status = 400;
  readonly code = 'EXTRACTION_FAILED';
}

export class EmptyContentError extends AppError {
  readonly status = 400;
  readonly code = 'EMPTY_CONTENT';

  constructor(message = 'No text could be extracted from PDF') {
    super(message);
  }
}

export class ValidationError extends AppError {
  readonly status = 400;
  readonly code = 'VALIDATION_FAILED';
}

export class FileTooLargeError extends AppError {
  readonly status = 413;
  readonly code = 'FILE_TOO_LARGE';
}

// Generation transport failures

export class ServiceUnavailableError extends AppError {
  readonly status = 503;
  readonly code = 'SERVICE_UNAVAILABLE';
}

export class GenerationTimeoutError extends AppError {
  readonly status = 504;
  readonly code = 'GENERATION_TIMEOUT';
}

export class GenerationServiceError extends AppError {
  readonly status = 502;
  readonly code = 'GENERATION_SERVICE_ERROR';

  constructor(
    readonly upstreamStatus: number,
    readonly upstreamBody: string
  ) {
    super(`Generation service error: ${upstreamStatus} - ${upstreamBody}`);
  }
}

export class UnknownClientError extends AppError {
  readonly status = 500;
  readonly code = 'UNKNOWN_CLIENT_ERROR';
}

export class GenerationExhaustedError extends AppError {
  readonly status = 500;
  readonly code = 'GENERATION_EXHAUSTED';

  constructor(
    message = 'Failed to generate valid MCQs. Check the Ollama model or try different text.'
  ) {
    super(message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
