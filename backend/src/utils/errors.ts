export type AdvisorErrorCode =
  | 'DATA_LOAD_ERROR'
  | 'INDEX_NOT_FOUND'
  | 'EMBEDDING_SERVICE_ERROR'
  | 'GENERATION_ERROR'
  | 'INVALID_ARGUMENT';

export abstract class AdvisorError extends Error {
  abstract readonly code: AdvisorErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The CSV is missing, unreadable, or lacks required columns. */
export class DataLoadError extends AdvisorError {
  readonly code = 'DATA_LOAD_ERROR';
}

/** A query arrived before ingestion produced a usable index. */
export class IndexNotFoundError extends AdvisorError {
  readonly code = 'INDEX_NOT_FOUND';
}

export class EmbeddingServiceError extends AdvisorError {
  readonly code = 'EMBEDDING_SERVICE_ERROR';
}

export class GenerationError extends AdvisorError {
  readonly code = 'GENERATION_ERROR';
}

export class InvalidArgumentError extends AdvisorError {
  readonly code = 'INVALID_ARGUMENT';
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

// HTTP status carried by OpenAI SDK errors (APIError.status); absent on connection failures.
export function errorStatus(error: unknown): number | undefined {
  if (error instanceof Error && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}
