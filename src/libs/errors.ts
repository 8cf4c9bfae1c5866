/**
 * Request-level rejection. Rendered by formatErrorResponse with its own status code.
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly statusCode = 400,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class UnknownCategoryError extends Error {
  constructor(public readonly category: string) {
    super(`Unknown category: ${category}`);
    this.name = 'UnknownCategoryError';
  }
}

export class GenerationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GenerationError';
  }
}

export class PersistenceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PersistenceError';
  }
}

export type FailureCode =
  | 'UNKNOWN_CATEGORY'
  | 'SERVICE_THROTTLED'
  | 'GENERATION_TIMEOUT'
  | 'GENERATION_ERROR'
  | 'PERSISTENCE_ERROR'
  | 'UNEXPECTED_ERROR';

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

const causeName = (error: Error): string => {
  const cause = error.cause;
  return cause instanceof Error ? cause.name.toLowerCase() : '';
};

export const classifyError = (error: unknown): FailureCode => {
  if (error instanceof UnknownCategoryError) return 'UNKNOWN_CATEGORY';
  if (error instanceof GenerationError) {
    const name = causeName(error);
    if (name.includes('throttling')) return 'SERVICE_THROTTLED';
    if (name.includes('timeout')) return 'GENERATION_TIMEOUT';
    return 'GENERATION_ERROR';
  }
  if (error instanceof PersistenceError) return 'PERSISTENCE_ERROR';
  return 'UNEXPECTED_ERROR';
};
