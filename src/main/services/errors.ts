/**
 * Error types for Tagsmith.
 *
 * Every failure is tagged with the processing step it belongs to, so batch
 * results and log entries can say where a file went wrong.
 */

export type ErrorCategory = 'InputError' | 'APIError' | 'WriteError';

export interface ErrorContext {
  filePath?: string;
  step?: string;
  cause?: Error;
}

const DEFAULT_STEP: Record<ErrorCategory, string> = {
  InputError: 'validating',
  APIError: 'api_call',
  WriteError: 'writing',
};

export class PipelineError extends Error {
  readonly category: ErrorCategory;
  /** File being processed, if any */
  readonly filePath: string | null;
  readonly step: string;
  /** Underlying error, when this one wraps another */
  readonly cause: Error | null;

  constructor(message: string, category: ErrorCategory, context: ErrorContext = {}) {
    super(message);
    this.name = category;
    this.category = category;
    this.filePath = context.filePath ?? null;
    this.step = context.step ?? DEFAULT_STEP[category];
    this.cause = context.cause ?? null;

    // Ensure prototype chain works correctly
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Bad user input: a pattern without both placeholders, a blank lookup query */
export class InputError extends PipelineError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'InputError', context);
  }
}

/** A failed Discogs request: transport error, HTTP error status or malformed payload */
export class APIError extends PipelineError {
  readonly statusCode: number | null;
  /** Name of the remote service */
  readonly service: string | null;

  constructor(message: string, context: ErrorContext & { statusCode?: number; service?: string } = {}) {
    super(message, 'APIError', context);
    this.statusCode = context.statusCode ?? null;
    this.service = context.service ?? null;
  }
}

/** Tags that could not be written back to a file */
export class WriteError extends PipelineError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'WriteError', context);
  }
}

const BY_CATEGORY: Record<ErrorCategory, new (message: string, context?: ErrorContext) => PipelineError> = {
  InputError,
  APIError,
  WriteError,
};

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

/**
 * Wraps any thrown value in the given category. PipelineErrors pass through
 * unchanged.
 */
export function wrapError(
  error: unknown,
  category: ErrorCategory,
  context: Omit<ErrorContext, 'cause'> = {},
): PipelineError {
  if (error instanceof PipelineError) {
    return error;
  }

  const cause = error instanceof Error ? error : new Error(String(error));
  return new BY_CATEGORY[category](cause.message || 'Unknown error', { ...context, cause });
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
