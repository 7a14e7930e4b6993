/**
 * Error types for the generation client.
 *
 * Failures of a generate call are reported as one of two kinds:
 * the HTTP exchange itself could not complete (`transport`), or it completed
 * but produced nothing usable (`generation`).
 */

/**
 * Generation error kinds
 */
export enum GenerationErrorKind {
  /** Network, DNS, TLS or timeout failure. */
  TRANSPORT = 'transport',
  /** Unparseable body, error status or incomplete result. */
  GENERATION = 'generation',
}

/**
 * Error returned by a failed generate call
 */
export class GenerationError extends Error {
  readonly kind: GenerationErrorKind;
  readonly details?: Record<string, unknown>;
  declare readonly cause?: Error;

  constructor(
    kind: GenerationErrorKind,
    message: string,
    options: { cause?: Error; details?: Record<string, unknown> } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = 'GenerationError';
    this.kind = kind;
    this.details = options.details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, GenerationError);
    }
  }

  /**
   * True when the HTTP exchange itself failed
   */
  isTransport(): boolean {
    return this.kind === GenerationErrorKind.TRANSPORT;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      kind: this.kind,
      message: this.message,
      details: this.details,
      cause: this.cause?.message,
    };
  }

  /**
   * Create transport error wrapping the underlying failure
   */
  static transport(cause: Error, endpoint: string): GenerationError {
    return new GenerationError(
      GenerationErrorKind.TRANSPORT,
      `HTTP request to ${endpoint} failed: ${cause.message}`,
      { cause, details: { endpoint } }
    );
  }

  /**
   * Create timeout error
   */
  static timeout(endpoint: string, timeoutMs: number, cause?: Error): GenerationError {
    return new GenerationError(
      GenerationErrorKind.TRANSPORT,
      `HTTP request to ${endpoint} timed out after ${timeoutMs}ms`,
      { cause, details: { endpoint, timeoutMs } }
    );
  }

  /**
   * Create error for a non-2xx response
   */
  static httpStatus(statusCode: number, serverMessage?: string): GenerationError {
    const suffix = serverMessage ? `: ${serverMessage}` : '';
    return new GenerationError(
      GenerationErrorKind.GENERATION,
      `Model server responded with status ${statusCode}${suffix}`,
      { details: { statusCode } }
    );
  }

  /**
   * Create error for a body that is not a generation response
   */
  static parseFailure(cause: Error): GenerationError {
    return new GenerationError(
      GenerationErrorKind.GENERATION,
      `Failed to parse generation response: ${cause.message}`,
      { cause }
    );
  }

  /**
   * Create error for a response with `done: false`
   */
  static incomplete(): GenerationError {
    return new GenerationError(
      GenerationErrorKind.GENERATION,
      'Incomplete response from model server'
    );
  }
}

/**
 * Thrown when a client cannot be constructed from the given settings
 */
export class ConfigurationError extends Error {
  readonly field?: string;

  constructor(message: string, field?: string) {
    super(message);
    this.name = 'ConfigurationError';
    this.field = field;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConfigurationError);
    }
  }
}

/**
 * Type guard for GenerationError.
 */
export function isGenerationError(error: unknown): error is GenerationError {
  return error instanceof GenerationError;
}

/**
 * Type for operation results.
 */
export type Result<T, E = GenerationError> =
  | { success: true; data: T }
  | { success: false; error: E };

/**
 * Creates a successful result.
 */
export function ok<T>(data: T): Result<T, never> {
  return { success: true, data };
}

/**
 * Creates a failed result.
 */
export function err<E = GenerationError>(error: E): Result<never, E> {
  return { success: false, error };
}
