/**
 * Error classes for the scoring engine and its data provider.
 */

/**
 * Base error. Every error the package throws on purpose extends this.
 */
export class ScoringError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'ScoringError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      error: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Unknown category id. Raised before any computation.
 */
export class InvalidCategoryError extends ScoringError {
  constructor(public readonly categoryId: string, known: readonly string[]) {
    super(
      `Unknown category '${categoryId}'. Expected one of: ${known.join(', ')}`,
      'INVALID_CATEGORY',
      { categoryId, known }
    );
    this.name = 'InvalidCategoryError';
  }
}

/**
 * Inconsistent category profiles or environment. Only raised at load time.
 */
export class ConfigurationError extends ScoringError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

/**
 * A video record that does not satisfy the input schema.
 */
export class ValidationError extends ScoringError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

// ============================================================================
// Data provider errors
// ============================================================================

export class NotFoundError extends ScoringError {
  constructor(resource: string, identifier?: string) {
    const message = identifier
      ? `${resource} with identifier '${identifier}' not found`
      : `${resource} not found`;
    super(message, 'NOT_FOUND', { resource, identifier });
    this.name = 'NotFoundError';
  }
}

export class AuthError extends ScoringError {
  constructor(message: string, details?: unknown) {
    super(message, 'AUTH_ERROR', details);
    this.name = 'AuthError';
  }
}

export class RateLimitedError extends ScoringError {
  constructor(message: string, details?: unknown) {
    super(message, 'RATE_LIMITED', details);
    this.name = 'RateLimitedError';
  }
}

export class TransientError extends ScoringError {
  constructor(message: string, details?: unknown) {
    super(message, 'TRANSIENT_ERROR', details);
    this.name = 'TransientError';
  }
}

/**
 * Type guard for ScoringError
 */
export const isScoringError = (error: unknown): error is ScoringError => {
  return error instanceof ScoringError;
};

/**
 * Normalise anything thrown into a ScoringError
 */
export const toScoringError = (error: unknown): ScoringError => {
  if (isScoringError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new ScoringError(error.message, 'UNKNOWN_ERROR', { originalError: error.name });
  }

  return new ScoringError('An unknown error occurred', 'UNKNOWN_ERROR', {
    originalError: String(error),
  });
};
