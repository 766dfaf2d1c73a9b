/**
 * Concrete error classes for the matching engine.
 *
 * Every error carries a stable `code`, the HTTP status the API answers with,
 * optional structured details and a creation timestamp.
 *
 * @example
 * ```typescript
 * throw AppConfigError.weightsDoNotSumToOne(0.95);
 * throw AppEmptyInputError.forDocument('candidate');
 * throw AppProviderError.embeddingCountMismatch('openai', 12, 11);
 * ```
 */

import type {
  AppError,
  ConfigError,
  EmptyInputError,
  NotFoundError,
  ProviderError,
  ValidationError,
} from './result-types';

// ===== BASE ERROR CLASS =====

/**
 * Base error class that all application errors extend
 */
export class BaseAppError extends Error implements AppError {
  readonly code: string;
  readonly message: string;
  readonly statusCode: number;
  readonly details?: Record<string, unknown>;
  /** ISO timestamp when error was created */
  readonly timestamp: string;

  constructor(
    code: string,
    message: string,
    statusCode: number,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.message = message;
    this.statusCode = statusCode;
    this.details = details;
    this.timestamp = new Date().toISOString();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Plain object representation, used for API responses and logging
   */
  toJSON(): AppError {
    return {
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      details: this.details,
      timestamp: this.timestamp
    };
  }
}

// ===== CONFIGURATION ERRORS (500) =====

/**
 * Structurally invalid scoring configuration. Raised before any text is
 * processed.
 */
export class AppConfigError extends BaseAppError implements ConfigError {
  readonly code = 'CONFIG_ERROR' as const;
  readonly setting?: string;

  constructor(message: string, setting?: string, details?: Record<string, unknown>) {
    super('CONFIG_ERROR', message, 500, details);
    this.setting = setting;
  }

  static weightsDoNotSumToOne(sum: number): AppConfigError {
    return new AppConfigError(
      `Component weights must sum to 1.0, got ${sum}`,
      'componentWeights',
      { sum }
    );
  }

  static overlapNotBelowWindow(windowSizeWords: number, overlapWords: number): AppConfigError {
    return new AppConfigError(
      `Chunk overlap (${overlapWords}) must be smaller than the chunk window (${windowSizeWords})`,
      'chunkOverlapWords',
      { windowSizeWords, overlapWords }
    );
  }

  static invalidSetting(setting: string, reason: string): AppConfigError {
    return new AppConfigError(`Invalid setting '${setting}': ${reason}`, setting);
  }
}

// ===== INPUT ERRORS (400/404) =====

export class AppEmptyInputError extends BaseAppError implements EmptyInputError {
  readonly code = 'EMPTY_INPUT' as const;
  readonly documentRole: string;

  constructor(documentRole: string, details?: Record<string, unknown>) {
    super('EMPTY_INPUT', `The ${documentRole} document is empty`, 400, details);
    this.documentRole = documentRole;
  }

  static forDocument(documentRole: string): AppEmptyInputError {
    return new AppEmptyInputError(documentRole);
  }
}

export class AppValidationError extends BaseAppError implements ValidationError {
  readonly code = 'VALIDATION_ERROR' as const;
  readonly field?: string;
  readonly validationRules?: string[];

  constructor(
    message: string,
    field?: string,
    validationRules?: string[],
    details?: Record<string, unknown>
  ) {
    super('VALIDATION_ERROR', message, 400, details);
    this.field = field;
    this.validationRules = validationRules;
  }

  static wrongDocumentRole(field: string, expected: string, actual: string): AppValidationError {
    return new AppValidationError(
      `Expected a '${expected}' document for '${field}', got '${actual}'`,
      field,
      ['document-role']
    );
  }
}

export class AppNotFoundError extends BaseAppError implements NotFoundError {
  readonly code = 'NOT_FOUND' as const;
  readonly resource: string;

  constructor(resource: string, details?: Record<string, unknown>) {
    super('NOT_FOUND', `${resource} not found`, 404, details);
    this.resource = resource;
  }

  static resourceNotFound(resource: string): AppNotFoundError {
    return new AppNotFoundError(resource);
  }
}

// ===== PROVIDER ERRORS (502) =====

/**
 * Failure of an external provider. Fatal to a scoring call when it comes from
 * the embedding provider, never fatal when it comes from the explanation
 * provider.
 */
export class AppProviderError extends BaseAppError implements ProviderError {
  readonly code = 'PROVIDER_ERROR' as const;
  readonly provider: string;
  readonly operation: 'embed' | 'explain';
  readonly originalError?: string;

  constructor(
    provider: string,
    operation: 'embed' | 'explain',
    message: string,
    originalError?: string,
    details?: Record<string, unknown>
  ) {
    super('PROVIDER_ERROR', message, 502, { ...details, provider, operation, originalError });
    this.provider = provider;
    this.operation = operation;
    this.originalError = originalError;
  }

  static embeddingFailure(provider: string, error: unknown): AppProviderError {
    return new AppProviderError(
      provider,
      'embed',
      `Embedding provider '${provider}' failed to embed the documents`,
      describeError(error)
    );
  }

  static embeddingCountMismatch(provider: string, expected: number, received: number): AppProviderError {
    return new AppProviderError(
      provider,
      'embed',
      `Embedding provider '${provider}' returned ${received} vectors for ${expected} texts`,
      undefined,
      { expected, received }
    );
  }

  static vectorDimensionMismatch(expected: number, received: number): AppProviderError {
    return new AppProviderError(
      'embedding',
      'embed',
      `Vector length mismatch: ${expected} vs ${received}`,
      undefined,
      { expected, received }
    );
  }

  static explanationFailure(provider: string, error: unknown): AppProviderError {
    return new AppProviderError(
      provider,
      'explain',
      `Explanation provider '${provider}' failed`,
      describeError(error)
    );
  }
}

// ===== ERROR CONVERSION UTILITIES =====

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Converts unknown errors to typed AppError instances
 */
export function toAppError(error: unknown, context = 'Unknown operation'): BaseAppError {
  if (error instanceof BaseAppError) {
    return error;
  }

  if (error instanceof Error) {
    return new BaseAppError(
      'INTERNAL_ERROR',
      `Unexpected error in ${context}: ${error.message}`,
      500
    );
  }

  return new BaseAppError(
    'UNKNOWN_ERROR',
    `Unknown error in ${context}: ${String(error)}`,
    500,
    { originalError: error }
  );
}
