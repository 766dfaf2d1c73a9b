/**
 * Result pattern for operations whose failure the caller is expected to inspect
 * rather than catch, such as narrative explanation of an already computed score.
 *
 * @example
 * ```typescript
 * const outcome = await fromPromise(
 *   provider.explain(input),
 *   (error) => AppProviderError.explanationFailure(provider.name, error),
 * );
 *
 * if (isSuccess(outcome)) {
 *   render(outcome.data);
 * } else {
 *   logger.warn({ code: outcome.error.code }, outcome.error.message);
 * }
 * ```
 */

// ===== CORE RESULT TYPES =====

/**
 * Either a success carrying data or a failure carrying an error.
 *
 * @template T - The type of data returned on success
 * @template E - The type of error returned on failure (defaults to AppError)
 */
export type Result<T, E = AppError> = Success<T> | Failure<E>;

export interface Success<T> {
  /** Always true for success results */
  readonly success: true;
  readonly data: T;
}

export interface Failure<E> {
  /** Always false for failure results */
  readonly success: false;
  readonly error: E;
}

// ===== RESULT CONSTRUCTORS =====

export const success = <T>(data: T): Success<T> => ({ success: true, data });

export const failure = <E>(error: E): Failure<E> => ({ success: false, error });

// ===== ERROR SHAPES =====

// Base application error interface
export interface AppError {
  readonly code: string;
  readonly message: string;
  readonly statusCode: number;
  readonly details?: Record<string, unknown>;
  readonly timestamp?: string;
}

export interface ConfigError extends AppError {
  readonly code: 'CONFIG_ERROR';
  readonly setting?: string;
}

export interface EmptyInputError extends AppError {
  readonly code: 'EMPTY_INPUT';
  readonly documentRole: string;
}

export interface ProviderError extends AppError {
  readonly code: 'PROVIDER_ERROR';
  readonly provider: string;
  readonly operation: 'embed' | 'explain';
  readonly originalError?: string;
}

export interface ValidationError extends AppError {
  readonly code: 'VALIDATION_ERROR';
  readonly field?: string;
  readonly validationRules?: string[];
}

export interface NotFoundError extends AppError {
  readonly code: 'NOT_FOUND';
  readonly resource: string;
}

// ===== TYPE GUARDS =====

/**
 * Narrows a result to its success variant.
 */
export const isSuccess = <T, E>(result: Result<T, E>): result is Success<T> => {
  return result.success === true;
};

/**
 * Narrows a result to its failure variant.
 */
export const isFailure = <T, E>(result: Result<T, E>): result is Failure<E> => {
  return result.success === false;
};

// ===== ASYNC HELPERS =====

/**
 * Settles a promise (or a plain value) into a Result. The error mapper receives
 * whatever was thrown.
 */
export const fromPromise = async <T, E>(
  pending: Promise<T> | T,
  errorMapper: (error: unknown) => E,
): Promise<Result<T, E>> => {
  try {
    const data = await pending;
    return success(data);
  } catch (error) {
    return failure(errorMapper(error));
  }
};
