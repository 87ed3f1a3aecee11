/**
 * Result type for operations that can fail.
 * Provides explicit error handling without throwing exceptions.
 */
export type Result<T, E = Error> =
  | { readonly success: true; readonly data: T }
  | { readonly success: false; readonly error: E };

/** The success variant of a Result. */
export type Ok<T> = Extract<Result<T, never>, { readonly success: true }>;

/** The failure variant of a Result. */
export type Err<E> = Extract<Result<never, E>, { readonly success: false }>;

/** Creates a successful Result. */
export const ok = <T>(data: T): Result<T, never> =>
  Object.freeze({ success: true as const, data });

/** Creates a failed Result. */
export const err = <E>(error: E): Result<never, E> =>
  Object.freeze({ success: false as const, error });

/** Narrows a Result to its success variant. */
export const isOk = <T, E>(result: Result<T, E>): result is Ok<T> =>
  result.success;

/** Narrows a Result to its failure variant. */
export const isErr = <T, E>(result: Result<T, E>): result is Err<E> =>
  !result.success;

/**
 * Maps over a successful Result, passing through errors unchanged.
 *
 * @param result - The Result to map over
 * @param fn - The function to apply to the success value
 * @returns A new Result with the mapped value or the original error
 */
export const mapResult = <T, U, E>(
  result: Result<T, E>,
  fn: (data: T) => U,
): Result<U, E> => (result.success ? ok(fn(result.data)) : result);

/**
 * Chains Result-returning operations, short-circuiting on the first error.
 *
 * @param result - The Result to chain from
 * @param fn - The function that returns a new Result
 * @returns The chained Result or the original error
 */
export const flatMapResult = <T, U, E, F = E>(
  result: Result<T, E>,
  fn: (data: T) => Result<U, F>,
): Result<U, E | F> => (result.success ? fn(result.data) : result);

/**
 * Maps over a failed Result, passing through successes unchanged.
 *
 * @param result - The Result to map over
 * @param fn - The function to apply to the error value
 * @returns The original success or a new Result with the mapped error
 */
export const mapErrorResult = <T, E, F>(
  result: Result<T, E>,
  fn: (error: E) => F,
): Result<T, F> => (result.success ? result : err(fn(result.error)));

/**
 * Returns the success value, or throws the error payload exactly as stored.
 *
 * @example
 * ```ts
 * try {
 *   const rates = getResult(await client.fetchExchangeRates("2010-01-12"));
 * } catch (error) {
 *   // error is the ExchangeRatesError from the failed Result
 * }
 * ```
 */
export const getResult = <T, E>(result: Result<T, E>): T => {
  if (result.success) return result.data;
  throw result.error;
};

/**
 * Runs a function that may throw and captures its outcome as a Result.
 * Whatever was thrown becomes the error payload, untouched.
 */
export const tryResult = <T>(fn: () => T): Result<T, unknown> => {
  try {
    return ok(fn());
  } catch (cause) {
    return err(cause);
  }
};

/** Case handlers for {@link matchResult}. */
export interface ResultCases<T, E, R> {
  readonly success: (data: T) => R;
  readonly failure: (error: E) => R;
}

/** Exhaustive case analysis over a Result. */
export const matchResult = <T, E, R>(
  result: Result<T, E>,
  cases: ResultCases<T, E, R>,
): R =>
  result.success ? cases.success(result.data) : cases.failure(result.error);
