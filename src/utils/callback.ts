/**
 * Bridges between Results and the other async styles: promises and
 * Node-style `(error, value)` callbacks.
 */

import { type Result, ok, err } from "../types/common.js";

/** A completion handler receiving a Result. */
export type Completion<T, E> = (result: Result<T, E>) => void;

/** A Node-style callback. */
export type NodeCallback<T> = (error: unknown, value?: T) => void;

/**
 * Awaits a promise-returning function and captures its outcome as a Result.
 * A synchronous throw is captured the same way as a rejection.
 */
export const tryResultAsync = async <T>(
  fn: () => Promise<T>,
): Promise<Result<T, unknown>> => {
  try {
    return ok(await fn());
  } catch (cause) {
    return err(cause);
  }
};

/**
 * Adapts a Result completion into a Node-style callback, so callback APIs can
 * report through a single Result.
 *
 * A non-nullish `error` becomes a failure. Otherwise `value` is a success;
 * `missing` supplies the failure when the API reported neither.
 *
 * @example
 * ```ts
 * fs.readFile(path, toResultCallback((result) => {
 *   if (result.success) handleData(result.data);
 * }));
 * ```
 */
export const toResultCallback = <T>(
  completion: Completion<T, unknown>,
  missing: () => unknown = () =>
    new Error("Callback reported neither an error nor a value"),
): NodeCallback<T> =>
  (error, value) => {
    if (error != null) {
      completion(err(error));
      return;
    }
    if (value === undefined) {
      completion(err(missing()));
      return;
    }
    completion(ok(value));
  };

/**
 * Delivers the Result of a promise to a completion handler.
 *
 * The returned promise settles after the completion ran and rejects only if
 * the completion itself throws.
 */
export const withCompletion = async <T, E>(
  pending: Promise<Result<T, E>>,
  completion: Completion<T, E>,
): Promise<void> => {
  completion(await pending);
};
