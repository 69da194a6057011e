import type { Result } from "../models";
import { getGroundedError } from "./error-parser";

/**
 * A higher-order function that wraps a promise-returning function in a try-catch
 * block. It's our standard way to turn a throwing collaborator into a
 * predictable `Result` object, so nothing escapes an operation as a raw `throw`.
 *
 * @param promiseFn A function that returns a Promise. This is the core logic.
 * @param errorFn An optional, custom error parser. Defaults to `getGroundedError`.
 */
export async function tryCatch<T>(
  promiseFn: () => Promise<T>,
  errorFn: (error: unknown) => string = getGroundedError,
): Promise<Result<T>> {
  try {
    const data = await promiseFn();
    return { success: true, data, error: null };
  } catch (caughtError) {
    return {
      success: false,
      data: null,
      error: new Error(errorFn(caughtError)),
    };
  }
}

/**
 * The synchronous sibling of `tryCatch`. It keeps the caught value untouched
 * (wrapped in an Error if it wasn't one) so callers can still inspect it.
 */
export function tryCatchSync<T>(fn: () => T): Result<T, unknown> {
  try {
    const data = fn();
    return { success: true, data, error: null };
  } catch (caughtError) {
    return { success: false, data: null, error: caughtError };
  }
}

/**
 * Like `tryCatch`, but keeps the raw rejection reason so the caller can tell a
 * fault from an abort. See `isIndeterminate`.
 */
export async function settle<T>(
  promiseFn: () => Promise<T>,
): Promise<Result<T, unknown>> {
  try {
    const data = await promiseFn();
    return { success: true, data, error: null };
  } catch (caughtError) {
    return { success: false, data: null, error: caughtError };
  }
}
