/**
 * tryFn - run a function and get its outcome as a tuple instead of a throw.
 *
 * Returns:
 *   - [true, null, data] when the function (or its promise) succeeded
 *   - [false, error, undefined] when it threw or rejected
 *
 * Thrown non-Error values are wrapped in an FtpTreeError.
 */
import { FtpTreeError } from '../core/errors.js';

export type TryResult<T> = [true, null, T] | [false, Error, undefined];

export async function tryFn<T>(fn: () => Promise<T> | T): Promise<TryResult<T>> {
  try {
    const data = await fn();
    return [true, null, data];
  } catch (error) {
    return [false, wrapUnknownError(error, 'Function threw an error'), undefined];
  }
}

export default tryFn;

function wrapUnknownError(err: unknown, context: string): Error {
  if (err instanceof Error) return err;
  return new FtpTreeError(
    `${context}: ${String(err)}`,
    ['Inspect the original value being thrown.', 'Ensure errors are instances of Error.']
  );
}
