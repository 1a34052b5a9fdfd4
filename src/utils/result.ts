/**
 * Result Helpers
 *
 * Tagged success/failure values. Every unit the client delivers, streamed
 * or not, is one of these.
 */

export interface SuccessResult<T> {
  success: true;
  data: T;
}

export interface FailureResult<E> {
  success: false;
  error: E;
}

export type Result<T, E = Error> = SuccessResult<T> | FailureResult<E>;

export function success<T>(data: T): SuccessResult<T> {
  return { success: true, data };
}

export function failure<E>(error: E): FailureResult<E> {
  return { success: false, error };
}

/**
 * Normalize anything caught into an Error
 */
export function toError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }
  return new Error(typeof error === "string" ? error : "Unknown error");
}
