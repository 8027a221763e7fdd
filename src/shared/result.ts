/**
 * Result type implementing Totality principle
 * All functions should return Result instead of throwing exceptions
 */

export type Result<T, E = Error> =
  | { ok: true; data: T }
  | { ok: false; error: E };

export const success = <T>(data: T): Result<T, never> => ({
  ok: true,
  data,
});

export const failure = <E>(error: E): Result<never, E> => ({
  ok: false,
  error,
});

/**
 * Normalize anything thrown into an Error
 */
export const toError = (error: unknown): Error => {
  return error instanceof Error ? error : new Error(String(error));
};

/**
 * Try-catch wrapper that returns Result
 */
export const tryResult = async <T>(
  fn: () => Promise<T> | T,
): Promise<Result<T, Error>> => {
  try {
    const result = await fn();
    return success(result);
  } catch (error) {
    return failure(toError(error));
  }
};
