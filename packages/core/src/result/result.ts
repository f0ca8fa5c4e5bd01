export type Result<T, E> =
  | { success: true; data: T }
  | { success: false; error: E };

export const ok = <T, E = never>(data: T): Result<T, E> => ({
  success: true,
  data,
});

export const err = <E, T = never>(error: E): Result<T, E> => ({
  success: false,
  error,
});

/**
 * Rewrites the error of a failed result, passing successes through untouched.
 */
export const mapErr = <T, E1, E2>(
  result: Result<T, E1>,
  fn: (error: E1) => E2
): Result<T, E2> => {
  if (result.success) return result;
  return err(fn(result.error));
};

export type Option<T> = Result<T, undefined>;

export const some = <T>(data: T): Option<T> => ok(data);

const NONE = Object.freeze(err(undefined));

export const none = <T>(): Option<T> => NONE;
