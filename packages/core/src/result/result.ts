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
 * Lift a step that may fail so it runs only on a successful result.
 * Errors pass through unchanged.
 */
export function andThen<T1, T2, E>(
  fn: (data: T1) => Result<T2, E>
): (result: Result<T1, E>) => Result<T2, E> {
  return (result) => (result.success ? fn(result.data) : result);
}
