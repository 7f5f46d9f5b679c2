/**
 * Run `fn` and return the error it throws, which must be a `type`.
 */
export function captureError<T extends Error>(
  fn: () => unknown,
  type: new (...args: never[]) => T
): T {
  try {
    fn();
  } catch (error) {
    if (error instanceof type) return error;
    throw error;
  }
  throw new Error('expected function to throw');
}

/**
 * Async counterpart of captureError.
 */
export async function captureRejection<T extends Error>(
  promise: Promise<unknown>,
  type: new (...args: never[]) => T
): Promise<T> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof type) return error;
    throw error;
  }
  throw new Error('expected promise to reject');
}
