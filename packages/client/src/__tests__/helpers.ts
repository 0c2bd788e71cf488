/**
 * Shared test helpers
 */

/**
 * Runs `fn` and returns what it threw; fails the test when nothing is thrown.
 */
export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected the call to throw');
}

/**
 * Starts an operation in its callback form and resolves with what the
 * callback receives.
 */
export function settle(start: (callback: (error: Error | null, result?: unknown) => void) => void): Promise<unknown> {
  return new Promise((resolve, reject) => {
    start((error, result) => (error ? reject(error) : resolve(result)));
  });
}
