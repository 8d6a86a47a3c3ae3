/**
 * Test helpers shared across the package's unit tests.
 *
 * @module testing
 */

/**
 * Run `fn` and return what it threw. Fails if it returns normally.
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}
