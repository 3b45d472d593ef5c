/**
 * Invariant assertions for internal consistency
 *
 * These guard conditions the public API cannot produce. A failure here is a
 * bug in tagtree, not in the caller.
 */

/**
 * Assert a condition; throw with context if false
 * @internal
 */
export function invariant(
  condition: boolean,
  message: string,
  context?: Record<string, unknown>
): asserts condition {
  if (!condition) {
    const contextStr = context ? '\n' + JSON.stringify(context, null, 2) : '';
    throw new Error(`[tagtree invariant] ${message}${contextStr}`);
  }
}
