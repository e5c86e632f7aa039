/**
 * Returns a function that invokes `fn` on its first call and hands every
 * caller, concurrent or later, the same promise.
 */
export function once<T>(fn: () => Promise<T>): () => Promise<T> {
  let pending: Promise<T> | undefined;
  return () => {
    pending ??= fn();
    return pending;
  };
}
