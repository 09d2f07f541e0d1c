export type MaybePromise<T> = T | Promise<T>;

export function isPromise<T>(value: MaybePromise<T>): value is Promise<T> {
  return value instanceof Promise;
}

/**
 * Apply `fn` to a value that may or may not be pending. Stays synchronous
 * for synchronous input.
 */
export function mapMaybe<T, U>(
  value: MaybePromise<T>,
  fn: (resolved: T) => MaybePromise<U>
): MaybePromise<U> {
  return isPromise(value) ? value.then(fn) : fn(value);
}

/**
 * Visit `items` in order, stopping early when `visit` returns `true`.
 * Stays synchronous until the first visit returns a promise.
 */
export function eachMaybe<T>(
  items: readonly T[],
  visit: (item: T, index: number) => MaybePromise<boolean>,
  start = 0
): MaybePromise<void> {
  for (let i = start; i < items.length; i++) {
    const outcome = visit(items[i], i);
    if (isPromise(outcome)) {
      return outcome.then((stop): MaybePromise<void> =>
        stop ? undefined : eachMaybe(items, visit, i + 1)
      );
    }
    if (outcome) return undefined;
  }
  return undefined;
}
