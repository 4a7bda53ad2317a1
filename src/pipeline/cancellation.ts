/**
 * Passes `items` through until `signal` aborts. The signal is checked before
 * each pull, so nothing more is requested from upstream once it is set.
 */
export async function* untilAborted<T>(
  items: AsyncIterable<T>,
  signal?: AbortSignal
): AsyncGenerator<T, void, undefined> {
  if (!signal) {
    yield* items;
    return;
  }

  const iterator = items[Symbol.asyncIterator]();
  try {
    while (!signal.aborted) {
      const next = await iterator.next();
      if (next.done) {
        return;
      }
      yield next.value;
    }
  } finally {
    await iterator.return?.();
  }
}
