/**
 * Structured fan-out: run one task per item, join them all, fail on the first error.
 *
 * Tasks share a child AbortSignal. It aborts when the parent signal aborts or
 * when any task fails, so siblings stop at their next signal check.
 */
export async function gather<T, R>(
  items: readonly T[],
  run: (item: T, signal: AbortSignal) => Promise<R>,
  parent?: AbortSignal,
): Promise<R[]> {
  const controller = new AbortController();
  const onParentAbort = () => controller.abort(parent?.reason);
  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  try {
    return await Promise.all(
      items.map(async (item) => {
        try {
          return await run(item, controller.signal);
        } catch (err) {
          controller.abort(err);
          throw err;
        }
      }),
    );
  } finally {
    parent?.removeEventListener('abort', onParentAbort);
  }
}
