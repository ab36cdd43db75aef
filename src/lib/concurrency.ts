export class TimeoutError extends Error {
  constructor(ms: number, label: string) {
    super(`Timeout after ${ms}ms: ${label}`);
    this.name = 'TimeoutError';
  }
}

// Propagates an abort from `parent` to `child`. Returns the unlink function.
export function linkAbortSignal(parent: AbortSignal | undefined, child: AbortController): () => void {
  if (!parent) return () => {};
  if (parent.aborted) {
    child.abort(parent.reason);
    return () => {};
  }
  const onAbort = () => child.abort(parent.reason);
  parent.addEventListener('abort', onAbort, { once: true });
  return () => parent.removeEventListener('abort', onAbort);
}

/**
 * Runs `operation` with its own abort signal, which fires after `ms` or when `parent` aborts.
 * The returned promise settles as soon as either happens; the operation is told to stop through the signal.
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  ms: number,
  label: string,
  parent?: AbortSignal
): Promise<T> {
  parent?.throwIfAborted();
  const controller = new AbortController();
  const unlink = linkAbortSignal(parent, controller);
  const id = setTimeout(() => controller.abort(new TimeoutError(ms, label)), ms);

  const aborted = new Promise<never>((_, reject) => {
    if (controller.signal.aborted) {
      reject(controller.signal.reason);
      return;
    }
    controller.signal.addEventListener('abort', () => reject(controller.signal.reason), { once: true });
  });

  try {
    return await Promise.race([operation(controller.signal), aborted]);
  } finally {
    clearTimeout(id);
    unlink();
  }
}

/**
 * Maps `items` through `fn` with at most `limit` calls in flight. Each item settles on its own,
 * so one rejection does not affect the others. Stops taking new items once `signal` aborts.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal
): Promise<PromiseSettledResult<R>[]> {
  const results: PromiseSettledResult<R>[] = new Array(items.length);
  const workers = Math.max(1, Math.min(Math.floor(limit) || 1, items.length));
  let next = 0;

  const worker = async () => {
    while (next < items.length) {
      if (signal?.aborted) return;
      const index = next++;
      try {
        results[index] = { status: 'fulfilled', value: await fn(items[index], index) };
      } catch (reason) {
        results[index] = { status: 'rejected', reason };
      }
    }
  };

  await Promise.all(Array.from({ length: workers }, () => worker()));
  signal?.throwIfAborted();
  return results;
}
