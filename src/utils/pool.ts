/**
 * Bounded fan-out: runs `worker` over `items` with at most `limit` tasks in
 * flight and resolves with the results in input order.
 *
 * Fail-fast: the first rejection (or an abort of `signal`) rejects the whole
 * call immediately. Tasks still in flight are told to stop through the
 * AbortSignal handed to each worker, but are not awaited; whatever they
 * produce afterwards is discarded.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number, signal: AbortSignal) => Promise<R>,
  signal?: AbortSignal,
): Promise<R[]> {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`mapWithConcurrency: limit must be a positive integer (got ${limit})`);
  }
  signal?.throwIfAborted();
  if (items.length === 0) return [];

  const controller = new AbortController();
  const queue = items.entries();
  const results = new Array<R>(items.length);

  return new Promise<R[]>((resolve, reject) => {
    let settled = false;

    const finish = (err?: unknown, value?: R[]): void => {
      if (settled) return;
      settled = true;
      signal?.removeEventListener('abort', onAbort);
      if (value) {
        resolve(value);
      } else {
        controller.abort(err);
        reject(err);
      }
    };

    const onAbort = (): void => finish(signal?.reason);
    signal?.addEventListener('abort', onAbort, { once: true });

    const runNext = async (): Promise<void> => {
      for (let step = queue.next(); !step.done; step = queue.next()) {
        if (settled) return;
        const [index, item] = step.value;
        results[index] = await worker(item, index, controller.signal);
      }
    };

    const workers: Promise<void>[] = [];
    for (let i = 0; i < Math.min(limit, items.length); i++) {
      workers.push(runNext());
    }

    void Promise.all(workers).then(() => finish(undefined, results), (err: unknown) => finish(err));
  });
}
