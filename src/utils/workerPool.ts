export type TaskOutcome<R> =
  | { status: 'fulfilled'; value: R }
  | { status: 'rejected'; reason: unknown }
  | { status: 'skipped'; reason: 'deadline' | 'aborted' };

export interface WorkerPoolOptions {
  /** Maximum tasks in flight */
  concurrency: number;
  /** Epoch ms after which no new task is started */
  deadline?: number;
  /** Returning true for a task error stops the pool from starting further tasks */
  shouldAbort?: (error: unknown) => boolean;
  now?: () => number;
}

/**
 * Runs `worker` over `items` with bounded concurrency.
 * Outcomes are returned in input order regardless of completion order. Tasks
 * already running when the deadline passes or an abort is raised finish
 * normally; the rest are reported as skipped.
 */
export async function runPool<T, R>(
  items: readonly T[],
  worker: (item: T, index: number) => Promise<R>,
  options: WorkerPoolOptions,
): Promise<TaskOutcome<R>[]> {
  const now = options.now ?? Date.now;
  const outcomes = new Array<TaskOutcome<R>>(items.length);
  let next = 0;
  let aborted = false;

  async function runOne(): Promise<void> {
    while (next < items.length) {
      const index = next++;

      if (aborted) {
        outcomes[index] = { status: 'skipped', reason: 'aborted' };
        continue;
      }
      if (options.deadline !== undefined && now() >= options.deadline) {
        outcomes[index] = { status: 'skipped', reason: 'deadline' };
        continue;
      }

      try {
        outcomes[index] = { status: 'fulfilled', value: await worker(items[index], index) };
      } catch (error) {
        outcomes[index] = { status: 'rejected', reason: error };
        if (options.shouldAbort?.(error)) {
          aborted = true;
        }
      }
    }
  }

  const workers = Math.max(1, Math.min(options.concurrency, items.length));
  await Promise.all(Array.from({ length: workers }, () => runOne()));
  return outcomes;
}
