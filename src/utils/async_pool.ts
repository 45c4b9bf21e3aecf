export async function asyncPool<T, R>(
  items: T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  if (concurrency < 1) {
    throw new Error("Concurrency must be at least 1");
  }

  const results: R[] = new Array(items.length);
  let nextIndex = 0;

  async function runWorker() {
    while (true) {
      const current = nextIndex;
      nextIndex += 1;
      if (current >= items.length) {
        return;
      }
      results[current] = await worker(items[current], current);
    }
  }

  const workers = Array.from(
    { length: Math.min(concurrency, items.length) },
    () => runWorker()
  );
  await Promise.all(workers);
  return results;
}

export class QueueFullError extends Error {
  constructor(limit: number) {
    super(`Task queue is full (${limit} pending)`);
    this.name = "QueueFullError";
  }
}

type QueuedTask = {
  label: string;
  run: () => Promise<void>;
};

/**
 * Bounded background executor. `submit` returns a handle that settles with the
 * task's own result; callers may await it or detach.
 */
export class TaskPool {
  private queue: QueuedTask[] = [];
  private active = 0;

  constructor(private concurrency: number, private queueLimit: number) {
    if (concurrency < 1) {
      throw new Error("Concurrency must be at least 1");
    }
  }

  submit<R>(label: string, fn: () => Promise<R>): Promise<R> {
    if (this.queue.length >= this.queueLimit) {
      throw new QueueFullError(this.queueLimit);
    }
    return new Promise<R>((resolve, reject) => {
      this.queue.push({
        label,
        run: () => fn().then(resolve, reject)
      });
      this.drain();
    });
  }

  stats() {
    return { active: this.active, queued: this.queue.length };
  }

  private drain() {
    while (this.active < this.concurrency && this.queue.length > 0) {
      const task = this.queue.shift();
      if (!task) {
        return;
      }
      this.active += 1;
      void task.run().finally(() => {
        this.active -= 1;
        this.drain();
      });
    }
  }
}
