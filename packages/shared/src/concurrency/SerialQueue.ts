/**
 * Runs tasks one at a time in submission order. A failing task does not stop
 * the tasks queued behind it.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  get size(): number {
    return this.pending;
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    this.pending += 1;
    const result = this.tail.then(task);
    this.tail = result.then(
      () => {
        this.pending -= 1;
      },
      () => {
        this.pending -= 1;
      },
    );
    return result;
  }

  /** Resolves once every task submitted so far has settled. */
  async drain(): Promise<void> {
    await this.tail;
  }
}

/**
 * One SerialQueue per key. Queues are dropped once idle so the map does not
 * grow with the number of keys ever seen.
 */
export class KeyedSerialQueue {
  private queues = new Map<string, SerialQueue>();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    let queue = this.queues.get(key);
    if (!queue) {
      queue = new SerialQueue();
      this.queues.set(key, queue);
    }
    const owner = queue;
    return owner.run(task).finally(() => {
      if (owner.size === 0 && this.queues.get(key) === owner) {
        this.queues.delete(key);
      }
    });
  }

  get activeKeys(): number {
    return this.queues.size;
  }
}
