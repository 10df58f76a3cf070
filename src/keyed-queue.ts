import pLimit, { type LimitFunction } from "p-limit";

/**
 * One serial queue per key. Tasks for the same key run one at a time in
 * submission order; different keys run independently. Idle queues are
 * released.
 */
export class KeyedQueue {
  private readonly queues = new Map<string, LimitFunction>();

  public run<T>(key: string, task: () => Promise<T>): Promise<T> {
    let limit = this.queues.get(key);
    if (!limit) {
      limit = pLimit(1);
      this.queues.set(key, limit);
    }
    const queue = limit;
    return queue(task).finally(() => {
      if (queue.activeCount === 0 && queue.pendingCount === 0 && this.queues.get(key) === queue) {
        this.queues.delete(key);
      }
    });
  }

  /** Number of keys with queued or running work. */
  public activeKeys(): number {
    return this.queues.size;
  }
}
