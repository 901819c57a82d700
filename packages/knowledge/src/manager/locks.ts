import pLimit from 'p-limit';
import type { LimitFunction } from 'p-limit';

/**
 * Serializes work per key: tasks for the same issue run one at a time in
 * arrival order, tasks for different issues run independently.
 */
export class IssueLocks {
  private readonly queues = new Map<string, { limit: LimitFunction; users: number }>();

  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    let queue = this.queues.get(key);
    if (!queue) {
      queue = { limit: pLimit(1), users: 0 };
      this.queues.set(key, queue);
    }
    const entry = queue;
    entry.users++;
    try {
      return await entry.limit(task);
    } finally {
      entry.users--;
      if (entry.users === 0) {
        this.queues.delete(key);
      }
    }
  }

  /** True while a task for `key` is running or waiting. */
  isBusy(key: string): boolean {
    return this.queues.has(key);
  }
}
