/**
 * Runs async tasks one at a time per key, in the order they were enqueued.
 * Tasks under different keys do not wait on each other.
 */
export class KeyedQueue {
  private tails = new Map<string, Promise<void>>();
  private pending = new Map<string, number>();

  enqueue<T>(key: string, task: () => Promise<T> | T): Promise<T> {
    const current = this.tails.get(key) ?? Promise.resolve();
    this.pending.set(key, (this.pending.get(key) ?? 0) + 1);
    const next = current.then(task);
    // a rejected task must not stall the tasks queued behind it
    const tail = next.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);
    return next.finally(() => {
      const remaining = (this.pending.get(key) ?? 1) - 1;
      if (remaining <= 0) {
        this.pending.delete(key);
        if (this.tails.get(key) === tail) this.tails.delete(key);
      } else {
        this.pending.set(key, remaining);
      }
    });
  }

  isBusy(key: string): boolean {
    return (this.pending.get(key) ?? 0) > 0;
  }
}
