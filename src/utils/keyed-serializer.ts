import PQueue from 'p-queue';

/**
 * Runs tasks one at a time per key, in submission order. Tasks on different keys run
 * concurrently. A key's queue is dropped once it drains.
 */
export class KeyedSerializer {
  private queues: Map<string, PQueue> = new Map();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    let queue = this.queues.get(key);
    if (!queue) {
      queue = new PQueue({ concurrency: 1 });
      this.queues.set(key, queue);
    }

    const owner = queue;
    return owner.add(task).finally(() => {
      if (owner.size === 0 && owner.pending === 0 && this.queues.get(key) === owner) {
        this.queues.delete(key);
      }
    });
  }

  isBusy(key: string): boolean {
    return this.queues.has(key);
  }

  get activeKeys(): number {
    return this.queues.size;
  }
}
