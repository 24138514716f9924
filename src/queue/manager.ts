import PQueue from 'p-queue';

/**
 * Runs widget operations one at a time, in submission order.
 * A flatten and the mutation that triggered it never interleave with
 * another operation.
 */
export class OperationQueue {
  private queue: PQueue;

  constructor(concurrency: number = 1) {
    // Concurrency 1 keeps mutations and their flatten serial
    this.queue = new PQueue({ concurrency });
  }

  async add<T>(fn: () => Promise<T> | T): Promise<T> {
    return this.queue.add(fn, { throwOnTimeout: true });
  }

  getSize(): number {
    return this.queue.size;
  }

  getPending(): number {
    return this.queue.pending;
  }

  async waitForIdle(): Promise<void> {
    await this.queue.onIdle();
  }
}
