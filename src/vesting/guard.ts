import { AsyncLocalStorage } from 'node:async_hooks';
import { VestingError } from './errors.js';

/**
 * Serializes state-changing operations. Independent callers wait their turn
 * in arrival order; a call made from inside a running operation (for
 * example from a token callback during a transfer) would wait on itself,
 * so it is rejected with `ReentrantCall` instead.
 */
export class ReentrancyGuard {
  private readonly context = new AsyncLocalStorage<string>();
  private tail: Promise<void> = Promise.resolve();
  private active: string | null = null;
  private queued = 0;

  get entered(): boolean {
    return this.active !== null;
  }

  /** Operations waiting behind the active one */
  get pending(): number {
    return this.queued;
  }

  async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    const inProgress = this.context.getStore();
    if (inProgress !== undefined) {
      throw new VestingError('ReentrantCall', `${operation} called while ${inProgress} is in progress`, {
        operation,
        inProgress,
      });
    }

    let release: () => void = () => {};
    const done = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => done);

    this.queued++;
    await previous;
    this.queued--;

    this.active = operation;
    try {
      return await this.context.run(operation, fn);
    } finally {
      this.active = null;
      release();
    }
  }
}
