import { toError } from '../lib/errors.js';
import { getLogger } from '../lib/logger.js';

type Outcome<T> = { ok: true; value: T } | { ok: false; error: unknown };

interface Slot<T> {
  index: number;
  outcome: Outcome<T> | null;
}

/**
 * Bounded pool of uploads whose results are committed strictly in submission order.
 *
 * - At most `concurrency` submitted items are uncommitted at once (`waitForRoom`).
 * - A completed item commits only after every earlier item has committed.
 * - After a failure nothing past the failed item commits; earlier items still in
 *   flight finish and commit. Running tasks are never abandoned.
 */
export class UploadQueue<T> {
  private pending: Slot<T>[] = [];
  private running = new Set<Promise<void>>();
  private failure: unknown = null;
  private halted = false;
  private lastSubmitted = -1;
  private flushing: Promise<void> = Promise.resolve();
  private waiters: Array<() => void> = [];
  private logger = getLogger();

  constructor(
    private readonly concurrency: number,
    private readonly commit: (index: number, value: T) => Promise<void>
  ) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`Upload concurrency must be a positive integer, got: ${concurrency}`);
    }
  }

  /**
   * Start a task. Indices must be submitted in increasing order.
   * @throws the first recorded failure, once there is one
   */
  submit(index: number, task: () => Promise<T>): void {
    this.throwIfFailed();

    if (index <= this.lastSubmitted) {
      throw new RangeError(`Batch ${index} submitted after batch ${this.lastSubmitted}`);
    }
    this.lastSubmitted = index;

    const slot: Slot<T> = { index, outcome: null };
    this.pending.push(slot);

    const run: Promise<void> = Promise.resolve()
      .then(task)
      .then(
        (value) => {
          slot.outcome = { ok: true, value };
        },
        (error: unknown) => {
          slot.outcome = { ok: false, error };
          this.fail(error);
        }
      )
      .then(() => this.scheduleFlush())
      .finally(() => {
        this.running.delete(run);
        this.notify();
      });

    this.running.add(run);
  }

  /**
   * Resolve once fewer than `concurrency` items are uncommitted
   * @throws the first recorded failure
   */
  async waitForRoom(): Promise<void> {
    while (this.pending.length >= this.concurrency && this.failure === null) {
      await this.nextChange();
    }
    this.throwIfFailed();
  }

  /**
   * Wait for every running task and every possible commit
   * @throws the first recorded failure
   */
  async drain(): Promise<void> {
    await this.settle();
    this.throwIfFailed();
  }

  /**
   * Wait for every running task and every possible commit, without reporting failures
   */
  async settle(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.all([...this.running]);
    }
    await this.flushing;
  }

  get uncommitted(): number {
    return this.pending.length;
  }

  private scheduleFlush(): Promise<void> {
    this.flushing = this.flushing.then(() => this.flush());
    return this.flushing;
  }

  private async flush(): Promise<void> {
    while (!this.halted) {
      const head = this.pending[0];
      if (!head || head.outcome === null) {
        return;
      }

      if (!head.outcome.ok) {
        // Nothing past a failed batch may commit
        this.halted = true;
        return;
      }

      try {
        await this.commit(head.index, head.outcome.value);
      } catch (error) {
        this.halted = true;
        this.fail(error);
        return;
      }

      this.pending.shift();
      this.notify();
    }
  }

  private fail(error: unknown): void {
    if (this.failure === null) {
      this.failure = error;
      this.logger.warn({ error: toError(error) }, 'Upload queue stopped accepting work');
    }
    this.notify();
  }

  private throwIfFailed(): void {
    if (this.failure !== null) {
      throw this.failure;
    }
  }

  private nextChange(): Promise<void> {
    return new Promise(resolve => this.waiters.push(resolve));
  }

  private notify(): void {
    const waiters = this.waiters;
    this.waiters = [];
    waiters.forEach(resolve => resolve());
  }
}
