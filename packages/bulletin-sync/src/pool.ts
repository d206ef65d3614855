import type { Logger } from "@bulletin/interface";
import { silentLogger } from "@bulletin/interface";

type Task = () => Promise<void>;

/**
 * Runs submitted tasks with at most `concurrency` in flight. A task that
 * rejects is logged; it never stops the pool.
 */
export class TaskPool {
  private readonly queue: Task[] = [];
  private running = 0;
  private idleWaiters: Array<() => void> = [];

  constructor(
    readonly concurrency: number,
    private readonly logger: Logger = silentLogger
  ) {
    if (!Number.isInteger(concurrency) || concurrency < 1) throw new Error(`invalid concurrency: ${concurrency}`);
  }

  get pending(): number {
    return this.running + this.queue.length;
  }

  submit(task: Task): void {
    this.queue.push(task);
    this.drain();
  }

  whenIdle(): Promise<void> {
    if (this.pending === 0) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  private drain(): void {
    while (this.running < this.concurrency) {
      const task = this.queue.shift();
      if (!task) break;
      this.running += 1;
      void this.run(task);
    }
    if (this.pending === 0) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      for (const resolve of waiters) resolve();
    }
  }

  private async run(task: Task): Promise<void> {
    try {
      await task();
    } catch (err) {
      this.logger.error("pool task failed", { err });
    } finally {
      this.running -= 1;
      this.drain();
    }
  }
}
