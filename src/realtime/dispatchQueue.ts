// src/realtime/dispatchQueue.ts
import type { Logger } from 'pino';
import { createLogger } from '../observability/logger';

export type DispatchTask = () => Promise<unknown>;

/**
 * FIFO of delivery tasks, drained off the request path on setImmediate.
 * Tasks run one at a time in enqueue order; a failing task is logged and
 * the queue moves on.
 */
export class DispatchQueue {
  private readonly tasks: DispatchTask[] = [];
  private draining: Promise<void> | null = null;

  constructor(private readonly log: Logger = createLogger('realtime/dispatch')) {}

  get size(): number {
    return this.tasks.length;
  }

  enqueue(task: DispatchTask): void {
    this.tasks.push(task);
    if (!this.draining) {
      this.draining = new Promise<void>((resolve) => setImmediate(resolve)).then(() => this.drain());
    }
  }

  /** Resolves once every task enqueued so far (and any they enqueue) has run. */
  async flush(): Promise<void> {
    while (this.draining) {
      await this.draining;
    }
  }

  private async drain(): Promise<void> {
    try {
      let task = this.tasks.shift();
      while (task) {
        try {
          await task();
        } catch (err) {
          this.log.error({ err }, 'dispatch task failed');
        }
        task = this.tasks.shift();
      }
    } finally {
      this.draining = null;
    }
  }
}
