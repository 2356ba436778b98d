import { errorMessage, logger } from '../logger';

export type BackgroundTask = (signal: AbortSignal) => Promise<void>;

interface RunningTask {
  name: string;
  controller: AbortController;
  done: Promise<void>;
}

/**
 * Detached work that outlives the request that started it, such as waiting
 * for an invoice to be paid. Each task gets its own deadline; the signal it
 * receives aborts on that deadline or on {@link BackgroundTasks.shutdown}.
 * Failures are logged, never rethrown.
 */
export class BackgroundTasks {
  private readonly running = new Map<number, RunningTask>();
  private nextId = 1;
  private closed = false;

  spawn(name: string, task: BackgroundTask, timeoutMs: number) {
    if (this.closed) {
      logger.warn('Background task rejected during shutdown', { task: name });
      return;
    }
    const id = this.nextId;
    this.nextId += 1;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    const done = Promise.resolve()
      .then(() => task(controller.signal))
      .catch((error: unknown) => {
        logger.error('Background task failed', { task: name, message: errorMessage(error) });
      })
      .finally(() => {
        clearTimeout(timer);
        this.running.delete(id);
      });
    this.running.set(id, { name, controller, done });
  }

  get size() {
    return this.running.size;
  }

  /** Resolves once every task, including ones spawned meanwhile, has settled. */
  async idle() {
    while (this.running.size > 0) {
      await Promise.all([...this.running.values()].map((entry) => entry.done));
    }
  }

  async shutdown() {
    this.closed = true;
    for (const entry of this.running.values()) {
      logger.info('Cancelling background task', { task: entry.name });
      entry.controller.abort();
    }
    await this.idle();
  }
}
