import { describeError } from "../errors";
import { componentLogger, type Logger } from "../logger";

export type JobHandler<T> = (argument: T) => Promise<unknown>;

/**
 * Deferred, at-least-once unit of work. Retry and backoff belong to the implementation.
 */
export interface JobScheduler {
  enqueue: <T>(name: string, handler: JobHandler<T>, argument: T) => string;
}

export interface FailedJob {
  id: string;
  name: string;
  attempts: number;
  error: string;
}

export interface InProcessJobSchedulerOptions {
  maxAttempts?: number;
  retryDelayMs?: number;
  logger?: Logger;
  onJobFailed?: (job: FailedJob) => void;
}

interface QueuedJob {
  id: string;
  name: string;
  run: () => Promise<unknown>;
}

function sleep(delayMs: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, delayMs);
  });
}

/**
 * FIFO queue drained one job at a time on a later tick. A job that throws is retried up
 * to `maxAttempts` times; after that it is logged and reported through `onJobFailed`.
 */
export class InProcessJobScheduler implements JobScheduler {
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;
  private readonly logger: Logger;
  private readonly onJobFailed: ((job: FailedJob) => void) | undefined;
  private readonly queue: QueuedJob[] = [];
  private readonly timers = new Set<NodeJS.Timeout>();
  private readonly idleWaiters: Array<() => void> = [];
  private draining = false;
  private sequence = 0;

  constructor(options: InProcessJobSchedulerOptions = {}) {
    this.maxAttempts = Math.max(1, Math.floor(options.maxAttempts ?? 3));
    this.retryDelayMs = Math.max(0, Math.floor(options.retryDelayMs ?? 1_000));
    this.logger = componentLogger(options.logger, "scheduler");
    this.onJobFailed = options.onJobFailed;
  }

  enqueue<T>(name: string, handler: JobHandler<T>, argument: T): string {
    this.sequence += 1;
    const id = `${name}#${this.sequence}`;
    this.queue.push({ id, name, run: () => handler(argument) });
    this.logger.info("Job enqueued", { jobId: id });

    if (!this.draining) {
      this.draining = true;
      setImmediate(() => {
        void this.drain();
      });
    }

    return id;
  }

  /**
   * Runs `handler` every `intervalMs` until the returned function (or {@link stop}) is
   * called. Each tick goes through the queue, so ticks never overlap.
   */
  scheduleRecurring(name: string, intervalMs: number, handler: () => Promise<unknown>): () => void {
    const timer = setInterval(() => {
      this.enqueue(name, handler, undefined);
    }, Math.max(1, intervalMs));
    timer.unref();
    this.timers.add(timer);

    return () => {
      clearInterval(timer);
      this.timers.delete(timer);
    };
  }

  whenIdle(): Promise<void> {
    if (!this.draining && this.queue.length === 0) {
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  stop(): void {
    for (const timer of this.timers) {
      clearInterval(timer);
    }
    this.timers.clear();
  }

  private async drain(): Promise<void> {
    try {
      let job = this.queue.shift();
      while (job) {
        await this.runWithRetries(job);
        job = this.queue.shift();
      }
    } finally {
      this.draining = false;
      const waiters = this.idleWaiters.splice(0, this.idleWaiters.length);
      for (const resolve of waiters) {
        resolve();
      }
    }
  }

  private async runWithRetries(job: QueuedJob): Promise<void> {
    for (let attempt = 1; attempt <= this.maxAttempts; attempt += 1) {
      try {
        await job.run();
        this.logger.info("Job completed", { jobId: job.id, attempt });
        return;
      } catch (error) {
        const message = describeError(error);
        if (attempt < this.maxAttempts) {
          this.logger.warn("Job failed; retrying", { jobId: job.id, attempt, error: message });
          await sleep(this.retryDelayMs);
          continue;
        }

        this.logger.error("Job failed after final attempt", { jobId: job.id, attempts: attempt, error: message });
        this.reportFailure({ id: job.id, name: job.name, attempts: attempt, error: message });
      }
    }
  }

  private reportFailure(job: FailedJob): void {
    try {
      this.onJobFailed?.(job);
    } catch (error) {
      this.logger.error("onJobFailed callback threw", { jobId: job.id, error: describeError(error) });
    }
  }
}
