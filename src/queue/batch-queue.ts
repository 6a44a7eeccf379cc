import { EventEmitter } from 'events';
import { DeliveryResult, FlushResult } from '../types/transport';
import { DeliveryError } from '../errors';

/**
 * Options for configuring the BatchQueue
 */
export interface BatchQueueOptions<T> {
  batchSize: number;
  flushInterval: number;
  handler: (batch: T[], signal: AbortSignal) => Promise<DeliveryResult>;
  flushAt?: number;
  maxQueueSize?: number;
  maxAttempts?: number;
  retryDelay?: number;
  timeout?: number;
  timers?: TimerFunctions;
}

/**
 * Metrics for tracking BatchQueue performance
 */
export interface BatchMetrics {
  totalItems: number;
  totalBatches: number;
  failedBatches: number;
  deliveredItems: number;
  failedItems: number;
  droppedItems: number;
  averageBatchSize: number;
  averageProcessingTime: number;
}

// Timer functions interface for testing
export interface TimerFunctions {
  setInterval: typeof globalThis.setInterval;
  clearInterval: typeof globalThis.clearInterval;
  setTimeout: typeof globalThis.setTimeout;
  clearTimeout: typeof globalThis.clearTimeout;
}

const defaultTimers: TimerFunctions = {
  setInterval: global.setInterval,
  clearInterval: global.clearInterval,
  setTimeout: global.setTimeout,
  clearTimeout: global.clearTimeout
};

interface BatchOutcome {
  delivered: number;
  failed: FlushResult['failed'];
  attempts: number;
}

/**
 * Buffers records and delivers them in batches through the handler.
 *
 * Flushes are serialized: a flush requested while another one runs waits
 * for it, then drains whatever is left. Each batch gets up to maxAttempts
 * sends with exponential backoff; records the handler reports as failed are
 * retried on their own, and whatever still fails is reported and dropped.
 *
 * Emits 'flush' with a FlushResult after every flush that sent something,
 * and 'drop' with the item when the queue is full.
 */
export class BatchQueue<T extends { id: string }> extends EventEmitter {
  private queue: T[] = [];
  private flushTimer?: ReturnType<typeof setInterval>;
  private stopped: boolean = false;
  private isFlushScheduled: boolean = false;
  private tail: Promise<void> = Promise.resolve();
  private metrics: BatchMetrics;
  private timers: TimerFunctions;

  private readonly options: Required<Omit<BatchQueueOptions<T>, 'timers'>>;

  constructor(options: BatchQueueOptions<T>) {
    super();

    this.validateOptions(options);

    this.options = {
      batchSize: options.batchSize,
      flushInterval: options.flushInterval,
      handler: options.handler,
      flushAt: options.flushAt ?? 0,
      maxQueueSize: options.maxQueueSize ?? 10000,
      maxAttempts: options.maxAttempts ?? 3,
      retryDelay: options.retryDelay ?? 100,
      timeout: options.timeout ?? 10000
    };

    this.metrics = {
      totalItems: 0,
      totalBatches: 0,
      failedBatches: 0,
      deliveredItems: 0,
      failedItems: 0,
      droppedItems: 0,
      averageBatchSize: 0,
      averageProcessingTime: 0
    };

    this.timers = options.timers ?? defaultTimers;

    this.startTimer();
  }

  private validateOptions(options: BatchQueueOptions<T>): void {
    if (options.batchSize <= 0) {
      throw new Error('Batch size must be positive');
    }

    if (options.flushInterval < 0) {
      throw new Error('Flush interval must not be negative');
    }

    if (options.maxAttempts !== undefined && options.maxAttempts < 1) {
      throw new Error('Max attempts must be at least 1');
    }

    if (typeof options.handler !== 'function') {
      throw new Error('Handler must be a function');
    }
  }

  private startTimer(): void {
    if (this.options.flushInterval === 0) {
      return;
    }

    this.flushTimer = this.timers.setInterval(() => {
      if (this.queue.length > 0 && !this.stopped) {
        this.scheduleFlush();
      }
    }, this.options.flushInterval);
    // The timer alone must not keep the process alive
    this.flushTimer.unref();
  }

  /**
   * Adds an item to the queue. Returns false when the queue is full and the item was dropped.
   */
  add(item: T): boolean {
    if (this.stopped) {
      throw new Error('Queue is stopped');
    }

    if (this.queue.length >= this.options.maxQueueSize) {
      this.metrics.droppedItems++;
      this.emit('drop', item);
      return false;
    }

    this.queue.push(item);
    this.metrics.totalItems++;

    if (this.options.flushAt > 0 && this.queue.length >= this.options.flushAt) {
      this.scheduleFlush();
    }

    return true;
  }

  private scheduleFlush(): void {
    if (this.isFlushScheduled || this.stopped) {
      return;
    }

    this.isFlushScheduled = true;

    Promise.resolve().then(() => {
      this.isFlushScheduled = false;
      return this.flush();
    }).catch((error: unknown) => {
      this.emit('flush-error', error);
    });
  }

  /**
   * Drains the queue, waiting for any flush already in progress
   */
  flush(): Promise<FlushResult> {
    const run = this.tail.then(() => this.drain());
    this.tail = run.then(() => undefined, () => undefined);
    return run;
  }

  private async drain(): Promise<FlushResult> {
    const result: FlushResult = { delivered: 0, failed: [], attempts: 0 };

    while (this.queue.length > 0) {
      const batch = this.queue.splice(0, this.options.batchSize);
      const startTime = Date.now();

      const outcome = await this.deliverWithRetry(batch);

      result.delivered += outcome.delivered;
      result.failed.push(...outcome.failed);
      result.attempts += outcome.attempts;

      this.metrics.totalBatches++;
      this.metrics.deliveredItems += outcome.delivered;
      this.metrics.failedItems += outcome.failed.length;
      if (outcome.failed.length > 0) {
        this.metrics.failedBatches++;
      }
      this.updateAverageProcessingTime(Date.now() - startTime);
      this.updateAverageBatchSize(batch.length);
    }

    if (result.attempts > 0) {
      this.emit('flush', result);
    }

    return result;
  }

  private async deliverWithRetry(batch: T[]): Promise<BatchOutcome> {
    let pending = batch;
    let delivered = 0;
    let attempts = 0;
    let lastError: DeliveryError | undefined;

    for (let attempt = 0; attempt < this.options.maxAttempts && pending.length > 0; attempt++) {
      if (attempt > 0) {
        await this.delay(this.options.retryDelay * Math.pow(2, attempt - 1));
      }

      attempts++;
      const result = await this.send(pending);

      if (result.ok) {
        delivered += pending.length;
        pending = [];
        break;
      }

      lastError = result.error;
      const failedIds = result.failedIds ? new Set(result.failedIds) : undefined;
      const stillFailing = failedIds ? pending.filter(item => failedIds.has(item.id)) : pending;
      delivered += pending.length - stillFailing.length;
      pending = stillFailing;

      if (!result.error.retryable) {
        break;
      }
    }

    const message = lastError?.message ?? 'Delivery failed';
    return {
      delivered,
      failed: pending.map(item => ({ id: item.id, error: message })),
      attempts
    };
  }

  /**
   * One handler call bounded by the per-attempt timeout
   */
  private async send(batch: T[]): Promise<DeliveryResult> {
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;

    const timeout = new Promise<DeliveryResult>(resolve => {
      timer = this.timers.setTimeout(() => {
        controller.abort();
        resolve({
          ok: false,
          error: new DeliveryError(`Delivery timed out after ${this.options.timeout}ms`, { retryable: true })
        });
      }, this.options.timeout);
    });

    try {
      return await Promise.race([this.options.handler(batch, controller.signal), timeout]);
    } catch (error) {
      return { ok: false, error: DeliveryError.from(error) };
    } finally {
      if (timer !== undefined) {
        this.timers.clearTimeout(timer);
      }
    }
  }

  private delay(ms: number): Promise<void> {
    return new Promise<void>(resolve => {
      this.timers.setTimeout(() => resolve(), ms);
    });
  }

  /**
   * Stops the timer and delivers what is left. Items added afterwards are rejected.
   */
  async stop(): Promise<FlushResult> {
    this.stopped = true;

    if (this.flushTimer) {
      this.timers.clearInterval(this.flushTimer);
      this.flushTimer = undefined;
    }

    return this.flush();
  }

  isStopped(): boolean {
    return this.stopped;
  }

  size(): number {
    return this.queue.length;
  }

  getMetrics(): BatchMetrics {
    return { ...this.metrics };
  }

  private updateAverageProcessingTime(processingTime: number): void {
    if (this.metrics.totalBatches === 1) {
      this.metrics.averageProcessingTime = processingTime;
    } else {
      const totalTime = this.metrics.averageProcessingTime * (this.metrics.totalBatches - 1);
      this.metrics.averageProcessingTime = (totalTime + processingTime) / this.metrics.totalBatches;
    }
  }

  private updateAverageBatchSize(batchSize: number): void {
    if (this.metrics.totalBatches === 1) {
      this.metrics.averageBatchSize = batchSize;
    } else {
      const totalSize = this.metrics.averageBatchSize * (this.metrics.totalBatches - 1);
      this.metrics.averageBatchSize = (totalSize + batchSize) / this.metrics.totalBatches;
    }
  }
}
