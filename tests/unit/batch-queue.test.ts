import { BatchQueue, BatchQueueOptions, TimerFunctions } from '../../src/queue/batch-queue';
import { DeliveryResult, FlushResult } from '../../src/types';
import { failure, ok, sleep } from '../fixtures/records';

interface Item {
  id: string;
}

type Handler = jest.Mock<Promise<DeliveryResult>, [Item[], AbortSignal]>;

const a: Item = { id: 'a' };
const b: Item = { id: 'b' };
const c: Item = { id: 'c' };

describe('BatchQueue', () => {
  let handler: Handler;
  let queue: BatchQueue<Item>;

  function createQueue(overrides: Partial<BatchQueueOptions<Item>> = {}): BatchQueue<Item> {
    return new BatchQueue<Item>({
      batchSize: 10,
      flushInterval: 0,
      retryDelay: 1,
      handler,
      ...overrides
    });
  }

  beforeEach(() => {
    handler = jest.fn<Promise<DeliveryResult>, [Item[], AbortSignal]>().mockResolvedValue(ok);
  });

  afterEach(async () => {
    if (queue && !queue.isStopped()) {
      await queue.stop();
    }
  });

  describe('batching behavior', () => {
    it('should deliver items in enqueue order split by batch size', async () => {
      queue = createQueue({ batchSize: 2 });
      queue.add(a);
      queue.add(b);
      queue.add(c);

      const result = await queue.flush();

      expect(result).toEqual({ delivered: 3, failed: [], attempts: 2 });
      expect(handler).toHaveBeenCalledTimes(2);
      expect(handler.mock.calls[0][0]).toEqual([a, b]);
      expect(handler.mock.calls[1][0]).toEqual([c]);
      expect(queue.size()).toBe(0);
    });

    it('should not call the handler when nothing is queued', async () => {
      queue = createQueue();

      const result = await queue.flush();

      expect(result).toEqual({ delivered: 0, failed: [], attempts: 0 });
      expect(handler).not.toHaveBeenCalled();
    });

    it('should flush in the background once flushAt items are queued', async () => {
      queue = createQueue({ flushAt: 2 });
      const flushed = new Promise<FlushResult>(resolve => queue.once('flush', resolve));

      queue.add(a);
      expect(handler).not.toHaveBeenCalled();
      queue.add(b);

      const result = await flushed;
      expect(result.delivered).toBe(2);
      expect(handler.mock.calls[0][0]).toEqual([a, b]);
    });

    it('should flush on interval', async () => {
      queue = createQueue({ flushInterval: 20 });
      const flushed = new Promise<FlushResult>(resolve => queue.once('flush', resolve));

      queue.add(a);

      const result = await flushed;
      expect(result).toEqual({ delivered: 1, failed: [], attempts: 1 });
    });

    it('should schedule interval flushes on the injected timers', async () => {
      jest.useFakeTimers();
      try {
        const timers: TimerFunctions = {
          setInterval: global.setInterval,
          clearInterval: global.clearInterval,
          setTimeout: global.setTimeout,
          clearTimeout: global.clearTimeout
        };
        queue = createQueue({ flushInterval: 1000, timers });
        queue.add(a);

        jest.advanceTimersByTime(999);
        expect(handler).not.toHaveBeenCalled();

        const flushed = new Promise<FlushResult>(resolve => queue.once('flush', resolve));
        jest.advanceTimersByTime(1);

        expect(await flushed).toEqual({ delivered: 1, failed: [], attempts: 1 });
        expect(handler.mock.calls[0][0]).toEqual([a]);
        await queue.stop();
      } finally {
        jest.useRealTimers();
      }
    });
  });

  describe('manual flush', () => {
    it('should run one flush at a time', async () => {
      let inFlight = 0;
      let maxInFlight = 0;
      handler.mockImplementation(async () => {
        inFlight++;
        maxInFlight = Math.max(maxInFlight, inFlight);
        await sleep(5);
        inFlight--;
        return ok;
      });
      queue = createQueue();

      queue.add(a);
      const first = queue.flush();
      await sleep(1);
      queue.add(b);
      const second = queue.flush();

      const [firstResult, secondResult] = await Promise.all([first, second]);

      expect(maxInFlight).toBe(1);
      expect(firstResult.delivered).toBe(2);
      expect(secondResult).toEqual({ delivered: 0, failed: [], attempts: 0 });
      expect(handler.mock.calls.map(call => call[0])).toEqual([[a], [b]]);
    });
  });

  describe('error handling', () => {
    it('should retry a failed batch until it succeeds', async () => {
      handler
        .mockResolvedValueOnce(failure('collector down'))
        .mockResolvedValueOnce(failure('collector down'))
        .mockResolvedValueOnce(ok);
      queue = createQueue({ maxAttempts: 3 });
      queue.add(a);

      const result = await queue.flush();

      expect(result).toEqual({ delivered: 1, failed: [], attempts: 3 });
      expect(handler).toHaveBeenCalledTimes(3);
    });

    it('should back off exponentially between attempts', async () => {
      handler
        .mockResolvedValueOnce(failure('collector down'))
        .mockResolvedValueOnce(failure('collector down'))
        .mockResolvedValueOnce(ok);
      queue = createQueue({ maxAttempts: 3, retryDelay: 10 });
      queue.add(a);

      const startedAt = Date.now();
      await queue.flush();

      // 10ms then 20ms
      expect(Date.now() - startedAt).toBeGreaterThanOrEqual(25);
    });

    it('should report items that still fail after the last attempt', async () => {
      handler.mockResolvedValue(failure('collector down'));
      queue = createQueue({ maxAttempts: 3 });
      queue.add(a);
      queue.add(b);

      const result = await queue.flush();

      expect(result).toEqual({
        delivered: 0,
        failed: [
          { id: 'a', error: 'collector down' },
          { id: 'b', error: 'collector down' }
        ],
        attempts: 3
      });
      expect(queue.size()).toBe(0);
    });

    it('should stop retrying on a permanent failure', async () => {
      handler.mockResolvedValue(failure('bad request', false));
      queue = createQueue({ maxAttempts: 3 });
      queue.add(a);

      const result = await queue.flush();

      expect(result.attempts).toBe(1);
      expect(result.failed).toEqual([{ id: 'a', error: 'bad request' }]);
    });

    it('should retry only the items the handler refused', async () => {
      handler
        .mockResolvedValueOnce(failure('refused', true, ['b']))
        .mockResolvedValueOnce(ok);
      queue = createQueue();
      queue.add(a);
      queue.add(b);
      queue.add(c);

      const result = await queue.flush();

      expect(result).toEqual({ delivered: 3, failed: [], attempts: 2 });
      expect(handler.mock.calls[1][0]).toEqual([b]);
    });

    it('should turn a handler rejection into a failed delivery', async () => {
      handler.mockRejectedValue(new Error('socket hang up'));
      queue = createQueue({ maxAttempts: 1 });
      queue.add(a);

      const result = await queue.flush();

      expect(result.failed).toEqual([{ id: 'a', error: 'socket hang up' }]);
    });

    it('should abort an attempt that exceeds the timeout', async () => {
      let seenSignal: AbortSignal | undefined;
      handler.mockImplementation((_batch, signal) => {
        seenSignal = signal;
        return new Promise<DeliveryResult>(() => undefined);
      });
      queue = createQueue({ maxAttempts: 1, timeout: 20 });
      queue.add(a);

      const result = await queue.flush();

      expect(result.failed).toEqual([{ id: 'a', error: 'Delivery timed out after 20ms' }]);
      expect(seenSignal?.aborted).toBe(true);
    });
  });

  describe('backpressure handling', () => {
    it('should drop items once the queue is full', () => {
      queue = createQueue({ maxQueueSize: 2 });
      const dropped: Item[] = [];
      queue.on('drop', (item: Item) => dropped.push(item));

      expect(queue.add(a)).toBe(true);
      expect(queue.add(b)).toBe(true);
      expect(queue.add(c)).toBe(false);

      expect(dropped).toEqual([c]);
      expect(queue.size()).toBe(2);
      expect(queue.getMetrics().droppedItems).toBe(1);
    });
  });

  describe('lifecycle management', () => {
    it('should flush remaining items on stop', async () => {
      queue = createQueue();
      queue.add(a);

      const result = await queue.stop();

      expect(result.delivered).toBe(1);
      expect(queue.isStopped()).toBe(true);
    });

    it('should reject new items after stop', async () => {
      queue = createQueue();
      await queue.stop();

      expect(() => queue.add(a)).toThrow('Queue is stopped');
    });
  });

  describe('metrics', () => {
    it('should track delivered and failed items per batch', async () => {
      handler
        .mockResolvedValueOnce(ok)
        .mockResolvedValueOnce(failure('collector down', false));
      queue = createQueue({ batchSize: 2 });
      queue.add(a);
      queue.add(b);
      queue.add(c);

      await queue.flush();

      expect(queue.getMetrics()).toMatchObject({
        totalItems: 3,
        totalBatches: 2,
        failedBatches: 1,
        deliveredItems: 2,
        failedItems: 1,
        droppedItems: 0,
        averageBatchSize: 1.5
      });
    });
  });

  describe('configuration validation', () => {
    it('should validate batch size', () => {
      expect(() => createQueue({ batchSize: 0 })).toThrow('Batch size must be positive');
    });

    it('should validate flush interval', () => {
      expect(() => createQueue({ flushInterval: -1 })).toThrow('Flush interval must not be negative');
    });

    it('should validate max attempts', () => {
      expect(() => createQueue({ maxAttempts: 0 })).toThrow('Max attempts must be at least 1');
    });
  });
});
