import { DeliveryError } from '../errors';
import { DeliveryResult, OutgoingRecord, Transport } from '../types/transport';

export interface MemoryTransportOptions {
  /** Fail this many sends before succeeding */
  failFirst?: number;
  /** Ids refused on every send */
  rejectIds?: string[];
  /** Failures are reported as permanent instead of retryable */
  permanent?: boolean;
}

/**
 * Keeps delivered records in process. Deduplicates by record id the way the collector does.
 */
export class MemoryTransport implements Transport {
  readonly batches: OutgoingRecord[][] = [];
  private readonly received = new Map<string, OutgoingRecord>();
  private remainingFailures: number;
  private readonly rejectIds: Set<string>;

  constructor(private readonly options: MemoryTransportOptions = {}) {
    this.remainingFailures = options.failFirst ?? 0;
    this.rejectIds = new Set(options.rejectIds ?? []);
  }

  async send(batch: readonly OutgoingRecord[], _signal: AbortSignal): Promise<DeliveryResult> {
    this.batches.push([...batch]);

    if (this.remainingFailures > 0) {
      this.remainingFailures--;
      return {
        ok: false,
        error: new DeliveryError('Simulated collector outage', { retryable: !this.options.permanent })
      };
    }

    const failedIds: string[] = [];
    for (const record of batch) {
      if (this.rejectIds.has(record.id)) {
        failedIds.push(record.id);
      } else {
        this.received.set(record.id, record);
      }
    }

    if (failedIds.length > 0) {
      return {
        ok: false,
        error: new DeliveryError(`Refused ${failedIds.length} records`, { retryable: !this.options.permanent }),
        failedIds
      };
    }

    return { ok: true };
  }

  get delivered(): OutgoingRecord[] {
    return [...this.received.values()];
  }

  get sendCount(): number {
    return this.batches.length;
  }
}
