import { EventRecord, IdentifyRecord, SignalRecord } from './events';
import { SessionRecord } from './session';
import { DeliveryError } from '../errors';

export type OutgoingRecord = EventRecord | SignalRecord | IdentifyRecord | SessionRecord;

export type DeliveryResult =
  | { ok: true }
  | {
      ok: false;
      error: DeliveryError;
      /** Ids the collector refused. Absent means the whole batch failed. */
      failedIds?: readonly string[];
    };

export interface Transport {
  send(batch: readonly OutgoingRecord[], signal: AbortSignal): Promise<DeliveryResult>;
}

export interface FailedDelivery {
  id: string;
  error: string;
}

export interface FlushResult {
  delivered: number;
  failed: FailedDelivery[];
  /** Number of send attempts made during the flush */
  attempts: number;
}

export interface DeliveryStats {
  queued: number;
  delivered: number;
  failed: number;
  dropped: number;
}
