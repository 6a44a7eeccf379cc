import pino, { Logger } from 'pino';
import { v4 as uuidv4 } from 'uuid';
import { LRUCache } from 'lru-cache';
import { BatchQueue, BatchMetrics } from '../queue/batch-queue';
import { EventBus, TrackerEvent } from '../events/event-bus';
import { Interaction } from './interaction';
import { Session } from '../sessions/session';
import { HttpTransport } from '../transport/http-transport';
import {
  AlreadyCompletedError,
  ClientClosedError,
  ConfigurationError,
  ValidationError
} from '../errors';
import {
  DeliveryConfig,
  DeliveryResult,
  DeliveryStats,
  EventInput,
  EventRecord,
  FlushResult,
  IdentifyRecord,
  InitOptions,
  InteractionInput,
  OutgoingRecord,
  PropertyValue,
  SessionOutcome,
  SessionPhase,
  SessionRecord,
  SessionSnapshot,
  SignalInput,
  SignalRecord,
  TrackingClientOptions,
  Transport
} from '../types';
import {
  eventInputSchema,
  interactionInputSchema,
  propertiesSchema,
  signalInputSchema,
  validate
} from '../validation/schemas';

export const DEFAULT_ENDPOINT = 'http://localhost:3001';

export const DEFAULT_DELIVERY: DeliveryConfig = {
  batchSize: 100,
  flushInterval: 10000,
  flushAt: 0,
  maxQueueSize: 10000,
  maxAttempts: 3,
  retryDelay: 100,
  timeout: 10000
};

interface ResolvedInit {
  writeKey: string;
  endpoint: string;
  debug: boolean;
}

/**
 * Buffers AI interaction records and delivers them to the collector.
 *
 * Tracking calls only append to the local queue and never wait on the
 * network. Delivery happens on flush(), on the background timer and on
 * shutdown(); its failures are logged and reported, never thrown.
 *
 * Programmer mistakes (no write key, malformed records, reuse of a finished
 * interaction or completed session, tracking after shutdown) throw.
 */
export class TrackingClient {
  readonly events: EventBus;

  private readonly logger: Logger;
  private readonly baseLogLevel: string;
  private readonly delivery: DeliveryConfig;
  private readonly injectedTransport?: Transport;
  private readonly now: () => Date;
  private transport?: Transport;
  private queue?: BatchQueue<OutgoingRecord>;
  private config?: ResolvedInit;
  private closed = false;
  private closing?: Promise<DeliveryStats>;
  private readonly activeSessions = new Map<string, Session>();
  private readonly completedSessions: LRUCache<string, Session>;
  private readonly completedSessionIds = new Set<string>();

  constructor(options: TrackingClientOptions = {}) {
    this.logger = options.logger ?? pino({ name: 'tracking-client', level: 'info' });
    this.baseLogLevel = this.logger.level;
    this.events = options.eventBus ?? new EventBus(failure => {
      this.logger.warn({ eventType: failure.eventType, error: String(failure.cause) }, failure.message);
    });
    this.injectedTransport = options.transport;
    this.now = options.now ?? (() => new Date());
    this.delivery = {
      batchSize: options.batchSize ?? DEFAULT_DELIVERY.batchSize,
      flushInterval: options.flushInterval ?? DEFAULT_DELIVERY.flushInterval,
      flushAt: options.flushAt ?? DEFAULT_DELIVERY.flushAt,
      maxQueueSize: options.maxQueueSize ?? DEFAULT_DELIVERY.maxQueueSize,
      maxAttempts: options.maxAttempts ?? DEFAULT_DELIVERY.maxAttempts,
      retryDelay: options.retryDelay ?? DEFAULT_DELIVERY.retryDelay,
      timeout: options.timeout ?? DEFAULT_DELIVERY.timeout
    };
    this.completedSessions = new LRUCache<string, Session>({
      max: options.completedSessionCacheSize ?? 1000
    });
  }

  /**
   * Sets the write key and collector endpoint. Calling it again with other
   * values replaces the configuration; buffered records are kept.
   */
  init(options: InitOptions): this {
    this.assertOpen();

    const writeKey = typeof options.writeKey === 'string' ? options.writeKey.trim() : '';
    if (writeKey.length === 0) {
      throw new ConfigurationError('A write key is required to initialize the tracking client');
    }

    const next: ResolvedInit = {
      writeKey,
      endpoint: options.endpoint ?? DEFAULT_ENDPOINT,
      debug: options.debug ?? false
    };

    if (this.config) {
      if (
        this.config.writeKey === next.writeKey &&
        this.config.endpoint === next.endpoint &&
        this.config.debug === next.debug
      ) {
        return this;
      }
      this.logger.warn({ endpoint: next.endpoint }, 'Tracking client re-initialized with different settings');
    }

    if (next.debug || this.config?.debug) {
      this.setDebugLogs(next.debug);
    }

    this.config = next;
    this.transport = this.injectedTransport ?? new HttpTransport({
      endpoint: next.endpoint,
      writeKey: next.writeKey,
      logger: this.logger.child({ component: 'transport' })
    });

    if (!this.queue) {
      this.queue = this.createQueue();
    }

    this.logger.debug({ endpoint: next.endpoint }, 'Tracking client initialized');
    return this;
  }

  setDebugLogs(enabled: boolean): void {
    this.logger.level = enabled ? 'debug' : this.baseLogLevel;
  }

  isInitialized(): boolean {
    return this.config !== undefined;
  }

  identify(userId: string, traits: Record<string, PropertyValue> = {}): string {
    const queue = this.activeQueue();
    if (userId.trim().length === 0) {
      throw new ValidationError('Invalid identify call: user id is required', ['user id is required']);
    }
    const checkedTraits = validate(propertiesSchema, traits, 'traits');

    const record: IdentifyRecord = {
      kind: 'identify',
      id: uuidv4(),
      userId,
      traits: Object.freeze({ ...checkedTraits }),
      timestamp: this.now().toISOString()
    };

    this.enqueue(queue, Object.freeze(record));
    return record.id;
  }

  /**
   * Queues a complete AI interaction and returns its event id
   */
  trackEvent(input: EventInput): string {
    const queue = this.activeQueue();
    const record = this.buildEvent(input);
    this.enqueue(queue, record);
    return record.id;
  }

  /**
   * Queues feedback on an earlier event. The event id is not checked against
   * anything tracked locally; the collector owns that relation.
   */
  trackSignal(input: SignalInput): string {
    const queue = this.activeQueue();
    const checked = validate(signalInputSchema, input, 'signal');

    const record: SignalRecord = {
      kind: 'signal',
      id: uuidv4(),
      eventId: checked.eventId,
      name: checked.name,
      type: checked.type ?? 'default',
      sentiment: checked.sentiment,
      comment: checked.comment,
      properties: Object.freeze({ ...checked.properties }),
      timestamp: (checked.timestamp ?? this.now()).toISOString()
    };

    this.enqueue(queue, Object.freeze(record));
    return record.id;
  }

  beginInteraction(input: InteractionInput): Interaction {
    this.activeQueue();
    const checked = validate(interactionInputSchema, input, 'interaction');

    const interaction = new Interaction(
      {
        id: checked.eventId ?? uuidv4(),
        userId: checked.userId,
        event: checked.event,
        input: checked.input,
        model: checked.model,
        convoId: checked.convoId,
        properties: { ...checked.properties }
      },
      (event) => {
        const queue = this.activeQueue();
        const record = this.buildEvent(event);
        this.enqueue(queue, record);
        return record;
      }
    );

    this.logger.debug({ interactionId: interaction.id, event: checked.event }, 'Interaction started');
    return interaction;
  }

  /**
   * Opens a session and returns its id
   */
  createSession(name: string, agentName: string): string {
    const queue = this.activeQueue();
    if (name.trim().length === 0 || agentName.trim().length === 0) {
      throw new ValidationError('Invalid session: name and agent name are required', [
        'name and agent name are required'
      ]);
    }

    const session = new Session(uuidv4(), name, agentName, {
      now: this.now,
      onComplete: (snapshot) => this.onSessionCompleted(session, snapshot)
    });
    this.activeSessions.set(session.id, session);

    const snapshot = session.snapshot();
    this.enqueue(queue, this.sessionRecord('started', snapshot));
    this.events.emitEvent({ type: 'session.created', timestamp: Date.now(), session: snapshot });
    this.logger.debug({ sessionId: session.id, agentName }, 'Session created');

    return session.id;
  }

  /**
   * Active sessions, and recently completed ones while they stay in the cache
   */
  getSession(sessionId: string): Session | undefined {
    return this.activeSessions.get(sessionId) ?? this.completedSessions.get(sessionId);
  }

  completeSession(sessionId: string, outcome: SessionOutcome): SessionSnapshot {
    this.activeQueue();

    const session = this.activeSessions.get(sessionId);
    if (!session) {
      if (this.completedSessionIds.has(sessionId)) {
        throw new AlreadyCompletedError(sessionId);
      }
      throw new ValidationError(`Unknown session: ${sessionId}`, [`unknown session ${sessionId}`]);
    }

    return session.complete(outcome);
  }

  /**
   * Delivers everything buffered so far. Never rejects.
   */
  async flush(): Promise<FlushResult> {
    if (!this.queue) {
      return { delivered: 0, failed: [], attempts: 0 };
    }
    return this.queue.flush();
  }

  /**
   * Flushes, stops the background timer and refuses further tracking.
   * Resolves with the totals of the client's lifetime.
   */
  shutdown(): Promise<DeliveryStats> {
    if (!this.closing) {
      this.closed = true;
      this.closing = this.close();
    }
    return this.closing;
  }

  getStats(): DeliveryStats {
    const metrics = this.getMetrics();
    return {
      queued: metrics?.totalItems ?? 0,
      delivered: metrics?.deliveredItems ?? 0,
      failed: metrics?.failedItems ?? 0,
      dropped: metrics?.droppedItems ?? 0
    };
  }

  getMetrics(): BatchMetrics | undefined {
    return this.queue?.getMetrics();
  }

  pendingCount(): number {
    return this.queue?.size() ?? 0;
  }

  private async close(): Promise<DeliveryStats> {
    if (this.queue) {
      await this.queue.stop();
    }

    const stats = this.getStats();
    this.events.emitEvent({ type: 'client.shutdown', timestamp: Date.now(), stats });
    this.logger.info(stats, 'Tracking client shut down');
    return stats;
  }

  private createQueue(): BatchQueue<OutgoingRecord> {
    const queue = new BatchQueue<OutgoingRecord>({
      ...this.delivery,
      handler: (batch, signal) => this.send(batch, signal)
    });

    queue.on('flush', (result: FlushResult) => {
      if (result.failed.length > 0) {
        this.logger.warn(
          { delivered: result.delivered, failedIds: result.failed.map(f => f.id), attempts: result.attempts },
          'Some records could not be delivered'
        );
      } else {
        this.logger.debug({ delivered: result.delivered, attempts: result.attempts }, 'Flush completed');
      }
      this.events.emitEvent({ type: 'flush.completed', timestamp: Date.now(), result });
    });

    queue.on('drop', (record: OutgoingRecord) => {
      this.logger.warn({ id: record.id, kind: record.kind }, 'Queue full, record dropped');
      this.events.emitEvent({ type: 'record.dropped', timestamp: Date.now(), record, reason: 'queue full' });
    });

    queue.on('flush-error', (error: unknown) => {
      this.logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Background flush failed');
    });

    return queue;
  }

  private send(batch: OutgoingRecord[], signal: AbortSignal): Promise<DeliveryResult> {
    if (!this.transport) {
      throw new ConfigurationError('Tracking client has not been initialized');
    }
    this.logger.debug({ size: batch.length }, 'Sending batch');
    return this.transport.send(batch, signal);
  }

  private buildEvent(input: EventInput): EventRecord {
    const checked = validate(eventInputSchema, input, 'event');

    const record: EventRecord = {
      kind: 'event',
      id: checked.eventId ?? uuidv4(),
      userId: checked.userId,
      event: checked.event,
      model: checked.model,
      input: checked.input,
      output: checked.output,
      convoId: checked.convoId,
      properties: Object.freeze({ ...checked.properties }),
      attachments: Object.freeze((checked.attachments ?? []).map(attachment => Object.freeze({ ...attachment }))),
      timestamp: (checked.timestamp ?? this.now()).toISOString()
    };
    return Object.freeze(record);
  }

  private sessionRecord(phase: SessionPhase, snapshot: SessionSnapshot): SessionRecord {
    const record: SessionRecord = {
      kind: 'session',
      id: `${snapshot.id}:${phase}`,
      phase,
      session: snapshot,
      timestamp: this.now().toISOString()
    };
    return Object.freeze(record);
  }

  private onSessionCompleted(session: Session, snapshot: SessionSnapshot): void {
    this.activeSessions.delete(session.id);
    this.completedSessionIds.add(session.id);
    this.completedSessions.set(session.id, session);
    this.events.emitEvent({ type: 'session.completed', timestamp: Date.now(), session: snapshot });

    if (this.closed || !this.queue) {
      this.logger.warn({ sessionId: session.id }, 'Session completed after shutdown, completion not sent');
      return;
    }

    this.enqueue(this.queue, this.sessionRecord('completed', snapshot));
    this.logger.debug({ sessionId: session.id, status: snapshot.status }, 'Session completed');
  }

  private enqueue(queue: BatchQueue<OutgoingRecord>, record: OutgoingRecord): void {
    if (queue.add(record)) {
      const event: TrackerEvent = { type: 'record.queued', timestamp: Date.now(), record };
      this.events.emitEvent(event);
      this.logger.debug({ id: record.id, kind: record.kind }, 'Record queued');
    }
  }

  private activeQueue(): BatchQueue<OutgoingRecord> {
    this.assertOpen();
    if (!this.queue) {
      throw new ConfigurationError('Tracking client has not been initialized');
    }
    return this.queue;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new ClientClosedError();
    }
  }
}
