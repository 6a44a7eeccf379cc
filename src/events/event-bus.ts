import { OutgoingRecord, FlushResult, DeliveryStats } from '../types/transport';
import { SessionSnapshot } from '../types/session';

export type TrackerEvent =
  | { type: 'record.queued'; timestamp: number; record: OutgoingRecord }
  | { type: 'record.dropped'; timestamp: number; record: OutgoingRecord; reason: string }
  | { type: 'flush.completed'; timestamp: number; result: FlushResult }
  | { type: 'session.created'; timestamp: number; session: SessionSnapshot }
  | { type: 'session.completed'; timestamp: number; session: SessionSnapshot }
  | { type: 'client.shutdown'; timestamp: number; stats: DeliveryStats };

export type TrackerEventType = TrackerEvent['type'];

export type EventFor<K extends TrackerEventType | '*'> =
  K extends '*' ? TrackerEvent : Extract<TrackerEvent, { type: K }>;

export type EventListener<E> = (event: E) => void | Promise<void>;

export interface ListenerOptions<E> {
  filter?: (event: E) => boolean;
  replay?: boolean;
}

interface ListenerConfig {
  original: unknown;
  invoke: EventListener<TrackerEvent>;
  once?: boolean;
}

export interface EventMetrics {
  totalEvents: number;
  eventCounts: Record<string, number>;
  listenerCounts: Record<string, number>;
  errorCount: number;
}

export interface ListenerFailure {
  message: string;
  cause: unknown;
  eventType: TrackerEventType;
  event: TrackerEvent;
}

function matches<K extends TrackerEventType | '*'>(type: K, event: TrackerEvent): event is EventFor<K> {
  return type === '*' || event.type === type;
}

/**
 * Local notification bus for client activity.
 *
 * Listener failures, sync or async, are counted and handed to onListenerError;
 * they never reach the code that emitted the event.
 */
export class EventBus {
  private eventListeners: Map<string, Set<ListenerConfig>>;
  private replayBuffer?: TrackerEvent[];
  private replayBufferSize?: number;
  private metrics: EventMetrics;

  constructor(private readonly onListenerError: (failure: ListenerFailure) => void = () => undefined) {
    this.eventListeners = new Map();
    this.metrics = {
      totalEvents: 0,
      eventCounts: {},
      listenerCounts: {},
      errorCount: 0
    };
  }

  /**
   * Emit an event to type-specific listeners, then wildcard listeners
   */
  emitEvent(event: TrackerEvent): void {
    this.metrics.totalEvents++;
    this.metrics.eventCounts[event.type] = (this.metrics.eventCounts[event.type] || 0) + 1;

    if (this.replayBuffer && this.replayBufferSize) {
      this.replayBuffer.push(event);
      if (this.replayBuffer.length > this.replayBufferSize) {
        this.replayBuffer = this.replayBuffer.slice(-this.replayBufferSize);
      }
    }

    for (const key of [event.type, '*']) {
      const listeners = this.eventListeners.get(key);
      if (!listeners) {
        continue;
      }
      for (const config of [...listeners]) {
        this.invokeListener(key, config, event);
      }
    }
  }

  on<K extends TrackerEventType | '*'>(
    eventType: K,
    listener: EventListener<EventFor<K>>,
    options: ListenerOptions<EventFor<K>> = {}
  ): this {
    const config = this.register(eventType, listener, options, false);

    if (options.replay && this.replayBuffer) {
      for (const event of this.replayBuffer) {
        if (matches(eventType, event)) {
          this.invokeListener(eventType, config, event);
        }
      }
    }

    return this;
  }

  once<K extends TrackerEventType | '*'>(eventType: K, listener: EventListener<EventFor<K>>): this {
    this.register(eventType, listener, {}, true);
    return this;
  }

  off<K extends TrackerEventType | '*'>(eventType: K, listener: EventListener<EventFor<K>>): this {
    const listeners = this.eventListeners.get(eventType);
    if (listeners) {
      for (const config of listeners) {
        if (config.original === listener) {
          listeners.delete(config);
        }
      }
    }

    this.updateListenerCounts();
    return this;
  }

  removeAllListeners(eventType?: TrackerEventType | '*'): this {
    if (eventType === undefined) {
      this.eventListeners.clear();
    } else {
      this.eventListeners.delete(eventType);
    }

    this.updateListenerCounts();
    return this;
  }

  listenerCount(eventType: TrackerEventType | '*'): number {
    return this.eventListeners.get(eventType)?.size || 0;
  }

  enableReplay(bufferSize: number): void {
    this.replayBufferSize = bufferSize;
    this.replayBuffer = [];
  }

  getRecentEvents(): TrackerEvent[] {
    return this.replayBuffer ? [...this.replayBuffer] : [];
  }

  getMetrics(): EventMetrics {
    return {
      ...this.metrics,
      eventCounts: { ...this.metrics.eventCounts },
      listenerCounts: { ...this.metrics.listenerCounts }
    };
  }

  private register<K extends TrackerEventType | '*'>(
    eventType: K,
    listener: EventListener<EventFor<K>>,
    options: ListenerOptions<EventFor<K>>,
    once: boolean
  ): ListenerConfig {
    const config: ListenerConfig = {
      original: listener,
      once,
      invoke: (event) => {
        if (!matches(eventType, event)) {
          return;
        }
        if (options.filter && !options.filter(event)) {
          return;
        }
        return listener(event);
      }
    };

    let listeners = this.eventListeners.get(eventType);
    if (!listeners) {
      listeners = new Set();
      this.eventListeners.set(eventType, listeners);
    }
    listeners.add(config);

    this.updateListenerCounts();
    return config;
  }

  private invokeListener(key: string, config: ListenerConfig, event: TrackerEvent): void {
    if (config.once) {
      this.eventListeners.get(key)?.delete(config);
      this.updateListenerCounts();
    }

    try {
      const result = config.invoke(event);
      if (result instanceof Promise) {
        result.catch((error: unknown) => this.reportFailure(error, event));
      }
    } catch (error) {
      this.reportFailure(error, event);
    }
  }

  private reportFailure(cause: unknown, event: TrackerEvent): void {
    this.metrics.errorCount++;
    this.onListenerError({
      message: 'Event listener error',
      cause,
      eventType: event.type,
      event
    });
  }

  private updateListenerCounts(): void {
    this.metrics.listenerCounts = {};
    for (const [type, listeners] of this.eventListeners) {
      if (listeners.size > 0) {
        this.metrics.listenerCounts[type] = listeners.size;
      }
    }
  }
}
