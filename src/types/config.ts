import { Logger } from 'pino';
import { Transport } from './transport';
import { EventBus } from '../events/event-bus';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface InitOptions {
  writeKey: string;
  endpoint?: string;
  debug?: boolean;
}

export interface DeliveryConfig {
  /** Maximum records per send */
  batchSize: number;
  /** Background flush period in ms, 0 disables the timer */
  flushInterval: number;
  /** Queue length that triggers a background flush, 0 disables it */
  flushAt: number;
  maxQueueSize: number;
  maxAttempts: number;
  /** Base backoff in ms, doubled after every failed attempt */
  retryDelay: number;
  /** Per-attempt timeout in ms */
  timeout: number;
}

export interface TrackingClientOptions extends Partial<DeliveryConfig> {
  transport?: Transport;
  logger?: Logger;
  eventBus?: EventBus;
  /** How many completed sessions stay reachable through getSession() */
  completedSessionCacheSize?: number;
  now?: () => Date;
}

export interface TrackerConfig extends DeliveryConfig {
  writeKey: string;
  endpoint: string;
  debug: boolean;
  logLevel: LogLevel;
}
