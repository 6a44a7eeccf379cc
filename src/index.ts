/**
 * Tracelight - tracking client for AI interactions, feedback signals and agent sessions
 */

export { TrackingClient, DEFAULT_DELIVERY, DEFAULT_ENDPOINT } from './client/tracking-client';
export { Interaction } from './client/interaction';
export { Session } from './sessions/session';
export { estimateCostUsd, lookupModelPricing, DEFAULT_PRICING } from './sessions/pricing';
export type { ModelPricing, PricingTable } from './sessions/pricing';
export { BatchQueue } from './queue/batch-queue';
export type { BatchMetrics, BatchQueueOptions } from './queue/batch-queue';
export { EventBus } from './events/event-bus';
export type { TrackerEvent, TrackerEventType, EventMetrics } from './events/event-bus';
export { HttpTransport } from './transport/http-transport';
export { MemoryTransport } from './transport/memory-transport';
export { toWireRecord, toWireBatch } from './serialization/wire';
export { TrackedLlm } from './adapters/llm-adapter';
export type { LlmProvider, LlmRequest, LlmResponse, LlmMessage, AgentTurn, ToolCall } from './adapters/llm-adapter';
export { loadConfig } from './config';
export * from './errors';
export * from './types';
