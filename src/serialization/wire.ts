import { OutgoingRecord } from '../types/transport';
import { Attachment, EventRecord, IdentifyRecord, SignalRecord } from '../types/events';
import { SessionRecord, SessionSnapshot } from '../types/session';

export type WireValue = string | number | boolean | null | WireValue[] | { [key: string]: WireValue };
export type WireObject = { [key: string]: WireValue };

/**
 * Copies the defined entries only; the collector treats a missing key and null differently.
 */
function compact(entries: Record<string, WireValue | undefined>): WireObject {
  const result: WireObject = {};
  for (const [key, value] of Object.entries(entries)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

function attachmentToWire(attachment: Attachment): WireObject {
  return compact({
    type: attachment.type,
    name: attachment.name,
    value: attachment.value,
    role: attachment.role,
    language: attachment.language
  });
}

function eventToWire(record: EventRecord): WireObject {
  return {
    type: 'track_ai',
    message_id: record.id,
    event_id: record.id,
    user_id: record.userId,
    event: record.event,
    timestamp: record.timestamp,
    properties: { ...record.properties },
    ai_data: compact({
      model: record.model,
      input: record.input,
      output: record.output,
      convo_id: record.convoId
    }),
    attachments: record.attachments.map(attachmentToWire)
  };
}

function signalToWire(record: SignalRecord): WireObject {
  return compact({
    type: 'signal',
    message_id: record.id,
    event_id: record.eventId,
    signal_name: record.name,
    signal_type: record.type,
    sentiment: record.sentiment,
    comment: record.comment,
    timestamp: record.timestamp,
    properties: { ...record.properties }
  });
}

function identifyToWire(record: IdentifyRecord): WireObject {
  return {
    type: 'identify',
    message_id: record.id,
    user_id: record.userId,
    traits: { ...record.traits },
    timestamp: record.timestamp
  };
}

function sessionToWire(record: SessionRecord): WireObject {
  const session: SessionSnapshot = record.session;
  return compact({
    type: 'session',
    message_id: record.id,
    phase: record.phase,
    session_id: session.id,
    name: session.name,
    agent_name: session.agentName,
    status: session.status,
    started_at: session.startedAt,
    completed_at: session.completedAt,
    failure_reason: session.failureReason,
    llm_calls: session.usage.llmCalls,
    tool_calls: session.usage.toolCalls,
    prompt_tokens: session.usage.totalPromptTokens,
    completion_tokens: session.usage.totalCompletionTokens,
    total_tokens: session.usage.totalTokens,
    estimated_cost: session.usage.totalCost,
    duration_ms: session.usage.durationMs,
    custom_metrics: { ...session.customMetrics },
    timestamp: record.timestamp
  });
}

/**
 * Maps a record to the collector's JSON shape. message_id is the idempotency key.
 */
export function toWireRecord(record: OutgoingRecord): WireObject {
  switch (record.kind) {
    case 'event':
      return eventToWire(record);
    case 'signal':
      return signalToWire(record);
    case 'identify':
      return identifyToWire(record);
    case 'session':
      return sessionToWire(record);
  }
}

export function toWireBatch(batch: readonly OutgoingRecord[], sentAt: Date): WireObject {
  return {
    batch: batch.map(toWireRecord),
    sent_at: sentAt.toISOString()
  };
}
