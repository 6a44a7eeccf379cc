import { toWireBatch, toWireRecord } from '../../src/serialization/wire';
import { EventRecord, SessionRecord, SignalRecord } from '../../src/types';

const TIMESTAMP = '2025-01-15T10:00:00.000Z';

describe('wire serialization', () => {
  it('should map an event to the track_ai shape', () => {
    const record: EventRecord = {
      kind: 'event',
      id: 'evt_1',
      userId: 'user_123',
      event: 'code_generation',
      model: 'gemini-2.5-pro',
      input: 'Write fib',
      output: 'function fib() {}',
      properties: { turn: 1 },
      attachments: [{ type: 'code', name: 'fib.ts', value: 'function fib() {}', role: 'output', language: 'typescript' }],
      timestamp: TIMESTAMP
    };

    expect(toWireRecord(record)).toEqual({
      type: 'track_ai',
      message_id: 'evt_1',
      event_id: 'evt_1',
      user_id: 'user_123',
      event: 'code_generation',
      timestamp: TIMESTAMP,
      properties: { turn: 1 },
      ai_data: { model: 'gemini-2.5-pro', input: 'Write fib', output: 'function fib() {}' },
      attachments: [{ type: 'code', name: 'fib.ts', value: 'function fib() {}', role: 'output', language: 'typescript' }]
    });
  });

  it('should leave absent optional fields out instead of sending null', () => {
    const record: SignalRecord = {
      kind: 'signal',
      id: 'sig_1',
      eventId: 'evt_1',
      name: 'user_feedback',
      type: 'feedback',
      comment: 'Very helpful',
      properties: {},
      timestamp: TIMESTAMP
    };

    const wire = toWireRecord(record);

    expect(wire).toEqual({
      type: 'signal',
      message_id: 'sig_1',
      event_id: 'evt_1',
      signal_name: 'user_feedback',
      signal_type: 'feedback',
      comment: 'Very helpful',
      timestamp: TIMESTAMP,
      properties: {}
    });
    expect(Object.keys(wire)).not.toContain('sentiment');
  });

  it('should keep a signal property that shares its name with the comment field', () => {
    const withoutComment: SignalRecord = {
      kind: 'signal',
      id: 'sig_2',
      eventId: 'evt_1',
      name: 'user_feedback',
      type: 'feedback',
      properties: { comment: 'from properties' },
      timestamp: TIMESTAMP
    };
    const withComment: SignalRecord = { ...withoutComment, comment: 'typed by the user' };

    expect(toWireRecord(withoutComment).properties).toEqual({ comment: 'from properties' });
    expect(toWireRecord(withComment)).toMatchObject({
      comment: 'typed by the user',
      properties: { comment: 'from properties' }
    });
  });

  it('should flatten a session record', () => {
    const record: SessionRecord = {
      kind: 'session',
      id: 'sess_1:completed',
      phase: 'completed',
      session: {
        id: 'sess_1',
        name: 'Support run',
        agentName: 'support_agent',
        status: 'succeeded',
        startedAt: TIMESTAMP,
        completedAt: '2025-01-15T10:00:05.000Z',
        usage: {
          llmCalls: 3,
          toolCalls: 6,
          totalPromptTokens: 300,
          totalCompletionTokens: 150,
          totalTokens: 450,
          totalCost: 0.03,
          durationMs: 5000
        },
        customMetrics: { escalation_rate: 0 }
      },
      timestamp: '2025-01-15T10:00:05.000Z'
    };

    expect(toWireRecord(record)).toEqual({
      type: 'session',
      message_id: 'sess_1:completed',
      phase: 'completed',
      session_id: 'sess_1',
      name: 'Support run',
      agent_name: 'support_agent',
      status: 'succeeded',
      started_at: TIMESTAMP,
      completed_at: '2025-01-15T10:00:05.000Z',
      llm_calls: 3,
      tool_calls: 6,
      prompt_tokens: 300,
      completion_tokens: 150,
      total_tokens: 450,
      estimated_cost: 0.03,
      duration_ms: 5000,
      custom_metrics: { escalation_rate: 0 },
      timestamp: '2025-01-15T10:00:05.000Z'
    });
  });

  it('should wrap records with the send time', () => {
    const wire = toWireBatch(
      [{ kind: 'identify', id: 'idt_1', userId: 'user_123', traits: { plan: 'trial' }, timestamp: TIMESTAMP }],
      new Date('2025-01-15T10:01:00.000Z')
    );

    expect(wire).toEqual({
      batch: [{ type: 'identify', message_id: 'idt_1', user_id: 'user_123', traits: { plan: 'trial' }, timestamp: TIMESTAMP }],
      sent_at: '2025-01-15T10:01:00.000Z'
    });
  });
});
