import { HttpTransport } from '../../src/transport/http-transport';
import { DeliveryResult, EventRecord } from '../../src/types';
import { WRITE_KEY, silentLogger } from '../fixtures/records';

type FetchMock = jest.Mock<Promise<Response>, Parameters<typeof fetch>>;

function eventRecord(id: string): EventRecord {
  return {
    kind: 'event',
    id,
    userId: 'user_123',
    event: 'user_message',
    properties: {},
    attachments: [],
    timestamp: '2025-01-15T10:00:00.000Z'
  };
}

function failureOf(result: DeliveryResult) {
  if (result.ok) {
    throw new Error('Expected a failed delivery');
  }
  return result;
}

describe('HttpTransport', () => {
  let fetchMock: FetchMock;
  let transport: HttpTransport;
  const signal = new AbortController().signal;

  beforeEach(() => {
    fetchMock = jest.fn<Promise<Response>, Parameters<typeof fetch>>();
    transport = new HttpTransport({
      endpoint: 'http://collector.test/',
      writeKey: WRITE_KEY,
      logger: silentLogger(),
      fetch: fetchMock,
      now: () => new Date('2025-01-15T10:01:00.000Z')
    });
  });

  it('should post the batch as JSON with the write key', async () => {
    fetchMock.mockResolvedValue(new Response(null, { status: 200 }));

    const result = await transport.send([eventRecord('evt_1')], signal);

    expect(result).toEqual({ ok: true });
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://collector.test/v1/batch');
    expect(init?.method).toBe('POST');
    expect(init?.signal).toBe(signal);
    expect(init?.headers).toEqual({
      'content-type': 'application/json',
      authorization: `Bearer ${WRITE_KEY}`
    });
    expect(JSON.parse(String(init?.body))).toEqual({
      batch: [
        {
          type: 'track_ai',
          message_id: 'evt_1',
          event_id: 'evt_1',
          user_id: 'user_123',
          event: 'user_message',
          timestamp: '2025-01-15T10:00:00.000Z',
          properties: {},
          ai_data: {},
          attachments: []
        }
      ],
      sent_at: '2025-01-15T10:01:00.000Z'
    });
  });

  it('should release response bodies it does not read', async () => {
    const accepted = new Response('accepted', { status: 202 });
    const rejected = new Response('unavailable', { status: 503 });
    fetchMock.mockResolvedValueOnce(accepted).mockResolvedValueOnce(rejected);

    await transport.send([eventRecord('evt_1')], signal);
    await transport.send([eventRecord('evt_1')], signal);

    expect(accepted.bodyUsed).toBe(true);
    expect(rejected.bodyUsed).toBe(true);
  });

  it('should treat server errors and throttling as retryable', async () => {
    fetchMock.mockResolvedValueOnce(new Response(null, { status: 503 }));
    fetchMock.mockResolvedValueOnce(new Response(null, { status: 429 }));

    const unavailable = failureOf(await transport.send([eventRecord('evt_1')], signal));
    const throttled = failureOf(await transport.send([eventRecord('evt_1')], signal));

    expect(unavailable.error.message).toBe('Collector responded with status 503');
    expect(unavailable.error.retryable).toBe(true);
    expect(unavailable.error.status).toBe(503);
    expect(throttled.error.retryable).toBe(true);
  });

  it('should treat other client errors as permanent', async () => {
    fetchMock.mockResolvedValue(new Response(null, { status: 401 }));

    const result = failureOf(await transport.send([eventRecord('evt_1')], signal));

    expect(result.error.retryable).toBe(false);
    expect(result.failedIds).toBeUndefined();
  });

  it('should report the ids refused in a partial success', async () => {
    fetchMock.mockResolvedValue(new Response(JSON.stringify({ failed: ['evt_2'], accepted: 1 }), { status: 207 }));

    const result = failureOf(await transport.send([eventRecord('evt_1'), eventRecord('evt_2')], signal));

    expect(result.failedIds).toEqual(['evt_2']);
    expect(result.error.message).toBe('Collector refused 1 of 2 records');
  });

  it('should accept a partial success that refused nothing', async () => {
    fetchMock.mockResolvedValue(new Response(JSON.stringify({ failed: [] }), { status: 207 }));

    expect(await transport.send([eventRecord('evt_1')], signal)).toEqual({ ok: true });
  });

  it('should turn a network error into a retryable failure', async () => {
    fetchMock.mockRejectedValue(new TypeError('fetch failed'));

    const result = failureOf(await transport.send([eventRecord('evt_1')], signal));

    expect(result.error.message).toBe('fetch failed');
    expect(result.error.retryable).toBe(true);
  });
});
