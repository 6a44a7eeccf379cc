import pino, { Logger } from 'pino';
import { TrackingClient } from '../client/tracking-client';
import { Attachment, PropertyValue } from '../types/events';
import { estimateCostUsd, PricingTable, DEFAULT_PRICING } from '../sessions/pricing';

export interface LlmMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LlmRequest {
  model: string;
  messages: LlmMessage[];
}

export interface LlmUsage {
  promptTokens: number;
  completionTokens: number;
}

export interface LlmResponse {
  text: string;
  usage?: LlmUsage;
}

/**
 * Any model backend. The adapter only reads the output text and token usage.
 */
export interface LlmProvider {
  generate(request: LlmRequest): Promise<LlmResponse>;
}

export interface ToolCall {
  name: string;
  arguments: Record<string, PropertyValue>;
  result: string;
  durationMs?: number;
}

export interface AgentTurn {
  input: string;
  output: string;
  model?: string;
  toolCalls?: ToolCall[];
}

export interface TrackedLlmOptions {
  userId: string;
  eventName?: string;
  sessionId?: string;
  convoId?: string;
  pricing?: PricingTable;
  logger?: Logger;
}

function lastUserMessage(messages: LlmMessage[]): string {
  for (let i = messages.length - 1; i >= 0; i--) {
    if (messages[i].role === 'user') {
      return messages[i].content;
    }
  }
  return '';
}

/**
 * Wraps an LLM provider so every call is tracked as an event and counted
 * on the session, if one is given.
 *
 * Tracking is best-effort: if the client refuses a record the failure is
 * logged and the caller still gets the model's answer. Provider errors are
 * tracked as a failed event and re-thrown unchanged.
 */
export class TrackedLlm {
  private readonly logger: Logger;
  private readonly eventName: string;
  private readonly pricing: PricingTable;
  private turnNumber = 0;

  constructor(
    private readonly provider: LlmProvider,
    private readonly client: TrackingClient,
    private readonly options: TrackedLlmOptions
  ) {
    this.logger = options.logger ?? pino({ name: 'tracked-llm', level: 'info' });
    this.eventName = options.eventName ?? 'llm_call';
    this.pricing = options.pricing ?? DEFAULT_PRICING;
  }

  async generate(request: LlmRequest): Promise<LlmResponse> {
    const startTime = Date.now();
    const input = lastUserMessage(request.messages);

    let response: LlmResponse;
    try {
      response = await this.provider.generate(request);
    } catch (error) {
      this.trackSafely(() => {
        this.client.trackEvent({
          userId: this.options.userId,
          event: `${this.eventName}_failed`,
          model: request.model,
          input,
          output: error instanceof Error ? error.message : String(error),
          convoId: this.options.convoId,
          properties: {
            error: true,
            error_type: error instanceof Error ? error.name : 'Unknown',
            latency_ms: Date.now() - startTime
          }
        });
      });
      throw error;
    }

    const latencyMs = Date.now() - startTime;
    const promptTokens = response.usage?.promptTokens ?? 0;
    const completionTokens = response.usage?.completionTokens ?? 0;
    const cost = estimateCostUsd({ model: request.model, promptTokens, completionTokens }, this.pricing);

    this.trackSafely(() => {
      this.sessionOrUndefined()?.recordLlmCall(promptTokens, completionTokens, cost);
    });

    this.trackSafely(() => {
      this.client.trackEvent({
        userId: this.options.userId,
        event: this.eventName,
        model: request.model,
        input,
        output: response.text,
        convoId: this.options.convoId,
        properties: {
          latency_ms: latencyMs,
          prompt_tokens: promptTokens,
          completion_tokens: completionTokens,
          estimated_cost: cost
        }
      });
    });

    return response;
  }

  /**
   * Tracks one turn of an agent loop, tool calls attached as JSON. Returns the event id, if tracked.
   */
  recordTurn(turn: AgentTurn): string | undefined {
    this.turnNumber++;
    const toolCalls = turn.toolCalls ?? [];

    const attachments: Attachment[] = toolCalls.map(call => ({
      type: 'other',
      name: `tool:${call.name}`,
      value: JSON.stringify({ arguments: call.arguments, result: call.result }),
      role: 'output',
      language: 'json'
    }));

    let eventId: string | undefined;
    this.trackSafely(() => {
      const session = this.sessionOrUndefined();
      for (const call of toolCalls) {
        session?.recordToolCall(call.name);
      }
    });

    this.trackSafely(() => {
      eventId = this.client.trackEvent({
        userId: this.options.userId,
        event: 'agent_turn',
        model: turn.model,
        input: turn.input,
        output: turn.output,
        convoId: this.options.convoId,
        properties: {
          turn_number: this.turnNumber,
          tool_calls: toolCalls.length,
          tool_time_ms: toolCalls.reduce((total, call) => total + (call.durationMs ?? 0), 0)
        },
        attachments
      });
    });

    return eventId;
  }

  private sessionOrUndefined() {
    return this.options.sessionId ? this.client.getSession(this.options.sessionId) : undefined;
  }

  private trackSafely(operation: () => void): void {
    try {
      operation();
    } catch (error) {
      this.logger.warn(
        { error: error instanceof Error ? error.message : String(error), sessionId: this.options.sessionId },
        'Tracking failed, continuing'
      );
    }
  }
}
