import Joi from 'joi';
import { Logger } from 'pino';
import rawScript from './script.json';
import { TrackingClient } from '../client/tracking-client';
import { TrackedLlm, ToolCall, LlmMessage, LlmProvider } from '../adapters/llm-adapter';
import { ScriptedProvider } from './scripted-provider';
import { validate } from '../validation/schemas';

export interface DemoScript {
  userId: string;
  model: string;
  conversation: { user: string; assistant: string }[];
  agent: {
    name: string;
    sessionName: string;
    request: string;
    steps: { output: string; tools: ToolCall[] }[];
  };
}

const scriptSchema = Joi.object<DemoScript>({
  userId: Joi.string().required(),
  model: Joi.string().required(),
  conversation: Joi.array().items(Joi.object({
    user: Joi.string().required(),
    assistant: Joi.string().required()
  })).min(1).required(),
  agent: Joi.object({
    name: Joi.string().required(),
    sessionName: Joi.string().required(),
    request: Joi.string().required(),
    steps: Joi.array().items(Joi.object({
      output: Joi.string().required(),
      tools: Joi.array().items(Joi.object({
        name: Joi.string().required(),
        arguments: Joi.object().pattern(Joi.string(), [Joi.string(), Joi.number(), Joi.boolean()]).required(),
        result: Joi.string().required(),
        durationMs: Joi.number().min(0).optional()
      })).required()
    })).min(1).required()
  }).required()
});

export function loadDemoScript(): DemoScript {
  return validate(scriptSchema, rawScript, 'demo script');
}

export interface ScenarioContext {
  client: TrackingClient;
  script: DemoScript;
  logger: Logger;
  /** Model backend; a ScriptedProvider over the script's replies when absent */
  provider?: LlmProvider;
  clock?: () => number;
}

export interface Scenario {
  name: string;
  run(context: ScenarioContext): Promise<string[]>;
}

export interface ScenarioResult {
  name: string;
  ok: boolean;
  notes: string[];
  error?: string;
}

const SUPPORT_PROMPT = 'You are a customer support representative. Keep responses brief and solution-oriented.';

export const basicTracking: Scenario = {
  name: 'Basic AI tracking',
  async run({ client, script }) {
    client.identify(script.userId, { name: 'Test User', email: 'test@example.com', plan: 'trial' });

    const input = 'What is the capital of France?';
    const eventId = client.trackEvent({
      userId: script.userId,
      event: 'user_message',
      model: script.model,
      input,
      output: 'The capital of France is Paris.',
      convoId: 'test_convo_001',
      properties: { system_prompt: 'You are a helpful assistant.', experiment: 'tracking_demo' }
    });

    const result = await client.flush();
    return [`user identified`, `tracked ${eventId}`, `flushed ${result.delivered} records`];
  }
};

export const signalTracking: Scenario = {
  name: 'Signal tracking',
  async run({ client, script, clock = Date.now }) {
    const eventId = `evt_${Math.floor(clock() / 1000)}`;
    client.trackEvent({
      userId: script.userId,
      event: 'chatbot_response',
      eventId,
      model: script.model,
      input: 'How do I reset my password?',
      output: "You can reset your password by clicking 'Forgot Password' on the login page."
    });

    client.trackSignal({ eventId, name: 'thumbs_up', type: 'default', sentiment: 'POSITIVE' });
    client.trackSignal({ eventId, name: 'user_feedback', type: 'feedback', comment: 'This was very helpful, thanks!' });

    await client.flush();
    return [`created ${eventId}`, 'tracked thumbs_up and feedback signals'];
  }
};

export const partialEvent: Scenario = {
  name: 'Partial event tracking',
  async run({ client, script }) {
    const interaction = client.beginInteraction({
      userId: script.userId,
      event: 'code_generation',
      input: 'Write a function to calculate fibonacci numbers'
    });

    interaction.addAttachments([
      { type: 'text', name: 'Additional context', value: 'It should be recursive and handle edge cases', role: 'input' }
    ]);

    const code = [
      'function fibonacci(n: number): number {',
      "  if (n < 0) throw new RangeError('n must be non-negative');",
      '  return n <= 1 ? n : fibonacci(n - 1) + fibonacci(n - 2);',
      '}'
    ].join('\n');

    const record = interaction.finish({
      output: code,
      attachments: [{ type: 'code', name: 'fibonacci.ts', value: code, role: 'output', language: 'typescript' }]
    });

    await client.flush();
    return [`started ${interaction.id}`, `finished with ${record.attachments.length} attachments`];
  }
};

export const conversation: Scenario = {
  name: 'Multi-turn conversation',
  async run({ client, script, provider, clock = Date.now }) {
    const llm = provider ?? new ScriptedProvider(script.conversation.map(turn => turn.assistant));
    const convoId = `convo_${Math.floor(clock() / 1000)}`;
    const history: LlmMessage[] = [];
    const notes: string[] = [];

    for (const [index, turn] of script.conversation.entries()) {
      history.push({ role: 'user', content: turn.user });
      const response = await llm.generate({ model: script.model, messages: [...history] });
      history.push({ role: 'assistant', content: response.text });

      const eventId = `evt_${convoId}_${index}`;
      client.trackEvent({
        userId: script.userId,
        event: 'chatbot_turn',
        eventId,
        model: script.model,
        input: turn.user,
        output: response.text,
        convoId,
        properties: {
          turn_number: index + 1,
          total_tokens: (response.usage?.promptTokens ?? 0) + (response.usage?.completionTokens ?? 0)
        }
      });
      notes.push(`turn ${index + 1} tracked`);

      if (index === script.conversation.length - 1) {
        client.trackSignal({ eventId, name: 'thumbs_up', type: 'default', sentiment: 'POSITIVE' });
        notes.push('thumbs up on last turn');
      }
    }

    await client.flush();
    return notes;
  }
};

export const failureScenario: Scenario = {
  name: 'Error scenario',
  async run({ client, script, clock = Date.now }) {
    const eventId = `evt_error_${Math.floor(clock() / 1000)}`;
    client.trackEvent({
      userId: script.userId,
      event: 'tool_call_failed',
      eventId,
      model: script.model,
      input: 'Book me a flight to Tokyo',
      output: 'I encountered an error while searching for flights. The booking service is unavailable.',
      properties: { error: true, error_type: 'api_timeout', tool_name: 'flight_search' }
    });

    client.trackSignal({ eventId, name: 'thumbs_down', type: 'default', sentiment: 'NEGATIVE' });
    client.trackSignal({
      eventId,
      name: 'user_frustration',
      type: 'feedback',
      comment: 'This is the third time the booking has not worked!'
    });

    await client.flush();
    return ['tracked failed interaction', 'tracked thumbs_down and frustration signals'];
  }
};

export const agentSession: Scenario = {
  name: 'Support agent session',
  async run({ client, script, provider, logger }) {
    const { agent } = script;
    const sessionId = client.createSession(agent.sessionName, agent.name);
    const llm = new TrackedLlm(
      provider ?? new ScriptedProvider(agent.steps.map(step => step.output)),
      client,
      { userId: script.userId, sessionId, eventName: 'agent_llm_call', logger }
    );

    const messages: LlmMessage[] = [
      { role: 'system', content: SUPPORT_PROMPT },
      { role: 'user', content: agent.request }
    ];

    try {
      for (const step of agent.steps) {
        const response = await llm.generate({ model: script.model, messages: [...messages] });
        messages.push({ role: 'assistant', content: response.text });
        llm.recordTurn({ input: agent.request, output: response.text, model: script.model, toolCalls: step.tools });
      }
    } catch (error) {
      const usage = client.getSession(sessionId)?.usageSummary();
      client.completeSession(sessionId, {
        success: false,
        failureReason: error instanceof Error ? error.message : String(error),
        durationMs: usage?.durationMs,
        estimatedCost: usage?.totalCost
      });
      throw error;
    }

    const session = client.getSession(sessionId);
    const usage = session?.usageSummary();
    const snapshot = client.completeSession(sessionId, {
      success: true,
      customMetrics: {
        first_contact_resolution: 1,
        escalation_rate: 0,
        tools_called: usage?.toolCalls ?? 0
      }
    });

    return [
      `session ${sessionId} ${snapshot.status}`,
      `llm calls: ${snapshot.usage.llmCalls}, tool calls: ${snapshot.usage.toolCalls}`,
      `tokens: ${snapshot.usage.totalTokens}, estimated cost: $${snapshot.usage.totalCost.toFixed(4)}`
    ];
  }
};

export const ALL_SCENARIOS: Scenario[] = [
  basicTracking,
  signalTracking,
  partialEvent,
  conversation,
  failureScenario,
  agentSession
];

/**
 * Runs every scenario in order. A failing scenario is recorded and the rest still run.
 */
export async function runScenarios(
  context: ScenarioContext,
  scenarios: Scenario[] = ALL_SCENARIOS
): Promise<ScenarioResult[]> {
  const results: ScenarioResult[] = [];

  for (const scenario of scenarios) {
    try {
      const notes = await scenario.run(context);
      results.push({ name: scenario.name, ok: true, notes });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      context.logger.error({ scenario: scenario.name, error: message }, 'Scenario failed');
      results.push({ name: scenario.name, ok: false, notes: [], error: message });
    }
  }

  return results;
}
