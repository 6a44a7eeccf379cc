import { AlreadyCompletedError } from '../errors';
import { SessionOutcome, SessionSnapshot, SessionStatus, UsageSummary } from '../types/session';
import { llmCallSchema, sessionOutcomeSchema, validate } from '../validation/schemas';

export interface SessionOptions {
  now?: () => Date;
  /** Called once, synchronously, when the session reaches a terminal status */
  onComplete?: (snapshot: SessionSnapshot) => void;
}

function roundCost(cost: number): number {
  return Number(cost.toFixed(6));
}

/**
 * Usage counters and outcome of one agent run.
 *
 * pending -> succeeded | failed. Counters only grow while pending and are
 * frozen once the session completes.
 */
export class Session {
  readonly id: string;
  readonly name: string;
  readonly agentName: string;

  private status: SessionStatus = 'pending';
  private llmCalls = 0;
  private toolCalls = 0;
  private promptTokens = 0;
  private completionTokens = 0;
  private cost = 0;
  private readonly startedAt: Date;
  private completedAt?: Date;
  private failureReason?: string;
  private reported: Partial<UsageSummary> = {};
  private customMetrics: Record<string, number> = {};
  private readonly toolCounts = new Map<string, number>();
  private readonly now: () => Date;
  private readonly onComplete?: (snapshot: SessionSnapshot) => void;

  constructor(id: string, name: string, agentName: string, options: SessionOptions = {}) {
    this.id = id;
    this.name = name;
    this.agentName = agentName;
    this.now = options.now ?? (() => new Date());
    this.onComplete = options.onComplete;
    this.startedAt = this.now();
  }

  recordLlmCall(promptTokens: number, completionTokens: number, costEstimate: number = 0): void {
    this.assertPending();
    validate(llmCallSchema, { promptTokens, completionTokens, costEstimate }, 'LLM call');

    this.llmCalls++;
    this.promptTokens += promptTokens;
    this.completionTokens += completionTokens;
    this.cost += costEstimate;
  }

  recordToolCall(toolName: string): void {
    this.assertPending();
    this.toolCalls++;
    this.toolCounts.set(toolName, (this.toolCounts.get(toolName) ?? 0) + 1);
  }

  /**
   * Aggregated counters. Duration runs until now while pending, until completion afterwards.
   */
  usageSummary(): UsageSummary {
    const end = this.completedAt ?? this.now();
    return {
      llmCalls: this.llmCalls,
      toolCalls: this.toolCalls,
      totalPromptTokens: this.promptTokens,
      totalCompletionTokens: this.completionTokens,
      totalTokens: this.promptTokens + this.completionTokens,
      totalCost: roundCost(this.cost),
      durationMs: Math.max(0, end.getTime() - this.startedAt.getTime())
    };
  }

  toolUsage(): Record<string, number> {
    return Object.fromEntries(this.toolCounts);
  }

  getStatus(): SessionStatus {
    return this.status;
  }

  isCompleted(): boolean {
    return this.status !== 'pending';
  }

  complete(outcome: SessionOutcome): SessionSnapshot {
    this.assertPending();
    const checked = validate(sessionOutcomeSchema, outcome, 'session outcome');

    this.completedAt = this.now();
    this.status = checked.success ? 'succeeded' : 'failed';
    this.failureReason = checked.success ? undefined : checked.failureReason;
    this.customMetrics = { ...checked.customMetrics };
    this.reported = {
      durationMs: checked.durationMs,
      totalCost: checked.estimatedCost,
      totalPromptTokens: checked.promptTokens,
      totalCompletionTokens: checked.completionTokens,
      totalTokens: checked.totalTokens
    };

    const snapshot = this.snapshot();
    this.onComplete?.(snapshot);
    return snapshot;
  }

  /**
   * Immutable view for the wire. Values reported at completion take precedence over aggregated ones.
   */
  snapshot(): SessionSnapshot {
    const aggregated = this.usageSummary();
    const usage: UsageSummary = {
      llmCalls: aggregated.llmCalls,
      toolCalls: aggregated.toolCalls,
      totalPromptTokens: this.reported.totalPromptTokens ?? aggregated.totalPromptTokens,
      totalCompletionTokens: this.reported.totalCompletionTokens ?? aggregated.totalCompletionTokens,
      totalTokens: this.reported.totalTokens ?? aggregated.totalTokens,
      totalCost: this.reported.totalCost ?? aggregated.totalCost,
      durationMs: this.reported.durationMs ?? aggregated.durationMs
    };

    return Object.freeze({
      id: this.id,
      name: this.name,
      agentName: this.agentName,
      status: this.status,
      startedAt: this.startedAt.toISOString(),
      completedAt: this.completedAt?.toISOString(),
      failureReason: this.failureReason,
      usage: Object.freeze(usage),
      customMetrics: Object.freeze({ ...this.customMetrics })
    });
  }

  private assertPending(): void {
    if (this.status !== 'pending') {
      throw new AlreadyCompletedError(this.id);
    }
  }
}
