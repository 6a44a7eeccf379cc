export type SessionStatus = 'pending' | 'succeeded' | 'failed';

export interface UsageSummary {
  llmCalls: number;
  toolCalls: number;
  totalPromptTokens: number;
  totalCompletionTokens: number;
  totalTokens: number;
  totalCost: number;
  durationMs: number;
}

/**
 * Values reported when a session completes. Any usage figure left out
 * falls back to what the session aggregated itself.
 */
export interface SessionOutcome {
  success: boolean;
  failureReason?: string;
  durationMs?: number;
  estimatedCost?: number;
  promptTokens?: number;
  completionTokens?: number;
  totalTokens?: number;
  customMetrics?: Record<string, number>;
}

export interface SessionSnapshot {
  readonly id: string;
  readonly name: string;
  readonly agentName: string;
  readonly status: SessionStatus;
  readonly startedAt: string;
  readonly completedAt?: string;
  readonly failureReason?: string;
  readonly usage: Readonly<UsageSummary>;
  readonly customMetrics: Readonly<Record<string, number>>;
}

export type SessionPhase = 'started' | 'completed';

export interface SessionRecord {
  readonly kind: 'session';
  /** `<sessionId>:<phase>`, stable across retries */
  readonly id: string;
  readonly phase: SessionPhase;
  readonly session: SessionSnapshot;
  readonly timestamp: string;
}
