export type Role = 'system' | 'user' | 'assistant' | 'tool';

export interface ModelToolCall {
  id: string;
  name: string;
  /** Raw JSON argument text as produced by the model. */
  arguments: string;
}

export type ConversationMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string; toolCalls?: ModelToolCall[] }
  | { role: 'tool'; toolCallId: string; content: string };

export type ToolName = 'list_log_groups' | 'fetch_logs' | 'search_logs' | 'fetch_cached_result';

export type ToolCallStatus = 'pending' | 'running' | 'succeeded' | 'failed';

export interface ToolCallRecord {
  readonly id: string;
  readonly sequence: number;
  readonly tool: string;
  readonly input: Readonly<Record<string, unknown>>;
  readonly status: ToolCallStatus;
  readonly resultSummary?: string;
  readonly cause?: string;
  readonly itemCount?: number;
  readonly truncated?: boolean;
  readonly cached?: boolean;
  /** Set on automatic window expansions: the call whose empty result triggered it. */
  readonly expansionOf?: string;
  readonly attempt?: number;
  readonly startedAt?: string;
  readonly completedAt?: string;
}

export interface LogGroupSummary {
  name: string;
  createdAt?: number;
  storedBytes?: number;
  retentionDays?: number;
}

export interface LogEvent {
  timestamp: number;
  message: string;
  group: string;
  stream?: string;
  eventId?: string;
}

export interface PartialFailure {
  scope: string;
  code: string;
  message: string;
}

export type TurnState = 'awaiting_model' | 'tool_requested' | 'final_answer' | 'terminated';

export type TerminationReason = 'answered' | 'iteration_cap_exceeded' | 'retry_attempts_exhausted' | 'fatal_error';

export type FatalCause = 'cancelled' | 'provider_unavailable' | 'invalid_request' | 'unexpected';

export interface TurnOutcome {
  reason: TerminationReason;
  fatalCause?: FatalCause;
  answer: string;
  toolCalls: ToolCallRecord[];
  modelCalls: number;
  toolCallsDispatched: number;
  nudges: number;
  startedAt: string;
  completedAt: string;
}

export type TurnEvent =
  | { type: 'state'; state: TurnState; reason?: TerminationReason }
  | { type: 'tool_call'; record: ToolCallRecord }
  | { type: 'token'; content: string }
  | { type: 'nudge'; trigger: string }
  | { type: 'complete'; outcome: TurnOutcome };

export interface CacheStats {
  entryCount: number;
  totalBytes: number;
  capacityBytes: number;
  hits: number;
  misses: number;
  evictions: number;
}

export interface TurnRequestPayload {
  message: string;
}
