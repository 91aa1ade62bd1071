import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import type {
  ConversationMessage,
  FatalCause,
  ModelToolCall,
  TerminationReason,
  ToolCallRecord,
  TurnEvent,
  TurnOutcome
} from '../../../shared/types.js';
import { summarizeArchive } from '../cache/resultArchive.js';
import type { ArchivedResult, ResultArchive } from '../cache/resultArchive.js';
import type { ResultCache } from '../cache/resultCache.js';
import { StagedWrites } from '../cache/stagedWrites.js';
import type { AppConfig } from '../config/app.js';
import type { LanguageModel, ModelResponse } from '../llm/languageModel.js';
import { describeScope, isBoundedWindow } from '../retrieval/request.js';
import {
  invocationInput,
  invocationSignature,
  invocationWindow,
  isRetrievalInvocation,
  parseToolInvocation,
  TOOL_SPECS,
  toRetrievalRequest,
  withWindow
} from '../tools/definitions.js';
import type { ToolInvocation } from '../tools/definitions.js';
import type { ToolAdapter, ToolResult } from '../tools/index.js';
import { abortableCall, throwIfAborted } from '../utils/abort.js';
import {
  CancelledError,
  errorMessage,
  InvalidModelRequestError,
  isAbortError,
  ProviderUnavailableError,
  TurnInProgressError
} from '../utils/errors.js';
import { createComponentLogger } from '../utils/logger.js';
import { OtelTurnMetrics, traced } from '../utils/telemetry.js';
import type { RetryReason, TurnMetrics } from '../utils/telemetry.js';
import { formatDuration, formatInstant } from '../utils/time.js';
import { estimateTokens } from './contextBudget.js';
import { expandWindow, RetryState } from './expansion.js';
import type { ExpansionPolicy } from './expansion.js';
import type { LogGroupCatalog } from './groupCatalog.js';
import { detectPrematureGivingUp, detectStatedIntent } from './intent.js';
import type { IntentRule } from './intent.js';
import { buildSystemPrompt, GIVING_UP_NUDGE, INTENT_NUDGE } from './prompts.js';
import { ToolCallLog } from './toolCallLog.js';
import {
  fitToolResult,
  isEmptyResult,
  renderArchivedSummary,
  renderNotDispatched,
  renderToolError,
  summarizeResult
} from './toolMessages.js';

export interface OrchestratorSettings {
  maxToolIterations: number;
  expansion: ExpansionPolicy;
  intentDetection: boolean;
  intentRules?: readonly IntentRule[];
  intentThreshold?: number;
  givingUpPatterns?: readonly RegExp[];
  maxResultTokens: number;
  /** Budget for the system prompt plus history sent with each model call. */
  maxHistoryTokens: number;
  itemCap: number;
}

export function settingsFromConfig(appConfig: AppConfig): OrchestratorSettings {
  return {
    maxToolIterations: appConfig.MAX_TOOL_ITERATIONS,
    expansion: {
      enabled: appConfig.AUTO_RETRY_ENABLED,
      maxRetryAttempts: appConfig.MAX_RETRY_ATTEMPTS,
      factor: appConfig.TIME_EXPANSION_FACTOR
    },
    intentDetection: appConfig.INTENT_DETECTION_ENABLED,
    maxResultTokens: appConfig.MAX_RESULT_TOKENS,
    maxHistoryTokens: appConfig.MAX_HISTORY_TOKENS,
    itemCap: appConfig.TOOL_ITEM_CAP
  };
}

export interface OrchestratorOptions {
  conversationId?: string;
  model: LanguageModel;
  tools: ToolAdapter;
  cache: ResultCache;
  settings: OrchestratorSettings;
  /** Receives event lists too large for the model context. Without one they are cut to fit. */
  archive?: ResultArchive;
  catalog?: LogGroupCatalog;
  metrics?: TurnMetrics;
  now?: () => number;
  logger?: Logger;
}

export interface TurnOptions {
  onEvent?: (event: TurnEvent) => void;
}

interface TurnContext {
  signal: AbortSignal;
  retry: RetryState;
  log: ToolCallLog;
  /** Human-readable scope per retried signature, for the exhaustion explanation. */
  scopes: Map<string, string>;
  emptyResults: number;
}

interface StepContext {
  staging: StagedWrites;
  /** First run of each signature in the step; later calls with that signature share it. */
  inFlight: Map<string, Promise<CallOutcome>>;
  archived: ArchivedResult[];
}

interface Nudge {
  trigger: string;
  content: string;
  reason: RetryReason;
}

interface CallOutcome {
  primary: ConversationMessage;
  followUps: ConversationMessage[];
  empty: boolean;
  capped: boolean;
  exhaustedSignature?: string;
}

interface StepOutcome {
  messages: ConversationMessage[];
  capped: boolean;
  exhaustedSignatures: string[];
}

type DispatchResult = { ok: true; result: ToolResult } | { ok: false; error: unknown };

const EMPTY_RESPONSE = 'The model returned an empty response.';

function toolMessage(toolCallId: string, content: string): ConversationMessage {
  return { role: 'tool', toolCallId, content };
}

function messageText(message: ConversationMessage): string {
  if (message.role === 'assistant' && message.toolCalls?.length) {
    return message.content + message.toolCalls.map((call) => `${call.name}(${call.arguments})`).join('\n');
  }
  return message.content;
}

function recordInput(rawArguments: string): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(rawArguments || '{}');
    if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) {
      return { ...parsed };
    }
  } catch {
    return { raw: rawArguments };
  }
  return { raw: rawArguments };
}

/**
 * Turn-level state machine for one conversation. Each turn alternates model
 * calls and tool steps until the model answers, the tool call budget runs
 * out, empty-result retries are exhausted, or a fatal error ends it. A
 * completed step lands in history all at once; a cancelled or failed step
 * leaves history, the cache and the result archive untouched. Earlier turns
 * are pruned from history when it outgrows its token budget.
 */
export class Orchestrator {
  readonly conversationId: string;
  private readonly model: LanguageModel;
  private readonly tools: ToolAdapter;
  private readonly cache: ResultCache;
  private readonly settings: OrchestratorSettings;
  private readonly archive?: ResultArchive;
  private readonly catalog?: LogGroupCatalog;
  private readonly metrics: TurnMetrics;
  private readonly now: () => number;
  private readonly logger: Logger;

  private readonly history: ConversationMessage[] = [];
  private active?: AbortController;
  private lastLog?: ToolCallLog;
  private lastActive: number;

  constructor(options: OrchestratorOptions) {
    this.conversationId = options.conversationId ?? randomUUID();
    this.model = options.model;
    this.tools = options.tools;
    this.cache = options.cache;
    this.settings = options.settings;
    this.archive = options.archive;
    this.catalog = options.catalog;
    this.metrics = options.metrics ?? new OtelTurnMetrics();
    this.now = options.now ?? Date.now;
    this.lastActive = this.now();
    this.logger = (options.logger ?? createComponentLogger('orchestrator')).child({
      conversationId: this.conversationId
    });
  }

  get busy(): boolean {
    return this.active !== undefined;
  }

  /** When the last turn started or finished. */
  get lastActiveAt(): number {
    return this.lastActive;
  }

  getHistory(): readonly ConversationMessage[] {
    return [...this.history];
  }

  /** Records of the current or most recent turn, in dispatch order. */
  getToolCalls(): readonly ToolCallRecord[] {
    return this.lastLog?.snapshot() ?? [];
  }

  /** Aborts the running turn. Returns false when no turn is running. */
  cancelTurn(): boolean {
    if (!this.active) {
      return false;
    }
    this.logger.info('turn cancellation requested');
    this.active.abort();
    return true;
  }

  async runTurn(utterance: string, options: TurnOptions = {}): Promise<TurnOutcome> {
    if (this.active) {
      throw new TurnInProgressError(this.conversationId);
    }
    const controller = new AbortController();
    this.active = controller;
    this.lastActive = this.now();
    try {
      return await traced('orchestrator.turn', () => this.executeTurn(utterance, controller.signal, options), {
        'conversation.id': this.conversationId,
        'model.name': this.model.name
      });
    } finally {
      this.active = undefined;
      this.lastActive = this.now();
    }
  }

  private async executeTurn(utterance: string, signal: AbortSignal, options: TurnOptions): Promise<TurnOutcome> {
    const startedAt = this.now();
    const emit = (event: TurnEvent) => {
      if (!options.onEvent) return;
      try {
        options.onEvent(event);
      } catch (error) {
        this.logger.warn({ err: error, event: event.type }, 'turn event listener failed');
      }
    };

    const log = new ToolCallLog((record) => emit({ type: 'tool_call', record }));
    this.lastLog = log;
    const context: TurnContext = { signal, retry: new RetryState(), log, scopes: new Map(), emptyResults: 0 };
    let modelCalls = 0;
    let nudges = 0;

    const finish = (reason: TerminationReason, answer: string, fatalCause?: FatalCause): TurnOutcome => {
      emit({ type: 'state', state: 'terminated', reason });
      const outcome: TurnOutcome = {
        reason,
        ...(fatalCause ? { fatalCause } : {}),
        answer,
        toolCalls: [...log.snapshot()],
        modelCalls,
        toolCallsDispatched: context.retry.toolCallsThisTurn,
        nudges,
        startedAt: formatInstant(startedAt),
        completedAt: formatInstant(this.now())
      };
      this.logger.info(
        { reason, fatalCause, modelCalls, toolCalls: outcome.toolCallsDispatched, nudges },
        'turn finished'
      );
      emit({ type: 'complete', outcome });
      return outcome;
    };

    this.history.push({ role: 'user', content: utterance });
    let nudgedThisIteration = false;

    try {
      while (true) {
        emit({ type: 'state', state: 'awaiting_model' });
        modelCalls += 1;
        const response = await this.callModel(signal, emit);

        if (response.toolCalls.length === 0) {
          const nudge = nudgedThisIteration ? undefined : this.detectNudge(response.text, context);
          if (nudge) {
            nudgedThisIteration = true;
            nudges += 1;
            this.metrics.retryAttempt(nudge.reason);
            this.history.push({ role: 'assistant', content: response.text }, { role: 'system', content: nudge.content });
            this.logger.debug({ reason: nudge.reason, trigger: nudge.trigger }, 'nudging the model to use its tools');
            emit({ type: 'nudge', trigger: nudge.trigger });
            continue;
          }

          const answer = response.text || EMPTY_RESPONSE;
          this.history.push({ role: 'assistant', content: answer });
          emit({ type: 'state', state: 'final_answer' });
          return finish('answered', answer);
        }

        nudgedThisIteration = false;
        emit({ type: 'state', state: 'tool_requested' });
        const step = await this.runToolStep(response, context);
        this.history.push(...step.messages);

        if (step.capped) {
          const answer = this.capExplanation(log);
          this.history.push({ role: 'assistant', content: answer });
          emit({ type: 'token', content: answer });
          return finish('iteration_cap_exceeded', answer);
        }

        if (step.exhaustedSignatures.length) {
          const answer = this.exhaustionExplanation(step.exhaustedSignatures, context);
          this.history.push({ role: 'assistant', content: answer });
          emit({ type: 'token', content: answer });
          return finish('retry_attempts_exhausted', answer);
        }
      }
    } catch (error) {
      if (signal.aborted || isAbortError(error)) {
        return finish('fatal_error', 'The request was cancelled before it finished.', 'cancelled');
      }
      if (error instanceof ProviderUnavailableError) {
        return finish(
          'fatal_error',
          `The language model provider is unavailable right now (${error.message}). Please try again in a moment.`,
          'provider_unavailable'
        );
      }
      if (error instanceof InvalidModelRequestError) {
        return finish('fatal_error', `The language model rejected the request: ${error.message}`, 'invalid_request');
      }
      this.logger.error({ err: error }, 'turn failed unexpectedly');
      return finish('fatal_error', `The request failed unexpectedly: ${errorMessage(error)}`, 'unexpected');
    }
  }

  /**
   * A reply without tool calls earns one nudge per model call when it states
   * an action it did not take, or, after empty results, when it concludes
   * that nothing exists.
   */
  private detectNudge(text: string, context: TurnContext): Nudge | undefined {
    if (!this.settings.intentDetection) {
      return undefined;
    }
    const intent = detectStatedIntent(text, this.settings.intentRules, this.settings.intentThreshold);
    if (intent) {
      this.metrics.intentDetected(intent.kind, intent.confidence);
      return { trigger: intent.trigger, content: INTENT_NUDGE, reason: 'intent_without_action' };
    }
    if (context.emptyResults > 0) {
      const trigger = detectPrematureGivingUp(text, this.settings.givingUpPatterns);
      if (trigger) {
        return { trigger, content: GIVING_UP_NUDGE, reason: 'premature_giving_up' };
      }
    }
    return undefined;
  }

  private systemPrompt(): string {
    return buildSystemPrompt({ now: this.now(), catalog: this.catalog?.promptContext() });
  }

  /** Drops whole earlier turns, oldest first, until the prompt fits `maxHistoryTokens`. */
  private pruneHistory(systemPrompt: string): void {
    const model = this.model.name;
    const budget = this.settings.maxHistoryTokens;
    const sizes = this.history.map((message) => estimateTokens(model, messageText(message)));
    const sum = (values: number[]) => values.reduce((total, value) => total + value, 0);
    let total = estimateTokens(model, systemPrompt) + sum(sizes);

    let cut = 0;
    while (total > budget) {
      const nextTurn = this.history.findIndex((message, index) => index > cut && message.role === 'user');
      if (nextTurn === -1) {
        break;
      }
      total -= sum(sizes.slice(cut, nextTurn));
      cut = nextTurn;
    }

    if (cut > 0) {
      this.history.splice(0, cut);
      this.metrics.historyPruned(cut);
      this.logger.info({ messages: cut, tokens: total, budget }, 'pruned earlier turns from history');
    }
    if (total > budget) {
      this.logger.warn({ tokens: total, budget }, 'current turn exceeds the history token budget');
    }
  }

  private callModel(signal: AbortSignal, emit: (event: TurnEvent) => void): Promise<ModelResponse> {
    const system = this.systemPrompt();
    this.pruneHistory(system);
    const messages: ConversationMessage[] = [{ role: 'system', content: system }, ...this.history];

    return traced(
      'orchestrator.model_call',
      () =>
        abortableCall(async () => {
          let final: ModelResponse | undefined;
          for await (const event of this.model.stream({ messages, tools: TOOL_SPECS }, signal)) {
            if (signal.aborted) break;
            if (event.type === 'text') {
              emit({ type: 'token', content: event.delta });
            } else {
              final = event.response;
            }
          }
          throwIfAborted(signal);
          if (!final) {
            throw new ProviderUnavailableError('Model stream ended without a final response');
          }
          return final;
        }, signal),
      { 'model.name': this.model.name, 'history.length': messages.length }
    );
  }

  private async runToolStep(response: ModelResponse, context: TurnContext): Promise<StepOutcome> {
    const step: StepContext = { staging: new StagedWrites(), inFlight: new Map(), archived: [] };
    try {
      const outcomes = await Promise.all(response.toolCalls.map((call) => this.runToolCall(call, context, step)));
      throwIfAborted(context.signal);

      await step.staging.commit(this.cache).catch((error: unknown) => {
        this.logger.warn({ err: error }, 'failed to persist step results to the cache');
      });
      for (const entry of step.archived) {
        this.archive?.put(entry);
        this.metrics.resultArchived(entry.tool);
      }
      context.emptyResults += outcomes.filter((outcome) => outcome.empty).length;

      const capped = outcomes.some((outcome) => outcome.capped);
      const allEmpty = outcomes.every((outcome) => outcome.empty);
      const exhaustedSignatures = allEmpty
        ? outcomes.flatMap((outcome) => (outcome.exhaustedSignature ? [outcome.exhaustedSignature] : []))
        : [];

      return {
        messages: [
          { role: 'assistant', content: response.text, toolCalls: response.toolCalls },
          ...outcomes.map((outcome) => outcome.primary),
          ...outcomes.flatMap((outcome) => outcome.followUps)
        ],
        capped,
        exhaustedSignatures: Array.from(new Set(exhaustedSignatures))
      };
    } catch (error) {
      step.staging.discard();
      throw error;
    }
  }

  private uniqueRecordId(log: ToolCallLog, id: string): string {
    return log.get(id) ? `${id}#${log.size + 1}` : id;
  }

  private notDispatched(call: ModelToolCall): CallOutcome {
    return {
      primary: toolMessage(
        call.id,
        renderNotDispatched(
          'iteration_cap_exceeded',
          `Not executed: the limit of ${this.settings.maxToolIterations} tool calls for this turn was reached.`
        )
      ),
      followUps: [],
      empty: false,
      capped: true
    };
  }

  private async runToolCall(call: ModelToolCall, context: TurnContext, step: StepContext): Promise<CallOutcome> {
    const { retry, log } = context;

    let invocation: ToolInvocation;
    try {
      invocation = parseToolInvocation(call.name, call.arguments, this.now());
    } catch (error) {
      if (!retry.reserveDispatch(this.settings.maxToolIterations)) {
        return this.notDispatched(call);
      }
      const recordId = this.uniqueRecordId(log, call.id);
      const startedAt = formatInstant(this.now());
      log.begin(recordId, call.name, recordInput(call.arguments));
      log.update(recordId, { status: 'failed', cause: errorMessage(error), startedAt, completedAt: startedAt });
      return { primary: toolMessage(call.id, renderToolError(error)), followUps: [], empty: false, capped: false };
    }

    const signature = invocationSignature(invocation, this.settings.itemCap);
    const running = step.inFlight.get(signature);
    if (running) {
      const shared = await running;
      this.logger.debug({ tool: call.name, toolCallId: call.id }, 'repeated call in one step; sharing its result');
      return { ...shared, primary: toolMessage(call.id, shared.primary.content), followUps: [] };
    }
    const pending = this.executeCall(call, invocation, signature, context, step);
    step.inFlight.set(signature, pending);
    return pending;
  }

  private async executeCall(
    call: ModelToolCall,
    invocation: ToolInvocation,
    signature: string,
    context: TurnContext,
    step: StepContext
  ): Promise<CallOutcome> {
    const { retry, log } = context;
    const max = this.settings.maxToolIterations;

    if (retry.isExhausted(signature)) {
      const tried = retry.windowsTried(signature).map((window) => formatDuration(window.end - window.start));
      return {
        primary: toolMessage(
          call.id,
          renderNotDispatched(
            'retry_attempts_exhausted',
            `Not repeated: this request already returned no results for windows of ${tried.join(', ')}.`
          )
        ),
        followUps: [],
        empty: true,
        capped: false,
        exhaustedSignature: signature
      };
    }

    if (!retry.reserveDispatch(max)) {
      return this.notDispatched(call);
    }

    const recordId = this.uniqueRecordId(log, call.id);
    const firstInput = invocationInput(invocation);
    const first = await this.dispatch(recordId, invocation, firstInput, context, step.staging);
    const primary = toolMessage(call.id, this.renderDispatch(first, invocation.tool, firstInput, step));
    if (!first.ok) {
      return { primary, followUps: [], empty: false, capped: false };
    }

    let empty = isEmptyResult(first.result);
    const policy = this.settings.expansion;
    if (!empty || !policy.enabled || !isRetrievalInvocation(invocation)) {
      return { primary, followUps: [], empty, capped: false };
    }
    const window = invocationWindow(invocation);
    if (!isBoundedWindow(window)) {
      return { primary, followUps: [], empty, capped: false };
    }

    const request = toRetrievalRequest(invocation, this.settings.itemCap);
    context.scopes.set(signature, describeScope(request.scope));
    retry.recordWindow(signature, window);

    const followUps: ConversationMessage[] = [];
    let capped = false;

    while (empty && retry.attemptsFor(signature) < policy.maxRetryAttempts) {
      if (!retry.reserveDispatch(max)) {
        capped = true;
        break;
      }
      const attempt = retry.nextAttempt(signature, policy.factor);
      const expandedWindow = expandWindow(window, policy.factor, attempt);
      retry.recordWindow(signature, expandedWindow);
      const expanded = withWindow(invocation, expandedWindow);
      const input = invocationInput(expanded);
      const expansionId = this.uniqueRecordId(log, `${call.id}-expand-${attempt}`);

      this.metrics.retryAttempt('empty_result');
      this.logger.debug(
        { tool: call.name, attempt, window: formatDuration(expandedWindow.end - expandedWindow.start) },
        'empty result; retrying with a wider window'
      );
      followUps.push({
        role: 'assistant',
        content: '',
        toolCalls: [{ id: expansionId, name: call.name, arguments: JSON.stringify(input) }]
      });
      const outcome = await this.dispatch(expansionId, expanded, input, context, step.staging, {
        expansionOf: recordId,
        attempt
      });
      followUps.push(toolMessage(expansionId, this.renderDispatch(outcome, expanded.tool, input, step)));

      if (!outcome.ok) {
        empty = false;
        break;
      }
      empty = isEmptyResult(outcome.result);
    }

    const exhausted = empty && !capped && retry.attemptsFor(signature) >= policy.maxRetryAttempts;
    if (exhausted) {
      retry.markExhausted(signature);
    }
    return { primary, followUps, empty, capped, ...(exhausted ? { exhaustedSignature: signature } : {}) };
  }

  /**
   * Renders a dispatch for the model. An event list over the result token
   * budget is held for the archive and replaced by a summary with its id.
   */
  private renderDispatch(
    outcome: DispatchResult,
    tool: string,
    input: Record<string, unknown>,
    step: StepContext
  ): string {
    if (!outcome.ok) {
      return renderToolError(outcome.error);
    }
    const { result } = outcome;
    const fitted = fitToolResult(result, this.model.name, this.settings.maxResultTokens);
    if (!fitted.omitted || !this.archive || result.kind !== 'events' || result.page) {
      return fitted.content;
    }

    const entry = this.archive.prepare(tool, input, result.items);
    step.archived.push(entry);
    this.logger.info(
      { tool, resultId: entry.id, events: result.items.length, omitted: fitted.omitted },
      'result exceeds the token budget; archived for paging'
    );
    return renderArchivedSummary(result, summarizeArchive(entry));
  }

  private async dispatch(
    recordId: string,
    invocation: ToolInvocation,
    input: Record<string, unknown>,
    context: TurnContext,
    staging: StagedWrites,
    extra: Pick<ToolCallRecord, 'expansionOf' | 'attempt'> = {}
  ): Promise<DispatchResult> {
    const { log, signal } = context;
    log.begin(recordId, invocation.tool, input, extra);
    log.update(recordId, { status: 'running', startedAt: formatInstant(this.now()) });

    try {
      const result = await traced('orchestrator.tool', () => this.tools.run(invocation, { signal, staging }), {
        'tool.name': invocation.tool,
        'tool.call_id': recordId
      });
      log.update(recordId, {
        status: 'succeeded',
        resultSummary: summarizeResult(result),
        itemCount: result.items.length,
        truncated: result.truncated,
        cached: result.cached,
        completedAt: formatInstant(this.now())
      });
      return { ok: true, result };
    } catch (error) {
      const cancelled = signal.aborted || error instanceof CancelledError;
      log.update(recordId, {
        status: 'failed',
        cause: cancelled ? 'cancelled' : errorMessage(error),
        completedAt: formatInstant(this.now())
      });
      if (cancelled) {
        throw error instanceof CancelledError ? error : new CancelledError();
      }
      this.logger.warn({ tool: invocation.tool, err: error }, 'tool call failed');
      return { ok: false, error };
    }
  }

  private capExplanation(log: ToolCallLog): string {
    const lines = log
      .snapshot()
      .map((record) => `- ${record.tool}: ${record.status === 'failed' ? `failed (${record.cause})` : record.resultSummary}`);
    return [
      `I stopped after reaching the limit of ${this.settings.maxToolIterations} tool calls for one question, so this answer is best effort.`,
      lines.length ? 'Calls made so far:' : '',
      ...lines,
      'Ask a narrower question, or ask me to continue from these results.'
    ]
      .filter(Boolean)
      .join('\n');
  }

  private exhaustionExplanation(signatures: string[], context: TurnContext): string {
    const lines = signatures.map((signature) => {
      const windows = context.retry.windowsTried(signature);
      const durations = windows.map((window) => formatDuration(window.end - window.start)).join(', ');
      const end = windows.length ? formatInstant(windows[0].end) : 'now';
      return `- ${context.scopes.get(signature) ?? 'request'}: windows of ${durations} ending ${end}`;
    });
    return [
      'No matching log events were found, even after widening the time range:',
      ...lines,
      'Try a different log group, a broader filter pattern, or an explicit older time range.'
    ].join('\n');
  }
}
