/**
 * 会話エンジン
 *
 * 1ターンの状態遷移:
 *   Idle → AwaitingProviderReply → InspectingReply → ExecutingTools → (AwaitingProviderReply へ戻る)
 * 終端は Completed / Aborted / Cancelled。各ステップは監査ログに記録する。
 */

import { AuditLog } from './audit-log.js';
import { Conversation } from './conversation.js';
import {
  CancelledError,
  ProviderProtocolError,
  ProviderUnreachableError,
  errorMessage,
  isAbortError,
  isProviderError,
} from './errors.js';
import { assistantMessage, toolMessage, userMessage } from './messages.js';
import type { ProviderAdapter } from './providers/types.js';
import type { ApiUsage, AssistantTurn, AuditEventKind, Message, ProviderConfig, ToolCallRequest, ToolResult } from './types.js';
import type { ApprovalFn, ToolDispatcher } from '../tools/dispatcher.js';
import type { ToolPolicy } from '../tools/policy.js';
import type { ToolRegistry } from '../tools/tool-registry.js';
import { debugLog } from '../utils/debug-log.js';
import { withRetry } from '../utils/retry.js';

export type EngineState =
  | 'Idle'
  | 'AwaitingProviderReply'
  | 'InspectingReply'
  | 'ExecutingTools'
  | 'Completed'
  | 'Aborted'
  | 'Cancelled';

export type TurnStatus = 'Completed' | 'Aborted' | 'Cancelled';

export interface TurnOutcome {
  turnId: number;
  status: TurnStatus;
  /** 最後にユーザーへ見せるテキスト */
  text: string | null;
  /** Aborted / Cancelled の理由 */
  reason?: string;
  error?: Error;
}

export interface EngineLimits {
  /** 1ターン内で許すツール実行ラウンド数 */
  maxToolTurns: number;
  /** プロバイダー呼び出しの再試行回数（初回を含まない） */
  maxRetries: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  maxContextTokens: number;
  parallelToolCalls: boolean;
}

export const DEFAULT_ENGINE_LIMITS: EngineLimits = {
  maxToolTurns: 10,
  maxRetries: 3,
  retryBaseDelayMs: 500,
  retryMaxDelayMs: 8_000,
  maxContextTokens: 24_000,
  parallelToolCalls: true,
};

export interface EngineCallbacks {
  onStateChange?: (state: EngineState, previous: EngineState) => void;
  onAssistantText?: (text: string) => void;
  onToolStart?: (request: ToolCallRequest) => void;
  onToolEnd?: (request: ToolCallRequest, result: ToolResult) => void;
  onRetry?: (error: Error, attempt: number, delayMs: number) => void;
  onApiUsage?: (usage: ApiUsage) => void;
  approve?: ApprovalFn;
}

export interface ConversationEngineOptions {
  provider: ProviderAdapter;
  providerConfig: ProviderConfig;
  registry: ToolRegistry;
  dispatcher: ToolDispatcher;
  policy: ToolPolicy;
  conversation?: Conversation;
  audit?: AuditLog;
  limits?: Partial<EngineLimits>;
  callbacks?: EngineCallbacks;
}

export interface RunTurnOptions {
  signal?: AbortSignal;
}

const TERMINAL_STATES: readonly EngineState[] = ['Completed', 'Aborted', 'Cancelled'];

function isRetryableProviderError(error: unknown): boolean {
  return error instanceof ProviderUnreachableError || error instanceof ProviderProtocolError;
}

export function depthLimitNotice(maxToolTurns: number): string {
  return (
    `Stopped after ${maxToolTurns} consecutive tool rounds without a final answer. ` +
    'The results so far are kept in the conversation; send another message to continue.'
  );
}

export class ConversationEngine {
  readonly conversation: Conversation;
  readonly audit: AuditLog;
  readonly limits: EngineLimits;
  private provider: ProviderAdapter;
  private providerConfig: ProviderConfig;
  private readonly registry: ToolRegistry;
  private readonly dispatcher: ToolDispatcher;
  private readonly policy: ToolPolicy;
  private readonly callbacks: EngineCallbacks;
  private currentState: EngineState = 'Idle';
  private controller: AbortController | null = null;

  constructor(options: ConversationEngineOptions) {
    this.provider = options.provider;
    this.providerConfig = Object.freeze({ ...options.providerConfig });
    this.registry = options.registry;
    this.dispatcher = options.dispatcher;
    this.policy = options.policy;
    this.conversation = options.conversation ?? new Conversation();
    this.audit = options.audit ?? new AuditLog();
    this.limits = { ...DEFAULT_ENGINE_LIMITS, ...options.limits };
    this.callbacks = options.callbacks ?? {};
    // 既存の履歴（system プロンプトなど）も再生できるように記録しておく
    this.conversation.messages.forEach((message, index) => {
      this.record(this.conversation.turn, 'message', { index, message });
    });
  }

  get state(): EngineState {
    return this.currentState;
  }

  get busy(): boolean {
    return this.currentState !== 'Idle' && !TERMINAL_STATES.includes(this.currentState);
  }

  get model(): string {
    return this.providerConfig.model;
  }

  get providerKind(): ProviderConfig['kind'] {
    return this.providerConfig.kind;
  }

  /** 実行中のターンを中断する。実行中でなければ何もしない */
  cancel(): void {
    if (this.controller && !this.controller.signal.aborted) {
      debugLog('Cancelling current turn');
      this.controller.abort(new CancelledError());
    }
  }

  /** 履歴を保ったままプロバイダーとモデルを差し替える */
  switchProvider(provider: ProviderAdapter, providerConfig: ProviderConfig): void {
    if (this.busy) {
      throw new Error('Cannot switch provider while a turn is running');
    }
    this.provider = provider;
    this.providerConfig = Object.freeze({ ...providerConfig });
    this.record(this.conversation.turn, 'provider_changed', {
      provider: providerConfig.kind,
      model: providerConfig.model,
    });
  }

  /** system メッセージ以外の履歴を消去 */
  clear(): void {
    if (this.busy) {
      throw new Error('Cannot clear the conversation while a turn is running');
    }
    this.conversation.clear();
    this.record(this.conversation.turn, 'conversation_cleared', { remaining: this.conversation.length });
  }

  async runTurn(input: string, options: RunTurnOptions = {}): Promise<TurnOutcome> {
    if (this.busy) {
      throw new Error('A turn is already running');
    }

    const controller = new AbortController();
    this.controller = controller;
    const external = options.signal;
    const forwardAbort = () => controller.abort(new CancelledError());
    if (external?.aborted) {
      forwardAbort();
    } else {
      external?.addEventListener('abort', forwardAbort, { once: true });
    }

    this.transition('Idle');
    const turnId = this.conversation.beginTurn();
    this.record(turnId, 'turn_started', { input, model: this.providerConfig.model, provider: this.providerConfig.kind });
    debugLog(`Turn ${turnId} started`);

    try {
      return await this.loop(turnId, input, controller.signal);
    } catch (error) {
      if (controller.signal.aborted || isAbortError(error)) {
        return this.finishCancelled(turnId);
      }
      return this.finishAborted(turnId, errorMessage(error), error instanceof Error ? error : new Error(String(error)));
    } finally {
      external?.removeEventListener('abort', forwardAbort);
      this.controller = null;
    }
  }

  private async loop(turnId: number, input: string, signal: AbortSignal): Promise<TurnOutcome> {
    this.commit(turnId, userMessage(input));
    let depth = 0;

    for (;;) {
      this.trimContext(turnId);

      if (signal.aborted) {
        return this.finishCancelled(turnId);
      }
      this.transition('AwaitingProviderReply');
      const reply = await this.requestReply(turnId, signal);
      if (signal.aborted) {
        return this.finishCancelled(turnId);
      }

      this.transition('InspectingReply');
      if (reply.tool_calls.length === 0) {
        this.commit(turnId, assistantMessage(reply.text));
        if (reply.text) {
          this.callbacks.onAssistantText?.(reply.text);
        }
        return this.finish(turnId, { turnId, status: 'Completed', text: reply.text });
      }

      if (reply.text) {
        this.callbacks.onAssistantText?.(reply.text);
      }

      this.transition('ExecutingTools');
      const results = await this.executeTools(turnId, reply.tool_calls, signal);
      if (signal.aborted) {
        // 未確定の tool_calls メッセージとその結果は履歴に残さない
        return this.finishCancelled(turnId);
      }

      this.commit(turnId, assistantMessage(reply.text, reply.tool_calls));
      for (const message of results) {
        this.commit(turnId, message);
      }

      depth += 1;
      if (depth >= this.limits.maxToolTurns) {
        const notice = depthLimitNotice(this.limits.maxToolTurns);
        this.commit(turnId, assistantMessage(notice));
        this.callbacks.onAssistantText?.(notice);
        return this.finishAborted(turnId, `Tool depth limit of ${this.limits.maxToolTurns} reached`, undefined, notice);
      }
    }
  }

  private async requestReply(turnId: number, signal: AbortSignal): Promise<AssistantTurn> {
    const tools = this.registry.list();
    try {
      const reply = await withRetry(
        async (attempt) => {
          this.record(turnId, 'provider_request', {
            attempt,
            provider: this.providerConfig.kind,
            model: this.providerConfig.model,
            message_count: this.conversation.length,
            tools: tools.map((tool) => tool.name),
          });
          return this.provider.send(this.conversation.messages, this.providerConfig, { tools, signal });
        },
        {
          maxAttempts: this.limits.maxRetries + 1,
          baseDelayMs: this.limits.retryBaseDelayMs,
          maxDelayMs: this.limits.retryMaxDelayMs,
          signal,
          shouldRetry: (error) => !signal.aborted && isRetryableProviderError(error),
          onRetry: (error, attempt, delayMs) => {
            debugLog(`Provider call failed (attempt ${attempt}), retrying in ${delayMs}ms:`, errorMessage(error));
            this.record(turnId, 'provider_retry', { attempt, delay_ms: delayMs, error: errorMessage(error) });
            if (error instanceof Error) {
              this.callbacks.onRetry?.(error, attempt, delayMs);
            }
          },
        }
      );

      this.record(turnId, 'provider_reply', {
        text: reply.text,
        tool_calls: reply.tool_calls,
        ...(reply.usage ? { usage: reply.usage } : {}),
      });
      if (reply.usage) {
        this.callbacks.onApiUsage?.(reply.usage);
      }
      return reply;
    } catch (error) {
      if (!signal.aborted && !isAbortError(error)) {
        this.record(turnId, 'provider_error', {
          kind: isProviderError(error) ? error.kind : 'Unknown',
          error: errorMessage(error),
        });
      }
      throw error;
    }
  }

  /**
   * ツール呼び出しをすべて実行し、リクエスト順の tool メッセージを返す
   * 並列実行時も結果はインデックスで並べ直す
   */
  private async executeTools(
    turnId: number,
    calls: readonly ToolCallRequest[],
    signal: AbortSignal
  ): Promise<Message[]> {
    // dispatcher.invoke は例外を投げないので、ここで残りを囲えば1件の失敗が兄弟の呼び出しを置き去りにしない
    const dispatchOne = async (call: ToolCallRequest): Promise<ToolResult> => {
      this.guard('onToolStart', () => this.callbacks.onToolStart?.(call));
      this.guard('tool_call audit', () =>
        this.record(turnId, 'tool_call', { tool_call_id: call.id, name: call.name, arguments: call.arguments })
      );
      const result = await this.dispatcher.invoke(call, this.policy, { signal, approve: this.callbacks.approve });
      this.guard('tool_result audit', () => this.record(turnId, 'tool_result', { name: call.name, result }));
      this.guard('onToolEnd', () => this.callbacks.onToolEnd?.(call, result));
      return result;
    };

    let results: ToolResult[];
    if (this.limits.parallelToolCalls) {
      results = await Promise.all(calls.map(dispatchOne));
    } else {
      results = [];
      for (const call of calls) {
        results.push(await dispatchOne(call));
      }
    }

    return results.map((result) => toolMessage(result));
  }

  /** 例外はデバッグログに残して処理を続ける */
  private guard(label: string, action: () => void): void {
    try {
      action();
    } catch (error) {
      debugLog(`${label} failed`, errorMessage(error));
    }
  }

  private trimContext(turnId: number): void {
    const trimmed = this.conversation.trimToBudget(this.limits.maxContextTokens);
    if (trimmed.droppedIndices.length > 0) {
      debugLog(`Trimmed ${trimmed.droppedIndices.length} messages from context`, trimmed);
      this.record(turnId, 'context_trimmed', {
        dropped_indices: trimmed.droppedIndices,
        tokens_before: trimmed.tokensBefore,
        tokens_after: trimmed.tokensAfter,
      });
    }
  }

  private commit(turnId: number, message: Message): void {
    const stored = this.conversation.append(message);
    this.record(turnId, 'message', { index: this.conversation.length - 1, message: stored });
  }

  private finish(turnId: number, outcome: TurnOutcome): TurnOutcome {
    this.transition(outcome.status);
    const kind: AuditEventKind =
      outcome.status === 'Completed' ? 'turn_completed' : outcome.status === 'Aborted' ? 'turn_aborted' : 'turn_cancelled';
    this.record(turnId, kind, outcome.reason ? { reason: outcome.reason } : {});
    debugLog(`Turn ${turnId} finished: ${outcome.status}`, outcome.reason ?? '');
    return outcome;
  }

  private finishAborted(turnId: number, reason: string, error?: Error, text: string | null = null): TurnOutcome {
    return this.finish(turnId, {
      turnId,
      status: 'Aborted',
      text,
      reason,
      ...(error ? { error } : {}),
    });
  }

  private finishCancelled(turnId: number): TurnOutcome {
    return this.finish(turnId, { turnId, status: 'Cancelled', text: null, reason: 'Cancelled by user' });
  }

  private transition(next: EngineState): void {
    const previous = this.currentState;
    if (previous === next) return;
    this.currentState = next;
    this.callbacks.onStateChange?.(next, previous);
  }

  private record(turnId: number, kind: AuditEventKind, payload: Record<string, unknown>): void {
    this.audit.record(turnId, kind, payload);
  }
}
