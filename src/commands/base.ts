import { errorMessage } from '../core/errors.js';
import type { ProviderConfig, ProviderKind, ToolDescriptor } from '../core/types.js';

export interface CommandMessage {
  role: 'system';
  content: string;
  type?: 'help' | 'tools' | 'stats' | 'info' | 'error';
  usageSnapshot?: UsageSnapshot;
}

export interface UsageSnapshot {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
  total_requests: number;
}

export interface SessionStats {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
  totalRequests: number;
}

/**
 * プロバイダーとモデルの切り替え。変更は設定ファイルに保存され、会話はそのまま続く
 */
export interface ProviderControls {
  current(): ProviderConfig;
  /** 設定ファイルに保存されている既定値 */
  saved(): { provider: ProviderKind; model: string | null };
  switchProvider(kind: ProviderKind): ProviderConfig;
  switchModel(model: string): ProviderConfig;
  /** 現在のプロバイダーの API キーを保存する */
  login(apiKey: string): ProviderConfig;
  logout(): ProviderConfig;
}

export interface CommandContext {
  addMessage: (message: CommandMessage) => void;
  clearHistory: () => void;
  /** コマンド名より後ろの文字列 */
  args?: string;
  providers?: ProviderControls;
  tools?: readonly ToolDescriptor[];
  sessionStats?: SessionStats;
  model?: string;
  exit?: () => void;
}

/**
 * 切り替えを実行して結果を表示する。設定エラーなどはメッセージにする
 */
export function reportProviderChange(
  addMessage: (message: CommandMessage) => void,
  change: () => ProviderConfig,
  describe: (config: ProviderConfig) => string = (config) => `Switched to ${config.kind}:${config.model}.`
): void {
  try {
    addMessage({ role: 'system', type: 'info', content: describe(change()) });
  } catch (error) {
    addMessage({ role: 'system', type: 'error', content: errorMessage(error) });
  }
}

export interface CommandDefinition {
  command: string;
  description: string;
  handler: (context: CommandContext) => void;
}
