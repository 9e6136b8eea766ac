/**
 * プロバイダー共通型定義
 * 各プロバイダーは会話全体を受け取り、正規化された AssistantTurn を返す
 */

import type { AssistantTurn, Message, ProviderConfig, ProviderKind, ToolDescriptor } from '../types.js';

/** send() のオプション */
export interface SendOptions {
  /** モデルに公開するツール */
  tools: readonly ToolDescriptor[];
  signal?: AbortSignal;
}

/**
 * プロバイダーアダプター
 * リトライはしない（エンジン側の責務）。エラーは ProviderError に分類して投げる
 */
export interface ProviderAdapter {
  readonly kind: ProviderKind;
  send(conversation: readonly Message[], config: ProviderConfig, options: SendOptions): Promise<AssistantTurn>;
}

/** テスト用に SDK クライアントの生成を差し替えるためのファクトリ */
export type ClientFactory<TClient> = (config: ProviderConfig) => TClient;
