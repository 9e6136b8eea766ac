/**
 * プロバイダーモジュール
 * ProviderConfig.kind から対応するアダプターを選ぶ
 */

import type { ProviderKind } from '../types.js';
import { createAnthropicProvider } from './anthropic.js';
import { createGeminiProvider } from './gemini.js';
import { createGroqProvider } from './groq.js';
import { createOpenAiProvider } from './openai.js';
import type { ProviderAdapter } from './types.js';

export type { ProviderAdapter, SendOptions, ClientFactory } from './types.js';
export { classifyProviderError } from './errors.js';

/** 各プロバイダーの既定モデル */
export const DEFAULT_MODELS: Record<ProviderKind, string> = {
  groq: 'openai/gpt-oss-120b',
  openai: 'gpt-4o-mini',
  local: 'local-model',
  anthropic: 'claude-sonnet-4-20250514',
  gemini: 'gemini-2.5-flash',
};

export function createProvider(kind: ProviderKind): ProviderAdapter {
  switch (kind) {
    case 'groq':
      return createGroqProvider();
    case 'openai':
    case 'local':
      return createOpenAiProvider(kind);
    case 'anthropic':
      return createAnthropicProvider();
    case 'gemini':
      return createGeminiProvider();
  }
}
