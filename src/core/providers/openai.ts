/**
 * OpenAI 互換プロバイダー
 * OpenAI 本家と、LM Studio / llama.cpp など OpenAI 互換のローカルサーバーを扱う
 */

import OpenAI from 'openai';
import { ProviderAuthError, isAbortError } from '../errors.js';
import type { ProviderConfig } from '../types.js';
import { providerDebugLog } from '../../utils/debug-log.js';
import { buildChatCompletionsRequest, parseChatCompletion, type ChatCompletionsClient } from './chat-completions.js';
import { classifyProviderError } from './errors.js';
import type { ClientFactory, ProviderAdapter } from './types.js';

/** LM Studio の既定エンドポイント */
export const DEFAULT_LOCAL_ENDPOINT = 'http://localhost:1234/v1';

export const createOpenAiClient: ClientFactory<ChatCompletionsClient> = (config: ProviderConfig) => {
  if (config.kind === 'local') {
    return new OpenAI({
      // ローカルサーバーはキーを検証しないが SDK は空文字を受け付けない
      apiKey: config.apiKey || 'local',
      baseURL: config.endpoint ?? DEFAULT_LOCAL_ENDPOINT,
      timeout: config.requestTimeoutMs,
      maxRetries: 0,
    });
  }
  if (!config.apiKey) {
    throw new ProviderAuthError('openai: no API key configured (set OPENAI_API_KEY)', 'openai');
  }
  return new OpenAI({
    apiKey: config.apiKey,
    baseURL: config.endpoint,
    timeout: config.requestTimeoutMs,
    maxRetries: 0,
  });
};

export function createOpenAiProvider(
  kind: 'openai' | 'local' = 'openai',
  clientFactory: ClientFactory<ChatCompletionsClient> = createOpenAiClient
): ProviderAdapter {
  return {
    kind,
    async send(conversation, config, options) {
      const client = clientFactory(config);
      const request = buildChatCompletionsRequest(conversation, config, options.tools);

      providerDebugLog(`Making API call to ${kind} with model:`, config.model);

      let response: unknown;
      try {
        response = await client.chat.completions.create(request, { signal: options.signal });
      } catch (error) {
        if (isAbortError(error)) throw error;
        throw classifyProviderError(error, kind);
      }

      providerDebugLog('Full API response received:', response);
      return parseChatCompletion(response, kind);
    },
  };
}
