/**
 * Groq プロバイダー
 * groq-sdk の Chat Completions API を使用
 */

import Groq from 'groq-sdk';
import { ProviderAuthError, isAbortError } from '../errors.js';
import type { ProviderConfig } from '../types.js';
import { providerDebugLog } from '../../utils/debug-log.js';
import { buildChatCompletionsRequest, parseChatCompletion, type ChatCompletionsClient } from './chat-completions.js';
import { classifyProviderError } from './errors.js';
import type { ClientFactory, ProviderAdapter } from './types.js';

export const createGroqClient: ClientFactory<ChatCompletionsClient> = (config: ProviderConfig) => {
  if (!config.apiKey) {
    throw new ProviderAuthError('groq: no API key configured (set GROQ_API_KEY or add it to the config file)', 'groq');
  }
  return new Groq({
    apiKey: config.apiKey,
    baseURL: config.endpoint,
    timeout: config.requestTimeoutMs,
    // リトライはエンジンが行う
    maxRetries: 0,
  });
};

export function createGroqProvider(clientFactory: ClientFactory<ChatCompletionsClient> = createGroqClient): ProviderAdapter {
  return {
    kind: 'groq',
    async send(conversation, config, options) {
      const client = clientFactory(config);
      const request = buildChatCompletionsRequest(conversation, config, options.tools);

      providerDebugLog('Making API call to Groq with model:', config.model);
      providerDebugLog('Messages count:', request.messages.length);

      let response: unknown;
      try {
        response = await client.chat.completions.create(request, { signal: options.signal });
      } catch (error) {
        if (isAbortError(error)) throw error;
        throw classifyProviderError(error, 'groq');
      }

      providerDebugLog('Full API response received:', response);
      return parseChatCompletion(response, 'groq');
    },
  };
}
