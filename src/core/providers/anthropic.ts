/**
 * Anthropic プロバイダー
 * Messages API の tool_use / tool_result ブロックとの相互変換
 */

import Anthropic from '@anthropic-ai/sdk';
import { z } from 'zod';
import { ProviderAuthError, ProviderProtocolError, isAbortError } from '../errors.js';
import type { AssistantTurn, Message, ProviderConfig, ToolCallRequest, ToolDescriptor } from '../types.js';
import { providerDebugLog } from '../../utils/debug-log.js';
import { convertAllToolSchemasForAnthropic, type AnthropicToolSchema } from '../../utils/tool-schema-converter.js';
import { classifyProviderError } from './errors.js';
import type { ClientFactory, ProviderAdapter } from './types.js';

type CacheControl = { type: 'ephemeral' };

export type AnthropicWireBlock =
  | { type: 'text'; text: string; cache_control?: CacheControl }
  | { type: 'tool_use'; id: string; name: string; input: Record<string, unknown> }
  | { type: 'tool_result'; tool_use_id: string; content: string; is_error?: boolean };

export interface AnthropicWireMessage {
  role: 'user' | 'assistant';
  content: AnthropicWireBlock[];
}

export interface AnthropicRequest {
  model: string;
  max_tokens: number;
  temperature: number;
  system?: Array<{ type: 'text'; text: string; cache_control?: CacheControl }>;
  messages: AnthropicWireMessage[];
  tools?: AnthropicToolSchema[];
}

export interface AnthropicClient {
  messages: {
    create(body: AnthropicRequest, options?: { signal?: AbortSignal }): PromiseLike<unknown>;
  };
}

function isErrorToolContent(content: string | null): boolean {
  if (!content) return false;
  try {
    const parsed: unknown = JSON.parse(content);
    return typeof parsed === 'object' && parsed !== null && 'status' in parsed && parsed.status !== 'ok';
  } catch {
    return false;
  }
}

/**
 * 会話を Anthropic 形式に変換
 * - system メッセージは system パラメータへ
 * - tool メッセージは user ロールの tool_result ブロックへ
 * - 同じロールが連続する場合は1つのメッセージにまとめる
 */
export function toAnthropicMessages(conversation: readonly Message[]): {
  system: string;
  messages: AnthropicWireMessage[];
} {
  const system = conversation
    .filter((msg) => msg.role === 'system')
    .map((msg) => msg.content ?? '')
    .join('\n\n');

  const messages: AnthropicWireMessage[] = [];
  const push = (role: 'user' | 'assistant', blocks: AnthropicWireBlock[]) => {
    if (blocks.length === 0) return;
    const last = messages[messages.length - 1];
    if (last && last.role === role) {
      last.content.push(...blocks);
    } else {
      messages.push({ role, content: blocks });
    }
  };

  for (const msg of conversation) {
    switch (msg.role) {
      case 'system':
        break;
      case 'user':
        push('user', msg.content ? [{ type: 'text', text: msg.content }] : []);
        break;
      case 'assistant': {
        const blocks: AnthropicWireBlock[] = [];
        if (msg.content) {
          blocks.push({ type: 'text', text: msg.content });
        }
        for (const call of msg.tool_calls) {
          blocks.push({ type: 'tool_use', id: call.id, name: call.name, input: { ...call.arguments } });
        }
        push('assistant', blocks);
        break;
      }
      case 'tool':
        push('user', [
          {
            type: 'tool_result',
            tool_use_id: msg.tool_call_id ?? '',
            content: msg.content ?? '',
            ...(isErrorToolContent(msg.content) ? { is_error: true } : {}),
          },
        ]);
        break;
    }
  }
  return { system, messages };
}

export function buildAnthropicRequest(
  conversation: readonly Message[],
  config: ProviderConfig,
  tools: readonly ToolDescriptor[]
): AnthropicRequest {
  const { system, messages } = toAnthropicMessages(conversation);
  const request: AnthropicRequest = {
    model: config.model,
    max_tokens: config.maxTokens,
    temperature: config.temperature,
    messages,
  };
  if (system) {
    // システムプロンプトはキャッシュ対象
    request.system = [{ type: 'text', text: system, cache_control: { type: 'ephemeral' } }];
  }
  if (tools.length > 0) {
    request.tools = convertAllToolSchemasForAnthropic(tools);
  }
  return request;
}

const AnthropicResponseSchema = z.object({
  content: z.array(
    z.union([
      z.object({ type: z.literal('text'), text: z.string() }),
      z.object({ type: z.literal('tool_use'), id: z.string(), name: z.string(), input: z.unknown() }),
      // thinking などその他のブロックは無視
      z.object({ type: z.string() }),
    ])
  ),
  stop_reason: z.string().nullable().optional(),
  usage: z
    .object({
      input_tokens: z.number(),
      output_tokens: z.number(),
    })
    .optional(),
});

/**
 * Anthropic のレスポンスを AssistantTurn に変換
 */
export function parseAnthropicMessage(response: unknown): AssistantTurn {
  const parsed = AnthropicResponseSchema.safeParse(response);
  if (!parsed.success) {
    throw new ProviderProtocolError(
      `anthropic: unexpected response shape: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`,
      'anthropic'
    );
  }

  const texts: string[] = [];
  const toolCalls: ToolCallRequest[] = [];
  for (const block of parsed.data.content) {
    if ('text' in block && block.type === 'text') {
      texts.push(block.text);
    } else if ('input' in block && block.type === 'tool_use') {
      const input = block.input ?? {};
      if (typeof input !== 'object' || input === null || Array.isArray(input)) {
        throw new ProviderProtocolError(`anthropic: tool_use ${block.name} input is not an object`, 'anthropic');
      }
      toolCalls.push({ id: block.id, name: block.name, arguments: { ...input } });
    }
  }

  const text = texts.join('');
  const turn: AssistantTurn = { text: text ? text : null, tool_calls: toolCalls };
  const usage = parsed.data.usage;
  if (usage) {
    turn.usage = {
      prompt_tokens: usage.input_tokens,
      completion_tokens: usage.output_tokens,
      total_tokens: usage.input_tokens + usage.output_tokens,
    };
  }
  return turn;
}

export const createAnthropicClient: ClientFactory<AnthropicClient> = (config: ProviderConfig) => {
  if (!config.apiKey) {
    throw new ProviderAuthError('anthropic: no API key configured (set ANTHROPIC_API_KEY)', 'anthropic');
  }
  return new Anthropic({
    apiKey: config.apiKey,
    baseURL: config.endpoint,
    timeout: config.requestTimeoutMs,
    maxRetries: 0,
  });
};

export function createAnthropicProvider(
  clientFactory: ClientFactory<AnthropicClient> = createAnthropicClient
): ProviderAdapter {
  return {
    kind: 'anthropic',
    async send(conversation, config, options) {
      const client = clientFactory(config);
      const request = buildAnthropicRequest(conversation, config, options.tools);

      providerDebugLog('Making API call to Anthropic with model:', config.model);
      providerDebugLog('Messages count:', request.messages.length);

      let response: unknown;
      try {
        response = await client.messages.create(request, { signal: options.signal });
      } catch (error) {
        if (isAbortError(error)) throw error;
        throw classifyProviderError(error, 'anthropic');
      }

      providerDebugLog('Full API response received:', response);
      return parseAnthropicMessage(response);
    },
  };
}
