/**
 * Chat Completions 形式（Groq / OpenAI / LM Studio 共通）の変換
 */

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { ProviderProtocolError } from '../errors.js';
import type { AssistantTurn, Message, ProviderConfig, ProviderKind, ToolCallRequest, ToolDescriptor } from '../types.js';
import {
  convertToolSchemaForChatCompletions,
  type ChatCompletionToolSchema,
} from '../../utils/tool-schema-converter.js';

export interface ChatCompletionWireToolCall {
  id: string;
  type: 'function';
  function: { name: string; arguments: string };
}

export type ChatCompletionWireMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string | null; tool_calls?: ChatCompletionWireToolCall[] }
  | { role: 'tool'; content: string; tool_call_id: string };

export interface ChatCompletionsRequest {
  model: string;
  messages: ChatCompletionWireMessage[];
  tools?: ChatCompletionToolSchema[];
  tool_choice?: 'auto';
  temperature: number;
  max_tokens: number;
  stream: false;
}

/** groq-sdk と openai の両クライアントが満たす最小インターフェース */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(body: ChatCompletionsRequest, options?: { signal?: AbortSignal }): PromiseLike<unknown>;
    };
  };
}

/**
 * 会話を Chat Completions のメッセージ配列に変換
 */
export function toChatCompletionMessages(conversation: readonly Message[]): ChatCompletionWireMessage[] {
  return conversation.map((msg): ChatCompletionWireMessage => {
    switch (msg.role) {
      case 'system':
        return { role: 'system', content: msg.content ?? '' };
      case 'user':
        return { role: 'user', content: msg.content ?? '' };
      case 'assistant':
        if (msg.tool_calls.length === 0) {
          return { role: 'assistant', content: msg.content ?? '' };
        }
        return {
          role: 'assistant',
          content: msg.content,
          tool_calls: msg.tool_calls.map((call) => ({
            id: call.id,
            type: 'function',
            function: { name: call.name, arguments: JSON.stringify(call.arguments) },
          })),
        };
      case 'tool':
        return { role: 'tool', content: msg.content ?? '', tool_call_id: msg.tool_call_id ?? '' };
    }
  });
}

export function buildChatCompletionsRequest(
  conversation: readonly Message[],
  config: ProviderConfig,
  tools: readonly ToolDescriptor[]
): ChatCompletionsRequest {
  const request: ChatCompletionsRequest = {
    model: config.model,
    messages: toChatCompletionMessages(conversation),
    temperature: config.temperature,
    max_tokens: config.maxTokens,
    stream: false,
  };
  // 空の tools 配列を拒否する API があるため、ツールがなければ省略
  if (tools.length > 0) {
    request.tools = tools.map(convertToolSchemaForChatCompletions);
    request.tool_choice = 'auto';
  }
  return request;
}

const ChatCompletionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
          tool_calls: z
            .array(
              z.object({
                id: z.string().optional(),
                function: z.object({
                  name: z.string(),
                  arguments: z.string().nullable().optional(),
                }),
              })
            )
            .nullable()
            .optional(),
        }),
        finish_reason: z.string().nullable().optional(),
      })
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
      total_tokens: z.number(),
    })
    .nullable()
    .optional(),
});

/** 引数文字列を JSON オブジェクトとして解釈する。空文字は引数なし扱い */
export function parseToolArguments(raw: string | null | undefined, provider: ProviderKind, toolName: string): Record<string, unknown> {
  if (raw === null || raw === undefined || raw.trim() === '') {
    return {};
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ProviderProtocolError(`${provider}: tool call ${toolName} has malformed JSON arguments`, provider, undefined, {
      cause: error,
    });
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ProviderProtocolError(`${provider}: tool call ${toolName} arguments are not an object`, provider);
  }
  return { ...parsed };
}

/**
 * Chat Completions のレスポンスを AssistantTurn に変換
 */
export function parseChatCompletion(response: unknown, provider: ProviderKind): AssistantTurn {
  const parsed = ChatCompletionResponseSchema.safeParse(response);
  if (!parsed.success) {
    throw new ProviderProtocolError(
      `${provider}: unexpected response shape: ${parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')}`,
      provider
    );
  }

  const { message } = parsed.data.choices[0];
  const toolCalls: ToolCallRequest[] = (message.tool_calls ?? []).map((call) => ({
    id: call.id || `call_${randomUUID()}`,
    name: call.function.name,
    arguments: parseToolArguments(call.function.arguments, provider, call.function.name),
  }));

  const turn: AssistantTurn = {
    text: message.content ? message.content : null,
    tool_calls: toolCalls,
  };
  const usage = parsed.data.usage;
  if (usage) {
    turn.usage = {
      prompt_tokens: usage.prompt_tokens,
      completion_tokens: usage.completion_tokens,
      total_tokens: usage.total_tokens,
    };
  }
  return turn;
}
