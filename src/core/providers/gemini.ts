/**
 * Gemini プロバイダー
 * functionCall / functionResponse パートとの相互変換
 */

import { randomUUID } from 'node:crypto';
import { GoogleGenAI, type Content, type GenerateContentParameters, type Part } from '@google/genai';
import { z } from 'zod';
import { ProviderAuthError, ProviderProtocolError, isAbortError } from '../errors.js';
import { findToolCallName } from '../messages.js';
import type { AssistantTurn, Message, ProviderConfig, ToolCallRequest, ToolDescriptor } from '../types.js';
import { providerDebugLog } from '../../utils/debug-log.js';
import { convertAllToolSchemasForGemini } from '../../utils/tool-schema-converter.js';
import { classifyProviderError } from './errors.js';
import type { ClientFactory, ProviderAdapter } from './types.js';

export interface GeminiClient {
  models: {
    generateContent(params: GenerateContentParameters): Promise<unknown>;
  };
}

/** Gemini が id を返さなかった呼び出しに付ける id の接頭辞 */
const SYNTHESIZED_ID_PREFIX = 'gemini_call_';

/** こちらで振った id は Gemini に送り返さない */
function echoedId(id: string | undefined): { id?: string } {
  return id && !id.startsWith(SYNTHESIZED_ID_PREFIX) ? { id } : {};
}

/** functionResponse.response はオブジェクトでなければならない */
function toFunctionResponse(content: string | null): Record<string, unknown> {
  if (!content) return { output: '' };
  try {
    const parsed: unknown = JSON.parse(content);
    if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
      return { ...parsed };
    }
  } catch {
    // JSON でなければテキストとして包む
  }
  return { output: content };
}

/**
 * 会話を Gemini の contents に変換
 * - system メッセージは systemInstruction へ
 * - assistant は model ロール、tool 結果は user ロールの functionResponse
 * - 同じロールが連続する場合は parts をまとめる
 */
export function toGeminiContents(conversation: readonly Message[]): {
  systemInstruction: string;
  contents: Content[];
} {
  const systemInstruction = conversation
    .filter((msg) => msg.role === 'system')
    .map((msg) => msg.content ?? '')
    .join('\n\n');

  const contents: Content[] = [];
  const push = (role: 'user' | 'model', parts: Part[]) => {
    if (parts.length === 0) return;
    const last = contents[contents.length - 1];
    if (last && last.role === role && last.parts) {
      last.parts.push(...parts);
    } else {
      contents.push({ role, parts });
    }
  };

  for (const msg of conversation) {
    switch (msg.role) {
      case 'system':
        break;
      case 'user':
        push('user', msg.content ? [{ text: msg.content }] : []);
        break;
      case 'assistant': {
        const parts: Part[] = [];
        if (msg.content) {
          parts.push({ text: msg.content });
        }
        for (const call of msg.tool_calls) {
          // Gemini Thinking Model では thoughtSignature の返送が必須
          const part: Part = { functionCall: { ...echoedId(call.id), name: call.name, args: { ...call.arguments } } };
          if (call.thought_signature) {
            part.thoughtSignature = call.thought_signature;
          }
          parts.push(part);
        }
        push('model', parts);
        break;
      }
      case 'tool': {
        const toolCallId = msg.tool_call_id ?? '';
        push('user', [
          {
            functionResponse: {
              ...echoedId(toolCallId),
              name: findToolCallName(conversation, toolCallId) ?? 'unknown',
              response: toFunctionResponse(msg.content),
            },
          },
        ]);
        break;
      }
    }
  }
  return { systemInstruction, contents };
}

export function buildGeminiRequest(
  conversation: readonly Message[],
  config: ProviderConfig,
  tools: readonly ToolDescriptor[],
  signal?: AbortSignal
): GenerateContentParameters {
  const { systemInstruction, contents } = toGeminiContents(conversation);
  return {
    model: config.model,
    contents,
    config: {
      ...(systemInstruction ? { systemInstruction } : {}),
      temperature: config.temperature,
      maxOutputTokens: config.maxTokens,
      ...(tools.length > 0 ? { tools: [{ functionDeclarations: convertAllToolSchemasForGemini(tools) }] } : {}),
      ...(signal ? { abortSignal: signal } : {}),
    },
  };
}

const GeminiResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z
              .array(
                z.object({
                  text: z.string().optional(),
                  thought: z.boolean().optional(),
                  thoughtSignature: z.string().optional(),
                  functionCall: z
                    .object({
                      id: z.string().optional(),
                      name: z.string(),
                      args: z.record(z.unknown()).optional(),
                    })
                    .optional(),
                })
              )
              .optional(),
          })
          .optional(),
        finishReason: z.string().optional(),
      })
    )
    .optional(),
  promptFeedback: z.object({ blockReason: z.string().optional() }).optional(),
  usageMetadata: z
    .object({
      promptTokenCount: z.number().optional(),
      candidatesTokenCount: z.number().optional(),
      totalTokenCount: z.number().optional(),
    })
    .optional(),
});

/**
 * Gemini のレスポンスを AssistantTurn に変換
 */
export function parseGeminiResponse(response: unknown): AssistantTurn {
  const parsed = GeminiResponseSchema.safeParse(response);
  if (!parsed.success) {
    throw new ProviderProtocolError(
      `gemini: unexpected response shape: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`,
      'gemini'
    );
  }

  const candidate = parsed.data.candidates?.[0];
  if (!candidate) {
    const reason = parsed.data.promptFeedback?.blockReason;
    throw new ProviderProtocolError(
      reason ? `gemini: prompt blocked (${reason})` : 'gemini: no candidates in response',
      'gemini'
    );
  }

  const parts = candidate.content?.parts ?? [];
  // thought パートは推論過程なので本文に含めない
  const text = parts
    .filter((part) => typeof part.text === 'string' && !part.thought)
    .map((part) => part.text)
    .join('');

  const toolCalls: ToolCallRequest[] = [];
  for (const part of parts) {
    if (!part.functionCall) continue;
    const call: ToolCallRequest = {
      id: part.functionCall.id || `${SYNTHESIZED_ID_PREFIX}${randomUUID()}`,
      name: part.functionCall.name,
      arguments: { ...(part.functionCall.args ?? {}) },
    };
    if (part.thoughtSignature) {
      call.thought_signature = part.thoughtSignature;
    }
    toolCalls.push(call);
  }

  const turn: AssistantTurn = { text: text ? text : null, tool_calls: toolCalls };
  const usage = parsed.data.usageMetadata;
  if (usage) {
    turn.usage = {
      prompt_tokens: usage.promptTokenCount ?? 0,
      completion_tokens: usage.candidatesTokenCount ?? 0,
      total_tokens: usage.totalTokenCount ?? 0,
    };
  }
  return turn;
}

export const createGeminiClient: ClientFactory<GeminiClient> = (config: ProviderConfig) => {
  if (!config.apiKey) {
    throw new ProviderAuthError('gemini: no API key configured (set GEMINI_API_KEY)', 'gemini');
  }
  return new GoogleGenAI({
    apiKey: config.apiKey,
    httpOptions: { timeout: config.requestTimeoutMs, ...(config.endpoint ? { baseUrl: config.endpoint } : {}) },
  });
};

export function createGeminiProvider(clientFactory: ClientFactory<GeminiClient> = createGeminiClient): ProviderAdapter {
  return {
    kind: 'gemini',
    async send(conversation, config, options) {
      const client = clientFactory(config);
      const request = buildGeminiRequest(conversation, config, options.tools, options.signal);

      providerDebugLog('Making API call to Gemini with model:', config.model);
      providerDebugLog('Messages count:', conversation.length);

      let response: unknown;
      try {
        response = await client.models.generateContent(request);
      } catch (error) {
        if (isAbortError(error) || options.signal?.aborted) throw error;
        throw classifyProviderError(error, 'gemini');
      }

      providerDebugLog('Full Gemini API response received:', response);
      return parseGeminiResponse(response);
    },
  };
}
