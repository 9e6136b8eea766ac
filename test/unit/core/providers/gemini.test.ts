import test from 'ava';
import type { GenerateContentParameters } from '@google/genai';
import { ProviderAuthError, ProviderProtocolError } from '../../../../src/core/errors.js';
import { assistantMessage, systemMessage, toolMessage, userMessage } from '../../../../src/core/messages.js';
import {
  buildGeminiRequest,
  createGeminiProvider,
  parseGeminiResponse,
  toGeminiContents,
  type GeminiClient,
} from '../../../../src/core/providers/gemini.js';
import type { Message, ProviderConfig, ToolDescriptor } from '../../../../src/core/types.js';

const CONFIG: ProviderConfig = {
  kind: 'gemini',
  model: 'test-model',
  temperature: 0.2,
  maxTokens: 512,
  requestTimeoutMs: 1000,
  apiKey: 'test-secret',
};

const LIST_FILES: ToolDescriptor = {
  name: 'list_files',
  description: 'List files',
  parameters: { type: 'object', properties: { directory: { type: 'string' } } },
};

const CONVERSATION: Message[] = [
  systemMessage('sys'),
  userMessage('hi'),
  assistantMessage(null, [
    { id: 'c1', name: 'list_files', arguments: { directory: '.' }, thought_signature: 'sig-1' },
  ]),
  toolMessage({ tool_call_id: 'c1', status: 'ok', output: 'a.txt' }),
  assistantMessage('done'),
];

test('toGeminiContents maps roles, calls and responses', t => {
  const { systemInstruction, contents } = toGeminiContents(CONVERSATION);

  t.is(systemInstruction, 'sys');
  t.deepEqual(contents, [
    { role: 'user', parts: [{ text: 'hi' }] },
    {
      role: 'model',
      parts: [{ functionCall: { id: 'c1', name: 'list_files', args: { directory: '.' } }, thoughtSignature: 'sig-1' }],
    },
    {
      role: 'user',
      parts: [{ functionResponse: { id: 'c1', name: 'list_files', response: { status: 'ok', output: 'a.txt' } } }],
    },
    { role: 'model', parts: [{ text: 'done' }] },
  ]);
});

test('ids synthesized for Gemini calls are not sent back', t => {
  const turn = parseGeminiResponse({
    candidates: [{ content: { parts: [{ functionCall: { name: 'list_files', args: {} } }] } }],
  });
  const [call] = turn.tool_calls;

  const { contents } = toGeminiContents([
    userMessage('hi'),
    assistantMessage(null, turn.tool_calls),
    toolMessage({ tool_call_id: call.id, status: 'ok', output: 'a.txt' }),
  ]);

  t.true(call.id.startsWith('gemini_call_'));
  t.deepEqual(contents, [
    { role: 'user', parts: [{ text: 'hi' }] },
    { role: 'model', parts: [{ functionCall: { name: 'list_files', args: {} } }] },
    {
      role: 'user',
      parts: [{ functionResponse: { name: 'list_files', response: { status: 'ok', output: 'a.txt' } } }],
    },
  ]);
});

test('buildGeminiRequest sets the system instruction, limits and tools', t => {
  const request = buildGeminiRequest(CONVERSATION, CONFIG, [LIST_FILES]);

  t.is(request.model, 'test-model');
  t.is(request.config?.systemInstruction, 'sys');
  t.is(request.config?.temperature, 0.2);
  t.is(request.config?.maxOutputTokens, 512);
  t.is(request.config?.tools?.length, 1);
});

test('parseGeminiResponse skips thoughts and keeps signatures', t => {
  const turn = parseGeminiResponse({
    candidates: [
      {
        content: {
          parts: [
            { text: 'reasoning...', thought: true },
            { text: 'Checking' },
            { functionCall: { name: 'list_files', args: { directory: '.' } }, thoughtSignature: 'sig-2' },
          ],
        },
        finishReason: 'STOP',
      },
    ],
    usageMetadata: { promptTokenCount: 4, candidatesTokenCount: 6, totalTokenCount: 10 },
  });

  t.is(turn.text, 'Checking');
  t.is(turn.tool_calls.length, 1);
  t.true(turn.tool_calls[0].id.startsWith('gemini_call_'));
  t.is(turn.tool_calls[0].name, 'list_files');
  t.deepEqual(turn.tool_calls[0].arguments, { directory: '.' });
  t.is(turn.tool_calls[0].thought_signature, 'sig-2');
  t.deepEqual(turn.usage, { prompt_tokens: 4, completion_tokens: 6, total_tokens: 10 });
});

test('parseGeminiResponse reports blocked prompts', t => {
  t.throws(() => parseGeminiResponse({ promptFeedback: { blockReason: 'SAFETY' } }), {
    instanceOf: ProviderProtocolError,
    message: 'gemini: prompt blocked (SAFETY)',
  });
  t.throws(() => parseGeminiResponse({ candidates: [] }), {
    instanceOf: ProviderProtocolError,
    message: 'gemini: no candidates in response',
  });
});

test('the adapter passes the abort signal to the SDK', async t => {
  const requests: GenerateContentParameters[] = [];
  const client: GeminiClient = {
    models: {
      generateContent: async params => {
        requests.push(params);
        return { candidates: [{ content: { parts: [{ text: 'Hello' }] } }] };
      },
    },
  };
  const controller = new AbortController();
  const provider = createGeminiProvider(() => client);

  const turn = await provider.send([userMessage('hi')], CONFIG, { tools: [], signal: controller.signal });

  t.deepEqual(turn, { text: 'Hello', tool_calls: [] });
  t.is(requests[0].config?.abortSignal, controller.signal);
});

test('a missing API key is an auth error', async t => {
  const { apiKey: _unused, ...withoutKey } = CONFIG;

  await t.throwsAsync(createGeminiProvider().send([userMessage('hi')], withoutKey, { tools: [] }), {
    instanceOf: ProviderAuthError,
  });
});
