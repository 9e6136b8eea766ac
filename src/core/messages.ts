import type { Message, ToolCallRequest, ToolResult } from './types.js';

function freezeMessage(message: Message): Message {
  const toolCalls = message.tool_calls.map((call) =>
    Object.freeze({ ...call, arguments: Object.freeze({ ...call.arguments }) })
  );
  return Object.freeze({ ...message, tool_calls: Object.freeze(toolCalls) });
}

export function systemMessage(content: string): Message {
  return freezeMessage({ role: 'system', content, tool_calls: [] });
}

export function userMessage(content: string): Message {
  return freezeMessage({ role: 'user', content, tool_calls: [] });
}

export function assistantMessage(content: string | null, toolCalls: readonly ToolCallRequest[] = []): Message {
  return freezeMessage({ role: 'assistant', content, tool_calls: [...toolCalls] });
}

/** Tool results travel to the model as JSON so every backend sees the status. */
export function toolResultContent(result: ToolResult): string {
  const body: Record<string, unknown> = { status: result.status, output: result.output };
  if (result.exit_code !== undefined) body.exit_code = result.exit_code;
  if (result.error_kind !== undefined) body.error_kind = result.error_kind;
  return JSON.stringify(body);
}

export function toolMessage(result: ToolResult): Message {
  return freezeMessage({
    role: 'tool',
    content: toolResultContent(result),
    tool_calls: [],
    tool_call_id: result.tool_call_id,
  });
}

export function cloneMessage(message: Message): Message {
  return freezeMessage(message);
}

/** Looks up the tool name for a tool message, needed by backends that key results by name. */
export function findToolCallName(messages: readonly Message[], toolCallId: string): string | undefined {
  for (const message of messages) {
    const match = message.tool_calls.find((call) => call.id === toolCallId);
    if (match) return match.name;
  }
  return undefined;
}
