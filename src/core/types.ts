/**
 * Shared data model for the conversation engine, providers and tools.
 */

export type Role = 'system' | 'user' | 'assistant' | 'tool';

/** A tool invocation requested by the model */
export interface ToolCallRequest {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
  /** Gemini thinking models require the signature to be echoed back */
  thought_signature?: string;
}

export interface Message {
  readonly role: Role;
  readonly content: string | null;
  readonly tool_calls: readonly ToolCallRequest[];
  readonly tool_call_id?: string;
}

export type ToolStatus = 'ok' | 'error' | 'timeout';

export type ToolErrorKind =
  | 'NotFound'
  | 'InvalidArguments'
  | 'PolicyDenied'
  | 'ExecutionError'
  | 'Timeout'
  | 'BridgeUnavailable'
  | 'Cancelled';

export interface ToolResult {
  readonly tool_call_id: string;
  readonly status: ToolStatus;
  readonly output: string;
  readonly exit_code?: number;
  readonly error_kind?: ToolErrorKind;
}

export interface ApiUsage {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
}

/** Normalized model reply */
export interface AssistantTurn {
  text: string | null;
  tool_calls: ToolCallRequest[];
  usage?: ApiUsage;
}

export type ProviderKind = 'groq' | 'openai' | 'local' | 'anthropic' | 'gemini';

export const PROVIDER_KINDS: readonly ProviderKind[] = ['groq', 'openai', 'local', 'anthropic', 'gemini'];

export interface ProviderConfig {
  readonly kind: ProviderKind;
  readonly endpoint?: string;
  readonly apiKey?: string;
  readonly model: string;
  readonly temperature: number;
  readonly maxTokens: number;
  readonly requestTimeoutMs: number;
}

/** JSON Schema subset used for tool parameters */
export interface JsonSchemaProperty {
  type?: 'string' | 'number' | 'integer' | 'boolean' | 'array' | 'object' | 'null';
  description?: string;
  enum?: readonly (string | number | boolean)[];
  items?: JsonSchemaProperty;
  properties?: Record<string, JsonSchemaProperty>;
  required?: readonly string[];
  default?: unknown;
  minimum?: number;
  maximum?: number;
}

export interface JsonSchemaObject {
  type: 'object';
  properties: Record<string, JsonSchemaProperty>;
  required?: readonly string[];
  additionalProperties?: boolean;
}

export interface ToolDescriptor {
  readonly name: string;
  readonly description: string;
  readonly parameters: JsonSchemaObject;
}

export type AuditEventKind =
  | 'turn_started'
  | 'message'
  | 'context_trimmed'
  | 'conversation_cleared'
  | 'provider_changed'
  | 'provider_request'
  | 'provider_reply'
  | 'provider_error'
  | 'provider_retry'
  | 'tool_call'
  | 'tool_result'
  | 'turn_completed'
  | 'turn_aborted'
  | 'turn_cancelled';

export interface AuditEntry {
  readonly timestamp: string;
  readonly turn_id: number;
  readonly kind: AuditEventKind;
  readonly payload: Record<string, unknown>;
}
