/**
 * Bridge to one MCP tool server.
 *
 * - Launches the server over stdio and lists its tools.
 * - Exposes them as `mcp__<server>__<tool>` so they cannot collide with built-ins.
 * - A lost connection fails the current call with BridgeUnavailable; the next
 *   call reconnects.
 */

import {Client} from '@modelcontextprotocol/sdk/client/index.js';
import {getDefaultEnvironment, StdioClientTransport} from '@modelcontextprotocol/sdk/client/stdio.js';
import {CallToolResultSchema, ErrorCode, McpError} from '@modelcontextprotocol/sdk/types.js';
import {BridgeUnavailableError, DuplicateToolError, ExecutionError, errorMessage, isAbortError} from '../core/errors.js';
import type {JsonSchemaObject, JsonSchemaProperty, ToolDescriptor, ToolResult} from '../core/types.js';
import type {ToolOutput, ToolRegistry} from '../tools/tool-registry.js';
import {isPlainObject} from '../tools/validators.js';
import {mcpDebugLog} from '../utils/debug-log.js';

export interface McpServerConfig {
  id: string;
  command: string;
  args: string[];
  env?: Record<string, string>;
  enabled?: boolean;
  /** Per-call timeout for this server's tools */
  timeoutMs?: number;
}

export interface McpToolInfo {
  name: string;
  description?: string;
  inputSchema: unknown;
}

/** The slice of an MCP client session the bridge needs. */
export interface McpSession {
  listTools(): Promise<McpToolInfo[]>;
  callTool(
    name: string,
    args: Record<string, unknown>,
    options: { signal?: AbortSignal; timeoutMs?: number }
  ): Promise<unknown>;
  close(): Promise<void>;
  readonly closed: boolean;
}

export type McpConnector = (server: McpServerConfig) => Promise<McpSession>;

const MAX_TOOL_NAME_LENGTH = 64;

export const connectStdio: McpConnector = async (server) => {
  const transport = new StdioClientTransport({
    command: server.command,
    args: server.args,
    env: server.env ? { ...getDefaultEnvironment(), ...server.env } : undefined,
    stderr: 'ignore',
  });
  const client = new Client({ name: 'shell-pilot', version: '0.1.0' });

  let closed = false;
  client.onclose = () => {
    closed = true;
  };
  await client.connect(transport);

  return {
    get closed() {
      return closed;
    },
    async listTools() {
      const result = await client.listTools();
      return result.tools.map((tool) => ({
        name: tool.name,
        description: tool.description,
        inputSchema: tool.inputSchema,
      }));
    },
    callTool(name, args, options) {
      return client.callTool({ name, arguments: args }, undefined, {
        signal: options.signal,
        timeout: options.timeoutMs,
      });
    },
    close() {
      return client.close();
    },
  };
};

function sanitizeNamePart(value: string): string {
  return value.replace(/[^A-Za-z0-9_-]/g, '_');
}

export function namespacedToolName(serverId: string, toolName: string): string {
  return `mcp__${sanitizeNamePart(serverId)}__${sanitizeNamePart(toolName)}`.slice(0, MAX_TOOL_NAME_LENGTH);
}

const SCHEMA_TYPES: readonly string[] = ['string', 'number', 'integer', 'boolean', 'array', 'object', 'null'];

function isSchemaType(value: unknown): value is NonNullable<JsonSchemaProperty['type']> {
  return typeof value === 'string' && SCHEMA_TYPES.includes(value);
}

function toProperty(raw: unknown): JsonSchemaProperty {
  if (!isPlainObject(raw)) return {};
  const property: JsonSchemaProperty = {};
  if (isSchemaType(raw.type)) property.type = raw.type;
  if (typeof raw.description === 'string') property.description = raw.description;
  if (Array.isArray(raw.enum)) {
    property.enum = raw.enum.filter(
      (option): option is string | number | boolean =>
        typeof option === 'string' || typeof option === 'number' || typeof option === 'boolean'
    );
  }
  if (raw.items !== undefined) property.items = toProperty(raw.items);
  if (isPlainObject(raw.properties)) property.properties = toProperties(raw.properties);
  if (Array.isArray(raw.required)) property.required = toRequired(raw.required);
  if (typeof raw.minimum === 'number') property.minimum = raw.minimum;
  if (typeof raw.maximum === 'number') property.maximum = raw.maximum;
  if (raw.default !== undefined) property.default = raw.default;
  return property;
}

function toProperties(raw: Record<string, unknown>): Record<string, JsonSchemaProperty> {
  const properties: Record<string, JsonSchemaProperty> = {};
  for (const [key, value] of Object.entries(raw)) {
    properties[key] = toProperty(value);
  }
  return properties;
}

function toRequired(raw: unknown[]): string[] {
  return raw.filter((item): item is string => typeof item === 'string');
}

/** Keeps the subset of a remote input schema the dispatcher can validate. */
export function normalizeInputSchema(raw: unknown): JsonSchemaObject {
  if (!isPlainObject(raw)) {
    return { type: 'object', properties: {} };
  }
  return {
    type: 'object',
    properties: isPlainObject(raw.properties) ? toProperties(raw.properties) : {},
    required: Array.isArray(raw.required) ? toRequired(raw.required) : [],
  };
}

/** Flattens MCP content blocks into text. */
export function renderToolContent(raw: unknown): ToolOutput {
  const parsed = CallToolResultSchema.safeParse(raw);
  if (!parsed.success) {
    return { output: JSON.stringify(raw) };
  }
  const parts = parsed.data.content.map((block) => {
    switch (block.type) {
      case 'text':
        return block.text;
      case 'image':
        return `[image ${block.mimeType}]`;
      case 'audio':
        return `[audio ${block.mimeType}]`;
      case 'resource':
        return 'text' in block.resource ? block.resource.text : `[resource ${block.resource.uri}]`;
      default:
        return JSON.stringify(block);
    }
  });
  if (parts.length === 0 && parsed.data.structuredContent !== undefined) {
    parts.push(JSON.stringify(parsed.data.structuredContent));
  }
  return { output: parts.join('\n'), isError: parsed.data.isError === true };
}

export class McpBridge {
  private session: McpSession | null = null;
  private connecting: Promise<McpSession> | null = null;
  private readonly remoteNames = new Map<string, string>();

  constructor(
    private readonly server: McpServerConfig,
    private readonly connector: McpConnector = connectStdio
  ) {}

  get id(): string {
    return this.server.id;
  }

  get connected(): boolean {
    return this.session !== null && !this.session.closed;
  }

  async discover(): Promise<ToolDescriptor[]> {
    const session = await this.ensureSession();
    let tools: McpToolInfo[];
    try {
      tools = await session.listTools();
    } catch (error) {
      throw this.toBridgeError(error);
    }

    this.remoteNames.clear();
    const descriptors = tools.map((tool) => {
      const name = namespacedToolName(this.server.id, tool.name);
      this.remoteNames.set(name, tool.name);
      return {
        name,
        description: tool.description ?? `${tool.name} (MCP server ${this.server.id})`,
        parameters: normalizeInputSchema(tool.inputSchema),
      };
    });
    mcpDebugLog(`Discovered ${descriptors.length} tools on ${this.server.id}`, {
      tools: descriptors.map((descriptor) => descriptor.name),
    });
    return descriptors;
  }

  /** Registers every discovered tool; returns how many were added. */
  async registerInto(registry: ToolRegistry): Promise<number> {
    const descriptors = await this.discover();
    // Check every name first so a clash leaves the registry untouched
    const seen = new Set<string>();
    for (const descriptor of descriptors) {
      if (registry.has(descriptor.name) || seen.has(descriptor.name)) {
        throw new DuplicateToolError(descriptor.name);
      }
      seen.add(descriptor.name);
    }
    for (const descriptor of descriptors) {
      registry.register(
        descriptor,
        (args, context) => this.call(descriptor.name, args, { signal: context.signal, timeoutMs: context.timeoutMs }),
        { source: 'mcp', timeoutMs: this.server.timeoutMs }
      );
    }
    return descriptors.length;
  }

  /** Calls a remote tool and reports the outcome in the dispatcher's result shape. */
  async invoke(
    name: string,
    args: Record<string, unknown>,
    options: { toolCallId?: string; signal?: AbortSignal; timeoutMs?: number } = {}
  ): Promise<ToolResult> {
    const toolCallId = options.toolCallId ?? name;
    try {
      const result = await this.call(name, args, options);
      return {
        tool_call_id: toolCallId,
        status: result.isError ? 'error' : 'ok',
        output: result.output,
        ...(result.isError ? { error_kind: 'ExecutionError' as const } : {}),
      };
    } catch (error) {
      return {
        tool_call_id: toolCallId,
        status: 'error',
        output: errorMessage(error),
        error_kind: error instanceof BridgeUnavailableError ? 'BridgeUnavailable' : 'ExecutionError',
      };
    }
  }

  /** Throws BridgeUnavailableError or ExecutionError. */
  async call(
    name: string,
    args: Record<string, unknown>,
    options: { signal?: AbortSignal; timeoutMs?: number } = {}
  ): Promise<ToolOutput> {
    const remoteName = this.remoteNames.get(name) ?? name;
    const session = await this.ensureSession();
    try {
      const raw = await session.callTool(remoteName, args, {
        signal: options.signal,
        timeoutMs: options.timeoutMs ?? this.server.timeoutMs,
      });
      return renderToolContent(raw);
    } catch (error) {
      if (isAbortError(error) || options.signal?.aborted) {
        throw error;
      }
      if (error instanceof McpError && error.code !== ErrorCode.ConnectionClosed) {
        throw new ExecutionError(`MCP tool ${remoteName} failed: ${error.message}`, { cause: error });
      }
      throw this.toBridgeError(error);
    }
  }

  async close(): Promise<void> {
    const session = this.session;
    this.session = null;
    if (session) {
      await session.close();
    }
  }

  private async ensureSession(): Promise<McpSession> {
    if (this.session && !this.session.closed) {
      return this.session;
    }
    this.session = null;
    if (!this.connecting) {
      mcpDebugLog(`Connecting to ${this.server.id}`, { command: this.server.command, args: this.server.args });
      this.connecting = this.connector(this.server).finally(() => {
        this.connecting = null;
      });
    }
    try {
      this.session = await this.connecting;
      return this.session;
    } catch (error) {
      throw new BridgeUnavailableError(this.server.id, errorMessage(error), { cause: error });
    }
  }

  /** Drops the session so the next call reconnects. */
  private toBridgeError(error: unknown): BridgeUnavailableError {
    const session = this.session;
    this.session = null;
    if (session && !session.closed) {
      session.close().catch((closeError: unknown) => {
        mcpDebugLog(`Failed to close session for ${this.server.id}`, { error: errorMessage(closeError) });
      });
    }
    mcpDebugLog(`Connection to ${this.server.id} lost`, { error: errorMessage(error) });
    return new BridgeUnavailableError(this.server.id, errorMessage(error), { cause: error });
  }
}
