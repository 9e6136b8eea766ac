/**
 * Error taxonomy. Every error carries a `kind` so callers can switch on it
 * without instanceof chains.
 */

import type { ProviderKind, ToolErrorKind } from './types.js';

export type ErrorKind =
  | 'ProviderUnreachable'
  | 'ProviderProtocolError'
  | 'ProviderAuthError'
  | 'DuplicateTool'
  | 'RegistrySealed'
  | 'ConfigError'
  | ToolErrorKind;

export abstract class AgentError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export abstract class ProviderError extends AgentError {
  abstract readonly kind: 'ProviderUnreachable' | 'ProviderProtocolError' | 'ProviderAuthError';

  constructor(
    message: string,
    readonly provider: ProviderKind,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class ProviderUnreachableError extends ProviderError {
  readonly kind = 'ProviderUnreachable';
}

export class ProviderProtocolError extends ProviderError {
  readonly kind = 'ProviderProtocolError';
}

export class ProviderAuthError extends ProviderError {
  readonly kind = 'ProviderAuthError';
}

export class DuplicateToolError extends AgentError {
  readonly kind = 'DuplicateTool';

  constructor(readonly toolName: string) {
    super(`Tool already registered: ${toolName}`);
  }
}

export class RegistrySealedError extends AgentError {
  readonly kind = 'RegistrySealed';

  constructor(readonly toolName: string) {
    super(`Tool registry is sealed; cannot register ${toolName}`);
  }
}

export class ToolNotFoundError extends AgentError {
  readonly kind = 'NotFound';

  constructor(readonly toolName: string) {
    super(`Unknown tool: ${toolName}`);
  }
}

export class ExecutionError extends AgentError {
  readonly kind = 'ExecutionError';
}

export class ToolTimeoutError extends AgentError {
  readonly kind = 'Timeout';

  constructor(readonly timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms`);
  }
}

export class BridgeUnavailableError extends AgentError {
  readonly kind = 'BridgeUnavailable';

  constructor(readonly serverId: string, message: string, options?: { cause?: unknown }) {
    super(`MCP server "${serverId}" unavailable: ${message}`, options);
  }
}

export class CancelledError extends AgentError {
  readonly kind = 'Cancelled';

  constructor(message = 'Cancelled by user') {
    super(message);
  }
}

export class ConfigError extends AgentError {
  readonly kind = 'ConfigError';

  constructor(message: string, readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n${issues.map((issue) => `  - ${issue}`).join('\n')}` : message);
  }
}

export function isAgentError(error: unknown): error is AgentError {
  return error instanceof AgentError;
}

export function isProviderError(error: unknown): error is ProviderError {
  return error instanceof ProviderError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** DOMException, SDK user-abort errors and plain AbortErrors all count. */
export function isAbortError(error: unknown): boolean {
  if (error instanceof CancelledError) return true;
  if (!(error instanceof Error)) return false;
  return (
    error.name === 'AbortError' ||
    error.name === 'APIUserAbortError' ||
    error.message.includes('Request was aborted')
  );
}
