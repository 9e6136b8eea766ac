export { ConversationEngine, DEFAULT_ENGINE_LIMITS } from './core/conversation-engine.js';
export type {
  EngineCallbacks,
  EngineLimits,
  EngineState,
  ConversationEngineOptions,
  TurnOutcome,
  TurnStatus,
} from './core/conversation-engine.js';
export { Conversation } from './core/conversation.js';
export { AuditLog, parseAuditLog, readAuditLogFile, replayConversation } from './core/audit-log.js';
export { createSession } from './core/bootstrap.js';
export type { Session, SessionOptions } from './core/bootstrap.js';
export * from './core/errors.js';
export * from './core/messages.js';
export type * from './core/types.js';
export { PROVIDER_KINDS } from './core/types.js';
export { createProvider, DEFAULT_MODELS } from './core/providers/index.js';
export type { ProviderAdapter, SendOptions } from './core/providers/index.js';
export { McpBridge, connectStdio, namespacedToolName } from './mcp/bridge.js';
export type { McpConnector, McpServerConfig, McpSession } from './mcp/bridge.js';
export { ToolDispatcher } from './tools/dispatcher.js';
export type { ApprovalFn, DispatcherOptions } from './tools/dispatcher.js';
export { ToolRegistry } from './tools/tool-registry.js';
export type { ToolContext, ToolHandler, ToolOutput } from './tools/tool-registry.js';
export { RulePolicy, ALLOW_ALL_POLICY, DEFAULT_POLICY_CONFIG } from './tools/policy.js';
export type { PolicyConfig, PolicyDecision, ToolPolicy } from './tools/policy.js';
export { ProcessSupervisor } from './tools/process-supervisor.js';
export { registerBuiltinTools } from './tools/tools.js';
export { ConfigManager } from './utils/local-settings.js';
