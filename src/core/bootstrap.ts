/**
 * セッションの組み立て
 * 組み込みツール → MCP ツールの順にレジストリへ登録し、封印してからエンジンを作る
 */

import { AuditLog } from './audit-log.js';
import { Conversation } from './conversation.js';
import { ConversationEngine, type EngineCallbacks } from './conversation-engine.js';
import { DEFAULT_SYSTEM_PROMPT } from './default-prompt.js';
import { ConfigError, errorMessage } from './errors.js';
import { createProvider, type ProviderAdapter } from './providers/index.js';
import type { ProviderConfig, ProviderKind } from './types.js';
import type { ProviderControls } from '../commands/base.js';
import { McpBridge, type McpConnector } from '../mcp/bridge.js';
import { ToolDispatcher } from '../tools/dispatcher.js';
import { RulePolicy } from '../tools/policy.js';
import { ToolRegistry } from '../tools/tool-registry.js';
import { registerBuiltinTools } from '../tools/tools.js';
import { debugLog } from '../utils/debug-log.js';
import type { ConfigManager, ProviderOverrides } from '../utils/local-settings.js';

export interface SessionOptions {
  config: ConfigManager;
  overrides?: ProviderOverrides;
  systemPrompt?: string;
  maxToolTurns?: number;
  auditLogPath?: string;
  /** false なら MCP サーバーに接続しない */
  enableMcp?: boolean;
  callbacks?: EngineCallbacks;
  cwd?: string;
  /** テスト用の差し替え */
  provider?: ProviderAdapter;
  mcpConnector?: McpConnector;
}

export interface McpStartupFailure {
  serverId: string;
  error: string;
}

export interface Session extends ProviderControls {
  engine: ConversationEngine;
  registry: ToolRegistry;
  dispatcher: ToolDispatcher;
  bridges: McpBridge[];
  mcpFailures: McpStartupFailure[];
  close(): Promise<void>;
}

export async function createSession(options: SessionOptions): Promise<Session> {
  const { config } = options;
  const providerConfig = config.resolveProviderConfig(options.overrides);
  const limits = config.getLimits();
  const policy = new RulePolicy(config.getPolicyConfig());

  const registry = new ToolRegistry();
  registerBuiltinTools(registry);

  const bridges: McpBridge[] = [];
  const mcpFailures: McpStartupFailure[] = [];
  if (options.enableMcp !== false) {
    for (const server of config.getMcpServers()) {
      if (server.enabled === false) continue;
      const bridge = new McpBridge(server, options.mcpConnector);
      try {
        const count = await bridge.registerInto(registry);
        debugLog(`Registered ${count} tools from MCP server ${server.id}`);
        bridges.push(bridge);
      } catch (error) {
        // 1台の失敗で起動を止めない
        debugLog(`MCP server ${server.id} failed to start:`, errorMessage(error));
        mcpFailures.push({ serverId: server.id, error: errorMessage(error) });
        await bridge.close();
      }
    }
  }
  registry.seal();

  const dispatcher = new ToolDispatcher(registry, {
    defaultTimeoutMs: limits.toolTimeoutMs,
    maxTimeoutMs: limits.maxToolTimeoutMs,
    maxOutputChars: limits.maxOutputChars,
    cwd: options.cwd,
  });

  const auditLogPath = options.auditLogPath ?? config.getAuditLogPath() ?? undefined;
  const systemPrompt = options.systemPrompt ?? config.getSystemPrompt() ?? DEFAULT_SYSTEM_PROMPT;

  const makeProvider = (kind: ProviderKind): ProviderAdapter => options.provider ?? createProvider(kind);

  const engine = new ConversationEngine({
    provider: makeProvider(providerConfig.kind),
    providerConfig,
    registry,
    dispatcher,
    policy,
    conversation: new Conversation(systemPrompt),
    audit: new AuditLog({ filePath: auditLogPath }),
    limits: {
      maxToolTurns: options.maxToolTurns ?? limits.maxToolTurns,
      maxRetries: limits.maxRetries,
      retryBaseDelayMs: limits.retryBaseDelayMs,
      maxContextTokens: limits.maxContextTokens,
      parallelToolCalls: limits.parallelToolCalls,
    },
    callbacks: options.callbacks,
  });

  // CLI の --provider / --model は最初の切り替えまで有効
  let overrides: ProviderOverrides = { ...options.overrides };
  const apply = (next: ProviderOverrides): ProviderConfig => {
    const resolved = config.resolveProviderConfig(next);
    engine.switchProvider(makeProvider(resolved.kind), resolved);
    overrides = next;
    debugLog(`Switched to ${resolved.kind}:${resolved.model}`);
    return resolved;
  };
  const keepCurrent = (): ProviderOverrides => ({
    ...overrides,
    provider: engine.providerKind,
    model: engine.model,
  });

  return {
    engine,
    registry,
    dispatcher,
    bridges,
    mcpFailures,
    current: () => config.resolveProviderConfig(keepCurrent()),
    saved: () => ({ provider: config.getProvider(), model: config.getDefaultModel() }),
    switchProvider(kind: ProviderKind) {
      config.setProvider(kind);
      return apply({ temperature: overrides.temperature });
    },
    switchModel(model: string) {
      const trimmed = model.trim();
      if (!trimmed) {
        throw new ConfigError('Model must be a non-empty string');
      }
      config.setProvider(engine.providerKind);
      config.setDefaultModel(trimmed);
      return apply({ temperature: overrides.temperature, model: trimmed });
    },
    login(apiKey: string) {
      config.setApiKey(engine.providerKind, apiKey);
      return apply(keepCurrent());
    },
    logout() {
      config.clearApiKey(engine.providerKind);
      return apply(keepCurrent());
    },
    async close() {
      engine.cancel();
      dispatcher.processes.shutdown();
      const results = await Promise.allSettled(bridges.map((bridge) => bridge.close()));
      results.forEach((result, index) => {
        if (result.status === 'rejected') {
          debugLog(`Failed to close MCP server ${bridges[index].id}:`, errorMessage(result.reason));
        }
      });
    },
  };
}
