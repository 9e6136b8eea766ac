import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { z } from 'zod';
import { ConfigError } from '../core/errors.js';
import { DEFAULT_MODELS } from '../core/providers/index.js';
import { DEFAULT_LOCAL_ENDPOINT } from '../core/providers/openai.js';
import type { ProviderConfig, ProviderKind } from '../core/types.js';
import type { McpServerConfig } from '../mcp/bridge.js';
import { DEFAULT_POLICY_CONFIG, type PolicyConfig } from '../tools/policy.js';
import { debugLog } from './debug-log.js';

const CONFIG_DIR = '.shell-pilot'; // In home directory
const CONFIG_FILE = 'config.json';

const PROVIDER_KIND = z.enum(['groq', 'openai', 'local', 'anthropic', 'gemini']);

const ProviderSettingsSchema = z
  .object({
    apiKey: z.string().min(1).optional(),
    endpoint: z.string().url().optional(),
    model: z.string().min(1).optional(),
  })
  .strict();

const LimitsSchema = z
  .object({
    maxToolTurns: z.number().int().min(1),
    maxRetries: z.number().int().min(0).max(10),
    retryBaseDelayMs: z.number().int().min(0),
    toolTimeoutMs: z.number().int().positive(),
    maxToolTimeoutMs: z.number().int().positive(),
    maxOutputChars: z.number().int().positive(),
    maxContextTokens: z.number().int().positive(),
    parallelToolCalls: z.boolean(),
  })
  .strict()
  .partial();

const PolicySettingsSchema = z
  .object({
    allowTools: z.array(z.string()),
    denyTools: z.array(z.string()),
    askTools: z.array(z.string()),
    forbiddenSubstrings: z.array(z.string().min(1)),
    denyPatterns: z.array(
      z.string().refine((pattern) => {
        try {
          new RegExp(pattern);
          return true;
        } catch {
          return false;
        }
      }, 'must be a valid regular expression')
    ),
    autoCommands: z.array(z.string().min(1)),
    defaultAction: z.enum(['allow', 'ask', 'deny']),
    dangerousFiles: z.array(z.string()),
    dangerousDirectories: z.array(z.string()),
  })
  .strict()
  .partial();

const McpServerSchema = z
  .object({
    id: z.string().regex(/^[A-Za-z0-9_-]+$/, 'must contain only letters, digits, "_" or "-"'),
    command: z.string().min(1),
    args: z.array(z.string()).default([]),
    env: z.record(z.string()).optional(),
    enabled: z.boolean().default(true),
    timeoutMs: z.number().int().positive().optional(),
  })
  .strict();

export const SettingsSchema = z
  .object({
    provider: PROVIDER_KIND.optional(),
    model: z.string().min(1).optional(),
    temperature: z.number().min(0).max(2).optional(),
    maxTokens: z.number().int().positive().optional(),
    requestTimeoutMs: z.number().int().positive().optional(),
    systemPrompt: z.string().optional(),
    providers: z
      .object({
        groq: ProviderSettingsSchema,
        openai: ProviderSettingsSchema,
        local: ProviderSettingsSchema,
        anthropic: ProviderSettingsSchema,
        gemini: ProviderSettingsSchema,
      })
      .partial()
      .optional(),
    limits: LimitsSchema.optional(),
    policy: PolicySettingsSchema.optional(),
    mcpServers: z.array(McpServerSchema).optional(),
    auditLogPath: z.string().min(1).optional(),
  })
  .strict();

export type Settings = z.infer<typeof SettingsSchema>;

export interface ResolvedLimits {
  maxToolTurns: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  toolTimeoutMs: number;
  maxToolTimeoutMs: number;
  maxOutputChars: number;
  maxContextTokens: number;
  parallelToolCalls: boolean;
}

export const DEFAULT_LIMITS: ResolvedLimits = {
  maxToolTurns: 10,
  maxRetries: 3,
  retryBaseDelayMs: 500,
  toolTimeoutMs: 30_000,
  maxToolTimeoutMs: 300_000,
  maxOutputChars: 20_000,
  maxContextTokens: 24_000,
  parallelToolCalls: true,
};

export const DEFAULT_TEMPERATURE = 1.0;
export const DEFAULT_MAX_TOKENS = 8000;
export const DEFAULT_REQUEST_TIMEOUT_MS = 120_000;

/** 環境変数が設定ファイルより優先される */
export const API_KEY_ENV: Record<ProviderKind, readonly string[]> = {
  groq: ['GROQ_API_KEY'],
  openai: ['OPENAI_API_KEY'],
  local: ['LOCAL_LLM_API_KEY'],
  anthropic: ['ANTHROPIC_API_KEY'],
  gemini: ['GEMINI_API_KEY', 'GOOGLE_API_KEY'],
};

export interface ProviderOverrides {
  provider?: ProviderKind;
  model?: string;
  temperature?: number;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`);
}

export class ConfigManager {
  private configPath: string;
  private env: NodeJS.ProcessEnv;

  constructor(configPath?: string, env: NodeJS.ProcessEnv = process.env) {
    if (configPath) {
      this.configPath = path.resolve(configPath);
    } else {
      const homeDir = os.homedir();
      this.configPath = path.join(homeDir, CONFIG_DIR, CONFIG_FILE);
    }
    this.env = env;
  }

  get path(): string {
    return this.configPath;
  }

  private ensureConfigDir(): void {
    const configDir = path.dirname(this.configPath);
    if (!fs.existsSync(configDir)) {
      fs.mkdirSync(configDir, { recursive: true, mode: 0o700 });
    }
  }

  /** 設定ファイルを読み込んで検証する。ファイルがなければ空の設定 */
  read(): Settings {
    if (!fs.existsSync(this.configPath)) {
      return {};
    }
    const configData = fs.readFileSync(this.configPath, 'utf8');
    let raw: unknown;
    try {
      raw = JSON.parse(configData);
    } catch (error) {
      throw new ConfigError(
        `Invalid JSON in ${this.configPath}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
    const parsed = SettingsSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigError(`Invalid configuration in ${this.configPath}`, formatIssues(parsed.error));
    }
    return parsed.data;
  }

  private write(settings: Settings): void {
    const parsed = SettingsSchema.safeParse(settings);
    if (!parsed.success) {
      throw new ConfigError('Refusing to write invalid configuration', formatIssues(parsed.error));
    }
    this.ensureConfigDir();
    fs.writeFileSync(this.configPath, JSON.stringify(parsed.data, null, 2) + '\n', {
      mode: 0o600, // Read/write for owner only
    });
    // Ensure restrictive perms even if file already existed
    try {
      fs.chmodSync(this.configPath, 0o600);
    } catch (error) {
      debugLog('chmod on config file failed:', error instanceof Error ? error.message : String(error));
    }
  }

  private update(mutate: (settings: Settings) => Settings): void {
    this.write(mutate(this.read()));
  }

  // Provider Management
  public getProvider(): ProviderKind {
    return this.read().provider ?? 'groq';
  }

  /** 別のプロバイダーに切り替えると保存済みの model は捨てる */
  public setProvider(provider: ProviderKind): void {
    this.update((settings) => {
      if ((settings.provider ?? 'groq') === provider) {
        return { ...settings, provider };
      }
      const { model: _previous, ...rest } = settings;
      return { ...rest, provider };
    });
  }

  public getDefaultModel(): string | null {
    return this.read().model ?? null;
  }

  public setDefaultModel(model: string): void {
    const trimmed = model.trim();
    if (!trimmed) {
      throw new ConfigError('Model must be a non-empty string');
    }
    this.update((settings) => ({ ...settings, model: trimmed }));
  }

  // API Key Management
  public getApiKey(kind: ProviderKind): string | null {
    for (const name of API_KEY_ENV[kind]) {
      const value = this.env[name]?.trim();
      if (value) {
        debugLog(`Using ${kind} API key from environment variable ${name}`);
        return value;
      }
    }
    return this.read().providers?.[kind]?.apiKey ?? null;
  }

  public setApiKey(kind: ProviderKind, apiKey: string): void {
    const trimmed = apiKey.trim();
    if (!trimmed) {
      throw new ConfigError('API key must be a non-empty string');
    }
    this.update((settings) => ({
      ...settings,
      providers: { ...settings.providers, [kind]: { ...settings.providers?.[kind], apiKey: trimmed } },
    }));
  }

  public clearApiKey(kind: ProviderKind): void {
    const settings = this.read();
    const current = settings.providers?.[kind];
    if (!current?.apiKey) return;
    const { apiKey: _removed, ...rest } = current;
    const next: Settings = { ...settings, providers: { ...settings.providers, [kind]: rest } };

    if (Object.keys(rest).length === 0 && next.providers) {
      delete next.providers[kind];
      if (Object.keys(next.providers).length === 0) {
        delete next.providers;
      }
    }

    if (Object.keys(next).length === 0) {
      fs.rmSync(this.configPath, { force: true });
    } else {
      this.write(next);
    }
  }

  public getLimits(): ResolvedLimits {
    const limits = { ...DEFAULT_LIMITS, ...this.read().limits };
    if (limits.toolTimeoutMs > limits.maxToolTimeoutMs) {
      throw new ConfigError(
        `limits.toolTimeoutMs (${limits.toolTimeoutMs}) exceeds limits.maxToolTimeoutMs (${limits.maxToolTimeoutMs})`
      );
    }
    return limits;
  }

  public getPolicyConfig(): PolicyConfig {
    return { ...DEFAULT_POLICY_CONFIG, ...this.read().policy };
  }

  public getMcpServers(): McpServerConfig[] {
    return (this.read().mcpServers ?? []).map((server) => ({ ...server, args: [...server.args] }));
  }

  public getAuditLogPath(): string | null {
    return this.read().auditLogPath ?? null;
  }

  public getSystemPrompt(): string | null {
    return this.read().systemPrompt ?? null;
  }

  /**
   * CLI の指定・設定ファイル・環境変数・既定値を合成して ProviderConfig を作る
   */
  public resolveProviderConfig(overrides: ProviderOverrides = {}): ProviderConfig {
    const settings = this.read();
    const kind = overrides.provider ?? settings.provider ?? 'groq';
    const providerSettings = settings.providers?.[kind];
    // トップレベルの model は保存済みプロバイダーのもの
    const savedModel = !overrides.provider || overrides.provider === settings.provider ? settings.model : undefined;
    const model = overrides.model ?? providerSettings?.model ?? savedModel ?? DEFAULT_MODELS[kind];
    const temperature = overrides.temperature ?? settings.temperature ?? DEFAULT_TEMPERATURE;
    if (!Number.isFinite(temperature) || temperature < 0 || temperature > 2) {
      throw new ConfigError(`Temperature must be between 0 and 2, got ${temperature}`);
    }

    const endpoint = providerSettings?.endpoint ?? (kind === 'local' ? DEFAULT_LOCAL_ENDPOINT : undefined);
    const apiKey = this.getApiKey(kind);
    const config: ProviderConfig = {
      kind,
      model,
      temperature,
      maxTokens: settings.maxTokens ?? DEFAULT_MAX_TOKENS,
      requestTimeoutMs: settings.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
      ...(endpoint ? { endpoint } : {}),
      ...(apiKey ? { apiKey } : {}),
    };
    return Object.freeze(config);
  }
}
