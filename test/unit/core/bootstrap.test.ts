import test from 'ava';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { readAuditLogFile } from '../../../src/core/audit-log.js';
import { createSession } from '../../../src/core/bootstrap.js';
import { DEFAULT_MODELS } from '../../../src/core/providers/index.js';
import type { ProviderAdapter } from '../../../src/core/providers/types.js';
import type { AssistantTurn } from '../../../src/core/types.js';
import type { McpServerConfig, McpSession, McpToolInfo } from '../../../src/mcp/bridge.js';
import { ConfigManager } from '../../../src/utils/local-settings.js';

class FakeSession implements McpSession {
  closed = false;

  constructor(private readonly tools: McpToolInfo[]) {}

  async listTools(): Promise<McpToolInfo[]> {
    return this.tools;
  }

  async callTool(name: string): Promise<unknown> {
    return { content: [{ type: 'text', text: `called ${name}` }], isError: false };
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

function fakeConnector() {
  const connected: string[] = [];
  const sessions: FakeSession[] = [];
  const connector = async (server: McpServerConfig): Promise<McpSession> => {
    connected.push(server.id);
    if (server.id === 'broken') {
      throw new Error('spawn failed');
    }
    const session = new FakeSession([{ name: 'list', inputSchema: { type: 'object' } }]);
    sessions.push(session);
    return session;
  };
  return { connector, connected, sessions };
}

function scriptedProvider(replies: AssistantTurn[]): ProviderAdapter {
  let call = 0;
  return {
    kind: 'openai',
    async send() {
      const reply = replies[Math.min(call, replies.length - 1)];
      call += 1;
      return reply;
    },
  };
}

function createTempConfig(settings: Record<string, unknown>): { dir: string; config: ConfigManager } {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'shell-pilot-session-test-'));
  const configPath = path.join(dir, 'config.json');
  fs.writeFileSync(configPath, JSON.stringify(settings));
  return { dir, config: new ConfigManager(configPath, {}) };
}

const SETTINGS = {
  provider: 'openai',
  model: 'gpt-test',
  systemPrompt: 'Be brief.',
  limits: { maxToolTurns: 4 },
  mcpServers: [
    { id: 'fs', command: 'fake-server' },
    { id: 'broken', command: 'fake-server' },
    { id: 'off', command: 'fake-server', enabled: false },
  ],
};

test('createSession registers MCP tools, records failures and seals the registry', async t => {
  const { dir, config } = createTempConfig(SETTINGS);
  const { connector, connected } = fakeConnector();

  const session = await createSession({
    config,
    provider: scriptedProvider([{ text: 'hi', tool_calls: [] }]),
    mcpConnector: connector,
  });

  t.true(session.registry.isSealed);
  t.true(session.registry.has('execute_command'));
  t.true(session.registry.has('mcp__fs__list'));
  t.deepEqual(connected, ['fs', 'broken']);
  t.deepEqual(
    session.bridges.map(bridge => bridge.id),
    ['fs']
  );
  t.deepEqual(session.mcpFailures, [
    { serverId: 'broken', error: 'MCP server "broken" unavailable: spawn failed' },
  ]);
  t.is(session.engine.model, 'gpt-test');
  t.is(session.engine.providerKind, 'openai');
  t.is(session.engine.limits.maxToolTurns, 4);
  t.deepEqual(session.engine.conversation.messages.map(message => message.content), ['Be brief.']);

  await session.close();
  fs.rmSync(dir, { recursive: true, force: true });
});

test('createSession skips MCP servers when disabled', async t => {
  const { dir, config } = createTempConfig(SETTINGS);
  const { connector, connected } = fakeConnector();

  const session = await createSession({
    config,
    provider: scriptedProvider([{ text: 'hi', tool_calls: [] }]),
    mcpConnector: connector,
    enableMcp: false,
    maxToolTurns: 2,
  });

  t.deepEqual(connected, []);
  t.false(session.registry.has('mcp__fs__list'));
  t.deepEqual(session.mcpFailures, []);
  t.is(session.engine.limits.maxToolTurns, 2);

  await session.close();
  fs.rmSync(dir, { recursive: true, force: true });
});

test('a session runs MCP tools after approval and writes the audit file', async t => {
  const { dir, config } = createTempConfig(SETTINGS);
  const { connector, sessions } = fakeConnector();
  const auditLogPath = path.join(dir, 'logs', 'audit.jsonl');
  const approvals: string[] = [];

  const session = await createSession({
    config,
    auditLogPath,
    provider: scriptedProvider([
      { text: null, tool_calls: [{ id: 'c1', name: 'mcp__fs__list', arguments: {} }] },
      { text: 'Listed.', tool_calls: [] },
    ]),
    mcpConnector: connector,
    callbacks: {
      approve: async request => {
        approvals.push(request.name);
        return true;
      },
    },
  });

  const outcome = await session.engine.runTurn('list things');

  t.is(outcome.status, 'Completed');
  t.is(outcome.text, 'Listed.');
  t.deepEqual(approvals, ['mcp__fs__list']);
  const toolMessage = session.engine.conversation.messages.find(message => message.role === 'tool');
  t.is(toolMessage?.content, '{"status":"ok","output":"called list"}');
  t.is(readAuditLogFile(auditLogPath).length, session.engine.audit.size);

  await session.close();
  t.true(sessions[0].closed);
  fs.rmSync(dir, { recursive: true, force: true });
});

test('switching model and provider keeps the conversation and saves the choice', async t => {
  const { dir, config } = createTempConfig({ provider: 'openai', model: 'gpt-test', systemPrompt: 'Be brief.' });
  const requested: string[] = [];
  const provider: ProviderAdapter = {
    kind: 'openai',
    async send(_conversation, providerConfig) {
      requested.push(`${providerConfig.kind}:${providerConfig.model}`);
      return { text: 'ok', tool_calls: [] };
    },
  };

  const session = await createSession({ config, provider, enableMcp: false, overrides: { model: 'cli-model' } });
  await session.engine.runTurn('first');
  const switched = session.switchModel(' test-model ');
  await session.engine.runTurn('second');

  t.is(switched.model, 'test-model');
  t.deepEqual(requested, ['openai:cli-model', 'openai:test-model']);
  t.deepEqual(session.saved(), { provider: 'openai', model: 'test-model' });
  t.deepEqual(
    session.engine.conversation.messages.map(message => message.content),
    ['Be brief.', 'first', 'ok', 'second', 'ok']
  );

  const anthropic = session.switchProvider('anthropic');

  t.is(anthropic.model, DEFAULT_MODELS.anthropic);
  t.is(session.engine.providerKind, 'anthropic');
  t.deepEqual(session.saved(), { provider: 'anthropic', model: null });
  t.deepEqual(
    session.engine.audit
      .entries()
      .filter(entry => entry.kind === 'provider_changed')
      .map(entry => entry.payload),
    [
      { provider: 'openai', model: 'test-model' },
      { provider: 'anthropic', model: DEFAULT_MODELS.anthropic },
    ]
  );

  await session.close();
  fs.rmSync(dir, { recursive: true, force: true });
});

test('login and logout update the key of the current provider', async t => {
  const { dir, config } = createTempConfig({ provider: 'openai', model: 'gpt-test' });

  const session = await createSession({
    config,
    provider: scriptedProvider([{ text: 'hi', tool_calls: [] }]),
    enableMcp: false,
  });

  const loggedIn = session.login('test-secret');

  t.is(loggedIn.apiKey, 'test-secret');
  t.is(loggedIn.model, 'gpt-test');
  t.is(config.getApiKey('openai'), 'test-secret');
  t.is(session.current().apiKey, 'test-secret');

  const loggedOut = session.logout();

  t.is(loggedOut.apiKey, undefined);
  t.is(config.getApiKey('openai'), null);

  await session.close();
  fs.rmSync(dir, { recursive: true, force: true });
});
