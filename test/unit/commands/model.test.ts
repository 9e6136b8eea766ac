import test from 'ava';
import { handleSlashCommand } from '../../../src/commands/index.js';
import type { CommandContext, CommandMessage, ProviderControls } from '../../../src/commands/base.js';
import { ConfigError } from '../../../src/core/errors.js';
import type { ProviderConfig, ProviderKind } from '../../../src/core/types.js';

function createControls(): { controls: ProviderControls; calls: string[] } {
  const calls: string[] = [];
  let current: ProviderConfig = {
    kind: 'groq',
    model: 'test-model',
    temperature: 0.7,
    maxTokens: 1024,
    requestTimeoutMs: 1000,
  };
  const controls: ProviderControls = {
    current: () => current,
    saved: () => ({ provider: 'groq', model: null }),
    switchProvider: (kind: ProviderKind) => {
      calls.push(`provider ${kind}`);
      current = { ...current, kind, model: `${kind}-default` };
      return current;
    },
    switchModel: (model: string) => {
      calls.push(`model ${model}`);
      if (model === 'broken') {
        throw new ConfigError('Model must be a non-empty string');
      }
      current = { ...current, model };
      return current;
    },
    login: (apiKey: string) => {
      calls.push(`login ${apiKey}`);
      current = { ...current, apiKey };
      return current;
    },
    logout: () => {
      calls.push('logout');
      current = { ...current, apiKey: undefined };
      return current;
    },
  };
  return { controls, calls };
}

function createContext(messages: CommandMessage[], providers?: ProviderControls): CommandContext {
  return {
    addMessage: (msg) => {
      messages.push(msg);
    },
    clearHistory: () => {},
    providers,
  };
}

test('/model without arguments shows the current and saved model', t => {
  const messages: CommandMessage[] = [];
  const { controls, calls } = createControls();

  handleSlashCommand('/model', createContext(messages, controls));

  t.deepEqual(calls, []);
  t.deepEqual(messages, [
    {
      role: 'system',
      type: 'info',
      content: 'Current model: groq:test-model\nSaved default: groq:(provider default)\nUsage: /model <name>',
    },
  ]);
});

test('/model switches to the named model', t => {
  const messages: CommandMessage[] = [];
  const { controls, calls } = createControls();

  handleSlashCommand('/MODEL   other-model ', createContext(messages, controls));

  t.deepEqual(calls, ['model other-model']);
  t.deepEqual(messages, [{ role: 'system', type: 'info', content: 'Switched to groq:other-model.' }]);
});

test('/model reports a failed switch as an error message', t => {
  const messages: CommandMessage[] = [];
  const { controls } = createControls();

  handleSlashCommand('/model broken', createContext(messages, controls));

  t.deepEqual(messages, [{ role: 'system', type: 'error', content: 'Model must be a non-empty string' }]);
});

test('/provider switches to a known provider and rejects others', t => {
  const messages: CommandMessage[] = [];
  const { controls, calls } = createControls();
  const context = createContext(messages, controls);

  handleSlashCommand('/provider Anthropic', context);
  handleSlashCommand('/provider mystery', context);

  t.deepEqual(calls, ['provider anthropic']);
  t.deepEqual(messages, [
    { role: 'system', type: 'info', content: 'Switched to anthropic:anthropic-default.' },
    {
      role: 'system',
      type: 'error',
      content: 'Unknown provider: mystery. Expected one of: groq, openai, local, anthropic, gemini',
    },
  ]);
});

test('/provider without arguments lists the providers', t => {
  const messages: CommandMessage[] = [];
  const { controls } = createControls();

  handleSlashCommand('/provider', createContext(messages, controls));

  t.is(
    messages[0].content,
    'Current provider: groq\nAvailable: groq, openai, local, anthropic, gemini\nUsage: /provider <name>'
  );
});

test('/login saves the key and /logout removes it', t => {
  const messages: CommandMessage[] = [];
  const { controls, calls } = createControls();
  const context = createContext(messages, controls);

  handleSlashCommand('/login', context);
  handleSlashCommand('/login test-secret', context);
  handleSlashCommand('/logout', context);

  t.deepEqual(calls, ['login test-secret', 'logout']);
  t.deepEqual(
    messages.map((message) => message.content),
    ['Usage: /login <api-key>', 'API key saved for groq.', 'API key removed for groq.']
  );
});

test('provider commands explain when switching is unavailable', t => {
  const messages: CommandMessage[] = [];

  handleSlashCommand('/model other-model', createContext(messages));

  t.deepEqual(messages, [
    { role: 'system', type: 'error', content: 'Switching models is not available here.' },
  ]);
});
