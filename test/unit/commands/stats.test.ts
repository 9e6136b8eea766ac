import test from 'ava';
import { statsCommand } from '../../../src/commands/definitions/stats.js';
import type { CommandContext, CommandMessage } from '../../../src/commands/base.js';

test('statsCommand adds stats message with usage snapshot', t => {
  const messages: CommandMessage[] = [];

  const context: CommandContext = {
    addMessage: (msg) => {
      messages.push(msg);
    },
    clearHistory: () => {},
    sessionStats: {
      promptTokens: 1000,
      completionTokens: 500,
      totalTokens: 1500,
      totalRequests: 5,
    },
    model: 'test-model',
  };

  statsCommand.handler(context);

  t.is(messages.length, 1);
  t.is(messages[0].type, 'stats');
  t.is(
    messages[0].content,
    [
      'Session Statistics:',
      '  Requests:          5',
      '  Prompt tokens:     1,000',
      '  Completion tokens: 500',
      '  Total tokens:      1,500',
      '  Current model:     test-model',
    ].join('\n')
  );
  t.deepEqual(messages[0].usageSnapshot, {
    prompt_tokens: 1000,
    completion_tokens: 500,
    total_tokens: 1500,
    total_requests: 5,
  });
});

test('statsCommand handles missing session stats', t => {
  const messages: CommandMessage[] = [];

  statsCommand.handler({
    addMessage: (msg) => {
      messages.push(msg);
    },
    clearHistory: () => {},
  });

  t.deepEqual(messages, [{ role: 'system', type: 'stats', content: 'No usage recorded yet.' }]);
});
