import test from 'ava';
import { toolsCommand } from '../../../src/commands/definitions/tools.js';
import { exitCommand } from '../../../src/commands/definitions/exit.js';
import type { CommandContext, CommandMessage } from '../../../src/commands/base.js';
import type { ToolDescriptor } from '../../../src/core/types.js';

function createContext(messages: CommandMessage[], tools?: ToolDescriptor[]): CommandContext {
  return {
    addMessage: (msg) => {
      messages.push(msg);
    },
    clearHistory: () => {},
    tools,
  };
}

test('toolsCommand lists the first description line of each tool', t => {
  const messages: CommandMessage[] = [];
  const tools: ToolDescriptor[] = [
    { name: 'read_file', description: 'Read a file\nwith details', parameters: { type: 'object', properties: {} } },
    { name: 'mcp__fs__list', description: 'List entries', parameters: { type: 'object', properties: {} } },
  ];

  toolsCommand.handler(createContext(messages, tools));

  t.deepEqual(messages, [
    {
      role: 'system',
      type: 'tools',
      content: 'Registered tools (2):\nread_file - Read a file\nmcp__fs__list - List entries',
    },
  ]);
});

test('toolsCommand reports an empty registry', t => {
  const messages: CommandMessage[] = [];

  toolsCommand.handler(createContext(messages, []));

  t.is(messages[0].content, 'No tools registered.');
});

test('exitCommand says goodbye and calls exit', t => {
  const messages: CommandMessage[] = [];
  let exited = false;

  exitCommand.handler({ ...createContext(messages), exit: () => { exited = true; } });

  t.is(messages[0].content, 'Goodbye!');
  t.true(exited);
});
