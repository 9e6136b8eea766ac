import test from 'ava';
import { DuplicateToolError, RegistrySealedError, ToolNotFoundError } from '../../../src/core/errors.js';
import type { ToolDescriptor } from '../../../src/core/types.js';
import { ToolRegistry, type ToolHandler } from '../../../src/tools/tool-registry.js';
import { registerBuiltinTools } from '../../../src/tools/tools.js';
import { TOOL_NAMES } from '../../../src/tools/tool-types.js';

function descriptor(name: string, description = `${name} tool`): ToolDescriptor {
  return {
    name,
    description,
    parameters: { type: 'object', properties: {}, required: [] },
  };
}

const noop: ToolHandler = async () => ({ output: 'ok' });

test('register and resolve a tool', t => {
  const registry = new ToolRegistry();
  registry.register(descriptor('echo'), noop, { timeoutMs: 1000 });

  const tool = registry.resolve('echo');

  t.is(tool.descriptor.name, 'echo');
  t.is(tool.handler, noop);
  t.is(tool.source, 'builtin');
  t.is(tool.timeoutMs, 1000);
  t.true(registry.has('echo'));
  t.is(registry.size, 1);
});

test('list keeps registration order', t => {
  const registry = new ToolRegistry();
  registry.register(descriptor('b'), noop);
  registry.register(descriptor('a'), noop, { source: 'mcp' });

  t.deepEqual(registry.names(), ['b', 'a']);
  t.deepEqual(
    registry.list().map(tool => tool.name),
    ['b', 'a']
  );
  t.is(registry.resolve('a').source, 'mcp');
});

test('registering a duplicate name fails and leaves the registry unchanged', t => {
  const registry = new ToolRegistry();
  const original: ToolHandler = async () => ({ output: 'original' });
  registry.register(descriptor('echo', 'first'), original);

  const error = t.throws(() => registry.register(descriptor('echo', 'second'), noop), {
    instanceOf: DuplicateToolError,
  });

  t.is(error?.kind, 'DuplicateTool');
  t.is(error?.message, 'Tool already registered: echo');
  t.is(registry.size, 1);
  t.is(registry.resolve('echo').handler, original);
  t.is(registry.resolve('echo').descriptor.description, 'first');
});

test('a sealed registry rejects new tools', t => {
  const registry = new ToolRegistry();
  registry.register(descriptor('echo'), noop);
  registry.seal();

  t.true(registry.isSealed);
  t.throws(() => registry.register(descriptor('other'), noop), { instanceOf: RegistrySealedError });
  t.deepEqual(registry.names(), ['echo']);
});

test('resolve throws NotFound for unknown tools', t => {
  const registry = new ToolRegistry();

  const error = t.throws(() => registry.resolve('missing'), { instanceOf: ToolNotFoundError });
  t.is(error?.message, 'Unknown tool: missing');
});

test('stored descriptors are frozen copies', t => {
  const registry = new ToolRegistry();
  const input = descriptor('echo');
  registry.register(input, noop);

  t.not(registry.resolve('echo').descriptor, input);
  t.true(Object.isFrozen(registry.resolve('echo').descriptor));
});

test('registerBuiltinTools registers every built-in tool', t => {
  const registry = new ToolRegistry();
  registerBuiltinTools(registry);

  t.deepEqual([...registry.names()].sort(), [...TOOL_NAMES].sort());
  t.true(registry.names().every(name => registry.resolve(name).source === 'builtin'));
});

test('only process tools read their timeout from the arguments', t => {
  const registry = new ToolRegistry();
  registerBuiltinTools(registry);

  t.deepEqual(
    registry.names().filter(name => registry.resolve(name).timeoutArgument),
    ['execute_command', 'run_code']
  );
  registry.register(descriptor('remote'), noop, { source: 'mcp' });
  t.false(registry.resolve('remote').timeoutArgument);
});
