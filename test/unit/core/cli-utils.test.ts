import test from 'ava';
import * as readline from 'readline';
import { PassThrough } from 'stream';
import { InvalidArgumentError } from 'commander';
import {
  formatElapsedTime,
  parseApprovalAnswer,
  parsePositiveInteger,
  parseProviderKind,
  parseTemperature,
  question,
  summarizeToolResult,
} from '../../../src/core/cli-utils.js';

function createTestInterface(): { rl: readline.Interface; input: PassThrough } {
  const input = new PassThrough();
  const rl = readline.createInterface({ input, output: new PassThrough(), terminal: false });
  return { rl, input };
}

test('parseApprovalAnswer accepts yes and session answers', t => {
  t.is(parseApprovalAnswer('Y'), 'yes');
  t.is(parseApprovalAnswer(' yes '), 'yes');
  t.is(parseApprovalAnswer('a'), 'all');
  t.is(parseApprovalAnswer('ALL'), 'all');
});

test('parseApprovalAnswer treats anything else as no', t => {
  t.is(parseApprovalAnswer(''), 'no');
  t.is(parseApprovalAnswer('sure'), 'no');
  t.is(parseApprovalAnswer('a', false), 'no');
});

test('summarizeToolResult describes each status', t => {
  t.is(summarizeToolResult('read_file', { tool_call_id: 'c1', status: 'ok', output: 'contents' }), 'read_file completed');
  t.is(
    summarizeToolResult('execute_command', { tool_call_id: 'c1', status: 'timeout', output: 'late', error_kind: 'Timeout' }),
    'execute_command timed out'
  );
  t.is(
    summarizeToolResult('delete_file', {
      tool_call_id: 'c1',
      status: 'error',
      output: 'Blocked by policy',
      error_kind: 'PolicyDenied',
    }),
    'delete_file denied: Blocked by policy'
  );
  t.is(
    summarizeToolResult('read_file', { tool_call_id: 'c1', status: 'error', output: '\n\nFile not found\nmore' }),
    'read_file failed (ExecutionError): File not found'
  );
});

test('summarizeToolResult shortens long lines', t => {
  const summary = summarizeToolResult('run_code', {
    tool_call_id: 'c1',
    status: 'error',
    output: 'x'.repeat(200),
    error_kind: 'ExecutionError',
  });

  t.is(summary, `run_code failed (ExecutionError): ${'x'.repeat(117)}...`);
});

test('formatElapsedTime picks a unit', t => {
  t.is(formatElapsedTime(999), '999ms');
  t.is(formatElapsedTime(1500), '1.5s');
  t.is(formatElapsedTime(150000), '2m 30s');
});

test('parseProviderKind accepts known providers in any case', t => {
  t.is(parseProviderKind('OpenAI'), 'openai');
  t.is(parseProviderKind('gemini'), 'gemini');
  const error = t.throws(() => parseProviderKind('mistral'), { instanceOf: InvalidArgumentError });
  t.is(error?.message, 'Expected one of: groq, openai, local, anthropic, gemini');
});

test('numeric option parsers validate their ranges', t => {
  t.is(parsePositiveInteger('3'), 3);
  t.throws(() => parsePositiveInteger('0'), { message: 'Expected a positive integer' });
  t.throws(() => parsePositiveInteger('1.5'), { message: 'Expected a positive integer' });
  t.is(parseTemperature('0.7'), 0.7);
  t.throws(() => parseTemperature('3'), { message: 'Expected a number between 0 and 2' });
  t.throws(() => parseTemperature('warm'), { message: 'Expected a number between 0 and 2' });
});

test('question resolves with the typed line', async t => {
  const { rl, input } = createTestInterface();

  const answer = question(rl, '> ');
  input.write('hello\n');

  t.is(await answer, 'hello');
  rl.close();
});

test('question resolves null when the interface closes', async t => {
  const { rl } = createTestInterface();

  const answer = question(rl, '> ');
  rl.close();

  t.is(await answer, null);
});

test('question resolves null for an aborted signal', async t => {
  const { rl } = createTestInterface();
  const controller = new AbortController();
  controller.abort();

  t.is(await question(rl, '> ', controller.signal), null);
  rl.close();
});
