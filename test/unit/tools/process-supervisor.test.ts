import test from 'ava';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ProcessSupervisor, isProcessAlive } from '../../../src/tools/process-supervisor.js';

const node = process.execPath;
const IDLE_SCRIPT = 'setInterval(() => {}, 1000)';

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

// A killed process orphaned to an init that does not reap shows up as a zombie
function isRunning(pid: number): boolean {
  if (!isProcessAlive(pid)) return false;
  try {
    const stat = fs.readFileSync(`/proc/${pid}/stat`, 'utf8');
    return stat.slice(stat.lastIndexOf(')') + 2, stat.lastIndexOf(')') + 3) !== 'Z';
  } catch {
    return false;
  }
}

test('run collects stdout and the exit code', async t => {
  const supervisor = new ProcessSupervisor();

  const result = await supervisor.run({ command: node, args: ['-e', 'process.stdout.write("hello")'] });

  t.is(result.stdout, 'hello');
  t.is(result.stderr, '');
  t.is(result.exitCode, 0);
  t.false(result.aborted);
  t.false(result.truncated);
  t.is(supervisor.activeCount, 0);
});

test('run reports non-zero exit codes and stderr', async t => {
  const supervisor = new ProcessSupervisor();

  const result = await supervisor.run({
    command: node,
    args: ['-e', 'process.stderr.write("bad"); process.exit(3)'],
  });

  t.is(result.exitCode, 3);
  t.is(result.stderr, 'bad');
});

test('run decodes multi-byte characters split across chunks', async t => {
  const supervisor = new ProcessSupervisor();

  const result = await supervisor.run({
    command: node,
    args: ['-e', 'process.stdout.write("あ".repeat(200000))'],
  });

  t.is(result.stdout.length, 200000);
  t.false(result.stdout.includes('\uFFFD'));
  t.is(result.stdout, 'あ'.repeat(200000));
});

test('run feeds input to stdin', async t => {
  const supervisor = new ProcessSupervisor();

  const result = await supervisor.run({
    command: node,
    args: ['-e', 'process.stdin.pipe(process.stdout)'],
    input: 'from stdin',
  });

  t.is(result.stdout, 'from stdin');
});

test('run truncates output beyond maxOutputChars', async t => {
  const supervisor = new ProcessSupervisor();

  const result = await supervisor.run({
    command: node,
    args: ['-e', 'process.stdout.write("x".repeat(100))'],
    maxOutputChars: 10,
  });

  t.is(result.stdout, 'x'.repeat(10));
  t.true(result.truncated);
});

test('run through the shell', async t => {
  const supervisor = new ProcessSupervisor();

  const result = await supervisor.run({ command: 'echo shell-ok', shell: true });

  t.is(result.stdout.trim(), 'shell-ok');
});

test('aborting kills the child and resolves once it has exited', async t => {
  const supervisor = new ProcessSupervisor();
  const controller = new AbortController();
  let pid: number | undefined;

  const running = supervisor.run({
    command: node,
    args: ['-e', IDLE_SCRIPT],
    signal: controller.signal,
    onSpawn: spawned => {
      pid = spawned;
    },
  });
  await delay(200);
  controller.abort();
  const result = await running;

  t.true(result.aborted);
  t.is(result.exitCode, null);
  t.is(result.signal, 'SIGTERM');
  t.is(supervisor.activeCount, 0);
  t.truthy(pid);
  if (pid !== undefined) {
    t.false(isProcessAlive(pid));
  }
});

test('aborting kills backgrounded descendants after the direct child has exited', async t => {
  if (process.platform === 'win32') {
    t.pass();
    return;
  }
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'shell-pilot-supervisor-test-'));
  const pidFile = path.join(dir, 'pid');
  const supervisor = new ProcessSupervisor();
  const controller = new AbortController();

  const running = supervisor.run({
    command: `sh -c 'echo $$ > "${pidFile}"; exec sleep 30' & echo started`,
    shell: true,
    signal: controller.signal,
  });
  await delay(500);
  controller.abort();
  const result = await running;
  const pid = Number(fs.readFileSync(pidFile, 'utf8').trim());

  t.true(result.aborted);
  t.is(result.stdout, 'started\n');
  t.is(supervisor.activeCount, 0);
  t.false(isRunning(pid));
  fs.rmSync(dir, { recursive: true, force: true });
});

test('a child that ignores SIGTERM is killed after the grace period', async t => {
  const supervisor = new ProcessSupervisor();
  const controller = new AbortController();

  const running = supervisor.run({
    command: node,
    args: ['-e', `process.on('SIGTERM', () => {}); ${IDLE_SCRIPT}`],
    signal: controller.signal,
    killGraceMs: 200,
  });
  // Give the child time to install its SIGTERM handler
  await delay(1000);
  controller.abort();
  const result = await running;

  t.true(result.aborted);
  t.is(result.signal, 'SIGKILL');
});

test('an already aborted signal never spawns', async t => {
  const supervisor = new ProcessSupervisor();
  const controller = new AbortController();
  controller.abort();
  let spawned = false;

  const result = await supervisor.run({
    command: node,
    args: ['-e', IDLE_SCRIPT],
    signal: controller.signal,
    onSpawn: () => {
      spawned = true;
    },
  });

  t.true(result.aborted);
  t.false(spawned);
});

test('spawn failures reject', async t => {
  const supervisor = new ProcessSupervisor();

  await t.throwsAsync(supervisor.run({ command: 'shell-pilot-no-such-command' }), { code: 'ENOENT' });
  t.is(supervisor.activeCount, 0);
});

test('shutdown kills every running child', async t => {
  const supervisor = new ProcessSupervisor();

  const first = supervisor.run({ command: node, args: ['-e', IDLE_SCRIPT] });
  const second = supervisor.run({ command: node, args: ['-e', IDLE_SCRIPT] });
  await delay(200);
  t.is(supervisor.activeCount, 2);

  supervisor.shutdown();
  const results = await Promise.all([first, second]);

  t.deepEqual(
    results.map(result => result.signal),
    ['SIGKILL', 'SIGKILL']
  );
  t.is(supervisor.activeCount, 0);
});
