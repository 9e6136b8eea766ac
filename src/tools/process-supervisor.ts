/**
 * Owns every child process started by a tool.
 * Processes are killed on abort, timeout or shutdown, and a run only
 * resolves once the child has exited and been reaped.
 */

import {spawn, type ChildProcess} from 'node:child_process';
import {toolDebugLog} from '../utils/debug-log.js';

export interface ProcessRunOptions {
	command: string;
	args?: readonly string[];
	/** Run through the platform shell */
	shell?: boolean;
	cwd?: string;
	env?: NodeJS.ProcessEnv;
	input?: string;
	signal?: AbortSignal;
	/** Time between SIGTERM and SIGKILL */
	killGraceMs?: number;
	/** Output beyond this many characters per stream is dropped */
	maxOutputChars?: number;
	onSpawn?: (pid: number) => void;
}

export interface ProcessRunResult {
	stdout: string;
	stderr: string;
	exitCode: number | null;
	signal: NodeJS.Signals | null;
	aborted: boolean;
	truncated: boolean;
}

const DEFAULT_KILL_GRACE_MS = 1000;
const DEFAULT_MAX_OUTPUT_CHARS = 1_000_000;

export class ProcessSupervisor {
	private readonly running = new Set<ChildProcess>();

	get activeCount(): number {
		return this.running.size;
	}

	run(options: ProcessRunOptions): Promise<ProcessRunResult> {
		const {
			signal,
			killGraceMs = DEFAULT_KILL_GRACE_MS,
			maxOutputChars = DEFAULT_MAX_OUTPUT_CHARS,
		} = options;

		return new Promise((resolve, reject) => {
			if (signal?.aborted) {
				resolve({
					stdout: '',
					stderr: '',
					exitCode: null,
					signal: null,
					aborted: true,
					truncated: false,
				});
				return;
			}

			const child = spawn(options.command, [...(options.args ?? [])], {
				shell: options.shell ?? false,
				cwd: options.cwd,
				env: options.env ?? process.env,
				// Own process group so the whole tree can be killed
				detached: process.platform !== 'win32',
				stdio: ['pipe', 'pipe', 'pipe'],
				windowsHide: true,
			});

			this.running.add(child);
			toolDebugLog('Process spawned', {command: options.command, pid: child.pid});
			if (child.pid !== undefined) {
				options.onSpawn?.(child.pid);
			}

			let stdout = '';
			let stderr = '';
			let truncated = false;
			let aborted = false;
			// Set once every stdio stream has closed; until then the group may still hold them
			let closed = false;
			let killTimer: NodeJS.Timeout | undefined;

			const append = (current: string, chunk: string): string => {
				if (current.length >= maxOutputChars) {
					truncated = true;
					return current;
				}
				const next = current + chunk;
				if (next.length > maxOutputChars) {
					truncated = true;
					return next.slice(0, maxOutputChars);
				}
				return next;
			};

			// Decode across chunk boundaries so multi-byte characters survive
			child.stdout?.setEncoding('utf8');
			child.stderr?.setEncoding('utf8');
			child.stdout?.on('data', (chunk: string) => {
				stdout = append(stdout, chunk);
			});
			child.stderr?.on('data', (chunk: string) => {
				stderr = append(stderr, chunk);
			});

			const onAbort = () => {
				aborted = true;
				this.terminate(child, () => closed, killGraceMs, timer => {
					killTimer = timer;
				});
			};
			signal?.addEventListener('abort', onAbort, {once: true});

			child.once('error', error => {
				this.running.delete(child);
				signal?.removeEventListener('abort', onAbort);
				if (killTimer) clearTimeout(killTimer);
				reject(error);
			});

			child.once('close', (code, exitSignal) => {
				closed = true;
				this.running.delete(child);
				signal?.removeEventListener('abort', onAbort);
				if (killTimer) clearTimeout(killTimer);
				toolDebugLog('Process exited', {pid: child.pid, code, signal: exitSignal, aborted});
				resolve({
					stdout,
					stderr,
					exitCode: code,
					signal: exitSignal,
					aborted,
					truncated,
				});
			});

			if (child.pid === undefined) return;
			// EPIPE when the child exits without reading its input
			child.stdin?.on('error', error => {
				toolDebugLog('stdin write failed', {pid: child.pid, error: error.message});
			});
			if (options.input !== undefined) {
				child.stdin?.end(options.input);
			} else {
				child.stdin?.end();
			}
		});
	}

	/** Kills everything still running; used on shutdown. */
	shutdown(): void {
		for (const child of this.running) {
			this.sendSignal(child, 'SIGKILL');
		}
	}

	/**
	 * Signals the whole group even when the direct child has already exited:
	 * a backgrounded descendant can keep running and hold the pipes open.
	 */
	private terminate(
		child: ChildProcess,
		isClosed: () => boolean,
		killGraceMs: number,
		onTimer: (timer: NodeJS.Timeout) => void,
	): void {
		if (isClosed()) return;
		this.sendSignal(child, 'SIGTERM');
		const timer = setTimeout(() => {
			if (!isClosed()) {
				this.sendSignal(child, 'SIGKILL');
			}
		}, killGraceMs);
		timer.unref();
		onTimer(timer);
	}

	private sendSignal(child: ChildProcess, killSignal: NodeJS.Signals): void {
		const {pid} = child;
		if (pid === undefined) return;
		try {
			if (process.platform === 'win32') {
				child.kill(killSignal);
			} else {
				process.kill(-pid, killSignal);
			}
		} catch (error) {
			// ESRCH: the group is already gone
			toolDebugLog('Signal delivery failed', {
				pid,
				signal: killSignal,
				error: error instanceof Error ? error.message : String(error),
			});
		}
	}
}

export function isProcessAlive(pid: number): boolean {
	try {
		process.kill(pid, 0);
		return true;
	} catch {
		return false;
	}
}
