/**
 * Runs a single tool call under policy, validation and a wall-clock timeout.
 * `invoke` never throws: every outcome becomes exactly one ToolResult.
 */

import {CancelledError, errorMessage, isAgentError, ToolTimeoutError} from '../core/errors.js';
import type {ToolCallRequest, ToolErrorKind, ToolResult} from '../core/types.js';
import {toolDebugLog} from '../utils/debug-log.js';
import type {PolicyDecision, ToolPolicy} from './policy.js';
import {ProcessSupervisor} from './process-supervisor.js';
import type {RegisteredTool, ToolOutput, ToolRegistry} from './tool-registry.js';
import {validateArguments} from './validators.js';

export type ApprovalFn = (
	request: ToolCallRequest,
	reason: string,
) => Promise<boolean>;

export interface DispatcherOptions {
	defaultTimeoutMs?: number;
	/** Upper bound for per-call `timeout` arguments and per-tool overrides */
	maxTimeoutMs?: number;
	/** Extra time a timed-out handler gets to release its processes */
	terminationGraceMs?: number;
	maxOutputChars?: number;
	cwd?: string;
	processes?: ProcessSupervisor;
}

export interface InvokeOptions {
	signal?: AbortSignal;
	approve?: ApprovalFn;
}

export const DEFAULT_TOOL_TIMEOUT_MS = 30_000;
export const DEFAULT_MAX_TOOL_TIMEOUT_MS = 300_000;
export const DEFAULT_MAX_OUTPUT_CHARS = 20_000;

type HandlerOutcome =
	| {type: 'done'; output: ToolOutput}
	| {type: 'failed'; error: unknown}
	| {type: 'timeout'}
	| {type: 'cancelled'};

function errorResult(
	toolCallId: string,
	kind: ToolErrorKind,
	output: string,
): ToolResult {
	const result: ToolResult = {
		tool_call_id: toolCallId,
		status: 'error',
		output,
		error_kind: kind,
	};
	return Object.freeze(result);
}

export function truncateOutput(output: string, maxChars: number): string {
	if (output.length <= maxChars) return output;
	const omitted = output.length - maxChars;
	return `${output.slice(0, maxChars)}\n... [${omitted} characters truncated]`;
}

export class ToolDispatcher {
	readonly processes: ProcessSupervisor;
	private readonly defaultTimeoutMs: number;
	private readonly maxTimeoutMs: number;
	private readonly terminationGraceMs: number;
	private readonly maxOutputChars: number;
	private readonly cwd: string;

	constructor(
		private readonly registry: ToolRegistry,
		options: DispatcherOptions = {},
	) {
		this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS;
		this.maxTimeoutMs = options.maxTimeoutMs ?? DEFAULT_MAX_TOOL_TIMEOUT_MS;
		this.terminationGraceMs = options.terminationGraceMs ?? 2_000;
		this.maxOutputChars = options.maxOutputChars ?? DEFAULT_MAX_OUTPUT_CHARS;
		this.cwd = options.cwd ?? process.cwd();
		this.processes = options.processes ?? new ProcessSupervisor();
	}

	async invoke(
		request: ToolCallRequest,
		policy: ToolPolicy,
		options: InvokeOptions = {},
	): Promise<ToolResult> {
		toolDebugLog(`Dispatching ${request.name}`, {id: request.id, arguments: request.arguments});

		if (options.signal?.aborted) {
			return errorResult(request.id, 'Cancelled', 'Cancelled before execution');
		}

		// 1. Resolve
		if (!this.registry.has(request.name)) {
			return errorResult(request.id, 'NotFound', `Unknown tool: ${request.name}`);
		}
		const tool = this.registry.resolve(request.name);

		// 2. Validate
		const problems = validateArguments(tool.descriptor.parameters, request.arguments);
		if (problems.length > 0) {
			return errorResult(
				request.id,
				'InvalidArguments',
				`Invalid arguments for ${request.name}: ${problems.join('; ')}`,
			);
		}

		// 3. Policy
		let decision: PolicyDecision;
		try {
			decision = policy.evaluate(request.name, request.arguments);
		} catch (error) {
			return errorResult(request.id, 'PolicyDenied', `Policy evaluation failed: ${errorMessage(error)}`);
		}
		if (decision.action === 'deny') {
			toolDebugLog(`Policy denied ${request.name}`, {reason: decision.reason});
			return errorResult(request.id, 'PolicyDenied', decision.reason);
		}
		if (decision.action === 'ask') {
			const approved = await this.askApproval(request, decision.reason, options.approve);
			if (options.signal?.aborted) {
				return errorResult(request.id, 'Cancelled', 'Cancelled before execution');
			}
			if (!approved) {
				return errorResult(request.id, 'PolicyDenied', `User declined ${request.name}`);
			}
		}

		// 4. Execute
		const timeoutMs = this.timeoutFor(tool, request.arguments);
		return this.execute(tool, request, timeoutMs, options.signal);
	}

	/** Only tools registered with `timeoutArgument` read `timeout` from their arguments. */
	timeoutFor(tool: RegisteredTool, args: Record<string, unknown>): number {
		const requestedSeconds = tool.timeoutArgument ? args.timeout : undefined;
		const requested =
			typeof requestedSeconds === 'number' && requestedSeconds > 0
				? requestedSeconds * 1000
				: tool.timeoutMs ?? this.defaultTimeoutMs;
		return Math.min(requested, this.maxTimeoutMs);
	}

	private async askApproval(
		request: ToolCallRequest,
		reason: string,
		approve: ApprovalFn | undefined,
	): Promise<boolean> {
		if (!approve) {
			return false;
		}
		try {
			return await approve(request, reason);
		} catch (error) {
			toolDebugLog('Approval callback failed', {error: errorMessage(error)});
			return false;
		}
	}

	private async execute(
		tool: RegisteredTool,
		request: ToolCallRequest,
		timeoutMs: number,
		outerSignal: AbortSignal | undefined,
	): Promise<ToolResult> {
		const controller = new AbortController();
		let timer: NodeJS.Timeout | undefined;
		let onOuterAbort: (() => void) | undefined;

		const running = Promise.resolve()
			.then(() =>
				tool.handler(request.arguments, {
					signal: controller.signal,
					timeoutMs,
					processes: this.processes,
					cwd: this.cwd,
					maxOutputChars: this.maxOutputChars,
				}),
			)
			.then(
				(output): HandlerOutcome => ({type: 'done', output}),
				(error: unknown): HandlerOutcome => ({type: 'failed', error}),
			);

		const timedOut = new Promise<HandlerOutcome>(resolve => {
			timer = setTimeout(() => resolve({type: 'timeout'}), timeoutMs);
		});
		const cancelled = new Promise<HandlerOutcome>(resolve => {
			if (!outerSignal) return;
			onOuterAbort = () => resolve({type: 'cancelled'});
			outerSignal.addEventListener('abort', onOuterAbort, {once: true});
		});

		const startedAt = Date.now();
		const outcome = await Promise.race([running, timedOut, cancelled]);
		clearTimeout(timer);
		if (outerSignal && onOuterAbort) {
			outerSignal.removeEventListener('abort', onOuterAbort);
		}

		if (outcome.type === 'timeout' || outcome.type === 'cancelled') {
			controller.abort(
				outcome.type === 'timeout' ? new ToolTimeoutError(timeoutMs) : new CancelledError(),
			);
			await this.awaitTermination(running);
		}

		toolDebugLog(`Finished ${request.name}`, {
			id: request.id,
			outcome: outcome.type,
			elapsedMs: Date.now() - startedAt,
		});

		switch (outcome.type) {
			case 'done': {
				const {output} = outcome;
				const result: ToolResult = {
					tool_call_id: request.id,
					status: output.isError ? 'error' : 'ok',
					output: truncateOutput(output.output, this.maxOutputChars),
					...(output.exitCode !== undefined ? {exit_code: output.exitCode} : {}),
					...(output.isError ? {error_kind: 'ExecutionError' as const} : {}),
				};
				return Object.freeze(result);
			}
			case 'failed': {
				const kind: ToolErrorKind =
					isAgentError(outcome.error) && isToolErrorKind(outcome.error.kind)
						? outcome.error.kind
						: 'ExecutionError';
				return errorResult(request.id, kind, `Error: ${errorMessage(outcome.error)}`);
			}
			case 'timeout': {
				const result: ToolResult = {
					tool_call_id: request.id,
					status: 'timeout',
					output: `${request.name} timed out after ${timeoutMs}ms and was terminated`,
					error_kind: 'Timeout',
				};
				return Object.freeze(result);
			}
			case 'cancelled':
				return errorResult(request.id, 'Cancelled', `${request.name} was cancelled`);
		}
	}

	/** Waits for the aborted handler to release its resources, bounded by the grace period. */
	private async awaitTermination(running: Promise<HandlerOutcome>): Promise<void> {
		let graceTimer: NodeJS.Timeout | undefined;
		const grace = new Promise<void>(resolve => {
			graceTimer = setTimeout(resolve, this.terminationGraceMs);
		});
		await Promise.race([running.then(() => undefined), grace]);
		clearTimeout(graceTimer);
	}
}

const TOOL_ERROR_KINDS: readonly string[] = [
	'NotFound',
	'InvalidArguments',
	'PolicyDenied',
	'ExecutionError',
	'Timeout',
	'BridgeUnavailable',
	'Cancelled',
];

function isToolErrorKind(kind: string): kind is ToolErrorKind {
	return TOOL_ERROR_KINDS.includes(kind);
}
