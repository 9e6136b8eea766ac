/**
 * Catalogue of the tools a session may call.
 * Filled once at start (built-ins, then MCP tools) and sealed before the
 * first turn.
 */

import {DuplicateToolError, RegistrySealedError, ToolNotFoundError} from '../core/errors.js';
import type {ToolDescriptor} from '../core/types.js';
import type {ProcessSupervisor} from './process-supervisor.js';

export interface ToolContext {
	/** Fires on timeout or user cancellation */
	signal: AbortSignal;
	timeoutMs: number;
	processes: ProcessSupervisor;
	cwd: string;
	maxOutputChars: number;
}

export interface ToolOutput {
	output: string;
	exitCode?: number;
	/** The tool ran but reported failure */
	isError?: boolean;
}

export type ToolHandler = (
	args: Record<string, unknown>,
	context: ToolContext,
) => Promise<ToolOutput>;

export type ToolSource = 'builtin' | 'mcp';

export interface RegisterOptions {
	source?: ToolSource;
	/** Overrides the dispatcher default */
	timeoutMs?: number;
	/** The tool's own `timeout` argument (seconds) sets its deadline */
	timeoutArgument?: boolean;
}

export interface RegisteredTool {
	readonly descriptor: ToolDescriptor;
	readonly handler: ToolHandler;
	readonly source: ToolSource;
	readonly timeoutMs?: number;
	readonly timeoutArgument: boolean;
}

export class ToolRegistry {
	private readonly tools = new Map<string, RegisteredTool>();
	private sealed = false;

	register(
		descriptor: ToolDescriptor,
		handler: ToolHandler,
		options: RegisterOptions = {},
	): void {
		if (this.sealed) {
			throw new RegistrySealedError(descriptor.name);
		}
		if (this.tools.has(descriptor.name)) {
			throw new DuplicateToolError(descriptor.name);
		}
		this.tools.set(
			descriptor.name,
			Object.freeze({
				descriptor: Object.freeze({...descriptor}),
				handler,
				source: options.source ?? 'builtin',
				timeoutMs: options.timeoutMs,
				timeoutArgument: options.timeoutArgument ?? false,
			}),
		);
	}

	resolve(name: string): RegisteredTool {
		const tool = this.tools.get(name);
		if (!tool) {
			throw new ToolNotFoundError(name);
		}
		return tool;
	}

	has(name: string): boolean {
		return this.tools.has(name);
	}

	list(): ToolDescriptor[] {
		return [...this.tools.values()].map(tool => tool.descriptor);
	}

	names(): string[] {
		return [...this.tools.keys()];
	}

	get size(): number {
		return this.tools.size;
	}

	seal(): void {
		this.sealed = true;
	}

	get isSealed(): boolean {
		return this.sealed;
	}
}
