/**
 * Allow / ask / deny decisions for tool calls.
 * Evaluated by the dispatcher before any handler runs.
 */

import {SecurityFilter} from './security-filter.js';
import {APPROVAL_REQUIRED_TOOLS} from './tool-schemas.js';
import {isPlainObject} from './validators.js';

export type PolicyDecision =
	| {action: 'allow'}
	| {action: 'ask'; reason: string}
	| {action: 'deny'; reason: string};

export interface ToolPolicy {
	evaluate(toolName: string, args: Record<string, unknown>): PolicyDecision;
}

export interface PolicyConfig {
	/** When set, any tool not listed is denied */
	allowTools?: readonly string[];
	denyTools: readonly string[];
	askTools: readonly string[];
	forbiddenSubstrings: readonly string[];
	/** Regular expressions matched against commands and code */
	denyPatterns: readonly string[];
	/** Command prefixes that run without approval */
	autoCommands: readonly string[];
	defaultAction: 'allow' | 'ask' | 'deny';
	dangerousFiles?: readonly string[];
	dangerousDirectories?: readonly string[];
}

// Destructive command patterns - always deny
const BUILTIN_DENY_PATTERNS: readonly RegExp[] = [
	/rm\s+(-[rf]+\s+)*\/(\s|$)/,
	/rm\s+-rf?\s+\*/,
	/rm\s+-rf?\s+~\/?(\s|$)/,
	/mkfs/,
	/dd\s+if=.*of=\/dev/,
	/>\s*\/dev\/sd/,
	/:\(\)\s*\{.*\|.*&.*\}/,
	/chmod\s+-R\s+777\s+\//,
	/curl.*\|\s*(ba)?sh/,
	/wget.*\|\s*(ba)?sh/,
	/format\s+[a-z]:/i,
	/shutdown(\s|$)/,
	/reboot(\s|$)/,
];

const BUILTIN_AUTO_COMMANDS: readonly string[] = [
	'ls',
	'pwd',
	'whoami',
	'date',
	'uptime',
	'df -h',
	'free -h',
	'which',
	'cat',
	'head',
	'tail',
	'wc',
	'file',
	'stat',
	'tree',
	'find',
	'grep',
	'git status',
	'git diff',
	'git log',
];

const FORCE_ASK_PATTERN = /[|;&`$()<>]/;

const PATH_ARGUMENTS = ['file_path', 'directory', 'working_directory', 'path'];
const COMMAND_ARGUMENTS = ['command', 'code'];

export const DEFAULT_POLICY_CONFIG: PolicyConfig = {
	denyTools: [],
	askTools: [...APPROVAL_REQUIRED_TOOLS, 'mcp__*'],
	forbiddenSubstrings: [],
	denyPatterns: [],
	autoCommands: [],
	defaultAction: 'allow',
};

export function matchesToolPattern(toolName: string, pattern: string): boolean {
	if (pattern.endsWith('*')) {
		return toolName.startsWith(pattern.slice(0, -1));
	}
	return toolName === pattern;
}

function collectStrings(value: unknown, out: string[]): string[] {
	if (typeof value === 'string') {
		out.push(value);
	} else if (Array.isArray(value)) {
		for (const item of value) collectStrings(item, out);
	} else if (isPlainObject(value)) {
		for (const item of Object.values(value)) collectStrings(item, out);
	}
	return out;
}

export class RulePolicy implements ToolPolicy {
	private readonly denyPatterns: RegExp[];
	private readonly autoCommands: string[];
	private readonly filter: SecurityFilter;

	constructor(private readonly config: PolicyConfig = DEFAULT_POLICY_CONFIG) {
		this.denyPatterns = [
			...BUILTIN_DENY_PATTERNS,
			...config.denyPatterns.map(pattern => new RegExp(pattern, 'i')),
		];
		this.autoCommands = [...BUILTIN_AUTO_COMMANDS, ...config.autoCommands];
		this.filter = new SecurityFilter({
			dangerousFiles: config.dangerousFiles,
			dangerousDirectories: config.dangerousDirectories,
		});
	}

	evaluate(toolName: string, args: Record<string, unknown>): PolicyDecision {
		if (this.config.denyTools.some(pattern => matchesToolPattern(toolName, pattern))) {
			return {action: 'deny', reason: `Tool ${toolName} is disabled by policy`};
		}

		const {allowTools} = this.config;
		if (allowTools && !allowTools.some(pattern => matchesToolPattern(toolName, pattern))) {
			return {action: 'deny', reason: `Tool ${toolName} is not in the allow list`};
		}

		// 1. Forbidden substrings anywhere in the arguments
		const strings = collectStrings(args, []);
		for (const forbidden of this.config.forbiddenSubstrings) {
			if (forbidden && strings.some(value => value.includes(forbidden))) {
				return {action: 'deny', reason: `Arguments contain forbidden text: ${forbidden}`};
			}
		}

		// 2. Destructive command patterns
		const commands = COMMAND_ARGUMENTS.map(key => args[key]).filter(
			(value): value is string => typeof value === 'string',
		);
		for (const command of commands) {
			const pattern = this.denyPatterns.find(candidate => candidate.test(command));
			if (pattern) {
				return {action: 'deny', reason: `Command matches deny pattern ${pattern.source}`};
			}
			const verdict = this.filter.validateCommandOperation(command);
			if (!verdict.allowed) {
				return {action: 'deny', reason: verdict.reason ?? 'Command blocked'};
			}
		}

		// 3. Sensitive paths
		for (const key of PATH_ARGUMENTS) {
			const value = args[key];
			if (typeof value !== 'string') continue;
			if (this.filter.isPathDangerous(value)) {
				return {
					action: 'deny',
					reason: `Security policy blocks access to sensitive path: ${value}`,
				};
			}
		}

		// 4. Elevation always needs a human
		if (args.elevated === true) {
			return {action: 'ask', reason: 'Elevated execution requested'};
		}

		// 5. Read-only shell commands run without approval
		const command = args.command;
		if (toolName === 'execute_command' && typeof command === 'string' && this.isAutoCommand(command)) {
			return {action: 'allow'};
		}

		if (this.config.askTools.some(pattern => matchesToolPattern(toolName, pattern))) {
			return {action: 'ask', reason: `Tool ${toolName} requires approval`};
		}

		switch (this.config.defaultAction) {
			case 'deny':
				return {action: 'deny', reason: `Tool ${toolName} is not permitted by default`};
			case 'ask':
				return {action: 'ask', reason: `Tool ${toolName} requires approval`};
			default:
				return {action: 'allow'};
		}
	}

	private isAutoCommand(command: string): boolean {
		const cmd = command.trim();
		if (FORCE_ASK_PATTERN.test(cmd)) {
			return false;
		}
		return this.autoCommands.some(
			autoCmd => cmd === autoCmd || cmd.startsWith(autoCmd + ' '),
		);
	}
}

/** Policy that allows everything; used by tests and trusted automation. */
export const ALLOW_ALL_POLICY: ToolPolicy = {
	evaluate: () => ({action: 'allow'}),
};
