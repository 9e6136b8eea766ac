import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {errorMessage} from '../core/errors.js';
import {toolDebugLog} from '../utils/debug-log.js';
import type {ProcessRunOptions, ProcessRunResult} from './process-supervisor.js';
import type {ToolContext, ToolHandler, ToolOutput, ToolRegistry} from './tool-registry.js';
import {ALL_TOOL_SCHEMAS} from './tool-schemas.js';
import {isCodeLanguage, type CodeLanguage, type ToolName} from './tool-types.js';
import {
	readBoolean,
	readOptionalNumber,
	readOptionalString,
	readString,
} from './validators.js';

const MAX_READ_BYTES = 50 * 1024 * 1024;
const MAX_LISTED_ENTRIES = 500;
const MAX_SEARCH_BYTES = 5 * 1024 * 1024;
const MAX_MATCH_LINE_CHARS = 200;
const SKIPPED_DIRECTORIES = new Set(['.git', 'node_modules', 'dist', 'build', '.cache', '.next']);

const PARAM_MAPPINGS: Record<string, readonly string[]> = {
	read_file: ['file_path'],
	create_file: ['file_path'],
	write_file: ['file_path', 'append'],
	delete_file: ['file_path', 'recursive'],
	list_files: ['directory', 'pattern'],
	search_files: ['pattern', 'directory'],
	list_processes: ['filter'],
	list_services: ['filter'],
	execute_command: ['command', 'elevated'],
	run_code: ['language'],
};

/**
 * Format key parameters for tool call display
 */
export function formatToolParams(
	toolName: string,
	toolArgs: Record<string, unknown>,
	options: {includePrefix?: boolean; separator?: string} = {},
): string {
	const {includePrefix = true, separator = '='} = options;

	const keyParams = PARAM_MAPPINGS[toolName] ?? [];

	const paramParts = keyParams
		.filter(param => toolArgs[param] !== undefined)
		.map(param => {
			let value = toolArgs[param];
			// Truncate long values
			if (typeof value === 'string' && value.length > 50) {
				value = value.substring(0, 47) + '...';
			}
			return `${param}${separator}${JSON.stringify(value)}`;
		});

	if (paramParts.length === 0) {
		const raw = JSON.stringify(toolArgs);
		return includePrefix ? `Arguments: ${raw}` : raw;
	}

	const formattedParams = paramParts.join(', ');
	return includePrefix ? `Parameters: ${formattedParams}` : formattedParams;
}

function success(output: string): ToolOutput {
	return {output};
}

function failure(message: string): ToolOutput {
	return {output: message, isError: true};
}

function resolvePath(context: ToolContext, target: string): string {
	return path.resolve(context.cwd, target);
}

async function statOrNull(target: string): Promise<fs.Stats | null> {
	try {
		return await fs.promises.stat(target);
	} catch {
		return null;
	}
}

export function formatCommandResult(
	command: string,
	result: ProcessRunResult,
): string {
	let content = `[command] ${command}`;
	if (result.stdout) content += `\n[stdout]\n${result.stdout.trimEnd()}`;
	if (result.stderr) content += `\n[stderr]\n${result.stderr.trimEnd()}`;
	if (result.exitCode !== 0) {
		content += `\n[exit_code] ${result.exitCode ?? result.signal ?? 'unknown'}`;
	}
	if (result.truncated) content += '\n[output truncated]';
	return content;
}

/**
 * Read the contents of a file, optionally specifying line range
 */
export const readFile: ToolHandler = async (args, context) => {
	const filePath = readString(args, 'file_path');
	const startLine = readOptionalNumber(args, 'start_line');
	const endLine = readOptionalNumber(args, 'end_line');
	const resolvedPath = resolvePath(context, filePath);

	const stats = await statOrNull(resolvedPath);
	if (!stats) {
		return failure(`Error: File not found: ${filePath}`);
	}
	if (!stats.isFile()) {
		return failure(`Error: Path is not a file: ${filePath}`);
	}
	if (stats.size > MAX_READ_BYTES) {
		return failure('Error: File too large (max 50MB)');
	}

	const content = await fs.promises.readFile(resolvedPath, 'utf-8');
	if (startLine === undefined) {
		return success(content);
	}

	const lines = content.split('\n');
	const startIdx = startLine - 1;
	if (startIdx >= lines.length) {
		return failure(
			`Error: Start line ${startLine} exceeds file length (${lines.length} lines)`,
		);
	}
	const endIdx = endLine === undefined ? lines.length : Math.min(lines.length, endLine);
	if (endIdx <= startIdx) {
		return failure('Error: end_line must not be before start_line');
	}
	return success(lines.slice(startIdx, endIdx).join('\n'));
};

/**
 * Create a new file, refusing to clobber an existing one unless asked
 */
export const createFile: ToolHandler = async (args, context) => {
	const filePath = readString(args, 'file_path');
	const content = readString(args, 'content');
	const overwrite = readBoolean(args, 'overwrite');
	const resolvedPath = resolvePath(context, filePath);

	const stats = await statOrNull(resolvedPath);
	if (stats?.isDirectory()) {
		return failure(`Error: Path is a directory: ${filePath}`);
	}
	if (stats && !overwrite) {
		return failure(
			`Error: File already exists: ${filePath}. Set overwrite to true to replace it.`,
		);
	}

	await fs.promises.mkdir(path.dirname(resolvedPath), {recursive: true});
	await fs.promises.writeFile(resolvedPath, content, 'utf-8');
	return success(`Created ${filePath} (${Buffer.byteLength(content)} bytes)`);
};

export const writeFile: ToolHandler = async (args, context) => {
	const filePath = readString(args, 'file_path');
	const content = readString(args, 'content');
	const append = readBoolean(args, 'append');
	const resolvedPath = resolvePath(context, filePath);

	const stats = await statOrNull(resolvedPath);
	if (stats?.isDirectory()) {
		return failure(`Error: Path is a directory: ${filePath}`);
	}

	await fs.promises.mkdir(path.dirname(resolvedPath), {recursive: true});
	if (append) {
		await fs.promises.appendFile(resolvedPath, content, 'utf-8');
		return success(`Appended ${Buffer.byteLength(content)} bytes to ${filePath}`);
	}
	await fs.promises.writeFile(resolvedPath, content, 'utf-8');
	return success(`Wrote ${Buffer.byteLength(content)} bytes to ${filePath}`);
};

export const deleteFile: ToolHandler = async (args, context) => {
	const filePath = readString(args, 'file_path');
	const recursive = readBoolean(args, 'recursive');
	const resolvedPath = resolvePath(context, filePath);

	if (resolvedPath === path.parse(resolvedPath).root) {
		return failure('Error: Refusing to delete a filesystem root');
	}

	const stats = await statOrNull(resolvedPath);
	if (!stats) {
		return failure(`Error: File not found: ${filePath}`);
	}

	if (stats.isDirectory()) {
		const entries = await fs.promises.readdir(resolvedPath);
		if (entries.length > 0 && !recursive) {
			return failure(
				`Error: Directory is not empty: ${filePath}. Set recursive to true to delete it.`,
			);
		}
		await fs.promises.rm(resolvedPath, {recursive: true});
		return success(`Deleted directory ${filePath}`);
	}

	await fs.promises.unlink(resolvedPath);
	return success(`Deleted ${filePath}`);
};

function wildcardToRegex(pattern: string): RegExp {
	const escaped = pattern
		.split('*')
		.map(part => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
		.join('.*');
	return new RegExp(`^${escaped}$`, 'i');
}

async function buildTree(
	dirPath: string,
	options: {matcher: RegExp | null; recursive: boolean; showHidden: boolean},
	prefix: string,
	lines: string[],
): Promise<void> {
	const entries = await fs.promises.readdir(dirPath, {withFileTypes: true});
	const visible = entries
		.filter(entry => options.showHidden || !entry.name.startsWith('.'))
		.filter(entry => entry.isDirectory() || !options.matcher || options.matcher.test(entry.name))
		.sort((a, b) => {
			if (a.isDirectory() !== b.isDirectory()) return a.isDirectory() ? -1 : 1;
			return a.name.localeCompare(b.name);
		});

	for (const [index, entry] of visible.entries()) {
		if (lines.length >= MAX_LISTED_ENTRIES) {
			lines.push(`${prefix}... (listing truncated)`);
			return;
		}
		const isLast = index === visible.length - 1;
		const connector = isLast ? '└── ' : '├── ';
		lines.push(`${prefix}${connector}${entry.name}${entry.isDirectory() ? '/' : ''}`);
		if (entry.isDirectory() && options.recursive) {
			await buildTree(
				path.join(dirPath, entry.name),
				options,
				prefix + (isLast ? '    ' : '│   '),
				lines,
			);
		}
	}
}

/**
 * List files and directories in a path with tree-style display
 */
export const listFiles: ToolHandler = async (args, context) => {
	const directory = readOptionalString(args, 'directory') ?? '.';
	const pattern = readOptionalString(args, 'pattern');
	const dirPath = resolvePath(context, directory);

	const stats = await statOrNull(dirPath);
	if (!stats) {
		return failure(`Error: Directory not found: ${directory}`);
	}
	if (!stats.isDirectory()) {
		return failure(`Error: Path is not a directory: ${directory}`);
	}

	const lines = [`${directory}/`];
	await buildTree(
		dirPath,
		{
			matcher: pattern && pattern !== '*' ? wildcardToRegex(pattern) : null,
			recursive: readBoolean(args, 'recursive'),
			showHidden: readBoolean(args, 'show_hidden'),
		},
		'',
		lines,
	);
	return success(lines.join('\n'));
};

function escapeRegex(text: string): string {
	return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

async function collectSearchFiles(
	directory: string,
	matcher: RegExp | null,
	signal: AbortSignal,
	files: string[],
): Promise<void> {
	let entries: fs.Dirent[];
	try {
		entries = await fs.promises.readdir(directory, {withFileTypes: true});
	} catch (error) {
		toolDebugLog('Skipping unreadable directory', {directory, error: errorMessage(error)});
		return;
	}
	entries.sort((a, b) => a.name.localeCompare(b.name));

	for (const entry of entries) {
		if (signal.aborted) return;
		const fullPath = path.join(directory, entry.name);
		if (entry.isDirectory()) {
			if (entry.name.startsWith('.') || SKIPPED_DIRECTORIES.has(entry.name)) continue;
			await collectSearchFiles(fullPath, matcher, signal, files);
		} else if (entry.isFile() && (!matcher || matcher.test(entry.name))) {
			files.push(fullPath);
		}
	}
}

/** Returns null for binary or oversized files */
async function readSearchableText(filePath: string): Promise<string | null> {
	const stats = await statOrNull(filePath);
	if (!stats || stats.size > MAX_SEARCH_BYTES) return null;
	let buffer: Buffer;
	try {
		buffer = await fs.promises.readFile(filePath);
	} catch (error) {
		toolDebugLog('Skipping unreadable file', {filePath, error: errorMessage(error)});
		return null;
	}
	if (buffer.subarray(0, 8000).includes(0)) return null;
	return buffer.toString('utf8');
}

/**
 * Search file contents line by line, like a small grep
 */
export const searchFiles: ToolHandler = async (args, context) => {
	const pattern = readString(args, 'pattern');
	const directory = readOptionalString(args, 'directory') ?? '.';
	const filePattern = readOptionalString(args, 'file_pattern');
	const maxResults = readOptionalNumber(args, 'max_results') ?? 100;
	const root = resolvePath(context, directory);

	const stats = await statOrNull(root);
	if (!stats) {
		return failure(`Error: Directory not found: ${directory}`);
	}
	if (!stats.isDirectory()) {
		return failure(`Error: Path is not a directory: ${directory}`);
	}

	let matcher: RegExp;
	try {
		matcher = new RegExp(
			readBoolean(args, 'regex') ? pattern : escapeRegex(pattern),
			readBoolean(args, 'case_sensitive') ? '' : 'i',
		);
	} catch (error) {
		return failure(`Error: ${errorMessage(error)}`);
	}

	const files: string[] = [];
	await collectSearchFiles(
		root,
		filePattern && filePattern !== '*' ? wildcardToRegex(filePattern) : null,
		context.signal,
		files,
	);

	const matches: string[] = [];
	let matchedFiles = 0;
	let limited = false;
	for (const filePath of files) {
		if (context.signal.aborted || limited) break;
		const content = await readSearchableText(filePath);
		if (content === null) continue;

		const relative = path.relative(context.cwd, filePath).split(path.sep).join('/');
		let found = false;
		for (const [index, line] of content.split('\n').entries()) {
			if (!matcher.test(line)) continue;
			if (matches.length >= maxResults) {
				limited = true;
				break;
			}
			const text = line.trim();
			const shown =
				text.length > MAX_MATCH_LINE_CHARS ? `${text.slice(0, MAX_MATCH_LINE_CHARS - 3)}...` : text;
			matches.push(`${relative}:${index + 1}: ${shown}`);
			found = true;
		}
		if (found) matchedFiles++;
	}

	if (matches.length === 0) {
		return success(`No matches for "${pattern}" in ${directory}`);
	}
	const summary = `Found ${matches.length} match(es) in ${matchedFiles} file(s)${
		limited ? ` (stopped at max_results=${maxResults})` : ''
	}`;
	return success([summary, ...matches].join('\n'));
};

export const listProcesses: ToolHandler = async (args, context) => {
	const filter = readOptionalString(args, 'filter')?.toLowerCase();
	const limit = readOptionalNumber(args, 'limit') ?? 50;

	const isWindows = process.platform === 'win32';
	const result = await context.processes.run({
		command: isWindows ? 'tasklist' : 'ps',
		args: isWindows ? ['/fo', 'csv', '/nh'] : ['-eo', 'pid,user,%cpu,%mem,comm'],
		signal: context.signal,
		maxOutputChars: context.maxOutputChars * 10,
	});
	if (result.exitCode !== 0) {
		return {
			output: `Error: Failed to list processes\n${result.stderr.trimEnd()}`,
			exitCode: result.exitCode ?? undefined,
			isError: true,
		};
	}

	const [header, ...rows] = result.stdout.trimEnd().split('\n');
	const matching = rows.filter(row => !filter || row.toLowerCase().includes(filter));
	const shown = matching.slice(0, limit);
	const lines = isWindows ? shown : [header, ...shown];
	if (matching.length > shown.length) {
		lines.push(`... ${matching.length - shown.length} more`);
	}
	return success(lines.join('\n'));
};

export interface ServiceListing {
	header: string | null;
	rows: string[];
}

/** Command that lists services on the given platform */
export function serviceListCommand(platform: NodeJS.Platform): Pick<ProcessRunOptions, 'command' | 'args'> {
	switch (platform) {
		case 'win32':
			return {command: 'sc', args: ['query', 'type=', 'service', 'state=', 'all']};
		case 'darwin':
			return {command: 'launchctl', args: ['list']};
		default:
			return {
				command: 'systemctl',
				args: ['list-units', '--type=service', '--all', '--no-pager', '--plain', '--no-legend'],
			};
	}
}

/** `sc query` prints one block per service; fold each into a single line */
function parseScQuery(stdout: string): string[] {
	const rows: string[] = [];
	let name: string | null = null;
	let displayName = '';
	let state = '';
	const flush = () => {
		if (name !== null) rows.push(`${name}  ${state}  ${displayName}`.trimEnd());
	};
	for (const line of stdout.split(/\r?\n/)) {
		const nameMatch = /^SERVICE_NAME:\s*(.+)$/.exec(line);
		if (nameMatch) {
			flush();
			name = nameMatch[1].trim();
			displayName = '';
			state = '';
			continue;
		}
		const displayMatch = /^DISPLAY_NAME:\s*(.+)$/.exec(line);
		if (displayMatch) {
			displayName = displayMatch[1].trim();
			continue;
		}
		const stateMatch = /^\s*STATE\s*:\s*\d+\s+(\S+)/.exec(line);
		if (stateMatch) state = stateMatch[1];
	}
	flush();
	return rows;
}

export function parseServiceListing(platform: NodeJS.Platform, stdout: string): ServiceListing {
	if (platform === 'win32') {
		return {header: 'SERVICE  STATE  DISPLAY_NAME', rows: parseScQuery(stdout)};
	}
	const lines = stdout
		.split('\n')
		.map(line => line.trim())
		.filter(line => line.length > 0);
	if (platform === 'darwin') {
		const [header = null, ...rows] = lines;
		return {header, rows};
	}
	return {header: 'UNIT  LOAD  ACTIVE  SUB  DESCRIPTION', rows: lines.map(line => line.replace(/\s+/g, ' '))};
}

export function createListServices(platform: NodeJS.Platform = process.platform): ToolHandler {
	return async (args, context) => {
		const filter = readOptionalString(args, 'filter')?.toLowerCase();
		const limit = readOptionalNumber(args, 'limit') ?? 50;

		const result = await context.processes.run({
			...serviceListCommand(platform),
			signal: context.signal,
			maxOutputChars: context.maxOutputChars * 10,
		});
		if (result.exitCode !== 0) {
			return {
				output: `Error: Failed to list services\n${(result.stderr || result.stdout).trimEnd()}`,
				exitCode: result.exitCode ?? undefined,
				isError: true,
			};
		}

		const {header, rows} = parseServiceListing(platform, result.stdout);
		const matching = rows.filter(row => !filter || row.toLowerCase().includes(filter));
		if (matching.length === 0) {
			return success(filter ? `No services matching "${filter}"` : 'No services found');
		}
		const shown = matching.slice(0, limit);
		const lines = header ? [header, ...shown] : shown;
		if (matching.length > shown.length) {
			lines.push(`... ${matching.length - shown.length} more`);
		}
		return success(lines.join('\n'));
	};
}

export const listServices: ToolHandler = createListServices();

export const systemInfo: ToolHandler = async (_args, context) => {
	const cpus = os.cpus();
	const gib = (bytes: number) => `${(bytes / 1024 ** 3).toFixed(1)} GiB`;
	const info = {
		platform: os.platform(),
		release: os.release(),
		arch: os.arch(),
		hostname: os.hostname(),
		user: os.userInfo().username,
		cpu: cpus[0]?.model ?? 'unknown',
		cpu_count: cpus.length,
		memory_total: gib(os.totalmem()),
		memory_free: gib(os.freemem()),
		uptime_hours: Math.round((os.uptime() / 3600) * 10) / 10,
		node: process.version,
		cwd: context.cwd,
	};
	return success(JSON.stringify(info, null, 2));
};

export const executeCommand: ToolHandler = async (args, context) => {
	const command = readString(args, 'command');
	const elevated = readBoolean(args, 'elevated');
	const workingDirectory = readOptionalString(args, 'working_directory');

	if (elevated && process.platform === 'win32') {
		return failure(
			'Error: Elevated execution is not supported on Windows; run the terminal as administrator instead',
		);
	}

	const cwd = workingDirectory ? resolvePath(context, workingDirectory) : context.cwd;
	const cwdStats = await statOrNull(cwd);
	if (!cwdStats?.isDirectory()) {
		return failure(`Error: Working directory not found: ${workingDirectory ?? cwd}`);
	}

	// sudo -n fails instead of prompting for a password
	const finalCommand = elevated ? `sudo -n ${command}` : command;
	const result = await context.processes.run({
		command: finalCommand,
		shell: true,
		cwd,
		signal: context.signal,
		maxOutputChars: context.maxOutputChars,
	});

	return {
		output: formatCommandResult(finalCommand, result),
		exitCode: result.exitCode ?? undefined,
		isError: result.exitCode !== 0,
	};
};

const CODE_EXTENSIONS: Record<CodeLanguage, string> = {
	python: '.py',
	node: '.mjs',
	bash: '.sh',
	powershell: '.ps1',
};

export function interpreterFor(
	language: CodeLanguage,
	scriptPath: string,
): {command: string; args: string[]} {
	const isWindows = process.platform === 'win32';
	switch (language) {
		case 'python':
			return {command: isWindows ? 'python' : 'python3', args: [scriptPath]};
		case 'node':
			return {command: process.execPath, args: [scriptPath]};
		case 'bash':
			return {command: 'bash', args: [scriptPath]};
		case 'powershell':
			return {
				command: isWindows ? 'powershell' : 'pwsh',
				args: ['-NoProfile', '-ExecutionPolicy', 'Bypass', '-File', scriptPath],
			};
	}
}

/**
 * Run a snippet through a local interpreter from a temporary file
 */
export const runCode: ToolHandler = async (args, context) => {
	const language = args.language;
	if (!isCodeLanguage(language)) {
		return failure(`Error: Unsupported language: ${String(language)}`);
	}
	const code = readString(args, 'code');

	const tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'shell-pilot-code-'));
	const scriptPath = path.join(tempDir, `snippet${CODE_EXTENSIONS[language]}`);
	try {
		await fs.promises.writeFile(scriptPath, code, 'utf-8');
		const interpreter = interpreterFor(language, scriptPath);
		const result = await context.processes.run({
			command: interpreter.command,
			args: interpreter.args,
			cwd: context.cwd,
			signal: context.signal,
			maxOutputChars: context.maxOutputChars,
		});
		return {
			output: formatCommandResult(`${language} ${path.basename(scriptPath)}`, result),
			exitCode: result.exitCode ?? undefined,
			isError: result.exitCode !== 0,
		};
	} finally {
		await fs.promises.rm(tempDir, {recursive: true, force: true});
	}
};

export const BUILTIN_HANDLERS: Record<ToolName, ToolHandler> = {
	read_file: readFile,
	create_file: createFile,
	write_file: writeFile,
	delete_file: deleteFile,
	list_files: listFiles,
	search_files: searchFiles,
	list_processes: listProcesses,
	list_services: listServices,
	execute_command: executeCommand,
	run_code: runCode,
	system_info: systemInfo,
};

/** Tools whose schema exposes a `timeout` in seconds */
const TIMEOUT_ARGUMENT_TOOLS: readonly ToolName[] = ['execute_command', 'run_code'];

export function registerBuiltinTools(registry: ToolRegistry): void {
	for (const descriptor of ALL_TOOL_SCHEMAS) {
		registry.register(descriptor, BUILTIN_HANDLERS[descriptor.name], {
			source: 'builtin',
			timeoutArgument: TIMEOUT_ARGUMENT_TOOLS.includes(descriptor.name),
		});
	}
}
