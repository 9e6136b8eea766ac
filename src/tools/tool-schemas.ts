/**
 * Descriptors for the built-in tools.
 * These are advertised to every provider and validated by the dispatcher.
 */

import type {ToolDescriptor} from '../core/types.js';
import type {ToolName} from './tool-types.js';

export interface BuiltinToolDescriptor extends ToolDescriptor {
	readonly name: ToolName;
}

// File Operation Tools

export const READ_FILE_SCHEMA: BuiltinToolDescriptor = {
	name: 'read_file',
	description:
		'Read file contents with optional line range. Example: {"file_path": "notes/todo.txt", "start_line": 1, "end_line": 20}',
	parameters: {
		type: 'object',
		properties: {
			file_path: {
				type: 'string',
				description: 'Path to the file, relative to the working directory or absolute',
			},
			start_line: {
				type: 'integer',
				description: 'Starting line number (1-indexed, optional)',
				minimum: 1,
			},
			end_line: {
				type: 'integer',
				description: 'Ending line number (1-indexed, inclusive, optional)',
				minimum: 1,
			},
		},
		required: ['file_path'],
	},
};

export const CREATE_FILE_SCHEMA: BuiltinToolDescriptor = {
	name: 'create_file',
	description:
		'Create a new file with the given content. Parent directories are created as needed. Fails if the file exists unless overwrite is true.',
	parameters: {
		type: 'object',
		properties: {
			file_path: {type: 'string', description: 'Path of the file to create'},
			content: {type: 'string', description: 'Full file content'},
			overwrite: {
				type: 'boolean',
				description: 'Replace an existing file',
				default: false,
			},
		},
		required: ['file_path', 'content'],
	},
};

export const WRITE_FILE_SCHEMA: BuiltinToolDescriptor = {
	name: 'write_file',
	description:
		'Write content to an existing or new file, replacing it or appending to it. Example: {"file_path": "log.txt", "content": "done\\n", "append": true}',
	parameters: {
		type: 'object',
		properties: {
			file_path: {type: 'string', description: 'Path of the file to write'},
			content: {type: 'string', description: 'Content to write'},
			append: {
				type: 'boolean',
				description: 'Append instead of replacing',
				default: false,
			},
		},
		required: ['file_path', 'content'],
	},
};

export const DELETE_FILE_SCHEMA: BuiltinToolDescriptor = {
	name: 'delete_file',
	description:
		'Delete a file, or a directory when recursive is true. Use with care.',
	parameters: {
		type: 'object',
		properties: {
			file_path: {type: 'string', description: 'Path of the file or directory'},
			recursive: {
				type: 'boolean',
				description: 'Required to delete a non-empty directory',
				default: false,
			},
		},
		required: ['file_path'],
	},
};

export const LIST_FILES_SCHEMA: BuiltinToolDescriptor = {
	name: 'list_files',
	description:
		'List files and directories as a tree. Example: {"directory": "src", "pattern": "*.ts", "recursive": true}',
	parameters: {
		type: 'object',
		properties: {
			directory: {
				type: 'string',
				description: 'Directory to list. Defaults to the working directory.',
				default: '.',
			},
			pattern: {
				type: 'string',
				description: 'File name filter with * wildcards (e.g. "*.md")',
			},
			recursive: {
				type: 'boolean',
				description: 'Descend into subdirectories',
				default: false,
			},
			show_hidden: {
				type: 'boolean',
				description: 'Include dot files',
				default: false,
			},
		},
		required: [],
	},
};

export const SEARCH_FILES_SCHEMA: BuiltinToolDescriptor = {
	name: 'search_files',
	description:
		'Find lines matching a text or regular expression in files under a directory. Example: {"pattern": "TODO", "file_pattern": "*.md", "directory": "notes"}',
	parameters: {
		type: 'object',
		properties: {
			pattern: {
				type: 'string',
				description: 'Text to search for; a regular expression when regex is true',
			},
			directory: {
				type: 'string',
				description: 'Directory to search. Defaults to the working directory.',
				default: '.',
			},
			file_pattern: {
				type: 'string',
				description: 'File name filter with * wildcards (e.g. "*.log")',
			},
			case_sensitive: {
				type: 'boolean',
				description: 'Match case exactly',
				default: false,
			},
			regex: {
				type: 'boolean',
				description: 'Treat pattern as a regular expression',
				default: false,
			},
			max_results: {
				type: 'integer',
				description: 'Maximum number of matching lines to return (1-1000)',
				minimum: 1,
				maximum: 1000,
				default: 100,
			},
		},
		required: ['pattern'],
	},
};

// Process and System Tools

export const LIST_PROCESSES_SCHEMA: BuiltinToolDescriptor = {
	name: 'list_processes',
	description:
		'List running processes with pid and command. Example: {"filter": "node", "limit": 20}',
	parameters: {
		type: 'object',
		properties: {
			filter: {
				type: 'string',
				description: 'Case-insensitive substring the process line must contain',
			},
			limit: {
				type: 'integer',
				description: 'Maximum number of processes to return (1-500)',
				minimum: 1,
				maximum: 500,
				default: 50,
			},
		},
		required: [],
	},
};

export const LIST_SERVICES_SCHEMA: BuiltinToolDescriptor = {
	name: 'list_services',
	description:
		'List system services with their state (systemd, launchd or the Windows service manager). Example: {"filter": "ssh"}',
	parameters: {
		type: 'object',
		properties: {
			filter: {
				type: 'string',
				description: 'Case-insensitive substring the service line must contain',
			},
			limit: {
				type: 'integer',
				description: 'Maximum number of services to return (1-500)',
				minimum: 1,
				maximum: 500,
				default: 50,
			},
		},
		required: [],
	},
};

export const SYSTEM_INFO_SCHEMA: BuiltinToolDescriptor = {
	name: 'system_info',
	description:
		'Report operating system, CPU, memory, uptime and the current user and working directory.',
	parameters: {
		type: 'object',
		properties: {},
		required: [],
	},
};

// Code Execution Tools

export const EXECUTE_COMMAND_SCHEMA: BuiltinToolDescriptor = {
	name: 'execute_command',
	description:
		'Run a shell command and return stdout, stderr and the exit code. Only use commands that exit on their own; never start servers or watchers. Example: {"command": "ls -la", "working_directory": "src"}',
	parameters: {
		type: 'object',
		properties: {
			command: {
				type: 'string',
				description: 'Shell command to execute',
			},
			working_directory: {
				type: 'string',
				description: 'Directory to run the command in (optional)',
			},
			timeout: {
				type: 'integer',
				description: 'Max execution time in seconds (1-300)',
				minimum: 1,
				maximum: 300,
			},
			elevated: {
				type: 'boolean',
				description:
					'Run with administrator privileges (sudo -n). Always requires user approval.',
				default: false,
			},
		},
		required: ['command'],
	},
};

export const RUN_CODE_SCHEMA: BuiltinToolDescriptor = {
	name: 'run_code',
	description:
		'Execute a code snippet with a local interpreter and return its output. Example: {"language": "python", "code": "print(2 + 2)"}',
	parameters: {
		type: 'object',
		properties: {
			language: {
				type: 'string',
				enum: ['python', 'node', 'bash', 'powershell'],
				description: 'Interpreter to use',
			},
			code: {
				type: 'string',
				description: 'Source code to run',
			},
			timeout: {
				type: 'integer',
				description: 'Max execution time in seconds (1-300)',
				minimum: 1,
				maximum: 300,
			},
		},
		required: ['language', 'code'],
	},
};

export const ALL_TOOL_SCHEMAS: readonly BuiltinToolDescriptor[] = [
	READ_FILE_SCHEMA,
	CREATE_FILE_SCHEMA,
	WRITE_FILE_SCHEMA,
	DELETE_FILE_SCHEMA,
	LIST_FILES_SCHEMA,
	SEARCH_FILES_SCHEMA,
	LIST_PROCESSES_SCHEMA,
	LIST_SERVICES_SCHEMA,
	SYSTEM_INFO_SCHEMA,
	EXECUTE_COMMAND_SCHEMA,
	RUN_CODE_SCHEMA,
];

// Tools that modify the machine and need approval by default
export const APPROVAL_REQUIRED_TOOLS: readonly ToolName[] = [
	'create_file',
	'write_file',
	'delete_file',
	'execute_command',
	'run_code',
];
