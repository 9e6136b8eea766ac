export const TOOL_NAMES = [
	'read_file',
	'create_file',
	'write_file',
	'delete_file',
	'list_files',
	'search_files',
	'list_processes',
	'list_services',
	'execute_command',
	'run_code',
	'system_info',
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export const CODE_LANGUAGES = ['python', 'node', 'bash', 'powershell'] as const;

export type CodeLanguage = (typeof CODE_LANGUAGES)[number];

export function isToolName(name: string): name is ToolName {
	return TOOL_NAMES.some(toolName => toolName === name);
}

export function isCodeLanguage(value: unknown): value is CodeLanguage {
	return CODE_LANGUAGES.some(language => language === value);
}
