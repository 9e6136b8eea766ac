/**
 * Security filter for dangerous/sensitive files
 * Prevents the model from reading, writing or deleting credentials and keys
 */

// Files that should never be read/edited/deleted
export const DANGEROUS_FILES: readonly string[] = [
	'.env',
	'.env.*',
	'.aws',
	'.credentials',
	'.ssh',
	'.private',
	'secrets.json',
	'secrets.*.json',
	'api-key',
	'api-keys.json',
	'private_key',
	'private_key.pem',
	'id_rsa',
	'id_ed25519',
	'.git/config',
	'.npmrc',
	'.yarnrc',
	'.netrc',
	'credentials',
];

// Directories that should never be accessed
export const DANGEROUS_DIRECTORIES: readonly string[] = [
	'.git',
	'.ssh',
	'.aws',
	'.gnupg',
	'.credentials',
	'.shell-pilot',
	'/root/.ssh',
	'/root/.aws',
	'/etc/shadow',
];

export interface SecurityFilterOptions {
	dangerousFiles?: readonly string[];
	dangerousDirectories?: readonly string[];
}

export interface SecurityVerdict {
	allowed: boolean;
	reason?: string;
}

function mergeConfiguredList(
	defaultList: readonly string[],
	configuredList: readonly string[] | undefined,
): string[] {
	const merged = [...defaultList];
	for (const item of configuredList ?? []) {
		if (!merged.includes(item)) {
			merged.push(item);
		}
	}
	return merged;
}

function extractCommandTokens(command: string): string[] {
	const tokens: string[] = [];
	const tokenRegex = /"([^"]*)"|'([^']*)'|`([^`]*)`|(\S+)/g;
	let match: RegExpExecArray | null;
	while ((match = tokenRegex.exec(command)) !== null) {
		const token = match[1] || match[2] || match[3] || match[4];
		if (token) {
			tokens.push(token);
		}
	}
	return tokens;
}

function normalizeTokenForPathCheck(token: string): string[] {
	const stripped = token
		.replace(/^[\s"'`]+|[\s"'`]+$/g, '')
		.replace(/^[;|&><(){}[\],]+|[;|&><(){}[\],]+$/g, '');
	if (!stripped) return [];

	const candidates = [stripped];
	if (stripped.includes('=')) {
		const afterEq = stripped.split('=').slice(1).join('=');
		if (afterEq) {
			candidates.push(afterEq);
		}
	}
	return candidates;
}

function normalizePath(filePath: string): string {
	return filePath.toLowerCase().replace(/\\/g, '/').replace(/\/{2,}/g, '/');
}

function escapeRegex(value: string): string {
	return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export class SecurityFilter {
	private readonly dangerousFiles: string[];
	private readonly dangerousDirectories: string[];

	constructor(options: SecurityFilterOptions = {}) {
		this.dangerousFiles = mergeConfiguredList(DANGEROUS_FILES, options.dangerousFiles);
		this.dangerousDirectories = mergeConfiguredList(
			DANGEROUS_DIRECTORIES,
			options.dangerousDirectories,
		);
	}

	/**
	 * Check if a directory path is, or lies inside, a protected directory
	 */
	isDangerousDirectory(dirPath: string): boolean {
		if (!dirPath) return false;
		const normalizedPath = normalizePath(dirPath);

		for (const dangerousDir of this.dangerousDirectories) {
			const dangerousLower = normalizePath(dangerousDir);
			if (dangerousLower.startsWith('/')) {
				if (
					normalizedPath === dangerousLower ||
					normalizedPath.startsWith(`${dangerousLower}/`)
				) {
					return true;
				}
				continue;
			}
			const segmentRegex = new RegExp(`(^|/)${escapeRegex(dangerousLower)}(/|$)`);
			if (segmentRegex.test(normalizedPath)) {
				return true;
			}
		}
		return false;
	}

	/**
	 * Check if a file path names a sensitive file
	 */
	isDangerousFile(filePath: string): boolean {
		if (!filePath) return false;
		const normalizedPath = normalizePath(filePath);
		const fileName = normalizedPath.split('/').pop() ?? '';

		for (const dangerous of this.dangerousFiles) {
			const dangerousLower = normalizePath(dangerous);
			if (dangerousLower.includes('*')) {
				// Simple wildcard matching on the file name
				const pattern = dangerousLower
					.split('*')
					.map(part => escapeRegex(part))
					.join('[^/]*');
				if (new RegExp(`^${pattern}$`).test(fileName)) {
					return true;
				}
			} else if (
				fileName === dangerousLower ||
				normalizedPath.endsWith(`/${dangerousLower}`) ||
				normalizedPath === dangerousLower ||
				normalizedPath.includes(`/${dangerousLower}/`) ||
				normalizedPath.startsWith(`${dangerousLower}/`)
			) {
				return true;
			}
		}
		return false;
	}

	isPathDangerous(filePath: string): boolean {
		return this.isDangerousFile(filePath) || this.isDangerousDirectory(filePath);
	}

	findDangerousPathInCommand(command: string): string | null {
		for (const token of extractCommandTokens(command)) {
			for (const candidate of normalizeTokenForPathCheck(token)) {
				if (this.isPathDangerous(candidate)) {
					return candidate;
				}
			}
		}
		return null;
	}

	validateFileOperation(
		filePath: string,
		operation: 'read' | 'write' | 'delete' | 'list',
	): SecurityVerdict {
		if (this.isPathDangerous(filePath)) {
			return {
				allowed: false,
				reason: `Security policy blocks ${operation} operation on sensitive path: ${filePath}`,
			};
		}
		return {allowed: true};
	}

	validateCommandOperation(command: string): SecurityVerdict {
		if (!command) {
			return {allowed: true};
		}
		const dangerousPath = this.findDangerousPathInCommand(command);
		if (dangerousPath) {
			return {
				allowed: false,
				reason: `Security policy blocks command referencing sensitive path: ${dangerousPath}`,
			};
		}
		return {allowed: true};
	}
}

const defaultFilter = new SecurityFilter();

export function isDangerousFile(filePath: string): boolean {
	return defaultFilter.isDangerousFile(filePath);
}

export function isDangerousDirectory(dirPath: string): boolean {
	return defaultFilter.isDangerousDirectory(dirPath);
}

export function isPathDangerous(filePath: string): boolean {
	return defaultFilter.isPathDangerous(filePath);
}

export function validateFileOperation(
	filePath: string,
	operation: 'read' | 'write' | 'delete' | 'list',
): SecurityVerdict {
	return defaultFilter.validateFileOperation(filePath, operation);
}

export function validateCommandOperation(command: string): SecurityVerdict {
	return defaultFilter.validateCommandOperation(command);
}
