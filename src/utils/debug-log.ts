import * as fs from 'fs';
import * as path from 'path';

// Debug logging utilities (shared by the engine, dispatcher and providers)
const DEFAULT_LOG_FILE = 'shell-pilot-debug.log';

let debugEnabled = false;
let logFile = path.join(process.cwd(), DEFAULT_LOG_FILE);

export function setDebugEnabled(enabled: boolean, filePath?: string): void {
  debugEnabled = enabled;
  if (filePath) {
    logFile = path.resolve(filePath);
  }
}

export function getDebugLogPath(): string {
  return logFile;
}

function write(scope: string, message: string, data?: unknown): void {
  if (!debugEnabled) return;

  const timestamp = new Date().toISOString();
  const payload = data === undefined ? '' : '\n' + JSON.stringify(data, null, 2);
  try {
    fs.appendFileSync(logFile, `[${timestamp}] [${scope}] ${message}${payload}\n`);
  } catch (error) {
    // Stop writing after the first failure
    debugEnabled = false;
    console.warn(`Debug log disabled: ${error instanceof Error ? error.message : String(error)}`);
  }
}

export function debugLog(message: string, data?: unknown): void {
  write('ENGINE', message, data);
}

export function toolDebugLog(message: string, data?: unknown): void {
  write('TOOL', message, data);
}

export function providerDebugLog(message: string, data?: unknown): void {
  write('PROVIDER', message, data);
}

export function mcpDebugLog(message: string, data?: unknown): void {
  write('MCP', message, data);
}
