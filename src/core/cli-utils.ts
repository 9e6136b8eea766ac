/**
 * CLI Utilities for Simple CLI
 * - Approval answers and option parsing
 * - Tool result summaries
 * - ASCII spinner with elapsed time
 */

import * as readline from 'readline';
import { InvalidArgumentError } from 'commander';
import { PROVIDER_KINDS, type ProviderKind, type ToolResult } from './types.js';

export type ApprovalAnswer = 'yes' | 'no' | 'all';

/**
 * Parse a `[y]es / [n]o / [a]ll session` answer. Anything unrecognised is a no.
 */
export function parseApprovalAnswer(answer: string, allowSession = true): ApprovalAnswer {
  const choice = answer.toLowerCase().trim();
  if (choice === 'y' || choice === 'yes') return 'yes';
  if (allowSession && (choice === 'a' || choice === 'all')) return 'all';
  return 'no';
}

function firstLine(text: string, maxLength = 120): string {
  const line = text.split('\n').find((candidate) => candidate.trim().length > 0) ?? '';
  return line.length > maxLength ? `${line.slice(0, maxLength - 3)}...` : line;
}

/**
 * One-line summary of a tool result for the terminal
 */
export function summarizeToolResult(name: string, result: ToolResult): string {
  switch (result.status) {
    case 'ok':
      return `${name} completed`;
    case 'timeout':
      return `${name} timed out`;
    case 'error':
      if (result.error_kind === 'PolicyDenied') {
        return `${name} denied: ${firstLine(result.output)}`;
      }
      return `${name} failed (${result.error_kind ?? 'ExecutionError'}): ${firstLine(result.output)}`;
  }
}

/**
 * Spinner interface
 */
export interface Spinner {
  update: (message: string) => void;
  stop: (finalMessage?: string) => void;
}

/**
 * Create a simple ASCII spinner with elapsed time display
 * Uses characters: - \ | /
 */
export function createSpinner(message: string, stream: NodeJS.WriteStream = process.stdout): Spinner {
  const frames = ['-', '\\', '|', '/'];
  let frameIndex = 0;
  let currentMessage = message;
  const startTime = Date.now();
  let intervalId: NodeJS.Timeout | null = null;
  let stopped = false;

  const render = () => {
    if (stopped) return;

    const elapsed = formatElapsedTime(Date.now() - startTime);
    const frame = frames[frameIndex % frames.length];

    // Clear current line and write spinner
    stream.write(`\r${frame} ${currentMessage} (${elapsed})`);

    frameIndex++;
  };

  // Spinner frames only make sense on a terminal
  if (stream.isTTY) {
    render();
    intervalId = setInterval(render, 100);
  }

  return {
    update: (newMessage: string) => {
      currentMessage = newMessage;
    },
    stop: (finalMessage?: string) => {
      if (stopped) return;
      stopped = true;

      if (intervalId) {
        clearInterval(intervalId);
        intervalId = null;
        // Clear the spinner line
        stream.write('\r\x1b[K');
      }

      if (finalMessage) {
        console.log(finalMessage);
      }
    },
  };
}

/**
 * Format elapsed time in a human-readable format
 * @param ms - Elapsed time in milliseconds
 * @returns Formatted time string (e.g., "1.5s", "2m 30s")
 */
export function formatElapsedTime(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }

  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = Math.floor(seconds % 60);
  return `${minutes}m ${remainingSeconds}s`;
}

/**
 * Create a readline interface for user input
 */
export function createReadlineInterface(): readline.Interface {
  return readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });
}

/**
 * Ask a question and get user input. Resolves null when the interface closes
 * or the signal fires before an answer arrives.
 */
export function question(rl: readline.Interface, prompt: string, signal?: AbortSignal): Promise<string | null> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve(null);
      return;
    }
    const settle = (answer: string | null) => {
      rl.off('close', onClose);
      signal?.removeEventListener('abort', onAbort);
      resolve(answer);
    };
    const onClose = () => settle(null);
    const onAbort = () => settle(null);
    rl.once('close', onClose);
    signal?.addEventListener('abort', onAbort, { once: true });
    rl.question(prompt, { signal }, (answer) => settle(answer));
  });
}

/**
 * commander argument parsers
 */
export function parseProviderKind(value: string): ProviderKind {
  const kind = PROVIDER_KINDS.find((candidate) => candidate === value.toLowerCase());
  if (!kind) {
    throw new InvalidArgumentError(`Expected one of: ${PROVIDER_KINDS.join(', ')}`);
  }
  return kind;
}

export function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer');
  }
  return parsed;
}

export function parseTemperature(value: string): number {
  const parsed = Number.parseFloat(value);
  if (!Number.isFinite(parsed) || parsed < 0 || parsed > 2) {
    throw new InvalidArgumentError('Expected a number between 0 and 2');
  }
  return parsed;
}
