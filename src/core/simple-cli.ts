/**
 * Simple CLI - Main CLI class for terminal-based interaction
 * console + readline front end for the conversation engine
 */

import * as readline from 'readline';
import chalk from 'chalk';
import type { CommandMessage, SessionStats } from '../commands/base.js';
import { handleSlashCommand } from '../commands/index.js';
import { formatToolParams } from '../tools/tools.js';
import type { Session } from './bootstrap.js';
import {
  createReadlineInterface,
  createSpinner,
  parseApprovalAnswer,
  question,
  summarizeToolResult,
  type Spinner,
} from './cli-utils.js';
import type { EngineCallbacks, TurnOutcome } from './conversation-engine.js';
import { ProviderAuthError, errorMessage } from './errors.js';
import type { ToolCallRequest, ToolResult } from './types.js';
import { API_KEY_ENV } from '../utils/local-settings.js';

// Tools whose output is worth showing in the terminal
const SHOW_OUTPUT_TOOLS = ['execute_command', 'run_code', 'list_files', 'search_files', 'list_services'];
const MAX_SHOWN_OUTPUT_LINES = 40;

function emptyStats(): SessionStats {
  return {
    promptTokens: 0,
    completionTokens: 0,
    totalTokens: 0,
    totalRequests: 0,
  };
}

export class SimpleCLI {
  private rl: readline.Interface;
  private isProcessing: boolean = false;
  private closed: boolean = false;
  private sessionStats: SessionStats = emptyStats();
  private spinner: Spinner | null = null;
  private turnController: AbortController | null = null;
  // Approval prompts share one readline, so they run one at a time
  private approvalQueue: Promise<unknown> = Promise.resolve();
  private readonly sessionApproved = new Set<string>();

  readonly callbacks: EngineCallbacks;

  constructor() {
    this.rl = createReadlineInterface();
    this.rl.on('close', () => {
      this.closed = true;
    });
    this.callbacks = this.createCallbacks();
    this.setupSignalHandlers();
  }

  /**
   * Setup signal handlers for Ctrl+C
   */
  private setupSignalHandlers(): void {
    const onInterrupt = () => {
      if (this.isProcessing) {
        this.turnController?.abort();
        this.spinner?.stop();
        console.log(chalk.yellow('\n Interrupted'));
      } else {
        this.rl.close();
      }
    };
    this.rl.on('SIGINT', onInterrupt);
    process.on('SIGINT', onInterrupt);
  }

  /**
   * Engine callbacks for tool execution and messages
   */
  private createCallbacks(): EngineCallbacks {
    return {
      onStateChange: (state) => {
        if (state === 'AwaitingProviderReply') {
          this.spinner?.stop();
          this.spinner = createSpinner('Thinking...');
        }
      },

      onAssistantText: (text) => {
        this.spinner?.stop();
        console.log(chalk.white(text));
      },

      onToolStart: (request) => {
        this.spinner?.stop();
        const params = formatToolParams(request.name, request.arguments, { includePrefix: false });
        console.log(chalk.blue(`\n ${request.name}`) + chalk.gray(` ${params}`));
      },

      onToolEnd: (request, result) => {
        this.printToolResult(request, result);
      },

      onRetry: (error, attempt, delayMs) => {
        this.spinner?.update(`Retrying in ${Math.round(delayMs / 100) / 10}s (attempt ${attempt + 1})...`);
        if (!this.spinner) {
          console.log(chalk.yellow(`Request failed: ${error.message}. Retrying...`));
        }
      },

      onApiUsage: (usage) => {
        this.sessionStats.promptTokens += usage.prompt_tokens;
        this.sessionStats.completionTokens += usage.completion_tokens;
        this.sessionStats.totalTokens += usage.total_tokens;
        this.sessionStats.totalRequests++;
      },

      approve: (request, reason) => {
        const next = this.approvalQueue.then(() => this.handleToolApproval(request, reason));
        this.approvalQueue = next.catch(() => undefined);
        return next;
      },
    };
  }

  /**
   * Handle tool approval flow. Elevated commands never get the session option.
   */
  private async handleToolApproval(request: ToolCallRequest, reason: string): Promise<boolean> {
    const signal = this.turnController?.signal;
    if (signal?.aborted) return false;

    const elevated = request.arguments.elevated === true;
    if (!elevated && this.sessionApproved.has(request.name)) {
      return true;
    }

    this.spinner?.stop();
    console.log(chalk.yellow(`\n Tool requires approval: ${request.name}`));
    console.log(chalk.gray(`  ${reason}`));
    console.log(chalk.gray(JSON.stringify(request.arguments, null, 2)));

    const prompt = elevated ? chalk.cyan('[y]es / [n]o: ') : chalk.cyan('[y]es / [n]o / [a]ll session: ');
    const answer = await question(this.rl, prompt, signal);
    if (answer === null) return false;

    const choice = parseApprovalAnswer(answer, !elevated);
    if (choice === 'all') {
      this.sessionApproved.add(request.name);
    }
    return choice !== 'no';
  }

  /**
   * Print tool result with appropriate formatting
   */
  private printToolResult(request: ToolCallRequest, result: ToolResult): void {
    const summary = summarizeToolResult(request.name, result);
    if (result.status === 'ok') {
      console.log(chalk.green(` ${summary}`));
    } else if (result.status === 'timeout' || result.error_kind === 'PolicyDenied') {
      console.log(chalk.yellow(` ${summary}`));
    } else {
      console.log(chalk.red(` ${summary}`));
    }

    if (result.status === 'ok' && SHOW_OUTPUT_TOOLS.includes(request.name) && result.output) {
      const lines = result.output.split('\n');
      const shown = lines.slice(0, MAX_SHOWN_OUTPUT_LINES);
      console.log(chalk.dim(shown.join('\n')));
      if (lines.length > shown.length) {
        console.log(chalk.dim(`... (${lines.length - shown.length} more lines)`));
      }
    }
  }

  private printOutcome(outcome: TurnOutcome): void {
    switch (outcome.status) {
      case 'Completed':
        break;
      case 'Cancelled':
        console.log(chalk.yellow('Request cancelled.'));
        break;
      case 'Aborted':
        console.log(chalk.red(`Turn aborted: ${outcome.reason ?? 'unknown reason'}`));
        if (outcome.error instanceof ProviderAuthError) {
          const names = API_KEY_ENV[outcome.error.provider].join(' or ');
          console.log(chalk.yellow(`Check the API key (${names}, or the config file).`));
        }
        break;
    }
  }

  private printCommandMessage(message: CommandMessage): void {
    if (message.type === 'help' || message.type === 'stats') {
      console.log(chalk.cyan(message.content));
    } else if (message.type === 'error') {
      console.log(chalk.red(message.content));
    } else {
      console.log(chalk.green(message.content));
    }
  }

  /** Closes the prompt without running a session */
  dispose(): void {
    this.rl.close();
  }

  /**
   * Main chat loop
   */
  async run(session: Session): Promise<void> {
    console.log(chalk.gray(`Provider: ${session.engine.providerKind}, model: ${session.engine.model}`));
    for (const failure of session.mcpFailures) {
      console.log(chalk.yellow(`MCP server ${failure.serverId} unavailable: ${failure.error}`));
    }
    console.log(chalk.gray('Type /help for commands, Ctrl+C to exit\n'));

    try {
      while (!this.closed) {
        const input = await question(this.rl, chalk.cyan('> '));
        if (input === null) break;

        const trimmed = input.trim();
        if (!trimmed) continue;

        // Handle slash commands
        if (trimmed.startsWith('/')) {
          this.handleSlashCommand(session, trimmed);
          continue;
        }

        await this.chat(session, trimmed);
      }
    } finally {
      this.spinner?.stop();
      await session.close();
      console.log(chalk.gray('\nGoodbye!'));
    }
  }

  private async chat(session: Session, input: string): Promise<void> {
    const controller = new AbortController();
    this.turnController = controller;
    this.isProcessing = true;

    try {
      const outcome = await session.engine.runTurn(input, { signal: controller.signal });
      this.spinner?.stop();
      this.printOutcome(outcome);
    } catch (error) {
      this.spinner?.stop();
      console.log(chalk.red(`Error: ${errorMessage(error)}`));
    } finally {
      this.spinner?.stop();
      this.spinner = null;
      this.isProcessing = false;
      this.turnController = null;
      console.log(''); // Add newline after response
    }
  }

  /**
   * Handle slash commands
   */
  private handleSlashCommand(session: Session, input: string): void {
    const handled = handleSlashCommand(input, {
      addMessage: (message) => this.printCommandMessage(message),
      clearHistory: () => {
        session.engine.clear();
        this.sessionStats = emptyStats();
        this.sessionApproved.clear();
      },
      tools: session.registry.list(),
      sessionStats: this.sessionStats,
      model: `${session.engine.providerKind}:${session.engine.model}`,
      providers: session,
      exit: () => this.rl.close(),
    });

    if (!handled) {
      const command = input.slice(1).split(/\s+/)[0];
      console.log(chalk.yellow(`Unknown command: /${command}`));
      console.log(chalk.gray('Type /help for available commands'));
    }
  }
}
