#!/usr/bin/env node
/**
 * Simple CLI Entry Point
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { createSession } from './bootstrap.js';
import { parsePositiveInteger, parseProviderKind, parseTemperature } from './cli-utils.js';
import { errorMessage, isAgentError } from './errors.js';
import { SimpleCLI } from './simple-cli.js';
import type { ProviderKind } from './types.js';
import { getDebugLogPath, setDebugEnabled } from '../utils/debug-log.js';
import { ConfigManager } from '../utils/local-settings.js';

const VERSION = '0.1.0';

interface CliOptions {
  provider?: ProviderKind;
  model?: string;
  temperature?: number;
  system?: string;
  config?: string;
  maxToolTurns?: number;
  auditLog?: string;
  mcp: boolean;
  debug?: boolean;
}

/**
 * Start the interactive terminal chat using SimpleCLI
 */
async function startChat(options: CliOptions): Promise<void> {
  if (options.debug) {
    setDebugEnabled(true);
    console.log(chalk.gray(`Debug log: ${getDebugLogPath()}`));
  }

  console.log(chalk.bold.hex('#FF4500')(`shell-pilot ${VERSION}`));

  const cli = new SimpleCLI();
  try {
    const session = await createSession({
      config: new ConfigManager(options.config),
      overrides: {
        provider: options.provider,
        model: options.model,
        temperature: options.temperature,
      },
      systemPrompt: options.system,
      maxToolTurns: options.maxToolTurns,
      auditLogPath: options.auditLog,
      enableMcp: options.mcp,
      callbacks: cli.callbacks,
    });
    await cli.run(session);
  } catch (error) {
    cli.dispose();
    const label = isAgentError(error) ? error.kind : 'Error';
    console.log(chalk.red(`${label} while starting: ${errorMessage(error)}`));
    process.exitCode = 1;
  }
}

const program = new Command();

program
  .name('shell-pilot')
  .description('Drive your terminal through an AI model with policed tool calls')
  .version(VERSION)
  .option('-p, --provider <provider>', 'AI provider (groq, openai, local, anthropic, gemini)', parseProviderKind)
  .option('-m, --model <model>', 'Model name')
  .option('-t, --temperature <temperature>', 'Temperature for generation', parseTemperature)
  .option('-s, --system <message>', 'Custom system message')
  .option('-c, --config <file>', 'Path to the config file (default ~/.shell-pilot/config.json)')
  .option('--max-tool-turns <n>', 'Tool rounds allowed per request', parsePositiveInteger)
  .option('--audit-log <file>', 'Append audit entries to this JSON Lines file')
  .option('--no-mcp', 'Do not start configured MCP servers')
  .option('-d, --debug', 'Enable debug logging to shell-pilot-debug.log in current directory');

program.parse();

startChat(program.opts<CliOptions>()).catch((error: unknown) => {
  console.error(chalk.red(`Fatal: ${errorMessage(error)}`));
  process.exitCode = 1;
});
