import type { CommandDefinition, CommandContext } from './base.js';
import { helpCommand } from './definitions/help.js';
import { toolsCommand } from './definitions/tools.js';
import { modelCommand } from './definitions/model.js';
import { providerCommand } from './definitions/provider.js';
import { loginCommand, logoutCommand } from './definitions/login.js';
import { clearCommand } from './definitions/clear.js';
import { statsCommand } from './definitions/stats.js';
import { exitCommand } from './definitions/exit.js';

// help.ts imports this module, so the list is built on demand
export function getAvailableCommands(): CommandDefinition[] {
  return [
    helpCommand,
    toolsCommand,
    modelCommand,
    providerCommand,
    loginCommand,
    logoutCommand,
    clearCommand,
    statsCommand,
    exitCommand,
  ];
}

export function getCommandNames(): string[] {
  return getAvailableCommands().map((cmd) => cmd.command);
}

/**
 * Runs a slash command. Returns false when the command is unknown.
 */
export function handleSlashCommand(input: string, context: CommandContext): boolean {
  const fullCommand = input.trim().slice(1);
  const rawName = fullCommand.split(/\s+/)[0];
  const commandName = rawName.toLowerCase();

  const command = getAvailableCommands().find((cmd) => cmd.command === commandName);
  if (!command) {
    return false;
  }
  command.handler({ ...context, args: fullCommand.slice(rawName.length).trim() });
  return true;
}

export type { CommandDefinition, CommandContext } from './base.js';
