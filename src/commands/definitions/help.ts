import type { CommandDefinition, CommandContext } from '../base.js';
import { getAvailableCommands } from '../index.js';

export const helpCommand: CommandDefinition = {
  command: 'help',
  description: 'Show help and available commands',
  handler: ({ addMessage }: CommandContext) => {
    const commandList = getAvailableCommands()
      .map((cmd) => `/${cmd.command.padEnd(8)} - ${cmd.description}`)
      .join('\n');

    addMessage({
      role: 'system',
      type: 'help',
      content: `Available Commands:
${commandList}

Keyboard Shortcuts:
Ctrl+C - Interrupt the running request, or exit when idle

Tools that change files or run code ask for approval first:
[y]es runs it once, [a]ll approves that tool for the rest of the session.`,
    });
  },
};
