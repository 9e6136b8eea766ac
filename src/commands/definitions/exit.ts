import type { CommandDefinition, CommandContext } from '../base.js';

export const exitCommand: CommandDefinition = {
  command: 'exit',
  description: 'Exit the application',
  handler: ({ addMessage, exit }: CommandContext) => {
    addMessage({ role: 'system', content: 'Goodbye!' });
    exit?.();
  },
};
