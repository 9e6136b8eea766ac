import type { CommandDefinition, CommandContext } from '../base.js';

export const toolsCommand: CommandDefinition = {
  command: 'tools',
  description: 'List the tools the model can call',
  handler: ({ addMessage, tools }: CommandContext) => {
    if (!tools || tools.length === 0) {
      addMessage({ role: 'system', type: 'tools', content: 'No tools registered.' });
      return;
    }
    const lines = tools.map((tool) => {
      const summary = tool.description.split('\n')[0];
      return `${tool.name} - ${summary}`;
    });
    addMessage({
      role: 'system',
      type: 'tools',
      content: `Registered tools (${tools.length}):\n${lines.join('\n')}`,
    });
  },
};
