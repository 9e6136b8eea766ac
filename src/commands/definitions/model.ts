import { reportProviderChange, type CommandDefinition, type CommandContext } from '../base.js';

export const modelCommand: CommandDefinition = {
  command: 'model',
  description: 'Show or switch the model, saved as the default',
  handler: ({ addMessage, args, providers }: CommandContext) => {
    const controls = providers;
    if (!controls) {
      addMessage({ role: 'system', type: 'error', content: 'Switching models is not available here.' });
      return;
    }

    const model = args ?? '';
    if (!model) {
      const current = controls.current();
      const saved = controls.saved();
      addMessage({
        role: 'system',
        type: 'info',
        content: [
          `Current model: ${current.kind}:${current.model}`,
          `Saved default: ${saved.provider}:${saved.model ?? '(provider default)'}`,
          'Usage: /model <name>',
        ].join('\n'),
      });
      return;
    }

    reportProviderChange(addMessage, () => controls.switchModel(model));
  },
};
