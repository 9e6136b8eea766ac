import { reportProviderChange, type CommandDefinition, type CommandContext } from '../base.js';
import { PROVIDER_KINDS } from '../../core/types.js';

export const providerCommand: CommandDefinition = {
  command: 'provider',
  description: 'Show or switch the provider, saved as the default',
  handler: ({ addMessage, args, providers }: CommandContext) => {
    const controls = providers;
    if (!controls) {
      addMessage({ role: 'system', type: 'error', content: 'Switching providers is not available here.' });
      return;
    }

    const requested = (args ?? '').toLowerCase();
    if (!requested) {
      addMessage({
        role: 'system',
        type: 'info',
        content: [
          `Current provider: ${controls.current().kind}`,
          `Available: ${PROVIDER_KINDS.join(', ')}`,
          'Usage: /provider <name>',
        ].join('\n'),
      });
      return;
    }

    const kind = PROVIDER_KINDS.find((candidate) => candidate === requested);
    if (!kind) {
      addMessage({
        role: 'system',
        type: 'error',
        content: `Unknown provider: ${requested}. Expected one of: ${PROVIDER_KINDS.join(', ')}`,
      });
      return;
    }

    reportProviderChange(addMessage, () => controls.switchProvider(kind));
  },
};
