import { reportProviderChange, type CommandDefinition, type CommandContext } from '../base.js';

export const loginCommand: CommandDefinition = {
  command: 'login',
  description: 'Save an API key for the current provider',
  handler: ({ addMessage, args, providers }: CommandContext) => {
    const controls = providers;
    if (!controls) {
      addMessage({ role: 'system', type: 'error', content: 'Saving API keys is not available here.' });
      return;
    }
    const apiKey = args ?? '';
    if (!apiKey) {
      addMessage({ role: 'system', type: 'error', content: 'Usage: /login <api-key>' });
      return;
    }
    reportProviderChange(
      addMessage,
      () => controls.login(apiKey),
      (config) => `API key saved for ${config.kind}.`
    );
  },
};

export const logoutCommand: CommandDefinition = {
  command: 'logout',
  description: 'Remove the saved API key for the current provider',
  handler: ({ addMessage, providers }: CommandContext) => {
    const controls = providers;
    if (!controls) {
      addMessage({ role: 'system', type: 'error', content: 'Saving API keys is not available here.' });
      return;
    }
    reportProviderChange(
      addMessage,
      () => controls.logout(),
      (config) => `API key removed for ${config.kind}.`
    );
  },
};
