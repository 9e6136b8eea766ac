import type { CommandDefinition, CommandContext } from '../base.js';

export const statsCommand: CommandDefinition = {
  command: 'stats',
  description: 'Show token usage for this session',
  handler: ({ addMessage, sessionStats, model }: CommandContext) => {
    if (!sessionStats) {
      addMessage({ role: 'system', type: 'stats', content: 'No usage recorded yet.' });
      return;
    }
    const lines = [
      'Session Statistics:',
      `  Requests:          ${sessionStats.totalRequests}`,
      `  Prompt tokens:     ${sessionStats.promptTokens.toLocaleString('en-US')}`,
      `  Completion tokens: ${sessionStats.completionTokens.toLocaleString('en-US')}`,
      `  Total tokens:      ${sessionStats.totalTokens.toLocaleString('en-US')}`,
    ];
    if (model) {
      lines.push(`  Current model:     ${model}`);
    }
    addMessage({
      role: 'system',
      type: 'stats',
      content: lines.join('\n'),
      usageSnapshot: {
        prompt_tokens: sessionStats.promptTokens,
        completion_tokens: sessionStats.completionTokens,
        total_tokens: sessionStats.totalTokens,
        total_requests: sessionStats.totalRequests,
      },
    });
  },
};
