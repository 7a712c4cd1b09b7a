import type { ReplyEmbed } from '../events.js';
import type { CommandDefinition } from './registry.js';

const HOW_TO_SUBMIT = [
  'How to use: Send your wallet address to the whitelist chat to record it!',
  'The message should contain just the wallet address (no `>`).',
];

export function formatCommandList(commands: CommandDefinition[]): string {
  return commands.map((c) => `\`${c.usage}\`: ${c.description}`).join('\n');
}

export function adminHelpEmbed(commands: CommandDefinition[]): ReplyEmbed {
  return {
    title: 'Whitelist Manager Help (Admin)',
    description: [
      'Whitelist Manager is a bot designed to assist you in gathering wallet addresses for NFT drops.',
      "After configuring the bot, users who are 'whitelisted' will be able to record their crypto addresses which you can then download as a CSV.",
      'Note, the `config` must be filled out before the bot will work.',
    ].join('\n'),
    fields: [{ name: 'COMMANDS', value: formatCommandList(commands) }],
  };
}

export function publicHelpEmbed(commands: CommandDefinition[]): ReplyEmbed {
  return {
    title: 'Whitelist Manager Help',
    description: 'Whitelist Manager is a bot designed to assist in gathering wallet addresses for NFT drops.',
    fields: [{ name: 'COMMANDS', value: [formatCommandList(commands), '', ...HOW_TO_SUBMIT].join('\n') }],
  };
}
