import { succeeded, type CommandDefinition } from './registry.js';
import { publicHelpEmbed } from './help.js';

export function helpCommand(): CommandDefinition {
  return {
    name: 'help',
    scope: 'public',
    usage: '>help',
    description: 'How to use help screen.',
    handler: async ({ registry, reply }) => {
      await reply({ embed: publicHelpEmbed(registry.list('public')) });
      return succeeded;
    },
  };
}

export function checkCommand(): CommandDefinition {
  return {
    name: 'check',
    scope: 'public',
    usage: '>check',
    description: 'Tells you whether or not your wallet has been recorded in the whitelist.',
    handler: async ({ message, guildId, store, reply }) => {
      const address = store.get(guildId).entries[message.author.id];
      if (address !== undefined) {
        await reply({ content: `You are whitelisted! Address: \`${address}\`` });
      } else {
        await reply({ content: 'Your wallet is not yet on the whitelist. Use `>help` for more info!' });
      }
      return succeeded;
    },
  };
}
