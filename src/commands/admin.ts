import fs from 'fs-extra';
import { logger } from '../lib/logger.js';
import { errorMessage } from '../lib/errors.js';
import { defaultGuildConfig } from '../guilds/types.js';
import { isLedgerType, ledgerTypes } from '../ledger/validators.js';
import { exportFileName, stageExport } from './export.js';
import { invalidCommand, succeeded, type CommandDefinition } from './registry.js';
import { adminHelpEmbed } from './help.js';

const CHANNEL_RE = /^>channel <#\d+>$/;
const ROLE_RE = /^>role <@&\d+>$/;

export function setChannelCommand(): CommandDefinition {
  return {
    name: 'channel',
    scope: 'admin',
    usage: '>channel #channelName',
    description: 'Sets the channel to listen for wallet addresses on.',
    handler: async ({ message, guildId, store, reply }) => {
      const channels = message.mentions.channelIds;
      if (channels.length !== 1 || !CHANNEL_RE.test(message.content)) return invalidCommand;
      const [channelId] = channels;
      await store.mutate(guildId, (config) => ({ ...config, whitelistChannel: channelId }));
      await reply({ content: `Successfully set whitelist channel to <#${channelId}>`, mentionAuthor: true });
      return succeeded;
    },
  };
}

export function setRoleCommand(): CommandDefinition {
  return {
    name: 'role',
    scope: 'admin',
    usage: '>role @roleName',
    description: 'Sets the role a user must possess to be able to add their address to the whitelist.',
    handler: async ({ message, guildId, store, reply }) => {
      const roles = message.mentions.roleIds;
      if (roles.length !== 1 || !ROLE_RE.test(message.content)) return invalidCommand;
      const [roleId] = roles;
      await store.mutate(guildId, (config) => ({ ...config, whitelistRole: roleId }));
      await reply({ content: `Successfully set whitelist role to <@&${roleId}>`, mentionAuthor: true });
      return succeeded;
    },
  };
}

export function setLedgerTypeCommand(): CommandDefinition {
  return {
    name: 'blockchain',
    scope: 'admin',
    usage: `>blockchain ${ledgerTypes().join('/')}`,
    description:
      'Select which blockchain this drop will occur on, this allows for validation of the addresses that are added.',
    handler: async ({ message, guildId, store, reply }) => {
      const tokens = message.content.trim().split(/\s+/);
      const code = tokens.length > 1 ? tokens[tokens.length - 1] : '';
      if (!code || !isLedgerType(code)) return invalidCommand;
      await store.mutate(guildId, (config) => ({ ...config, ledgerType: code }));
      await reply({ content: `Successfully set blockchain to ${code}`, mentionAuthor: true });
      return succeeded;
    },
  };
}

export function showConfigCommand(): CommandDefinition {
  return {
    name: 'config',
    scope: 'admin',
    usage: '>config',
    description: 'View the current server config.',
    handler: async ({ message, guildId, store, reply }) => {
      const config = store.get(guildId);
      const lines = [
        `Whitelist Channel: ${config.whitelistChannel ? `<#${config.whitelistChannel}>` : 'not set'}`,
        `Whitelist Role: ${config.whitelistRole ? `<@&${config.whitelistRole}>` : 'not set'}`,
        `Blockchain: ${config.ledgerType ?? 'not set'}`,
      ];
      await reply({
        embed: { title: `Config for ${message.guildName}`, description: lines.join('\n') },
        mentionAuthor: true,
      });
      return succeeded;
    },
  };
}

export function exportDataCommand(): CommandDefinition {
  return {
    name: 'data',
    scope: 'admin',
    usage: '>data',
    description: 'Get discordID:walletAddress pairs in a CSV format.',
    handler: async ({ message, guildId, store, reply, exportDir }) => {
      const { entries } = store.get(guildId);
      const staged = await stageExport(exportDir, guildId, message.id, entries);
      try {
        await reply({
          content: 'Data for server is attached.',
          file: { path: staged, name: exportFileName(guildId) },
        });
      } finally {
        await fs.remove(staged).catch((err: unknown) => {
          logger.warn(`export.cleanup_failed path=${staged} err=${errorMessage(err)}`);
        });
      }
      logger.info(`export.sent guildId=${guildId} rows=${Object.keys(entries).length}`);
      return succeeded;
    },
  };
}

export function clearCommand(): CommandDefinition {
  return {
    name: 'clear',
    scope: 'admin',
    usage: '>clear',
    description: 'Clear the config and data for this server.',
    handler: async ({ guildId, store, reply }) => {
      await store.mutate(guildId, () => defaultGuildConfig());
      await reply({ content: "Server's data and config has been cleared." });
      return succeeded;
    },
  };
}

export function adminHelpCommand(): CommandDefinition {
  return {
    name: 'help.admin',
    scope: 'admin',
    usage: '>help.admin',
    description: 'This screen.',
    handler: async ({ registry, reply }) => {
      await reply({ embed: adminHelpEmbed([...registry.list('admin'), ...registry.list('public')]) });
      return succeeded;
    },
  };
}
