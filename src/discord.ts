import {
  AttachmentBuilder,
  Client,
  EmbedBuilder,
  Events,
  GatewayIntentBits,
  PermissionFlagsBits,
  type Guild,
  type Message,
  type MessageReplyOptions,
} from 'discord.js';
import type { InboundMessage, Reply, ReplyPayload } from './events.js';
import type { GuildStore } from './guilds/store.js';
import type { EventRouter } from './router.js';
import { logger } from './lib/logger.js';
import { errorMessage } from './lib/errors.js';

/** The parts of a guild `Message` the router needs; a discord.js `Message<true>` satisfies it. */
export interface GuildMessageSource {
  id: string;
  guildId: string;
  channelId: string;
  content: string;
  guild: { name: string };
  author: { id: string; bot: boolean };
  member: {
    permissions: { has(permission: bigint): boolean };
    roles: { cache: { keys(): Iterable<string> } };
  } | null;
  mentions: {
    channels: { keys(): Iterable<string> };
    roles: { keys(): Iterable<string> };
  };
}

export function toInboundMessage(message: GuildMessageSource): InboundMessage {
  const member = message.member;
  return {
    id: message.id,
    guildId: message.guildId,
    guildName: message.guild.name,
    channelId: message.channelId,
    author: {
      id: message.author.id,
      bot: message.author.bot,
      isMember: member !== null,
      isAdministrator: member?.permissions.has(PermissionFlagsBits.Administrator) ?? false,
      roleIds: member ? Array.from(member.roles.cache.keys()) : [],
    },
    content: message.content,
    mentions: {
      channelIds: Array.from(message.mentions.channels.keys()),
      roleIds: Array.from(message.mentions.roles.keys()),
    },
  };
}

export function toReplyOptions(payload: ReplyPayload): MessageReplyOptions {
  const options: MessageReplyOptions = {
    allowedMentions: { repliedUser: payload.mentionAuthor ?? false },
  };
  if (payload.content) options.content = payload.content;
  if (payload.embed) {
    const embed = new EmbedBuilder().setTitle(payload.embed.title);
    if (payload.embed.description) embed.setDescription(payload.embed.description);
    if (payload.embed.fields?.length) embed.addFields(payload.embed.fields);
    options.embeds = [embed];
  }
  if (payload.file) {
    options.files = [new AttachmentBuilder(payload.file.path, { name: payload.file.name })];
  }
  return options;
}

function replyTo(message: Message<true>): Reply {
  return async (payload) => {
    await message.reply(toReplyOptions(payload));
  };
}

export interface DiscordBotOptions {
  token: string;
  store: GuildStore;
  router: EventRouter;
}

export async function startDiscordBot({ token, store, router }: DiscordBotOptions): Promise<Client> {
  const client = new Client({
    intents: [GatewayIntentBits.Guilds, GatewayIntentBits.GuildMessages, GatewayIntentBits.MessageContent],
  });

  client.once(Events.ClientReady, (ready) => {
    logger.info(`discord.ready user=${ready.user.tag} id=${ready.user.id}`);
    (async () => {
      const guilds = await ready.guilds.fetch();
      const added = store.reconcile(guilds.keys());
      for (const guildId of added) {
        logger.info(`guild.added guildId=${guildId} name=${guilds.get(guildId)?.name ?? 'unknown'}`);
      }
      await store.persist();
      logger.info(`discord.reconciled guilds=${guilds.size} added=${added.length}`);
    })().catch((err: unknown) => logger.error(`discord.reconcile_failed err=${errorMessage(err)}`));
  });

  client.on(Events.GuildCreate, (guild: Guild) => {
    logger.info(`guild.join guildId=${guild.id} name=${guild.name}`);
    if (!store.ensure(guild.id)) return;
    store
      .persist()
      .catch((err: unknown) => logger.error(`store.persist_failed guildId=${guild.id} err=${errorMessage(err)}`));
  });

  client.on(Events.MessageCreate, (message) => {
    if (!message.inGuild()) return;
    router
      .handle(toInboundMessage(message), replyTo(message))
      .catch((err: unknown) => logger.error(`router.unhandled messageId=${message.id} err=${errorMessage(err)}`));
  });

  client.on(Events.Error, (err) => {
    logger.error(`discord.error err=${err.message}`);
  });

  await client.login(token);
  return client;
}
