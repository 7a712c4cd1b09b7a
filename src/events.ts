export interface MessageAuthor {
  id: string;
  bot: boolean;
  /** false when the author is not a member of the guild (webhooks, departed users) */
  isMember: boolean;
  isAdministrator: boolean;
  roleIds: string[];
}

/** A guild message as delivered by the chat transport. */
export interface InboundMessage {
  id: string;
  guildId: string;
  guildName: string;
  channelId: string;
  author: MessageAuthor;
  content: string;
  mentions: {
    channelIds: string[];
    roleIds: string[];
  };
}

export interface ReplyEmbed {
  title: string;
  description?: string;
  fields?: { name: string; value: string }[];
}

export interface ReplyFile {
  path: string;
  name: string;
}

export interface ReplyPayload {
  content?: string;
  embed?: ReplyEmbed;
  file?: ReplyFile;
  mentionAuthor?: boolean;
}

export type Reply = (payload: ReplyPayload) => Promise<void>;
