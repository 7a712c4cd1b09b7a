import fs from 'fs-extra';
import os from 'node:os';
import path from 'node:path';
import type { InboundMessage, MessageAuthor, Reply, ReplyPayload } from '../events.js';

let nextId = 1;

export interface MessageOverrides {
  guildId?: string;
  guildName?: string;
  channelId?: string;
  content?: string;
  author?: Partial<MessageAuthor>;
  mentions?: Partial<InboundMessage['mentions']>;
}

export function makeMessage(overrides: MessageOverrides = {}): InboundMessage {
  return {
    id: `msg-${nextId++}`,
    guildId: overrides.guildId ?? 'guild-1',
    guildName: overrides.guildName ?? 'Test Guild',
    channelId: overrides.channelId ?? '99',
    author: {
      id: 'member-1',
      bot: false,
      isMember: true,
      isAdministrator: false,
      roleIds: [],
      ...overrides.author,
    },
    content: overrides.content ?? '',
    mentions: {
      channelIds: [],
      roleIds: [],
      ...overrides.mentions,
    },
  };
}

export function adminMessage(content: string, mentions: MessageOverrides['mentions'] = {}): InboundMessage {
  return makeMessage({ content, mentions, author: { id: 'admin-1', isAdministrator: true } });
}

export interface ReplySink {
  sent: ReplyPayload[];
  reply: Reply;
}

export function replySink(opts: { delayMs?: number; fail?: boolean; onSend?: (payload: ReplyPayload) => Promise<void> } = {}): ReplySink {
  const sent: ReplyPayload[] = [];
  const reply: Reply = async (payload) => {
    if (opts.delayMs) await new Promise((resolve) => setTimeout(resolve, opts.delayMs));
    if (opts.fail) throw new Error('send failed');
    if (opts.onSend) await opts.onSend(payload);
    sent.push(payload);
  };
  return { sent, reply };
}

export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'guildlist-test-'));
  try {
    return await fn(dir);
  } finally {
    await fs.remove(dir);
  }
}

export const ETH_ADDRESS = '0x' + 'ab'.repeat(20);
export const OTHER_ETH_ADDRESS = '0x' + '12'.repeat(20);
