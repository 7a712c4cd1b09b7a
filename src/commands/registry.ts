import type { GuildStore } from '../guilds/store.js';
import type { InboundMessage, Reply } from '../events.js';
import { logger } from '../lib/logger.js';

export const COMMAND_SIGIL = '>';

export type CommandScope = 'admin' | 'public';

export type CommandResult = { ok: true } | { ok: false; reason: 'invalid_command' };

export const succeeded: CommandResult = { ok: true };
export const invalidCommand: CommandResult = { ok: false, reason: 'invalid_command' };

export interface CommandContext {
  message: InboundMessage;
  guildId: string;
  store: GuildStore;
  reply: Reply;
  exportDir: string;
  registry: CommandRegistry;
}

export interface CommandDefinition {
  name: string;
  scope: CommandScope;
  /** Shown in the help embeds. */
  usage: string;
  description: string;
  handler: (ctx: CommandContext) => Promise<CommandResult>;
}

/** First whitespace-delimited token without the sigil, or null when the text is not a command. */
export function parseCommandName(content: string): string | null {
  if (!content.startsWith(COMMAND_SIGIL)) return null;
  const [head = ''] = content.split(/\s+/);
  return head.slice(COMMAND_SIGIL.length);
}

export class CommandRegistry {
  private commands: Record<CommandScope, Map<string, CommandDefinition>> = {
    admin: new Map(),
    public: new Map(),
  };

  register(command: CommandDefinition) {
    this.commands[command.scope].set(command.name, command);
  }

  get(scope: CommandScope, name: string): CommandDefinition | undefined {
    return this.commands[scope].get(name);
  }

  names(scope: CommandScope): string[] {
    return Array.from(this.commands[scope].keys());
  }

  list(scope: CommandScope): CommandDefinition[] {
    return Array.from(this.commands[scope].values());
  }

  async run(command: CommandDefinition, ctx: CommandContext): Promise<CommandResult> {
    logger.info(
      `command.invoke name=${command.name} scope=${command.scope} guildId=${ctx.guildId} authorId=${ctx.message.author.id}`
    );
    const result = await command.handler(ctx);
    logger.info(`command.result name=${command.name} guildId=${ctx.guildId} outcome=${result.ok ? 'ok' : result.reason}`);
    return result;
  }
}
