import type { InboundMessage, Reply } from './events.js';
import type { GuildStore } from './guilds/store.js';
import type { GuildConfig } from './guilds/types.js';
import { COMMAND_SIGIL, parseCommandName, type CommandContext, type CommandDefinition, type CommandRegistry } from './commands/registry.js';
import { validate } from './ledger/validators.js';
import { logger } from './lib/logger.js';
import { errorDetail } from './lib/errors.js';

export type RouteOutcome =
  | 'ignored'
  | 'command'
  | 'invalid_command'
  | 'unknown_command'
  | 'submission_recorded'
  | 'submission_rejected'
  | 'fault';

export interface EventRouterOptions {
  store: GuildStore;
  commands: CommandRegistry;
  exportDir: string;
}

function summarizeLog(text: string, maxLen = 200) {
  if (text.length <= maxLen) return text;
  return text.slice(0, maxLen) + '…';
}

type SubmissionDecision =
  | { outcome: 'ignored' }
  | { outcome: 'submission_rejected'; ledgerType: string | null }
  | { outcome: 'submission_recorded' };

function submissionGateOpen(config: GuildConfig, message: InboundMessage): boolean {
  const { whitelistChannel, whitelistRole } = config;
  if (!whitelistChannel || !whitelistRole) return false;
  return message.channelId === whitelistChannel && message.author.roleIds.includes(whitelistRole);
}

function formatCommandNames(names: string[]) {
  return names.map((n) => `\`${n}\``).join(', ');
}

export class EventRouter {
  private store: GuildStore;
  private commands: CommandRegistry;
  private exportDir: string;

  constructor(opts: EventRouterOptions) {
    this.store = opts.store;
    this.commands = opts.commands;
    this.exportDir = opts.exportDir;
  }

  /** Never rejects: faults are logged and the event is dropped. */
  async handle(message: InboundMessage, reply: Reply): Promise<RouteOutcome> {
    try {
      return await this.route(message, reply);
    } catch (err) {
      logger.error(`router.fault guildId=${message.guildId} messageId=${message.id}`, {
        head: errorDetail(err),
        body: { event: message, content: message.content },
      });
      return 'fault';
    }
  }

  private async route(message: InboundMessage, reply: Reply): Promise<RouteOutcome> {
    const { author, content } = message;
    if (author.bot || !author.isMember) return 'ignored';

    const name = parseCommandName(content);

    if (name !== null && author.isAdministrator) {
      const command = this.commands.get('admin', name);
      if (command) {
        logger.info(`router.admin_command guildId=${message.guildId} authorId=${author.id} text=${summarizeLog(content)}`);
        return this.dispatch(command, message, reply);
      }
    }

    if (name !== null) {
      logger.info(`router.public_command guildId=${message.guildId} authorId=${author.id} text=${summarizeLog(content)}`);
      const command = this.commands.get('public', name);
      if (command) return this.dispatch(command, message, reply);
      await reply({
        content: `Valid commands are: ${formatCommandNames(this.commands.names('public'))}, use \`${COMMAND_SIGIL}help\` for more info.`,
      });
      return 'unknown_command';
    }

    return this.submit(message, reply);
  }

  private async dispatch(command: CommandDefinition, message: InboundMessage, reply: Reply): Promise<RouteOutcome> {
    const ctx: CommandContext = {
      message,
      guildId: message.guildId,
      store: this.store,
      reply,
      exportDir: this.exportDir,
      registry: this.commands,
    };
    const result = await this.commands.run(command, ctx);
    if (result.ok) return 'command';
    await reply({ content: 'Invalid command argument.', mentionAuthor: true });
    return 'invalid_command';
  }

  private async submit(message: InboundMessage, reply: Reply): Promise<RouteOutcome> {
    // cheap filter for ordinary chat; the decision is made again inside the guild's turn
    if (!submissionGateOpen(this.store.get(message.guildId), message)) return 'ignored';

    const address = message.content;
    const decision = await this.store.transact<SubmissionDecision>(message.guildId, (current) => {
      if (!submissionGateOpen(current, message)) return { result: { outcome: 'ignored' } };
      if (!validate(current.ledgerType, address)) {
        return { result: { outcome: 'submission_rejected', ledgerType: current.ledgerType } };
      }
      return {
        next: { ...current, entries: { ...current.entries, [message.author.id]: address } },
        result: { outcome: 'submission_recorded' },
      };
    });

    if (decision.outcome === 'ignored') return 'ignored';
    if (decision.outcome === 'submission_rejected') {
      logger.info(
        `router.submission_rejected guildId=${message.guildId} authorId=${message.author.id} ledgerType=${decision.ledgerType ?? 'unset'}`
      );
      await reply({ content: `The address \`${address}\` is invalid.` });
      return 'submission_rejected';
    }
    logger.info(`router.submission_recorded guildId=${message.guildId} authorId=${message.author.id}`);
    await reply({ content: `Your wallet \`${address}\` has been validated and recorded.`, mentionAuthor: true });
    return 'submission_recorded';
  }
}
