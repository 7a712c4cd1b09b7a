import { KeyedQueue } from '../lib/queues.js';
import { logger } from '../lib/logger.js';
import { errorMessage } from '../lib/errors.js';
import { readSnapshot, writeSnapshot } from './snapshot.js';
import { cloneGuildConfig, defaultGuildConfig, type GuildConfig, type GuildSnapshot } from './types.js';

export type GuildUpdate = (current: GuildConfig) => GuildConfig | Promise<GuildConfig>;

/** Leave `next` out to keep the guild as it is; nothing is written then. */
export interface GuildDecision<T> {
  next?: GuildConfig;
  result: T;
}

export type GuildTransaction<T> = (current: GuildConfig) => GuildDecision<T> | Promise<GuildDecision<T>>;

const SNAPSHOT_KEY = 'snapshot';

/**
 * Sole owner of every guild's config. Reads hand out copies; writes go through
 * `mutate`, which runs one update per guild at a time and persists the whole
 * store before the next update for that guild starts.
 */
export class GuildStore {
  private guilds = new Map<string, GuildConfig>();
  private mutations = new KeyedQueue();
  private writes = new KeyedQueue();

  constructor(private readonly dataPath: string) {}

  get path() {
    return this.dataPath;
  }

  async load(): Promise<number> {
    const snapshot = await readSnapshot(this.dataPath);
    if (!snapshot) {
      logger.info(`store.load path=${this.dataPath} snapshot=missing`);
      return 0;
    }
    for (const [guildId, config] of Object.entries(snapshot)) {
      this.guilds.set(guildId, cloneGuildConfig(config));
    }
    logger.info(`store.load path=${this.dataPath} guilds=${this.guilds.size}`);
    return this.guilds.size;
  }

  get(guildId: string): GuildConfig {
    return cloneGuildConfig(this.entry(guildId));
  }

  has(guildId: string): boolean {
    return this.guilds.has(guildId);
  }

  guildIds(): string[] {
    return Array.from(this.guilds.keys());
  }

  /** Returns true when the guild was not known before. */
  ensure(guildId: string): boolean {
    if (this.guilds.has(guildId)) return false;
    this.guilds.set(guildId, defaultGuildConfig());
    return true;
  }

  reconcile(guildIds: Iterable<string>): string[] {
    const added: string[] = [];
    for (const guildId of guildIds) {
      if (this.ensure(guildId)) added.push(guildId);
    }
    return added;
  }

  mutate(guildId: string, update: GuildUpdate): Promise<GuildConfig> {
    return this.transact(guildId, async (current) => {
      const next = await update(current);
      return { next, result: cloneGuildConfig(next) };
    });
  }

  /**
   * Like `mutate`, but the update also decides a result from the config it saw.
   * Checks made inside the update hold when the change is applied.
   */
  transact<T>(guildId: string, update: GuildTransaction<T>): Promise<T> {
    return this.mutations.enqueue(guildId, async () => {
      const { next, result } = await update(this.get(guildId));
      if (!next) return result;
      this.guilds.set(guildId, cloneGuildConfig(next));
      try {
        await this.persist();
      } catch (err) {
        logger.error(`store.persist_failed guildId=${guildId} path=${this.dataPath} err=${errorMessage(err)}`);
      }
      return result;
    });
  }

  snapshot(): GuildSnapshot {
    const out: GuildSnapshot = {};
    for (const [guildId, config] of this.guilds) {
      out[guildId] = cloneGuildConfig(config);
    }
    return out;
  }

  /** Each call overwrites the previous snapshot with the store as it is when the write starts. */
  persist(): Promise<void> {
    return this.writes.enqueue(SNAPSHOT_KEY, () => writeSnapshot(this.dataPath, this.snapshot()));
  }

  private entry(guildId: string): GuildConfig {
    const existing = this.guilds.get(guildId);
    if (existing) return existing;
    const created = defaultGuildConfig();
    this.guilds.set(guildId, created);
    return created;
  }
}
