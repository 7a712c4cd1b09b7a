export interface GuildConfig {
  whitelistChannel: string | null;
  whitelistRole: string | null;
  ledgerType: string | null;
  /** member id -> submitted address */
  entries: Record<string, string>;
}

export type GuildSnapshot = Record<string, GuildConfig>;

export function defaultGuildConfig(): GuildConfig {
  return {
    whitelistChannel: null,
    whitelistRole: null,
    ledgerType: null,
    entries: {},
  };
}

export function cloneGuildConfig(config: GuildConfig): GuildConfig {
  return { ...config, entries: { ...config.entries } };
}
