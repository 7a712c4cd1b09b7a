import fs from 'fs-extra';
import path from 'node:path';
import { configPath, dataPath, exportDir } from './paths.js';

export interface GuildlistConfig {
  discord?: {
    token?: string;
  };
  storage?: {
    dataPath?: string;
    exportDir?: string;
  };
  logging?: {
    level?: string;
  };
}

const defaultConfig: GuildlistConfig = {
  discord: {},
  storage: {
    dataPath,
    exportDir,
  },
  logging: {
    level: 'info',
  },
};

function ensureDirs(file: string) {
  fs.ensureDirSync(path.dirname(file));
}

export function loadConfig(file: string = configPath): GuildlistConfig {
  ensureDirs(file);
  const existing: GuildlistConfig = fs.existsSync(file) ? fs.readJSONSync(file) : {};
  if (!fs.existsSync(file)) {
    fs.writeJSONSync(file, defaultConfig, { spaces: 2 });
  }
  const merged: GuildlistConfig = {
    ...defaultConfig,
    ...existing,
    discord: { ...defaultConfig.discord, ...(existing.discord ?? {}) },
    storage: { ...defaultConfig.storage, ...(existing.storage ?? {}) },
    logging: { ...defaultConfig.logging, ...(existing.logging ?? {}) },
  };
  // env overrides win over the file
  if (process.env.GUILDLIST_DATA_PATH) {
    merged.storage = { ...merged.storage, dataPath: process.env.GUILDLIST_DATA_PATH };
  }
  if (process.env.GUILDLIST_EXPORT_DIR) {
    merged.storage = { ...merged.storage, exportDir: process.env.GUILDLIST_EXPORT_DIR };
  }
  if (process.env.LOG_LEVEL) {
    merged.logging = { ...merged.logging, level: process.env.LOG_LEVEL };
  }
  return merged;
}

export function saveConfig(cfg: GuildlistConfig, file: string = configPath) {
  ensureDirs(file);
  fs.writeJSONSync(file, cfg, { spaces: 2 });
}

export function requireToken(cfg: GuildlistConfig): string {
  const token = process.env.DISCORD_TOKEN ?? process.env.ACCESS_TOKEN ?? cfg.discord?.token;
  if (!token) {
    throw new Error('DISCORD_TOKEN (or ACCESS_TOKEN) environment variable is required to connect to Discord.');
  }
  return token;
}

export function resolveDataPath(cfg: GuildlistConfig): string {
  return cfg.storage?.dataPath ?? dataPath;
}

export function resolveExportDir(cfg: GuildlistConfig): string {
  return cfg.storage?.exportDir ?? exportDir;
}

export function redacted(cfg: GuildlistConfig): GuildlistConfig {
  const clone: GuildlistConfig = JSON.parse(JSON.stringify(cfg));
  if (clone.discord?.token) clone.discord.token = '***';
  return clone;
}
