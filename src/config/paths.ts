import os from 'node:os';
import path from 'node:path';

export const baseDir = process.env.GUILDLIST_HOME ?? path.join(os.homedir(), '.guildlist');
export const configPath = path.join(baseDir, 'config.json');
export const dataPath = path.join(baseDir, 'guilds.json');
export const logsDir = path.join(baseDir, 'logs');
export const exportDir = path.join(baseDir, 'exports');
