import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { logsDir } from '../config/paths.js';
import fs from 'fs-extra';

function fileTransports() {
  // the test runner logs to the console only
  if (process.env.NODE_ENV === 'test') return [];
  fs.ensureDirSync(logsDir);
  return [
    new DailyRotateFile({
      dirname: logsDir,
      filename: 'guildlist-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      maxFiles: '14d',
      zippedArchive: false,
      level: 'info',
    }),
  ];
}

/** `<timestamp> [<level>] <message>`, followed by any remaining fields as JSON. */
export function formatLine({ level, message, timestamp, ...meta }: winston.Logform.TransformableInfo): string {
  const extra = Object.keys(meta).length ? ' ' + JSON.stringify(meta) : '';
  return `${String(timestamp)} [${level}] ${String(message)}${extra}`;
}

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL ?? 'info',
  format: winston.format.combine(winston.format.timestamp(), winston.format.printf(formatLine)),
  transports: [new winston.transports.Console({ level: process.env.LOG_LEVEL ?? 'debug' }), ...fileTransports()],
});

export function isLogLevel(level: string): boolean {
  return Object.hasOwn(winston.config.npm.levels, level);
}

/** Returns false and keeps the current level when `level` is not an npm level name. */
export function setLogLevel(level: string): boolean {
  if (!isLogLevel(level)) {
    logger.warn(`logger.unknown_level level=${level} keeping=${logger.level}`);
    return false;
  }
  logger.level = level;
  return true;
}
