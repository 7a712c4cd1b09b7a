#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import fs from 'fs-extra';
import path from 'node:path';
import { loadConfig, redacted, requireToken, resolveDataPath, resolveExportDir } from './config/config.js';
import { GuildStore } from './guilds/store.js';
import { buildCommandRegistry } from './commands/index.js';
import { buildEntriesCsv, exportFileName } from './commands/export.js';
import { EventRouter } from './router.js';
import { startDiscordBot } from './discord.js';
import { logger, setLogLevel } from './lib/logger.js';
import { errorMessage } from './lib/errors.js';

const program = new Command();
program.name('guildlist').description('Collects wallet addresses from whitelisted Discord members');

function logAction(action: string, details?: Record<string, unknown>) {
  logger.info(`${action}${details ? ' ' + JSON.stringify(details) : ''}`);
}

function loadSettings() {
  const cfg = loadConfig();
  if (cfg.logging?.level) setLogLevel(cfg.logging.level);
  return cfg;
}

async function openStore() {
  const cfg = loadSettings();
  const store = new GuildStore(resolveDataPath(cfg));
  await store.load();
  return { cfg, store };
}

program
  .command('run')
  .description('Connect to Discord and start handling guild messages')
  .action(async () => {
    logAction('cli.run.start');
    const { cfg, store } = await openStore();
    const token = requireToken(cfg);
    const router = new EventRouter({
      store,
      commands: buildCommandRegistry(),
      exportDir: resolveExportDir(cfg),
    });
    await startDiscordBot({ token, store, router });
    logger.info('Discord bot started.');
  });

program
  .command('config')
  .description('Print the current configuration (token redacted)')
  .action(() => {
    console.log(JSON.stringify(redacted(loadConfig()), null, 2));
  });

program
  .command('guilds')
  .description('List guilds in the snapshot with their ledger type and entry count')
  .action(async () => {
    const { store } = await openStore();
    const ids = store.guildIds();
    if (ids.length === 0) {
      console.log('No guilds recorded yet.');
      return;
    }
    for (const guildId of ids) {
      const config = store.get(guildId);
      console.log(`${guildId}\t${config.ledgerType ?? '-'}\t${Object.keys(config.entries).length} entries`);
    }
  });

program
  .command('export')
  .description("Write a guild's recorded addresses to a CSV file")
  .argument('<guildId>', 'guild to export')
  .option('-o, --out <file>', 'output file')
  .action(async (guildId: string, options: { out?: string }) => {
    const { store } = await openStore();
    if (!store.has(guildId)) {
      console.error(`Guild ${guildId} is not in the snapshot.`);
      process.exitCode = 1;
      return;
    }
    const target = path.resolve(options.out ?? exportFileName(guildId));
    const { entries } = store.get(guildId);
    await fs.outputFile(target, buildEntriesCsv(entries), 'utf8');
    logAction('cli.export', { guildId, rows: Object.keys(entries).length, target });
    console.log(`Wrote ${Object.keys(entries).length} rows to ${target}`);
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  logger.error(`cli.fatal err=${errorMessage(err)}`);
  process.exitCode = 1;
});
