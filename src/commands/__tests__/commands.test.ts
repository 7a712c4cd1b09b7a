import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'fs-extra';
import path from 'node:path';
import { buildCommandRegistry } from '../index.js';
import { parseCommandName, type CommandContext } from '../registry.js';
import { GuildStore } from '../../guilds/store.js';
import type { InboundMessage, Reply } from '../../events.js';
import { adminMessage, makeMessage, replySink, withTempDir } from '../../__tests__/fixtures.js';

function contextFor(message: InboundMessage, store: GuildStore, reply: Reply, exportDir: string): CommandContext {
  return { message, guildId: message.guildId, store, reply, exportDir, registry: buildCommandRegistry() };
}

test('command name is the first token without the sigil', () => {
  assert.equal(parseCommandName('>channel <#10>'), 'channel');
  assert.equal(parseCommandName('>help.admin'), 'help.admin');
  assert.equal(parseCommandName('>'), '');
  assert.equal(parseCommandName('hello >channel'), null);
});

test('registry splits admin and public commands', () => {
  const registry = buildCommandRegistry();
  assert.deepEqual(registry.names('admin'), ['channel', 'role', 'blockchain', 'data', 'config', 'clear', 'help.admin']);
  assert.deepEqual(registry.names('public'), ['help', 'check']);
  assert.equal(registry.get('public', 'channel'), undefined);
});

test('channel command needs exactly one channel mention in the fixed shape', async () => {
  await withTempDir(async (dir) => {
    const store = new GuildStore(path.join(dir, 'guilds.json'));
    const registry = buildCommandRegistry();
    const command = registry.get('admin', 'channel');
    assert.ok(command);
    const { reply, sent } = replySink();

    const twoMentions = adminMessage('>channel <#10> <#11>', { channelIds: ['10', '11'] });
    assert.deepEqual(await command.handler(contextFor(twoMentions, store, reply, dir)), {
      ok: false,
      reason: 'invalid_command',
    });
    const noMention = adminMessage('>channel general');
    assert.equal((await command.handler(contextFor(noMention, store, reply, dir))).ok, false);
    assert.equal(store.get('guild-1').whitelistChannel, null);
    assert.equal(sent.length, 0);
  });
});

test('role command needs exactly one role mention in the fixed shape', async () => {
  await withTempDir(async (dir) => {
    const store = new GuildStore(path.join(dir, 'guilds.json'));
    const command = buildCommandRegistry().get('admin', 'role');
    assert.ok(command);
    const { reply, sent } = replySink();

    const rejected: Array<[string, string[]]> = [
      ['>role <@&20> extra', ['20']],
      ['>role', []],
      ['>role <@&20> <@&21>', ['20', '21']],
      ['>role @members', ['20']],
    ];
    for (const [text, roleIds] of rejected) {
      const result = await command.handler(contextFor(adminMessage(text, { roleIds }), store, reply, dir));
      assert.deepEqual(result, { ok: false, reason: 'invalid_command' }, text);
    }
    assert.equal(store.get('guild-1').whitelistRole, null);
    assert.equal(sent.length, 0);

    const accepted = await command.handler(contextFor(adminMessage('>role <@&20>', { roleIds: ['20'] }), store, reply, dir));
    assert.deepEqual(accepted, { ok: true });
    assert.equal(store.get('guild-1').whitelistRole, '20');
    assert.deepEqual(sent, [{ content: 'Successfully set whitelist role to <@&20>', mentionAuthor: true }]);
  });
});

test('blockchain command only takes declared ledger types', async () => {
  await withTempDir(async (dir) => {
    const store = new GuildStore(path.join(dir, 'guilds.json'));
    const command = buildCommandRegistry().get('admin', 'blockchain');
    assert.ok(command);
    const { reply, sent } = replySink();

    for (const text of ['>blockchain btc', '>blockchain', '>blockchain ETH']) {
      const result = await command.handler(contextFor(adminMessage(text), store, reply, dir));
      assert.equal(result.ok, false, text);
    }
    assert.equal(store.get('guild-1').ledgerType, null);

    assert.equal((await command.handler(contextFor(adminMessage('>blockchain sol'), store, reply, dir))).ok, true);
    assert.equal(store.get('guild-1').ledgerType, 'sol');
    assert.deepEqual(sent, [{ content: 'Successfully set blockchain to sol', mentionAuthor: true }]);
  });
});

test('config command shows unset fields', async () => {
  await withTempDir(async (dir) => {
    const store = new GuildStore(path.join(dir, 'guilds.json'));
    const command = buildCommandRegistry().get('admin', 'config');
    assert.ok(command);
    const { reply, sent } = replySink();
    await store.mutate('guild-1', (c) => ({ ...c, whitelistRole: '20' }));
    await command.handler(contextFor(adminMessage('>config'), store, reply, dir));
    assert.deepEqual(sent, [
      {
        embed: {
          title: 'Config for Test Guild',
          description: 'Whitelist Channel: not set\nWhitelist Role: <@&20>\nBlockchain: not set',
        },
        mentionAuthor: true,
      },
    ]);
  });
});

test('data export removes the staged file even when sending fails', async () => {
  await withTempDir(async (dir) => {
    const store = new GuildStore(path.join(dir, 'guilds.json'));
    const stagingDir = path.join(dir, 'exports');
    const command = buildCommandRegistry().get('admin', 'data');
    assert.ok(command);
    const { reply } = replySink({ fail: true });
    await assert.rejects(command.handler(contextFor(adminMessage('>data'), store, reply, stagingDir)), /send failed/);
    assert.deepEqual(await fs.readdir(stagingDir), []);
  });
});

test('clear resets the guild to its default config', async () => {
  await withTempDir(async (dir) => {
    const store = new GuildStore(path.join(dir, 'guilds.json'));
    await store.mutate('guild-1', (c) => ({ ...c, whitelistChannel: '10', ledgerType: 'eth', entries: { u1: 'x' } }));
    const command = buildCommandRegistry().get('admin', 'clear');
    assert.ok(command);
    const { reply, sent } = replySink();
    await command.handler(contextFor(adminMessage('>clear'), store, reply, dir));
    assert.deepEqual(store.get('guild-1'), { whitelistChannel: null, whitelistRole: null, ledgerType: null, entries: {} });
    assert.deepEqual(sent, [{ content: "Server's data and config has been cleared." }]);
  });
});

test('check reports the caller entry only', async () => {
  await withTempDir(async (dir) => {
    const store = new GuildStore(path.join(dir, 'guilds.json'));
    await store.mutate('guild-1', (c) => ({ ...c, entries: { 'member-2': '0xother' } }));
    const command = buildCommandRegistry().get('public', 'check');
    assert.ok(command);
    const { reply, sent } = replySink();
    await command.handler(contextFor(makeMessage({ content: '>check' }), store, reply, dir));
    await command.handler(
      contextFor(makeMessage({ content: '>check', author: { id: 'member-2' } }), store, reply, dir)
    );
    assert.deepEqual(sent, [
      { content: 'Your wallet is not yet on the whitelist. Use `>help` for more info!' },
      { content: 'You are whitelisted! Address: `0xother`' },
    ]);
  });
});

test('help embeds list the commands from the table', async () => {
  await withTempDir(async (dir) => {
    const store = new GuildStore(path.join(dir, 'guilds.json'));
    const registry = buildCommandRegistry();
    const help = registry.get('public', 'help');
    assert.ok(help);
    const { reply, sent } = replySink();
    await help.handler(contextFor(makeMessage({ content: '>help' }), store, reply, dir));
    const [payload] = sent;
    assert.equal(payload?.embed?.title, 'Whitelist Manager Help');
    assert.equal(
      payload?.embed?.fields?.[0]?.value,
      [
        '`>help`: How to use help screen.',
        '`>check`: Tells you whether or not your wallet has been recorded in the whitelist.',
        '',
        'How to use: Send your wallet address to the whitelist chat to record it!',
        'The message should contain just the wallet address (no `>`).',
      ].join('\n')
    );
  });
});
